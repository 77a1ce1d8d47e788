export {
  INVENTORY_REPORT_TITLE,
  loadInventoryReport,
  composeInventoryReport,
  renderInventoryReport,
  type InventoryReportData,
  type InventoryReportRow,
} from "./inventory-report";
export {
  bomReportTitle,
  bomReportFileName,
  loadBomReport,
  composeBomReport,
  renderBomReport,
  type BomReportData,
} from "./bom-report";
