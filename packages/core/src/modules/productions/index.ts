// ============================================
// Productions Module — events and their bill of materials
// ============================================

export { productionsRouter } from "./router";
export {
  productions,
  productionItems,
  type Production,
  type NewProduction,
  type ProductionItem,
  type NewProductionItem,
} from "./schema";
export {
  buildBillOfMaterials,
  loadBillOfMaterials,
  type BillOfMaterials,
  type BomLine,
  type BomCategorySummary,
} from "./bom";
