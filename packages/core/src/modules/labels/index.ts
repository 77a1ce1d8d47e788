export {
  QR_ERROR_CORRECTION,
  QR_QUIET_ZONE_MODULES,
  QR_MIN_VERSION,
  LOGO_MAX_RATIO,
  buildQrMatrix,
  symbolModules,
  logoPad,
  darkRuns,
  type QrMatrix,
  type LogoPad,
  type DarkRun,
} from "./qr";
export {
  computeLabelLayout,
  composeLabels,
  renderLabels,
  loadItemLabel,
  loadProductionLabels,
  type LabelItem,
  type LabelLayout,
  type LabelOptions,
} from "./labels";
