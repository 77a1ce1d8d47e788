// ============================================
// Inventory Module — items and the locations that hold them
// ============================================

export { itemsRouter, locationsRouter } from "./router";
export {
  items,
  locations,
  type Item,
  type NewItem,
  type Location,
  type NewLocation,
} from "./schema";
export { loadLocationNodes, loadLocationPaths } from "./queries";
export {
  buildLocationPaths,
  collectDescendantIds,
  wouldCreateCycle,
  LOCATION_PATH_SEPARATOR,
  type LocationNode,
} from "./tree";
