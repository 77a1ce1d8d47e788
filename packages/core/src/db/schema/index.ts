// ============================================
// Schema barrel — all tables exported from here
// ============================================

export { users, type User, type NewUser } from "./users";
export { sessions, type Session, type NewSession } from "./sessions";
export { auditLogs, type AuditLog, type NewAuditLog } from "./audit-logs";
export {
  companyProfile,
  COMPANY_PROFILE_ID,
  type CompanyProfile,
  type NewCompanyProfile,
} from "./company-profile";

// Module schemas
export {
  locations,
  items,
  type Location,
  type NewLocation,
  type Item,
  type NewItem,
} from "../../modules/inventory/schema";
export {
  productions,
  productionItems,
  type Production,
  type NewProduction,
  type ProductionItem,
  type NewProductionItem,
} from "../../modules/productions/schema";
