export {
  LogoError,
  detectLogoMimeType,
  parseLogoUpload,
  getCompanyProfile,
  getCompanyBranding,
  getCompanyLogo,
  saveCompanyProfile,
  type CompanyLogo,
  type CompanyBranding,
} from "./company";
export { settingsRouter } from "./router";
