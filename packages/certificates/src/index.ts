export {
  MAINTENANCE_REPORT_TAG,
  MaintenanceReport,
  maintenanceReportDescriptor,
} from "./maintenanceReport";
export type { MaintenanceReportInput } from "./maintenanceReport";
export {
  PROTECTION_PROFILE_TAG,
  ProtectionProfile,
  protectionProfileDescriptor,
} from "./protectionProfile";
export type { ProtectionProfileInput } from "./protectionProfile";
export { certificateTypes, createCertificateRegistry } from "./registry";
export { sanitizeDate, sanitizeLink, sanitizeString } from "./sanitize";
