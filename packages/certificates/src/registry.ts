import {
  createTypeRegistry,
  type Logger,
  type TypeDefinition,
  type TypeRegistry,
} from "@docformat/core";

import {
  MAINTENANCE_REPORT_TAG,
  maintenanceReportDescriptor,
} from "./maintenanceReport";
import {
  PROTECTION_PROFILE_TAG,
  protectionProfileDescriptor,
} from "./protectionProfile";

export const certificateTypes: ReadonlyArray<TypeDefinition> = [
  { tag: PROTECTION_PROFILE_TAG, descriptor: protectionProfileDescriptor },
  { tag: MAINTENANCE_REPORT_TAG, descriptor: maintenanceReportDescriptor },
];

/**
 * Registry holding every certificate domain type.
 */
export const createCertificateRegistry = (logger?: Logger): TypeRegistry =>
  createTypeRegistry(certificateTypes, logger);
