export {
  VaultPostureResolver,
  deriveSecurityLevel,
  emptyPostureFields,
  fillGaps,
  requiredFieldsResolved,
} from "./resolver.js";
export type { VaultPostureResolverOptions } from "./resolver.js";
export {
  normalizeSoftDeleteState,
  recoveryServicesRootSource,
  recoveryServicesStorageConfigSource,
  recoveryServicesVaultConfigSource,
  recoveryServicesLegacyVaultConfigSource,
  dataProtectionRootSource,
  RECOVERY_SERVICES_SOURCES,
  DATA_PROTECTION_SOURCES,
} from "./sources.js";
export type { PostureContext, PostureSource } from "./sources.js";
export { REQUIRED_POSTURE_FIELDS } from "./types.js";
export type {
  VaultFamily,
  VaultRef,
  VaultPosture,
  PostureFields,
  SoftDeleteState,
  SecurityLevel,
} from "./types.js";
