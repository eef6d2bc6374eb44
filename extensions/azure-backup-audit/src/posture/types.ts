/**
 * Vault posture types.
 */

export type VaultFamily = "RecoveryServices" | "DataProtection";

export type SoftDeleteState = "Enabled" | "Disabled" | "AlwaysOn";

export type SecurityLevel = "Enhanced" | "Standard";

export type VaultRef = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  subscriptionId: string;
  family: VaultFamily;
  sku?: string;
};

/** Fields merged across posture sources. Null means "not reported". */
export type PostureFields = {
  softDeleteState: SoftDeleteState | null;
  softDeleteRetentionDays: number | null;
  storageRedundancy: string | null;
  crossRegionRestore: boolean | null;
  crossSubscriptionRestore: string | null;
  multiUserAuthorization: boolean | null;
  hybridSecurity: boolean | null;
  immutability: string | null;
};

/** Fields whose resolution ends the source chain early. */
export const REQUIRED_POSTURE_FIELDS = [
  "softDeleteState",
  "softDeleteRetentionDays",
  "storageRedundancy",
  "crossSubscriptionRestore",
] as const satisfies readonly (keyof PostureFields)[];

export type VaultPosture = {
  vaultId: string;
  vaultName: string;
  resourceGroup: string;
  location: string;
  subscriptionId: string;
  family: VaultFamily;
  securityLevel: SecurityLevel;
  /** Source names that contributed at least one field, in merge order. */
  sources: string[];
  /** True when every required field resolved. */
  complete: boolean;
} & PostureFields;
