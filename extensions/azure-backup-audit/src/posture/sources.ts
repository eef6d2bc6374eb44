/**
 * Posture sources: one adapter per vault endpoint, each reading its own
 * payload shape into a partial `PostureFields`.
 */

import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import type { Strategy } from "../strategy.js";
import type { PostureFields, SoftDeleteState, VaultRef } from "./types.js";
import { getField, getPath, readArray, readBoolean, readNumber, readString } from "../shape.js";

export type PostureContext = {
  vault: VaultRef;
  getter: RestGetter;
  apiVersions: ApiVersions;
};

export type PostureSource = Strategy<PostureContext, Partial<PostureFields>>;

/**
 * Soft-delete vocabulary differs per endpoint: On/Off, Enabled/Disabled,
 * AlwaysON. Collapse it onto one domain.
 */
export function normalizeSoftDeleteState(value: unknown): SoftDeleteState | null {
  switch (readString(value)?.toLowerCase()) {
    case "on":
    case "enabled":
      return "Enabled";
    case "off":
    case "disabled":
      return "Disabled";
    case "alwayson":
      return "AlwaysOn";
    default:
      return null;
  }
}

/** Enabled/Disabled strings and booleans onto a boolean. */
function readEnabled(value: unknown): boolean | null {
  const flag = readBoolean(value);
  if (flag !== null) return flag;
  const text = readString(value)?.toLowerCase();
  if (!text) return null;
  if (text === "enabled" || text === "on") return true;
  if (text === "disabled" || text === "off" || text === "permanentlydisabled" || text === "invalid") return false;
  return null;
}

async function readProperties(ctx: PostureContext, url: string): Promise<unknown> {
  const response = await ctx.getter.get(url);
  return response ? getField(response.body, "properties") : undefined;
}

// =============================================================================
// Recovery Services vaults
// =============================================================================

/** Vault resource itself; the newest API generation carries the richest shape. */
export const recoveryServicesRootSource: PostureSource = {
  name: "vault",
  async attempt(ctx) {
    const props = await readProperties(ctx, `${ctx.vault.id}?api-version=${ctx.apiVersions.recoveryServicesVault}`);
    if (!props) return null;
    const softDelete = getPath(props, ["securitySettings", "softDeleteSettings"]);
    return {
      softDeleteState: normalizeSoftDeleteState(getField(softDelete, "softDeleteState")),
      softDeleteRetentionDays: readNumber(getField(softDelete, "softDeleteRetentionPeriodInDays")),
      hybridSecurity: readEnabled(getField(softDelete, "enhancedSecurityState")),
      storageRedundancy: readString(getPath(props, ["redundancySettings", "standardTierStorageRedundancy"])),
      crossRegionRestore: readEnabled(getPath(props, ["redundancySettings", "crossRegionRestore"])),
      crossSubscriptionRestore: readString(
        getPath(props, ["restoreSettings", "crossSubscriptionRestoreSettings", "crossSubscriptionRestoreState"]),
      ),
      multiUserAuthorization: readEnabled(getPath(props, ["securitySettings", "multiUserAuthorization"])),
      immutability: readString(getPath(props, ["securitySettings", "immutabilitySettings", "state"])),
    };
  },
};

/** Backup resource (storage) configuration. */
export const recoveryServicesStorageConfigSource: PostureSource = {
  name: "backupStorageConfig",
  async attempt(ctx) {
    const props = await readProperties(
      ctx,
      `${ctx.vault.id}/backupstorageconfig/vaultstorageconfig?api-version=${ctx.apiVersions.vaultStorageConfig}`,
    );
    if (!props) return null;
    return {
      storageRedundancy: readString(getField(props, "storageModelType")) ?? readString(getField(props, "storageType")),
      crossRegionRestore: readBoolean(getField(props, "crossRegionRestoreFlag")),
    };
  },
};

function vaultConfigSource(name: string, version: (v: ApiVersions) => string): PostureSource {
  return {
    name,
    async attempt(ctx) {
      const props = await readProperties(
        ctx,
        `${ctx.vault.id}/backupconfig/vaultconfig?api-version=${version(ctx.apiVersions)}`,
      );
      if (!props) return null;
      const guardRequests = readArray(getField(props, "resourceGuardOperationRequests"));
      return {
        softDeleteState: normalizeSoftDeleteState(getField(props, "softDeleteFeatureState")),
        softDeleteRetentionDays: readNumber(getField(props, "softDeleteRetentionPeriodInDays")),
        hybridSecurity: readEnabled(getField(props, "enhancedSecurityState")),
        multiUserAuthorization: guardRequests ? guardRequests.length > 0 : null,
      };
    },
  };
}

/** Backup configuration, current API generation. */
export const recoveryServicesVaultConfigSource = vaultConfigSource("backupConfig", (v) => v.vaultConfig);

/** Backup configuration, legacy API generation. */
export const recoveryServicesLegacyVaultConfigSource = vaultConfigSource(
  "backupConfigLegacy",
  (v) => v.vaultConfigLegacy,
);

export const RECOVERY_SERVICES_SOURCES: readonly PostureSource[] = [
  recoveryServicesRootSource,
  recoveryServicesStorageConfigSource,
  recoveryServicesVaultConfigSource,
  recoveryServicesLegacyVaultConfigSource,
];

// =============================================================================
// Backup vaults (Data Protection)
// =============================================================================

export const dataProtectionRootSource: PostureSource = {
  name: "vault",
  async attempt(ctx) {
    const props = await readProperties(ctx, `${ctx.vault.id}?api-version=${ctx.apiVersions.dataProtectionVault}`);
    if (!props) return null;
    const softDelete = getPath(props, ["securitySettings", "softDeleteSettings"]);
    const storage = readArray(getField(props, "storageSettings")) ?? [];
    return {
      softDeleteState: normalizeSoftDeleteState(getField(softDelete, "state")),
      softDeleteRetentionDays: readNumber(getField(softDelete, "retentionDurationInDays")),
      storageRedundancy: readString(getField(storage[0], "type")),
      crossRegionRestore: readEnabled(getPath(props, ["featureSettings", "crossRegionRestoreSettings", "state"])),
      crossSubscriptionRestore: readString(
        getPath(props, ["featureSettings", "crossSubscriptionRestoreSettings", "state"]),
      ),
      multiUserAuthorization: readBoolean(getField(props, "isVaultProtectedByResourceGuard")),
      immutability: readString(getPath(props, ["securitySettings", "immutabilitySettings", "state"])),
    };
  },
};

export const DATA_PROTECTION_SOURCES: readonly PostureSource[] = [dataProtectionRootSource];
