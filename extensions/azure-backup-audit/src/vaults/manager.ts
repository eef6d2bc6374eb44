/**
 * Vault Inventory (Recovery Services and Data Protection)
 *
 * Lists the vaults of a subscription. Recovery Services vaults come from the
 * management SDK first and a next-link REST listing second; backup vaults
 * (Data Protection) come from REST only. A failed listing yields an empty
 * list and a warning, never an error, unless authentication failed.
 */

import type { AuditLogger, AzureRetryOptions } from "../types.js";
import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import type { VaultFamily, VaultRef } from "../posture/types.js";
import type { CredentialSource } from "./types.js";
import { withAzureRetry, formatErrorMessage } from "../retry.js";
import { walkNextLink } from "../pagination.js";
import { getField, readString } from "../shape.js";
import { resourceGroupOf } from "../coverage/resource-id.js";
import { isAuthenticationError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";

export type VaultInventoryOptions = {
  credentials: CredentialSource;
  getter: RestGetter;
  apiVersions: Pick<ApiVersions, "recoveryServicesVault" | "dataProtectionVault">;
  retryOptions?: AzureRetryOptions;
  logger?: AuditLogger;
};

/** Vault reference from a raw ARM vault resource (SDK model or REST item). */
export function toVaultRef(raw: unknown, subscriptionId: string, family: VaultFamily): VaultRef | null {
  const id = readString(getField(raw, "id"));
  if (!id) return null;
  return {
    id,
    name: readString(getField(raw, "name")) ?? id.split("/").pop() ?? id,
    resourceGroup: resourceGroupOf(id) ?? "",
    location: readString(getField(raw, "location")) ?? "",
    subscriptionId,
    family,
    sku: readString(getField(getField(raw, "sku"), "name")) ?? undefined,
  };
}

export class AzureVaultInventory {
  private credentials: CredentialSource;
  private getter: RestGetter;
  private apiVersions: VaultInventoryOptions["apiVersions"];
  private retryOptions?: AzureRetryOptions;
  private log: AuditLogger;

  constructor(options: VaultInventoryOptions) {
    this.credentials = options.credentials;
    this.getter = options.getter;
    this.apiVersions = options.apiVersions;
    this.retryOptions = options.retryOptions;
    this.log = options.logger ?? createConsoleLogger();
  }

  /** Both vault families, Recovery Services first. */
  async listVaults(subscriptionId: string): Promise<VaultRef[]> {
    const recoveryServices = await this.listRecoveryServicesVaults(subscriptionId);
    const backupVaults = await this.listBackupVaults(subscriptionId);
    this.log.info(
      `[BackupAudit] ${subscriptionId}: ${recoveryServices.length} Recovery Services vault(s), ${backupVaults.length} backup vault(s)`,
    );
    return [...recoveryServices, ...backupVaults];
  }

  async listRecoveryServicesVaults(subscriptionId: string): Promise<VaultRef[]> {
    try {
      const vaults = await withAzureRetry(async () => {
        const { RecoveryServicesClient } = await import("@azure/arm-recoveryservices");
        const { credential } = await this.credentials.getCredential();
        const client = new RecoveryServicesClient(credential, subscriptionId);
        const results: VaultRef[] = [];
        for await (const v of client.vaults.listBySubscriptionId()) {
          const ref = toVaultRef(v, subscriptionId, "RecoveryServices");
          if (ref) results.push(ref);
        }
        return results;
      }, this.retryOptions);
      return vaults;
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      this.log.warn(`[BackupAudit] SDK vault listing failed for ${subscriptionId}: ${formatErrorMessage(error)}; trying REST`);
    }

    const walk = await walkNextLink(
      this.getter,
      `/subscriptions/${subscriptionId}/providers/Microsoft.RecoveryServices/vaults?api-version=${this.apiVersions.recoveryServicesVault}`,
    );
    if (walk.pages === 0 || (!walk.complete && walk.items.length === 0)) {
      this.log.warn(`[BackupAudit] Recovery Services vaults could not be listed for ${subscriptionId}`);
    }
    return walk.items.flatMap((raw) => {
      const ref = toVaultRef(raw, subscriptionId, "RecoveryServices");
      return ref ? [ref] : [];
    });
  }

  async listBackupVaults(subscriptionId: string): Promise<VaultRef[]> {
    const walk = await walkNextLink(
      this.getter,
      `/subscriptions/${subscriptionId}/providers/Microsoft.DataProtection/backupVaults?api-version=${this.apiVersions.dataProtectionVault}`,
    );
    if (!walk.complete) {
      this.log.warn(`[BackupAudit] Backup vault listing for ${subscriptionId} incomplete after ${walk.pages} page(s)`);
    }
    return walk.items.flatMap((raw) => {
      const ref = toVaultRef(raw, subscriptionId, "DataProtection");
      return ref ? [ref] : [];
    });
  }
}
