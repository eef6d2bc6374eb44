/**
 * Vault Posture Resolver
 *
 * Folds posture sources in order of authority. The first non-null value for
 * a field wins; later sources only fill gaps. The security level is derived
 * from the merged fields and never merged itself.
 */

import type { AuditLogger } from "../types.js";
import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import type { PostureFields, SecurityLevel, VaultPosture, VaultRef } from "./types.js";
import { REQUIRED_POSTURE_FIELDS } from "./types.js";
import { DATA_PROTECTION_SOURCES, RECOVERY_SERVICES_SOURCES, type PostureSource } from "./sources.js";
import { isAuthenticationError } from "../errors.js";
import { formatErrorMessage } from "../retry.js";
import { createConsoleLogger } from "../logger.js";

export function emptyPostureFields(): PostureFields {
  return {
    softDeleteState: null,
    softDeleteRetentionDays: null,
    storageRedundancy: null,
    crossRegionRestore: null,
    crossSubscriptionRestore: null,
    multiUserAuthorization: null,
    hybridSecurity: null,
    immutability: null,
  };
}

/**
 * Copy every field of `partial` that `target` has not resolved yet.
 * Returns true when at least one field was taken.
 */
export function fillGaps(target: PostureFields, partial: Partial<PostureFields>): boolean {
  let filled = false;
  const assign = <K extends keyof PostureFields>(key: K): void => {
    const value = partial[key];
    if (target[key] === null && value !== undefined && value !== null) {
      target[key] = value;
      filled = true;
    }
  };
  assign("softDeleteState");
  assign("softDeleteRetentionDays");
  assign("storageRedundancy");
  assign("crossRegionRestore");
  assign("crossSubscriptionRestore");
  assign("multiUserAuthorization");
  assign("hybridSecurity");
  assign("immutability");
  return filled;
}

export function requiredFieldsResolved(fields: PostureFields): boolean {
  return REQUIRED_POSTURE_FIELDS.every((key) => fields[key] !== null);
}

export function deriveSecurityLevel(fields: PostureFields): SecurityLevel {
  if (fields.hybridSecurity === true) return "Enhanced";
  if (fields.multiUserAuthorization === true) return "Enhanced";
  if (fields.softDeleteState === "Enabled" || fields.softDeleteState === "AlwaysOn") return "Enhanced";
  return "Standard";
}

export type VaultPostureResolverOptions = {
  getter: RestGetter;
  apiVersions: ApiVersions;
  logger?: AuditLogger;
  /** Override the source chains (tests, alternate clouds). */
  sources?: Partial<Record<VaultRef["family"], readonly PostureSource[]>>;
};

export class VaultPostureResolver {
  private readonly getter: RestGetter;
  private readonly apiVersions: ApiVersions;
  private readonly log: AuditLogger;
  private readonly sources: Record<VaultRef["family"], readonly PostureSource[]>;

  constructor(options: VaultPostureResolverOptions) {
    this.getter = options.getter;
    this.apiVersions = options.apiVersions;
    this.log = options.logger ?? createConsoleLogger();
    this.sources = {
      RecoveryServices: options.sources?.RecoveryServices ?? RECOVERY_SERVICES_SOURCES,
      DataProtection: options.sources?.DataProtection ?? DATA_PROTECTION_SOURCES,
    };
  }

  async resolve(vault: VaultRef): Promise<VaultPosture> {
    const fields = emptyPostureFields();
    const contributed: string[] = [];
    const ctx = { vault, getter: this.getter, apiVersions: this.apiVersions };

    for (const source of this.sources[vault.family]) {
      if (requiredFieldsResolved(fields)) break;

      let partial: Partial<PostureFields> | null = null;
      try {
        partial = await source.attempt(ctx);
      } catch (error) {
        if (isAuthenticationError(error)) throw error;
        this.log.warn(`[Posture] ${source.name} failed for ${vault.name}: ${formatErrorMessage(error)}`);
      }

      if (partial && fillGaps(fields, partial)) contributed.push(source.name);
    }

    const complete = requiredFieldsResolved(fields);
    if (!complete) {
      const missing = REQUIRED_POSTURE_FIELDS.filter((key) => fields[key] === null);
      this.log.warn(`[Posture] ${vault.name}: unresolved ${missing.join(", ")}`);
    }

    return {
      vaultId: vault.id,
      vaultName: vault.name,
      resourceGroup: vault.resourceGroup,
      location: vault.location,
      subscriptionId: vault.subscriptionId,
      family: vault.family,
      ...fields,
      securityLevel: deriveSecurityLevel(fields),
      sources: contributed,
      complete,
    };
  }
}
