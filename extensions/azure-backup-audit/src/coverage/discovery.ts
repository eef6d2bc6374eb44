/**
 * Protected-Resource Set Builder
 *
 * Recovery Services vaults are searched with three strategies, most direct
 * first; the first one that returns items wins:
 *
 * 1. `managementType` lists protected items filtered by backup management type.
 * 2. `containers` enumerates registered containers, then lists the items of
 *    each container on its own.
 * 3. `rest` pages the vault's protected-items endpoint directly, across API
 *    generations and filters.
 *
 * Backup vaults list their `backupInstances`. Every item is normalized and
 * its source resource id added to the run's `ProtectedIdSet`.
 */

import type { AuditLogger, AzureRetryOptions } from "../types.js";
import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import type { VaultRef } from "../posture/types.js";
import type { CredentialSource } from "../vaults/types.js";
import type { ProtectedItemRecord } from "./types.js";
import type { ProtectedIdSet } from "./protected-set.js";
import type { PagedWalkResult } from "../pagination.js";
import { firstNonEmpty, type Strategy } from "../strategy.js";
import { walkContinuationToken, walkNextLink } from "../pagination.js";
import { withAzureRetry } from "../retry.js";
import { getField, readString } from "../shape.js";
import { normalizeBackupInstance, normalizeProtectedItem } from "./items.js";
import { createConsoleLogger } from "../logger.js";

/** Backup management types whose items carry RPO-bearing workloads. */
export const MANAGEMENT_TYPES = ["AzureIaasVM", "AzureWorkload"] as const;

export type DiscoveryContext = {
  vault: VaultRef;
  credentials: CredentialSource;
  getter: RestGetter;
  apiVersions: Pick<ApiVersions, "protectedItems" | "protectedItemsLegacy" | "backupInstances">;
  retryOptions?: AzureRetryOptions;
};

/** Returns raw protected item resources; normalization happens in the builder. */
export type DiscoveryStrategy = Strategy<DiscoveryContext, unknown[]>;

export type DiscoveryResult = {
  items: ProtectedItemRecord[];
  /** Strategy (or listing) that produced the items; null when none did. */
  strategy: string | null;
  tried: string[];
};

function managementFilter(type: string): string {
  return `backupManagementType eq '${type}'`;
}

export function containerFilter(type: string, containerName: string): string {
  return `${managementFilter(type)} and containerName eq '${containerName}'`;
}

/** Merge item lists, dropping repeats of the same item id. */
function dedupeById(items: readonly unknown[]): unknown[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const id = readString(getField(item, "id"))?.toLowerCase();
    if (!id || seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

async function backupClient(ctx: DiscoveryContext) {
  const { RecoveryServicesBackupClient } = await import("@azure/arm-recoveryservicesbackup");
  const { credential } = await ctx.credentials.getCredential();
  return new RecoveryServicesBackupClient(credential, ctx.vault.subscriptionId);
}

export const managementTypeStrategy: DiscoveryStrategy = {
  name: "managementType",
  async attempt(ctx) {
    return withAzureRetry(async () => {
      const client = await backupClient(ctx);
      const results: unknown[] = [];
      for (const type of MANAGEMENT_TYPES) {
        const iter = client.backupProtectedItems.list(ctx.vault.name, ctx.vault.resourceGroup, {
          filter: managementFilter(type),
        });
        for await (const item of iter) results.push(item);
      }
      return dedupeById(results);
    }, ctx.retryOptions);
  },
};

export const containerStrategy: DiscoveryStrategy = {
  name: "containers",
  async attempt(ctx) {
    return withAzureRetry(async () => {
      const client = await backupClient(ctx);
      const containers: { type: string; name: string }[] = [];
      for (const type of MANAGEMENT_TYPES) {
        const iter = client.backupProtectionContainers.list(ctx.vault.name, ctx.vault.resourceGroup, {
          filter: managementFilter(type),
        });
        for await (const container of iter) {
          const name = readString(container.name);
          if (name) containers.push({ type, name });
        }
      }

      const results: unknown[] = [];
      for (const { type, name } of containers) {
        const iter = client.backupProtectedItems.list(ctx.vault.name, ctx.vault.resourceGroup, {
          filter: containerFilter(type, name),
        });
        for await (const item of iter) results.push(item);
      }
      return dedupeById(results);
    }, ctx.retryOptions);
  },
};

/**
 * Current API generation pages with `nextLink`; the legacy one returns a
 * continuation header instead.
 */
export const restStrategy: DiscoveryStrategy = {
  name: "rest",
  async attempt(ctx) {
    const base = `${ctx.vault.id}/backupProtectedItems`;
    const generations: { apiVersion: string; walk: (url: string) => Promise<PagedWalkResult> }[] = [
      { apiVersion: ctx.apiVersions.protectedItems, walk: (url) => walkNextLink(ctx.getter, url) },
      { apiVersion: ctx.apiVersions.protectedItemsLegacy, walk: (url) => walkContinuationToken(ctx.getter, url) },
    ];
    const filters: (string | null)[] = [...MANAGEMENT_TYPES.map(managementFilter), null];

    for (const { apiVersion, walk } of generations) {
      const results: unknown[] = [];
      for (const filter of filters) {
        // the unfiltered listing is only a fallback for when the filters match nothing
        if (filter === null && results.length > 0) break;
        const url = `${base}?api-version=${apiVersion}${filter ? `&$filter=${encodeURIComponent(filter)}` : ""}`;
        const page = await walk(url);
        results.push(...page.items);
      }
      if (results.length > 0) return dedupeById(results);
    }
    return [];
  },
};

export const DEFAULT_DISCOVERY_STRATEGIES: readonly DiscoveryStrategy[] = [
  managementTypeStrategy,
  containerStrategy,
  restStrategy,
];

export type ProtectedResourceSetBuilderOptions = Omit<DiscoveryContext, "vault"> & {
  logger?: AuditLogger;
  strategies?: readonly DiscoveryStrategy[];
};

export class ProtectedResourceSetBuilder {
  private readonly context: Omit<DiscoveryContext, "vault">;
  private readonly strategies: readonly DiscoveryStrategy[];
  private readonly log: AuditLogger;

  constructor(options: ProtectedResourceSetBuilderOptions) {
    const { logger, strategies, ...context } = options;
    this.context = context;
    this.strategies = strategies ?? DEFAULT_DISCOVERY_STRATEGIES;
    this.log = logger ?? createConsoleLogger();
  }

  /**
   * Discover the vault's protected items and record their source resources
   * in `set`. Items whose source id cannot be recovered are returned but not
   * added to the set.
   */
  async discover(vault: VaultRef, set: ProtectedIdSet): Promise<DiscoveryResult> {
    const result =
      vault.family === "RecoveryServices"
        ? await this.discoverRecoveryServices(vault)
        : await this.discoverBackupInstances(vault);

    for (const item of result.items) {
      if (item.sourceResourceId) {
        set.add(item.sourceResourceId, item.method, vault.name);
      } else {
        this.log.warn(`[Discovery] ${vault.name}: no source resource id for ${item.name}`);
      }
    }
    this.log.info(`[Discovery] ${vault.name}: ${result.items.length} protected item(s) via ${result.strategy ?? "none"}`);
    return result;
  }

  private async discoverRecoveryServices(vault: VaultRef): Promise<DiscoveryResult> {
    const outcome = await firstNonEmpty(this.strategies, { ...this.context, vault }, {
      isEmpty: (items) => items.length === 0,
      logger: this.log,
      component: "Discovery",
    });
    const strategy = outcome.strategy ?? "none";
    const items = (outcome.result ?? []).flatMap((raw) => {
      const item = normalizeProtectedItem(raw, vault, strategy);
      return item ? [item] : [];
    });
    return { items, strategy: outcome.strategy, tried: outcome.tried };
  }

  private async discoverBackupInstances(vault: VaultRef): Promise<DiscoveryResult> {
    const walk = await walkNextLink(
      this.context.getter,
      `${vault.id}/backupInstances?api-version=${this.context.apiVersions.backupInstances}`,
    );
    if (!walk.complete) {
      this.log.warn(`[Discovery] ${vault.name}: backup instance listing incomplete after ${walk.pages} page(s)`);
    }
    const items = walk.items.flatMap((raw) => {
      const item = normalizeBackupInstance(raw, vault, "backupInstances");
      return item ? [item] : [];
    });
    return { items, strategy: items.length > 0 ? "backupInstances" : null, tried: ["backupInstances"] };
  }
}
