/**
 * Backup Audit Scanner
 *
 * Walks subscription → vault → posture → discovery → item → schedule → RPO,
 * then projects coverage and findings. Everything runs sequentially on one
 * logical thread. Every discovered vault and item yields a row, with nulls
 * where a value could not be resolved; only an authentication failure
 * aborts the run.
 */

import type { AuditLogger, InventoryResource } from "../types.js";
import type { BackupAuditConfig } from "../config.js";
import type { RestGetter, TokenProvider } from "../http/types.js";
import type { VaultPosture, VaultRef } from "../posture/types.js";
import type { ProtectedItemRecord, ProtectedItemRow } from "../coverage/types.js";
import type { RpoEvaluation } from "../rpo/types.js";
import type { CredentialSource } from "../vaults/types.js";
import type { AuditRunInput, AuditRunResult, RunContext } from "./types.js";
import { AzureRestClient } from "../http/client.js";
import { AzureCredentialsManager } from "../credentials/manager.js";
import { AzureVaultInventory } from "../vaults/manager.js";
import { PolicyCache } from "../vaults/policies.js";
import { VaultPostureResolver, deriveSecurityLevel, emptyPostureFields } from "../posture/resolver.js";
import { ProtectedResourceSetBuilder } from "../coverage/discovery.js";
import { ProtectedIdSet } from "../coverage/protected-set.js";
import { pitrItem } from "../coverage/items.js";
import { buildFindings, evaluateCoverage, summarizeFindings } from "../coverage/evaluator.js";
import { parseResourceId } from "../coverage/resource-id.js";
import { RpoInferenceEngine } from "../rpo/engine.js";
import { extractPolicySchedule } from "../schedule/extractor.js";
import type { ScheduleInfo } from "../schedule/types.js";
import { isAuthenticationError } from "../errors.js";
import { formatErrorMessage } from "../retry.js";
import { createConsoleLogger } from "../logger.js";
import { enableAuditDiagnostics, onAuditDiagnosticEvent, type AuditDiagnosticEvent } from "../diagnostics.js";

const SQL_DATABASE_TYPE = "microsoft.sql/servers/databases";

export type BackupAuditScannerOptions = {
  config: BackupAuditConfig;
  /** SDK credential for vault listing and discovery. */
  credentials: CredentialSource;
  getter: RestGetter;
  logger?: AuditLogger;
  clock?: () => Date;
  /** Component overrides; defaults are built from the options above. */
  vaultInventory?: AzureVaultInventory;
  postureResolver?: VaultPostureResolver;
  discovery?: ProtectedResourceSetBuilder;
};

/** Azure SQL databases, excluding the `master` system database. */
export function isAzureSqlDatabase(resource: InventoryResource): boolean {
  const type = (resource.type ?? parseResourceId(resource.id)?.resourceType ?? "").toLowerCase();
  return type === SQL_DATABASE_TYPE && resource.name.toLowerCase() !== "master";
}

function emptyEvaluation(): RpoEvaluation {
  return {
    rpoSource: "None",
    configuredCadence: null,
    inferredCadence: null,
    observedRpoHours: null,
    latestPointTime: null,
    latestPointKind: null,
    pointsExamined: 0,
  };
}

function toRow(item: ProtectedItemRecord, schedule: ScheduleInfo | null, rpo: RpoEvaluation): ProtectedItemRow {
  return {
    ...item,
    configuredCadence: rpo.configuredCadence,
    windowHours: schedule?.windowHours ?? null,
    inferredCadence: rpo.inferredCadence,
    rpoSource: rpo.rpoSource,
    observedRpoHours: rpo.observedRpoHours,
    latestPointTime: rpo.latestPointTime,
    latestPointKind: rpo.latestPointKind,
  };
}

/** Posture row with every field unresolved, for vaults whose resolution failed. */
function unresolvedPosture(vault: VaultRef): VaultPosture {
  const fields = emptyPostureFields();
  return {
    vaultId: vault.id,
    vaultName: vault.name,
    resourceGroup: vault.resourceGroup,
    location: vault.location,
    subscriptionId: vault.subscriptionId,
    family: vault.family,
    ...fields,
    securityLevel: deriveSecurityLevel(fields),
    sources: [],
    complete: false,
  };
}

export class BackupAuditScanner {
  private readonly config: BackupAuditConfig;
  private readonly getter: RestGetter;
  private readonly log: AuditLogger;
  private readonly clock: () => Date;
  private readonly vaultInventory: AzureVaultInventory;
  private readonly postureResolver: VaultPostureResolver;
  private readonly discovery: ProtectedResourceSetBuilder;

  constructor(options: BackupAuditScannerOptions) {
    const { config, credentials, getter } = options;
    this.config = config;
    this.getter = getter;
    this.log = options.logger ?? createConsoleLogger({ verbose: config.diagnostics.verbose });
    this.clock = options.clock ?? (() => new Date());

    this.vaultInventory =
      options.vaultInventory ??
      new AzureVaultInventory({ credentials, getter, apiVersions: config.apiVersions, logger: this.log });
    this.postureResolver =
      options.postureResolver ??
      new VaultPostureResolver({ getter, apiVersions: config.apiVersions, logger: this.log });
    this.discovery =
      options.discovery ??
      new ProtectedResourceSetBuilder({ credentials, getter, apiVersions: config.apiVersions, logger: this.log });
  }

  createRunContext(): RunContext {
    return {
      protectedIds: new ProtectedIdSet(),
      findings: [],
      policies: new PolicyCache(this.getter, this.config.apiVersions),
      now: this.clock(),
    };
  }

  async run(input: AuditRunInput): Promise<AuditRunResult> {
    const ctx = this.createRunContext();
    const engine = new RpoInferenceEngine({
      getter: this.getter,
      apiVersions: this.config.apiVersions,
      clock: () => ctx.now,
      logger: this.log,
    });
    const vaults: VaultPosture[] = [];
    const items: ProtectedItemRow[] = [];

    for (const subscription of input.subscriptions) {
      this.log.info(`[BackupAudit] Scanning subscription ${subscription.displayName ?? subscription.subscriptionId}`);
      const refs = await this.vaultInventory.listVaults(subscription.subscriptionId);

      for (const vault of refs) {
        vaults.push(await this.resolvePosture(vault));
        const discovered = await this.discover(vault, ctx);
        for (const item of discovered) {
          items.push(await this.evaluateItem(item, ctx, engine));
        }
      }
    }

    const subscriptionIds = new Set(input.subscriptions.map((s) => s.subscriptionId.toLowerCase()));
    for (const resource of input.inventory) {
      if (!isAzureSqlDatabase(resource) || ctx.protectedIds.has(resource.id)) continue;
      const owner = resource.subscriptionId ?? parseResourceId(resource.id)?.subscriptionId;
      if (owner && !subscriptionIds.has(owner.toLowerCase())) continue;
      const row = await this.evaluatePitr(resource, ctx, engine);
      if (row) items.push(row);
    }

    const coverage = evaluateCoverage(input.inventory, ctx.protectedIds);
    ctx.findings.push(...buildFindings({ vaults, coverage, items, thresholds: this.config.thresholds }));
    const summary = summarizeFindings(ctx.findings);

    this.log.info(
      `[BackupAudit] ${vaults.length} vault(s), ${items.length} item(s), ${coverage.filter((c) => !c.protected).length} uncovered, score ${summary.score}`,
    );

    return {
      startedAt: ctx.now,
      completedAt: this.clock(),
      vaults,
      items,
      coverage,
      findings: ctx.findings,
      summary,
    };
  }

  private async resolvePosture(vault: VaultRef): Promise<VaultPosture> {
    try {
      return await this.postureResolver.resolve(vault);
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      this.log.warn(`[BackupAudit] Posture for ${vault.name} failed: ${formatErrorMessage(error)}`);
      return unresolvedPosture(vault);
    }
  }

  private async discover(vault: VaultRef, ctx: RunContext): Promise<ProtectedItemRecord[]> {
    try {
      return (await this.discovery.discover(vault, ctx.protectedIds)).items;
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      this.log.warn(`[BackupAudit] Discovery for ${vault.name} failed: ${formatErrorMessage(error)}`);
      return [];
    }
  }

  private async evaluateItem(
    item: ProtectedItemRecord,
    ctx: RunContext,
    engine: RpoInferenceEngine,
  ): Promise<ProtectedItemRow> {
    let schedule: ScheduleInfo | null = null;
    try {
      if (item.policyId) {
        const policy = await ctx.policies.get(item.policyId);
        schedule = policy ? extractPolicySchedule(policy, { logger: this.log, policyId: item.policyId }) : null;
      }
      const rpo = await engine.evaluate(
        {
          workload: item.workload,
          itemId: item.itemId,
          pointsFrom: item.method === "BackupVault" ? "backupInstance" : "protectedItem",
          lastBackupTime: item.lastBackupTime,
        },
        schedule,
      );
      return toRow(item, schedule, rpo);
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      this.log.warn(`[BackupAudit] Evaluating ${item.name} failed: ${formatErrorMessage(error)}`);
      return toRow(item, schedule, emptyEvaluation());
    }
  }

  /** Azure SQL databases count as protected when restore points exist. */
  private async evaluatePitr(
    resource: InventoryResource,
    ctx: RunContext,
    engine: RpoInferenceEngine,
  ): Promise<ProtectedItemRow | null> {
    const rpo = await engine.evaluate(
      { workload: "AzureSqlDatabase", itemId: null, databaseId: resource.id, lastBackupTime: null },
      null,
    );
    if (rpo.pointsExamined === 0) return null;

    const item = pitrItem(resource, rpo.latestPointTime);
    ctx.protectedIds.add(resource.id, "PITR", item.vaultName || null);
    return toRow(item, null, rpo);
  }
}

export function formatDiagnosticEvent(event: AuditDiagnosticEvent): string {
  const parts = [`#${event.seq}`, event.type, `${event.component}.${event.operation}`];
  if (event.target) parts.push(event.target);
  if (event.attempt !== undefined) parts.push(`attempt=${event.attempt}`);
  if (event.statusCode !== undefined) parts.push(`status=${event.statusCode}`);
  if (event.durationMs !== undefined) parts.push(`${event.durationMs}ms`);
  if (event.error) parts.push(event.error);
  return `[Diagnostics] ${parts.join(" ")}`;
}

let detachDiagnostics: (() => void) | null = null;

/**
 * Wire a scanner from configuration alone: credentials from
 * `@azure/identity`, REST through `AzureRestClient`.
 */
export function createBackupAuditScanner(
  config: BackupAuditConfig,
  options?: { logger?: AuditLogger; tokenProvider?: TokenProvider & CredentialSource },
): BackupAuditScanner {
  const logger = options?.logger ?? createConsoleLogger({ verbose: config.diagnostics.verbose });
  if (config.diagnostics.enabled) {
    enableAuditDiagnostics();
    // the bus is process-wide; the newest scanner's logger replaces the previous one
    detachDiagnostics?.();
    detachDiagnostics = onAuditDiagnosticEvent((event) => logger.debug?.(formatDiagnosticEvent(event)));
  }
  const credentials =
    options?.tokenProvider ??
    new AzureCredentialsManager({
      credentialMethod: config.credentialMethod,
      tenantId: config.tenantId,
      managementEndpoint: config.managementEndpoint,
    });
  const getter = new AzureRestClient({
    tokenProvider: credentials,
    baseUrl: config.managementEndpoint,
    retry: config.retry,
    logger,
  });
  return new BackupAuditScanner({ config, credentials, getter, logger });
}
