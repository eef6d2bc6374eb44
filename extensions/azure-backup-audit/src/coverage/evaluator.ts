/**
 * Coverage & Threshold Evaluator
 *
 * Pure projections from inventory, the protected set, item rows and vault
 * posture onto coverage rows and findings. The same inputs always produce
 * the same findings in the same order.
 */

import type { InventoryResource, RpoThreshold, RpoThresholds, WorkloadClass } from "../types.js";
import type { VaultPosture } from "../posture/types.js";
import type {
  CoverageRecord,
  Finding,
  FindingCategory,
  FindingSeverity,
  FindingSummary,
  ProtectedItemRow,
} from "./types.js";
import type { ProtectedIdSet } from "./protected-set.js";
import { parseResourceId } from "./resource-id.js";

/** Soft-delete retention below this many days is flagged. */
export const MIN_SOFT_DELETE_RETENTION_DAYS = 14;

const SEVERITY_WEIGHTS: Record<FindingSeverity, number> = { High: 3, Medium: 1.5, Low: 0.5 };

const WORKLOAD_LABELS: Record<WorkloadClass, string> = {
  VM: "Virtual Machine",
  SQLDataBase: "SQL Server in Azure VM",
  SAPHanaDatabase: "SAP HANA in Azure VM",
  AzureSqlDatabase: "Azure SQL Database",
};

const STOPPED_POWER_STATE = /deallocated|stopped/i;

// =============================================================================
// Coverage
// =============================================================================

/** One row per inventory resource; `protected` iff its id is in the set. */
export function evaluateCoverage(inventory: readonly InventoryResource[], set: ProtectedIdSet): CoverageRecord[] {
  return inventory.map((resource) => {
    const method = set.methodOf(resource.id);
    return {
      resourceId: resource.id,
      name: resource.name,
      resourceGroup: resource.resourceGroup,
      location: resource.location,
      resourceType: resource.type ?? parseResourceId(resource.id)?.resourceType ?? null,
      powerState: resource.powerState ?? null,
      subscriptionId: resource.subscriptionId ?? parseResourceId(resource.id)?.subscriptionId ?? null,
      protected: method !== null,
      method,
    };
  });
}

// =============================================================================
// Thresholds
// =============================================================================

/**
 * Severity for an observed RPO. Both boundaries are inclusive: exactly the
 * critical value is High, exactly the warning value is Medium.
 */
export function evaluateRpoThreshold(hours: number | null, threshold: RpoThreshold): "High" | "Medium" | null {
  if (hours === null) return null;
  if (hours >= threshold.criticalHours) return "High";
  if (hours >= threshold.warningHours) return "Medium";
  return null;
}

// =============================================================================
// Findings
// =============================================================================

export type FindingInputs = {
  vaults: readonly VaultPosture[];
  coverage: readonly CoverageRecord[];
  items: readonly ProtectedItemRow[];
  thresholds: RpoThresholds;
};

function finding(
  severity: FindingSeverity,
  category: FindingCategory,
  target: { subscriptionId: string | null; resourceType: string; resourceName: string; resourceId: string | null },
  detail: string,
  recommendation: string,
): Finding {
  return { moduleCode: "BACKUP", severity, category, ...target, detail, recommendation };
}

function isLocallyRedundant(redundancy: string): boolean {
  const lower = redundancy.toLowerCase();
  return lower === "lrs" || lower.startsWith("locally");
}

function isGeoRedundant(redundancy: string): boolean {
  const lower = redundancy.toLowerCase();
  return lower === "grs" || lower.startsWith("geo");
}

export function postureFindings(vault: VaultPosture): Finding[] {
  const target = {
    subscriptionId: vault.subscriptionId,
    resourceType: vault.family === "RecoveryServices" ? "Recovery Services Vault" : "Backup Vault",
    resourceName: vault.vaultName,
    resourceId: vault.vaultId,
  };
  const findings: Finding[] = [];

  if (vault.softDeleteState === "Disabled") {
    findings.push(
      finding("High", "Soft Delete", target, "Soft delete is disabled on the vault.",
        "Enable soft delete so deleted backup data is retained and recoverable."),
    );
  }
  if (vault.softDeleteRetentionDays !== null && vault.softDeleteRetentionDays < MIN_SOFT_DELETE_RETENTION_DAYS) {
    findings.push(
      finding("Low", "Retention", target,
        `Soft delete retention is ${vault.softDeleteRetentionDays} day(s).`,
        `Retain soft-deleted backup data for at least ${MIN_SOFT_DELETE_RETENTION_DAYS} days.`),
    );
  }
  if (vault.storageRedundancy !== null && isLocallyRedundant(vault.storageRedundancy)) {
    findings.push(
      finding("Medium", "Redundancy", target, "Backup storage is locally redundant.",
        "Use geo-redundant or zone-redundant storage for backup data."),
    );
  }
  if (vault.storageRedundancy !== null && isGeoRedundant(vault.storageRedundancy) && vault.crossRegionRestore === false) {
    findings.push(
      finding("Low", "Cross-Region Restore", target, "Cross-region restore is disabled on a geo-redundant vault.",
        "Enable cross-region restore to allow restores in the paired region."),
    );
  }
  if (vault.immutability !== null && vault.immutability.toLowerCase() === "disabled") {
    findings.push(
      finding("Low", "Immutability", target, "Vault immutability is disabled.",
        "Enable immutability to protect recovery points from early deletion."),
    );
  }
  return findings;
}

export function coverageFindings(record: CoverageRecord): Finding[] {
  if (record.protected) return [];
  const stopped = record.powerState !== null && STOPPED_POWER_STATE.test(record.powerState);
  return [
    finding(
      stopped ? "Medium" : "High",
      "Coverage",
      {
        subscriptionId: record.subscriptionId,
        resourceType: record.resourceType ?? "Resource",
        resourceName: record.name,
        resourceId: record.resourceId,
      },
      stopped
        ? `Resource is not protected by any backup (power state: ${record.powerState}).`
        : "Resource is not protected by any backup.",
      "Enable Azure Backup or confirm the resource is intentionally excluded.",
    ),
  ];
}

export function rpoFindings(item: ProtectedItemRow, thresholds: RpoThresholds): Finding[] {
  if (!item.workload) return [];
  const target = {
    subscriptionId: item.subscriptionId,
    resourceType: WORKLOAD_LABELS[item.workload],
    resourceName: item.friendlyName ?? item.name,
    resourceId: item.sourceResourceId ?? item.itemId,
  };

  if (item.observedRpoHours === null) {
    return [
      finding("Low", "RPO", target, "No recovery point or last backup time could be determined.",
        "Check that backups are running and that recovery points are being retained."),
    ];
  }

  const threshold = thresholds[item.workload];
  const severity = evaluateRpoThreshold(item.observedRpoHours, threshold);
  if (!severity) return [];

  const limit = severity === "High" ? threshold.criticalHours : threshold.warningHours;
  return [
    finding(
      severity,
      "RPO",
      target,
      `Observed RPO of ${item.observedRpoHours}h meets or exceeds the ${severity === "High" ? "critical" : "warning"} threshold of ${limit}h.`,
      item.configuredCadence
        ? `Investigate failed or skipped backups; the policy runs ${item.configuredCadence.label.toLowerCase()}.`
        : "Investigate failed or skipped backups and review the backup schedule.",
    ),
  ];
}

/** Posture findings per vault, then coverage per resource, then RPO per item. */
export function buildFindings(inputs: FindingInputs): Finding[] {
  return [
    ...inputs.vaults.flatMap(postureFindings),
    ...inputs.coverage.flatMap(coverageFindings),
    ...inputs.items.flatMap((item) => rpoFindings(item, inputs.thresholds)),
  ];
}

/** Counts per severity and a 0-100 score that falls as weighted findings grow. */
export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const counts: Record<FindingSeverity, number> = { High: 0, Medium: 0, Low: 0 };
  let weighted = 0;
  for (const f of findings) {
    counts[f.severity]++;
    weighted += SEVERITY_WEIGHTS[f.severity];
  }

  return {
    total: findings.length,
    high: counts.High,
    medium: counts.Medium,
    low: counts.Low,
    score: Math.round(100 / (1 + weighted / 20)),
  };
}
