/**
 * Coverage types: protected items, coverage rows and findings.
 */

import type { RpoSource, WorkloadClass } from "../types.js";
import type { CadenceInfo } from "../schedule/duration.js";

/** How a resource ended up in the protected set. */
export type ProtectionMethod = "RecoveryServicesVault" | "BackupVault" | "PITR";

/**
 * A protected item normalized from whichever discovery path found it.
 * `sourceResourceId` is the canonical lower-case ARM id of the protected
 * resource, or null when it could not be recovered from the payload.
 */
export type ProtectedItemRecord = {
  itemId: string;
  name: string;
  friendlyName: string | null;
  vaultId: string;
  vaultName: string;
  subscriptionId: string;
  sourceResourceId: string | null;
  workload: WorkloadClass | null;
  workloadType: string | null;
  containerName: string | null;
  policyId: string | null;
  policyName: string | null;
  lastBackupTime: Date | null;
  lastBackupStatus: string | null;
  protectionState: string | null;
  method: ProtectionMethod;
  discoveredBy: string;
};

/** Protected item joined with its resolved schedule and RPO. */
export type ProtectedItemRow = ProtectedItemRecord & {
  configuredCadence: CadenceInfo | null;
  windowHours: number | null;
  inferredCadence: CadenceInfo | null;
  rpoSource: RpoSource;
  observedRpoHours: number | null;
  latestPointTime: Date | null;
  latestPointKind: string | null;
};

export type CoverageRecord = {
  resourceId: string;
  name: string;
  resourceGroup: string;
  location: string;
  resourceType: string | null;
  powerState: string | null;
  subscriptionId: string | null;
  protected: boolean;
  method: ProtectionMethod | null;
};

export type FindingSeverity = "High" | "Medium" | "Low";

export type FindingCategory =
  | "Coverage"
  | "RPO"
  | "Soft Delete"
  | "Redundancy"
  | "Immutability"
  | "Cross-Region Restore"
  | "Retention";

export type Finding = {
  moduleCode: "BACKUP";
  subscriptionId: string | null;
  severity: FindingSeverity;
  category: FindingCategory;
  resourceType: string;
  resourceName: string;
  resourceId: string | null;
  detail: string;
  recommendation: string;
};

export type FindingSummary = {
  total: number;
  high: number;
  medium: number;
  low: number;
  /** 0-100, higher is better. */
  score: number;
};
