/**
 * Azure Backup Audit: Shared Types
 *
 * Core type definitions used across the audit modules.
 */

// =============================================================================
// Logging
// =============================================================================

/**
 * Logger shape accepted by every component. Matches the host plugin logger,
 * so an injected plugin logger can be passed straight through.
 */
export type AuditLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

// =============================================================================
// Retry
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/** Retry settings for raw REST GETs (status-driven, deterministic backoff). */
export type RestRetryOptions = {
  maxAttempts?: number;
  /** Delay before the first retry. Each later retry doubles it. */
  baseDelayMs?: number;
};

// =============================================================================
// Workloads
// =============================================================================

/**
 * Workload classes that carry their own RPO thresholds.
 *
 * `VM` covers IaaS VM backups, `SQLDataBase` and `SAPHanaDatabase` are
 * in-guest workload backups, `AzureSqlDatabase` is the platform-managed
 * database protected by point-in-time restore.
 */
export type WorkloadClass = "VM" | "SQLDataBase" | "SAPHanaDatabase" | "AzureSqlDatabase";

export const WORKLOAD_CLASSES: readonly WorkloadClass[] = [
  "VM",
  "SQLDataBase",
  "SAPHanaDatabase",
  "AzureSqlDatabase",
];

export type RpoSource = "Policy" | "RecoveryPoints" | "PITR" | "None";

export type RpoThreshold = {
  warningHours: number;
  criticalHours: number;
};

export type RpoThresholds = Record<WorkloadClass, RpoThreshold>;

// =============================================================================
// Inventory
// =============================================================================

/** Flat resource record handed in by the external inventory collaborator. */
export type InventoryResource = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  powerState?: string;
  /** ARM resource type, e.g. `Microsoft.Compute/virtualMachines`. */
  type?: string;
  subscriptionId?: string;
};

/** Subscription the run is scoped to; enumeration happens upstream. */
export type AuditSubscription = {
  subscriptionId: string;
  displayName?: string;
  tenantId?: string;
};
