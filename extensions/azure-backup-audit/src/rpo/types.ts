/**
 * RPO inference types.
 */

import type { CadenceInfo } from "../schedule/duration.js";
import type { RpoSource, WorkloadClass } from "../types.js";

export type RecoveryPointKind =
  | "Log"
  | "Differential"
  | "CopyOnly"
  | "Full"
  | "AppConsistent"
  | "CrashConsistent"
  | "FileSystemConsistent"
  | "Continuous"
  | "Other";

export type RecoveryPoint = {
  id: string | null;
  time: Date;
  kind: RecoveryPointKind;
  /** Type string as delivered, for display. */
  rawType: string | null;
};

export type RecoveryPointSource = "protectedItem" | "backupInstance";

/** What the engine needs to know about a protected resource. */
export type RpoSubject = {
  /** Null for items without a threshold class, such as backup-vault instances. */
  workload: WorkloadClass | null;
  /** Protected item or backup instance ARM id; recovery points hang off it. */
  itemId: string | null;
  /** Which API family serves `itemId`'s recovery points. Defaults to `protectedItem`. */
  pointsFrom?: RecoveryPointSource;
  /** Database ARM id for platform-managed databases (PITR restore points). */
  databaseId?: string | null;
  /** Last successful backup as reported by the item itself. */
  lastBackupTime: Date | null;
};

export type RpoEvaluation = {
  rpoSource: RpoSource;
  /** Cadence resolved from the backup policy. */
  configuredCadence: CadenceInfo | null;
  /** Cadence estimated from the two most recent points. */
  inferredCadence: CadenceInfo | null;
  observedRpoHours: number | null;
  latestPointTime: Date | null;
  latestPointKind: RecoveryPointKind | null;
  pointsExamined: number;
};
