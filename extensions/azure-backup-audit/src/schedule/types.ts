/**
 * Policy schedule shapes.
 *
 * Backup policies come in several incompatible wire shapes. Each is
 * classified into one variant of `PolicyShape` and then mapped onto the
 * canonical `ScheduleInfo` by a dedicated adapter.
 */

import type { CadenceInfo } from "./duration.js";

export type RunFrequency = "Hourly" | "Daily" | "Weekly";

/** Single-cadence schedule common to classic and enhanced VM policies. */
export type SimpleSchedule = {
  frequency: RunFrequency | null;
  /** Times of day as delivered (ISO datetimes or `HH:mm`). */
  runTimes: string[];
  /** Weekday names for weekly schedules. */
  runDays: string[];
  /** Explicit interval for hourly schedules. */
  intervalHours: number | null;
  /** Backup window as delivered (hours number or ISO duration). */
  window: unknown;
};

export type DatabaseSubPolicyType = "full" | "differential" | "log";

export type DatabaseSubPolicy = {
  type: DatabaseSubPolicyType;
  schedule: SimpleSchedule | null;
  /** Log backups are scheduled as a plain minute frequency. */
  frequencyMinutes: number | null;
};

export type PolicyShape =
  | { kind: "vm-classic"; schedule: SimpleSchedule }
  | { kind: "vm-enhanced"; schedule: SimpleSchedule }
  | { kind: "database"; workloadType: string | null; subPolicies: DatabaseSubPolicy[] }
  | { kind: "interval"; repeatingIntervals: string[]; window: unknown };

export type PolicyShapeKind = PolicyShape["kind"];

export type ScheduleVariant = {
  cadence: CadenceInfo | null;
  windowHours: number | null;
};

export type ScheduleInfo = ScheduleVariant & {
  shape: PolicyShapeKind;
  /** Per-kind cadences; only database policies fill these. */
  variants: Partial<Record<DatabaseSubPolicyType, ScheduleVariant>>;
};
