/**
 * Policy Schedule Extractor
 *
 * Maps each `PolicyShape` variant onto `ScheduleInfo`. Daily and weekly
 * schedules without an explicit interval report the largest gap between
 * consecutive runs (wrapping at midnight / week end): the worst-case time
 * between two backups, not the number of runs.
 */

import type { AuditLogger } from "../types.js";
import type {
  DatabaseSubPolicy,
  DatabaseSubPolicyType,
  PolicyShape,
  ScheduleInfo,
  ScheduleVariant,
  SimpleSchedule,
} from "./types.js";
import { classifyPolicy } from "./classify.js";
import { normalizeCadence, parseIsoDuration, round2 } from "./duration.js";
import { readNumber, readString } from "../shape.js";
import { emitAuditDiagnosticEvent } from "../diagnostics.js";

const MINUTES_PER_DAY = 1_440;
const TIME_OF_DAY = /(?:^|T)(\d{1,2}):(\d{2})/;
const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

/** Minutes after midnight, read from the wall-clock part of the value. */
export function minuteOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

export function weekdayIndex(value: string): number | null {
  const lower = value.trim().toLowerCase();
  if (lower.length < 3) return null;
  const index = WEEKDAYS.findIndex((day) => day.startsWith(lower));
  return index >= 0 ? index : null;
}

/**
 * Largest gap between sorted positions on a cycle of `period` units,
 * including the wrap from the last position back to the first.
 */
export function maxCyclicGap(positions: readonly number[], period: number): number | null {
  const sorted = [...new Set(positions)].sort((a, b) => a - b);
  if (sorted.length === 0) return null;
  if (sorted.length === 1) return period;

  let maxGap = sorted[0] + period - sorted[sorted.length - 1];
  for (let i = 1; i < sorted.length; i++) {
    maxGap = Math.max(maxGap, sorted[i] - sorted[i - 1]);
  }
  return maxGap;
}

function dailyGapSeconds(runTimes: readonly string[]): number | null {
  const minutes = runTimes.flatMap((t) => {
    const m = minuteOfDay(t);
    return m === null ? [] : [m];
  });
  const gap = maxCyclicGap(minutes, MINUTES_PER_DAY);
  return gap === null ? null : gap * 60;
}

function weeklyGapSeconds(runDays: readonly string[]): number | null {
  const days = runDays.flatMap((d) => {
    const i = weekdayIndex(d);
    return i === null ? [] : [i];
  });
  const gap = maxCyclicGap(days, 7);
  return gap === null ? null : gap * 86_400;
}

/** Window in hours from a number of hours or an ISO duration. */
export function windowHours(raw: unknown): number | null {
  const hours = readNumber(raw);
  if (hours !== null) return hours > 0 ? hours : null;
  const parsed = parseIsoDuration(raw);
  return parsed && parsed.totalSeconds > 0 ? round2(parsed.totalSeconds / 3_600) : null;
}

function simpleCadenceSeconds(schedule: SimpleSchedule): number | null {
  switch (schedule.frequency) {
    case "Hourly":
      return schedule.intervalHours !== null ? schedule.intervalHours * 3_600 : null;
    case "Daily":
      return dailyGapSeconds(schedule.runTimes);
    case "Weekly":
      return weeklyGapSeconds(schedule.runDays);
    case null:
      return schedule.intervalHours !== null ? schedule.intervalHours * 3_600 : null;
  }
}

function simpleVariant(schedule: SimpleSchedule): ScheduleVariant {
  const seconds = simpleCadenceSeconds(schedule);
  return {
    cadence: seconds === null ? null : normalizeCadence(seconds),
    windowHours: windowHours(schedule.window),
  };
}

function subPolicyVariant(sub: DatabaseSubPolicy): ScheduleVariant {
  if (sub.frequencyMinutes !== null) {
    return { cadence: normalizeCadence(sub.frequencyMinutes * 60), windowHours: null };
  }
  return sub.schedule ? simpleVariant(sub.schedule) : { cadence: null, windowHours: null };
}

/** Trailing duration of an ISO repeating interval, e.g. `R/2024-01-01T02:00:00+00:00/PT4H`. */
export function intervalDuration(interval: string): string | null {
  const slash = interval.lastIndexOf("/");
  return readString(slash >= 0 ? interval.slice(slash + 1) : interval);
}

/** Primary cadence preference for database policies. */
const DATABASE_PRIMARY_ORDER: readonly DatabaseSubPolicyType[] = ["log", "differential", "full"];

/**
 * Canonical schedule for a classified policy shape.
 */
export function extractSchedule(shape: PolicyShape): ScheduleInfo {
  switch (shape.kind) {
    case "vm-classic":
    case "vm-enhanced":
      return { shape: shape.kind, ...simpleVariant(shape.schedule), variants: {} };

    case "database": {
      const variants: ScheduleInfo["variants"] = {};
      for (const sub of shape.subPolicies) {
        if (!variants[sub.type]) variants[sub.type] = subPolicyVariant(sub);
      }
      const primary = DATABASE_PRIMARY_ORDER.map((type) => variants[type]).find((v) => v?.cadence);
      return {
        shape: shape.kind,
        cadence: primary?.cadence ?? null,
        windowHours: variants.full?.windowHours ?? null,
        variants,
      };
    }

    case "interval": {
      const first = shape.repeatingIntervals[0];
      const duration = first ? parseIsoDuration(intervalDuration(first)) : null;
      return {
        shape: shape.kind,
        cadence: duration ? normalizeCadence(duration.totalSeconds) : null,
        windowHours: windowHours(shape.window),
        variants: {},
      };
    }
  }
}

/**
 * Classify and extract in one step. Unknown shapes yield null and a
 * diagnostic, never an error.
 */
export function extractPolicySchedule(
  raw: unknown,
  options?: { logger?: AuditLogger; policyId?: string },
): ScheduleInfo | null {
  const shape = classifyPolicy(raw);
  if (!shape) {
    options?.logger?.debug?.(`[Schedule] Unrecognized policy shape${options?.policyId ? ` for ${options.policyId}` : ""}`);
    emitAuditDiagnosticEvent({
      type: "backup.shape.unknown",
      component: "schedule",
      operation: "classifyPolicy",
      target: options?.policyId,
    });
    return null;
  }
  return extractSchedule(shape);
}
