/**
 * Recovery point normalization and selection.
 */

import type { RecoveryPoint, RecoveryPointKind } from "./types.js";
import { normalizeCadence, roundHours, type CadenceInfo } from "../schedule/duration.js";
import { getField, getPath, readArray, readString, readTimestamp } from "../shape.js";

/**
 * Freshness ranking for database points: a recent log backup says more about
 * data loss exposure than an older full backup.
 */
export const DATABASE_POINT_PREFERENCE: readonly RecoveryPointKind[] = [
  "Log",
  "Differential",
  "CopyOnly",
  "Full",
  "AppConsistent",
];

export function pointKind(raw: string | null): RecoveryPointKind {
  const value = (raw ?? "").toLowerCase().replace(/[\s_-]/g, "");
  if (value === "log" || value === "transactionlog") return "Log";
  if (value === "differential" || value === "incremental") return "Differential";
  if (value === "copyonly" || value === "copyonlyfull") return "CopyOnly";
  if (value === "full" || value === "snapshotfull") return "Full";
  if (value === "appconsistent") return "AppConsistent";
  if (value === "crashconsistent") return "CrashConsistent";
  if (value === "filesystemconsistent") return "FileSystemConsistent";
  if (value === "continuous") return "Continuous";
  return "Other";
}

function latestRangeEnd(ranges: unknown[]): Date | null {
  let latest: Date | null = null;
  for (const range of ranges) {
    const end = readTimestamp(getField(range, "endTime"));
    if (end && (!latest || end > latest)) latest = end;
  }
  return latest;
}

/**
 * Vault recovery point (`…/protectedItems/{item}/recoveryPoints`).
 * Point-in-time log chains report the end of their latest time range.
 */
export function normalizeRecoveryPoint(raw: unknown): RecoveryPoint | null {
  const props = getField(raw, "properties") ?? raw;
  const id = readString(getField(raw, "id"));
  const objectType = readString(getField(props, "objectType")) ?? "";

  const ranges = readArray(getField(props, "timeRanges"));
  if (/pointintime/i.test(objectType) && ranges) {
    const end = latestRangeEnd(ranges);
    return end ? { id, time: end, kind: "Log", rawType: "Log" } : null;
  }

  const time =
    readTimestamp(getField(props, "recoveryPointTimeInUTC")) ??
    readTimestamp(getField(props, "recoveryPointTime"));
  if (!time) return null;

  const rawType = readString(getField(props, "type")) ?? readString(getField(props, "recoveryPointType"));
  return { id, time, kind: pointKind(rawType), rawType };
}

/**
 * Platform database restore point (`…/databases/{db}/restorePoints`).
 * Only continuous point-in-time restore points count.
 */
export function normalizeRestorePoint(raw: unknown): RecoveryPoint | null {
  const rawType = readString(getPath(raw, ["properties", "restorePointType"]));
  if (pointKind(rawType) !== "Continuous") return null;
  const time = readTimestamp(getPath(raw, ["properties", "restorePointCreationDate"]));
  if (!time) return null;
  return { id: readString(getField(raw, "id")), time, kind: "Continuous", rawType };
}

/** Newest first. */
export function sortPointsDescending(points: readonly RecoveryPoint[]): RecoveryPoint[] {
  return [...points].sort((a, b) => b.time.getTime() - a.time.getTime());
}

/** Interval between the two most recent points. */
export function inferCadence(points: readonly RecoveryPoint[]): CadenceInfo | null {
  const sorted = sortPointsDescending(points);
  if (sorted.length < 2) return null;
  return normalizeCadence((sorted[0].time.getTime() - sorted[1].time.getTime()) / 1_000);
}

/**
 * Most recent point of the best-ranked kind present. Kinds outside the
 * preference list rank last; ties go to the newest point.
 */
export function selectPreferredPoint(points: readonly RecoveryPoint[]): RecoveryPoint | null {
  let best: RecoveryPoint | null = null;
  let bestRank = Number.POSITIVE_INFINITY;
  for (const point of points) {
    const index = DATABASE_POINT_PREFERENCE.indexOf(point.kind);
    const rank = index === -1 ? DATABASE_POINT_PREFERENCE.length : index;
    if (rank < bestRank || (rank === bestRank && best !== null && point.time > best.time)) {
      best = point;
      bestRank = rank;
    }
  }
  return best;
}

export function latestPoint(points: readonly RecoveryPoint[]): RecoveryPoint | null {
  return sortPointsDescending(points)[0] ?? null;
}

export function observedRpoHours(now: Date, time: Date): number {
  return roundHours(now.getTime() - time.getTime());
}
