/**
 * ISO-8601 duration parsing and cadence normalization.
 *
 * Only the day/time subset `P[nD][T[nH][nM][nS]]` is accepted; week, month
 * and year units have no fixed length and never appear in backup schedules.
 */

export type ParsedDuration = {
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
  totalSeconds: number;
};

export type CadenceInfo = {
  /** Raw interval in seconds. */
  seconds: number;
  /** Snapped hour value, or the two-decimal hour count when not snapped. */
  hours: number;
  /** Display text, derived from the fields above. */
  label: string;
};

const DURATION_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;

/** Hour values operators think in; noisy cadences snap onto these. */
export const CANONICAL_CADENCE_HOURS: readonly number[] = [1, 2, 3, 4, 6, 8, 12, 24];

/** Scheduling jitter tolerated when snapping, in seconds. */
export const CADENCE_SNAP_TOLERANCE_SECONDS = 20 * 60;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Milliseconds to hours, rounded to two decimals. */
export function roundHours(ms: number): number {
  return round2(ms / 3_600_000);
}

export function durationToSeconds(d: Omit<ParsedDuration, "totalSeconds">): number {
  return d.days * 86_400 + d.hours * 3_600 + d.minutes * 60 + d.seconds;
}

export function parseIsoDuration(text: unknown): ParsedDuration | null {
  if (typeof text !== "string") return null;
  const trimmed = text.trim();
  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) return null;

  const [, d, h, m, s] = match;
  // "P" and "P1DT" carry no time component after their designator
  if (d === undefined && h === undefined && m === undefined && s === undefined) return null;
  if (/T$/i.test(trimmed)) return null;

  const parts = {
    days: d ? Number(d) : 0,
    hours: h ? Number(h) : 0,
    minutes: m ? Number(m) : 0,
    seconds: s ? Number(s) : 0,
  };
  return { ...parts, totalSeconds: durationToSeconds(parts) };
}

function plural(value: number, unit: string): string {
  return `Every ${value} ${unit}${value === 1 ? "" : "s"}`;
}

/**
 * Snap a noisy interval onto an hour value:
 * 1. within tolerance of a canonical value → that value;
 * 2. within tolerance of a whole hour → that hour;
 * 3. otherwise hours, minutes or seconds with two decimals.
 */
export function normalizeCadence(seconds: number): CadenceInfo | null {
  if (!Number.isFinite(seconds) || seconds <= 0) return null;

  for (const canonical of CANONICAL_CADENCE_HOURS) {
    if (Math.abs(seconds - canonical * 3_600) <= CADENCE_SNAP_TOLERANCE_SECONDS) {
      return { seconds, hours: canonical, label: plural(canonical, "hour") };
    }
  }

  const nearest = Math.round(seconds / 3_600);
  if (nearest >= 1 && Math.abs(seconds - nearest * 3_600) <= CADENCE_SNAP_TOLERANCE_SECONDS) {
    return { seconds, hours: nearest, label: plural(nearest, "hour") };
  }

  const hours = round2(seconds / 3_600);
  if (seconds >= 3_600) return { seconds, hours, label: plural(hours, "hour") };
  if (seconds >= 60) return { seconds, hours, label: plural(round2(seconds / 60), "minute") };
  return { seconds, hours, label: plural(round2(seconds), "second") };
}

/** Parse then normalize in one step. */
export function cadenceFromDuration(text: unknown): CadenceInfo | null {
  const parsed = parseIsoDuration(text);
  return parsed ? normalizeCadence(parsed.totalSeconds) : null;
}
