/**
 * Azure Backup Audit: Response Shape Helpers
 *
 * ARM payloads vary in casing and nesting across API versions. These helpers
 * read fields case-tolerantly and return `null` instead of throwing.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a field, preferring an exact key match, then a case-insensitive one. */
export function getField(value: unknown, key: string): unknown {
  if (!isRecord(value)) return undefined;
  if (key in value) return value[key];
  const lower = key.toLowerCase();
  for (const candidate of Object.keys(value)) {
    if (candidate.toLowerCase() === lower) return value[candidate];
  }
  return undefined;
}

/** Walk a nested path, case-insensitively at every level. */
export function getPath(value: unknown, path: readonly string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    current = getField(current, key);
    if (current === undefined || current === null) return undefined;
  }
  return current;
}

/**
 * Return the first present value across several candidate paths.
 * Paths are tried in order, so earlier entries take precedence.
 */
export function firstPresent(value: unknown, paths: readonly (readonly string[])[]): unknown {
  for (const path of paths) {
    const found = getPath(value, path);
    if (found !== undefined && found !== null && found !== "") return found;
  }
  return undefined;
}

export function readString(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

export function readNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lower = value.trim().toLowerCase();
    if (lower === "true") return true;
    if (lower === "false") return false;
  }
  return null;
}

export function readArray(value: unknown): unknown[] | null {
  return Array.isArray(value) ? value : null;
}

/** Accepts `Date` instances (SDK models) and ISO strings (REST payloads). */
export function readTimestamp(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const text = readString(value);
  if (!text) return null;
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
