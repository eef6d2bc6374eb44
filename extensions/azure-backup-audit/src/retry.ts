/**
 * Azure Backup Audit: Retry Utilities
 *
 * Two flavours of retry live here:
 * - `withAzureRetry` wraps Azure SDK calls (error-shape driven, jittered).
 * - `RETRYABLE_STATUSES` / `restBackoffDelayMs` drive the raw REST client,
 *   which retries a fixed status set with plain doubling.
 */

import type { AzureRetryOptions, RestRetryOptions } from "./types.js";
import { getField, readNumber, readString } from "./shape.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

export const REST_RETRY_DEFAULTS: Required<RestRetryOptions> = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
};

/** HTTP statuses the REST client retries. Everything else is terminal. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
]);

// =============================================================================
// Error Checking
// =============================================================================

function errorStatus(error: unknown): number | null {
  return readNumber(getField(error, "statusCode")) ?? readNumber(getField(error, "status"));
}

/**
 * Determine whether an Azure SDK error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = readString(getField(error, "code"));
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  const statusCode = errorStatus(error);
  if (statusCode !== null && RETRYABLE_STATUSES.has(statusCode)) return true;

  const message = (readString(getField(error, "message")) ?? "").toLowerCase();
  const retryablePatterns = [
    "throttl",
    "too many requests",
    "server busy",
    "temporarily unavailable",
    "service unavailable",
    "connection reset",
    "socket hang up",
    "fetch failed",
  ];
  return retryablePatterns.some((pattern) => message.includes(pattern));
}

/**
 * Extract Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const headers = getField(error, "headers");
  const retryAfter = readString(getField(headers, "retry-after"));
  if (!retryAfter) return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an Azure SDK call with retry. Rethrows the last error.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * base, 2·base, 4·base, …
 */
export function restBackoffDelayMs(attempt: number, baseDelayMs = REST_RETRY_DEFAULTS.baseDelayMs): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readString(getField(error, "code"));
  const statusCode = errorStatus(error);
  const message =
    error instanceof Error ? error.message : (readString(getField(error, "message")) ?? "Unknown error");

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode !== null) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
