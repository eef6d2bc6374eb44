/**
 * Azure Backup Audit: Resilient REST GET client
 *
 * Authenticated `fetch()` GETs against the ARM surface. Retries a fixed set
 * of transient statuses with doubling backoff and returns `null` once the
 * budget is spent. Only token acquisition failures throw.
 */

import type { AuditLogger, RestRetryOptions } from "../types.js";
import type { RestGetter, RestResponse, TokenProvider } from "./types.js";
import { emitAuditDiagnosticEvent } from "../diagnostics.js";
import { RETRYABLE_STATUSES, REST_RETRY_DEFAULTS, formatErrorMessage, restBackoffDelayMs, sleep } from "../retry.js";
import { createConsoleLogger } from "../logger.js";

export type RestClientOptions = {
  tokenProvider: TokenProvider;
  /** Base for relative targets (those starting with `/`). */
  baseUrl?: string;
  retry?: RestRetryOptions;
  timeoutMs?: number;
  logger?: AuditLogger;
  /** Override the backoff sleep (tests pass a no-op). */
  sleep?: (ms: number) => Promise<void>;
};

type AttemptOutcome =
  | { kind: "ok"; response: RestResponse }
  | { kind: "retryable"; status?: number; error: string }
  | { kind: "terminal"; status: number; error: string };

export class AzureRestClient implements RestGetter {
  private readonly tokenProvider: TokenProvider;
  private readonly baseUrl: string;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly log: AuditLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RestClientOptions) {
    this.tokenProvider = options.tokenProvider;
    this.baseUrl = (options.baseUrl ?? "https://management.azure.com").replace(/\/+$/, "");
    this.maxAttempts = Math.max(1, options.retry?.maxAttempts ?? REST_RETRY_DEFAULTS.maxAttempts);
    this.baseDelayMs = options.retry?.baseDelayMs ?? REST_RETRY_DEFAULTS.baseDelayMs;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.log = options.logger ?? createConsoleLogger();
    this.sleep = options.sleep ?? sleep;
  }

  resolveUrl(target: string): string {
    return target.startsWith("/") ? `${this.baseUrl}${target}` : target;
  }

  async get(target: string): Promise<RestResponse | null> {
    const url = this.resolveUrl(target);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      // token errors propagate: they are systemic
      const token = await this.tokenProvider.getAccessToken();
      const started = Date.now();
      const outcome = await this.attempt(url, token);

      if (outcome.kind === "ok") {
        emitAuditDiagnosticEvent({
          type: "backup.http.call",
          component: "http",
          operation: "GET",
          target: url,
          attempt,
          statusCode: outcome.response.status,
          durationMs: Date.now() - started,
        });
        return outcome.response;
      }

      emitAuditDiagnosticEvent({
        type: outcome.kind === "terminal" || attempt === this.maxAttempts ? "backup.http.failure" : "backup.http.retry",
        component: "http",
        operation: "GET",
        target: url,
        attempt,
        statusCode: outcome.status,
        durationMs: Date.now() - started,
        error: outcome.error,
      });

      if (outcome.kind === "terminal") {
        this.log.warn(`[Http] GET ${url} failed with HTTP ${outcome.status}: ${outcome.error}`);
        return null;
      }

      if (attempt === this.maxAttempts) {
        this.log.warn(
          `[Http] GET ${url} attempt ${attempt}/${this.maxAttempts} failed (${outcome.error}); giving up`,
        );
        break;
      }

      const delayMs = restBackoffDelayMs(attempt, this.baseDelayMs);
      this.log.warn(
        `[Http] GET ${url} attempt ${attempt}/${this.maxAttempts} failed (${outcome.error}); retrying in ${delayMs}ms`,
      );
      await this.sleep(delayMs);
    }

    return null;
  }

  private async attempt(url: string, token: string): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        const error = await readErrorMessage(res);
        return RETRYABLE_STATUSES.has(res.status)
          ? { kind: "retryable", status: res.status, error }
          : { kind: "terminal", status: res.status, error };
      }

      const headers: Record<string, string> = {};
      res.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      // 204 No Content or empty body
      const text = res.status === 204 ? "" : await res.text();
      const body = parseBody(text);
      if (body === undefined) {
        return { kind: "terminal", status: res.status, error: "response body is not valid JSON" };
      }
      return { kind: "ok", response: { status: res.status, body, headers } };
    } catch (error) {
      return { kind: "retryable", error: formatErrorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

async function readErrorMessage(res: Response): Promise<string> {
  try {
    const text = await res.text();
    const match = /"message"\s*:\s*"([^"]*)"/.exec(text);
    return match?.[1] ?? `HTTP ${res.status}`;
  } catch (error) {
    return `HTTP ${res.status} (${formatErrorMessage(error)})`;
  }
}
