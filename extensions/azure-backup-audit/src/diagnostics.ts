/**
 * Azure Backup Audit: Diagnostics
 *
 * Event emitter for REST call tracing, retry attempts and degraded parsing.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditDiagnosticEventType =
  | "backup.http.call"
  | "backup.http.retry"
  | "backup.http.failure"
  | "backup.strategy.fallback"
  | "backup.shape.unknown";

export type AuditDiagnosticEvent = {
  type: AuditDiagnosticEventType;
  timestamp: number;
  seq: number;
  component: string;
  operation: string;
  target?: string;
  attempt?: number;
  statusCode?: number;
  durationMs?: number;
  error?: string;
  metadata?: Record<string, unknown>;
};

export type AuditDiagnosticListener = (event: AuditDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<AuditDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableAuditDiagnostics(): void {
  diagnosticsEnabled = true;
}

export function disableAuditDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isAuditDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onAuditDiagnosticEvent(listener: AuditDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitAuditDiagnosticEvent(event: Omit<AuditDiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: AuditDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (error) {
      console.error(`[Diagnostics] listener failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Reset diagnostics state for tests.
 */
export function resetAuditDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
