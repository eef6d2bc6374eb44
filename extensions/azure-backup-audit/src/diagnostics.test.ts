/**
 * Diagnostics Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  enableAuditDiagnostics,
  disableAuditDiagnostics,
  isAuditDiagnosticsEnabled,
  onAuditDiagnosticEvent,
  emitAuditDiagnosticEvent,
  resetAuditDiagnosticsForTest,
} from "./diagnostics.js";

beforeEach(() => {
  resetAuditDiagnosticsForTest();
});

describe("enableAuditDiagnostics / disableAuditDiagnostics", () => {
  it("toggles diagnostics state", () => {
    expect(isAuditDiagnosticsEnabled()).toBe(false);
    enableAuditDiagnostics();
    expect(isAuditDiagnosticsEnabled()).toBe(true);
    disableAuditDiagnostics();
    expect(isAuditDiagnosticsEnabled()).toBe(false);
  });
});

describe("onAuditDiagnosticEvent", () => {
  it("receives emitted events when enabled", () => {
    enableAuditDiagnostics();
    const listener = vi.fn();
    onAuditDiagnosticEvent(listener);

    emitAuditDiagnosticEvent({ type: "backup.http.call", component: "rest", operation: "get" });
    emitAuditDiagnosticEvent({ type: "backup.shape.unknown", component: "schedule", operation: "classifyPolicy" });

    expect(listener).toHaveBeenCalledTimes(2);
    const event = listener.mock.calls[1][0];
    expect(event.type).toBe("backup.shape.unknown");
    expect(event.seq).toBe(2);
    expect(event.timestamp).toBeGreaterThan(0);
  });

  it("does not emit when disabled", () => {
    const listener = vi.fn();
    onAuditDiagnosticEvent(listener);

    emitAuditDiagnosticEvent({ type: "backup.http.call", component: "rest", operation: "get" });

    expect(listener).not.toHaveBeenCalled();
  });

  it("unsubscribes correctly", () => {
    enableAuditDiagnostics();
    const listener = vi.fn();
    const unsub = onAuditDiagnosticEvent(listener);

    unsub();
    emitAuditDiagnosticEvent({ type: "backup.http.call", component: "rest", operation: "get" });

    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps delivering after a listener throws", () => {
    enableAuditDiagnostics();
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const after = vi.fn();
    onAuditDiagnosticEvent(() => {
      throw new Error("listener broke");
    });
    onAuditDiagnosticEvent(after);

    emitAuditDiagnosticEvent({ type: "backup.http.call", component: "rest", operation: "get" });

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[Diagnostics] listener failed: listener broke");
    errorSpy.mockRestore();
  });
});
