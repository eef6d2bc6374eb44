import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AzureRestClient } from "./client.js";
import { AuthenticationError } from "../errors.js";
import { silentLogger } from "../logger.js";
import {
  enableAuditDiagnostics,
  onAuditDiagnosticEvent,
  resetAuditDiagnosticsForTest,
  type AuditDiagnosticEvent,
} from "../diagnostics.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

afterEach(() => {
  vi.unstubAllGlobals();
  resetAuditDiagnosticsForTest();
});

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function makeClient(maxAttempts = 5) {
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const tokenProvider = { getAccessToken: vi.fn<() => Promise<string>>().mockResolvedValue("test-token") };
  const client = new AzureRestClient({
    tokenProvider,
    retry: { maxAttempts, baseDelayMs: 1000 },
    logger: silentLogger,
    sleep,
  });
  return { client, sleep, tokenProvider };
}

const TARGET = "/subscriptions/sub-1/providers/Microsoft.RecoveryServices/vaults?api-version=2024-04-01";

describe("AzureRestClient.get", () => {
  it("resolves relative targets against the management endpoint and sends the bearer token", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ value: [] }, 200, { "X-Ms-Continuation": "abc" }));
    const { client } = makeClient();

    const response = await client.get(TARGET);

    expect(response).toEqual({
      status: 200,
      body: { value: [] },
      headers: { "content-type": "application/json", "x-ms-continuation": "abc" },
    });
    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(`https://management.azure.com${TARGET}`);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-token" });
  });

  it("leaves absolute targets untouched", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));
    const { client } = makeClient();

    await client.get("https://management.azure.com/next?page=2");

    expect(mockFetch.mock.calls[0][0]).toBe("https://management.azure.com/next?page=2");
  });

  it("retries a transient status with doubling backoff, then succeeds", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ error: { message: "busy" } }, 503))
      .mockResolvedValueOnce(jsonResponse({ error: { message: "throttled" } }, 429))
      .mockResolvedValueOnce(jsonResponse({ id: "vault-1" }));
    const { client, sleep } = makeClient();

    const response = await client.get(TARGET);

    expect(response?.body).toEqual({ id: "vault-1" });
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("returns null after the attempt budget is spent", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({}, 500));
    const { client, sleep } = makeClient();

    await expect(client.get(TARGET)).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(5);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000, 8000]);
  });

  it("treats any other status as terminal", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "Vault not found" } }, 404));
    const { client, sleep } = makeClient();

    await expect(client.get(TARGET)).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledOnce();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries a thrown transport error", async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const { client, sleep } = makeClient();

    const response = await client.get(TARGET);

    expect(response?.body).toEqual({ ok: true });
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("treats an unparseable success body as terminal", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    const { client } = makeClient();

    await expect(client.get(TARGET)).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledOnce();
  });

  it("reads an empty body as an empty object", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const { client } = makeClient();

    const response = await client.get(TARGET);

    expect(response?.status).toBe(204);
    expect(response?.body).toEqual({});
  });

  it("propagates token failures without calling fetch", async () => {
    const { client, tokenProvider } = makeClient();
    tokenProvider.getAccessToken.mockRejectedValueOnce(new AuthenticationError("no token"));

    await expect(client.get(TARGET)).rejects.toBeInstanceOf(AuthenticationError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("emits one diagnostic per attempt", async () => {
    enableAuditDiagnostics();
    const events: AuditDiagnosticEvent[] = [];
    onAuditDiagnosticEvent((e) => events.push(e));
    mockFetch
      .mockResolvedValueOnce(jsonResponse({}, 502))
      .mockResolvedValueOnce(jsonResponse({}));
    const { client } = makeClient();

    await client.get(TARGET);

    expect(events.map((e) => [e.type, e.attempt, e.statusCode])).toEqual([
      ["backup.http.retry", 1, 502],
      ["backup.http.call", 2, 200],
    ]);
  });

  it("marks the last exhausted attempt as a failure", async () => {
    enableAuditDiagnostics();
    const events: AuditDiagnosticEvent[] = [];
    onAuditDiagnosticEvent((e) => events.push(e));
    mockFetch.mockImplementation(async () => jsonResponse({}, 503));
    const { client } = makeClient(2);

    await client.get(TARGET);

    expect(events.map((e) => e.type)).toEqual(["backup.http.retry", "backup.http.failure"]);
  });
});
