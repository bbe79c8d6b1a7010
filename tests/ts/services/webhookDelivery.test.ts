import { describe, expect, it, vi } from "vitest";
import type { MediaBuyRef } from "../../../src/core/deliverySimulation.js";
import { signWebhookBody } from "../../../src/core/security/hmac.js";
import { ManualClock } from "../../../src/core/simulationClock.js";
import { buildDeliveryEnvelope } from "../../../src/services/ProtocolWebhookService.js";
import {
  buildWebhookHeaders,
  HttpWebhookDispatcher,
  type HttpWebhookDispatcherOptions,
} from "../../../src/services/WebhookDeliveryService.js";

const LONG_SECRET = "test-secret-test-secret-test-secret";

const mediaBuy: MediaBuyRef = {
  mediaBuyId: "buy_1",
  tenantId: "tenant_1",
  principalId: "principal_1",
  startTime: new Date("2025-10-08T00:00:00Z"),
  endTime: new Date("2025-10-15T00:00:00Z"),
  totalBudget: 5000,
  currency: "USD",
};

const envelope = buildDeliveryEnvelope({
  mediaBuy,
  snapshot: {
    simulatedTime: new Date("2025-10-08T01:00:00Z"),
    impressions: 2976,
    spend: 29.76,
    clicks: 30,
    ctr: 0.01,
    progress: 1 / 168,
    complete: false,
  },
  sequenceNumber: 2,
  isFinal: false,
  now: new Date("2025-10-08T00:00:01Z"),
  nextExpectedAt: new Date("2025-10-08T00:00:02Z"),
});
const body = JSON.stringify(envelope);

function dispatcher(fetchFn: typeof fetch, overrides: Partial<HttpWebhookDispatcherOptions> = {}) {
  return new HttpWebhookDispatcher({
    timeoutMs: 50,
    userAgent: "test-agent",
    allowPrivateUrls: true,
    fetchFn,
    clock: new ManualClock(),
    ...overrides,
  });
}

function okFetch() {
  return vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
}

describe("buildWebhookHeaders", () => {
  it("signs with a long enough webhook secret", () => {
    const headers = buildWebhookHeaders(body, envelope.timestamp, { url: "https://h", webhookSecret: LONG_SECRET }, "ua");

    expect(headers).toEqual({
      "Content-Type": "application/json",
      "User-Agent": "ua",
      "X-ADCP-Timestamp": "2025-10-08T00:00:01.000Z",
      "X-ADCP-Signature": `sha256=${signWebhookBody(body, LONG_SECRET, envelope.timestamp)}`,
    });
  });

  it("skips signing with a short secret", () => {
    const headers = buildWebhookHeaders(body, envelope.timestamp, { url: "https://h", webhookSecret: "short" }, "ua");
    expect(headers).not.toHaveProperty("X-ADCP-Signature");
  });

  it("uses the token as the secret for HMAC-SHA256 endpoints", () => {
    const headers = buildWebhookHeaders(
      body,
      envelope.timestamp,
      { url: "https://h", authenticationType: "HMAC-SHA256", authenticationToken: LONG_SECRET },
      "ua"
    );
    expect(headers["X-ADCP-Signature"]).toBe(`sha256=${signWebhookBody(body, LONG_SECRET, envelope.timestamp)}`);
    expect(headers).not.toHaveProperty("Authorization");
  });

  it("adds a bearer token", () => {
    const headers = buildWebhookHeaders(
      body,
      envelope.timestamp,
      { url: "https://h", authenticationType: "bearer", authenticationToken: "test-token" },
      "ua"
    );
    expect(headers["Authorization"]).toBe("Bearer test-token");
    expect(headers).not.toHaveProperty("X-ADCP-Signature");
  });
});

describe("HttpWebhookDispatcher", () => {
  it("posts the envelope and reports success", async () => {
    const fetchFn = okFetch();

    const result = await dispatcher(fetchFn).dispatch(envelope, { url: "https://buyer.example.com/hook" });

    expect(result).toEqual({ success: true, statusCode: 200, responseTimeMs: 0 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const call = fetchFn.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://buyer.example.com/hook");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(body);
    expect(init?.headers).toMatchObject({ "User-Agent": "test-agent", "Content-Type": "application/json" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns non-2xx responses as failures", async () => {
    const fetchFn = vi.fn<typeof fetch>(
      async () => new Response(null, { status: 500, statusText: "Internal Server Error" })
    );

    const result = await dispatcher(fetchFn).dispatch(envelope, { url: "https://buyer.example.com/hook" });

    expect(result).toEqual({
      success: false,
      statusCode: 500,
      error: "HTTP 500 Internal Server Error",
      responseTimeMs: 0,
    });
  });

  it("reports timeouts", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      const err = new Error("The operation was aborted due to timeout");
      err.name = "TimeoutError";
      throw err;
    });

    const result = await dispatcher(fetchFn).dispatch(envelope, { url: "https://buyer.example.com/hook" });

    expect(result).toEqual({ success: false, error: "Request timed out after 50ms", responseTimeMs: 0 });
  });

  it("reports network errors without throwing", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new Error("connect ECONNREFUSED");
    });

    const result = await dispatcher(fetchFn).dispatch(envelope, { url: "https://buyer.example.com/hook" });

    expect(result).toEqual({ success: false, error: "connect ECONNREFUSED", responseTimeMs: 0 });
  });

  it("refuses URLs the SSRF guard rejects", async () => {
    const fetchFn = okFetch();
    const urlGuard = vi.fn(async () => false);

    const result = await dispatcher(fetchFn, { allowPrivateUrls: false, urlGuard }).dispatch(envelope, {
      url: "http://10.0.0.5/hook",
    });

    expect(result).toEqual({
      success: false,
      error: "Webhook URL blocked by SSRF policy: http://10.0.0.5/hook",
      responseTimeMs: 0,
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("skips the SSRF guard when private URLs are allowed", async () => {
    const urlGuard = vi.fn(async () => false);

    const result = await dispatcher(okFetch(), { urlGuard }).dispatch(envelope, { url: "http://10.0.0.5/hook" });

    expect(result.success).toBe(true);
    expect(urlGuard).not.toHaveBeenCalled();
  });

  it("opens the circuit after repeated failures and retries after the reset timeout", async () => {
    const clock = new ManualClock();
    const fetchFn = vi.fn<typeof fetch>(async () => new Response(null, { status: 503, statusText: "Unavailable" }));
    const d = dispatcher(fetchFn, { clock, circuitBreaker: { failureThreshold: 2, resetTimeoutMs: 1000 } });
    const endpoint = { url: "https://flaky.example.com/hook" };

    await d.dispatch(envelope, endpoint);
    await d.dispatch(envelope, endpoint);
    expect(d.circuitState(endpoint.url)).toBe("open");

    const blocked = await d.dispatch(envelope, endpoint);
    expect(blocked).toEqual({ success: false, error: "Circuit open for endpoint", responseTimeMs: 0 });
    expect(fetchFn).toHaveBeenCalledTimes(2);

    clock.advance(1000);
    fetchFn.mockImplementation(async () => new Response(null, { status: 204 }));
    const retried = await d.dispatch(envelope, endpoint);
    expect(retried.success).toBe(true);
    expect(d.circuitState(endpoint.url)).toBe("half_open");
    expect(d.circuitState("https://other.example.com/")).toBe("closed");
  });
});
