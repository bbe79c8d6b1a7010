import { createServer, type Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../../../src/app.js";
import type { AdminRouterDeps } from "../../../src/admin/api.js";
import type { WebhookDeliveryLogRow } from "../../../src/db/repositories/webhook.js";
import { DeliverySimulator } from "../../../src/services/DeliverySimulatorService.js";
import type { SimulationCandidate } from "../../../src/services/SimulationRecoveryService.js";

const TOKEN = "test-admin-token";
const AUTH = { "x-adcp-auth": TOKEN };

function candidate(mediaBuyId: string, overrides: Partial<SimulationCandidate> = {}): SimulationCandidate {
  return {
    mediaBuy: {
      mediaBuyId,
      tenantId: "tenant_1",
      principalId: "principal_1",
      startTime: new Date("2025-10-08T00:00:00Z"),
      endTime: new Date("2025-10-15T00:00:00Z"),
      totalBudget: 5000,
      currency: "USD",
    },
    adServer: "mock",
    // Long interval: only the immediate first tick runs during a test.
    implementationConfig: { delivery_simulation: { enabled: true, update_interval_seconds: 600 } },
    hasActiveWebhook: true,
    ...overrides,
  };
}

const deliveryRow: WebhookDeliveryLogRow = {
  id: "log_1",
  tenantId: "tenant_1",
  principalId: "principal_1",
  mediaBuyId: "buy_1",
  webhookUrl: "https://buyer.example.com/hook",
  taskType: "media_buy_delivery",
  sequenceNumber: 1,
  notificationType: "scheduled",
  attemptCount: 1,
  status: "failed",
  httpStatusCode: 500,
  errorMessage: "HTTP 500 Internal Server Error",
  payloadSizeBytes: 512,
  responseTimeMs: 20,
  createdAt: new Date("2025-10-08T00:00:00Z"),
  completedAt: new Date("2025-10-08T00:00:00Z"),
};

describe("admin simulations API", () => {
  let server: Server;
  let baseUrl: string;
  let simulator: DeliverySimulator;
  let candidates: Map<string, SimulationCandidate>;

  async function start(overrides: Partial<AdminRouterDeps> = {}) {
    const deps: AdminRouterDeps = {
      simulator,
      adminApiToken: TOKEN,
      loadCandidate: async (id) => candidates.get(id),
      listCandidates: async () => [...candidates.values()],
      listDeliveries: async (id) => (id === "buy_1" ? [deliveryRow] : []),
      ...overrides,
    };
    server = createServer(createApp(deps));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function call(path: string, init: RequestInit = {}) {
    return fetch(`${baseUrl}${path}`, { ...init, headers: { ...AUTH, ...init.headers } });
  }

  beforeEach(async () => {
    simulator = new DeliverySimulator({
      notifier: { notify: async () => ({ attempted: 0, delivered: 0, failures: [] }) },
    });
    candidates = new Map([
      ["buy_1", candidate("buy_1")],
      ["buy_gam", candidate("buy_gam", { adServer: "google_ad_manager" })],
      ["buy_off", candidate("buy_off", { implementationConfig: {} })],
    ]);
    await start();
  });

  afterEach(async () => {
    simulator.stopAll();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it("serves health without auth", async () => {
    const res = await fetch(`${baseUrl}/admin/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", service: "admin-api", active_simulations: 0 });

    const root = await fetch(`${baseUrl}/health`);
    expect(root.status).toBe(200);
  });

  it("exposes prometheus metrics", async () => {
    const res = await fetch(`${baseUrl}/metrics`);
    expect(res.status).toBe(200);
    expect(await res.text()).toContain("simulations_active");
  });

  it("rejects requests without a valid token", async () => {
    const missing = await fetch(`${baseUrl}/admin/api/simulations`);
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: "AUTH_ERROR", message: "Missing admin token" });

    const wrong = await fetch(`${baseUrl}/admin/api/simulations`, { headers: { authorization: "Bearer nope" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "AUTH_ERROR", message: "Invalid admin token" });
  });

  it("throttles repeated rejected tokens", async () => {
    for (let i = 0; i < 8; i++) {
      const res = await fetch(`${baseUrl}/admin/api/simulations`, { headers: { "x-adcp-auth": "wrong" } });
      expect(res.status).toBe(401);
    }

    const limited = await fetch(`${baseUrl}/admin/api/simulations`, { headers: { "x-adcp-auth": "wrong" } });
    expect(limited.status).toBe(429);
  });

  it("accepts a bearer token", async () => {
    const res = await fetch(`${baseUrl}/admin/api/simulations`, { headers: { authorization: `Bearer ${TOKEN}` } });
    expect(res.status).toBe(200);
  });

  it("rejects everything when no admin token is configured", async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await start({ adminApiToken: undefined });

    const res = await call("/admin/api/simulations");
    expect(res.status).toBe(401);
  });

  it("starts, shows, lists and stops a simulation", async () => {
    const started = await call("/admin/api/simulations/buy_1/start", { method: "POST" });
    expect(started.status).toBe(201);
    expect(await started.json()).toMatchObject({
      media_buy_id: "buy_1",
      tenant_id: "tenant_1",
      status: "active",
      sequence_number: 0,
      finalized: false,
      time_acceleration: 3600,
      update_interval_seconds: 600,
      last_snapshot: null,
    });

    const shown = await call("/admin/api/simulations/buy_1");
    expect(shown.status).toBe(200);

    const listed = await call("/admin/api/simulations");
    const body: unknown = await listed.json();
    expect(body).toMatchObject({ simulations: [{ media_buy_id: "buy_1" }] });

    const stopped = await call("/admin/api/simulations/buy_1/stop", { method: "POST" });
    expect(await stopped.json()).toEqual({ media_buy_id: "buy_1", stopped: true });

    const again = await call("/admin/api/simulations/buy_1/stop", { method: "POST" });
    expect(await again.json()).toEqual({ media_buy_id: "buy_1", stopped: false });

    const gone = await call("/admin/api/simulations/buy_1");
    expect(gone.status).toBe(404);
    expect(await gone.json()).toEqual({ error: "NOT_FOUND", message: "Simulation not found: buy_1" });
  });

  it("maps start failures to HTTP errors", async () => {
    await call("/admin/api/simulations/buy_1/start", { method: "POST" });
    const duplicate = await call("/admin/api/simulations/buy_1/start", { method: "POST" });
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({
      error: "DUPLICATE_TASK",
      message: "Delivery simulation already running for buy_1",
    });

    const missing = await call("/admin/api/simulations/missing/start", { method: "POST" });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "NOT_FOUND", message: "MediaBuy not found: missing" });

    const gam = await call("/admin/api/simulations/buy_gam/start", { method: "POST" });
    expect(gam.status).toBe(422);
    expect(await gam.json()).toEqual({
      error: "VALIDATION_ERROR",
      message: "Delivery simulation is only available for mock adapter tenants",
    });

    const disabled = await call("/admin/api/simulations/buy_off/start", { method: "POST" });
    expect(disabled.status).toBe(422);
    expect(await disabled.json()).toEqual({
      error: "CONFIGURATION_ERROR",
      message: "Delivery simulation is disabled for buy_off",
      issues: [],
    });
  });

  it("restarts qualifying simulations", async () => {
    const res = await call("/admin/api/simulations/restart", { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      restarted: ["buy_1"],
      skipped: [
        { mediaBuyId: "buy_gam", reason: "not_mock_adapter" },
        { mediaBuyId: "buy_off", reason: "simulation_disabled" },
      ],
      failed: [],
    });
    expect(simulator.getSimulation("buy_1")?.status).toBe("active");
  });

  it("lists recorded webhook deliveries", async () => {
    const res = await call("/admin/api/simulations/buy_1/deliveries");

    expect(await res.json()).toEqual({
      deliveries: [
        {
          sequence_number: 1,
          notification_type: "scheduled",
          webhook_url: "https://buyer.example.com/hook",
          status: "failed",
          http_status_code: 500,
          error_message: "HTTP 500 Internal Server Error",
          response_time_ms: 20,
          created_at: "2025-10-08T00:00:00.000Z",
        },
      ],
    });
  });
});
