import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MockAdServer, type MockAdServerConfig } from "../../../src/adapters/mock/index.js";
import { DeliverySimulator } from "../../../src/services/DeliverySimulatorService.js";
import type { DeliveryNotifier } from "../../../src/services/ProtocolWebhookService.js";
import type { CreateMediaBuyRequest, MediaPackage, Principal, WebhookEnvelope } from "../../../src/types/adcp.js";

const START = new Date("2025-10-08T00:00:00Z");
const END = new Date("2025-10-15T00:00:00Z");
const TODAY = START;

const principal: Principal = {
  principal_id: "test_principal",
  name: "Test Principal",
};

function samplePackages(): MediaPackage[] {
  return [
    {
      package_id: "pkg_1",
      name: "Guaranteed Banner",
      delivery_type: "guaranteed",
      cpm: 15,
      impressions: 333333,
      budget: 5000,
    },
  ];
}

const SIMULATED: MockAdServerConfig = {
  implementation_config: { delivery_simulation: { enabled: true, time_acceleration: 86_400 } },
};

describe("MockAdServer", () => {
  let envelopes: WebhookEnvelope[];
  let simulator: DeliverySimulator;

  function adapter(config: MockAdServerConfig = {}, dryRun = false): MockAdServer {
    return new MockAdServer(config, principal, dryRun, { tenantId: "tenant_1", simulator });
  }

  function create(server: MockAdServer, request: Partial<CreateMediaBuyRequest> = {}) {
    return server.create_media_buy({ product_ids: ["prod_1"], po_number: "PO-12345", ...request }, samplePackages(), START, END);
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    envelopes = [];
    const notifier: DeliveryNotifier = {
      notify: async (envelope) => {
        envelopes.push(envelope);
        return { attempted: 1, delivered: 1, failures: [] };
      },
    };
    simulator = new DeliverySimulator({ notifier });
  });

  afterEach(() => {
    simulator.stopAll();
    vi.useRealTimers();
  });

  it("create_media_buy returns success with media_buy_id and buyer_ref", () => {
    const response = create(adapter(), { buyer_ref: "ref_12345" });

    expect(response).toEqual({ status: "success", media_buy_id: "buy_PO-12345", buyer_ref: "ref_12345" });
  });

  it("create_media_buy stores the buy with its package budget", () => {
    const server = adapter();
    create(server);

    const stored = server._mediaBuys.get("buy_PO-12345");
    expect(stored).toMatchObject({
      tenantId: "tenant_1",
      principalId: "test_principal",
      totalBudget: 5000,
      currency: "USD",
      status: "active",
    });
    expect(stored?.packages.map((p) => p.package_id)).toEqual(["pkg_1"]);
    expect(stored?.simulation).toBeUndefined();
  });

  it("create_media_buy without po_number generates an id", () => {
    const response = adapter().create_media_buy({ product_ids: ["prod_1"] }, samplePackages(), START, END);

    expect(response.status).toBe("success");
    if (response.status === "success") {
      expect(response.media_buy_id).toMatch(/^buy_[a-f0-9-]+$/);
    }
  });

  it("dry run stores nothing and starts no simulation", () => {
    const server = adapter(SIMULATED, true);
    create(server);

    expect(server._mediaBuys.size).toBe(0);
    expect(simulator.registry.size).toBe(0);
  });

  it("rejects a second buy with the same id", () => {
    const server = adapter();
    create(server);

    expect(create(server)).toEqual({
      status: "error",
      error: "DUPLICATE_MEDIA_BUY",
      detail: "Media buy buy_PO-12345 already exists",
    });
  });

  it("starts a delivery simulation when enabled", async () => {
    const server = adapter(SIMULATED);
    create(server);

    expect(simulator.getSimulation("buy_PO-12345")?.status).toBe("active");
    await vi.advanceTimersByTimeAsync(0);
    expect(envelopes).toHaveLength(1);
    expect(envelopes[0]).toMatchObject({
      task_id: "buy_PO-12345",
      tenant_id: "tenant_1",
      principal_id: "test_principal",
    });
  });

  it("returns an error and stores nothing when the simulation config is invalid", () => {
    const server = adapter({ implementation_config: { delivery_simulation: { enabled: true, time_acceleration: -1 } } });

    const response = create(server);

    expect(response.status).toBe("error");
    if (response.status === "error") expect(response.error).toBe("CONFIGURATION_ERROR");
    expect(server._mediaBuys.size).toBe(0);
  });

  it("returns an error when another simulation already owns the id", () => {
    create(adapter(SIMULATED));
    const second = adapter(SIMULATED);

    const response = create(second);

    expect(response.status).toBe("error");
    if (response.status === "error") expect(response.error).toBe("DUPLICATE_TASK");
    expect(second._mediaBuys.size).toBe(0);
  });

  it("pausing stops the simulation", async () => {
    const server = adapter(SIMULATED);
    create(server);
    await vi.advanceTimersByTimeAsync(1_000);

    expect(server.update_media_buy("buy_PO-12345", "ref", "pause_media_buy", null, null, TODAY)).toEqual({
      status: "success",
    });
    expect(server.check_media_buy_status("buy_PO-12345", TODAY)).toEqual({ status: "paused" });
    expect(simulator.getSimulation("buy_PO-12345")).toBeUndefined();

    await vi.advanceTimersByTimeAsync(10_000);
    expect(envelopes).toHaveLength(2);
  });

  it("cancelling stops the simulation", () => {
    const server = adapter(SIMULATED);
    create(server);

    server.update_media_buy("buy_PO-12345", "ref", "cancel_media_buy", null, null, TODAY);

    expect(server.check_media_buy_status("buy_PO-12345", TODAY)).toEqual({ status: "cancelled" });
    expect(simulator.registry.size).toBe(0);
  });

  it("a budget update reaches the next tick", async () => {
    const server = adapter(SIMULATED);
    create(server);
    await vi.advanceTimersByTimeAsync(1_000);

    server.update_media_buy("buy_PO-12345", "ref", "update_budget", null, 7000, TODAY);
    await vi.advanceTimersByTimeAsync(6_000);

    const final = envelopes[7];
    expect(final?.data.notification_type).toBe("final");
    expect(final?.data.media_buy_deliveries[0]?.totals.spend).toBe(7000);
  });

  it("a package budget update changes the total", () => {
    const server = adapter();
    create(server);

    server.update_media_buy("buy_PO-12345", "ref", "update_package_budget", "pkg_1", 6500, TODAY);

    expect(server._mediaBuys.get("buy_PO-12345")?.totalBudget).toBe(6500);
  });

  it("rejects invalid updates", () => {
    const server = adapter();
    create(server);

    expect(server.update_media_buy("missing", "ref", "pause_media_buy", null, null, TODAY)).toEqual({
      status: "error",
      error: "Media buy not found: missing",
    });
    expect(server.update_media_buy("buy_PO-12345", "ref", "update_budget", null, 0, TODAY)).toEqual({
      status: "error",
      error: "Budget must be greater than 0",
    });
    expect(server.update_media_buy("buy_PO-12345", "ref", "resume_media_buy", null, null, TODAY)).toEqual({
      status: "error",
      error: "Unsupported action: resume_media_buy",
    });
  });

  it("reports completion and final totals once the simulation ends", async () => {
    const server = adapter(SIMULATED);
    create(server);
    await vi.advanceTimersByTimeAsync(7_000);

    expect(server.check_media_buy_status("buy_PO-12345", TODAY)).toEqual({ status: "completed" });
    expect(
      server.get_media_buy_delivery("buy_PO-12345", { start: "2025-10-08", end: "2025-10-15" }, TODAY)
    ).toEqual({
      media_buy_id: "buy_PO-12345",
      delivery: { impressions: 500_000, spend: 5000, clicks: 5000, ctr: 0.01 },
      reporting_period: { start: "2025-10-08T00:00:00.000Z", end: "2025-10-15T00:00:00.000Z" },
    });
  });

  it("reports zero delivery without a simulation", () => {
    const server = adapter();
    create(server);
    const range = { start: "2025-10-08", end: "2025-10-15" };

    expect(server.get_media_buy_delivery("buy_PO-12345", range, TODAY)).toEqual({
      media_buy_id: "buy_PO-12345",
      delivery: { impressions: 0, spend: 0, clicks: 0, ctr: 0 },
      reporting_period: range,
    });
    expect(server.check_media_buy_status("buy_PO-12345", TODAY)).toEqual({ status: "active" });
    expect(server.check_media_buy_status("missing", TODAY)).toEqual({ status: "not_found" });
  });

  it("serves as the media-buy reader for its simulations", async () => {
    const server = adapter();
    create(server);

    await expect(server.getMediaBuy("buy_PO-12345")).resolves.toMatchObject({ totalBudget: 5000, currency: "USD" });
    await expect(server.getMediaBuy("missing")).resolves.toBeUndefined();
  });
});
