/**
 * Mock ad server adapter.
 * Keeps media buys in memory and, when the product's implementation config
 * enables it, drives a time-accelerated delivery simulation that reports
 * through the principal's webhooks.
 */

import { randomUUID } from "node:crypto";
import { parseSimulationConfig } from "../../core/config/configService.js";
import { DEFAULT_CURRENCY, MEDIA_BUY_STATUS } from "../../core/constants.js";
import type { MediaBuyRef } from "../../core/deliverySimulation.js";
import { DomainError } from "../../core/errors.js";
import { createChildLogger } from "../../core/logger.js";
import {
  getDeliverySimulator,
  type DeliverySimulator,
  type MediaBuyReader,
  type SimulationTask,
} from "../../services/DeliverySimulatorService.js";
import type {
  AdapterGetMediaBuyDeliveryResponse,
  CheckMediaBuyStatusResponse,
  CreateMediaBuyRequest,
  CreateMediaBuyResponse,
  MediaPackage,
  Principal,
  ReportingPeriod,
  UpdateMediaBuyResponse,
} from "../../types/adcp.js";
import type { AdServerAdapter } from "../base.js";

const log = createChildLogger("mock-adapter");

export interface MockAdServerConfig {
  dry_run?: boolean;
  /** The product's implementation_config (delivery_simulation and traffic rates). */
  implementation_config?: unknown;
}

export interface MockAdServerDeps {
  tenantId?: string;
  /** Defaults to the process-wide simulator. */
  simulator?: DeliverySimulator;
}

type MockMediaBuyStatus =
  | typeof MEDIA_BUY_STATUS.ACTIVE
  | typeof MEDIA_BUY_STATUS.PAUSED
  | typeof MEDIA_BUY_STATUS.CANCELLED;

interface MockPackage {
  package_id: string;
  name: string;
  cpm: number;
  impressions: number;
  budget?: number;
}

export interface MockMediaBuy {
  mediaBuyId: string;
  buyerRef: string;
  tenantId: string;
  principalId: string;
  startTime: Date;
  endTime: Date;
  totalBudget: number;
  currency: string;
  status: MockMediaBuyStatus;
  packages: MockPackage[];
  simulation?: SimulationTask;
}

function requestBudget(request: CreateMediaBuyRequest): number {
  if (typeof request.budget === "number") return request.budget;
  return request.budget?.total ?? 0;
}

function requestCurrency(request: CreateMediaBuyRequest): string {
  if (request.currency) return request.currency;
  if (typeof request.budget === "object") return request.budget.currency;
  return DEFAULT_CURRENCY;
}

export class MockAdServer implements AdServerAdapter, MediaBuyReader {
  readonly config: MockAdServerConfig;
  readonly principal: Principal;
  readonly dryRun: boolean;
  readonly tenantId: string;

  /** In-memory media buys (media_buy_id -> state). */
  readonly _mediaBuys: Map<string, MockMediaBuy> = new Map();

  private readonly injectedSimulator: DeliverySimulator | undefined;

  constructor(
    config: MockAdServerConfig,
    principal: Principal,
    dryRun: boolean = false,
    deps: MockAdServerDeps = {}
  ) {
    this.config = config ?? {};
    this.principal = principal;
    this.dryRun = dryRun || this.config.dry_run === true;
    this.tenantId = deps.tenantId ?? "default";
    this.injectedSimulator = deps.simulator;
  }

  private get simulator(): DeliverySimulator {
    return this.injectedSimulator ?? getDeliverySimulator();
  }

  create_media_buy(
    request: CreateMediaBuyRequest,
    packages: MediaPackage[],
    startTime: Date,
    endTime: Date
  ): CreateMediaBuyResponse {
    const mediaBuyId = request.po_number ? `buy_${request.po_number}` : `buy_${randomUUID().slice(0, 8)}`;
    const buyerRef = request.buyer_ref ?? "unknown";

    if (this.dryRun) {
      log.info({ mediaBuyId }, "Dry run: media buy not created");
      return { status: "success", media_buy_id: mediaBuyId, buyer_ref: buyerRef };
    }

    if (this._mediaBuys.has(mediaBuyId)) {
      return { status: "error", error: "DUPLICATE_MEDIA_BUY", detail: `Media buy ${mediaBuyId} already exists` };
    }

    const packageBudget = packages.reduce((sum, p) => sum + (p.budget ?? 0), 0);
    const state: MockMediaBuy = {
      mediaBuyId,
      buyerRef,
      tenantId: this.tenantId,
      principalId: this.principal.principal_id,
      startTime,
      endTime,
      totalBudget: packageBudget > 0 ? packageBudget : requestBudget(request),
      currency: requestCurrency(request),
      status: MEDIA_BUY_STATUS.ACTIVE,
      packages: packages.map((p) => ({
        package_id: p.package_id,
        name: p.name,
        cpm: p.cpm,
        impressions: p.impressions,
        ...(p.budget !== undefined && { budget: p.budget }),
      })),
    };

    // Start before storing: a rejected simulation leaves no media buy behind.
    try {
      const config = parseSimulationConfig(this.config.implementation_config);
      if (config.enabled) {
        state.simulation = this.simulator.startSimulation(this.toRef(state), config, { reader: this });
      } else {
        log.debug({ mediaBuyId }, "Delivery simulation disabled in config");
      }
    } catch (err) {
      if (!(err instanceof DomainError)) throw err;
      log.warn({ mediaBuyId, code: err.code, error: err.message }, "Failed to start delivery simulation");
      return { status: "error", error: err.code, detail: err.message };
    }

    this._mediaBuys.set(mediaBuyId, state);
    return { status: "success", media_buy_id: mediaBuyId, buyer_ref: buyerRef };
  }

  /** Read-through source for the running simulation; picks up budget edits. */
  async getMediaBuy(mediaBuyId: string): Promise<MediaBuyRef | undefined> {
    const state = this._mediaBuys.get(mediaBuyId);
    return state ? this.toRef(state) : undefined;
  }

  check_media_buy_status(mediaBuyId: string, _today: Date): CheckMediaBuyStatusResponse {
    const state = this._mediaBuys.get(mediaBuyId);
    if (!state) return { status: "not_found" };
    if (state.status !== MEDIA_BUY_STATUS.ACTIVE) return { status: state.status };
    if (state.simulation?.status === "completed") return { status: MEDIA_BUY_STATUS.COMPLETED };
    return { status: MEDIA_BUY_STATUS.ACTIVE };
  }

  get_media_buy_delivery(
    mediaBuyId: string,
    dateRange: ReportingPeriod,
    _today: Date
  ): AdapterGetMediaBuyDeliveryResponse {
    const state = this._mediaBuys.get(mediaBuyId);
    if (!state) return { media_buy_id: mediaBuyId };

    const snapshot = state.simulation?.state.lastSnapshot;
    if (!snapshot) {
      return {
        media_buy_id: mediaBuyId,
        delivery: { impressions: 0, spend: 0, clicks: 0, ctr: 0 },
        reporting_period: dateRange,
      };
    }
    return {
      media_buy_id: mediaBuyId,
      delivery: {
        impressions: snapshot.impressions,
        spend: snapshot.spend,
        clicks: snapshot.clicks,
        ctr: snapshot.ctr,
      },
      reporting_period: {
        start: state.startTime.toISOString(),
        end: snapshot.simulatedTime.toISOString(),
      },
    };
  }

  update_media_buy(
    mediaBuyId: string,
    _buyerRef: string,
    action: string,
    packageId: string | null,
    budget: number | null,
    _today: Date
  ): UpdateMediaBuyResponse {
    const state = this._mediaBuys.get(mediaBuyId);
    if (!state) return { status: "error", error: `Media buy not found: ${mediaBuyId}` };

    switch (action) {
      case "pause_media_buy":
      case "cancel_media_buy": {
        state.status = action === "pause_media_buy" ? MEDIA_BUY_STATUS.PAUSED : MEDIA_BUY_STATUS.CANCELLED;
        const stopped = this.simulator.stopSimulation(mediaBuyId);
        log.info({ mediaBuyId, action, simulationStopped: stopped }, "Media buy updated");
        return { status: "success" };
      }
      case "update_budget": {
        if (budget === null || !(budget > 0)) return { status: "error", error: "Budget must be greater than 0" };
        state.totalBudget = budget;
        log.info({ mediaBuyId, budget }, "Media buy budget updated");
        return { status: "success" };
      }
      case "update_package_budget": {
        const pkg = state.packages.find((p) => p.package_id === packageId);
        if (!pkg) return { status: "error", error: `Package not found: ${packageId ?? ""}` };
        if (budget === null || !(budget > 0)) return { status: "error", error: "Budget must be greater than 0" };
        pkg.budget = budget;
        state.totalBudget = state.packages.reduce((sum, p) => sum + (p.budget ?? 0), 0);
        log.info({ mediaBuyId, packageId, budget }, "Package budget updated");
        return { status: "success" };
      }
      default:
        return { status: "error", error: `Unsupported action: ${action}` };
    }
  }

  private toRef(state: MockMediaBuy): MediaBuyRef {
    return {
      mediaBuyId: state.mediaBuyId,
      tenantId: state.tenantId,
      principalId: state.principalId,
      startTime: state.startTime,
      endTime: state.endTime,
      totalBudget: state.totalBudget,
      currency: state.currency,
    };
  }
}
