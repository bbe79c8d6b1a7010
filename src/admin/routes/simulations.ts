import { type Request, type Response, Router } from "express";
import { ADAPTER_TYPES } from "../../core/constants.js";
import { parseSimulationConfig } from "../../core/config/configService.js";
import { NotFoundError, ValidationError } from "../../core/errors.js";
import type { WebhookDeliveryLogRow } from "../../db/repositories/webhook.js";
import type { DeliverySimulator, SimulationTaskState } from "../../services/DeliverySimulatorService.js";
import { restartActiveSimulations, type SimulationCandidate } from "../../services/SimulationRecoveryService.js";

export interface SimulationsRouterDeps {
  simulator: DeliverySimulator;
  loadCandidate(mediaBuyId: string): Promise<SimulationCandidate | undefined>;
  listCandidates(): Promise<SimulationCandidate[]>;
  listDeliveries(mediaBuyId: string): Promise<WebhookDeliveryLogRow[]>;
}

function paramStr(v: string | string[] | undefined): string | undefined {
  return typeof v === "string" ? v : v?.[0];
}

function requireMediaBuyId(req: Request): string {
  const mediaBuyId = paramStr(req.params.mediaBuyId);
  if (!mediaBuyId) throw new ValidationError("mediaBuyId required");
  return mediaBuyId;
}

function serializeState(state: SimulationTaskState) {
  const snapshot = state.lastSnapshot;
  return {
    media_buy_id: state.mediaBuyId,
    tenant_id: state.tenantId,
    principal_id: state.principalId,
    status: state.status,
    started_at: state.startedAt,
    sequence_number: state.sequenceNumber,
    finalized: state.finalized,
    time_acceleration: state.timeAcceleration,
    update_interval_seconds: state.updateIntervalSeconds,
    last_snapshot: snapshot
      ? {
          simulated_time: snapshot.simulatedTime.toISOString(),
          impressions: snapshot.impressions,
          spend: snapshot.spend,
          clicks: snapshot.clicks,
          ctr: snapshot.ctr,
          progress: snapshot.progress,
        }
      : null,
  };
}

export function createSimulationsRouter(deps: SimulationsRouterDeps): Router {
  const router = Router();
  const { simulator } = deps;

  router.get("/simulations", (_req: Request, res: Response) => {
    res.json({ simulations: simulator.listSimulations().map(serializeState) });
  });

  router.post("/simulations/restart", async (_req: Request, res: Response) => {
    const candidates = await deps.listCandidates();
    res.json(restartActiveSimulations(simulator, candidates));
  });

  router.get("/simulations/:mediaBuyId", (req: Request, res: Response) => {
    const mediaBuyId = requireMediaBuyId(req);
    const task = simulator.getSimulation(mediaBuyId);
    if (!task) throw new NotFoundError("Simulation", mediaBuyId);
    res.json(serializeState(task.state));
  });

  router.get("/simulations/:mediaBuyId/deliveries", async (req: Request, res: Response) => {
    const mediaBuyId = requireMediaBuyId(req);
    const rows = await deps.listDeliveries(mediaBuyId);
    res.json({
      deliveries: rows.map((r) => ({
        sequence_number: r.sequenceNumber,
        notification_type: r.notificationType,
        webhook_url: r.webhookUrl,
        status: r.status,
        http_status_code: r.httpStatusCode,
        error_message: r.errorMessage,
        response_time_ms: r.responseTimeMs,
        created_at: r.createdAt.toISOString(),
      })),
    });
  });

  router.post("/simulations/:mediaBuyId/start", async (req: Request, res: Response) => {
    const mediaBuyId = requireMediaBuyId(req);
    const candidate = await deps.loadCandidate(mediaBuyId);
    if (!candidate) throw new NotFoundError("MediaBuy", mediaBuyId);
    if (candidate.adServer !== ADAPTER_TYPES.MOCK) {
      throw new ValidationError("Delivery simulation is only available for mock adapter tenants");
    }
    const config = parseSimulationConfig(candidate.implementationConfig);
    const task = simulator.startSimulation(candidate.mediaBuy, config);
    res.status(201).json(serializeState(task.state));
  });

  router.post("/simulations/:mediaBuyId/stop", (req: Request, res: Response) => {
    const mediaBuyId = requireMediaBuyId(req);
    res.json({ media_buy_id: mediaBuyId, stopped: simulator.stopSimulation(mediaBuyId) });
  });

  return router;
}
