/**
 * Manual restart of delivery simulations after a process restart.
 *
 * Running simulations are not persisted, so after a redeploy nothing ticks.
 * An operator can call this (admin API) to start simulations again for media
 * buys that still qualify. It is never invoked at boot: containers that
 * restart often would otherwise replay webhook streams from the top.
 */

import { ADAPTER_TYPES } from "../core/constants.js";
import { parseSimulationConfig } from "../core/config/configService.js";
import type { MediaBuyRef } from "../core/deliverySimulation.js";
import { createChildLogger } from "../core/logger.js";
import type { DeliverySimulator } from "./DeliverySimulatorService.js";

const log = createChildLogger("simulation-recovery");

export interface SimulationCandidate {
  mediaBuy: MediaBuyRef;
  /** Ad server of the owning tenant. */
  adServer: string | null;
  /** implementation_config of the buy's first product; undefined when none. */
  implementationConfig: unknown;
  hasActiveWebhook: boolean;
}

export type SkipReason = "already_running" | "not_mock_adapter" | "simulation_disabled" | "no_active_webhook";

export interface RestartReport {
  restarted: string[];
  skipped: Array<{ mediaBuyId: string; reason: SkipReason }>;
  failed: Array<{ mediaBuyId: string; error: string }>;
}

function skipReason(simulator: DeliverySimulator, candidate: SimulationCandidate): SkipReason | null {
  if (simulator.getSimulation(candidate.mediaBuy.mediaBuyId)) return "already_running";
  if (candidate.adServer !== ADAPTER_TYPES.MOCK) return "not_mock_adapter";
  if (!candidate.hasActiveWebhook) return "no_active_webhook";
  return null;
}

export function restartActiveSimulations(
  simulator: DeliverySimulator,
  candidates: readonly SimulationCandidate[]
): RestartReport {
  const report: RestartReport = { restarted: [], skipped: [], failed: [] };

  for (const candidate of candidates) {
    const mediaBuyId = candidate.mediaBuy.mediaBuyId;
    const reason = skipReason(simulator, candidate);
    if (reason) {
      report.skipped.push({ mediaBuyId, reason });
      continue;
    }

    try {
      const config = parseSimulationConfig(candidate.implementationConfig);
      if (!config.enabled) {
        report.skipped.push({ mediaBuyId, reason: "simulation_disabled" });
        continue;
      }
      simulator.startSimulation(candidate.mediaBuy, config);
      report.restarted.push(mediaBuyId);
      log.info({ mediaBuyId }, "Restarted delivery simulation");
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      report.failed.push({ mediaBuyId, error });
      log.warn({ mediaBuyId, error }, "Failed to restart delivery simulation");
    }
  }

  log.info(
    { restarted: report.restarted.length, skipped: report.skipped.length, failed: report.failed.length },
    "Simulation restart finished"
  );
  return report;
}
