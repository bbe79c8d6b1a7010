/**
 * Process entry: HTTP server plus the process-wide delivery simulator.
 * Simulations are not restarted at boot; use POST /admin/api/simulations/restart.
 */

import { createServer } from "node:http";
import { createApp } from "./app.js";
import { getAppConfig } from "./core/config/configService.js";
import { logger } from "./core/logger.js";
import { closePool, getDb } from "./db/client.js";
import { listDeliveryLogByMediaBuy } from "./db/repositories/webhook.js";
import { getDeliverySimulator } from "./services/DeliverySimulatorService.js";
import { listSimulationCandidates, loadSimulationCandidate } from "./services/SimulationDataService.js";

const config = getAppConfig();
const db = getDb();
const simulator = getDeliverySimulator();

if (!config.adminApiToken) {
  logger.warn("ADMIN_API_TOKEN is not set; admin API requests will be rejected");
}

const app = createApp({
  simulator,
  adminApiToken: config.adminApiToken,
  loadCandidate: (mediaBuyId) => loadSimulationCandidate(db, mediaBuyId),
  listCandidates: () => listSimulationCandidates(db),
  listDeliveries: (mediaBuyId) => listDeliveryLogByMediaBuy(db, mediaBuyId),
});

const server = createServer(app);
server.listen(config.port, "0.0.0.0", () => {
  logger.info({ port: config.port, nodeEnv: config.nodeEnv }, "Delivery simulator listening");
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  const stopped = simulator.stopAll();
  logger.info({ signal, stopped }, "Shutting down");
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await simulator.drain();
  await closePool();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}
