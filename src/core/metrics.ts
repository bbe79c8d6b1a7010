/**
 * Prometheus metrics: webhook deliveries and simulation lifecycle.
 */

import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const webhookDeliveryCounter = new Counter({
  name: "webhook_deliveries_total",
  help: "Total webhook delivery attempts",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const webhookDeliveryDuration = new Histogram({
  name: "webhook_delivery_duration_seconds",
  help: "Webhook delivery duration in seconds",
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const simulationTickCounter = new Counter({
  name: "simulation_ticks_total",
  help: "Delivery simulation ticks by notification type",
  labelNames: ["notification_type"] as const,
  registers: [registry],
});

export const activeSimulationsGauge = new Gauge({
  name: "simulations_active",
  help: "Delivery simulations currently running",
  registers: [registry],
});

export const simulationsFinishedCounter = new Counter({
  name: "simulations_finished_total",
  help: "Delivery simulations that reached a terminal state",
  labelNames: ["outcome"] as const,
  registers: [registry],
});
