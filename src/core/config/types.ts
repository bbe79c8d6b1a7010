/**
 * Config types: process config from env and per-product simulation config.
 */

import type { PacingProfile, TrafficParameters } from "../deliverySimulation.js";

export interface WebhookSettings {
  /** Per-request timeout; exceeding it is a dispatch failure. */
  timeoutMs: number;
  /** Allow loopback/private webhook targets (local receivers in dev). */
  allowPrivateUrls: boolean;
  userAgent: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  databaseUrl: string;
  /** Admin API refuses every request when unset. */
  adminApiToken?: string;
  webhook: WebhookSettings;
  simulation: {
    maxActive: number;
    /** Deadline for a tick's media-buy read and webhook notification. */
    stepTimeoutMs: number;
  };
}

export interface SimulationConfig {
  enabled: boolean;
  /** Simulated seconds per real second (3600: one second is one hour). */
  timeAcceleration: number;
  /** Real seconds between ticks. */
  updateIntervalSeconds: number;
  pacing: PacingProfile;
  traffic?: TrafficParameters;
}
