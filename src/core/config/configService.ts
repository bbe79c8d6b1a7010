/**
 * Config service: process config from env and simulation config from
 * product implementation_config, both validated with zod.
 */

import { z } from "zod";
import { PACING_PROFILES } from "../deliverySimulation.js";
import { SIMULATION_DEFAULTS } from "../constants.js";
import { ConfigurationError } from "../errors.js";
import type { AppConfig, SimulationConfig } from "./types.js";

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v !== undefined && ["true", "1", "yes"].includes(v.toLowerCase()));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default("development"),
  DATABASE_URL: z
    .string()
    .default("postgresql://localhost:5432/delivery_simulator?user=simulator&password=simulator"),
  ADMIN_API_TOKEN: z.string().min(1).optional(),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WEBHOOK_ALLOW_PRIVATE_URLS: booleanFlag,
  WEBHOOK_USER_AGENT: z.string().min(1).default("AdCP-Delivery-Simulator/1.0"),
  SIMULATION_MAX_ACTIVE: z.coerce.number().int().positive().default(1000),
  SIMULATION_STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(SIMULATION_DEFAULTS.STEP_TIMEOUT_MS),
});

export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`, issues);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    databaseUrl: e.DATABASE_URL,
    adminApiToken: e.ADMIN_API_TOKEN,
    webhook: {
      timeoutMs: e.WEBHOOK_TIMEOUT_MS,
      allowPrivateUrls: e.WEBHOOK_ALLOW_PRIVATE_URLS,
      userAgent: e.WEBHOOK_USER_AGENT,
    },
    simulation: { maxActive: e.SIMULATION_MAX_ACTIVE, stepTimeoutMs: e.SIMULATION_STEP_TIMEOUT_MS },
  };
}

let cached: AppConfig | null = null;

export function getAppConfig(): AppConfig {
  if (!cached) cached = loadAppConfig();
  return cached;
}

const fraction = z.number().min(0).max(1);

const simulationConfigSchema = z.object({
  enabled: z.boolean(),
  timeAcceleration: z.number().finite().positive(),
  updateIntervalSeconds: z.number().finite().positive(),
  pacing: z.enum(PACING_PROFILES),
  traffic: z
    .object({
      cpm: z.number().finite().positive().optional(),
      fillRate: fraction.optional(),
      ctr: fraction.optional(),
      viewabilityRate: fraction.optional(),
    })
    .optional(),
});

/** Reject non-positive acceleration/interval and out-of-range traffic rates. */
export function validateSimulationConfig(config: SimulationConfig): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid delivery simulation config: ${issues.join("; ")}`, issues);
  }
  return config;
}

const percent = z.number().min(0).max(100);

/** Shape stored under products.implementation_config (rates in percent). */
const implementationConfigSchema = z
  .object({
    cpm: z.number().positive().optional(),
    fill_rate: percent.optional(),
    ctr: percent.optional(),
    viewability_rate: percent.optional(),
    delivery_simulation: z
      .object({
        enabled: z.boolean().default(false),
        time_acceleration: z.number().positive().default(SIMULATION_DEFAULTS.TIME_ACCELERATION),
        update_interval_seconds: z.number().positive().default(SIMULATION_DEFAULTS.UPDATE_INTERVAL_SECONDS),
        pacing: z.enum(PACING_PROFILES).default("normal"),
      })
      .default({}),
  })
  .passthrough();

/**
 * Parse the simulation settings of a product's implementation_config.
 * Missing config means simulation disabled with default timings.
 */
export function parseSimulationConfig(implementationConfig: unknown): SimulationConfig {
  const parsed = implementationConfigSchema.safeParse(implementationConfig ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid delivery simulation config: ${issues.join("; ")}`, issues);
  }
  const { delivery_simulation: sim, cpm, fill_rate, ctr, viewability_rate } = parsed.data;

  const config: SimulationConfig = {
    enabled: sim.enabled,
    timeAcceleration: sim.time_acceleration,
    updateIntervalSeconds: sim.update_interval_seconds,
    pacing: sim.pacing,
  };
  if (cpm !== undefined || fill_rate !== undefined || ctr !== undefined || viewability_rate !== undefined) {
    config.traffic = {
      ...(cpm !== undefined && { cpm }),
      ...(fill_rate !== undefined && { fillRate: fill_rate / 100 }),
      ...(ctr !== undefined && { ctr: ctr / 100 }),
      ...(viewability_rate !== undefined && { viewabilityRate: viewability_rate / 100 }),
    };
  }
  return config;
}
