/**
 * Shared constants: adapter types, header names, statuses, protocol versions.
 * Use everywhere to avoid hardcoded strings.
 */

export const ADAPTER_TYPES = {
  MOCK: "mock",
} as const;

export const HEADER_NAMES = {
  /** Preferred AdCP auth header */
  X_ADCP_AUTH: "x-adcp-auth",
  /** Standard HTTP auth (Bearer token) */
  AUTHORIZATION: "authorization",
  /** Outbound webhook signing */
  X_ADCP_SIGNATURE: "X-ADCP-Signature",
  X_ADCP_TIMESTAMP: "X-ADCP-Timestamp",
} as const;

export const BEARER_PREFIX = "bearer ";

export const MEDIA_BUY_STATUS = {
  DRAFT: "draft",
  PENDING: "pending",
  ACTIVE: "active",
  PAUSED: "paused",
  COMPLETED: "completed",
  CANCELLED: "cancelled",
} as const;

/** Media buy statuses eligible for a manual simulation restart. */
export const SIMULATABLE_MEDIA_BUY_STATUSES = ["pending", "active", "working"] as const;

export const DEFAULT_CURRENCY = "USD";

/** AdCP version stamped on delivery webhook payloads. */
export const ADCP_DELIVERY_VERSION = "2.3.0";

export const SIMULATION_DEFAULTS = {
  TIME_ACCELERATION: 3600,
  UPDATE_INTERVAL_SECONDS: 1.0,
  CPM: 10,
  CTR: 0.01,
  FILL_RATE: 1,
  /** Deadline for one tick's media-buy read and for its notification step. */
  STEP_TIMEOUT_MS: 15_000,
} as const;

/** Webhook secrets shorter than this are not used for signing. */
export const MIN_WEBHOOK_SECRET_LENGTH = 32;

export const MS_PER_DAY = 86_400_000;
