/**
 * Structured logger: pino-based, JSON in production, stdout stream in dev,
 * silent under the test runner unless LOG_LEVEL is set explicitly.
 */

import pino from "pino";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.VITEST) return "silent";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

export const logger = pino({
  level: resolveLevel(),
  redact: {
    paths: ["headers.authorization", "headers['x-adcp-signature']", "authenticationToken", "webhookSecret"],
    censor: "[redacted]",
  },
  ...(process.env.NODE_ENV !== "production" && !process.env.VITEST && {
    transport: { target: "pino/file", options: { destination: 1 } },
  }),
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
