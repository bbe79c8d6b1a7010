/**
 * Domain error hierarchy. Use these instead of generic Error.
 * The HTTP layer maps them through toHttpError; dispatch failures are
 * returned as values and never thrown.
 */

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string = "INTERNAL_ERROR"
  ) {
    super(message);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class AuthError extends DomainError {
  constructor(message: string = "Authentication required") {
    super(message, "AUTH_ERROR");
    this.name = "AuthError";
  }
}

/** Invalid simulation or process configuration; raised before any work starts. */
export class ConfigurationError extends DomainError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class DuplicateTaskError extends DomainError {
  constructor(public readonly mediaBuyId: string) {
    super(`Delivery simulation already running for ${mediaBuyId}`, "DUPLICATE_TASK");
    this.name = "DuplicateTaskError";
  }
}

export class SimulationCapacityError extends DomainError {
  constructor(limit: number) {
    super(`Active simulation limit reached (${limit})`, "SIMULATION_CAPACITY");
    this.name = "SimulationCapacityError";
  }
}

/** Awaited work outlived its deadline; the work itself may still finish later. */
export class TimeoutError extends DomainError {
  constructor(
    label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

type HttpErrorBody = { error: string; message: string; issues?: string[] };

/** Map domain error to HTTP status + JSON body. */
export function toHttpError(err: unknown): { status: number; body: HttpErrorBody } {
  if (err instanceof AuthError) return { status: 401, body: { error: err.code, message: err.message } };
  if (err instanceof NotFoundError) return { status: 404, body: { error: err.code, message: err.message } };
  if (err instanceof DuplicateTaskError) return { status: 409, body: { error: err.code, message: err.message } };
  if (err instanceof ConfigurationError) {
    return { status: 422, body: { error: err.code, message: err.message, issues: err.issues } };
  }
  if (err instanceof ValidationError) return { status: 422, body: { error: err.code, message: err.message } };
  if (err instanceof SimulationCapacityError) return { status: 503, body: { error: err.code, message: err.message } };
  if (err instanceof DomainError) return { status: 500, body: { error: err.code, message: err.message } };
  return { status: 500, body: { error: "INTERNAL_ERROR", message: err instanceof Error ? err.message : "Internal error" } };
}
