/**
 * Server-side validation helpers for values entering the simulator.
 */

import type { MediaBuyRef } from "./deliverySimulation.js";
import { ValidationError } from "./errors.js";

const CURRENCY_RE = /^[A-Z]{3}$/;

/**
 * Throw ValidationError if the value is null, undefined, or empty string.
 */
export function validateRequired(value: unknown, fieldName: string): void {
  if (value === null || value === undefined) {
    throw new ValidationError(`${fieldName} is required`);
  }
  if (typeof value === "string" && value.trim().length === 0) {
    throw new ValidationError(`${fieldName} must not be empty`);
  }
}

/**
 * Validate that startDate is strictly before endDate.
 */
export function validateDateRange(startDate: Date, endDate: Date): void {
  if (Number.isNaN(startDate.getTime()) || Number.isNaN(endDate.getTime())) {
    throw new ValidationError("Flight dates must be valid timestamps");
  }
  if (startDate >= endDate) {
    throw new ValidationError(
      `Start date (${startDate.toISOString()}) must be before end date (${endDate.toISOString()})`
    );
  }
}

export function validateMediaBuyRef(mediaBuy: MediaBuyRef): void {
  validateRequired(mediaBuy.mediaBuyId, "media_buy_id");
  validateRequired(mediaBuy.tenantId, "tenant_id");
  validateRequired(mediaBuy.principalId, "principal_id");
  validateDateRange(mediaBuy.startTime, mediaBuy.endTime);
  if (!Number.isFinite(mediaBuy.totalBudget) || mediaBuy.totalBudget <= 0) {
    throw new ValidationError(`Budget must be greater than 0 (got ${mediaBuy.totalBudget})`);
  }
  if (!CURRENCY_RE.test(mediaBuy.currency)) {
    throw new ValidationError(`Invalid currency code: ${mediaBuy.currency}`);
  }
}

/** Non-throwing form for re-read records that may have been edited underneath. */
export function isValidMediaBuyRef(mediaBuy: MediaBuyRef): boolean {
  try {
    validateMediaBuyRef(mediaBuy);
    return true;
  } catch (err) {
    if (err instanceof ValidationError) return false;
    throw err;
  }
}
