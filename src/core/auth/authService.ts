/**
 * Admin token auth: token from x-adcp-auth or Authorization: Bearer,
 * compared in constant time against ADMIN_API_TOKEN.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { BEARER_PREFIX, HEADER_NAMES } from "../constants.js";
import { AuthError } from "../errors.js";
import { getHeaderCaseInsensitive, type HeadersLike } from "../httpHeaders.js";

function normalizeToken(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.toLowerCase().startsWith(BEARER_PREFIX)) {
    return trimmed.slice(BEARER_PREFIX.length).trim() || undefined;
  }
  return trimmed || undefined;
}

/** x-adcp-auth wins over Authorization; a bare Authorization value is not a token. */
export function extractToken(headers: HeadersLike): string | undefined {
  const adcp = normalizeToken(getHeaderCaseInsensitive(headers, HEADER_NAMES.X_ADCP_AUTH));
  if (adcp) return adcp;
  const authorization = getHeaderCaseInsensitive(headers, HEADER_NAMES.AUTHORIZATION)?.trim();
  if (!authorization?.toLowerCase().startsWith(BEARER_PREFIX)) return undefined;
  return normalizeToken(authorization);
}

// Hash first so inputs of different length compare in constant time.
export function tokensMatch(provided: string, expected: string): boolean {
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function requireAdminToken(headers: HeadersLike, expected: string | undefined): void {
  if (!expected) throw new AuthError("Admin API is disabled: ADMIN_API_TOKEN is not set");
  const token = extractToken(headers);
  if (!token) throw new AuthError("Missing admin token");
  if (!tokensMatch(token, expected)) throw new AuthError("Invalid admin token");
}
