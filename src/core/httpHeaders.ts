/**
 * HTTP header utilities used by the admin API and auth.
 * Case-insensitive per RFC 7230.
 */

import type { IncomingMessage } from "node:http";

export type HeadersLike = Record<string, string | string[] | undefined>;

export function getHeaderCaseInsensitive(
  headers: HeadersLike | null | undefined,
  headerName: string
): string | undefined {
  if (!headers || typeof headers !== "object") return undefined;
  const nameLower = headerName.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === nameLower) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

/** Flatten Node IncomingMessage headers to Record<string, string>. */
export function headersFromNodeRequest(req: IncomingMessage): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(req.headers)) {
    if (typeof v === "string") out[k] = v;
    else if (Array.isArray(v) && v[0]) out[k] = v[0];
  }
  return out;
}
