/**
 * HMAC-SHA256 webhook signing and verification.
 * Delivery webhooks sign "<timestamp>.<body>" so a receiver can reject replays.
 */

import { createHmac, timingSafeEqual } from "node:crypto";

export function signPayload(payload: string, secret: string): string {
  return createHmac("sha256", secret).update(payload).digest("hex");
}

export function signWebhookBody(body: string, secret: string, timestamp: string): string {
  return signPayload(`${timestamp}.${body}`, secret);
}

const HEX_DIGEST = /^[0-9a-f]{64}$/i;

/** Accepts the bare hex digest or the "sha256=<hex>" header form; false for anything malformed. */
export function verifyWebhookSignature(
  body: string,
  secret: string,
  timestamp: string,
  signature: string
): boolean {
  const provided = signature.startsWith("sha256=") ? signature.slice("sha256=".length) : signature;
  if (!HEX_DIGEST.test(provided)) return false;
  const expected = Buffer.from(signWebhookBody(body, secret, timestamp), "hex");
  return timingSafeEqual(expected, Buffer.from(provided, "hex"));
}
