/**
 * Webhook delivery: one signed HTTP POST per call with a bounded timeout,
 * SSRF guard and a per-endpoint circuit breaker. No retry; failures are
 * returned as values so a caller's loop never sees an exception.
 */

import { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from "../core/circuitBreaker.js";
import { HEADER_NAMES, MIN_WEBHOOK_SECRET_LENGTH } from "../core/constants.js";
import { createChildLogger } from "../core/logger.js";
import { signWebhookBody } from "../core/security/hmac.js";
import { isUrlSafeWithDns } from "../core/security/ssrf.js";
import { systemClock, type Clock } from "../core/simulationClock.js";
import type { WebhookEnvelope } from "../types/adcp.js";

const log = createChildLogger("webhook-delivery");

/** A principal's registered push-notification destination. */
export interface WebhookEndpoint {
  url: string;
  /** "bearer" or "HMAC-SHA256" (case-insensitive); anything else sends no credentials. */
  authenticationType?: string | null;
  authenticationToken?: string | null;
  webhookSecret?: string | null;
}

export interface DispatchSuccess {
  success: true;
  statusCode: number;
  responseTimeMs: number;
}

export interface DispatchFailure {
  success: false;
  error: string;
  statusCode?: number;
  responseTimeMs: number;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface WebhookDispatcher {
  dispatch(envelope: WebhookEnvelope, endpoint: WebhookEndpoint): Promise<DispatchResult>;
}

export type FetchFn = typeof fetch;
export type UrlGuard = (url: string) => Promise<boolean>;

export interface HttpWebhookDispatcherOptions {
  timeoutMs: number;
  userAgent: string;
  allowPrivateUrls?: boolean;
  fetchFn?: FetchFn;
  urlGuard?: UrlGuard;
  clock?: Clock;
  circuitBreaker?: Omit<CircuitBreakerOptions, "clock">;
}

function signingSecret(endpoint: WebhookEndpoint): string | null {
  if (endpoint.webhookSecret) return endpoint.webhookSecret;
  if (endpoint.authenticationType?.toLowerCase() === "hmac-sha256" && endpoint.authenticationToken) {
    return endpoint.authenticationToken;
  }
  return null;
}

export function buildWebhookHeaders(
  body: string,
  timestamp: string,
  endpoint: WebhookEndpoint,
  userAgent: string
): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "User-Agent": userAgent,
    [HEADER_NAMES.X_ADCP_TIMESTAMP]: timestamp,
  };

  const secret = signingSecret(endpoint);
  if (secret) {
    if (secret.length < MIN_WEBHOOK_SECRET_LENGTH) {
      log.warn({ url: endpoint.url }, `Webhook secret shorter than ${MIN_WEBHOOK_SECRET_LENGTH} characters, not signing`);
    } else {
      headers[HEADER_NAMES.X_ADCP_SIGNATURE] = `sha256=${signWebhookBody(body, secret, timestamp)}`;
    }
  }

  if (endpoint.authenticationType?.toLowerCase() === "bearer" && endpoint.authenticationToken) {
    headers["Authorization"] = `Bearer ${endpoint.authenticationToken}`;
  }
  return headers;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export class HttpWebhookDispatcher implements WebhookDispatcher {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly fetchFn: FetchFn;
  private readonly urlGuard: UrlGuard;
  private readonly clock: Clock;

  constructor(private readonly options: HttpWebhookDispatcherOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.urlGuard = options.urlGuard ?? isUrlSafeWithDns;
    this.clock = options.clock ?? systemClock;
  }

  private breakerFor(url: string): CircuitBreaker {
    let breaker = this.breakers.get(url);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.options.circuitBreaker, clock: this.clock });
      this.breakers.set(url, breaker);
    }
    return breaker;
  }

  circuitState(url: string): CircuitState {
    return this.breakers.get(url)?.state ?? "closed";
  }

  async dispatch(envelope: WebhookEnvelope, endpoint: WebhookEndpoint): Promise<DispatchResult> {
    const startTime = this.clock.now();
    const elapsed = () => this.clock.now() - startTime;

    const breaker = this.breakerFor(endpoint.url);
    if (!breaker.canAttempt()) {
      return { success: false, error: "Circuit open for endpoint", responseTimeMs: 0 };
    }

    if (!this.options.allowPrivateUrls && !(await this.urlGuard(endpoint.url))) {
      return { success: false, error: `Webhook URL blocked by SSRF policy: ${endpoint.url}`, responseTimeMs: elapsed() };
    }

    const body = JSON.stringify(envelope);
    const headers = buildWebhookHeaders(body, envelope.timestamp, endpoint, this.options.userAgent);

    try {
      const response = await this.fetchFn(endpoint.url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (response.ok) {
        breaker.recordSuccess();
        return { success: true, statusCode: response.status, responseTimeMs: elapsed() };
      }
      breaker.recordFailure();
      return {
        success: false,
        statusCode: response.status,
        error: `HTTP ${response.status} ${response.statusText}`.trim(),
        responseTimeMs: elapsed(),
      };
    } catch (err) {
      breaker.recordFailure();
      const error = isTimeout(err)
        ? `Request timed out after ${this.options.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : "Unknown fetch error";
      return { success: false, error, responseTimeMs: elapsed() };
    }
  }
}
