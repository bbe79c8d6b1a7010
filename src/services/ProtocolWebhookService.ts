/**
 * Delivery notifications: builds the AdCP delivery envelope for a tick and
 * fans it out to every active webhook the principal registered.
 */

import { randomUUID } from "node:crypto";
import { ADCP_DELIVERY_VERSION } from "../core/constants.js";
import type { DeliverySnapshot, MediaBuyRef } from "../core/deliverySimulation.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { webhookDeliveryCounter, webhookDeliveryDuration } from "../core/metrics.js";
import type { DeliveryWebhookPayload, WebhookEnvelope } from "../types/adcp.js";
import type { WebhookDispatcher, WebhookEndpoint } from "./WebhookDeliveryService.js";

export interface DeliveryEnvelopeInput {
  mediaBuy: MediaBuyRef;
  snapshot: DeliverySnapshot;
  sequenceNumber: number;
  isFinal: boolean;
  /** Wall-clock time of the tick. */
  now: Date;
  /** When the next scheduled notification is due; ignored when final. */
  nextExpectedAt?: Date;
}

export function buildDeliveryEnvelope(input: DeliveryEnvelopeInput): WebhookEnvelope {
  const { mediaBuy, snapshot, isFinal } = input;

  const data: DeliveryWebhookPayload = {
    adcp_version: ADCP_DELIVERY_VERSION,
    notification_type: isFinal ? "final" : "scheduled",
    sequence_number: input.sequenceNumber,
    ...(!isFinal && input.nextExpectedAt && { next_expected_at: input.nextExpectedAt.toISOString() }),
    reporting_period: {
      start: mediaBuy.startTime.toISOString(),
      end: snapshot.simulatedTime.toISOString(),
    },
    currency: mediaBuy.currency,
    media_buy_deliveries: [
      {
        media_buy_id: mediaBuy.mediaBuyId,
        status: isFinal ? "completed" : "active",
        totals: {
          impressions: snapshot.impressions,
          spend: snapshot.spend,
          clicks: snapshot.clicks,
          ctr: snapshot.ctr,
        },
        by_package: [],
      },
    ],
  };

  return {
    task_id: mediaBuy.mediaBuyId,
    status: isFinal ? "completed" : "working",
    timestamp: input.now.toISOString(),
    tenant_id: mediaBuy.tenantId,
    principal_id: mediaBuy.principalId,
    data,
  };
}

export interface WebhookEndpointResolver {
  resolve(tenantId: string, principalId: string): Promise<WebhookEndpoint[]>;
}

export interface DeliveryLogEntry {
  id: string;
  tenantId: string;
  principalId: string;
  mediaBuyId: string;
  webhookUrl: string;
  taskType: string;
  sequenceNumber: number;
  notificationType: string;
  attemptCount: number;
  status: "success" | "failed";
  httpStatusCode: number | null;
  errorMessage: string | null;
  payloadSizeBytes: number;
  responseTimeMs: number;
  createdAt: Date;
  completedAt: Date;
}

export interface DeliveryLogStore {
  record(entry: DeliveryLogEntry): Promise<void>;
}

export interface NotificationFailure {
  url: string;
  error: string;
  statusCode?: number;
}

export interface NotificationOutcome {
  attempted: number;
  delivered: number;
  failures: NotificationFailure[];
}

export interface DeliveryNotifier {
  notify(envelope: WebhookEnvelope): Promise<NotificationOutcome>;
  /** Wait for bookkeeping still running after notify resolved. */
  flush?(): Promise<void>;
}

export interface WebhookDeliveryNotifierDeps {
  resolver: WebhookEndpointResolver;
  dispatcher: WebhookDispatcher;
  logStore?: DeliveryLogStore;
  logger?: Logger;
}

/**
 * Sends each envelope to every endpoint once and records the attempt.
 * Log writes run in the background; a slow insert never holds up a tick.
 */
export class WebhookDeliveryNotifier implements DeliveryNotifier {
  private readonly log: Logger;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(private readonly deps: WebhookDeliveryNotifierDeps) {
    this.log = deps.logger ?? createChildLogger("delivery-notifier");
  }

  async notify(envelope: WebhookEnvelope): Promise<NotificationOutcome> {
    let endpoints: WebhookEndpoint[];
    try {
      endpoints = await this.deps.resolver.resolve(envelope.tenant_id, envelope.principal_id);
    } catch (err) {
      this.log.error({ err, tenantId: envelope.tenant_id, principalId: envelope.principal_id }, "Failed to resolve webhook endpoints");
      return {
        attempted: 0,
        delivered: 0,
        failures: [{ url: "", error: err instanceof Error ? err.message : "Endpoint lookup failed" }],
      };
    }

    if (endpoints.length === 0) {
      this.log.debug({ tenantId: envelope.tenant_id, principalId: envelope.principal_id }, "No webhooks configured");
      return { attempted: 0, delivered: 0, failures: [] };
    }

    const payloadSizeBytes = Buffer.byteLength(JSON.stringify(envelope));
    const outcome: NotificationOutcome = { attempted: endpoints.length, delivered: 0, failures: [] };

    for (const endpoint of endpoints) {
      const createdAt = new Date();
      const result = await this.deps.dispatcher.dispatch(envelope, endpoint);

      webhookDeliveryCounter.inc({ status: result.success ? "success" : "failed" });
      webhookDeliveryDuration.observe(result.responseTimeMs / 1000);

      if (result.success) {
        outcome.delivered += 1;
      } else {
        outcome.failures.push({
          url: endpoint.url,
          error: result.error,
          ...(result.statusCode !== undefined && { statusCode: result.statusCode }),
        });
      }

      this.recordAttempt({
        id: randomUUID(),
        tenantId: envelope.tenant_id,
        principalId: envelope.principal_id,
        mediaBuyId: envelope.task_id,
        webhookUrl: endpoint.url,
        taskType: "media_buy_delivery",
        sequenceNumber: envelope.data.sequence_number,
        notificationType: envelope.data.notification_type,
        attemptCount: 1,
        status: result.success ? "success" : "failed",
        httpStatusCode: result.statusCode ?? null,
        errorMessage: result.success ? null : result.error,
        payloadSizeBytes,
        responseTimeMs: result.responseTimeMs,
        createdAt,
        completedAt: new Date(),
      });
    }

    return outcome;
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  private recordAttempt(entry: DeliveryLogEntry): void {
    const store = this.deps.logStore;
    if (!store) return;
    const write = (async () => {
      try {
        await store.record(entry);
      } catch (err) {
        this.log.error({ err, mediaBuyId: entry.mediaBuyId, sequenceNumber: entry.sequenceNumber }, "Failed to insert webhook delivery log");
      }
    })();
    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }
}
