/**
 * Database glue for the simulator: media-buy reads, webhook endpoint lookup,
 * delivery log writes and restart candidates.
 */

import { z } from "zod";
import { DEFAULT_CURRENCY, SIMULATABLE_MEDIA_BUY_STATUSES } from "../core/constants.js";
import type { MediaBuyRef } from "../core/deliverySimulation.js";
import type { DrizzleDb } from "../db/client.js";
import { getMediaBuyById, listMediaBuysByStatus, type MediaBuyRow } from "../db/repositories/media-buy.js";
import { getProductById } from "../db/repositories/product.js";
import { getTenantById } from "../db/repositories/tenant.js";
import { insertWebhookDeliveryLog, listActivePushConfigs } from "../db/repositories/webhook.js";
import type { MediaBuyReader } from "./DeliverySimulatorService.js";
import type { DeliveryLogStore, WebhookEndpointResolver } from "./ProtocolWebhookService.js";
import type { SimulationCandidate } from "./SimulationRecoveryService.js";

/**
 * Legacy rows only carry dates; the flight then runs from the start of the
 * first day to the last second of the end day (UTC).
 */
export function toMediaBuyRef(row: MediaBuyRow): MediaBuyRef {
  return {
    mediaBuyId: row.mediaBuyId,
    tenantId: row.tenantId,
    principalId: row.principalId,
    startTime: row.startTime ?? new Date(`${row.startDate}T00:00:00Z`),
    endTime: row.endTime ?? new Date(`${row.endDate}T23:59:59Z`),
    totalBudget: row.budget === null ? 0 : Number(row.budget),
    currency: row.currency ?? DEFAULT_CURRENCY,
  };
}

const rawRequestSchema = z
  .object({
    product_ids: z.array(z.string()).optional(),
    packages: z
      .array(
        z
          .object({
            product_id: z.string().optional(),
            products: z.array(z.string()).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

/** Product whose implementation_config drives the simulation: the first package's. */
export function firstProductId(rawRequest: unknown): string | undefined {
  const parsed = rawRequestSchema.safeParse(rawRequest);
  if (!parsed.success) return undefined;
  const firstPackage = parsed.data.packages?.[0];
  if (firstPackage) return firstPackage.product_id ?? firstPackage.products?.[0];
  return parsed.data.product_ids?.[0];
}

export function createDbMediaBuyReader(db: DrizzleDb): MediaBuyReader {
  return {
    async getMediaBuy(mediaBuyId) {
      const row = await getMediaBuyById(db, mediaBuyId);
      return row ? toMediaBuyRef(row) : undefined;
    },
  };
}

export function createDbEndpointResolver(db: DrizzleDb): WebhookEndpointResolver {
  return {
    async resolve(tenantId, principalId) {
      const rows = await listActivePushConfigs(db, tenantId, principalId);
      return rows.map((row) => ({
        url: row.url,
        authenticationType: row.authenticationType,
        authenticationToken: row.authenticationToken,
        webhookSecret: row.webhookSecret,
      }));
    },
  };
}

export function createDbDeliveryLogStore(db: DrizzleDb): DeliveryLogStore {
  return {
    async record(entry) {
      await insertWebhookDeliveryLog(db, {
        ...entry,
        responseTimeMs: Math.round(entry.responseTimeMs),
      });
    },
  };
}

async function toCandidate(db: DrizzleDb, row: MediaBuyRow, adServer: string | null): Promise<SimulationCandidate> {
  const productId = firstProductId(row.rawRequest);
  const product = productId ? await getProductById(db, row.tenantId, productId) : undefined;
  const webhooks = await listActivePushConfigs(db, row.tenantId, row.principalId);
  return {
    mediaBuy: toMediaBuyRef(row),
    adServer,
    implementationConfig: product?.implementationConfig ?? undefined,
    hasActiveWebhook: webhooks.length > 0,
  };
}

export async function loadSimulationCandidate(db: DrizzleDb, mediaBuyId: string): Promise<SimulationCandidate | undefined> {
  const row = await getMediaBuyById(db, mediaBuyId);
  if (!row) return undefined;
  const tenant = await getTenantById(db, row.tenantId);
  return toCandidate(db, row, tenant?.adServer ?? null);
}

/** Media buys in a status that can still be delivering. */
export async function listSimulationCandidates(db: DrizzleDb): Promise<SimulationCandidate[]> {
  const rows = await listMediaBuysByStatus(db, SIMULATABLE_MEDIA_BUY_STATUSES);
  const candidates: SimulationCandidate[] = [];
  for (const { mediaBuy, adServer } of rows) {
    candidates.push(await toCandidate(db, mediaBuy, adServer));
  }
  return candidates;
}
