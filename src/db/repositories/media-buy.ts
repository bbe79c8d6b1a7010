import { eq, inArray } from "drizzle-orm";
import type { DrizzleDb } from "../client.js";
import { mediaBuys, tenants } from "../schema.js";

export type MediaBuyRow = typeof mediaBuys.$inferSelect;

export async function getMediaBuyById(
  db: DrizzleDb,
  mediaBuyId: string
): Promise<MediaBuyRow | undefined> {
  const rows = await db
    .select()
    .from(mediaBuys)
    .where(eq(mediaBuys.mediaBuyId, mediaBuyId))
    .limit(1);
  return rows[0];
}

export interface MediaBuyWithAdServer {
  mediaBuy: MediaBuyRow;
  adServer: string | null;
}

/** Media buys in any of `statuses`, with the owning tenant's ad server. */
export async function listMediaBuysByStatus(
  db: DrizzleDb,
  statuses: readonly string[]
): Promise<MediaBuyWithAdServer[]> {
  if (statuses.length === 0) return [];
  return db
    .select({ mediaBuy: mediaBuys, adServer: tenants.adServer })
    .from(mediaBuys)
    .innerJoin(tenants, eq(tenants.tenantId, mediaBuys.tenantId))
    .where(inArray(mediaBuys.status, [...statuses]));
}
