import { and, desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../client.js";
import { pushNotificationConfigs, webhookDeliveryLog } from "../schema.js";

export type PushNotificationConfigRow = typeof pushNotificationConfigs.$inferSelect;
export type WebhookDeliveryLogRow = typeof webhookDeliveryLog.$inferSelect;
export type WebhookDeliveryLogInsert = typeof webhookDeliveryLog.$inferInsert;

export async function listActivePushConfigs(
  db: DrizzleDb,
  tenantId: string,
  principalId: string
): Promise<PushNotificationConfigRow[]> {
  return db
    .select()
    .from(pushNotificationConfigs)
    .where(
      and(
        eq(pushNotificationConfigs.tenantId, tenantId),
        eq(pushNotificationConfigs.principalId, principalId),
        eq(pushNotificationConfigs.isActive, true)
      )
    );
}

export async function insertWebhookDeliveryLog(
  db: DrizzleDb,
  row: WebhookDeliveryLogInsert
): Promise<void> {
  await db.insert(webhookDeliveryLog).values(row);
}

export async function listDeliveryLogByMediaBuy(
  db: DrizzleDb,
  mediaBuyId: string,
  limit = 50
): Promise<WebhookDeliveryLogRow[]> {
  return db
    .select()
    .from(webhookDeliveryLog)
    .where(eq(webhookDeliveryLog.mediaBuyId, mediaBuyId))
    .orderBy(desc(webhookDeliveryLog.createdAt))
    .limit(limit);
}
