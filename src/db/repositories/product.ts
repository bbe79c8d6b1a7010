import { and, eq } from "drizzle-orm";
import type { DrizzleDb } from "../client.js";
import { products } from "../schema.js";

export type ProductRow = typeof products.$inferSelect;

export async function getProductById(
  db: DrizzleDb,
  tenantId: string,
  productId: string
): Promise<ProductRow | undefined> {
  const rows = await db
    .select()
    .from(products)
    .where(and(eq(products.tenantId, tenantId), eq(products.productId, productId)))
    .limit(1);
  return rows[0];
}
