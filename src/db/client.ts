/**
 * Database client. Uses the existing PostgreSQL; no schema generation.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { getAppConfig } from "../core/config/configService.js";
import * as schema from "./schema.js";

const { Pool } = pg;

// A hung connection or query fails instead of stalling simulation ticks.
const CONNECTION_TIMEOUT_MS = 5_000;
const QUERY_TIMEOUT_MS = 10_000;

let pool: pg.Pool | null = null;
let db: DrizzleDb | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: getAppConfig().databaseUrl,
      max: 10,
      connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
      query_timeout: QUERY_TIMEOUT_MS,
      statement_timeout: QUERY_TIMEOUT_MS,
    });
  }
  return pool;
}

export type DrizzleDb = NodePgDatabase<typeof schema>;

export function getDb(): DrizzleDb {
  if (!db) db = drizzle(getPool(), { schema });
  return db;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  db = null;
  await closing.end();
}
