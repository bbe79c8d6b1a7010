/**
 * Drizzle schema for the existing PostgreSQL tables the simulator touches.
 * Read/write via repositories only; tables are created by migrations outside
 * this service.
 */

import {
  boolean,
  date,
  decimal,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

export const tenants = pgTable(
  "tenants",
  {
    tenantId: varchar("tenant_id", { length: 50 }).primaryKey(),
    name: varchar("name", { length: 200 }).notNull(),
    subdomain: varchar("subdomain", { length: 100 }).notNull().unique(),
    isActive: boolean("is_active").default(true),
    adServer: varchar("ad_server", { length: 50 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (t) => [index("idx_subdomain").on(t.subdomain)]
);

export const products = pgTable(
  "products",
  {
    tenantId: varchar("tenant_id", { length: 50 }).notNull().references(() => tenants.tenantId, { onDelete: "cascade" }),
    productId: varchar("product_id", { length: 100 }).notNull(),
    name: varchar("name", { length: 200 }).notNull(),
    deliveryType: varchar("delivery_type", { length: 50 }).notNull(),
    /** Adapter-specific settings; `delivery_simulation` lives here. */
    implementationConfig: jsonb("implementation_config"),
  },
  (t) => [
    primaryKey({ columns: [t.tenantId, t.productId] }),
    index("idx_products_tenant").on(t.tenantId),
  ]
);

export const mediaBuys = pgTable(
  "media_buys",
  {
    mediaBuyId: varchar("media_buy_id", { length: 100 }).primaryKey(),
    tenantId: varchar("tenant_id", { length: 50 }).notNull().references(() => tenants.tenantId, { onDelete: "cascade" }),
    principalId: varchar("principal_id", { length: 50 }).notNull(),
    buyerRef: varchar("buyer_ref", { length: 100 }),
    orderName: varchar("order_name", { length: 255 }).notNull(),
    advertiserName: varchar("advertiser_name", { length: 255 }).notNull(),
    budget: decimal("budget", { precision: 15, scale: 2 }),
    currency: varchar("currency", { length: 3 }).default("USD"),
    startDate: date("start_date").notNull(),
    endDate: date("end_date").notNull(),
    startTime: timestamp("start_time", { withTimezone: true }),
    endTime: timestamp("end_time", { withTimezone: true }),
    status: varchar("status", { length: 20 }).default("draft").notNull(),
    createdAt: timestamp("created_at").defaultNow(),
    updatedAt: timestamp("updated_at").defaultNow(),
    rawRequest: jsonb("raw_request").notNull(),
  },
  (t) => [
    index("idx_media_buys_tenant").on(t.tenantId),
    index("idx_media_buys_status").on(t.status),
  ]
);

export const pushNotificationConfigs = pgTable(
  "push_notification_configs",
  {
    id: varchar("id", { length: 50 }).primaryKey(),
    tenantId: varchar("tenant_id", { length: 50 }).notNull().references(() => tenants.tenantId, { onDelete: "cascade" }),
    principalId: varchar("principal_id", { length: 50 }).notNull(),
    url: text("url").notNull(),
    authenticationType: varchar("authentication_type", { length: 50 }),
    authenticationToken: text("authentication_token"),
    webhookSecret: varchar("webhook_secret", { length: 500 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
    isActive: boolean("is_active").default(true).notNull(),
  },
  (t) => [
    index("idx_push_notification_configs_tenant").on(t.tenantId),
    index("idx_push_notification_configs_principal").on(t.tenantId, t.principalId),
  ]
);

export const webhookDeliveryLog = pgTable(
  "webhook_delivery_log",
  {
    id: text("id").primaryKey(),
    tenantId: text("tenant_id").notNull().references(() => tenants.tenantId, { onDelete: "cascade" }),
    principalId: text("principal_id").notNull(),
    mediaBuyId: text("media_buy_id").notNull(),
    webhookUrl: text("webhook_url").notNull(),
    taskType: text("task_type").notNull(),
    sequenceNumber: integer("sequence_number").default(1).notNull(),
    notificationType: text("notification_type"),
    attemptCount: integer("attempt_count").default(1).notNull(),
    status: text("status").notNull(),
    httpStatusCode: integer("http_status_code"),
    errorMessage: text("error_message"),
    payloadSizeBytes: integer("payload_size_bytes"),
    responseTimeMs: integer("response_time_ms"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (t) => [
    index("idx_webhook_log_media_buy").on(t.mediaBuyId),
    index("idx_webhook_log_tenant").on(t.tenantId),
    index("idx_webhook_log_status").on(t.status),
    index("idx_webhook_log_created_at").on(t.createdAt),
  ]
);
