/**
 * AdCP-aligned TypeScript types used at the adapter and webhook boundaries.
 * Field names keep the protocol's snake_case so payloads serialize as-is.
 */

/** Principal: the advertiser account a media buy runs for. */
export interface Principal {
  principal_id: string;
  name: string;
}

/** AdCP budget: total, currency, optional daily_cap and pacing. */
export interface Budget {
  total: number;
  currency: string;
  daily_cap?: number;
  pacing?: "even" | "asap" | "daily_budget";
}

export type DeliveryType = "guaranteed" | "non_guaranteed";

/** Media package inside a buy. */
export interface MediaPackage {
  package_id: string;
  name: string;
  delivery_type: DeliveryType;
  cpm: number;
  impressions: number;
  product_id?: string;
  budget?: number;
}

export interface CreateMediaBuyRequest {
  product_ids: string[];
  budget?: Budget | number;
  buyer_ref?: string;
  po_number?: string;
  currency?: string;
}

export interface CreateMediaBuySuccessResponse {
  status: "success";
  media_buy_id: string;
  buyer_ref?: string;
}

export interface CreateMediaBuyErrorResponse {
  status: "error";
  error: string;
  detail?: string;
}

export type CreateMediaBuyResponse = CreateMediaBuySuccessResponse | CreateMediaBuyErrorResponse;

export interface CheckMediaBuyStatusResponse {
  status: string;
}

/** Reporting window (ISO-8601 UTC). */
export interface ReportingPeriod {
  start: string;
  end: string;
}

export interface UpdateMediaBuySuccessResponse {
  status: "success";
}
export interface UpdateMediaBuyErrorResponse {
  status: "error";
  error: string;
}
export type UpdateMediaBuyResponse = UpdateMediaBuySuccessResponse | UpdateMediaBuyErrorResponse;

// ── Delivery reporting webhooks ──────────────────────────────

export type DeliveryNotificationType = "scheduled" | "final";

export interface DeliveryTotals {
  impressions: number;
  spend: number;
  clicks: number;
  ctr: number;
}

export interface MediaBuyDelivery {
  media_buy_id: string;
  status: "active" | "completed";
  totals: DeliveryTotals;
  by_package: unknown[];
}

/** Inner delivery report body (AdCP 2.3 get_media_buy_delivery shape). */
export interface DeliveryWebhookPayload {
  adcp_version: string;
  notification_type: DeliveryNotificationType;
  sequence_number: number;
  /** Omitted on the final notification. */
  next_expected_at?: string;
  reporting_period: ReportingPeriod;
  currency: string;
  media_buy_deliveries: MediaBuyDelivery[];
}

/** Outer envelope posted to the principal's webhook. */
export interface WebhookEnvelope {
  task_id: string;
  status: "working" | "completed";
  timestamp: string;
  tenant_id: string;
  principal_id: string;
  data: DeliveryWebhookPayload;
}

export interface AdapterGetMediaBuyDeliveryResponse {
  media_buy_id: string;
  delivery?: DeliveryTotals;
  reporting_period?: ReportingPeriod;
}
