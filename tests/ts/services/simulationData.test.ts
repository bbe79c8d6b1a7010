import { describe, expect, it } from "vitest";
import type { MediaBuyRow } from "../../../src/db/repositories/media-buy.js";
import { firstProductId, toMediaBuyRef } from "../../../src/services/SimulationDataService.js";

function row(overrides: Partial<MediaBuyRow> = {}): MediaBuyRow {
  return {
    mediaBuyId: "buy_1",
    tenantId: "tenant_1",
    principalId: "principal_1",
    buyerRef: "ref_1",
    orderName: "Order",
    advertiserName: "Advertiser",
    budget: "5000.00",
    currency: "EUR",
    startDate: "2025-10-08",
    endDate: "2025-10-14",
    startTime: null,
    endTime: null,
    status: "active",
    createdAt: null,
    updatedAt: null,
    rawRequest: {},
    ...overrides,
  };
}

describe("toMediaBuyRef", () => {
  it("spans whole days when only dates are stored", () => {
    expect(toMediaBuyRef(row())).toEqual({
      mediaBuyId: "buy_1",
      tenantId: "tenant_1",
      principalId: "principal_1",
      startTime: new Date("2025-10-08T00:00:00Z"),
      endTime: new Date("2025-10-14T23:59:59Z"),
      totalBudget: 5000,
      currency: "EUR",
    });
  });

  it("prefers stored timestamps", () => {
    const ref = toMediaBuyRef(
      row({ startTime: new Date("2025-10-08T06:00:00Z"), endTime: new Date("2025-10-09T06:00:00Z") })
    );
    expect(ref.startTime.toISOString()).toBe("2025-10-08T06:00:00.000Z");
    expect(ref.endTime.toISOString()).toBe("2025-10-09T06:00:00.000Z");
  });

  it("defaults currency and treats a missing budget as zero", () => {
    const ref = toMediaBuyRef(row({ budget: null, currency: null }));
    expect(ref.totalBudget).toBe(0);
    expect(ref.currency).toBe("USD");
  });
});

describe("firstProductId", () => {
  it("takes the first package's product", () => {
    expect(
      firstProductId({ packages: [{ product_id: "prod_a" }, { product_id: "prod_b" }], product_ids: ["prod_z"] })
    ).toBe("prod_a");
    expect(firstProductId({ packages: [{ products: ["prod_c"] }] })).toBe("prod_c");
  });

  it("falls back to product_ids", () => {
    expect(firstProductId({ product_ids: ["prod_z"] })).toBe("prod_z");
  });

  it("returns undefined for anything else", () => {
    expect(firstProductId(null)).toBeUndefined();
    expect(firstProductId({ packages: "nope" })).toBeUndefined();
    expect(firstProductId({})).toBeUndefined();
  });
});
