/**
 * Delivery curve for simulated campaigns.
 * Computes cumulative impressions/spend/clicks for a media buy at a point in
 * simulated time. Deterministic: identical inputs give identical snapshots.
 */

import { MS_PER_DAY, SIMULATION_DEFAULTS } from "./constants.js";

export const PACING_PROFILES = ["normal", "slow", "fast"] as const;
export type PacingProfile = (typeof PACING_PROFILES)[number];

/** Read-only view of the media buy being simulated. */
export interface MediaBuyRef {
  mediaBuyId: string;
  tenantId: string;
  principalId: string;
  startTime: Date;
  endTime: Date;
  totalBudget: number;
  currency: string;
}

/** Rates are fractions (0.005 = 0.5%). */
export interface TrafficParameters {
  cpm?: number;
  fillRate?: number;
  ctr?: number;
  viewabilityRate?: number;
}

export interface DeliveryCurveOptions {
  pacing?: PacingProfile;
  traffic?: TrafficParameters;
}

export interface DeliverySnapshot {
  simulatedTime: Date;
  impressions: number;
  spend: number;
  clicks: number;
  ctr: number;
  /** Share of the flight elapsed, in [0, 1]. */
  progress: number;
  complete: boolean;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function flightDurationMs(mediaBuy: MediaBuyRef): number {
  return mediaBuy.endTime.getTime() - mediaBuy.startTime.getTime();
}

/**
 * Fraction of the budget delivered at `progress` under a pacing profile.
 * Every profile is non-decreasing with f(0) = 0 and f(1) = 1.
 */
export function pacingCurve(profile: PacingProfile, progress: number, flightDays: number): number {
  const p = clamp(progress, 0, 1);
  const day = p * flightDays;

  switch (profile) {
    case "fast":
      // Half delivered by the end of day 1, everything by day 2.
      if (flightDays <= 2) return p;
      return Math.min(1, day / 2);
    case "slow":
      // 10% by day 1, 30% by day 3, then linear to the end of the flight.
      if (flightDays <= 3) return p;
      if (day <= 1) return 0.1 * day;
      if (day <= 3) return 0.1 + 0.1 * (day - 1);
      return Math.min(1, 0.3 + (0.7 * (day - 3)) / (flightDays - 3));
    case "normal":
      return p;
  }
}

/** Impressions the full budget buys at the effective CPM and fill rate. */
export function inferredTotalImpressions(totalBudget: number, traffic: TrafficParameters = {}): number {
  const cpm = traffic.cpm ?? SIMULATION_DEFAULTS.CPM;
  const fillRate = traffic.fillRate ?? SIMULATION_DEFAULTS.FILL_RATE;
  return Math.round((totalBudget / cpm) * 1000 * fillRate);
}

export function computeDeliverySnapshot(
  mediaBuy: MediaBuyRef,
  elapsedSimulatedMs: number,
  options: DeliveryCurveOptions = {}
): DeliverySnapshot {
  const flightMs = flightDurationMs(mediaBuy);

  if (elapsedSimulatedMs <= 0 || flightMs <= 0) {
    return {
      simulatedTime: new Date(mediaBuy.startTime.getTime()),
      impressions: 0,
      spend: 0,
      clicks: 0,
      ctr: 0,
      progress: 0,
      complete: false,
    };
  }

  const progress = clamp(elapsedSimulatedMs / flightMs, 0, 1);
  const delivered = pacingCurve(options.pacing ?? "normal", progress, flightMs / MS_PER_DAY);
  const traffic = options.traffic ?? {};
  const ctr = traffic.ctr ?? SIMULATION_DEFAULTS.CTR;

  const spend = Math.min(mediaBuy.totalBudget, roundCents(delivered * mediaBuy.totalBudget));
  const impressions = Math.round(delivered * inferredTotalImpressions(mediaBuy.totalBudget, traffic));
  const clicks = Math.round(impressions * ctr);

  return {
    simulatedTime: new Date(mediaBuy.startTime.getTime() + Math.min(elapsedSimulatedMs, flightMs)),
    impressions,
    spend,
    clicks,
    ctr: impressions > 0 ? ctr : 0,
    progress,
    complete: progress >= 1,
  };
}
