// packages/contracts/src/schema/alert_v1.ts

export const ALERT_CATEGORIES = ["drought", "waterlogging", "heat_stress", "cold_stress", "nutrient_or_pest"] as const;
export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

export const SKIP_REASONS = ["ok", "no_remote_sensing", "stale", "low_canopy_confidence"] as const;
export type SkipReason = (typeof SKIP_REASONS)[number];

/**
 * Per-day support/QC/gating status for every report date.
 * allow_alert = qc ok AND gating ok.
 */
export type DayStatusV1 = {
  date: string;
  rs_support: boolean;
  rs_age: number | null;
  rs_support_date: string | null;
  skip_reason: SkipReason;
  canopy_ready: boolean;
  in_season: boolean;
  canopy_obs_count: number;
  gating_ok: boolean;
  allow_alert: boolean;
};

// The qualifying clause's variable, its value and the threshold it crossed.
export type RuleMetricV1 = {
  metric: string;
  value: number;
  threshold: number;
};

export type AlertHitV1 = {
  category: AlertCategory;
  reason: string;
  metric: RuleMetricV1 | null;
};

export type DailyAlertV1 = {
  date: string;
  categories: AlertCategory[];
  // Display label, e.g. "drought+cold_stress".
  label: string;
  hits: AlertHitV1[];
};
