// Shared builders for kernel tests.

import type { AlertConfigInputV1, DailyRecordV1, DayStatusV1, IndexValuesV1, WeatherAggregatesV1 } from "@cropwatch/contracts";

export const NEUTRAL_WEATHER: WeatherAggregatesV1 = { tmean_7d: 20, tmin_7d: 14, tmax_7d: 26, precip_7d: 30, precip_1d: 4, rh_mean: 60 };

// Dense canopy, no deficit and no saturation under testConfig().
export const HEALTHY_INDICES: IndexValuesV1 = { ndvi: 0.6, evi: 0.4, ndmi: 0.4, msi: 0.6, ndre: 0.35, gndvi: 0.6 };

export function testConfig(edit?: (c: AlertConfigInputV1) => void): AlertConfigInputV1 {
  const c: AlertConfigInputV1 = {
    schema_version: "1.0.0",
    period: { data: { start: "2024-06-01", end: "2024-06-30" } },
    remote_sensing: { window_half_days: 3, window_mode: "past_only", max_age_days: 3 },
    canopy: { ndvi_min: 0.35, evi_min: 0.2 },
    gating: { mode: "off", months: [4, 5, 6, 7, 8, 9, 10], canopy_obs_min: 0 },
    categories: ["drought", "waterlogging", "heat_stress", "cold_stress", "nutrient_or_pest"],
    rules: {
      drought: { ndmi_strong: 0.15, ndmi_soft: 0.25, msi_strong: 1.2, msi_soft: 0.8, precip_low_mm: 20 },
      cold_stress: { tmean_max_c: 5, rh_min_pct: 75 },
      heat_stress: { tmean_min_c: 30, evi_max: 0.2 },
      nutrient_or_pest: {
        ndre_max: 0.28,
        ndre_strong_max: 0.2,
        gndvi_max: 0.5,
        evi_max: 0.2,
        deficit_indices: ["ndre", "gndvi", "evi"],
        min_deficits: 1,
        rh_corroborate_pct: 75,
      },
      waterlogging: { precip_high_mm: 40, ndmi_wet_min: 0.6 },
    },
    merge: { merge_gap_days: 0 },
  };
  edit?.(c);
  return c;
}

export function rec(date: string, weather: WeatherAggregatesV1 = {}, indices: IndexValuesV1 = {}): DailyRecordV1 {
  return { date, weather: { ...NEUTRAL_WEATHER, ...weather }, indices: { ...HEALTHY_INDICES, ...indices } };
}

// A day without any remote-sensing observation.
export function weatherOnly(date: string, weather: WeatherAggregatesV1 = {}): DailyRecordV1 {
  return { date, weather: { ...NEUTRAL_WEATHER, ...weather }, indices: {} };
}

export function status(date: string, over: Partial<DayStatusV1> = {}): DayStatusV1 {
  return {
    date,
    rs_support: true,
    rs_age: 0,
    rs_support_date: date,
    skip_reason: "ok",
    canopy_ready: true,
    in_season: true,
    canopy_obs_count: 1,
    gating_ok: true,
    allow_alert: true,
    ...over,
  };
}

export function dates(start: string, count: number): string[] {
  const out: string[] = [];
  const base = Date.parse(`${start}T00:00:00Z`);
  for (let i = 0; i < count; i++) out.push(new Date(base + i * 86_400_000).toISOString().slice(0, 10));
  return out;
}
