// packages/contracts/src/schema/daily_record_v1.ts
/**
 * Remote-sensing indices carried on a fused daily row.
 * Order is the canonical column order used by readers and reports.
 */
export const INDEX_NAMES = ["ndvi", "evi", "ndmi", "msi", "ndre", "gndvi"] as const;
export type IndexName = (typeof INDEX_NAMES)[number];

export const WEATHER_FIELDS = ["tmean_7d", "tmin_7d", "tmax_7d", "precip_7d", "precip_1d", "rh_mean"] as const;
export type WeatherField = (typeof WEATHER_FIELDS)[number];

// null (or an absent key) means "no observation" for that date.
export type Reading = number | null | undefined;

export type WeatherAggregatesV1 = Partial<Record<WeatherField, Reading>>;
export type IndexValuesV1 = Partial<Record<IndexName, Reading>>;

export type DailyRecordV1 = {
  date: string; // YYYY-MM-DD
  weather: WeatherAggregatesV1;
  indices: IndexValuesV1;
};

export const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isPresent(x: Reading): x is number {
  return typeof x === "number" && Number.isFinite(x);
}
