// apps/alerts/src/records.ts
//
// daily_fused_v1 rows -> DailyRecordV1.
//
// - numeric strings are accepted (pg returns numeric columns as strings)
// - NaN, empty strings and absent columns become null ("no observation")
// - a row without a usable calendar date is refused

import { INDEX_NAMES, WEATHER_FIELDS } from "@cropwatch/contracts";
import type { DailyRecordV1, IndexValuesV1, WeatherAggregatesV1 } from "@cropwatch/contracts";
import { isValidDate } from "@cropwatch/alert-kernel";

export type DailyFusedRow = Record<string, unknown>;

function safeNum(x: unknown): number | null {
  if (typeof x === "number") return Number.isFinite(x) ? x : null;
  if (typeof x === "string") {
    const s = x.trim();
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toIsoDate(x: unknown): string | null {
  if (x instanceof Date) return Number.isFinite(x.getTime()) ? x.toISOString().slice(0, 10) : null;
  if (typeof x !== "string") return null;
  const s = x.trim().slice(0, 10);
  return isValidDate(s) ? s : null;
}

export function toDailyRecord(row: DailyFusedRow, i = 0): DailyRecordV1 {
  const date = toIsoDate(row.date);
  if (!date) throw new Error(`invalid date in daily row ${i}: ${String(row.date)}`);

  const weather: WeatherAggregatesV1 = {};
  for (const f of WEATHER_FIELDS) weather[f] = safeNum(row[f]);

  const indices: IndexValuesV1 = {};
  for (const n of INDEX_NAMES) indices[n] = safeNum(row[n]);

  return { date, weather, indices };
}

export function toDailyRecords(rows: readonly DailyFusedRow[]): DailyRecordV1[] {
  return rows.map((row, i) => toDailyRecord(row, i));
}
