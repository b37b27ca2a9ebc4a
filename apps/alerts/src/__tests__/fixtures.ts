// In-process stand-ins for the daily_fused_v1 reader and the SSOT file.

import fs from "node:fs";

import type { DailyRangeQuery, DailyRecordSource } from "../daily_reader";
import type { DailyFusedRow } from "../records";

export const REGION = "region-test-1";

const NEUTRAL: DailyFusedRow = {
  tmean_7d: 20,
  tmin_7d: 14,
  tmax_7d: 26,
  precip_7d: 30,
  precip_1d: 4,
  rh_mean: 60,
  ndvi: 0.6,
  evi: 0.4,
  ndmi: 0.4,
  msi: 0.6,
  ndre: 0.35,
  gndvi: 0.6,
};

export const COLD: DailyFusedRow = { tmean_7d: 3.1, rh_mean: 88 };
export const COLD_REASON = "tmean_7d=3.1°C < 5°C & RH=88% > 75%";

export function fusedRow(date: string, over: DailyFusedRow = {}): DailyFusedRow {
  return { date, ...NEUTRAL, ...over };
}

// 2024-06-01..05 with a three-day cold spell on 06-02..06-04.
export function coldSpellRows(): DailyFusedRow[] {
  return [
    fusedRow("2024-06-01"),
    fusedRow("2024-06-02", COLD),
    fusedRow("2024-06-03", COLD),
    fusedRow("2024-06-04", COLD),
    fusedRow("2024-06-05"),
  ];
}

export class MemoryDailySource implements DailyRecordSource {
  public readonly queries: DailyRangeQuery[] = [];

  constructor(private rows: Record<string, DailyFusedRow[]>) {}

  async ping(): Promise<void> {}

  async queryRange(params: DailyRangeQuery): Promise<DailyFusedRow[]> {
    this.queries.push(params);
    return (this.rows[params.regionId] ?? []).filter((r) => {
      const d = String(r.date);
      return d >= params.start && d <= params.end;
    });
  }
}

function readDefault(): Record<string, unknown> {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL("../../../../config/alerts/default.json", import.meta.url), "utf8"));
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) throw new Error("default.json must be an object");
  return Object.fromEntries(Object.entries(raw));
}

/**
 * default.json narrowed to June 2024 with gating off and no gap bridging,
 * so a cold spell on consecutive days becomes exactly one event.
 */
export function ssotFixture(): Record<string, unknown> {
  const cfg = readDefault();
  const gating = cfg.gating;
  return {
    ...cfg,
    period: { data: { start: "2024-06-01", end: "2024-06-05" } },
    gating: { ...(gating && typeof gating === "object" ? gating : {}), mode: "off" },
    merge: { merge_gap_days: 0 },
  };
}
