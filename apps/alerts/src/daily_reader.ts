import { Pool, type PoolConfig } from "pg";

import { INDEX_NAMES, WEATHER_FIELDS } from "@cropwatch/contracts";

import type { DailyFusedRow } from "./records";

export type DailyRangeQuery = {
  regionId: string;
  // inclusive, YYYY-MM-DD
  start: string;
  end: string;
};

export interface DailyRecordSource {
  ping(): Promise<void>;
  queryRange(params: DailyRangeQuery): Promise<DailyFusedRow[]>;
}

const COLUMNS = [...WEATHER_FIELDS, ...INDEX_NAMES];

// Without a connection string pg falls back to the PG* environment variables.
export function poolConfig(databaseUrl: string | undefined): PoolConfig {
  return databaseUrl ? { connectionString: databaseUrl } : {};
}

/** Reads fused daily weather + remote-sensing rows from `daily_fused_v1`. */
export class DailyFusedReader implements DailyRecordSource {
  private pool: Pool;

  constructor(databaseUrl?: string) {
    this.pool = new Pool(poolConfig(databaseUrl));
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r.rows.length) throw new Error("pg ping failed");
  }

  async queryRange(params: DailyRangeQuery): Promise<DailyFusedRow[]> {
    // to_char keeps the calendar date away from the client's time zone.
    const sql = `
      select to_char(date, 'YYYY-MM-DD') as date, ${COLUMNS.join(", ")}
      from daily_fused_v1
      where region_id = $1
        and date >= $2::date
        and date <= $3::date
      order by date asc
    `;
    const r = await this.pool.query<DailyFusedRow>(sql, [params.regionId, params.start, params.end]);
    return r.rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
