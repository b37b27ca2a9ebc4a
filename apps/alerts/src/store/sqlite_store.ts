import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";

import type { DailyAlertV1, ScoredEventV1, StageSummaryV1 } from "@cropwatch/contracts";

import { isObj } from "../util";

export type AlertsStoreConfig = {
  // ":memory:" keeps everything in process
  filePath: string;
};

export type StoredRunV1 = {
  run_id: string;
  created_at_ts: number;
  region_id: string;
  determinism_hash: string;
  effective_config_hash: string;
  summary: StageSummaryV1;
};

export type StoredEventV1 = ScoredEventV1 & { run_id: string; region_id: string };

function jsonColumn(row: unknown, column: string): string {
  if (!isObj(row) || typeof row[column] !== "string") throw new Error(`missing ${column} column`);
  return row[column];
}

export class AlertsSqliteStore {
  private db: Database.Database;

  constructor(cfg: AlertsStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only tables
    this.db.exec(`
      create table if not exists alert_runs (
        run_id text primary key,
        created_at_ts integer not null,
        region_id text not null,
        determinism_hash text not null,
        effective_config_hash text not null,
        input_bundle_json text not null,
        record_json text not null
      );

      create table if not exists alert_gated_days (
        run_id text not null,
        date text not null,
        label text not null,
        record_json text not null,
        primary key (run_id, date)
      );

      create table if not exists alert_events (
        run_id text not null,
        seq integer not null,
        region_id text not null,
        event_type text not null,
        start_date text not null,
        end_date text not null,
        created_at_ts integer not null,
        record_json text not null,
        primary key (run_id, seq)
      );

      create index if not exists idx_runs_created on alert_runs(created_at_ts);
      create index if not exists idx_events_created on alert_events(created_at_ts);
      create index if not exists idx_events_region on alert_events(region_id, start_date);
    `);
  }

  insertRun(args: { run: StoredRunV1; input_bundle_json: string }): void {
    const { run } = args;
    this.db
      .prepare(
        `insert into alert_runs (run_id, created_at_ts, region_id, determinism_hash, effective_config_hash, input_bundle_json, record_json)
         values (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        run.run_id,
        run.created_at_ts,
        run.region_id,
        run.determinism_hash,
        run.effective_config_hash,
        args.input_bundle_json,
        JSON.stringify(run)
      );
  }

  insertGatedAlert(run_id: string, alert: DailyAlertV1): void {
    this.db
      .prepare(`insert into alert_gated_days (run_id, date, label, record_json) values (?, ?, ?, ?)`)
      .run(run_id, alert.date, alert.label, JSON.stringify(alert));
  }

  insertEvent(args: { run_id: string; seq: number; region_id: string; created_at_ts: number; event: ScoredEventV1 }): void {
    const { event } = args;
    this.db
      .prepare(
        `insert into alert_events (run_id, seq, region_id, event_type, start_date, end_date, created_at_ts, record_json)
         values (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(args.run_id, args.seq, args.region_id, event.event_type, event.start_date, event.end_date, args.created_at_ts, JSON.stringify(event));
  }

  /** Writes a run with its gated alerts and events atomically. */
  persistRun(args: { run: StoredRunV1; input_bundle_json: string; gated: readonly DailyAlertV1[]; events: readonly ScoredEventV1[] }): void {
    const tx = this.db.transaction(() => {
      this.insertRun({ run: args.run, input_bundle_json: args.input_bundle_json });
      for (const a of args.gated) this.insertGatedAlert(args.run.run_id, a);
      args.events.forEach((event, seq) =>
        this.insertEvent({ run_id: args.run.run_id, seq, region_id: args.run.region_id, created_at_ts: args.run.created_at_ts, event })
      );
    });
    tx();
  }

  listRuns(limit: number): StoredRunV1[] {
    const rows = this.db.prepare(`select record_json from alert_runs order by created_at_ts desc, rowid desc limit ?`).all(limit);
    return rows.map((r) => JSON.parse(jsonColumn(r, "record_json")));
  }

  listEvents(args: { limit: number; run_id?: string; region_id?: string }): StoredEventV1[] {
    const where: string[] = [];
    const values: Array<string | number> = [];
    if (args.run_id) {
      where.push("run_id = ?");
      values.push(args.run_id);
    }
    if (args.region_id) {
      where.push("region_id = ?");
      values.push(args.region_id);
    }
    values.push(args.limit);

    const sql = `
      select run_id, region_id, record_json from alert_events
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by created_at_ts desc, run_id asc, seq asc
      limit ?
    `;
    const rows = this.db.prepare(sql).all(...values);
    return rows.map((r) => ({
      ...JSON.parse(jsonColumn(r, "record_json")),
      run_id: jsonColumn(r, "run_id"),
      region_id: jsonColumn(r, "region_id"),
    }));
  }

  close(): void {
    this.db.close();
  }
}
