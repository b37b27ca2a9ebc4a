import path from "node:path";

import type { FastifyBaseLogger } from "fastify";

import type { DailyRecordSource } from "./daily_reader";
import { newRunId, nowMs, stableStringify } from "./util";
import { AlertPipelineV1, type AlertRunInput, type AlertRunOutput } from "./pipeline";
import { AlertsSqliteStore, type StoredEventV1, type StoredRunV1 } from "./store/sqlite_store";
import { getManifest, loadDefaultConfig, resolveRepoRoot, type AlertConfigManifestV1 } from "./config/ssot";
import { resolveEffectiveConfig } from "./config/patch";

export type AlertRuntimeOptions = {
  // ":memory:" for an in-process store
  dbPath?: string;
  logger?: FastifyBaseLogger;
  loadSsot?: () => unknown;
};

export type AlertRunResponse = AlertRunOutput & { run_id: string; persisted: boolean };

export type ConfigPatchPreview = {
  ok: true;
  ssot_hash: string;
  effective_hash: string;
  changed_paths: string[];
  errors: [];
};

function defaultDbPath(): string {
  return process.env.ALERTS_DB_PATH ?? path.join(resolveRepoRoot(), "apps", "alerts", "data", "alerts.sqlite");
}

export class AlertRuntime {
  private pipeline: AlertPipelineV1;
  private store: AlertsSqliteStore;
  private loadSsot: () => unknown;
  private log?: FastifyBaseLogger;

  constructor(source: DailyRecordSource, opts: AlertRuntimeOptions = {}) {
    this.loadSsot = opts.loadSsot ?? loadDefaultConfig;
    this.pipeline = new AlertPipelineV1(source, this.loadSsot);
    this.store = new AlertsSqliteStore({ filePath: opts.dbPath ?? defaultDbPath() });
    this.log = opts.logger;
  }

  async run(input: AlertRunInput): Promise<AlertRunResponse> {
    const run_id = newRunId();
    const created_at_ts = nowMs();

    const { output, input_bundle } = await this.pipeline.run(run_id, input);
    const { result } = output;

    const persist = input.options?.persist === true;
    if (persist) {
      const run: StoredRunV1 = {
        run_id,
        created_at_ts,
        region_id: input.region_id,
        determinism_hash: output.determinism_hash,
        effective_config_hash: output.effective_config_hash,
        summary: result.summary,
      };
      this.store.persistRun({
        run,
        input_bundle_json: stableStringify(input_bundle),
        gated: result.gated_alerts,
        events: result.events,
      });
    }

    this.log?.info(
      {
        run_id,
        region_id: input.region_id,
        days: result.summary.total_days,
        gated_alert_days: result.summary.gated_alert_days,
        events: result.summary.events,
        determinism_hash: output.determinism_hash,
        persisted: persist,
      },
      "alert run complete"
    );

    return { run_id, persisted: persist, ...output };
  }

  listRuns(limit = 100): StoredRunV1[] {
    return this.store.listRuns(limit);
  }

  listEvents(args: { limit?: number; run_id?: string; region_id?: string } = {}): StoredEventV1[] {
    return this.store.listEvents({ limit: args.limit ?? 100, run_id: args.run_id, region_id: args.region_id });
  }

  getConfigManifest(): AlertConfigManifestV1 {
    return getManifest(this.loadSsot());
  }

  // Validates and previews a patch; nothing is stored.
  previewConfigPatch(patch: unknown): ConfigPatchPreview {
    const { ssot_hash, effective_config_hash, patch: checked } = resolveEffectiveConfig(this.loadSsot(), patch);
    const changed_paths = (checked?.ops ?? []).map((op) => op.path).sort();
    return { ok: true, ssot_hash, effective_hash: effective_config_hash, changed_paths, errors: [] };
  }

  close(): void {
    this.store.close();
  }
}
