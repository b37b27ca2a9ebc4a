// apps/alerts/src/pipeline.ts

import type { AlertRunResultV1, DailyRecordV1, RunRangesV1 } from "@cropwatch/contracts";
import { resolveRanges, runCompositeAlerts } from "@cropwatch/alert-kernel";

import type { DailyRecordSource } from "./daily_reader";
import { loadDefaultConfig } from "./config/ssot";
import { resolveEffectiveConfig } from "./config/patch";
import { toDailyRecords } from "./records";
import { sha256Hex, stableStringify } from "./util";

export const PIPELINE_VERSION = "alert_pipeline_v1";

export type AlertRunInput = {
  region_id: string;
  // Falls back to `period` in the effective config.
  ranges?: Partial<RunRangesV1>;
  options?: {
    persist?: boolean;
    // Inline replace-only patch (manifest v1); validated before use.
    config_patch?: unknown;
  };
};

export type AlertInputBundleV1 = {
  pipeline_version: typeof PIPELINE_VERSION;
  region_id: string;
  ranges: RunRangesV1;
  ssot_hash: string;
  effective_config_hash: string;
  record_dates: string[];
  records_hash: string;
};

export type AlertRunOutput = {
  determinism_hash: string;
  ssot_hash: string;
  // Canonical hash of the effective config (default.json + validated patch applied)
  effective_config_hash: string;
  result: AlertRunResultV1;
  run_meta: { pipeline_version: typeof PIPELINE_VERSION; run_id: string; region_id: string; record_count: number };
};

export type AlertPipelineRun = {
  input_bundle: AlertInputBundleV1;
  output: AlertRunOutput;
};

export class AlertPipelineV1 {
  constructor(
    private source: DailyRecordSource,
    private loadSsot: () => unknown = loadDefaultConfig
  ) {}

  private hashBundle(args: Omit<AlertInputBundleV1, "pipeline_version" | "record_dates" | "records_hash"> & { records: DailyRecordV1[] }) {
    const input_bundle: AlertInputBundleV1 = {
      pipeline_version: PIPELINE_VERSION,
      region_id: args.region_id,
      ranges: args.ranges,
      ssot_hash: args.ssot_hash,
      effective_config_hash: args.effective_config_hash,
      record_dates: args.records.map((r) => r.date),
      records_hash: sha256Hex(stableStringify(args.records)),
    };
    return { input_bundle, determinism_hash: sha256Hex(stableStringify(input_bundle)) };
  }

  async run(run_id: string, input: AlertRunInput): Promise<AlertPipelineRun> {
    // Configuration is settled before any row is read.
    const { config, ssot_hash, effective_config_hash } = resolveEffectiveConfig(this.loadSsot(), input.options?.config_patch);
    const ranges = resolveRanges(config, input.ranges);

    const rows = await this.source.queryRange({ regionId: input.region_id, start: ranges.data.start, end: ranges.data.end });
    const records = toDailyRecords(rows);

    const result = runCompositeAlerts(records, config, ranges);

    const { input_bundle, determinism_hash } = this.hashBundle({
      region_id: input.region_id,
      ranges,
      ssot_hash,
      effective_config_hash,
      records,
    });

    return {
      input_bundle,
      output: {
        determinism_hash,
        ssot_hash,
        effective_config_hash,
        result,
        run_meta: { pipeline_version: PIPELINE_VERSION, run_id, region_id: input.region_id, record_count: records.length },
      },
    };
  }
}
