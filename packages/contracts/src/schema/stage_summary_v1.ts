// packages/contracts/src/schema/stage_summary_v1.ts
import type { AlertCategory, SkipReason } from "./alert_v1";
import type { EventTypeV1 } from "./event_v1";

export type CategoryCountsV1 = {
  raw_triggers: number;
  gated_triggers: number;
  events: number;
};

/**
 * Stage counters for one run over the report range.
 * allow_alert_days <= qc_ok_days <= total_days, gated_alert_days <= raw_alert_days.
 */
export type StageSummaryV1 = {
  total_days: number;
  rs_support_days: number;
  qc_ok_days: number;
  gating_ok_days: number;
  allow_alert_days: number;
  raw_alert_days: number;
  gated_alert_days: number;
  skip_reason: Record<SkipReason, number>;
  categories: Record<AlertCategory, CategoryCountsV1>;
  event_types: Partial<Record<EventTypeV1, number>>;
  events: number;
};
