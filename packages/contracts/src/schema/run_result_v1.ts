// packages/contracts/src/schema/run_result_v1.ts
import type { DayStatusV1, DailyAlertV1 } from "./alert_v1";
import type { DateRangeV1 } from "./alert_config_zod";
import type { ScoredEventV1 } from "./event_v1";
import type { StageSummaryV1 } from "./stage_summary_v1";

export type RunRangesV1 = {
  data: DateRangeV1;
  report: DateRangeV1;
};

export type AlertRunResultV1 = {
  ranges: RunRangesV1;
  days: DayStatusV1[];
  raw_alerts: DailyAlertV1[];
  gated_alerts: DailyAlertV1[];
  events: ScoredEventV1[];
  summary: StageSummaryV1;
};
