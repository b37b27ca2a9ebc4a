// Alert Kernel - pure run entrypoint
//
// This module exports a single pure pass that:
// 1) Validates configuration and ranges (fails before any row is read).
// 2) Resolves remote-sensing support, QC and gating for every data-range date.
// 3) Evaluates category rules and assembles raw/gated alerts for report-range dates.
// 4) Merges the gated stream into single-category and composite events.
// 5) Scores each event's severity within the run.
//
// No IO. No side effects.

import { parseAlertConfigV1 } from "@cropwatch/contracts";
import type {
  AlertConfigInputV1,
  AlertConfigV1,
  AlertRunResultV1,
  ConfigIssueV1,
  DailyAlertV1,
  DailyRecordV1,
  DateRangeV1,
  DayStatusV1,
  RunRangesV1,
} from "@cropwatch/contracts";

import { assembleDay, type CategoryOutcomes } from "./assemble/alert_assembler";
import { inRange, isValidDate, toDayNumber } from "./dates";
import { ConfigError, OrderingViolationError } from "./errors";
import { initialGatingState, stepGating } from "./gating/gating_filter";
import { mergeComposites } from "./merge/composite_merger";
import { mergeCategoryRuns } from "./merge/event_merger";
import { scoreEvents } from "./severity/event_severity";
import { classifyQC } from "./qc/qc_classifier";
import { evaluateCategory, isIndexIndependent } from "./rules/rule_table";
import type { RuleInput } from "./rules/types";
import { buildStageSummary } from "./summary/stage_summary";
import { buildObservationIndex, resolveSupport } from "./support/support_window";

export type SeriesRow = { day: number; record: DailyRecordV1 };

export function parseEngineConfig(raw: unknown): AlertConfigV1 {
  const r = parseAlertConfigV1(raw);
  if (!r.ok) throw new ConfigError(r.issues);
  return r.config;
}

function rangeIssues(range: DateRangeV1, path: string): ConfigIssueV1[] {
  const issues: ConfigIssueV1[] = [];
  if (!isValidDate(range.start)) issues.push({ path: `${path}.start`, message: `invalid date ${range.start}` });
  if (!isValidDate(range.end)) issues.push({ path: `${path}.end`, message: `invalid date ${range.end}` });
  if (!issues.length && range.start > range.end) {
    issues.push({ path: `${path}.end`, message: `end ${range.end} precedes start ${range.start}` });
  }
  return issues;
}

/**
 * Explicit ranges win over `period` in the configuration. The report range
 * defaults to the data range it is paired with (an explicit data range does not
 * pick up the configured report range) and must lie inside it.
 */
export function resolveRanges(cfg: AlertConfigV1, override?: Partial<RunRangesV1>): RunRangesV1 {
  const data = override?.data ?? cfg.period?.data;
  if (!data) throw new ConfigError([{ path: "period.data", message: "data range is required" }]);
  const explicitReport = override?.report ?? (override?.data ? undefined : cfg.period?.report);
  const report = explicitReport ?? data;

  const issues = rangeIssues(data, "period.data");
  if (explicitReport) issues.push(...rangeIssues(explicitReport, "period.report"));
  if (!issues.length && (report.start < data.start || report.end > data.end)) {
    issues.push({
      path: "period.report",
      message: `report range ${report.start}..${report.end} must lie within data range ${data.start}..${data.end}`,
    });
  }
  if (issues.length) throw new ConfigError(issues);
  return { data: { ...data }, report: { ...report } };
}

/**
 * Orders the series by date and applies the duplicate-date policy:
 * `reject` refuses the run, `keep_last` keeps the last row given for a date.
 */
export function normalizeSeries(
  records: readonly DailyRecordV1[],
  policy: AlertConfigV1["input"]["duplicate_dates"]
): SeriesRow[] {
  const rows = records.map((record) => ({ day: toDayNumber(record.date), record }));
  rows.sort((a, b) => a.day - b.day);

  const out: SeriesRow[] = [];
  for (const row of rows) {
    const prev = out[out.length - 1];
    if (prev && prev.day === row.day) {
      if (policy === "reject") throw new OrderingViolationError("duplicate input date", [row.record.date]);
      out[out.length - 1] = row;
      continue;
    }
    out.push(row);
  }
  return out;
}

export function runCompositeAlerts(
  records: readonly DailyRecordV1[],
  config: AlertConfigInputV1 | AlertConfigV1,
  ranges?: Partial<RunRangesV1>
): AlertRunResultV1 {
  const cfg = parseEngineConfig(config);
  const resolved = resolveRanges(cfg, ranges);

  const series = normalizeSeries(records, cfg.input.duplicate_dates).filter((r) => inRange(r.record.date, resolved.data));
  const observations = buildObservationIndex(series, cfg.remote_sensing.support_indices);

  let gating = initialGatingState();
  const days: DayStatusV1[] = [];
  const raw_alerts: DailyAlertV1[] = [];
  const gated_alerts: DailyAlertV1[] = [];

  for (const { day, record } of series) {
    const support = resolveSupport(day, observations, cfg.remote_sensing);
    const qc = classifyQC(support, cfg.remote_sensing.max_age_days, cfg.canopy);

    // The canopy counter runs over the whole data range, not only the report range.
    const g = stepGating(gating, { date: record.date, canopy_ready: qc.canopy_ready }, cfg.gating);
    gating = g.state;

    if (!inRange(record.date, resolved.report)) continue;

    const status: DayStatusV1 = {
      date: record.date,
      rs_support: support.rs_support,
      rs_age: support.rs_age,
      rs_support_date: support.rs_support_date,
      skip_reason: qc.skip_reason,
      canopy_ready: qc.canopy_ready,
      in_season: g.decision.in_season,
      canopy_obs_count: g.decision.canopy_obs_count,
      gating_ok: g.decision.gating_ok,
      allow_alert: qc.skip_reason === "ok" && g.decision.gating_ok,
    };
    days.push(status);

    const full: RuleInput = { weather: record.weather, indices: support.indices };
    const weatherOnly: RuleInput = { weather: record.weather, indices: {} };
    const qcOk = qc.skip_reason === "ok";

    const outcomes: CategoryOutcomes = {};
    for (const category of cfg.categories) {
      // Untrustworthy support never reaches an index-independent rule.
      const input = qcOk || !isIndexIndependent(category, cfg.rules) ? full : weatherOnly;
      outcomes[category] = evaluateCategory(category, input, cfg.rules);
    }

    const assembled = assembleDay(status, outcomes, cfg);
    if (assembled.raw) raw_alerts.push(assembled.raw);
    if (assembled.gated) gated_alerts.push(assembled.gated);
  }

  const singles = mergeCategoryRuns(gated_alerts, cfg.merge.merge_gap_days);
  const events = scoreEvents(mergeComposites(singles, cfg.merge.merge_gap_days, cfg.categories));

  return {
    ranges: resolved,
    days,
    raw_alerts,
    gated_alerts,
    events,
    summary: buildStageSummary({ days, raw: raw_alerts, gated: gated_alerts, events }),
  };
}
