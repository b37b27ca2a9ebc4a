// Stage counters over the report range.

import type {
  AlertCategory,
  CategoryCountsV1,
  DailyAlertV1,
  DayStatusV1,
  EventTypeV1,
  EventV1,
  SkipReason,
  StageSummaryV1,
} from "@cropwatch/contracts";

function zeroCounts(): CategoryCountsV1 {
  return { raw_triggers: 0, gated_triggers: 0, events: 0 };
}

export function buildStageSummary(args: {
  days: readonly DayStatusV1[];
  raw: readonly DailyAlertV1[];
  gated: readonly DailyAlertV1[];
  events: readonly EventV1[];
}): StageSummaryV1 {
  const skip_reason: Record<SkipReason, number> = { ok: 0, no_remote_sensing: 0, stale: 0, low_canopy_confidence: 0 };
  const categories: Record<AlertCategory, CategoryCountsV1> = {
    drought: zeroCounts(),
    waterlogging: zeroCounts(),
    heat_stress: zeroCounts(),
    cold_stress: zeroCounts(),
    nutrient_or_pest: zeroCounts(),
  };
  const event_types: Partial<Record<EventTypeV1, number>> = {};

  let rs_support_days = 0;
  let qc_ok_days = 0;
  let gating_ok_days = 0;
  let allow_alert_days = 0;
  for (const d of args.days) {
    skip_reason[d.skip_reason] += 1;
    if (d.rs_support) rs_support_days++;
    if (d.skip_reason === "ok") qc_ok_days++;
    if (d.gating_ok) gating_ok_days++;
    if (d.allow_alert) allow_alert_days++;
  }

  for (const a of args.raw) for (const c of a.categories) categories[c].raw_triggers++;
  for (const a of args.gated) for (const c of a.categories) categories[c].gated_triggers++;

  for (const e of args.events) {
    event_types[e.event_type] = (event_types[e.event_type] ?? 0) + 1;
    if (e.event_type !== "composite") categories[e.event_type].events++;
  }

  return {
    total_days: args.days.length,
    rs_support_days,
    qc_ok_days,
    gating_ok_days,
    allow_alert_days,
    raw_alert_days: args.raw.length,
    gated_alert_days: args.gated.length,
    skip_reason,
    categories,
    event_types,
    events: args.events.length,
  };
}
