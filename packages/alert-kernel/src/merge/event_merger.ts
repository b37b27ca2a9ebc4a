// Event Merger - per-category runs.
//
// idle -> open(start=d, end=d) -> open(end=d') | close(emit)
// d' extends the open event when the silent days between them (d' - end - 1)
// do not exceed merge_gap_days. Input must be strictly ascending.

import type { AlertCategory, DailyAlertV1, EventV1, PeakMetricV1, RuleMetricV1 } from "@cropwatch/contracts";

import { toDayNumber } from "../dates";
import { OrderingViolationError } from "../errors";
import { isStrongerPeak } from "../rules/rule_table";

type OpenEvent = {
  category: AlertCategory;
  start: string;
  startDay: number;
  end: string;
  endDay: number;
  reasons: string[];
  dates: string[];
  peak: PeakMetricV1 | null;
};

export type MergerState = {
  open: Map<AlertCategory, OpenEvent>;
  emitted: EventV1[];
  lastDate: string | null;
  lastDay: number | null;
};

export function initialMergerState(): MergerState {
  return { open: new Map(), emitted: [], lastDate: null, lastDay: null };
}

export function withinGap(prevEndDay: number, nextStartDay: number, gapDays: number): boolean {
  return nextStartDay - prevEndDay - 1 <= gapDays;
}

function nextPeak(category: AlertCategory, current: PeakMetricV1 | null, date: string, m: RuleMetricV1 | null): PeakMetricV1 | null {
  if (m === null || !isStrongerPeak(category, m, current)) return current;
  return { metric: m.metric, value: m.value, threshold: m.threshold, date };
}

function closeEvent(ev: OpenEvent): EventV1 {
  if (ev.endDay < ev.startDay) {
    throw new OrderingViolationError("event end precedes start", [ev.start, ev.end]);
  }
  return {
    event_type: ev.category,
    start_date: ev.start,
    end_date: ev.end,
    duration_days: ev.endDay - ev.startDay + 1,
    peak_metric: ev.peak,
    reason_union: [...ev.reasons],
    member_dates: [...ev.dates],
    member_types: [ev.category],
  };
}

export function stepMerger(state: MergerState, alert: DailyAlertV1, gapDays: number): MergerState {
  const day = toDayNumber(alert.date);
  if (state.lastDay !== null && state.lastDate !== null && day <= state.lastDay) {
    const what = day === state.lastDay ? "duplicate date" : "non-monotonic date";
    throw new OrderingViolationError(what, [state.lastDate, alert.date]);
  }

  for (const hit of alert.hits) {
    const open = state.open.get(hit.category);

    if (open && withinGap(open.endDay, day, gapDays)) {
      open.end = alert.date;
      open.endDay = day;
      open.dates.push(alert.date);
      if (hit.reason && !open.reasons.includes(hit.reason)) open.reasons.push(hit.reason);
      open.peak = nextPeak(hit.category, open.peak, alert.date, hit.metric);
      continue;
    }

    if (open) state.emitted.push(closeEvent(open));
    state.open.set(hit.category, {
      category: hit.category,
      start: alert.date,
      startDay: day,
      end: alert.date,
      endDay: day,
      reasons: hit.reason ? [hit.reason] : [],
      dates: [alert.date],
      peak: nextPeak(hit.category, null, alert.date, hit.metric),
    });
  }

  state.lastDate = alert.date;
  state.lastDay = day;
  return state;
}

export function finishMerger(state: MergerState): EventV1[] {
  for (const open of state.open.values()) state.emitted.push(closeEvent(open));
  state.open.clear();
  return state.emitted;
}

/** Merges a gated alert stream into single-category events. */
export function mergeCategoryRuns(alerts: readonly DailyAlertV1[], gapDays: number): EventV1[] {
  let state = initialMergerState();
  for (const a of alerts) state = stepMerger(state, a, gapDays);
  return finishMerger(state);
}
