// Event Merger - cross-category composite pass.
//
// Events sorted by start are clustered while start - cluster_end - 1 <= merge_gap_days.
// A cluster spanning >= 2 distinct categories becomes one composite event and its
// members leave the output; single-category clusters pass through unchanged.

import type { AlertCategory, EventV1, PeakMetricV1 } from "@cropwatch/contracts";

import { fromDayNumber, toDayNumber } from "../dates";
import { OrderingViolationError } from "../errors";
import { isStrongerPeak } from "../rules/rule_table";
import { withinGap } from "./event_merger";

function typeRank(order: readonly AlertCategory[], ev: EventV1): number {
  if (ev.event_type === "composite") return order.length;
  const i = order.indexOf(ev.event_type);
  return i === -1 ? order.length : i;
}

function categoryRank(order: readonly AlertCategory[], c: AlertCategory): number {
  const i = order.indexOf(c);
  return i === -1 ? order.length : i;
}

export function sortEvents(events: readonly EventV1[], order: readonly AlertCategory[]): EventV1[] {
  return [...events].sort((a, b) => {
    if (a.start_date !== b.start_date) return a.start_date < b.start_date ? -1 : 1;
    if (a.end_date !== b.end_date) return a.end_date < b.end_date ? -1 : 1;
    return typeRank(order, a) - typeRank(order, b);
  });
}

function assertSpan(ev: EventV1): void {
  if (ev.end_date < ev.start_date) {
    throw new OrderingViolationError("event end precedes start", [ev.start_date, ev.end_date]);
  }
}

function prefixedReasons(ev: EventV1): string[] {
  if (ev.event_type === "composite") return ev.reason_union;
  const type = ev.event_type;
  return ev.reason_union.length ? ev.reason_union.map((r) => `${type}: ${r}`) : [`${type}`];
}

function leadCategory(ev: EventV1, order: readonly AlertCategory[]): AlertCategory | null {
  if (ev.event_type !== "composite") return ev.event_type;
  const sorted = [...ev.member_types].sort((a, b) => categoryRank(order, a) - categoryRank(order, b));
  return sorted[0] ?? null;
}

function buildComposite(members: readonly EventV1[], order: readonly AlertCategory[]): EventV1 {
  let startDay = Number.POSITIVE_INFINITY;
  let endDay = Number.NEGATIVE_INFINITY;
  const reasons: string[] = [];
  const dates = new Set<string>();
  const types = new Set<AlertCategory>();

  for (const m of members) {
    startDay = Math.min(startDay, toDayNumber(m.start_date));
    endDay = Math.max(endDay, toDayNumber(m.end_date));
    for (const r of prefixedReasons(m)) if (!reasons.includes(r)) reasons.push(r);
    for (const d of m.member_dates) dates.add(d);
    for (const t of m.member_types) types.add(t);
  }

  // Peak of the member whose lead category is declared first; earlier members win ties.
  let peak: PeakMetricV1 | null = null;
  let peakRank = Number.POSITIVE_INFINITY;
  for (const m of members) {
    const lead = leadCategory(m, order);
    if (lead === null || m.peak_metric === null) continue;
    const rank = categoryRank(order, lead);
    if (rank < peakRank) {
      peak = m.peak_metric;
      peakRank = rank;
    }
  }

  return {
    event_type: "composite",
    start_date: fromDayNumber(startDay),
    end_date: fromDayNumber(endDay),
    duration_days: endDay - startDay + 1,
    peak_metric: peak,
    reason_union: reasons,
    member_dates: Array.from(dates).sort(),
    member_types: Array.from(types).sort((a, b) => categoryRank(order, a) - categoryRank(order, b)),
  };
}

export function mergeComposites(events: readonly EventV1[], gapDays: number, order: readonly AlertCategory[]): EventV1[] {
  for (const ev of events) assertSpan(ev);
  const sorted = sortEvents(events, order);

  const clusters: EventV1[][] = [];
  let current: EventV1[] = [];
  let clusterEnd = Number.NEGATIVE_INFINITY;
  for (const ev of sorted) {
    const s = toDayNumber(ev.start_date);
    if (current.length && !withinGap(clusterEnd, s, gapDays)) {
      clusters.push(current);
      current = [];
      clusterEnd = Number.NEGATIVE_INFINITY;
    }
    current.push(ev);
    clusterEnd = Math.max(clusterEnd, toDayNumber(ev.end_date));
  }
  if (current.length) clusters.push(current);

  const out: EventV1[] = [];
  for (const cluster of clusters) {
    const distinct = new Set(cluster.flatMap((e) => e.member_types));
    if (distinct.size < 2 || cluster.length === 1) {
      out.push(...cluster);
      continue;
    }
    out.push(buildComposite(cluster, order));
  }
  return sortEvents(out, order);
}

function mergeSameCategory(a: EventV1, b: EventV1, category: AlertCategory): EventV1 {
  const startDay = Math.min(toDayNumber(a.start_date), toDayNumber(b.start_date));
  const endDay = Math.max(toDayNumber(a.end_date), toDayNumber(b.end_date));

  let peak = a.peak_metric;
  if (b.peak_metric && isStrongerPeak(category, b.peak_metric, peak)) peak = b.peak_metric;

  const reasons = [...a.reason_union];
  for (const r of b.reason_union) if (!reasons.includes(r)) reasons.push(r);

  return {
    event_type: category,
    start_date: fromDayNumber(startDay),
    end_date: fromDayNumber(endDay),
    duration_days: endDay - startDay + 1,
    peak_metric: peak,
    reason_union: reasons,
    member_dates: Array.from(new Set([...a.member_dates, ...b.member_dates])).sort(),
    member_types: [category],
  };
}

/**
 * Re-applies the merge to an already merged event stream: same-category spans
 * within the gap are joined, then composites are clustered. Idempotent.
 */
export function remergeEvents(events: readonly EventV1[], gapDays: number, order: readonly AlertCategory[]): EventV1[] {
  for (const ev of events) assertSpan(ev);

  const composites: EventV1[] = [];
  const byCategory = new Map<AlertCategory, EventV1[]>();
  for (const ev of events) {
    if (ev.event_type === "composite") {
      composites.push(ev);
      continue;
    }
    const list = byCategory.get(ev.event_type) ?? [];
    list.push(ev);
    byCategory.set(ev.event_type, list);
  }

  const singles: EventV1[] = [];
  for (const [category, list] of byCategory) {
    let open: EventV1 | null = null;
    for (const ev of sortEvents(list, order)) {
      if (open && withinGap(toDayNumber(open.end_date), toDayNumber(ev.start_date), gapDays)) {
        open = mergeSameCategory(open, ev, category);
        continue;
      }
      if (open) singles.push(open);
      open = ev;
    }
    if (open) singles.push(open);
  }

  return mergeComposites([...singles, ...composites], gapDays, order);
}
