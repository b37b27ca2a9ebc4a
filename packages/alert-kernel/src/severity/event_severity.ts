// Event Severity - post-merge scoring, relative to the run.
//
// score = 0.5 * depth + 0.3 * duration + 0.2 * density, clipped to [0, 1]
//   depth:    peak exceedance |value - threshold| over the largest exceedance
//             among the run's events peaking on the same metric
//   duration: duration_days over the run's longest event
//   density:  member days over duration_days
//
// Levels: score <= 0.4 minor, <= 0.7 moderate, above that major.

import type { EventV1, ScoredEventV1, SeverityLevelV1 } from "@cropwatch/contracts";

export const SEVERITY_WEIGHTS = { depth: 0.5, duration: 0.3, density: 0.2 } as const;
export const SEVERITY_BINS = { moderate_above: 0.4, major_above: 0.7 } as const;

function exceedance(ev: EventV1): number {
  return ev.peak_metric ? Math.abs(ev.peak_metric.value - ev.peak_metric.threshold) : 0;
}

function ratio(value: number, max: number): number {
  return max > 0 ? value / max : 0;
}

export function severityLevel(score: number): SeverityLevelV1 {
  if (score > SEVERITY_BINS.major_above) return "major";
  if (score > SEVERITY_BINS.moderate_above) return "moderate";
  return "minor";
}

export function scoreEvents(events: readonly EventV1[]): ScoredEventV1[] {
  const maxDepth = new Map<string, number>();
  let maxDuration = 0;
  for (const ev of events) {
    maxDuration = Math.max(maxDuration, ev.duration_days);
    if (!ev.peak_metric) continue;
    const key = ev.peak_metric.metric;
    maxDepth.set(key, Math.max(maxDepth.get(key) ?? 0, exceedance(ev)));
  }

  return events.map((ev) => {
    const depth = ev.peak_metric ? ratio(exceedance(ev), maxDepth.get(ev.peak_metric.metric) ?? 0) : 0;
    const duration = ratio(ev.duration_days, maxDuration);
    const density = ratio(ev.member_dates.length, ev.duration_days);

    const raw =
      SEVERITY_WEIGHTS.depth * depth + SEVERITY_WEIGHTS.duration * duration + SEVERITY_WEIGHTS.density * density;
    const severity_score = Math.round(Math.min(1, Math.max(0, raw)) * 1000) / 1000;
    return { ...ev, severity_score, severity_level: severityLevel(severity_score) };
  });
}
