// packages/contracts/src/schema/event_v1.ts
import type { AlertCategory } from "./alert_v1";

export type EventTypeV1 = AlertCategory | "composite";

export type PeakMetricV1 = {
  metric: string;
  value: number;
  threshold: number;
  date: string;
};

export type EventV1 = {
  event_type: EventTypeV1;
  start_date: string;
  end_date: string; // inclusive
  duration_days: number;
  peak_metric: PeakMetricV1 | null;
  reason_union: string[];
  member_dates: string[];
  member_types: AlertCategory[];
};

export type SeverityLevelV1 = "minor" | "moderate" | "major";

export type ScoredEventV1 = EventV1 & {
  severity_score: number;
  severity_level: SeverityLevelV1;
};
