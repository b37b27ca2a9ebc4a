import type { IndexValuesV1, RuleMetricV1, WeatherAggregatesV1 } from "@cropwatch/contracts";

// Effective daily input: the day's weather plus the supporting observation's indices.
export type RuleInput = {
  weather: WeatherAggregatesV1;
  indices: IndexValuesV1;
};

export type RuleOutcome = {
  triggered: boolean;
  reason: string;
  // Reading of the clause that qualified the day.
  metric: RuleMetricV1 | null;
};

export type PeakDirection = "min" | "max";

export const NOT_TRIGGERED: RuleOutcome = { triggered: false, reason: "", metric: null };
