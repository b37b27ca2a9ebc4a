// Rule Evaluator - category table.
//
// Categories are a fixed enumerated set; each maps to a pure function with the
// same (input, thresholds) -> outcome signature plus the ranking of the metrics
// its clauses can qualify on.

import type { AlertCategory, IndexName, RuleMetricV1, RuleThresholdsV1, WeatherField } from "@cropwatch/contracts";

import { evaluateColdStress } from "./cold_stress";
import { evaluateDrought } from "./drought";
import { evaluateHeatStress } from "./heat_stress";
import { evaluateNutrientOrPest } from "./nutrient_or_pest";
import { evaluateWaterlogging } from "./waterlogging";
import type { PeakDirection, RuleInput, RuleOutcome } from "./types";

export type PeakRank = {
  metric: IndexName | WeatherField;
  direction: PeakDirection;
};

export type RuleDefinition<C extends AlertCategory> = {
  // Primary metric first; an earlier metric outranks any value of a later one.
  peaks: readonly PeakRank[];
  evaluate: (input: RuleInput, thresholds: RuleThresholdsV1[C]) => RuleOutcome;
};

type RuleTable = { [C in AlertCategory]: RuleDefinition<C> };

export const RULES: RuleTable = {
  drought: {
    peaks: [
      { metric: "ndmi", direction: "min" },
      { metric: "msi", direction: "max" },
      { metric: "precip_7d", direction: "min" },
    ],
    evaluate: evaluateDrought,
  },
  waterlogging: {
    peaks: [
      { metric: "precip_7d", direction: "max" },
      { metric: "precip_1d", direction: "max" },
    ],
    evaluate: evaluateWaterlogging,
  },
  heat_stress: {
    peaks: [
      { metric: "tmean_7d", direction: "max" },
      { metric: "tmax_7d", direction: "max" },
    ],
    evaluate: evaluateHeatStress,
  },
  cold_stress: {
    peaks: [
      { metric: "tmean_7d", direction: "min" },
      { metric: "tmin_7d", direction: "min" },
    ],
    evaluate: evaluateColdStress,
  },
  nutrient_or_pest: {
    peaks: [
      { metric: "ndre", direction: "min" },
      { metric: "gndvi", direction: "min" },
      { metric: "evi", direction: "min" },
    ],
    evaluate: evaluateNutrientOrPest,
  },
};

export function evaluateCategory<C extends AlertCategory>(
  category: C,
  input: RuleInput,
  thresholds: RuleThresholdsV1
): RuleOutcome {
  const rule: RuleDefinition<C> = RULES[category];
  return rule.evaluate(input, thresholds[category]);
}

export function isIndexIndependent(category: AlertCategory, thresholds: RuleThresholdsV1): boolean {
  return thresholds[category].index_independent;
}

export function isMoreExtreme(direction: PeakDirection, candidate: number, current: number): boolean {
  return direction === "min" ? candidate < current : candidate > current;
}

function peakRank(category: AlertCategory, metric: string): { rank: number; direction: PeakDirection } {
  const peaks = RULES[category].peaks;
  const rank = peaks.findIndex((p) => p.metric === metric);
  return rank < 0 ? { rank: peaks.length, direction: "max" } : { rank, direction: peaks[rank].direction };
}

/**
 * True when `candidate` should replace `current` as the category's peak:
 * a higher-ranked metric wins, the same metric compares by its direction.
 * Ties keep `current`.
 */
export function isStrongerPeak(category: AlertCategory, candidate: RuleMetricV1, current: RuleMetricV1 | null): boolean {
  if (!current) return true;
  const a = peakRank(category, candidate.metric);
  const b = peakRank(category, current.metric);
  if (a.rank !== b.rank) return a.rank < b.rank;
  return isMoreExtreme(a.direction, candidate.value, current.value);
}
