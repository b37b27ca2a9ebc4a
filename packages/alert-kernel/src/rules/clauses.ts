// Evidence clauses.
//
// Comparison operators are fixed across the engine: deficits use strict "<",
// excesses use strict ">", so a value equal to its threshold never contributes.
//
// Clause shape: `<label>=<value><unit> <op> [<tier> ]<threshold><unit>`

import { isPresent } from "@cropwatch/contracts";
import type { IndexName, Reading, RuleMetricV1, WeatherField } from "@cropwatch/contracts";

import type { RuleOutcome } from "./types";

type VariableFormat = { label: string; digits: number; unit: string };

const FORMATS: Record<IndexName | WeatherField, VariableFormat> = {
  ndvi: { label: "NDVI", digits: 3, unit: "" },
  evi: { label: "EVI", digits: 3, unit: "" },
  ndmi: { label: "NDMI", digits: 3, unit: "" },
  msi: { label: "MSI", digits: 3, unit: "" },
  ndre: { label: "NDRE", digits: 3, unit: "" },
  gndvi: { label: "GNDVI", digits: 3, unit: "" },
  tmean_7d: { label: "tmean_7d", digits: 1, unit: "°C" },
  tmin_7d: { label: "tmin_7d", digits: 1, unit: "°C" },
  tmax_7d: { label: "tmax_7d", digits: 1, unit: "°C" },
  precip_7d: { label: "precip_7d", digits: 1, unit: "mm" },
  precip_1d: { label: "precip_1d", digits: 1, unit: "mm" },
  rh_mean: { label: "RH", digits: 0, unit: "%" },
};

export type Comparator = "<" | ">";

export function formatClause(
  variable: IndexName | WeatherField,
  value: number,
  op: Comparator,
  threshold: number,
  tier?: string
): string {
  const f = FORMATS[variable];
  const t = tier ? `${tier} ` : "";
  return `${f.label}=${value.toFixed(f.digits)}${f.unit} ${op} ${t}${threshold}${f.unit}`;
}

export type Clause = {
  text: string;
  metric: RuleMetricV1;
};

/**
 * Returns the clause when `value op threshold` holds, else null.
 * Missing values and switched-off thresholds (null) never hold.
 */
export function check(
  variable: IndexName | WeatherField,
  value: Reading,
  op: Comparator,
  threshold: number | null,
  tier?: string
): Clause | null {
  if (!isPresent(value) || threshold === null) return null;
  const holds = op === "<" ? value < threshold : value > threshold;
  if (!holds) return null;
  return { text: formatClause(variable, value, op, threshold, tier), metric: { metric: variable, value, threshold } };
}

// `peak` is the clause whose reading stands for the day's severity.
export function triggered(clauses: ReadonlyArray<Clause | null>, peak: Clause): RuleOutcome {
  const parts = clauses.filter((c): c is Clause => c !== null).map((c) => c.text);
  return { triggered: true, reason: parts.join(" & "), metric: peak.metric };
}
