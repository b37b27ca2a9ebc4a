// Heat stress: a hot week, optionally dry air, and (unless index-independent)
// a weakened canopy as confirmation. A day without humidity data is not held
// back by the dry-air condition.

import { isPresent, type HeatStressThresholds } from "@cropwatch/contracts";

import { check, triggered, type Clause } from "./clauses";
import { NOT_TRIGGERED, type RuleInput, type RuleOutcome } from "./types";

export function evaluateHeatStress(r: RuleInput, t: HeatStressThresholds): RuleOutcome {
  const { tmean_7d, tmax_7d, rh_mean } = r.weather;

  const hot = check("tmean_7d", tmean_7d, ">", t.tmean_min_c) ?? check("tmax_7d", tmax_7d, ">", t.tmax_min_c);
  if (!hot) return NOT_TRIGGERED;

  let dry: Clause | null = null;
  if (t.rh_max_pct !== null && isPresent(rh_mean)) {
    dry = check("rh_mean", rh_mean, "<", t.rh_max_pct);
    if (!dry) return NOT_TRIGGERED;
  }

  let canopy: Clause | null = null;
  if (!t.index_independent) {
    canopy = check("evi", r.indices.evi, "<", t.evi_max);
    if (!canopy) return NOT_TRIGGERED;
  }

  return triggered([hot, dry, canopy], hot);
}
