// Cold stress: a cold week together with elevated humidity (frost/mould risk). Both required.

import type { ColdStressThresholds } from "@cropwatch/contracts";

import { check, triggered } from "./clauses";
import { NOT_TRIGGERED, type RuleInput, type RuleOutcome } from "./types";

export function evaluateColdStress(r: RuleInput, t: ColdStressThresholds): RuleOutcome {
  const { tmean_7d, tmin_7d, rh_mean } = r.weather;

  const cold = check("tmean_7d", tmean_7d, "<", t.tmean_max_c) ?? check("tmin_7d", tmin_7d, "<", t.tmin_max_c);
  if (!cold) return NOT_TRIGGERED;

  const humid = check("rh_mean", rh_mean, ">", t.rh_min_pct);
  if (!humid) return NOT_TRIGGERED;

  return triggered([cold, humid], cold);
}
