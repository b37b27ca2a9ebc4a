// Nutrient deficiency or pest/disease: chlorophyll and vigour index deficits,
// any `min_deficits` of the configured ones suffice. High humidity corroborates
// (favours disease) and becomes mandatory with require_humidity. The optional
// moisture guard leaves days with a dry canopy (low NDMI or high MSI) to drought.

import type { NutrientOrPestThresholds } from "@cropwatch/contracts";

import { check, triggered, type Clause } from "./clauses";
import { NOT_TRIGGERED, type RuleInput, type RuleOutcome } from "./types";

const DEFICIT_ORDER = ["ndre", "gndvi", "evi"] as const;

export function evaluateNutrientOrPest(r: RuleInput, t: NutrientOrPestThresholds): RuleOutcome {
  const { ndre, gndvi, evi, ndmi, msi } = r.indices;

  if (check("ndmi", ndmi, "<", t.moisture_guard_ndmi) || check("msi", msi, ">", t.moisture_guard_msi)) {
    return NOT_TRIGGERED;
  }

  const deficits: Clause[] = [];
  for (const name of DEFICIT_ORDER) {
    if (!t.deficit_indices.includes(name)) continue;
    let clause: Clause | null;
    if (name === "ndre") {
      clause = check("ndre", ndre, "<", t.ndre_strong_max, "strong") ?? check("ndre", ndre, "<", t.ndre_max);
    } else if (name === "gndvi") {
      clause = check("gndvi", gndvi, "<", t.gndvi_max);
    } else {
      clause = check("evi", evi, "<", t.evi_max);
    }
    if (clause) deficits.push(clause);
  }
  const [lead] = deficits;
  if (!lead || deficits.length < t.min_deficits) return NOT_TRIGGERED;

  const humid = check("rh_mean", r.weather.rh_mean, ">", t.rh_corroborate_pct);
  if (t.require_humidity && !humid) return NOT_TRIGGERED;

  return triggered([...deficits, humid], lead);
}
