// Waterlogging: excess rain, inverted counterpart of the drought precipitation deficit.
// Unless index-independent, a saturated canopy (and optionally sparse cover) must confirm.

import type { WaterloggingThresholds } from "@cropwatch/contracts";

import { check, triggered, type Clause } from "./clauses";
import { NOT_TRIGGERED, type RuleInput, type RuleOutcome } from "./types";

export function evaluateWaterlogging(r: RuleInput, t: WaterloggingThresholds): RuleOutcome {
  const { precip_7d, precip_1d } = r.weather;

  const wet = check("precip_7d", precip_7d, ">", t.precip_high_mm) ?? check("precip_1d", precip_1d, ">", t.precip_1d_high_mm);
  if (!wet) return NOT_TRIGGERED;

  if (t.index_independent) return triggered([wet], wet);

  const saturated = check("ndmi", r.indices.ndmi, ">", t.ndmi_wet_min, "wet");
  if (!saturated) return NOT_TRIGGERED;

  let sparse: Clause | null = null;
  if (t.ndvi_max !== null) {
    sparse = check("ndvi", r.indices.ndvi, "<", t.ndvi_max);
    if (!sparse) return NOT_TRIGGERED;
  }

  return triggered([wet, saturated, sparse], wet);
}
