// Drought: a strong moisture deficit triggers alone; a soft deficit needs a dry week.
// An optional dry-spell tier reads precipitation only.

import type { DroughtThresholds } from "@cropwatch/contracts";

import { check, triggered } from "./clauses";
import { NOT_TRIGGERED, type RuleInput, type RuleOutcome } from "./types";

export function evaluateDrought(r: RuleInput, t: DroughtThresholds): RuleOutcome {
  const { ndmi, msi } = r.indices;
  const precip = r.weather.precip_7d;

  const strong = check("ndmi", ndmi, "<", t.ndmi_strong, "strong") ?? check("msi", msi, ">", t.msi_strong, "strong");
  if (strong) return triggered([strong], strong);

  const dry = check("precip_7d", precip, "<", t.precip_low_mm);
  if (dry) {
    const soft = check("ndmi", ndmi, "<", t.ndmi_soft, "soft") ?? check("msi", msi, ">", t.msi_soft, "soft");
    if (soft) return triggered([soft, dry], soft);
  }

  const drySpell = check("precip_7d", precip, "<", t.precip_only_mm, "dry-spell");
  if (drySpell) return triggered([drySpell], drySpell);

  return NOT_TRIGGERED;
}
