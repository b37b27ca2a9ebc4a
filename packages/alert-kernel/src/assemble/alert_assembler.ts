// Alert Assembler
//
// raw   = triggered AND (qc ok OR category is index-independent)
// gated = raw AND (gating ok OR (index-independent AND gating does not apply to it))
//
// Gating only removes: every gated hit is also a raw hit.

import type { AlertCategory, AlertConfigV1, AlertHitV1, DailyAlertV1, DayStatusV1 } from "@cropwatch/contracts";

import { isIndexIndependent } from "../rules/rule_table";
import type { RuleOutcome } from "../rules/types";

export type CategoryOutcomes = Partial<Record<AlertCategory, RuleOutcome>>;

export type AssembledDay = {
  raw: DailyAlertV1 | null;
  gated: DailyAlertV1 | null;
};

export function alertLabel(categories: readonly AlertCategory[]): string {
  return categories.join("+");
}

function toDailyAlert(date: string, hits: AlertHitV1[]): DailyAlertV1 | null {
  if (!hits.length) return null;
  const categories = hits.map((h) => h.category);
  return { date, categories, label: alertLabel(categories), hits };
}

export function assembleDay(
  status: DayStatusV1,
  outcomes: CategoryOutcomes,
  cfg: Pick<AlertConfigV1, "categories" | "rules" | "gating">
): AssembledDay {
  const qcOk = status.skip_reason === "ok";
  const rawHits: AlertHitV1[] = [];
  const gatedHits: AlertHitV1[] = [];

  // Declared category order drives hit order and the label.
  for (const category of cfg.categories) {
    const o = outcomes[category];
    if (!o || !o.triggered) continue;

    const independent = isIndexIndependent(category, cfg.rules);
    if (!qcOk && !independent) continue;

    const hit: AlertHitV1 = { category, reason: o.reason, metric: o.metric };
    rawHits.push(hit);

    const bypassGating = independent && !cfg.gating.apply_to_index_independent;
    if (status.gating_ok || bypassGating) gatedHits.push(hit);
  }

  return { raw: toDailyAlert(status.date, rawHits), gated: toDailyAlert(status.date, gatedHits) };
}
