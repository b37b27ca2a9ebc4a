// Gating Filter
//
// Eligibility never consults rule outcomes. The canopy_obs counter is a running
// fold over the date-ordered scan; it is lifetime unless reset_on_season_start is set,
// in which case it restarts on the first in-season date after an out-of-season date.

import type { AlertConfigV1 } from "@cropwatch/contracts";

import { monthOf } from "../dates";

export type GatingConfig = AlertConfigV1["gating"];

export type GatingState = {
  canopyObsCount: number;
  prevInSeason: boolean | null;
};

export type GatingDecision = {
  gating_ok: boolean;
  in_season: boolean;
  canopy_obs_count: number;
};

export function initialGatingState(): GatingState {
  return { canopyObsCount: 0, prevInSeason: null };
}

export function isInSeason(date: string, months: readonly number[]): boolean {
  return months.includes(monthOf(date));
}

function isEligible(mode: GatingConfig["mode"], inSeason: boolean, obsOk: boolean): boolean {
  switch (mode) {
    case "off":
      return true;
    case "month_window":
      return inSeason;
    case "canopy_obs":
      return obsOk;
    case "both":
      return inSeason && obsOk;
  }
}

export function stepGating(
  state: GatingState,
  day: { date: string; canopy_ready: boolean },
  cfg: GatingConfig
): { state: GatingState; decision: GatingDecision } {
  const in_season = isInSeason(day.date, cfg.months);

  let count = state.canopyObsCount;
  if (cfg.reset_on_season_start && in_season && state.prevInSeason === false) count = 0;
  if (day.canopy_ready) count += 1;

  const gating_ok = isEligible(cfg.mode, in_season, count >= cfg.canopy_obs_min);

  return {
    state: { canopyObsCount: count, prevInSeason: in_season },
    decision: { gating_ok, in_season, canopy_obs_count: count },
  };
}

export function foldGating(
  days: ReadonlyArray<{ date: string; canopy_ready: boolean }>,
  cfg: GatingConfig
): GatingDecision[] {
  let state = initialGatingState();
  const out: GatingDecision[] = [];
  for (const d of days) {
    const r = stepGating(state, d, cfg);
    state = r.state;
    out.push(r.decision);
  }
  return out;
}
