// Support Window Resolver
//
// For date d, picks the nearest date carrying a usable remote-sensing observation
// inside [d-w, d+w] (symmetric) or [d-w, d] (past_only).
// Equal distance resolves to the earlier date.

import { isPresent } from "@cropwatch/contracts";
import type { DailyRecordV1, IndexName, IndexValuesV1, WindowMode } from "@cropwatch/contracts";

export type SupportObservation = {
  date: string;
  day: number;
  indices: IndexValuesV1;
};

// Keyed by day number.
export type ObservationIndex = ReadonlyMap<number, SupportObservation>;

export type SupportStatus = {
  rs_support: boolean;
  rs_age: number | null;
  rs_support_date: string | null;
  // Index values of the chosen observation; empty when unsupported.
  indices: IndexValuesV1;
};

export type SupportWindowOptions = {
  window_half_days: number;
  window_mode: WindowMode;
};

export function hasObservation(indices: IndexValuesV1, supportIndices: readonly IndexName[]): boolean {
  return supportIndices.some((name) => isPresent(indices[name]));
}

export function buildObservationIndex(
  rows: ReadonlyArray<{ day: number; record: DailyRecordV1 }>,
  supportIndices: readonly IndexName[]
): ObservationIndex {
  const out = new Map<number, SupportObservation>();
  for (const { day, record } of rows) {
    if (!hasObservation(record.indices, supportIndices)) continue;
    out.set(day, { date: record.date, day, indices: record.indices });
  }
  return out;
}

const NO_SUPPORT: SupportStatus = { rs_support: false, rs_age: null, rs_support_date: null, indices: {} };

export function resolveSupport(day: number, observations: ObservationIndex, opts: SupportWindowOptions): SupportStatus {
  const w = Math.max(0, Math.trunc(opts.window_half_days));

  for (let k = 0; k <= w; k++) {
    // Past side first: ties go to the causally available observation.
    const past = observations.get(day - k);
    if (past) return { rs_support: true, rs_age: k, rs_support_date: past.date, indices: past.indices };

    if (k > 0 && opts.window_mode === "symmetric") {
      const future = observations.get(day + k);
      if (future) return { rs_support: true, rs_age: k, rs_support_date: future.date, indices: future.indices };
    }
  }

  return NO_SUPPORT;
}
