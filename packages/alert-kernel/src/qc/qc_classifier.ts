// QC Classifier
//
// Priority: no_remote_sensing > stale > low_canopy_confidence > ok.
// A stale reading is untrustworthy however high it is, so staleness is checked first.

import { isPresent } from "@cropwatch/contracts";
import type { AlertConfigV1, IndexValuesV1, SkipReason } from "@cropwatch/contracts";

import type { SupportStatus } from "../support/support_window";

export type QCResult = {
  skip_reason: SkipReason;
  canopy_ready: boolean;
};

export type CanopyThresholds = AlertConfigV1["canopy"];

// Canopy is reliable when either index clears its bar (inclusive).
export function isCanopyReliable(indices: IndexValuesV1, canopy: CanopyThresholds): boolean {
  const { ndvi, evi } = indices;
  if (isPresent(ndvi) && ndvi >= canopy.ndvi_min) return true;
  if (isPresent(evi) && evi >= canopy.evi_min) return true;
  return false;
}

export function classifyQC(support: SupportStatus, maxAgeDays: number, canopy: CanopyThresholds): QCResult {
  if (!support.rs_support || support.rs_age === null) {
    return { skip_reason: "no_remote_sensing", canopy_ready: false };
  }
  if (support.rs_age > maxAgeDays) {
    return { skip_reason: "stale", canopy_ready: false };
  }
  if (!isCanopyReliable(support.indices, canopy)) {
    return { skip_reason: "low_canopy_confidence", canopy_ready: false };
  }
  return { skip_reason: "ok", canopy_ready: true };
}
