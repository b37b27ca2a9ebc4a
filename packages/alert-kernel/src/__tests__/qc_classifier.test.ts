import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { classifyQC, isCanopyReliable } from "../qc/qc_classifier";
import type { SupportStatus } from "../support/support_window";

const canopy = { ndvi_min: 0.35, evi_min: 0.2 };

function supported(age: number, ndvi: number | null, evi: number | null): SupportStatus {
  return { rs_support: true, rs_age: age, rs_support_date: "2024-06-01", indices: { ndvi, evi } };
}

describe("qc classifier", () => {
  it("reports no_remote_sensing without support", () => {
    const none: SupportStatus = { rs_support: false, rs_age: null, rs_support_date: null, indices: {} };
    assert.deepEqual(classifyQC(none, 3, canopy), { skip_reason: "no_remote_sensing", canopy_ready: false });
  });

  it("reports stale before looking at the canopy", () => {
    assert.deepEqual(classifyQC(supported(4, 0.9, 0.9), 3, canopy), { skip_reason: "stale", canopy_ready: false });
  });

  it("accepts an age equal to max_age_days", () => {
    assert.equal(classifyQC(supported(3, 0.6, null), 3, canopy).skip_reason, "ok");
  });

  it("reports low canopy confidence when both indices are below their bar", () => {
    assert.deepEqual(classifyQC(supported(0, 0.2, 0.1), 3, canopy), {
      skip_reason: "low_canopy_confidence",
      canopy_ready: false,
    });
  });

  it("treats a value equal to the canopy bar as reliable", () => {
    assert.equal(isCanopyReliable({ ndvi: 0.35 }, canopy), true);
    assert.equal(isCanopyReliable({ ndvi: 0.1, evi: 0.2 }, canopy), true);
    assert.equal(isCanopyReliable({ ndvi: 0.349, evi: null }, canopy), false);
  });

  it("marks an ok day canopy ready", () => {
    assert.deepEqual(classifyQC(supported(1, null, 0.3), 3, canopy), { skip_reason: "ok", canopy_ready: true });
  });
});
