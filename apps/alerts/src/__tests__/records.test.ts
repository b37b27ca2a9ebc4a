import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { toDailyRecord, toDailyRecords } from "../records";

describe("toDailyRecord", () => {
  it("maps fused columns and treats blanks as missing", () => {
    const r = toDailyRecord({ date: "2024-06-01", tmean_7d: "3.10", rh_mean: 88, precip_1d: "", ndvi: 0.52, evi: Number.NaN, region_id: "x" });
    assert.deepEqual(r, {
      date: "2024-06-01",
      weather: { tmean_7d: 3.1, tmin_7d: null, tmax_7d: null, precip_7d: null, precip_1d: null, rh_mean: 88 },
      indices: { ndvi: 0.52, evi: null, ndmi: null, msi: null, ndre: null, gndvi: null },
    });
  });

  it("accepts Date values and timestamps", () => {
    assert.equal(toDailyRecord({ date: new Date("2024-06-03T00:00:00Z") }).date, "2024-06-03");
    assert.equal(toDailyRecord({ date: "2024-06-04T00:00:00.000Z" }).date, "2024-06-04");
  });

  it("refuses a row without a calendar date", () => {
    assert.throws(() => toDailyRecord({ date: "2024-13-01" }), { message: "invalid date in daily row 0: 2024-13-01" });
    assert.throws(() => toDailyRecord({}), { message: "invalid date in daily row 0: undefined" });
  });
});

describe("toDailyRecords", () => {
  it("keeps row order and names the failing row", () => {
    assert.deepEqual(
      toDailyRecords([{ date: "2024-06-02" }, { date: "2024-06-01" }]).map((r) => r.date),
      ["2024-06-02", "2024-06-01"]
    );
    assert.throws(() => toDailyRecords([{ date: "2024-06-01" }, { date: "nope" }]), { message: "invalid date in daily row 1: nope" });
  });
});
