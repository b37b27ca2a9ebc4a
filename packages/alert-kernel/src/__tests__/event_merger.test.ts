import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { AlertCategory, DailyAlertV1, EventV1, RuleMetricV1 } from "@cropwatch/contracts";
import { ALERT_CATEGORIES } from "@cropwatch/contracts";

import { OrderingViolationError } from "../errors";
import { mergeComposites, remergeEvents } from "../merge/composite_merger";
import { mergeCategoryRuns, withinGap } from "../merge/event_merger";

const ORDER = ALERT_CATEGORIES;

const THRESHOLD: Record<AlertCategory, number> = {
  drought: 0.25,
  waterlogging: 40,
  heat_stress: 30,
  cold_stress: 5,
  nutrient_or_pest: 0.28,
};
const METRIC: Record<AlertCategory, string> = {
  drought: "ndmi",
  waterlogging: "precip_7d",
  heat_stress: "tmean_7d",
  cold_stress: "tmean_7d",
  nutrient_or_pest: "ndre",
};

type Hit = [AlertCategory, string, number | RuleMetricV1 | null];

// A bare number is a reading of the category's primary metric.
function metricFor(category: AlertCategory, m: Hit[2]): RuleMetricV1 | null {
  if (typeof m === "number") return { metric: METRIC[category], value: m, threshold: THRESHOLD[category] };
  return m;
}

function alert(date: string, hits: Hit[]): DailyAlertV1 {
  const categories = hits.map(([c]) => c);
  return {
    date,
    categories,
    label: categories.join("+"),
    hits: hits.map(([category, reason, m]) => ({ category, reason, metric: metricFor(category, m) })),
  };
}

function merge(alerts: DailyAlertV1[], gap: number) {
  return mergeComposites(mergeCategoryRuns(alerts, gap), gap, ORDER);
}

describe("per-category runs", () => {
  it("joins three consecutive drought days into one event", () => {
    const events = mergeCategoryRuns(
      [
        alert("2024-06-10", [["drought", "d1", 0.2]]),
        alert("2024-06-11", [["drought", "d2", 0.18]]),
        alert("2024-06-12", [["drought", "d1", 0.21]]),
      ],
      0
    );
    assert.deepEqual(events, [
      {
        event_type: "drought",
        start_date: "2024-06-10",
        end_date: "2024-06-12",
        duration_days: 3,
        peak_metric: { metric: "ndmi", value: 0.18, threshold: 0.25, date: "2024-06-11" },
        reason_union: ["d1", "d2"],
        member_dates: ["2024-06-10", "2024-06-11", "2024-06-12"],
        member_types: ["drought"],
      },
    ]);
  });

  it("bridges silent days up to merge_gap_days", () => {
    const alerts = [alert("2024-06-10", [["cold_stress", "c", 3]]), alert("2024-06-12", [["cold_stress", "c", 2]])];
    assert.equal(mergeCategoryRuns(alerts, 0).length, 2);

    const [ev] = mergeCategoryRuns(alerts, 1);
    assert.equal(ev?.duration_days, 3);
    assert.deepEqual(ev?.member_dates, ["2024-06-10", "2024-06-12"]);
    assert.deepEqual(ev?.peak_metric, { metric: "tmean_7d", value: 2, threshold: 5, date: "2024-06-12" });
  });

  it("keeps the earlier date when the peak value ties", () => {
    const [ev] = mergeCategoryRuns(
      [alert("2024-06-10", [["waterlogging", "w", 50]]), alert("2024-06-11", [["waterlogging", "w", 50]])],
      0
    );
    assert.equal(ev?.peak_metric?.date, "2024-06-10");
  });

  it("leaves peak_metric null when no member carries a value", () => {
    const [ev] = mergeCategoryRuns([alert("2024-06-10", [["drought", "d", null]])], 0);
    assert.equal(ev?.peak_metric, null);
  });

  it("a primary-metric day outranks a more extreme secondary reading", () => {
    const msi = { metric: "msi", value: 1.6, threshold: 1.2 };
    const [ev] = mergeCategoryRuns(
      [alert("2024-06-10", [["drought", "MSI", msi]]), alert("2024-06-11", [["drought", "NDMI", 0.2]])],
      0
    );
    assert.deepEqual(ev?.peak_metric, { metric: "ndmi", value: 0.2, threshold: 0.25, date: "2024-06-11" });

    const [msiOnly] = mergeCategoryRuns([alert("2024-06-10", [["drought", "MSI", msi]])], 0);
    assert.deepEqual(msiOnly?.peak_metric, { ...msi, date: "2024-06-10" });
  });

  it("rejects duplicate dates", () => {
    assert.throws(
      () => mergeCategoryRuns([alert("2024-06-10", [["drought", "d", 0.2]]), alert("2024-06-10", [["drought", "d", 0.2]])], 0),
      (err: unknown) =>
        err instanceof OrderingViolationError && err.message === "ORDERING_VIOLATION: duplicate date @ 2024-06-10,2024-06-10"
    );
  });

  it("rejects dates going backwards", () => {
    assert.throws(
      () => mergeCategoryRuns([alert("2024-06-11", []), alert("2024-06-10", [])], 0),
      (err: unknown) => err instanceof OrderingViolationError && err.dates.join(",") === "2024-06-11,2024-06-10"
    );
  });

  it("counts silent days between end and next start", () => {
    assert.equal(withinGap(10, 11, 0), true);
    assert.equal(withinGap(10, 12, 0), false);
    assert.equal(withinGap(10, 12, 1), true);
  });
});

describe("composite events", () => {
  const alerts = [
    alert("2024-06-10", [["drought", "dry", 0.2]]),
    alert("2024-06-11", [
      ["drought", "dry", 0.17],
      ["cold_stress", "cold", 3],
    ]),
    alert("2024-06-12", [
      ["drought", "dry", 0.19],
      ["cold_stress", "cold", 2],
    ]),
    alert("2024-06-13", [["cold_stress", "cold", 4]]),
  ];

  it("overlapping drought and cold_stress events become one composite", () => {
    assert.deepEqual(merge(alerts, 0), [
      {
        event_type: "composite",
        start_date: "2024-06-10",
        end_date: "2024-06-13",
        duration_days: 4,
        peak_metric: { metric: "ndmi", value: 0.17, threshold: 0.25, date: "2024-06-11" },
        reason_union: ["drought: dry", "cold_stress: cold"],
        member_dates: ["2024-06-10", "2024-06-11", "2024-06-12", "2024-06-13"],
        member_types: ["drought", "cold_stress"],
      },
    ]);
  });

  it("leaves distant events of different categories separate", () => {
    const events = merge([alert("2024-06-01", [["heat_stress", "h", 31]]), alert("2024-06-05", [["drought", "d", 0.2]])], 2);
    assert.deepEqual(
      events.map((e) => e.event_type),
      ["heat_stress", "drought"]
    );
  });

  it("clusters across a gap no wider than merge_gap_days", () => {
    const spaced = [alert("2024-06-01", [["heat_stress", "h", 31]]), alert("2024-06-04", [["drought", "d", 0.2]])];
    assert.equal(merge(spaced, 1).length, 2);
    const [composite] = merge(spaced, 2);
    assert.equal(composite?.event_type, "composite");
    assert.deepEqual(composite?.member_dates, ["2024-06-01", "2024-06-04"]);
    assert.equal(composite?.duration_days, 4);
  });

  it("re-merging merged events changes nothing", () => {
    for (const gap of [0, 1, 3]) {
      const once = merge(alerts, gap);
      assert.deepEqual(remergeEvents(once, gap, ORDER), once);
    }
  });

  const sparse = [
    alert("2024-06-01", [["drought", "d", 0.2]]),
    alert("2024-06-03", [["drought", "d", 0.2]]),
    alert("2024-06-06", [["cold_stress", "c", 2]]),
    alert("2024-06-10", [["drought", "d", 0.2]]),
  ];

  it("a wider gap never yields more events", () => {
    let previous = Number.POSITIVE_INFINITY;
    for (const gap of [0, 1, 2, 3, 4]) {
      const n = merge(sparse, gap).length;
      assert.ok(n <= previous, `gap ${gap} produced ${n} events after ${previous}`);
      previous = n;
    }
  });

  it("a composite never coexists with its members", () => {
    const events = merge(alerts, 0);
    for (const e of events.filter((x) => x.event_type === "composite")) {
      const overlapping = events.filter(
        (x) => x !== e && x.event_type !== "composite" && x.start_date <= e.end_date && x.end_date >= e.start_date
      );
      assert.deepEqual(overlapping, []);
    }
  });

  it("member days sharing an event keep sharing one at every wider gap", () => {
    const owner = (events: EventV1[]) => {
      const m = new Map<string, number>();
      events.forEach((e, i) => e.member_dates.forEach((d) => m.set(d, i)));
      return m;
    };
    let previous = owner(merge(sparse, 0));
    for (const gap of [1, 2, 3, 4]) {
      const current = owner(merge(sparse, gap));
      assert.deepEqual([...current.keys()].sort(), [...previous.keys()].sort());
      for (const [a, ea] of previous) {
        for (const [b, eb] of previous) {
          if (ea === eb) assert.equal(current.get(a), current.get(b), `gap ${gap} split ${a} from ${b}`);
        }
      }
      previous = current;
    }
  });

  it("no composite remains once one category's hits are removed", () => {
    const coldOnly = alerts
      .map((a) => alert(a.date, a.hits.filter((h) => h.category !== "drought").map((h): Hit => [h.category, h.reason, h.metric])))
      .filter((a) => a.hits.length > 0);
    const events = merge(coldOnly, 0);
    assert.deepEqual(
      events.map((e) => [e.event_type, e.start_date, e.end_date]),
      [["cold_stress", "2024-06-11", "2024-06-13"]]
    );
  });
});
