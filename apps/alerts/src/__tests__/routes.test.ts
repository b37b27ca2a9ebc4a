import assert from "node:assert/strict";
import { describe, it, type TestContext } from "node:test";

import type { FastifyInstance } from "fastify";

import { buildApp } from "../app";
import { computeSsotHash } from "../config/ssot";
import type { DailyFusedRow } from "../records";
import { COLD, MemoryDailySource, REGION, coldSpellRows, fusedRow, ssotFixture } from "./fixtures";

function appFor(t: TestContext, rows: DailyFusedRow[] = coldSpellRows()): FastifyInstance {
  const { app } = buildApp(new MemoryDailySource({ [REGION]: rows }), { dbPath: ":memory:", loadSsot: ssotFixture, logger: false });
  t.after(async () => {
    await app.close();
  });
  return app;
}

describe("POST /api/alerts/run", () => {
  it("runs, persists and lists the result", async (t) => {
    const app = appFor(t);
    const res = await app.inject({ method: "POST", url: "/api/alerts/run", payload: { region_id: REGION, options: { persist: true } } });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.persisted, true);
    assert.equal(typeof body.run_id, "string");
    assert.equal(body.result.events.length, 1);

    const runs = (await app.inject({ method: "GET", url: "/api/alerts/runs" })).json();
    assert.equal(runs.runs.length, 1);
    assert.equal(runs.runs[0].run_id, body.run_id);
    assert.equal(runs.runs[0].determinism_hash, body.determinism_hash);
    assert.equal(runs.runs[0].summary.events, 1);

    const events = (await app.inject({ method: "GET", url: `/api/alerts/events?region_id=${REGION}` })).json();
    assert.deepEqual(
      events.events.map((e: { event_type: string; start_date: string; run_id: string; severity_level: string }) => [
        e.event_type,
        e.start_date,
        e.run_id,
        e.severity_level,
      ]),
      [["cold_stress", "2024-06-02", body.run_id, "major"]]
    );

    const none = (await app.inject({ method: "GET", url: "/api/alerts/events?run_id=other" })).json();
    assert.deepEqual(none, { events: [] });
  });

  it("does not persist unless asked", async (t) => {
    const app = appFor(t);
    const res = await app.inject({ method: "POST", url: "/api/alerts/run", payload: { region_id: REGION } });
    assert.equal(res.statusCode, 200);
    assert.equal(res.json().persisted, false);
    assert.deepEqual((await app.inject({ method: "GET", url: "/api/alerts/runs" })).json(), { runs: [] });
  });

  it("rejects a missing region_id", async (t) => {
    const res = await appFor(t).inject({ method: "POST", url: "/api/alerts/run", payload: {} });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json().message, "invalid region_id");
  });

  it("rejects a malformed range date", async (t) => {
    const res = await appFor(t).inject({
      method: "POST",
      url: "/api/alerts/run",
      payload: { region_id: REGION, ranges: { data: { start: "2024-06-01", end: "2024-06-31" } } },
    });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json().message, "invalid ranges.data.end");
  });

  it("maps a report range outside the data range to 400", async (t) => {
    const res = await appFor(t).inject({
      method: "POST",
      url: "/api/alerts/run",
      payload: { region_id: REGION, ranges: { report: { start: "2024-06-04", end: "2024-06-09" } } },
    });
    assert.equal(res.statusCode, 400);
    const body = res.json();
    assert.equal(body.code, "CONFIG_INVALID");
    assert.equal(body.errors[0].path, "period.report");
  });

  it("maps a stale inline patch to 409", async (t) => {
    const res = await appFor(t).inject({
      method: "POST",
      url: "/api/alerts/run",
      payload: {
        region_id: REGION,
        options: { config_patch: { patch_version: "1.0.0", base: { ssot_hash: "sha256:stale" }, ops: [] } },
      },
    });
    assert.equal(res.statusCode, 409);
    assert.equal(res.json().errors[0].code, "SSOT_HASH_MISMATCH");
  });

  it("maps duplicate input dates to 422", async (t) => {
    const res = await appFor(t, [...coldSpellRows(), fusedRow("2024-06-02", COLD)]).inject({
      method: "POST",
      url: "/api/alerts/run",
      payload: { region_id: REGION },
    });
    assert.equal(res.statusCode, 422);
    const body = res.json();
    assert.equal(body.code, "ORDERING_VIOLATION");
    assert.deepEqual(body.dates, ["2024-06-02"]);
  });
});

describe("config routes", () => {
  it("GET /api/alerts/config returns the manifest", async (t) => {
    const res = await appFor(t).inject({ method: "GET", url: "/api/alerts/config" });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.ssot.ssot_hash, computeSsotHash(ssotFixture()));
    assert.deepEqual(body.patch, { patch_version: "1.0.0", op_allowed: ["replace"], unknown_keys_policy: "reject" });
  });

  it("POST /api/alerts/config/patch previews a valid patch", async (t) => {
    const ssot_hash = computeSsotHash(ssotFixture());
    const res = await appFor(t).inject({
      method: "POST",
      url: "/api/alerts/config/patch",
      payload: {
        patch: {
          patch_version: "1.0.0",
          base: { ssot_hash },
          ops: [
            { op: "replace", path: "merge.merge_gap_days", value: 3 },
            { op: "replace", path: "categories", value: ["cold_stress", "drought"] },
          ],
        },
      },
    });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.ok, true);
    assert.equal(body.ssot_hash, ssot_hash);
    assert.notEqual(body.effective_hash, ssot_hash);
    assert.deepEqual(body.changed_paths, ["categories", "merge.merge_gap_days"]);
    assert.deepEqual(body.errors, []);
  });

  it("POST /api/alerts/config/patch rejects unknown keys and a missing patch", async (t) => {
    const app = appFor(t);
    const extra = await app.inject({ method: "POST", url: "/api/alerts/config/patch", payload: { patch: {}, dryRun: true } });
    assert.equal(extra.statusCode, 400);
    assert.deepEqual(extra.json().errors, [{ code: "UNKNOWN_KEYS", path: "", message: "unknown keys: dryRun" }]);

    const missing = await app.inject({ method: "POST", url: "/api/alerts/config/patch", payload: {} });
    assert.equal(missing.statusCode, 400);
    assert.equal(missing.json().errors[0].code, "INVALID_PATCH_SCHEMA");
  });
});

describe("CORS", () => {
  it("answers preflight requests", async (t) => {
    const res = await appFor(t).inject({ method: "OPTIONS", url: "/api/alerts/run" });
    assert.equal(res.statusCode, 204);
    assert.equal(res.headers["access-control-allow-origin"], "*");
  });
});
