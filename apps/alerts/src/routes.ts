import type { FastifyInstance } from "fastify";

import type { DateRangeV1, RunRangesV1 } from "@cropwatch/contracts";
import { ConfigError, OrderingViolationError } from "@cropwatch/alert-kernel";

import type { AlertRuntime } from "./runtime";
import { AlertConfigPatchRejected } from "./config/patch";
import { InvalidFieldError, assertDate, assertString, clampLimit, isObj } from "./util";

function optionalRange(v: unknown, name: string): DateRangeV1 | undefined {
  if (v === undefined || v === null) return undefined;
  if (!isObj(v)) throw new InvalidFieldError(name);
  return { start: assertDate(v.start, `${name}.start`), end: assertDate(v.end, `${name}.end`) };
}

function optionalString(v: unknown, name: string): string | undefined {
  return v === undefined ? undefined : assertString(v, name);
}

export function registerAlertRoutes(app: FastifyInstance, runtime: AlertRuntime): void {
  app.post("/api/alerts/run", async (req, reply) => {
    const body = isObj(req.body) ? req.body : {};
    const region_id = assertString(body.region_id, "region_id");

    const rangesIn = isObj(body.ranges) ? body.ranges : {};
    const ranges: Partial<RunRangesV1> = {};
    const data = optionalRange(rangesIn.data, "ranges.data");
    const report = optionalRange(rangesIn.report, "ranges.report");
    if (data) ranges.data = data;
    if (report) ranges.report = report;

    const options = isObj(body.options) ? body.options : {};

    try {
      const out = await runtime.run({
        region_id,
        ranges,
        options: {
          persist: typeof options.persist === "boolean" ? options.persist : false,
          // Optional inline patch (replace-only); validated by the runtime.
          config_patch: options.config_patch,
        },
      });
      return reply.send(out);
    } catch (e: unknown) {
      if (e instanceof AlertConfigPatchRejected) {
        return reply.code(e.status).send({ ok: false, errors: e.errors });
      }
      if (e instanceof ConfigError) {
        return reply.code(400).send({ ok: false, code: e.code, errors: e.issues });
      }
      if (e instanceof OrderingViolationError) {
        return reply.code(422).send({ ok: false, code: e.code, message: e.message, dates: e.dates });
      }
      throw e;
    }
  });

  app.get("/api/alerts/runs", async (req, reply) => {
    const q = isObj(req.query) ? req.query : {};
    return reply.send({ runs: runtime.listRuns(clampLimit(q.limit)) });
  });

  app.get("/api/alerts/events", async (req, reply) => {
    const q = isObj(req.query) ? req.query : {};
    const events = runtime.listEvents({
      limit: clampLimit(q.limit),
      run_id: optionalString(q.run_id, "run_id"),
      region_id: optionalString(q.region_id, "region_id"),
    });
    return reply.send({ events });
  });

  // SSOT fingerprint + editable manifest.
  app.get("/api/alerts/config", async (_req, reply) => {
    return reply.send(runtime.getConfigManifest());
  });

  // Validates and previews a patch; v1 stores nothing.
  app.post("/api/alerts/config/patch", async (req, reply) => {
    const body = isObj(req.body) ? req.body : {};
    const uk = Object.keys(body).filter((k) => k !== "patch");
    if (uk.length) {
      return reply.code(400).send({
        ok: false,
        errors: [{ code: "UNKNOWN_KEYS", path: "", message: `unknown keys: ${uk.join(",")}` }],
      });
    }
    if (!isObj(body.patch)) {
      return reply.code(400).send({
        ok: false,
        errors: [{ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" }],
      });
    }

    try {
      return reply.send(runtime.previewConfigPatch(body.patch));
    } catch (e: unknown) {
      if (e instanceof AlertConfigPatchRejected) {
        return reply.code(e.status).send({ ok: false, errors: e.errors });
      }
      throw e;
    }
  });
}
