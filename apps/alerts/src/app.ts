import Fastify, { type FastifyInstance } from "fastify";

import type { DailyRecordSource } from "./daily_reader";
import { AlertRuntime, type AlertRuntimeOptions } from "./runtime";
import { registerAlertRoutes } from "./routes";

export type BuildAppOptions = Omit<AlertRuntimeOptions, "logger"> & {
  // pino logger; false silences it (tests)
  logger?: boolean;
};

export function buildApp(source: DailyRecordSource, opts: BuildAppOptions = {}): { app: FastifyInstance; runtime: AlertRuntime } {
  const app = Fastify({ logger: opts.logger ?? true });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  const runtime = new AlertRuntime(source, { dbPath: opts.dbPath, loadSsot: opts.loadSsot, logger: app.log });
  registerAlertRoutes(app, runtime);
  app.addHook("onClose", async () => runtime.close());

  return { app, runtime };
}
