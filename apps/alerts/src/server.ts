import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { DailyFusedReader } from "./daily_reader";
import { buildApp } from "./app";

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // explicit env wins
    if (process.env[key] == null) process.env[key] = val;
  }
}

function loadEnv(): void {
  // repo root first, then the app directory
  const here = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.resolve(here, "..", "..", "..", ".env"));
  loadDotEnvFile(path.resolve(here, "..", ".env"));
}

loadEnv();

// DATABASE_URL, or the PG* variables when it is unset
const reader = new DailyFusedReader(process.env.DATABASE_URL);
const { app } = buildApp(reader);
app.addHook("onClose", async () => reader.close());

async function main(): Promise<void> {
  await reader.ping();

  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err: unknown) => {
  app.log.error(err);
  process.exit(1);
});
