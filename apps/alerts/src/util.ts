import { createHash, randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { isValidDate } from "@cropwatch/alert-kernel";

export function nowMs(): number {
  return Date.now();
}

export function newRunId(): string {
  return randomUUID();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

export function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

// Request field errors; Fastify answers them with statusCode.
export class InvalidFieldError extends Error {
  public readonly statusCode = 400;
  public readonly field: string;

  constructor(field: string) {
    super(`invalid ${field}`);
    this.name = "InvalidFieldError";
    this.field = field;
  }
}

export function assertString(v: unknown, name: string): string {
  if (typeof v !== "string" || v.trim().length === 0) throw new InvalidFieldError(name);
  return v.trim();
}

export function assertInt(v: unknown, name: string): number {
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v) : NaN;
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new InvalidFieldError(name);
  return n;
}

export function assertDate(v: unknown, name: string): string {
  const s = assertString(v, name);
  if (!isValidDate(s)) throw new InvalidFieldError(name);
  return s;
}

export function clampLimit(v: unknown, fallback = 100, max = 500): number {
  const limit = typeof v !== "undefined" ? assertInt(v, "limit") : fallback;
  return Math.max(1, Math.min(limit, max));
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 * Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    if (fs.existsSync(path.join(cur, requiredRelativePath))) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
