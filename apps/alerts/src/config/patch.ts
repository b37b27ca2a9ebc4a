// apps/alerts/src/config/patch.ts
//
// Alert config patch (manifest v1).
//
// Contract:
// - replace-only ops
// - path must be in manifest.editable
// - unknown keys are rejected
// - ssot_hash mismatch is 409, every other refusal is 400

import type { AlertConfigV1 } from "@cropwatch/contracts";
import { ConfigError } from "@cropwatch/alert-kernel";

import { isObj, sha256Hex, stableStringify } from "../util";
import { computeSsotHash, getManifest, validateEffectiveConfig, type AlertConfigEditableItem, type AlertConfigManifestV1 } from "./ssot";

export type AlertConfigPatchOpV1 = {
  op: "replace";
  path: string;
  value: unknown;
};

export type AlertConfigPatchV1 = {
  patch_version: "1.0.0";
  base: {
    ssot_hash: string;
  };
  ops: AlertConfigPatchOpV1[];
};

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE"
    | "VALUE_NOT_IN_ENUM"
    | "ENUM_NOT_SUBSET"
    | "EFFECTIVE_CONFIG_INVALID";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class AlertConfigPatchRejected extends Error {
  public readonly status: number;
  public readonly errors: PatchValidationError[];

  constructor(status: number, errors: PatchValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "AlertConfigPatchRejected";
    this.status = status;
    this.errors = errors;
  }
}

function unknownKeys(obj: Record<string, unknown>, allow: string[]): string[] {
  const s = new Set(allow);
  return Object.keys(obj).filter((k) => !s.has(k));
}

export function computeEffectiveConfigHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

function checkValue(rule: AlertConfigEditableItem, v: unknown, at: string): PatchValidationError[] {
  if (v === null && rule.nullable) return [];
  const range = { min: rule.min, max: rule.max };

  switch (rule.type) {
    case "bool":
      return typeof v === "boolean" ? [] : [{ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be boolean" }];

    case "int":
    case "number": {
      const ok = rule.type === "int" ? typeof v === "number" && Number.isInteger(v) : typeof v === "number" && Number.isFinite(v);
      if (!ok || typeof v !== "number") {
        return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: `value must be ${rule.type}` }];
      }
      if (typeof rule.min === "number" && v < rule.min) {
        return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value below min", meta: range }];
      }
      if (typeof rule.max === "number" && v > rule.max) {
        return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value above max", meta: range }];
      }
      return [];
    }

    case "enum": {
      const allowed = rule.enum ?? [];
      if (typeof v !== "string" || !allowed.includes(v)) {
        return [{ code: "VALUE_NOT_IN_ENUM", path: at, message: `value must be one of ${allowed.join(",")}`, meta: { enum: allowed } }];
      }
      return [];
    }

    case "enum_list": {
      if (!Array.isArray(v) || v.some((x) => typeof x !== "string")) {
        return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be string[]" }];
      }
      const enumSet = new Set(rule.enum ?? []);
      const bad = Array.from(new Set(v.map(String))).filter((x) => !enumSet.has(x));
      if (bad.length) {
        return [
          {
            code: "ENUM_NOT_SUBSET",
            path: at,
            message: `value must be subset of enum; invalid: ${bad.join(",")}`,
            meta: { enum: Array.from(enumSet) },
          },
        ];
      }
      return [];
    }
  }
}

export type PatchCheckResult = { ok: true; patch: AlertConfigPatchV1 } | { ok: false; errors: PatchValidationError[] };

// Strict schema + allowlist validation.
export function validatePatchStrict(patch: unknown, manifest: AlertConfigManifestV1): PatchCheckResult {
  if (!isObj(patch)) {
    return { ok: false, errors: [{ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" }] };
  }

  const errors: PatchValidationError[] = [];
  const uk = unknownKeys(patch, ["patch_version", "base", "ops"]);
  if (uk.length) errors.push({ code: "UNKNOWN_KEYS", path: "patch", message: `unknown keys: ${uk.join(",")}` });

  if (patch.patch_version !== "1.0.0") {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.patch_version", message: "patch_version must be 1.0.0" });
  }

  let ssot_hash = "";
  if (!isObj(patch.base)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base", message: "base must be object" });
  } else {
    const ukb = unknownKeys(patch.base, ["ssot_hash"]);
    if (ukb.length) errors.push({ code: "UNKNOWN_KEYS", path: "patch.base", message: `unknown keys: ${ukb.join(",")}` });
    if (typeof patch.base.ssot_hash !== "string") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base.ssot_hash", message: "ssot_hash must be string" });
    } else {
      ssot_hash = patch.base.ssot_hash;
    }
  }

  if (!Array.isArray(patch.ops)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.ops", message: "ops must be array" });
    return { ok: false, errors };
  }

  const allowed = new Map<string, AlertConfigEditableItem>();
  for (const it of manifest.editable) allowed.set(it.path, it);

  const ops: AlertConfigPatchOpV1[] = [];
  patch.ops.forEach((op: unknown, i: number) => {
    const basePath = `patch.ops[${i}]`;
    if (!isObj(op)) {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: basePath, message: "op must be object" });
      return;
    }
    const uko = unknownKeys(op, ["op", "path", "value"]);
    if (uko.length) errors.push({ code: "UNKNOWN_KEYS", path: basePath, message: `unknown keys: ${uko.join(",")}` });

    if (op.op !== "replace") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.op`, message: "op must be replace" });
    }
    if (typeof op.path !== "string" || op.path.trim() === "") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.path`, message: "path must be string" });
      return;
    }
    const p = op.path.trim();
    const rule = allowed.get(p);
    if (!rule) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `${basePath}.path`, message: `path not allowed: ${p}` });
      return;
    }

    errors.push(...checkValue(rule, op.value, `${basePath}.value`));
    ops.push({ op: "replace", path: p, value: op.value });
  });

  if (errors.length) return { ok: false, errors };
  return { ok: true, patch: { patch_version: "1.0.0", base: { ssot_hash }, ops } };
}

function setPath(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const parts = dotPath.split(".");
  const last = parts.pop();
  if (last === undefined) return;

  let cur = obj;
  for (const p of parts) {
    const next = cur[p];
    if (isObj(next)) {
      cur = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    cur[p] = created;
    cur = created;
  }
  cur[last] = value;
}

// Pure replace-only application; caller must validate first.
export function applyPatch(cfg: unknown, patch: AlertConfigPatchV1): Record<string, unknown> {
  const out: unknown = JSON.parse(stableStringify(cfg));
  if (!isObj(out)) throw new Error("alert config must be an object");
  for (const op of patch.ops) setPath(out, op.path, op.value);
  return out;
}

export type EffectiveConfig = {
  config: AlertConfigV1;
  effective: unknown;
  ssot_hash: string;
  effective_config_hash: string;
  // the validated patch, when one was given
  patch: AlertConfigPatchV1 | null;
};

/**
 * SSOT + optional inline patch -> validated effective config.
 * Order: ssot_hash match (409), ops (400), effective config schema (400).
 */
export function resolveEffectiveConfig(ssot: unknown, patch?: unknown): EffectiveConfig {
  const ssot_hash = computeSsotHash(ssot);

  if (patch === undefined || patch === null) {
    return {
      config: validateEffectiveConfig(ssot),
      effective: ssot,
      ssot_hash,
      effective_config_hash: computeEffectiveConfigHash(ssot),
      patch: null,
    };
  }

  const base = isObj(patch) && isObj(patch.base) ? patch.base.ssot_hash : undefined;
  if (typeof base === "string" && base !== ssot_hash) {
    throw new AlertConfigPatchRejected(409, [
      {
        code: "SSOT_HASH_MISMATCH",
        path: "patch.base.ssot_hash",
        message: `ssot_hash mismatch: got=${base} expected=${ssot_hash}`,
      },
    ]);
  }

  const checked = validatePatchStrict(patch, getManifest(ssot));
  if (!checked.ok) throw new AlertConfigPatchRejected(400, checked.errors);

  const effective = applyPatch(ssot, checked.patch);
  try {
    return {
      config: validateEffectiveConfig(effective),
      effective,
      ssot_hash,
      effective_config_hash: computeEffectiveConfigHash(effective),
      patch: checked.patch,
    };
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    throw new AlertConfigPatchRejected(
      400,
      err.issues.map((i): PatchValidationError => ({ code: "EFFECTIVE_CONFIG_INVALID", path: i.path, message: i.message }))
    );
  }
}
