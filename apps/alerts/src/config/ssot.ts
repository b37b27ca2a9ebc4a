// apps/alerts/src/config/ssot.ts
//
// Alert config SSOT / manifest helpers (manifest v1).
//
// Contract:
// - SSOT file: config/alerts/default.json
// - ssot_hash: "sha256:" + sha256(stableStringify(parsedJson))
// - the manifest is the only source of editable paths for clients

import fs from "node:fs";
import path from "node:path";

import { ALERT_CATEGORIES, INDEX_NAMES, type AlertConfigV1 } from "@cropwatch/contracts";
import { parseEngineConfig } from "@cropwatch/alert-kernel";

import { findRepoRoot, isObj, nowMs, sha256Hex, stableStringify } from "../util";

export const SSOT_SOURCE = "config/alerts/default.json";

export type ManifestValueType = "int" | "number" | "bool" | "enum" | "enum_list";

export type AlertConfigEditableItem = {
  // Full dot path, e.g. "rules.drought.ndmi_soft"
  path: string;
  type: ManifestValueType;
  // int / number only
  min?: number;
  max?: number;
  // enum / enum_list only
  enum?: string[];
  // null switches the condition off
  nullable?: boolean;
  // only editable if the path exists in default.json
  conditional?: "exists_in_ssot";
  description?: string;
};

export type AlertConfigManifestV1 = {
  ssot: {
    source: typeof SSOT_SOURCE;
    schema_version: string;
    ssot_hash: string;
    updated_at_ts: number;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: AlertConfigEditableItem[];
  defaults: Record<string, unknown>;
  read_only_hints: string[];
};

export function resolveRepoRoot(): string {
  if (process.env.CROPWATCH_REPO_ROOT) return path.resolve(process.env.CROPWATCH_REPO_ROOT);

  // container mount root
  const dockerRoot = "/app";
  if (fs.existsSync(path.join(dockerRoot, SSOT_SOURCE))) return dockerRoot;

  return findRepoRoot(process.cwd(), SSOT_SOURCE);
}

export function loadDefaultConfig(): unknown {
  const p = path.join(resolveRepoRoot(), SSOT_SOURCE);
  return JSON.parse(fs.readFileSync(p, "utf8"));
}

export function computeSsotHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

function hasPath(obj: unknown, dotPath: string): boolean {
  let cur: unknown = obj;
  for (const p of dotPath.split(".")) {
    if (!isObj(cur) || !(p in cur)) return false;
    cur = cur[p];
  }
  return true;
}

function getPath(obj: unknown, dotPath: string): unknown {
  let cur: unknown = obj;
  for (const p of dotPath.split(".")) {
    if (!isObj(cur)) return undefined;
    cur = cur[p];
  }
  return cur;
}

// Full schema validation; throws ConfigError naming the offending paths.
export function validateEffectiveConfig(cfg: unknown): AlertConfigV1 {
  return parseEngineConfig(cfg);
}

const indexItem = (p: string, description: string): AlertConfigEditableItem => ({ path: p, type: "number", min: -1, max: 3, description });
const optionalIndex = (p: string, description: string): AlertConfigEditableItem => ({
  ...indexItem(p, description),
  nullable: true,
  conditional: "exists_in_ssot",
});
const toggle = (p: string, description: string): AlertConfigEditableItem => ({ path: p, type: "bool", description });

// Frozen v1 allowlist.
const EDITABLE_V1: AlertConfigEditableItem[] = [
  { path: "remote_sensing.window_half_days", type: "int", min: 0, max: 30, description: "Support window half-width (days)" },
  { path: "remote_sensing.window_mode", type: "enum", enum: ["symmetric", "past_only"], description: "Support window direction" },
  { path: "remote_sensing.max_age_days", type: "int", min: 0, max: 60, description: "Oldest usable observation (days)" },
  { path: "remote_sensing.support_indices", type: "enum_list", enum: [...INDEX_NAMES], description: "Indices that count as an observation" },

  indexItem("canopy.ndvi_min", "Canopy reliable at NDVI >= value"),
  indexItem("canopy.evi_min", "Canopy reliable at EVI >= value"),

  { path: "gating.mode", type: "enum", enum: ["off", "month_window", "canopy_obs", "both"], description: "Eligibility filter" },
  { path: "gating.canopy_obs_min", type: "int", min: 0, max: 366, description: "Canopy-ready days before alerts are eligible" },
  toggle("gating.reset_on_season_start", "Restart the canopy counter when the season opens"),
  toggle("gating.apply_to_index_independent", "Gate index-independent categories too"),

  { path: "categories", type: "enum_list", enum: [...ALERT_CATEGORIES], description: "Evaluated categories, in label order" },

  toggle("rules.drought.index_independent", "Drought bypasses remote-sensing QC"),
  indexItem("rules.drought.ndmi_strong", "Strong drought at NDMI < value"),
  indexItem("rules.drought.ndmi_soft", "Soft drought at NDMI < value"),
  optionalIndex("rules.drought.msi_strong", "Strong drought at MSI > value"),
  optionalIndex("rules.drought.msi_soft", "Soft drought at MSI > value"),
  { path: "rules.drought.precip_low_mm", type: "number", min: 0, max: 1000, description: "Dry week at precip_7d < value" },
  {
    path: "rules.drought.precip_only_mm",
    type: "number",
    min: 0,
    max: 1000,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Dry spell at precip_7d < value",
  },

  toggle("rules.cold_stress.index_independent", "Cold stress bypasses remote-sensing QC"),
  { path: "rules.cold_stress.tmean_max_c", type: "number", min: -40, max: 40, description: "Cold at tmean_7d < value" },
  {
    path: "rules.cold_stress.tmin_max_c",
    type: "number",
    min: -40,
    max: 40,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Cold at tmin_7d < value",
  },
  { path: "rules.cold_stress.rh_min_pct", type: "number", min: 0, max: 100, description: "Humid at RH > value" },

  toggle("rules.heat_stress.index_independent", "Heat stress bypasses remote-sensing QC"),
  { path: "rules.heat_stress.tmean_min_c", type: "number", min: 0, max: 60, description: "Hot at tmean_7d > value" },
  {
    path: "rules.heat_stress.tmax_min_c",
    type: "number",
    min: 0,
    max: 60,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Hot at tmax_7d > value",
  },
  {
    path: "rules.heat_stress.rh_max_pct",
    type: "number",
    min: 0,
    max: 100,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Dry air at RH < value",
  },
  indexItem("rules.heat_stress.evi_max", "Weakened canopy at EVI < value"),

  toggle("rules.nutrient_or_pest.index_independent", "Nutrient/pest bypasses remote-sensing QC"),
  indexItem("rules.nutrient_or_pest.ndre_max", "Deficit at NDRE < value"),
  optionalIndex("rules.nutrient_or_pest.ndre_strong_max", "Strong deficit at NDRE < value"),
  indexItem("rules.nutrient_or_pest.gndvi_max", "Deficit at GNDVI < value"),
  indexItem("rules.nutrient_or_pest.evi_max", "Deficit at EVI < value"),
  { path: "rules.nutrient_or_pest.min_deficits", type: "int", min: 1, max: 3, description: "Deficits needed to trigger" },
  {
    path: "rules.nutrient_or_pest.rh_corroborate_pct",
    type: "number",
    min: 0,
    max: 100,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Humidity corroborates at RH > value",
  },
  toggle("rules.nutrient_or_pest.require_humidity", "Humidity corroboration is mandatory"),
  optionalIndex("rules.nutrient_or_pest.moisture_guard_ndmi", "No deficit alert while NDMI < value"),
  optionalIndex("rules.nutrient_or_pest.moisture_guard_msi", "No deficit alert while MSI > value"),

  toggle("rules.waterlogging.index_independent", "Waterlogging bypasses remote-sensing QC"),
  { path: "rules.waterlogging.precip_high_mm", type: "number", min: 0, max: 2000, description: "Wet week at precip_7d > value" },
  {
    path: "rules.waterlogging.precip_1d_high_mm",
    type: "number",
    min: 0,
    max: 1000,
    nullable: true,
    conditional: "exists_in_ssot",
    description: "Downpour at precip_1d > value",
  },
  indexItem("rules.waterlogging.ndmi_wet_min", "Saturated canopy at NDMI > value"),
  optionalIndex("rules.waterlogging.ndvi_max", "Sparse cover at NDVI < value"),

  { path: "merge.merge_gap_days", type: "int", min: 0, max: 60, description: "Silent days bridged inside one event" },
  { path: "input.duplicate_dates", type: "enum", enum: ["reject", "keep_last"], description: "Duplicate input date policy" },
];

export function getManifest(cfg: unknown): AlertConfigManifestV1 {
  const parsed = validateEffectiveConfig(cfg);

  const editable = EDITABLE_V1.filter((it) => it.conditional !== "exists_in_ssot" || hasPath(cfg, it.path));

  // display only
  const defaults: Record<string, unknown> = {};
  for (const it of editable) defaults[it.path] = getPath(cfg, it.path);

  return {
    ssot: {
      source: SSOT_SOURCE,
      schema_version: parsed.schema_version,
      ssot_hash: computeSsotHash(cfg),
      updated_at_ts: nowMs(),
    },
    patch: {
      patch_version: "1.0.0",
      op_allowed: ["replace"],
      unknown_keys_policy: "reject",
    },
    editable,
    defaults,
    read_only_hints: ["schema_version", "name", "period", "gating.months", "rules.nutrient_or_pest.deficit_indices"],
  };
}
