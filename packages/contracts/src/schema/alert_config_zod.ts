// packages/contracts/src/schema/alert_config_zod.ts
import { z } from "zod";

import { ALERT_CATEGORIES } from "./alert_v1";
import { INDEX_NAMES, ISO_DATE_RE } from "./daily_record_v1";

const IsoDateZ = z.string().regex(ISO_DATE_RE, "must be YYYY-MM-DD");
const NonNegIntZ = z.number().int().nonnegative();
const ThresholdZ = z.number().finite();
// null switches an optional condition off.
const OptionalThresholdZ = z.number().finite().nullable().default(null);

export const WindowModeZ = z.enum(["symmetric", "past_only"]);
export const GatingModeZ = z.enum(["off", "month_window", "canopy_obs", "both"]);
export const DuplicateDatePolicyZ = z.enum(["reject", "keep_last"]);
export const AlertCategoryZ = z.enum(ALERT_CATEGORIES);
export const IndexNameZ = z.enum(INDEX_NAMES);

export const DateRangeZ = z
  .object({ start: IsoDateZ, end: IsoDateZ })
  .strict()
  .refine((r) => r.start <= r.end, { message: "start must be <= end", path: ["end"] });

export const DroughtThresholdsZ = z
  .object({
    index_independent: z.boolean().default(false),
    ndmi_strong: ThresholdZ,
    ndmi_soft: ThresholdZ,
    msi_strong: OptionalThresholdZ,
    msi_soft: OptionalThresholdZ,
    precip_low_mm: ThresholdZ,
    precip_only_mm: OptionalThresholdZ,
  })
  .strict();

export const ColdStressThresholdsZ = z
  .object({
    index_independent: z.boolean().default(false),
    tmean_max_c: ThresholdZ,
    tmin_max_c: OptionalThresholdZ,
    rh_min_pct: ThresholdZ,
  })
  .strict();

export const HeatStressThresholdsZ = z
  .object({
    index_independent: z.boolean().default(false),
    tmean_min_c: ThresholdZ,
    tmax_min_c: OptionalThresholdZ,
    rh_max_pct: OptionalThresholdZ,
    evi_max: ThresholdZ,
  })
  .strict();

export const NutrientOrPestThresholdsZ = z
  .object({
    index_independent: z.boolean().default(false),
    ndre_max: ThresholdZ,
    ndre_strong_max: OptionalThresholdZ,
    gndvi_max: ThresholdZ,
    evi_max: ThresholdZ,
    deficit_indices: z.array(z.enum(["ndre", "gndvi", "evi"])).min(1),
    min_deficits: z.number().int().min(1),
    rh_corroborate_pct: OptionalThresholdZ,
    require_humidity: z.boolean().default(false),
    // A drying canopy also depresses chlorophyll indices; such days stay with drought.
    moisture_guard_ndmi: OptionalThresholdZ,
    moisture_guard_msi: OptionalThresholdZ,
  })
  .strict()
  .refine((t) => t.min_deficits <= t.deficit_indices.length, {
    message: "min_deficits must not exceed the number of deficit_indices",
    path: ["min_deficits"],
  })
  .refine((t) => !t.require_humidity || t.rh_corroborate_pct !== null, {
    message: "require_humidity needs rh_corroborate_pct",
    path: ["require_humidity"],
  });

export const WaterloggingThresholdsZ = z
  .object({
    index_independent: z.boolean().default(false),
    precip_high_mm: ThresholdZ,
    precip_1d_high_mm: OptionalThresholdZ,
    ndmi_wet_min: ThresholdZ,
    ndvi_max: OptionalThresholdZ,
  })
  .strict();

export const AlertConfigV1Schema = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    name: z.string().min(1).optional(),
    period: z
      .object({
        data: DateRangeZ,
        report: DateRangeZ.optional(),
      })
      .strict()
      .optional(),
    remote_sensing: z
      .object({
        window_half_days: NonNegIntZ,
        window_mode: WindowModeZ,
        max_age_days: NonNegIntZ,
        support_indices: z.array(IndexNameZ).min(1).default([...INDEX_NAMES]),
      })
      .strict(),
    canopy: z
      .object({
        ndvi_min: ThresholdZ,
        evi_min: ThresholdZ,
      })
      .strict(),
    gating: z
      .object({
        mode: GatingModeZ,
        months: z.array(z.number().int().min(1).max(12)),
        canopy_obs_min: NonNegIntZ,
        reset_on_season_start: z.boolean().default(false),
        apply_to_index_independent: z.boolean().default(false),
      })
      .strict()
      .refine((g) => new Set(g.months).size === g.months.length, {
        message: "months must be unique",
        path: ["months"],
      }),
    categories: z
      .array(AlertCategoryZ)
      .min(1)
      .refine((c) => new Set(c).size === c.length, { message: "categories must be unique" }),
    rules: z
      .object({
        drought: DroughtThresholdsZ,
        cold_stress: ColdStressThresholdsZ,
        heat_stress: HeatStressThresholdsZ,
        nutrient_or_pest: NutrientOrPestThresholdsZ,
        waterlogging: WaterloggingThresholdsZ,
      })
      .strict(),
    merge: z
      .object({
        merge_gap_days: NonNegIntZ,
      })
      .strict(),
    input: z
      .object({
        duplicate_dates: DuplicateDatePolicyZ.default("reject"),
      })
      .strict()
      .default({ duplicate_dates: "reject" }),
  })
  .strict();

// Parsed (defaults applied) shape consumed by the kernel.
export type AlertConfigV1 = z.infer<typeof AlertConfigV1Schema>;
export type AlertConfigInputV1 = z.input<typeof AlertConfigV1Schema>;
export type DateRangeV1 = z.infer<typeof DateRangeZ>;
export type WindowMode = z.infer<typeof WindowModeZ>;
export type GatingMode = z.infer<typeof GatingModeZ>;
export type DroughtThresholds = z.infer<typeof DroughtThresholdsZ>;
export type ColdStressThresholds = z.infer<typeof ColdStressThresholdsZ>;
export type HeatStressThresholds = z.infer<typeof HeatStressThresholdsZ>;
export type NutrientOrPestThresholds = z.infer<typeof NutrientOrPestThresholdsZ>;
export type WaterloggingThresholds = z.infer<typeof WaterloggingThresholdsZ>;
export type RuleThresholdsV1 = AlertConfigV1["rules"];

export type ConfigIssueV1 = { path: string; message: string };

export function formatZodPath(path: (string | number)[]): string {
  return path.map((p) => (typeof p === "number" ? `[${p}]` : p)).join(".").replace(/\.\[/g, "[");
}

export function parseAlertConfigV1(
  raw: unknown
): { ok: true; config: AlertConfigV1 } | { ok: false; issues: ConfigIssueV1[] } {
  const r = AlertConfigV1Schema.safeParse(raw);
  if (r.success) return { ok: true, config: r.data };
  return {
    ok: false,
    issues: r.error.issues.map((i) => ({ path: formatZodPath(i.path), message: i.message })),
  };
}
