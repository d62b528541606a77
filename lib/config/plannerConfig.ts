/**
 * Planner Configuration
 *
 * Read from process.env on every call so route handlers and scripts pick up
 * the environment they run in.
 */

export type BundleSource = "file" | "supabase";

export interface PlannerConfig {
  bundle_source: BundleSource;
  /** Local file path, or object path inside the Supabase bucket */
  bundle_path: string;
  bundle_bucket: string;
  supabase_url: string | null;
  supabase_service_key: string | null;
  forecast_horizon: number;
  max_additional_units: number;
  default_target_uplift: number;
}

export const DEFAULT_BUNDLE_PATH = "data/trained_models.json";
export const DEFAULT_BUNDLE_BUCKET = "forecast-models";
export const DEFAULT_FORECAST_HORIZON = 3;
export const DEFAULT_MAX_ADDITIONAL_UNITS = 50;
export const DEFAULT_TARGET_UPLIFT = 50000;

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn("PLANNER_CONFIG_INVALID", { variable: name, value: raw, fallback });
    return fallback;
  }
  return value;
}

function readBundleSource(): BundleSource {
  const raw = process.env.PLANNER_MODEL_BUNDLE_SOURCE?.trim().toLowerCase();
  if (!raw || raw === "file") return "file";
  if (raw === "supabase") return "supabase";

  console.warn("PLANNER_CONFIG_INVALID", {
    variable: "PLANNER_MODEL_BUNDLE_SOURCE",
    value: raw,
    fallback: "file",
  });
  return "file";
}

export function getPlannerConfig(): PlannerConfig {
  return {
    bundle_source: readBundleSource(),
    bundle_path: process.env.PLANNER_MODEL_BUNDLE_PATH?.trim() || DEFAULT_BUNDLE_PATH,
    bundle_bucket: process.env.PLANNER_MODEL_BUNDLE_BUCKET?.trim() || DEFAULT_BUNDLE_BUCKET,
    supabase_url: process.env.NEXT_PUBLIC_SUPABASE_URL || null,
    supabase_service_key: process.env.SUPABASE_SERVICE_ROLE_KEY || null,
    forecast_horizon: readPositiveInt("PLANNER_FORECAST_HORIZON", DEFAULT_FORECAST_HORIZON),
    max_additional_units: readPositiveInt("PLANNER_MAX_ADDITIONAL_UNITS", DEFAULT_MAX_ADDITIONAL_UNITS),
    default_target_uplift: readPositiveInt("PLANNER_DEFAULT_TARGET_UPLIFT", DEFAULT_TARGET_UPLIFT),
  };
}
