/**
 * Planner Startup State
 *
 * Loads the model bundle and builds the baseline table once per process.
 * Every request shares the result read-only. A failed load is not kept, so
 * the next request tries again.
 */

import { getPlannerConfig, type PlannerConfig } from "@/lib/config/plannerConfig";
import { buildBaselineTable } from "@/lib/forecast/buildBaseline";
import { createBundleReader, loadModelBundle } from "@/lib/forecast/modelBundle";
import type { BusinessRules, ForecastTable } from "@/types/planner";
import { getBusinessRules } from "./businessRules";
import { isPlannerError } from "./errors";
import { logPlannerEvent } from "./logging";

export interface PlannerContext {
  config: PlannerConfig;
  rules: BusinessRules;
  bundle: {
    source: string;
    trained_at: string | null;
    last_period: string;
    kpi_count: number;
  };
  baseline: ForecastTable;
}

export async function createPlannerContext(
  config: PlannerConfig,
  options: { fetch?: typeof fetch; rules?: BusinessRules } = {}
): Promise<PlannerContext> {
  const startedAt = Date.now();
  const rules = options.rules ?? getBusinessRules();

  try {
    const reader = createBundleReader(config, { fetch: options.fetch });
    const bundle = await loadModelBundle(reader);
    const kpiCount = Object.keys(bundle.models).length;

    logPlannerEvent({
      event_type: "BUNDLE_LOADED",
      source: bundle.source,
      kpi_count: kpiCount,
      duration_ms: Date.now() - startedAt,
    });

    const baseline = buildBaselineTable(bundle, rules, config.forecast_horizon);

    logPlannerEvent({
      event_type: "BASELINE_READY",
      source: bundle.source,
      horizon: baseline.horizon,
      tracked_models: [...baseline.tracked_models],
      duration_ms: Date.now() - startedAt,
    });

    return {
      config,
      rules,
      bundle: {
        source: bundle.source,
        trained_at: bundle.trained_at,
        last_period: bundle.last_period,
        kpi_count: kpiCount,
      },
      baseline,
    };
  } catch (error) {
    logPlannerEvent({
      event_type: "STARTUP_FAILED",
      error_kind: isPlannerError(error) ? error.kind : "UNEXPECTED",
      error: error instanceof Error ? error.message : String(error),
      duration_ms: Date.now() - startedAt,
    });
    throw error;
  }
}

let contextPromise: Promise<PlannerContext> | null = null;

export function getPlannerContext(): Promise<PlannerContext> {
  if (!contextPromise) {
    contextPromise = createPlannerContext(getPlannerConfig()).catch((error: unknown) => {
      contextPromise = null;
      throw error;
    });
  }
  return contextPromise;
}

/** Drop the cached context (config or bundle changed). */
export function resetPlannerContext(): void {
  contextPromise = null;
}
