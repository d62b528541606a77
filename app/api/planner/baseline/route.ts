import { NextResponse } from "next/server";
import { plannerErrorResponse } from "@/lib/planner/httpErrors";
import { getPlannerContext } from "@/lib/planner/plannerContext";

/**
 * Baseline forecast for every period in the horizon
 * GET /api/planner/baseline
 */
export async function GET() {
  try {
    const { baseline, rules, config, bundle } = await getPlannerContext();

    const default_targets: Record<string, number> = {};
    for (const p of baseline.periods) {
      default_targets[p.period] = Math.trunc(p.profit + config.default_target_uplift);
    }

    return NextResponse.json({
      ok: true,
      bundle,
      horizon: baseline.horizon,
      periods: baseline.periods,
      tracked_models: baseline.tracked_models,
      commission_rate: rules.commission_rate,
      ranking: rules.ranking,
      limits: { max_additional_units: config.max_additional_units },
      default_targets,
    });
  } catch (error) {
    return plannerErrorResponse(error, "GET /api/planner/baseline");
  }
}
