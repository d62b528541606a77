import { NextRequest, NextResponse } from "next/server";
import { findPeriod } from "@/lib/forecast/buildBaseline";
import { PlannerError } from "@/lib/planner/errors";
import { plannerErrorResponse, readJsonBody } from "@/lib/planner/httpErrors";
import { getPlannerContext } from "@/lib/planner/plannerContext";
import { runTargetPlan, validateProfitTarget } from "@/lib/planner/runPlan";

/**
 * Target-based plan: units needed to reach a profit target for one period
 * POST /api/planner/target { period, profit_target }
 */
export async function POST(request: NextRequest) {
  const body = await readJsonBody(request);
  const { period, profit_target } = body;

  if (typeof period !== "string" || !period) {
    return NextResponse.json({ ok: false, error: "period is required" }, { status: 400 });
  }

  try {
    const { baseline, rules } = await getPlannerContext();
    const profitTarget = validateProfitTarget(profit_target, findPeriod(baseline, period).profit);
    const result = runTargetPlan({ baseline, rules }, { period, profitTarget });

    if (result.solution.status === "target_unreachable") {
      throw new PlannerError("TARGET_UNREACHABLE", result.solution.reason, {
        period,
        profit_gap: result.solution.profit_gap,
      });
    }

    return NextResponse.json({ ok: true, ...result });
  } catch (error) {
    return plannerErrorResponse(error, "POST /api/planner/target");
  }
}
