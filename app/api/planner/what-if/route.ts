import { NextRequest, NextResponse } from "next/server";
import { plannerErrorResponse, readJsonBody } from "@/lib/planner/httpErrors";
import { getPlannerContext } from "@/lib/planner/plannerContext";
import { runWhatIfPlan } from "@/lib/planner/runPlan";

/**
 * What-if scenario: extra unit sales per model for one period
 * POST /api/planner/what-if { period, adjustments: { [model]: units } }
 */
export async function POST(request: NextRequest) {
  const body = await readJsonBody(request);
  const { period, adjustments } = body;

  if (typeof period !== "string" || !period) {
    return NextResponse.json({ ok: false, error: "period is required" }, { status: 400 });
  }

  try {
    const { baseline, rules, config } = await getPlannerContext();
    const result = runWhatIfPlan(
      { baseline, rules, maxAdditionalUnits: config.max_additional_units },
      { period, adjustments }
    );

    return NextResponse.json({ ok: true, ...result });
  } catch (error) {
    return plannerErrorResponse(error, "POST /api/planner/what-if");
  }
}
