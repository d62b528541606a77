/**
 * Target-Based Planning Solver
 *
 * Closes a profit gap for one period with extra unit sales.
 * The whole gap goes to the single most profitable available model with a
 * positive margin; units are rounded up so the target is met or exceeded.
 */

import type { ProfitabilityRanking, TargetSolution } from "@/types/planner";

export function solveTarget({
  baselineProfit,
  profitTarget,
  ranking,
  availableModels,
}: {
  baselineProfit: number;
  profitTarget: number;
  ranking: ProfitabilityRanking;
  availableModels: Iterable<string>;
}): TargetSolution {
  const profitGap = profitTarget - baselineProfit;

  if (profitGap <= 0) {
    return { status: "no_action_needed", profit_gap: profitGap, plan: {} };
  }

  const available = new Set(availableModels);
  if (available.size === 0) {
    return {
      status: "target_unreachable",
      profit_gap: profitGap,
      plan: {},
      reason: "No vehicle models are tracked in the forecast",
    };
  }

  for (const economics of ranking) {
    if (!available.has(economics.model_name)) continue;
    if (economics.profit_per_unit <= 0) continue;

    let additionalUnits = Math.ceil(profitGap / economics.profit_per_unit);
    // division can round down onto a whole number
    if (additionalUnits * economics.profit_per_unit < profitGap) additionalUnits += 1;
    if (!Number.isSafeInteger(additionalUnits)) {
      return {
        status: "target_unreachable",
        profit_gap: profitGap,
        plan: {},
        reason: `Closing the gap needs more than ${Number.MAX_SAFE_INTEGER} units of '${economics.model_name}'`,
      };
    }

    return {
      status: "planned",
      profit_gap: profitGap,
      plan: { [economics.model_name]: additionalUnits },
      model_name: economics.model_name,
      profit_per_unit: economics.profit_per_unit,
      projected_uplift: additionalUnits * economics.profit_per_unit,
    };
  }

  return {
    status: "target_unreachable",
    profit_gap: profitGap,
    plan: {},
    reason: "No tracked vehicle model has a positive profit per unit",
  };
}
