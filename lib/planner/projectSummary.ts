import { PlannerError } from "./errors";
import { copyPeriodSnapshot } from "./periodSnapshot";
import type { PeriodSnapshot, PlanSummary } from "@/types/planner";

/**
 * Compare a baseline period with its adjusted copy.
 * Pure: both inputs are read, never written.
 */
export function projectSummary(
  baseline: Readonly<PeriodSnapshot>,
  adjusted: Readonly<PeriodSnapshot>
): PlanSummary {
  if (baseline.period !== adjusted.period) {
    throw new PlannerError("PERIOD_MISMATCH", "Baseline and adjusted snapshots cover different periods", {
      baseline_period: baseline.period,
      adjusted_period: adjusted.period,
    });
  }

  const baselineProfit = copyPeriodSnapshot(baseline).profit;
  const finalSnapshot = copyPeriodSnapshot(adjusted);

  return {
    period: finalSnapshot.period,
    label: finalSnapshot.label,
    baseline_profit: baselineProfit,
    adjusted_profit: finalSnapshot.profit,
    profit_delta: finalSnapshot.profit - baselineProfit,
    adjusted: finalSnapshot,
    comparison: [
      { plan: "Baseline Forecast", profit: baselineProfit },
      { plan: "Adjusted Plan", profit: finalSnapshot.profit },
    ],
  };
}
