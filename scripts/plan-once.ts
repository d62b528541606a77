/**
 * One-shot planning run from the terminal.
 *
 * Usage:
 *   tsx scripts/plan-once.ts --period 2024-07 --target 150000
 *   tsx scripts/plan-once.ts --period 2024-07 --add Outlander=2 --add RVR=3
 *
 * Reads the model bundle the same way the API does (PLANNER_MODEL_BUNDLE_* env).
 */

import { getPlannerConfig } from "../lib/config/plannerConfig";
import { findPeriod } from "../lib/forecast/buildBaseline";
import { isPlannerError } from "../lib/planner/errors";
import { formatWhole } from "../lib/planner/format";
import { createPlannerContext } from "../lib/planner/plannerContext";
import { runTargetPlan, runWhatIfPlan, validateProfitTarget } from "../lib/planner/runPlan";
import type { PeriodSnapshot, PlanSummary } from "../types/planner";
import { parsePlanArgs } from "./planArgs";

function snapshotRow(p: Readonly<PeriodSnapshot>): Record<string, string> {
  const row: Record<string, string> = {
    Period: p.label,
    Revenue: formatWhole(p.revenue),
    Expense: formatWhole(p.expense),
    Payroll: formatWhole(p.payroll),
  };
  for (const [model, units] of Object.entries(p.units_sold)) row[`${model} Units`] = formatWhole(units);
  row.Profit = formatWhole(p.profit);
  return row;
}

function printSummary(summary: PlanSummary) {
  console.log(`\nFinal Adjusted Forecast for ${summary.label}`);
  console.table([snapshotRow(summary.adjusted)]);
  console.log(`Baseline profit: ${formatWhole(summary.baseline_profit)}`);
  console.log(`Adjusted profit: ${formatWhole(summary.adjusted_profit)} (${formatWhole(summary.profit_delta)})`);
}

async function main() {
  const args = parsePlanArgs(process.argv.slice(2));
  const ctx = await createPlannerContext(getPlannerConfig());

  console.log("Baseline Forecast");
  console.table(ctx.baseline.periods.map(snapshotRow));

  const period = args.period ?? ctx.baseline.periods[0].period;
  const state = { baseline: ctx.baseline, rules: ctx.rules, maxAdditionalUnits: ctx.config.max_additional_units };

  if (args.target !== null) {
    const profitTarget = validateProfitTarget(args.target, findPeriod(ctx.baseline, period).profit);
    const result = runTargetPlan(state, { period, profitTarget });

    if (result.solution.status === "target_unreachable") {
      console.error(`Target unreachable: ${result.solution.reason}`);
      process.exit(2);
    }
    console.log("\nAction Plan:");
    if (result.action_plan.length === 0) console.log("  No additional sales needed.");
    for (const row of result.action_plan) console.log(`  ${row.label}: ${row.value}`);
    printSummary(result.summary);
    return;
  }

  const result = runWhatIfPlan(state, { period, adjustments: args.adjustments });
  printSummary(result.summary);
}

main().catch((error: unknown) => {
  if (isPlannerError(error)) {
    console.error(`${error.kind}: ${error.message}`);
  } else {
    console.error("Planner run failed:", error);
  }
  process.exit(1);
});
