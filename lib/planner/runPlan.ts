/**
 * Planning Interactions
 *
 * One call per user interaction: pick the period, copy it from the baseline,
 * adjust the copy, and summarize against the untouched baseline.
 */

import { findPeriod } from "@/lib/forecast/buildBaseline";
import type {
  ActionPlanRow,
  BusinessRules,
  ForecastTable,
  PlanSummary,
  TargetSolution,
} from "@/types/planner";
import { applyScenario, validateAdjustments } from "./applyScenario";
import { PlannerError } from "./errors";
import { actionPlanRows } from "./format";
import { logPlannerEvent } from "./logging";
import { copyPeriodSnapshot } from "./periodSnapshot";
import { projectSummary } from "./projectSummary";
import { solveTarget } from "./solveTarget";

export interface PlanningState {
  rules: BusinessRules;
  baseline: ForecastTable;
  maxAdditionalUnits?: number;
}

export interface WhatIfPlanResult {
  mode: "what-if";
  period: string;
  adjustments: Record<string, number>;
  summary: PlanSummary;
}

export interface TargetPlanResult {
  mode: "target";
  period: string;
  profit_target: number;
  solution: TargetSolution;
  action_plan: ActionPlanRow[];
  summary: PlanSummary;
}

export function runWhatIfPlan(
  state: PlanningState,
  input: { period: string; adjustments: unknown }
): WhatIfPlanResult {
  const baselinePeriod = findPeriod(state.baseline, input.period);
  const adjustments = validateAdjustments(input.adjustments, state.rules, {
    trackedModels: state.baseline.tracked_models,
    maxUnits: state.maxAdditionalUnits,
  });

  const adjusted = applyScenario(copyPeriodSnapshot(baselinePeriod), adjustments, state.rules);
  const summary = projectSummary(baselinePeriod, adjusted);

  logPlannerEvent({
    event_type: "WHAT_IF_APPLIED",
    period: input.period,
    adjustments,
    baseline_profit: summary.baseline_profit,
    adjusted_profit: summary.adjusted_profit,
  });

  return { mode: "what-if", period: input.period, adjustments, summary };
}

/** Finite, and not below the period's baseline profit (whole currency). */
export function validateProfitTarget(value: unknown, baselineProfit: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new PlannerError("INVALID_TARGET", "Profit target must be a number", { value });
  }
  const minimum = Math.trunc(baselineProfit);
  if (value < minimum) {
    throw new PlannerError("INVALID_TARGET", `Profit target cannot be below the baseline profit of ${minimum}`, {
      value,
      minimum,
    });
  }
  return value;
}

export function runTargetPlan(
  state: PlanningState,
  input: { period: string; profitTarget: number }
): TargetPlanResult {
  if (!Number.isFinite(input.profitTarget)) {
    throw new PlannerError("INVALID_TARGET", "Profit target must be a number", { value: input.profitTarget });
  }

  const baselinePeriod = findPeriod(state.baseline, input.period);
  const solution = solveTarget({
    baselineProfit: baselinePeriod.profit,
    profitTarget: input.profitTarget,
    ranking: state.rules.ranking,
    availableModels: state.baseline.tracked_models,
  });

  const adjusted = applyScenario(copyPeriodSnapshot(baselinePeriod), solution.plan, state.rules);
  const summary = projectSummary(baselinePeriod, adjusted);

  if (solution.status === "target_unreachable") {
    logPlannerEvent({
      event_type: "TARGET_UNREACHABLE",
      period: input.period,
      profit_gap: solution.profit_gap,
      error: solution.reason,
    });
  } else {
    logPlannerEvent({
      event_type: "TARGET_SOLVED",
      period: input.period,
      plan: solution.plan,
      profit_gap: solution.profit_gap,
      baseline_profit: summary.baseline_profit,
      adjusted_profit: summary.adjusted_profit,
    });
  }

  return {
    mode: "target",
    period: input.period,
    profit_target: input.profitTarget,
    solution,
    action_plan: actionPlanRows(solution.plan),
    summary,
  };
}
