/**
 * What-If Scenario Applier
 *
 * Applies additional unit sales per model to one forecast period.
 *
 * Per model with additional units:
 * - revenue += units × unit_revenue
 * - expense += units × unit_cost
 * - payroll += revenue delta × commission rate
 *
 * Deltas are summed across models and applied once; profit is recomputed.
 */

import { PlannerError } from "./errors";
import { applySnapshotDeltas, type SnapshotDeltas } from "./periodSnapshot";
import type { BusinessRules, PeriodSnapshot } from "@/types/planner";

export interface AdjustmentLimits {
  /** Models the adjustment may name; defaults to every model with economics */
  trackedModels?: ReadonlyArray<string>;
  /** Inclusive per-model upper bound */
  maxUnits?: number;
}

/**
 * Validate a raw adjustments payload.
 * Rejects (never clamps) negative, fractional, non-numeric and out-of-range values.
 */
export function validateAdjustments(
  input: unknown,
  rules: BusinessRules,
  limits: AdjustmentLimits = {}
): Record<string, number> {
  if (input === null || input === undefined) return {};
  if (typeof input !== "object" || Array.isArray(input)) {
    throw new PlannerError("INVALID_ADJUSTMENT", "Adjustments must be an object of model name to units");
  }

  const allowed = new Set(limits.trackedModels ?? Object.keys(rules.economics));
  const adjustments: Record<string, number> = {};

  for (const [modelName, value] of Object.entries(input)) {
    if (!allowed.has(modelName)) {
      throw new PlannerError("INVALID_ADJUSTMENT", `'${modelName}' is not a tracked vehicle model`, {
        model_name: modelName,
      });
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new PlannerError(
        "INVALID_ADJUSTMENT",
        `Additional '${modelName}' units must be a non-negative whole number`,
        { model_name: modelName, value }
      );
    }
    if (limits.maxUnits !== undefined && value > limits.maxUnits) {
      throw new PlannerError(
        "INVALID_ADJUSTMENT",
        `Additional '${modelName}' units cannot exceed ${limits.maxUnits}`,
        { model_name: modelName, value, max_units: limits.maxUnits }
      );
    }
    adjustments[modelName] = value;
  }

  return adjustments;
}

export function scenarioDeltas(
  adjustments: Readonly<Record<string, number>>,
  rules: BusinessRules
): SnapshotDeltas {
  const deltas: SnapshotDeltas = { revenue: 0, expense: 0, payroll: 0, units: {} };

  for (const [modelName, additionalUnits] of Object.entries(adjustments)) {
    const economics = rules.economics[modelName];
    if (!economics) {
      throw new PlannerError("INVALID_ADJUSTMENT", `No economics defined for model '${modelName}'`, {
        model_name: modelName,
      });
    }
    if (!Number.isInteger(additionalUnits) || additionalUnits < 0) {
      throw new PlannerError(
        "INVALID_ADJUSTMENT",
        `Additional '${modelName}' units must be a non-negative whole number`,
        { model_name: modelName, value: additionalUnits }
      );
    }
    if (additionalUnits === 0) continue;

    const revenueChange = additionalUnits * economics.unit_revenue;
    deltas.revenue += revenueChange;
    deltas.expense += additionalUnits * economics.unit_cost;
    deltas.payroll += revenueChange * rules.commission_rate;
    deltas.units[modelName] = additionalUnits;
  }

  return deltas;
}

/** Returns a new snapshot; the baseline is left untouched. */
export function applyScenario(
  baseline: Readonly<PeriodSnapshot>,
  adjustments: Readonly<Record<string, number>>,
  rules: BusinessRules
): PeriodSnapshot {
  return applySnapshotDeltas(baseline, scenarioDeltas(adjustments, rules));
}
