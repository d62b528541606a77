/**
 * Vehicle Business Rules
 *
 * Per-model unit economics used by the what-if applier and the target solver.
 *
 * REFERENCE ASSUMPTIONS (per unit sold):
 * - Outlander: $30,000 revenue, $25,000 cost of sales
 * - RVR: $24,000 revenue, $20,000 cost of sales
 * - Eclipse Cross: $28,000 revenue, $24,000 cost of sales
 * - Mirage: $18,000 revenue, $15,000 cost of sales
 * - Sales commission: 5% of unit revenue, booked as payroll
 */

import { PlannerError } from "./errors";
import type {
  BusinessRules,
  ModelEconomics,
  ProfitabilityRanking,
  VehicleAssumption,
} from "@/types/planner";

export const COMMISSION_RATE = 0.05;

export const DEFAULT_VEHICLE_ASSUMPTIONS: Readonly<Record<string, VehicleAssumption>> = {
  Outlander: { unit_revenue: 30000, unit_cost: 25000 },
  RVR: { unit_revenue: 24000, unit_cost: 20000 },
  "Eclipse Cross": { unit_revenue: 28000, unit_cost: 24000 },
  Mirage: { unit_revenue: 18000, unit_cost: 15000 },
};

function deriveEconomics(
  modelName: string,
  assumption: VehicleAssumption,
  commissionRate: number
): ModelEconomics {
  const { unit_revenue, unit_cost } = assumption;
  if (!Number.isFinite(unit_revenue) || !Number.isFinite(unit_cost) || unit_revenue < 0 || unit_cost < 0) {
    throw new PlannerError("INVALID_ASSUMPTIONS", `Invalid economics for model '${modelName}'`, {
      model_name: modelName,
      unit_revenue,
      unit_cost,
    });
  }

  const commission = unit_revenue * commissionRate;
  return Object.freeze({
    model_name: modelName,
    unit_revenue,
    unit_cost,
    commission,
    profit_per_unit: unit_revenue - unit_cost - commission,
  });
}

/**
 * Build economics and the profitability ranking from fixed assumptions.
 * Array.prototype.sort is stable, so ties keep insertion order.
 */
export function buildBusinessRules(
  assumptions: Readonly<Record<string, VehicleAssumption>>,
  commissionRate: number = COMMISSION_RATE
): BusinessRules {
  if (!Number.isFinite(commissionRate) || commissionRate < 0 || commissionRate >= 1) {
    throw new PlannerError("INVALID_ASSUMPTIONS", "Commission rate must be in [0, 1)", {
      commission_rate: commissionRate,
    });
  }

  const economics: Record<string, ModelEconomics> = {};
  for (const [modelName, assumption] of Object.entries(assumptions)) {
    economics[modelName] = deriveEconomics(modelName, assumption, commissionRate);
  }

  const ranking: ProfitabilityRanking = Object.freeze(
    Object.values(economics).sort((a, b) => b.profit_per_unit - a.profit_per_unit)
  );

  return Object.freeze({
    commission_rate: commissionRate,
    economics: Object.freeze(economics),
    ranking,
  });
}

let businessRules: BusinessRules | null = null;

/** Reference configuration, built once per process. */
export function getBusinessRules(): BusinessRules {
  if (businessRules) return businessRules;
  businessRules = buildBusinessRules(DEFAULT_VEHICLE_ASSUMPTIONS, COMMISSION_RATE);
  return businessRules;
}
