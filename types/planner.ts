/**
 * Dealer Planner Data Contracts
 *
 * Shapes shared by the forecast adapter, the planner and the API routes.
 * Returned as-is in route responses, so field names stay snake_case.
 */

export interface VehicleAssumption {
  unit_revenue: number;
  unit_cost: number;
}

export interface ModelEconomics {
  model_name: string;
  unit_revenue: number;
  unit_cost: number;
  commission: number;
  profit_per_unit: number;
}

/** Sorted by profit_per_unit, highest first. */
export type ProfitabilityRanking = ReadonlyArray<ModelEconomics>;

export interface BusinessRules {
  commission_rate: number;
  economics: Readonly<Record<string, ModelEconomics>>;
  ranking: ProfitabilityRanking;
}

export interface PeriodSnapshot {
  /** YYYY-MM */
  period: string;
  /** e.g. "July 2024" */
  label: string;
  revenue: number;
  expense: number;
  payroll: number;
  /** revenue - (expense + payroll), never set directly */
  profit: number;
  units_sold: Record<string, number>;
}

export interface ForecastTable {
  horizon: number;
  tracked_models: ReadonlyArray<string>;
  periods: ReadonlyArray<Readonly<PeriodSnapshot>>;
}

/** model_name -> additional units */
export type ActionPlan = Record<string, number>;

export type PlannerMode = "what-if" | "target";

export type TargetSolution =
  | {
      status: "no_action_needed";
      profit_gap: number;
      plan: ActionPlan;
    }
  | {
      status: "planned";
      profit_gap: number;
      plan: ActionPlan;
      model_name: string;
      profit_per_unit: number;
      projected_uplift: number;
    }
  | {
      status: "target_unreachable";
      profit_gap: number;
      plan: ActionPlan;
      reason: string;
    };

export interface ProfitComparisonRow {
  plan: "Baseline Forecast" | "Adjusted Plan";
  profit: number;
}

export interface PlanSummary {
  period: string;
  label: string;
  baseline_profit: number;
  adjusted_profit: number;
  profit_delta: number;
  adjusted: PeriodSnapshot;
  comparison: [ProfitComparisonRow, ProfitComparisonRow];
}

export interface ActionPlanRow {
  model_name: string;
  label: string;
  value: string;
  units: number;
}
