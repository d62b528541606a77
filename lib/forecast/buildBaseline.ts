/**
 * Baseline Forecast Builder
 *
 * Turns the trained model bundle into the baseline table the planner works
 * from: one snapshot per forecast period with revenue, expense, payroll,
 * derived profit and unit sales for every tracked vehicle model.
 */

import { PlannerError } from "@/lib/planner/errors";
import { buildPeriodSnapshot } from "@/lib/planner/periodSnapshot";
import type { BusinessRules, ForecastTable, PeriodSnapshot } from "@/types/planner";
import { forecastSeries } from "./forecastModels";
import { FINANCIAL_KPI, REQUIRED_FINANCIAL_KPIS, type FinancialKpi } from "./kpiKeys";
import type { ModelBundle } from "./modelBundle";
import { nextPeriods } from "./periods";

/** Unit counts: missing -> 0, nearest whole unit, never negative. */
export function toUnitCount(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.round(value));
}

function forecastFinancial(bundle: ModelBundle, kpi: FinancialKpi, horizon: number): number[] {
  const model = bundle.models[kpi];
  if (!model) {
    throw new PlannerError("MISSING_FORECAST_SERIES", `Required forecast series '${kpi}' is missing from the model bundle`, {
      kpi,
      source: bundle.source,
    });
  }

  const values = forecastSeries(model, horizon);
  const badIndex = values.findIndex((v) => !Number.isFinite(v));
  if (badIndex !== -1) {
    throw new PlannerError("MISSING_FORECAST_SERIES", `Forecast series '${kpi}' has no value for step ${badIndex + 1}`, {
      kpi,
      step: badIndex + 1,
      source: bundle.source,
    });
  }
  return values;
}

export function buildBaselineTable(bundle: ModelBundle, rules: BusinessRules, horizon: number): ForecastTable {
  const financial: Record<FinancialKpi, number[]> = {
    [FINANCIAL_KPI.REVENUE]: [],
    [FINANCIAL_KPI.EXPENSE]: [],
    [FINANCIAL_KPI.PAYROLL]: [],
  };
  for (const kpi of REQUIRED_FINANCIAL_KPIS) {
    financial[kpi] = forecastFinancial(bundle, kpi, horizon);
  }

  // tracked: models with economics and a unit-sales series, in economics order
  const tracked: string[] = [];
  const units: Record<string, number[]> = {};
  for (const modelName of Object.keys(rules.economics)) {
    const model = bundle.models[modelName];
    if (!model) continue;
    tracked.push(modelName);
    units[modelName] = forecastSeries(model, horizon).map(toUnitCount);
  }

  const periods: PeriodSnapshot[] = nextPeriods(bundle.last_period, horizon).map(({ period, label }, i) => {
    const units_sold: Record<string, number> = {};
    for (const modelName of tracked) units_sold[modelName] = units[modelName][i];

    return Object.freeze(
      buildPeriodSnapshot({
        period,
        label,
        revenue: financial[FINANCIAL_KPI.REVENUE][i],
        expense: financial[FINANCIAL_KPI.EXPENSE][i],
        payroll: financial[FINANCIAL_KPI.PAYROLL][i],
        units_sold,
      })
    );
  });

  return Object.freeze({
    horizon,
    tracked_models: Object.freeze(tracked),
    periods: Object.freeze(periods),
  });
}

export function findPeriod(table: ForecastTable, period: string): Readonly<PeriodSnapshot> {
  const snapshot = table.periods.find((p) => p.period === period);
  if (!snapshot) {
    throw new PlannerError("UNKNOWN_PERIOD", `Period '${period}' is not in the forecast horizon`, {
      period,
      available: table.periods.map((p) => p.period),
    });
  }
  return snapshot;
}
