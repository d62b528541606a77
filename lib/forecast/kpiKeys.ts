/**
 * KPI keys used by the trained model bundle.
 * Financial series use the dealership reporting names below. Unit-sales series
 * have no prefix: each is keyed by the vehicle model name itself ("Outlander").
 */

export const FINANCIAL_KPI = {
  REVENUE: "Currency:Revenue/Sales",
  EXPENSE: "Currency:Expense",
  PAYROLL: "Currency:Payroll/Compensation",
} as const;

export type FinancialKpi = (typeof FINANCIAL_KPI)[keyof typeof FINANCIAL_KPI];

export const REQUIRED_FINANCIAL_KPIS: ReadonlyArray<FinancialKpi> = [
  FINANCIAL_KPI.REVENUE,
  FINANCIAL_KPI.EXPENSE,
  FINANCIAL_KPI.PAYROLL,
];
