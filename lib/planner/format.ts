import type { ActionPlan, ActionPlanRow } from "@/types/planner";

/** Whole-number display with thousands separators, e.g. -1,234,568 */
export function formatWhole(x: number): string {
  if (!Number.isFinite(x)) return "—";
  const s = Math.abs(x).toFixed(0);
  const grouped = s.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return x < 0 && grouped !== "0" ? `-${grouped}` : grouped;
}

export function actionPlanRows(plan: ActionPlan): ActionPlanRow[] {
  return Object.entries(plan).map(([modelName, units]) => ({
    model_name: modelName,
    label: `Sell more '${modelName}'`,
    value: `${units} units`,
    units,
  }));
}
