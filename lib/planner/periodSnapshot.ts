import type { PeriodSnapshot } from "@/types/planner";

type SnapshotFields = Omit<PeriodSnapshot, "profit">;

/** The only way a snapshot gets its profit. */
export function buildPeriodSnapshot(fields: SnapshotFields): PeriodSnapshot {
  return {
    period: fields.period,
    label: fields.label,
    revenue: fields.revenue,
    expense: fields.expense,
    payroll: fields.payroll,
    profit: fields.revenue - (fields.expense + fields.payroll),
    units_sold: { ...fields.units_sold },
  };
}

export function copyPeriodSnapshot(snapshot: Readonly<PeriodSnapshot>): PeriodSnapshot {
  return buildPeriodSnapshot(snapshot);
}

export interface SnapshotDeltas {
  revenue: number;
  expense: number;
  payroll: number;
  units: Record<string, number>;
}

export function applySnapshotDeltas(
  snapshot: Readonly<PeriodSnapshot>,
  deltas: SnapshotDeltas
): PeriodSnapshot {
  const units_sold = { ...snapshot.units_sold };
  for (const [modelName, units] of Object.entries(deltas.units)) {
    units_sold[modelName] = (units_sold[modelName] ?? 0) + units;
  }

  return buildPeriodSnapshot({
    period: snapshot.period,
    label: snapshot.label,
    revenue: snapshot.revenue + deltas.revenue,
    expense: snapshot.expense + deltas.expense,
    payroll: snapshot.payroll + deltas.payroll,
    units_sold,
  });
}
