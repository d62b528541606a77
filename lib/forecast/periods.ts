const PERIOD_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export interface ForecastPeriod {
  /** YYYY-MM */
  period: string;
  /** e.g. "July 2024" */
  label: string;
}

export function isPeriodKey(value: unknown): value is string {
  return typeof value === "string" && PERIOD_PATTERN.test(value);
}

function formatPeriodLabel(year: number, monthIdx0: number): string {
  return new Date(Date.UTC(year, monthIdx0, 1)).toLocaleString("en-US", {
    month: "long",
    year: "numeric",
    timeZone: "UTC",
  });
}

/** The `count` monthly periods following `lastPeriod`. */
export function nextPeriods(lastPeriod: string, count: number): ForecastPeriod[] {
  const match = PERIOD_PATTERN.exec(lastPeriod);
  if (!match) throw new Error(`Invalid period '${lastPeriod}', expected YYYY-MM`);

  let year = Number(match[1]);
  let month = Number(match[2]) - 1;
  const out: ForecastPeriod[] = [];

  for (let i = 0; i < count; i++) {
    month += 1;
    if (month === 12) {
      month = 0;
      year += 1;
    }
    out.push({
      period: `${year}-${String(month + 1).padStart(2, "0")}`,
      label: formatPeriodLabel(year, month),
    });
  }
  return out;
}
