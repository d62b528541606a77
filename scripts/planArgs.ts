/**
 * Argument parsing for scripts/plan-once.ts.
 */

export interface PlanArgs {
  period: string | null;
  target: number | null;
  adjustments: Record<string, number>;
}

const VALUE_FLAGS = new Set(["--period", "--target", "--add"]);

export function parsePlanArgs(argv: string[]): PlanArgs {
  const args: PlanArgs = { period: null, target: null, adjustments: {} };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (!VALUE_FLAGS.has(flag)) continue;

    const value = argv[i + 1];
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw new Error(`${flag} expects a value`);
    }
    i++;

    if (flag === "--period") {
      args.period = value;
    } else if (flag === "--target") {
      args.target = Number(value.replace(/,/g, ""));
    } else {
      const eq = value.lastIndexOf("=");
      if (eq <= 0) throw new Error(`--add expects Model=units, got '${value}'`);
      args.adjustments[value.slice(0, eq)] = Number(value.slice(eq + 1));
    }
  }
  return args;
}
