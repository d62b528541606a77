/**
 * Forecast Model Evaluation
 *
 * The bundle stores the fitted state of each per-KPI model; forecasting is
 * evaluating that state forward. Supported kinds:
 * - constant: flat value
 * - holt_linear: level + trend, optionally damped (phi in (0, 1])
 * - holt_winters_additive: level + trend + additive seasonal component
 */

export type ForecastModel =
  | { kind: "constant"; value: number }
  | { kind: "holt_linear"; level: number; trend: number; damping?: number }
  | {
      kind: "holt_winters_additive";
      level: number;
      trend: number;
      seasonals: number[];
      /** Index into seasonals for the first forecast step */
      season_offset: number;
    };

export type ForecastModelKind = ForecastModel["kind"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Parse one model definition from the bundle.
 * Returns an error string instead of throwing so the bundle loader can name the KPI.
 */
export function parseForecastModel(raw: unknown): { ok: true; model: ForecastModel } | { ok: false; error: string } {
  if (!isRecord(raw)) return { ok: false, error: "model definition must be an object" };

  switch (raw.kind) {
    case "constant":
      if (!isFiniteNumber(raw.value)) return { ok: false, error: "constant model needs a numeric value" };
      return { ok: true, model: { kind: "constant", value: raw.value } };

    case "holt_linear": {
      if (!isFiniteNumber(raw.level) || !isFiniteNumber(raw.trend)) {
        return { ok: false, error: "holt_linear model needs numeric level and trend" };
      }
      if (raw.damping === undefined) {
        return { ok: true, model: { kind: "holt_linear", level: raw.level, trend: raw.trend } };
      }
      if (!isFiniteNumber(raw.damping) || raw.damping <= 0 || raw.damping > 1) {
        return { ok: false, error: "holt_linear damping must be in (0, 1]" };
      }
      return {
        ok: true,
        model: { kind: "holt_linear", level: raw.level, trend: raw.trend, damping: raw.damping },
      };
    }

    case "holt_winters_additive": {
      const { level, trend, seasonals, season_offset } = raw;
      if (!isFiniteNumber(level) || !isFiniteNumber(trend)) {
        return { ok: false, error: "holt_winters_additive model needs numeric level and trend" };
      }
      if (!Array.isArray(seasonals) || seasonals.length === 0) {
        return { ok: false, error: "holt_winters_additive model needs a non-empty seasonals array" };
      }
      const parsedSeasonals: number[] = [];
      for (const s of seasonals) {
        if (!isFiniteNumber(s)) return { ok: false, error: "seasonals must all be numbers" };
        parsedSeasonals.push(s);
      }
      const offset = season_offset === undefined ? 0 : season_offset;
      if (typeof offset !== "number" || !Number.isInteger(offset) || offset < 0) {
        return { ok: false, error: "season_offset must be a non-negative integer" };
      }
      return {
        ok: true,
        model: { kind: "holt_winters_additive", level, trend, seasonals: parsedSeasonals, season_offset: offset },
      };
    }

    default:
      return { ok: false, error: `unsupported model kind '${String(raw.kind)}'` };
  }
}

function dampedTrendMultiplier(phi: number, step: number): number {
  if (phi === 1) return step;
  let sum = 0;
  let term = 1;
  for (let i = 1; i <= step; i++) {
    term *= phi;
    sum += term;
  }
  return sum;
}

/** Forecast `steps` future values, one per period. */
export function forecastSeries(model: ForecastModel, steps: number): number[] {
  const out: number[] = [];
  for (let h = 1; h <= steps; h++) {
    if (model.kind === "constant") {
      out.push(model.value);
    } else if (model.kind === "holt_linear") {
      out.push(model.level + model.trend * dampedTrendMultiplier(model.damping ?? 1, h));
    } else {
      const m = model.seasonals.length;
      const seasonal = model.seasonals[(model.season_offset + h - 1) % m];
      out.push(model.level + model.trend * h + seasonal);
    }
  }
  return out;
}
