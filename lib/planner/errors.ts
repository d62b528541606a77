/**
 * Planner error taxonomy.
 *
 * Validation kinds are recovered at the route (the user re-submits);
 * bundle and forecast kinds stop the request.
 */

export type PlannerErrorKind =
  | "MODEL_BUNDLE_MISSING"
  | "INVALID_MODEL_BUNDLE"
  | "MISSING_FORECAST_SERIES"
  | "INVALID_ASSUMPTIONS"
  | "INVALID_ADJUSTMENT"
  | "INVALID_TARGET"
  | "UNKNOWN_PERIOD"
  | "TARGET_UNREACHABLE"
  | "PERIOD_MISMATCH";

const VALIDATION_KINDS: ReadonlySet<PlannerErrorKind> = new Set<PlannerErrorKind>([
  "INVALID_ADJUSTMENT",
  "INVALID_TARGET",
  "UNKNOWN_PERIOD",
  "TARGET_UNREACHABLE",
]);

export class PlannerError extends Error {
  readonly kind: PlannerErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: PlannerErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PlannerError";
    this.kind = kind;
    this.details = details;
  }

  get isValidation(): boolean {
    return VALIDATION_KINDS.has(this.kind);
  }
}

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}
