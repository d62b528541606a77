import { NextResponse } from "next/server";
import { isPlannerError, type PlannerErrorKind } from "./errors";
import { logPlannerEvent } from "./logging";

const STATUS_BY_KIND: Record<PlannerErrorKind, number> = {
  INVALID_ADJUSTMENT: 400,
  INVALID_TARGET: 400,
  PERIOD_MISMATCH: 400,
  UNKNOWN_PERIOD: 404,
  TARGET_UNREACHABLE: 422,
  MODEL_BUNDLE_MISSING: 503,
  INVALID_MODEL_BUNDLE: 500,
  MISSING_FORECAST_SERIES: 500,
  INVALID_ASSUMPTIONS: 500,
};

export function plannerErrorStatus(kind: PlannerErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Map any error thrown while handling a planner request to a JSON response.
 * Validation errors are logged as rejections; startup/data errors are already
 * logged by the planner context.
 */
export function plannerErrorResponse(error: unknown, route: string) {
  if (isPlannerError(error)) {
    if (error.isValidation) {
      logPlannerEvent({
        event_type: "REQUEST_REJECTED",
        error_kind: error.kind,
        error: error.message,
      });
    }
    return NextResponse.json(
      { ok: false, error: error.message, error_kind: error.kind, details: error.details },
      { status: plannerErrorStatus(error.kind) }
    );
  }

  console.error(`Planner route ${route} failed:`, error);
  return NextResponse.json(
    { ok: false, error: error instanceof Error ? error.message : "Planner request failed" },
    { status: 500 }
  );
}

/** Parse a JSON request body; a bad body is treated as empty. */
export async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
  try {
    const body: unknown = await request.json();
    if (typeof body === "object" && body !== null && !Array.isArray(body)) {
      return Object.fromEntries(Object.entries(body));
    }
    return {};
  } catch {
    return {};
  }
}
