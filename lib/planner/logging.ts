/**
 * Shared planner logging helper
 * Emits one structured PLANNER_EVENT line per startup step or planning request
 */

export type PlannerEventType =
  | "BUNDLE_LOADED"
  | "BASELINE_READY"
  | "STARTUP_FAILED"
  | "WHAT_IF_APPLIED"
  | "TARGET_SOLVED"
  | "TARGET_UNREACHABLE"
  | "REQUEST_REJECTED";

export interface PlannerLogParams {
  event_type: PlannerEventType;
  period?: string;
  source?: string;
  kpi_count?: number;
  tracked_models?: string[];
  horizon?: number;
  adjustments?: Record<string, number>;
  plan?: Record<string, number>;
  profit_gap?: number;
  baseline_profit?: number;
  adjusted_profit?: number;
  error_kind?: string;
  error?: string;
  duration_ms?: number;
}

export function logPlannerEvent(params: PlannerLogParams): void {
  const { event_type, ...rest } = params;

  const logData: Record<string, unknown> = {
    event_type,
    timestamp: new Date().toISOString(),
  };

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) logData[key] = value;
  }

  if (event_type === "STARTUP_FAILED") {
    console.error("PLANNER_EVENT", logData);
  } else if (event_type === "REQUEST_REJECTED" || event_type === "TARGET_UNREACHABLE") {
    console.warn("PLANNER_EVENT", logData);
  } else {
    console.log("PLANNER_EVENT", logData);
  }
}
