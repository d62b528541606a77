/**
 * Trained Model Bundle
 *
 * Loads the per-KPI forecasting models from a JSON bundle, either on local
 * disk or in Supabase Storage. The bundle is produced by the training job:
 *
 * {
 *   "version": 1,
 *   "trained_at": "2024-07-02T09:00:00Z",
 *   "last_period": "2024-06",
 *   "models": { "<kpi key>": { "kind": "holt_linear", ... }, ... }
 * }
 */

import { readFile } from "fs/promises";
import path from "path";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { PlannerConfig } from "@/lib/config/plannerConfig";
import { PlannerError } from "@/lib/planner/errors";
import { getSupabaseService } from "@/lib/supabase/service";
import { parseForecastModel, type ForecastModel } from "./forecastModels";
import { isPeriodKey } from "./periods";

export const MODEL_BUNDLE_VERSION = 1;

export interface ModelBundle {
  version: number;
  trained_at: string | null;
  /** Last period the models were trained on (YYYY-MM) */
  last_period: string;
  models: Record<string, ForecastModel>;
  source: string;
}

export interface BundleReader {
  source: string;
  read: () => Promise<string>;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}

export function createFileBundleReader(filePath: string): BundleReader {
  const absolutePath = path.resolve(process.cwd(), filePath);
  return {
    source: `file:${filePath}`,
    read: async () => {
      try {
        return await readFile(absolutePath, "utf8");
      } catch (error) {
        const code = errorCode(error);
        const message =
          code === "ENOENT"
            ? `The model file '${filePath}' was not found. Run the training job first.`
            : `The model file '${filePath}' could not be read.`;
        throw new PlannerError("MODEL_BUNDLE_MISSING", message, {
          path: filePath,
          code: code ?? null,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  };
}

export function createSupabaseBundleReader(
  client: SupabaseClient,
  bucket: string,
  objectPath: string
): BundleReader {
  return {
    source: `supabase:${bucket}/${objectPath}`,
    read: async () => {
      const { data, error } = await client.storage.from(bucket).download(objectPath);
      if (error || !data) {
        throw new PlannerError(
          "MODEL_BUNDLE_MISSING",
          `The model bundle '${objectPath}' could not be downloaded from bucket '${bucket}'.`,
          { bucket, path: objectPath, error: error ? error.message : "empty response" }
        );
      }
      return data.text();
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseModelBundle(text: string, source: string): ModelBundle {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PlannerError("INVALID_MODEL_BUNDLE", "The model bundle is not valid JSON", {
      source,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isRecord(raw)) {
    throw new PlannerError("INVALID_MODEL_BUNDLE", "The model bundle must be a JSON object", { source });
  }
  if (raw.version !== MODEL_BUNDLE_VERSION) {
    throw new PlannerError("INVALID_MODEL_BUNDLE", `Unsupported model bundle version '${String(raw.version)}'`, {
      source,
      expected: MODEL_BUNDLE_VERSION,
    });
  }
  if (!isPeriodKey(raw.last_period)) {
    throw new PlannerError("INVALID_MODEL_BUNDLE", "The model bundle needs last_period as YYYY-MM", { source });
  }
  if (!isRecord(raw.models)) {
    throw new PlannerError("INVALID_MODEL_BUNDLE", "The model bundle has no models object", { source });
  }

  const models: Record<string, ForecastModel> = {};
  for (const [kpi, definition] of Object.entries(raw.models)) {
    const parsed = parseForecastModel(definition);
    if (!parsed.ok) {
      throw new PlannerError("INVALID_MODEL_BUNDLE", `Model for KPI '${kpi}' is invalid: ${parsed.error}`, {
        source,
        kpi,
      });
    }
    models[kpi] = parsed.model;
  }

  return {
    version: MODEL_BUNDLE_VERSION,
    trained_at: typeof raw.trained_at === "string" ? raw.trained_at : null,
    last_period: raw.last_period,
    models,
    source,
  };
}

export function createBundleReader(config: PlannerConfig, options: { fetch?: typeof fetch } = {}): BundleReader {
  if (config.bundle_source === "file") return createFileBundleReader(config.bundle_path);

  const client = getSupabaseService(config.supabase_url, config.supabase_service_key, options);
  if (!client) {
    throw new PlannerError(
      "MODEL_BUNDLE_MISSING",
      "Model bundle source is Supabase but NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is not set.",
      { bucket: config.bundle_bucket, path: config.bundle_path }
    );
  }
  return createSupabaseBundleReader(client, config.bundle_bucket, config.bundle_path);
}

export async function loadModelBundle(reader: BundleReader): Promise<ModelBundle> {
  const text = await reader.read();
  return parseModelBundle(text, reader.source);
}
