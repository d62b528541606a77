import { describe, expect, it, vi } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { DEFAULT_BUNDLE_BUCKET, type PlannerConfig } from "@/lib/config/plannerConfig";
import { PlannerError } from "@/lib/planner/errors";
import {
  createBundleReader,
  createFileBundleReader,
  loadModelBundle,
  parseModelBundle,
} from "../modelBundle";

const fixturePath = fileURLToPath(new URL("./fixtures/bundle.json", import.meta.url));
const fixtureText = readFileSync(fixturePath, "utf8");

function config(overrides: Partial<PlannerConfig> = {}): PlannerConfig {
  return {
    bundle_source: "file",
    bundle_path: fixturePath,
    bundle_bucket: DEFAULT_BUNDLE_BUCKET,
    supabase_url: null,
    supabase_service_key: null,
    forecast_horizon: 3,
    max_additional_units: 50,
    default_target_uplift: 50000,
    ...overrides,
  };
}

async function expectPlannerError(promise: Promise<unknown>, kind: string) {
  await expect(promise).rejects.toBeInstanceOf(PlannerError);
  await expect(promise).rejects.toMatchObject({ kind });
}

describe("loadModelBundle from a file", () => {
  it("reads and parses the bundle", async () => {
    const bundle = await loadModelBundle(createFileBundleReader(fixturePath));

    expect(bundle.version).toBe(1);
    expect(bundle.last_period).toBe("2024-06");
    expect(bundle.trained_at).toBe("2024-07-01T00:00:00Z");
    expect(Object.keys(bundle.models)).toEqual([
      "Currency:Revenue/Sales",
      "Currency:Expense",
      "Currency:Payroll/Compensation",
      "Outlander",
      "RVR",
      "Mirage",
    ]);
    expect(bundle.source).toBe(`file:${fixturePath}`);
  });

  it("reports a missing file as MODEL_BUNDLE_MISSING", async () => {
    const promise = loadModelBundle(createFileBundleReader("does/not/exist.json"));

    await expectPlannerError(promise, "MODEL_BUNDLE_MISSING");
    await expect(promise).rejects.toThrow(
      "The model file 'does/not/exist.json' was not found. Run the training job first."
    );
  });
});

describe("parseModelBundle", () => {
  it("rejects malformed JSON", () => {
    expect(() => parseModelBundle("{", "test")).toThrow("The model bundle is not valid JSON");
  });

  it("rejects unsupported versions and periods", () => {
    expect(() => parseModelBundle(JSON.stringify({ version: 2, last_period: "2024-06", models: {} }), "test")).toThrow(
      "Unsupported model bundle version '2'"
    );
    expect(() => parseModelBundle(JSON.stringify({ version: 1, last_period: "2024-13", models: {} }), "test")).toThrow(
      "The model bundle needs last_period as YYYY-MM"
    );
  });

  it("names the KPI with an invalid model", () => {
    const text = JSON.stringify({
      version: 1,
      last_period: "2024-06",
      models: { "Currency:Expense": { kind: "constant" } },
    });

    expect(() => parseModelBundle(text, "test")).toThrow(
      "Model for KPI 'Currency:Expense' is invalid: constant model needs a numeric value"
    );
  });

  it("defaults a missing trained_at to null", () => {
    const bundle = parseModelBundle(JSON.stringify({ version: 1, last_period: "2023-12", models: {} }), "test");

    expect(bundle.trained_at).toBeNull();
    expect(bundle.models).toEqual({});
  });
});

describe("createBundleReader", () => {
  it("uses the local file by default", () => {
    expect(createBundleReader(config()).source).toBe(`file:${fixturePath}`);
  });

  it("fails when Supabase is selected but not configured", () => {
    expect(() => createBundleReader(config({ bundle_source: "supabase" }))).toThrow(PlannerError);
  });

  it("downloads the bundle from Supabase Storage", async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(fixtureText));
    const reader = createBundleReader(
      config({
        bundle_source: "supabase",
        bundle_path: "bundles/trained_models.json",
        supabase_url: "http://localhost:54321",
        supabase_service_key: "test-service-key",
      }),
      { fetch: fetchMock }
    );

    const bundle = await loadModelBundle(reader);

    expect(reader.source).toBe("supabase:forecast-models/bundles/trained_models.json");
    expect(bundle.last_period).toBe("2024-06");
    expect(bundle.source).toBe("supabase:forecast-models/bundles/trained_models.json");
    expect(String(fetchMock.mock.calls[0][0])).toContain("forecast-models/bundles/trained_models.json");
  });

  it("reports a missing Storage object as MODEL_BUNDLE_MISSING", async () => {
    const fetchMock = vi.fn(
      async (_input: RequestInfo | URL, _init?: RequestInit) =>
        new Response(JSON.stringify({ statusCode: "404", error: "not_found", message: "Object not found" }), {
          status: 404,
          headers: { "content-type": "application/json" },
        })
    );
    const reader = createBundleReader(
      config({
        bundle_source: "supabase",
        supabase_url: "http://localhost:54321",
        supabase_service_key: "test-service-key",
      }),
      { fetch: fetchMock }
    );

    await expectPlannerError(loadModelBundle(reader), "MODEL_BUNDLE_MISSING");
  });
});
