import { describe, expect, it } from "vitest";
import { parsePlanArgs } from "../planArgs";

describe("parsePlanArgs", () => {
  it("reads period, target and repeated adjustments", () => {
    expect(
      parsePlanArgs(["--period", "2024-07", "--target", "150,000", "--add", "Outlander=2", "--add", "RVR=3"])
    ).toEqual({
      period: "2024-07",
      target: 150000,
      adjustments: { Outlander: 2, RVR: 3 },
    });
  });

  it("defaults to a what-if run with no adjustments", () => {
    expect(parsePlanArgs([])).toEqual({ period: null, target: null, adjustments: {} });
  });

  it("rejects a trailing flag without a value", () => {
    expect(() => parsePlanArgs(["--period", "2024-07", "--target"])).toThrow("--target expects a value");
  });

  it("does not take the next flag as a value", () => {
    expect(() => parsePlanArgs(["--period", "--target", "150000"])).toThrow("--period expects a value");
  });

  it("rejects an adjustment without a model name", () => {
    expect(() => parsePlanArgs(["--add", "=3"])).toThrow("--add expects Model=units, got '=3'");
  });
});
