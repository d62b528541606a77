import { describe, expect, it } from "vitest";
import {
  COMMISSION_RATE,
  DEFAULT_VEHICLE_ASSUMPTIONS,
  buildBusinessRules,
  getBusinessRules,
} from "../businessRules";
import { PlannerError } from "../errors";

describe("buildBusinessRules", () => {
  it("derives commission and profit per unit from revenue and cost", () => {
    const rules = buildBusinessRules({ Outlander: { unit_revenue: 30000, unit_cost: 25000 } }, 0.05);

    expect(rules.economics.Outlander).toEqual({
      model_name: "Outlander",
      unit_revenue: 30000,
      unit_cost: 25000,
      commission: 1500,
      profit_per_unit: 3500,
    });
  });

  it("ranks the reference models by profit per unit", () => {
    const rules = buildBusinessRules(DEFAULT_VEHICLE_ASSUMPTIONS, COMMISSION_RATE);

    expect(rules.ranking.map((e) => [e.model_name, e.profit_per_unit])).toEqual([
      ["Outlander", 3500],
      ["RVR", 2800],
      ["Eclipse Cross", 2600],
      ["Mirage", 2100],
    ]);
  });

  it("keeps insertion order for equal profit per unit", () => {
    const rules = buildBusinessRules(
      {
        Alpha: { unit_revenue: 10000, unit_cost: 9000 },
        Bravo: { unit_revenue: 20000, unit_cost: 10000 },
        Charlie: { unit_revenue: 10000, unit_cost: 9000 },
      },
      0
    );

    expect(rules.ranking.map((e) => e.model_name)).toEqual(["Bravo", "Alpha", "Charlie"]);
  });

  it("recomputes profit per unit when the inputs change", () => {
    const before = buildBusinessRules({ RVR: { unit_revenue: 24000, unit_cost: 20000 } }, 0.05);
    const after = buildBusinessRules({ RVR: { unit_revenue: 26000, unit_cost: 20000 } }, 0.05);

    expect(before.economics.RVR.profit_per_unit).toBe(2800);
    expect(after.economics.RVR.profit_per_unit).toBe(4700);
  });

  it("returns frozen rules", () => {
    const rules = buildBusinessRules(DEFAULT_VEHICLE_ASSUMPTIONS);

    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(rules.economics)).toBe(true);
    expect(Object.isFrozen(rules.ranking)).toBe(true);
    expect(Object.isFrozen(rules.economics.Mirage)).toBe(true);
  });

  it("rejects invalid assumptions", () => {
    expect(() => buildBusinessRules({ Bad: { unit_revenue: Number.NaN, unit_cost: 1 } })).toThrow(PlannerError);
    expect(() => buildBusinessRules({ Bad: { unit_revenue: 100, unit_cost: -1 } })).toThrow(PlannerError);
    expect(() => buildBusinessRules({}, 1)).toThrow("Commission rate must be in [0, 1)");
  });
});

describe("getBusinessRules", () => {
  it("builds the reference configuration once", () => {
    const first = getBusinessRules();

    expect(getBusinessRules()).toBe(first);
    expect(first.commission_rate).toBe(0.05);
    expect(Object.keys(first.economics)).toEqual(["Outlander", "RVR", "Eclipse Cross", "Mirage"]);
  });
});
