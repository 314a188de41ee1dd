import { describe, it, expect } from "vitest";
import { resolveEngineConfig } from "./effective-config";
import { DEFAULT_GRADUAL_SPLITS, DEFAULT_UPLIFT_TABLE } from "@/lib/types/zod";
import { thrownCode } from "@/fixtures/populations";

describe("resolveEngineConfig", () => {
  it("applies defaults", () => {
    const config = resolveEngineConfig();
    expect(config.maxDirectReports).toBe(6);
    expect(config.budgetConstraintPercent).toBe(0.005);
    expect(config.confidenceInterval).toBe(0.95);
    expect(config.peerGroupBy).toBe("LEVEL");
    expect(config.gradualSplits).toEqual(DEFAULT_GRADUAL_SPLITS);
    expect(config.scenarioAdjustments).toEqual({
      conservativeMargin: 0.005,
      optimisticImprovementProbability: 0.5,
    });
    expect(config.genderGap).toEqual({ reference: "Male", comparison: "Female" });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("keeps caller overrides", () => {
    const config = resolveEngineConfig({ maxDirectReports: 4, poolSelection: "EMPLOYEE_ID" });
    expect(config.maxDirectReports).toBe(4);
    expect(config.poolSelection).toBe("EMPLOYEE_ID");
  });

  it("fails closed on bad values", () => {
    expect(thrownCode(() => resolveEngineConfig({ budgetConstraintPercent: 0 }))).toBe("INVALID_BUDGET");
    expect(thrownCode(() => resolveEngineConfig({ confidenceInterval: 1 }))).toBe("INVALID_CONFIDENCE");
    expect(thrownCode(() => resolveEngineConfig({ maxYears: 0 }))).toBe("INVALID_YEARS");
    expect(thrownCode(() => resolveEngineConfig({ maxDirectReports: 0 }))).toBe("INVALID_CONFIG");
    expect(thrownCode(() => resolveEngineConfig({ minLevel: 4, maxLevel: 2 }))).toBe("INVALID_CONFIG");
  });

  it("reports schema violations as INVALID_CONFIG", () => {
    expect(thrownCode(() => resolveEngineConfig({ maxDirectReports: 2.5 }))).toBe("INVALID_CONFIG");
    expect(thrownCode(() => resolveEngineConfig({ budgetConstraintPercent: Infinity }))).toBe(
      "INVALID_CONFIG"
    );
    expect(thrownCode(() => resolveEngineConfig({ medianGrowthRate: Number.NaN }))).toBe("INVALID_CONFIG");
  });

  it("rejects uplift rates at or below -100%", () => {
    const upliftTable = {
      ...DEFAULT_UPLIFT_TABLE,
      Exceeding: { ...DEFAULT_UPLIFT_TABLE.Exceeding, baseline: -1.05 },
    };
    expect(thrownCode(() => resolveEngineConfig({ upliftTable }))).toBe("INVALID_CONFIG");
  });

  it("accepts negative rates above -100%", () => {
    const upliftTable = {
      ...DEFAULT_UPLIFT_TABLE,
      "Not met": { ...DEFAULT_UPLIFT_TABLE["Not met"], baseline: -0.02 },
    };
    expect(resolveEngineConfig({ upliftTable }).upliftTable["Not met"].baseline).toBe(-0.02);
  });

  it("validates gradual splits", () => {
    const bad = [
      [{ years: 1, weights: [1] }],
      [{ years: 3, weights: [0.5, 0.5] }],
      [{ years: 2, weights: [0.5, 0.4] }],
      [{ years: 2, weights: [1.5, -0.5] }],
      [
        { years: 2, weights: [0.5, 0.5] },
        { years: 2, weights: [0.7, 0.3] },
      ],
    ];
    for (const gradualSplits of bad) {
      expect(thrownCode(() => resolveEngineConfig({ gradualSplits }))).toBe("INVALID_CONFIG");
    }
  });
});
