import { describe, it, expect } from "vitest";
import { levelTier, projectEmployee, projectPopulation, scenarioAnnualRate } from "./scenario-projector";
import { resolveEngineConfig } from "./effective-config";
import { makeEmployee, thrownCode } from "@/fixtures/populations";

const config = resolveEngineConfig();

describe("levelTier", () => {
  it("cycles competent, advanced, expert every three levels", () => {
    expect([1, 2, 3, 4, 5, 6].map(levelTier)).toEqual([
      "competent",
      "advanced",
      "expert",
      "competent",
      "advanced",
      "expert",
    ]);
  });

  it("rejects levels below 1", () => {
    expect(thrownCode(() => levelTier(0))).toBe("INVALID_LEVEL");
  });
});

describe("scenarioAnnualRate", () => {
  const achievingExpert = { level: 3, performanceRating: "Achieving" as const };

  it("adds baseline, performance and tier bonus for the realistic case", () => {
    expect(scenarioAnnualRate(achievingExpert, "realistic", config)).toBeCloseTo(0.035, 12);
  });

  it("subtracts the margin from performance for the conservative case", () => {
    expect(scenarioAnnualRate(achievingExpert, "conservative", config)).toBeCloseTo(0.03, 12);
  });

  it("blends towards the next rating for the optimistic case", () => {
    expect(scenarioAnnualRate(achievingExpert, "optimistic", config)).toBeCloseTo(0.04, 12);
  });

  it("floors the conservative performance component at zero", () => {
    const rate = scenarioAnnualRate({ level: 1, performanceRating: "Not met" }, "conservative", config);
    expect(rate).toBeCloseTo(0.0125, 12);
  });

  it("keeps the top rating's performance in the optimistic case", () => {
    const rate = scenarioAnnualRate({ level: 2, performanceRating: "Exceeding" }, "optimistic", config);
    expect(rate).toBeCloseTo(0.0125 + 0.03 + 0.0075, 12);
  });

  it("orders scenarios conservative <= realistic <= optimistic", () => {
    const e = { level: 5, performanceRating: "High Performing" as const };
    const c = scenarioAnnualRate(e, "conservative", config);
    const r = scenarioAnnualRate(e, "realistic", config);
    const o = scenarioAnnualRate(e, "optimistic", config);
    expect(c).toBeLessThanOrEqual(r);
    expect(r).toBeLessThanOrEqual(o);
  });
});

describe("projectEmployee", () => {
  const employee = makeEmployee({ id: 7, level: 3, salary: 50000 });

  it("builds a yearly path for each scenario", () => {
    const projection = projectEmployee(employee, config);
    const realistic = projection.scenarios.realistic;
    expect(projection.years).toBe(5);
    expect(realistic.salaries).toHaveLength(6);
    expect(realistic.salaries[0]).toBe(50000);
    expect(realistic.finalSalary).toBeCloseTo(50000 * Math.pow(1.035, 5), 6);
    expect(realistic.cagr).toBeCloseTo(0.035, 10);
    expect(realistic.totalIncrease).toBeCloseTo(realistic.finalSalary - 50000, 6);
    expect(realistic.confidence.lower).toBeLessThan(realistic.finalSalary);
    expect(realistic.confidence.upper).toBeGreaterThan(realistic.finalSalary);
  });

  it("honours an explicit horizon", () => {
    expect(projectEmployee(employee, config, 2).scenarios.optimistic.salaries).toHaveLength(3);
  });

  it("rejects a non-integer or non-positive horizon", () => {
    expect(thrownCode(() => projectEmployee(employee, config, 0))).toBe("INVALID_YEARS");
    expect(thrownCode(() => projectEmployee(employee, config, 2.5))).toBe("INVALID_YEARS");
  });
});

describe("projectPopulation", () => {
  it("keys projections by employee id", () => {
    const projections = projectPopulation(
      [makeEmployee({ id: 1 }), makeEmployee({ id: 2, level: 1 })],
      config
    );
    expect([...projections.keys()]).toEqual([1, 2]);
  });
});
