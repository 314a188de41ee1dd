import { describe, it, expect } from "vitest";
import { computePopulationKpis, medianSalary } from "./population-metrics";
import { makeEmployee } from "@/fixtures/populations";

const population = [
  makeEmployee({ id: 1, level: 1, salary: 40000, gender: "Male" }),
  makeEmployee({ id: 2, level: 1, salary: 30000, gender: "Female" }),
  makeEmployee({ id: 3, level: 1, salary: 50000, gender: "Male" }),
  makeEmployee({ id: 4, level: 1, salary: 36000, gender: "Female" }),
];

describe("medianSalary", () => {
  it("returns the middle salary", () => {
    expect(medianSalary([{ salary: 1 }, { salary: 3 }, { salary: 2 }])).toBe(2);
  });

  it("is null for an empty population", () => {
    expect(medianSalary([])).toBeNull();
  });
});

describe("computePopulationKpis", () => {
  it("measures payroll, below-median share and the gender gap", () => {
    const kpis = computePopulationKpis(population, {
      peerGroupBy: "LEVEL",
      genderGap: { reference: "Male", comparison: "Female" },
    });
    expect(kpis.totalEmployees).toBe(4);
    expect(kpis.totalPayroll).toBe(156000);
    expect(kpis.belowMedianCount).toBe(2);
    expect(kpis.belowMedianPercent).toBe(0.5);
    expect(kpis.medianSalaryByGender).toEqual({ Female: 33000, Male: 45000 });
    expect(kpis.genderGapPercent).toBeCloseTo(12000 / 45000, 12);
  });

  it("reports no gap when a compared gender is absent", () => {
    const kpis = computePopulationKpis(population, {
      peerGroupBy: "LEVEL",
      genderGap: { reference: "Male", comparison: "Non-binary" },
    });
    expect(kpis.genderGapPercent).toBe(0);
  });
});
