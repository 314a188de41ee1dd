import { describe, it, expect } from "vitest";
import { explainRecommendation } from "./why-staged";
import type { Recommendation } from "@/lib/model/manager-budget";

function recommendation(overrides: Partial<Recommendation>): Recommendation {
  return {
    employeeId: 1,
    managerId: 100,
    currentSalary: 50000,
    gapAmount: 10000,
    requestedUplift: 10000,
    proposedUplift: 0,
    priorityTier: "URGENT",
    rationale: ["below_median", "high_performer"],
    state: "EVALUATED",
    inPool: true,
    ...overrides,
  };
}

describe("explainRecommendation", () => {
  it("explains a fully funded uplift", () => {
    expect(
      explainRecommendation(recommendation({ state: "ACCEPTED", requestedUplift: 700, proposedUplift: 700 }))
    ).toBe("Funded in full: £700");
  });

  it("explains a trimmed uplift", () => {
    expect(explainRecommendation(recommendation({ state: "TRIMMED", proposedUplift: 1500 }))).toBe(
      "Manager budget ran out: £1,500 of £10,000 funded"
    );
    expect(
      explainRecommendation(recommendation({ state: "TRIMMED", priorityTier: "RECOGNITION" }))
    ).toBe("Manager budget ran out before this RECOGNITION request: nothing funded");
  });

  it("distinguishes staging inside and outside the pool", () => {
    expect(explainRecommendation(recommendation({ state: "STAGED", priorityTier: "MONITOR" }))).toBe(
      "Deferred to next cycle: budget exhausted before the MONITOR tier"
    );
    expect(explainRecommendation(recommendation({ state: "STAGED", inPool: false }))).toBe(
      "Deferred to next cycle: outside the manager's capped review pool"
    );
  });

  it("explains a zero request", () => {
    expect(
      explainRecommendation(
        recommendation({ state: "ACCEPTED", priorityTier: "NONE", requestedUplift: 0, gapAmount: 0 })
      )
    ).toBe("At or above median and not a high performer: no adjustment requested");
  });

  it("reports unallocated recommendations", () => {
    expect(explainRecommendation(recommendation({}))).toBe("Not yet allocated");
  });
});
