/**
 * Per-employee salary paths under conservative / realistic / optimistic
 * scenarios. A pure function of one employee and the static uplift table.
 */

import type {
  Employee,
  EngineConfig,
  LevelTier,
  PerformanceRating,
  UpliftTable,
} from "@/lib/types/zod";
import { PERFORMANCE_RATINGS } from "@/lib/types/zod";
import { LEVEL_TIER_CYCLE } from "./constants";
import { EngineError } from "./errors";
import { cagr, confidenceInterval, project, type ConfidenceBand } from "./forecast-math";

export const SCENARIO_NAMES = ["conservative", "realistic", "optimistic"] as const;
export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export interface ScenarioPath {
  annualRate: number;
  /** salaries[0] is the current salary; salaries[years] the final one. */
  salaries: number[];
  finalSalary: number;
  cagr: number;
  totalIncrease: number;
  confidence: ConfidenceBand;
}

export interface EmployeeProjection {
  employeeId: number;
  years: number;
  scenarios: Record<ScenarioName, ScenarioPath>;
}

type ProjectionConfig = Pick<
  EngineConfig,
  "upliftTable" | "scenarioAdjustments" | "confidenceInterval" | "confidenceSpread" | "projectionYears"
>;

export function levelTier(level: number): LevelTier {
  if (!Number.isInteger(level) || level < 1) {
    throw new EngineError("INVALID_LEVEL", `Level must be a positive integer (got ${level})`);
  }
  return LEVEL_TIER_CYCLE[(level - 1) % LEVEL_TIER_CYCLE.length];
}

function upliftRow(table: UpliftTable, rating: PerformanceRating) {
  const row = table[rating];
  if (!row) {
    throw new EngineError(
      "UNKNOWN_PERFORMANCE_RATING",
      `No uplift row for performance rating "${rating}"`
    );
  }
  return row;
}

/** Rating one tier up; the top tier maps to itself. */
function nextRating(rating: PerformanceRating): PerformanceRating {
  const idx = PERFORMANCE_RATINGS.indexOf(rating);
  return PERFORMANCE_RATINGS[Math.min(idx + 1, PERFORMANCE_RATINGS.length - 1)];
}

/**
 * Annual uplift = baseline + adjusted performance component + level-tier bonus.
 * conservative: performance - margin (floored at 0).
 * optimistic: performance + p × (next tier's performance - performance).
 */
export function scenarioAnnualRate(
  employee: Pick<Employee, "level" | "performanceRating">,
  scenario: ScenarioName,
  config: Pick<EngineConfig, "upliftTable" | "scenarioAdjustments">
): number {
  const row = upliftRow(config.upliftTable, employee.performanceRating);
  const tierBonus = row[levelTier(employee.level)];
  const { conservativeMargin, optimisticImprovementProbability } = config.scenarioAdjustments;

  let performance = row.performance;
  switch (scenario) {
    case "conservative":
      performance = Math.max(0, row.performance - conservativeMargin);
      break;
    case "realistic":
      break;
    case "optimistic": {
      const next = upliftRow(config.upliftTable, nextRating(employee.performanceRating));
      performance =
        row.performance +
        optimisticImprovementProbability * (next.performance - row.performance);
      break;
    }
  }
  return row.baseline + performance + tierBonus;
}

function buildPath(
  salary: number,
  annualRate: number,
  years: number,
  config: ProjectionConfig
): ScenarioPath {
  const salaries: number[] = [];
  for (let y = 0; y <= years; y++) {
    salaries.push(project(salary, annualRate, y));
  }
  const finalSalary = salaries[years];
  return {
    annualRate,
    salaries,
    finalSalary,
    cagr: cagr(salary, finalSalary, years),
    totalIncrease: finalSalary - salary,
    confidence: confidenceInterval(finalSalary, config.confidenceInterval, config.confidenceSpread),
  };
}

export function projectEmployee(
  employee: Employee,
  config: ProjectionConfig,
  years: number = config.projectionYears
): EmployeeProjection {
  if (!Number.isInteger(years) || years <= 0) {
    throw new EngineError(
      "INVALID_YEARS",
      `Projection horizon must be a positive integer (got ${years})`,
      employee.id
    );
  }
  const pathFor = (name: ScenarioName) =>
    buildPath(employee.salary, scenarioAnnualRate(employee, name, config), years, config);
  return {
    employeeId: employee.id,
    years,
    scenarios: {
      conservative: pathFor("conservative"),
      realistic: pathFor("realistic"),
      optimistic: pathFor("optimistic"),
    },
  };
}

/** Map over the population; each projection is independent of the others. */
export function projectPopulation(
  population: readonly Employee[],
  config: ProjectionConfig,
  years: number = config.projectionYears
): Map<number, EmployeeProjection> {
  return new Map(population.map((e) => [e.id, projectEmployee(e, config, years)]));
}
