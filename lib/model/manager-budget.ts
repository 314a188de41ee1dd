/**
 * Manager-scoped budget allocation.
 *
 * Each manager's pool is capped at maxDirectReports; the pool's budget cap is
 * team payroll × budgetConstraintPercent. Recommendations are funded greedily
 * by tier (URGENT, MONITOR, RECOGNITION), largest gap first within a tier.
 *
 * Recommendation lifecycle:
 *   PENDING → EVALUATED → ACCEPTED | TRIMMED | STAGED
 * ACCEPTED: received the full requested uplift.
 * TRIMMED: its tier was reached but the cap ran out (partial or zero uplift).
 * STAGED: never funded this cycle (outside the pool, or its tier came after
 *   the cap was exhausted). Pool members with nothing to request (NONE)
 *   always settle as ACCEPTED with 0.
 */

import type { Employee, EngineConfig } from "@/lib/types/zod";
import { MAX_TRIM_PASSES, MINOR_UNITS_PER_MAJOR } from "./constants";
import { EngineError } from "./errors";
import type { Classification } from "./median-convergence";
import { computePopulationKpis, type PopulationKpis } from "./population-metrics";
import { createLogger } from "@/lib/utils/logger";
import { formatCurrency } from "@/lib/utils/format";

const log = createLogger("ManagerBudget");

export const PRIORITY_TIERS = ["URGENT", "MONITOR", "RECOGNITION", "NONE"] as const;
export type PriorityTier = (typeof PRIORITY_TIERS)[number];

export type RecommendationState = "PENDING" | "EVALUATED" | "ACCEPTED" | "TRIMMED" | "STAGED";
export type RecommendationFlag = "below_median" | "high_performer";

export interface Recommendation {
  employeeId: number;
  managerId: number;
  currentSalary: number;
  gapAmount: number;
  requestedUplift: number;
  proposedUplift: number;
  priorityTier: PriorityTier;
  rationale: RecommendationFlag[];
  state: RecommendationState;
  /** False when the employee fell outside the manager's capped pool. */
  inPool: boolean;
}

export interface ManagerBudget {
  managerId: number;
  teamSize: number;
  poolSize: number;
  /** Sum of pool members' salaries. */
  teamPayroll: number;
  cap: number;
  spent: number;
  remaining: number;
  utilization: number;
  status: "allocated" | "no_action";
}

export interface AllocationResult {
  recommendations: Recommendation[];
  managers: ManagerBudget[];
  totalAllocated: number;
  overallBudget: number;
  /** 1 normally; more when the overall budget forced stricter caps. */
  trimPasses: number;
  capScale: number;
  kpisBefore: PopulationKpis;
  kpisAfter: PopulationKpis;
  acceptedCount: number;
  trimmedCount: number;
  stagedCount: number;
}

type AllocationConfig = Pick<
  EngineConfig,
  | "maxDirectReports"
  | "budgetConstraintPercent"
  | "highPerformerRatings"
  | "highPerformerUpliftPercent"
  | "poolSelection"
  | "peerGroupBy"
  | "genderGap"
>;

export interface AllocationOptions {
  /** Organisation-wide ceiling on the summed allocation. Defaults to total payroll × budgetConstraintPercent. */
  overallBudget?: number;
}

const ALLOWED_TRANSITIONS: Record<RecommendationState, readonly RecommendationState[]> = {
  PENDING: ["EVALUATED"],
  EVALUATED: ["ACCEPTED", "TRIMMED", "STAGED"],
  ACCEPTED: [],
  TRIMMED: [],
  STAGED: [],
};

/** Returns a new record in the target state; terminal states cannot move. */
export function transition(
  rec: Recommendation,
  to: RecommendationState,
  proposedUplift: number = rec.proposedUplift
): Recommendation {
  if (!ALLOWED_TRANSITIONS[rec.state].includes(to)) {
    throw new EngineError(
      "INVALID_TRANSITION",
      `Recommendation for employee ${rec.employeeId} cannot move from ${rec.state} to ${to}`,
      rec.employeeId
    );
  }
  return { ...rec, state: to, proposedUplift };
}

export function priorityTier(belowMedian: boolean, highPerformer: boolean): PriorityTier {
  if (belowMedian && highPerformer) return "URGENT";
  if (highPerformer) return "MONITOR";
  if (belowMedian) return "RECOGNITION";
  return "NONE";
}

const tierRank = (t: PriorityTier) => PRIORITY_TIERS.indexOf(t);

function toMinor(amount: number): number {
  return Math.round(amount * MINOR_UNITS_PER_MAJOR);
}

function toMajor(minor: number): number {
  return minor / MINOR_UNITS_PER_MAJOR;
}

/** Tier order, then largest gap, then largest request, then employee id. */
function byPriority(a: Recommendation, b: Recommendation): number {
  return (
    tierRank(a.priorityTier) - tierRank(b.priorityTier) ||
    b.gapAmount - a.gapAmount ||
    b.requestedUplift - a.requestedUplift ||
    a.employeeId - b.employeeId
  );
}

function evaluate(
  employee: Employee,
  managerId: number,
  classification: Classification,
  config: AllocationConfig
): Recommendation {
  const highPerformer = config.highPerformerRatings.includes(employee.performanceRating);
  const tier = priorityTier(classification.belowMedian, highPerformer);
  const rationale: RecommendationFlag[] = [];
  if (classification.belowMedian) rationale.push("below_median");
  if (highPerformer) rationale.push("high_performer");

  let requested = 0;
  if (classification.belowMedian) requested = classification.gapAmount;
  else if (highPerformer) requested = employee.salary * config.highPerformerUpliftPercent;

  const pending: Recommendation = {
    employeeId: employee.id,
    managerId,
    currentSalary: employee.salary,
    gapAmount: Math.max(0, classification.gapAmount),
    requestedUplift: toMajor(toMinor(requested)),
    proposedUplift: 0,
    priorityTier: tier,
    rationale,
    state: "PENDING",
    inPool: true,
  };
  return transition(pending, "EVALUATED");
}

function selectPool(
  evaluated: Recommendation[],
  config: AllocationConfig
): { pool: Recommendation[]; outside: Recommendation[] } {
  const ordered =
    config.poolSelection === "EMPLOYEE_ID"
      ? [...evaluated].sort((a, b) => a.employeeId - b.employeeId)
      : [...evaluated].sort(byPriority);
  return {
    pool: ordered.slice(0, config.maxDirectReports),
    outside: ordered.slice(config.maxDirectReports),
  };
}

interface ManagerPass {
  budget: ManagerBudget;
  recommendations: Recommendation[];
}

function allocateManager(
  managerId: number,
  team: readonly Employee[],
  classifications: ReadonlyMap<number, Classification>,
  config: AllocationConfig,
  capScale: number
): ManagerPass {
  const evaluated = team.map((e) => {
    const c = classifications.get(e.id);
    if (!c) {
      throw new EngineError("INVALID_RECORD", `Employee ${e.id} has no classification`, e.id);
    }
    return evaluate(e, managerId, c, config);
  });
  const { pool, outside } = selectPool(evaluated, config);
  const salaryById = new Map(team.map((e) => [e.id, e.salary]));
  const teamPayroll = pool.reduce((s, r) => s + (salaryById.get(r.employeeId) ?? 0), 0);
  // Nudge before flooring so e.g. 1499.9999999 pounds still caps at 150000 pence.
  const capMinor = Math.floor(
    teamPayroll * config.budgetConstraintPercent * capScale * MINOR_UNITS_PER_MAJOR + 1e-6
  );

  const results: Recommendation[] = outside.map((r) => ({
    ...transition(r, "STAGED", 0),
    inPool: false,
  }));

  const eligible = pool.filter((r) => r.priorityTier !== "NONE" && r.requestedUplift > 0);
  if (eligible.length === 0 || teamPayroll <= 0) {
    for (const r of pool) results.push(transition(r, "ACCEPTED", 0));
    return {
      budget: {
        managerId,
        teamSize: team.length,
        poolSize: pool.length,
        teamPayroll,
        cap: toMajor(capMinor),
        spent: 0,
        remaining: toMajor(capMinor),
        utilization: 0,
        status: "no_action",
      },
      recommendations: results,
    };
  }

  let spentMinor = 0;
  let exhausted = false;
  for (const tier of PRIORITY_TIERS) {
    const members = pool.filter((r) => r.priorityTier === tier).sort(byPriority);
    // Tiers reached after the cap ran out are deferred whole.
    const tierReached = !exhausted;
    for (const r of members) {
      const requestedMinor = toMinor(r.requestedUplift);
      if (tier === "NONE") {
        results.push(transition(r, "ACCEPTED", 0));
        continue;
      }
      if (!tierReached) {
        results.push(transition(r, "STAGED", 0));
        continue;
      }
      const grantMinor = Math.min(requestedMinor, capMinor - spentMinor);
      spentMinor += grantMinor;
      if (grantMinor === requestedMinor) {
        results.push(transition(r, "ACCEPTED", toMajor(grantMinor)));
      } else {
        results.push(transition(r, "TRIMMED", toMajor(grantMinor)));
      }
      log.debug(
        `Manager ${managerId}: employee ${r.employeeId} (${tier}) granted ${formatCurrency(toMajor(grantMinor))}`
      );
    }
    if (spentMinor >= capMinor) exhausted = true;
  }

  return {
    budget: {
      managerId,
      teamSize: team.length,
      poolSize: pool.length,
      teamPayroll,
      cap: toMajor(capMinor),
      spent: toMajor(spentMinor),
      remaining: toMajor(capMinor - spentMinor),
      utilization: capMinor > 0 ? spentMinor / capMinor : 0,
      status: "allocated",
    },
    recommendations: results,
  };
}

function groupByManager(population: readonly Employee[]): Map<number, Employee[]> {
  const teams = new Map<number, Employee[]>();
  for (const e of population) {
    if (e.managerId == null) continue;
    const list = teams.get(e.managerId) ?? [];
    list.push(e);
    teams.set(e.managerId, list);
  }
  return new Map([...teams.entries()].sort(([a], [b]) => a - b));
}

function runPass(
  teams: Map<number, Employee[]>,
  classifications: ReadonlyMap<number, Classification>,
  config: AllocationConfig,
  capScale: number
): { passes: ManagerPass[]; totalAllocated: number } {
  const passes = [...teams.entries()].map(([managerId, team]) =>
    allocateManager(managerId, team, classifications, config, capScale)
  );
  const totalMinor = passes.reduce((s, p) => s + toMinor(p.budget.spent), 0);
  return { passes, totalAllocated: toMajor(totalMinor) };
}

export function allocateManagerBudgets(
  population: readonly Employee[],
  classifications: ReadonlyMap<number, Classification>,
  config: AllocationConfig,
  options: AllocationOptions = {}
): AllocationResult {
  if (!(config.budgetConstraintPercent > 0)) {
    throw new EngineError(
      "INVALID_BUDGET",
      `budgetConstraintPercent must be positive (got ${config.budgetConstraintPercent})`
    );
  }

  const totalPayroll = population.reduce((s, e) => s + e.salary, 0);
  const overallBudget = options.overallBudget ?? totalPayroll * config.budgetConstraintPercent;
  const teams = groupByManager(population);

  let capScale = 1;
  let trimPasses = 1;
  let pass = runPass(teams, classifications, config, capScale);
  while (pass.totalAllocated > overallBudget && trimPasses < MAX_TRIM_PASSES) {
    // Stricter caps: shrink every manager's cap by the overshoot ratio.
    capScale *= overallBudget / pass.totalAllocated;
    trimPasses++;
    log.warn(
      `Allocation ${formatCurrency(pass.totalAllocated)} exceeds overall budget ${formatCurrency(overallBudget)}; re-trimming (pass ${trimPasses})`
    );
    pass = runPass(teams, classifications, config, capScale);
  }
  if (pass.totalAllocated > overallBudget) {
    capScale = 0;
    trimPasses++;
    pass = runPass(teams, classifications, config, capScale);
  }

  const recommendations = pass.passes.flatMap((p) => p.recommendations);
  const upliftById = new Map(recommendations.map((r) => [r.employeeId, r.proposedUplift]));
  const updated = population.map((e) => ({ ...e, salary: e.salary + (upliftById.get(e.id) ?? 0) }));

  const result: AllocationResult = {
    recommendations,
    managers: pass.passes.map((p) => p.budget),
    totalAllocated: pass.totalAllocated,
    overallBudget,
    trimPasses,
    capScale,
    kpisBefore: computePopulationKpis(population, config),
    kpisAfter: computePopulationKpis(updated, config),
    acceptedCount: recommendations.filter((r) => r.state === "ACCEPTED").length,
    trimmedCount: recommendations.filter((r) => r.state === "TRIMMED").length,
    stagedCount: recommendations.filter((r) => r.state === "STAGED").length,
  };

  log.info(
    `Allocated ${formatCurrency(result.totalAllocated)} across ${result.managers.length} managers ` +
      `(accepted ${result.acceptedCount}, trimmed ${result.trimmedCount}, staged ${result.stagedCount})`
  );
  return result;
}
