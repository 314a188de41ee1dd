/**
 * Population-level remediation strategies costed against a target gap and
 * a hard budget cap.
 *
 * immediate: every below-median gap closed in year 1.
 * gradual_N_year: same employees, largest gaps first, spread over N years by
 *   configured weights. Same total cost, different cash-flow timing.
 * targeted: only gaps above the materiality threshold, closed in year 1.
 */

import type { EngineConfig, GradualSplit } from "@/lib/types/zod";
import { COST_TOLERANCE, GAP_TOLERANCE } from "./constants";

export type InterventionStrategy =
  | { kind: "immediate" }
  | { kind: "gradual"; years: number; weights: readonly number[] }
  | { kind: "targeted"; materialityThresholdPercent: number };

/** An employee's remaining gap to their peer median. */
export interface EligibleGap {
  employeeId: number;
  gapAmount: number;
  gapPercent: number;
  medianSalary: number;
}

export interface YearCost {
  year: number;
  cost: number;
  employeesAffected: number;
}

export interface StrategyResult {
  name: string;
  strategy: InterventionStrategy;
  totalCost: number;
  affectedEmployeeCount: number;
  yearByYearBreakdown: YearCost[];
  /** Last year with any spend; 0 when nothing is spent. */
  yearsUsed: number;
  percentOfPayroll: number;
  /** Σ gaps still open after maxYears / Σ peer medians of all eligible employees. */
  resultingGapPercent: number;
  averageAdjustment: number;
  meetsTarget: boolean;
  withinBudget: boolean;
}

export interface StrategyComparison {
  strategies: StrategyResult[];
  selected: StrategyResult;
  /** False when no strategy meets the target within budget; selected is then the cheapest. */
  feasible: boolean;
  totalPayroll: number;
  budgetLimit: number;
  totalGap: number;
  eligibleCount: number;
}

type StrategyConfig = Pick<
  EngineConfig,
  | "targetGapPercent"
  | "maxYears"
  | "budgetConstraintPercent"
  | "gradualSplits"
  | "materialityThresholdPercent"
>;

export function strategyName(strategy: InterventionStrategy): string {
  switch (strategy.kind) {
    case "immediate":
      return "immediate";
    case "gradual":
      return `gradual_${strategy.years}_year`;
    case "targeted":
      return "targeted";
  }
}

/** Declaration order: immediate, gradual by ascending years, targeted. */
export function declaredStrategies(
  config: Pick<EngineConfig, "gradualSplits" | "materialityThresholdPercent">
): InterventionStrategy[] {
  const gradual = [...config.gradualSplits]
    .sort((a, b) => a.years - b.years)
    .map((s: GradualSplit): InterventionStrategy => ({
      kind: "gradual",
      years: s.years,
      weights: s.weights,
    }));
  return [
    { kind: "immediate" },
    ...gradual,
    { kind: "targeted", materialityThresholdPercent: config.materialityThresholdPercent },
  ];
}

/** Largest gap first; equal gaps by ascending employee id. */
function byDescendingGap(a: EligibleGap, b: EligibleGap): number {
  return b.gapAmount - a.gapAmount || a.employeeId - b.employeeId;
}

/**
 * Split an ordered list into cohorts whose sizes follow the cumulative
 * weights: cohort k ends at round(Σw[0..k] × n); the last cohort ends at n.
 */
export function splitIntoCohorts<T>(items: readonly T[], weights: readonly number[]): T[][] {
  const n = items.length;
  const cohorts: T[][] = [];
  let cumulative = 0;
  let start = 0;
  weights.forEach((w, k) => {
    cumulative += w;
    const end = k === weights.length - 1 ? n : Math.min(n, Math.round(cumulative * n));
    cohorts.push(items.slice(start, Math.max(start, end)));
    start = Math.max(start, end);
  });
  return cohorts;
}

/** Which eligible employees get corrected in which year (1-based). */
function schedule(
  strategy: InterventionStrategy,
  gaps: readonly EligibleGap[]
): EligibleGap[][] {
  const ordered = [...gaps].sort(byDescendingGap);
  switch (strategy.kind) {
    case "immediate":
      return [ordered];
    case "gradual":
      return splitIntoCohorts(ordered, strategy.weights);
    case "targeted":
      return [ordered.filter((g) => g.gapPercent > strategy.materialityThresholdPercent)];
  }
}

function sumGaps(gaps: readonly EligibleGap[]): number {
  return gaps.reduce((s, g) => s + g.gapAmount, 0);
}

export function evaluateStrategy(
  strategy: InterventionStrategy,
  gaps: readonly EligibleGap[],
  totalPayroll: number,
  config: StrategyConfig
): StrategyResult {
  const cohorts = schedule(strategy, gaps);
  const yearByYearBreakdown: YearCost[] = cohorts.map((cohort, i) => ({
    year: i + 1,
    cost: sumGaps(cohort),
    employeesAffected: cohort.length,
  }));
  const totalCost = yearByYearBreakdown.reduce((s, y) => s + y.cost, 0);
  const affectedEmployeeCount = yearByYearBreakdown.reduce(
    (s, y) => s + y.employeesAffected,
    0
  );
  const yearsUsed = yearByYearBreakdown.reduce(
    (last, y) => (y.employeesAffected > 0 ? y.year : last),
    0
  );

  const correctedByMaxYears = new Set<number>();
  cohorts.slice(0, config.maxYears).forEach((cohort) => {
    for (const g of cohort) correctedByMaxYears.add(g.employeeId);
  });
  const openGap = sumGaps(gaps.filter((g) => !correctedByMaxYears.has(g.employeeId)));
  const medianBase = gaps.reduce((s, g) => s + g.medianSalary, 0);
  const resultingGapPercent = medianBase > 0 ? openGap / medianBase : 0;

  let percentOfPayroll: number;
  if (totalPayroll > 0) percentOfPayroll = totalCost / totalPayroll;
  else percentOfPayroll = totalCost > 0 ? Infinity : 0;

  return {
    name: strategyName(strategy),
    strategy,
    totalCost,
    affectedEmployeeCount,
    yearByYearBreakdown,
    yearsUsed,
    percentOfPayroll,
    resultingGapPercent,
    averageAdjustment: affectedEmployeeCount > 0 ? totalCost / affectedEmployeeCount : 0,
    meetsTarget: resultingGapPercent <= config.targetGapPercent + GAP_TOLERANCE,
    withinBudget: percentOfPayroll <= config.budgetConstraintPercent,
  };
}

/** Lower cost wins; near-equal costs fall back to fewer years, then declaration order. */
function compareCandidates(
  a: { result: StrategyResult; index: number },
  b: { result: StrategyResult; index: number }
): number {
  const costDelta = a.result.totalCost - b.result.totalCost;
  if (Math.abs(costDelta) > COST_TOLERANCE) return costDelta;
  return a.result.yearsUsed - b.result.yearsUsed || a.index - b.index;
}

export function selectStrategy(results: readonly StrategyResult[]): {
  selected: StrategyResult;
  feasible: boolean;
} {
  const indexed = results.map((result, index) => ({ result, index }));
  const feasibleCandidates = indexed.filter(
    (c) => c.result.meetsTarget && c.result.withinBudget
  );
  const pool = feasibleCandidates.length > 0 ? feasibleCandidates : indexed;
  const best = [...pool].sort(compareCandidates)[0];
  if (!best) {
    throw new Error("selectStrategy requires at least one strategy result");
  }
  return { selected: best.result, feasible: feasibleCandidates.length > 0 };
}

export function compareStrategies(
  gaps: readonly EligibleGap[],
  totalPayroll: number,
  config: StrategyConfig
): StrategyComparison {
  const eligible = gaps.filter((g) => g.gapAmount > 0);
  const strategies = declaredStrategies(config).map((s) =>
    evaluateStrategy(s, eligible, totalPayroll, config)
  );
  const { selected, feasible } = selectStrategy(strategies);
  return {
    strategies,
    selected,
    feasible,
    totalPayroll,
    budgetLimit: totalPayroll * config.budgetConstraintPercent,
    totalGap: sumGaps(eligible),
    eligibleCount: eligible.length,
  };
}
