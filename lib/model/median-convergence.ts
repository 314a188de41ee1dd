/**
 * Peer-group medians, below-median classification and time-to-convergence.
 *
 * Employee salary grows as S(t) = S₀(1+rₑ)^t and the peer median as
 * M(t) = M₀(1+r_m)^t. They meet at t* = ln(M₀/S₀) / ln((1+rₑ)/(1+r_m)),
 * which only exists when rₑ > r_m.
 */

import type { Employee, EngineConfig, PeerGroupBy } from "@/lib/types/zod";
import { EngineError } from "./errors";
import { percentile, project } from "./forecast-math";
import type { EmployeeProjection, ScenarioPath } from "./scenario-projector";

export interface PeerGroup {
  key: string;
  level: number;
  /** Set only when grouping by level and gender. */
  gender?: string;
  medianSalary: number;
  memberCount: number;
  /** Member ids ordered by (salary, id). */
  memberIds: readonly number[];
}

export type PeerGroupMap = ReadonlyMap<string, PeerGroup>;

export interface Classification {
  employeeId: number;
  peerGroupKey: string;
  medianSalary: number;
  belowMedian: boolean;
  /** median - salary; negative above the median. */
  gapAmount: number;
  /** (median - salary) / median */
  gapPercent: number;
}

export type ConvergenceOutcome = "AT_OR_ABOVE_MEDIAN" | "CONVERGES" | "DIVERGENT_GROWTH";

export interface ConvergenceRecord {
  employeeId: number;
  peerGroupKey: string;
  medianSalary: number;
  gapAmount: number;
  gapPercent: number;
  employeeGrowthRate: number;
  medianGrowthRate: number;
  naturalYearsToMedian: number | "divergent";
  /** Same as naturalYearsToMedian, at the optimistic growth rate. */
  acceleratedYearsToMedian: number | "divergent";
  /** A one-time adjustment closes the gap immediately. */
  interventionYearsToMedian: 0;
  interventionRequired: boolean;
  outcome: ConvergenceOutcome;
}

export interface GenderBelowMedianStats {
  count: number;
  /** Share of that gender's employees who are below median. */
  percent: number;
  averageGapPercent: number;
}

export interface ConvergenceTimelineYear {
  year: number;
  /** Employees below median today still below the drifted median at this year, realistic growth. */
  remainingBelowMedian: number;
  /** As remainingBelowMedian, optimistic growth. */
  acceleratedRemainingBelowMedian: number;
}

export interface ConvergenceReport {
  peerGroups: PeerGroup[];
  /** One record per below-median employee, ordered by employee id. */
  records: ConvergenceRecord[];
  totalEmployees: number;
  belowMedianCount: number;
  belowMedianPercent: number;
  interventionRequiredCount: number;
  divergentCount: number;
  belowMedianByGender: Record<string, GenderBelowMedianStats>;
  /** Years 1..projectionYears. */
  timeline: ConvergenceTimelineYear[];
}

export function peerGroupKey(
  employee: Pick<Employee, "level" | "gender">,
  groupBy: PeerGroupBy
): string {
  return groupBy === "LEVEL_GENDER"
    ? `L${employee.level}:${employee.gender}`
    : `L${employee.level}`;
}

/** Partition by level (and gender) and take each partition's median salary. */
export function buildPeerGroups(
  population: readonly Employee[],
  groupBy: PeerGroupBy
): PeerGroupMap {
  const partitions = new Map<string, Employee[]>();
  for (const e of population) {
    const key = peerGroupKey(e, groupBy);
    const list = partitions.get(key) ?? [];
    list.push(e);
    partitions.set(key, list);
  }

  const groups = new Map<string, PeerGroup>();
  const keys = [...partitions.keys()].sort();
  for (const key of keys) {
    const members = [...(partitions.get(key) ?? [])].sort(
      (a, b) => a.salary - b.salary || a.id - b.id
    );
    const median = percentile(
      members.map((m) => m.salary),
      50
    );
    const first = members[0];
    if (median == null || !first) continue;
    const group: PeerGroup = {
      key,
      level: first.level,
      medianSalary: median,
      memberCount: members.length,
      memberIds: Object.freeze(members.map((m) => m.id)),
    };
    if (groupBy === "LEVEL_GENDER") group.gender = first.gender;
    groups.set(key, Object.freeze(group));
  }
  return groups;
}

function findPeerGroup(
  employee: Employee,
  peerGroups: PeerGroupMap,
  groupBy: PeerGroupBy
): PeerGroup {
  const key = peerGroupKey(employee, groupBy);
  const group = peerGroups.get(key);
  if (!group || group.memberCount === 0) {
    throw new EngineError(
      "INSUFFICIENT_POPULATION",
      `Peer group ${key} has no members`,
      employee.id
    );
  }
  return group;
}

export function classify(
  employee: Employee,
  peerGroups: PeerGroupMap,
  groupBy: PeerGroupBy
): Classification {
  const group = findPeerGroup(employee, peerGroups, groupBy);
  const gapAmount = group.medianSalary - employee.salary;
  return {
    employeeId: employee.id,
    peerGroupKey: group.key,
    medianSalary: group.medianSalary,
    belowMedian: employee.salary < group.medianSalary,
    gapAmount,
    gapPercent: gapAmount / group.medianSalary,
  };
}

export interface ConvergenceOptions {
  groupBy: PeerGroupBy;
  convergenceThresholdYears: number;
  /** Growth under accelerated performance; defaults to employeeGrowthRate. */
  acceleratedGrowthRate?: number;
}

/** Years until S(t) = M(t); "divergent" when the employee never catches up. */
export function yearsToConvergence(
  salary: number,
  median: number,
  employeeGrowthRate: number,
  medianGrowthRate: number
): number | "divergent" {
  if (salary >= median) return 0;
  if (employeeGrowthRate <= medianGrowthRate) return "divergent";
  return (
    Math.log(median / salary) /
    Math.log((1 + employeeGrowthRate) / (1 + medianGrowthRate))
  );
}

export function analyzeConvergence(
  employee: Employee,
  peerGroups: PeerGroupMap,
  employeeGrowthRate: number,
  medianGrowthRate: number,
  options: ConvergenceOptions
): ConvergenceRecord {
  const c = classify(employee, peerGroups, options.groupBy);
  const natural = yearsToConvergence(
    employee.salary,
    c.medianSalary,
    employeeGrowthRate,
    medianGrowthRate
  );

  let outcome: ConvergenceOutcome;
  let interventionRequired: boolean;
  if (!c.belowMedian) {
    outcome = "AT_OR_ABOVE_MEDIAN";
    interventionRequired = false;
  } else if (natural === "divergent") {
    outcome = "DIVERGENT_GROWTH";
    interventionRequired = true;
  } else {
    outcome = "CONVERGES";
    interventionRequired = natural > options.convergenceThresholdYears;
  }

  return {
    employeeId: employee.id,
    peerGroupKey: c.peerGroupKey,
    medianSalary: c.medianSalary,
    gapAmount: c.gapAmount,
    gapPercent: c.gapPercent,
    employeeGrowthRate,
    medianGrowthRate,
    naturalYearsToMedian: natural,
    acceleratedYearsToMedian: yearsToConvergence(
      employee.salary,
      c.medianSalary,
      options.acceleratedGrowthRate ?? employeeGrowthRate,
      medianGrowthRate
    ),
    interventionYearsToMedian: 0,
    interventionRequired,
    outcome,
  };
}

type ReportConfig = Pick<
  EngineConfig,
  "peerGroupBy" | "medianGrowthRate" | "convergenceThresholdYears" | "projectionYears"
>;

function stillBelow(path: ScenarioPath, year: number, medianAtYear: number): boolean {
  const salary =
    year < path.salaries.length ? path.salaries[year] : project(path.salaries[0], path.annualRate, year);
  return salary < medianAtYear;
}

/** Year-by-year count of today's below-median employees not yet at the drifted median. */
function buildTimeline(
  records: readonly ConvergenceRecord[],
  projections: ReadonlyMap<number, EmployeeProjection>,
  years: number,
  medianGrowthRate: number
): ConvergenceTimelineYear[] {
  const timeline: ConvergenceTimelineYear[] = [];
  for (let year = 1; year <= years; year++) {
    let remaining = 0;
    let acceleratedRemaining = 0;
    for (const r of records) {
      const projection = projections.get(r.employeeId);
      if (!projection) continue;
      const medianAtYear = project(r.medianSalary, medianGrowthRate, year);
      if (stillBelow(projection.scenarios.realistic, year, medianAtYear)) remaining++;
      if (stillBelow(projection.scenarios.optimistic, year, medianAtYear)) {
        acceleratedRemaining++;
      }
    }
    timeline.push({
      year,
      remainingBelowMedian: remaining,
      acceleratedRemainingBelowMedian: acceleratedRemaining,
    });
  }
  return timeline;
}

/**
 * Classify every employee and build convergence records for the
 * below-median ones. Employee growth is the realistic scenario rate.
 */
export function buildConvergenceReport(
  population: readonly Employee[],
  peerGroups: PeerGroupMap,
  projections: ReadonlyMap<number, EmployeeProjection>,
  config: ReportConfig
): ConvergenceReport {
  const records: ConvergenceRecord[] = [];
  const genderTotals = new Map<string, number>();
  const genderBelow = new Map<string, ConvergenceRecord[]>();

  const ordered = [...population].sort((a, b) => a.id - b.id);
  for (const e of ordered) {
    genderTotals.set(e.gender, (genderTotals.get(e.gender) ?? 0) + 1);
    const projection = projections.get(e.id);
    if (!projection) {
      throw new EngineError("INVALID_RECORD", `No projection for employee ${e.id}`, e.id);
    }
    const record = analyzeConvergence(
      e,
      peerGroups,
      projection.scenarios.realistic.annualRate,
      config.medianGrowthRate,
      {
        groupBy: config.peerGroupBy,
        convergenceThresholdYears: config.convergenceThresholdYears,
        acceleratedGrowthRate: projection.scenarios.optimistic.annualRate,
      }
    );
    if (record.outcome === "AT_OR_ABOVE_MEDIAN") continue;
    records.push(record);
    const list = genderBelow.get(e.gender) ?? [];
    list.push(record);
    genderBelow.set(e.gender, list);
  }

  const belowMedianByGender: Record<string, GenderBelowMedianStats> = {};
  for (const [gender, total] of genderTotals) {
    const below = genderBelow.get(gender) ?? [];
    belowMedianByGender[gender] = {
      count: below.length,
      percent: total > 0 ? below.length / total : 0,
      averageGapPercent:
        below.length > 0
          ? below.reduce((s, r) => s + r.gapPercent, 0) / below.length
          : 0,
    };
  }

  const totalEmployees = population.length;
  return {
    peerGroups: [...peerGroups.values()],
    records,
    totalEmployees,
    belowMedianCount: records.length,
    belowMedianPercent: totalEmployees > 0 ? records.length / totalEmployees : 0,
    interventionRequiredCount: records.filter((r) => r.interventionRequired).length,
    divergentCount: records.filter((r) => r.outcome === "DIVERGENT_GROWTH").length,
    belowMedianByGender,
    timeline: buildTimeline(records, projections, config.projectionYears, config.medianGrowthRate),
  };
}
