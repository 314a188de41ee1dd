/**
 * Population-level KPIs: payroll, below-median share and gender pay gap.
 * Peer groups are rebuilt from whatever snapshot is passed in.
 */

import type { Employee, EngineConfig } from "@/lib/types/zod";
import { percentile } from "./forecast-math";
import { buildPeerGroups, classify } from "./median-convergence";

export interface PopulationKpis {
  totalEmployees: number;
  totalPayroll: number;
  belowMedianCount: number;
  belowMedianPercent: number;
  medianSalaryByGender: Record<string, number>;
  /** (reference median - comparison median) / reference median; 0 if either is absent. */
  genderGapPercent: number;
}

export function medianSalary(population: readonly Pick<Employee, "salary">[]): number | null {
  const sorted = population.map((e) => e.salary).sort((a, b) => a - b);
  return percentile(sorted, 50);
}

export function computePopulationKpis(
  population: readonly Employee[],
  config: Pick<EngineConfig, "peerGroupBy" | "genderGap">
): PopulationKpis {
  const peerGroups = buildPeerGroups(population, config.peerGroupBy);
  const belowMedianCount = population.filter(
    (e) => classify(e, peerGroups, config.peerGroupBy).belowMedian
  ).length;

  const byGender = new Map<string, Employee[]>();
  for (const e of population) {
    const list = byGender.get(e.gender) ?? [];
    list.push(e);
    byGender.set(e.gender, list);
  }
  const medianSalaryByGender: Record<string, number> = {};
  for (const gender of [...byGender.keys()].sort()) {
    const m = medianSalary(byGender.get(gender) ?? []);
    if (m != null) medianSalaryByGender[gender] = m;
  }

  const reference = medianSalaryByGender[config.genderGap.reference];
  const comparison = medianSalaryByGender[config.genderGap.comparison];
  const genderGapPercent =
    reference != null && comparison != null && reference > 0
      ? (reference - comparison) / reference
      : 0;

  const totalEmployees = population.length;
  return {
    totalEmployees,
    totalPayroll: population.reduce((s, e) => s + e.salary, 0),
    belowMedianCount,
    belowMedianPercent: totalEmployees > 0 ? belowMedianCount / totalEmployees : 0,
    medianSalaryByGender,
    genderGapPercent,
  };
}
