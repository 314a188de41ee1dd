/**
 * Salary equity analysis run.
 * validate → project → classify (checkpoint) → cost strategies → allocate.
 * One synchronous, deterministic pass over an in-memory population snapshot.
 */

import type { Employee, EngineConfig, EngineConfigInput, PeerGroupBy } from "@/lib/types/zod";
import { resolveEngineConfig } from "./effective-config";
import { EngineError, type RecordFailure, type ValidationWarning } from "./errors";
import {
  allocateManagerBudgets,
  type AllocationOptions,
  type AllocationResult,
} from "./manager-budget";
import {
  buildConvergenceReport,
  buildPeerGroups,
  classify,
  type Classification,
  type ConvergenceReport,
  type PeerGroupMap,
} from "./median-convergence";
import {
  compareStrategies,
  type EligibleGap,
  type StrategyComparison,
} from "./intervention-strategies";
import { projectPopulation, type EmployeeProjection } from "./scenario-projector";
import { validatePopulation } from "./validation";
import { createLogger } from "@/lib/utils/logger";
import { formatCurrency, formatPercent } from "@/lib/utils/format";

const log = createLogger("EquityEngine");

export interface EquityAnalysisOptions extends AllocationOptions {
  /** Called once after classification, before strategy costing and allocation. */
  onClassified?: (report: ConvergenceReport) => void;
}

export interface EquityAnalysisResult {
  config: Readonly<EngineConfig>;
  projections: EmployeeProjection[];
  convergence: ConvergenceReport;
  strategies: StrategyComparison;
  allocation: AllocationResult;
  failures: RecordFailure[];
  failedCount: number;
  warnings: ValidationWarning[];
}

/** Below-median convergence records as strategy inputs. */
export function eligibleGapsFromReport(report: ConvergenceReport): EligibleGap[] {
  return report.records.map((r) => ({
    employeeId: r.employeeId,
    gapAmount: r.gapAmount,
    gapPercent: r.gapPercent,
    medianSalary: r.medianSalary,
  }));
}

export function classifyPopulation(
  population: readonly Employee[],
  peerGroups: PeerGroupMap,
  groupBy: PeerGroupBy
): Map<number, Classification> {
  return new Map(population.map((e) => [e.id, classify(e, peerGroups, groupBy)]));
}

export function runEquityAnalysis(
  records: readonly unknown[],
  configInput: EngineConfigInput = {},
  options: EquityAnalysisOptions = {}
): EquityAnalysisResult {
  const config = resolveEngineConfig(configInput);

  const { employees, failures, warnings } = validatePopulation(records, config);
  if (employees.length === 0) {
    throw new EngineError(
      "INSUFFICIENT_POPULATION",
      `No valid employees to analyse (${failures.length} record(s) failed validation)`
    );
  }
  log.info(
    `Analysing ${employees.length} employees (${failures.length} rejected), peer groups by ${config.peerGroupBy}`
  );

  const projections = projectPopulation(employees, config);

  // Barrier: medians need the whole population.
  const peerGroups = buildPeerGroups(employees, config.peerGroupBy);
  const convergence = buildConvergenceReport(employees, peerGroups, projections, config);
  log.info(
    `${convergence.belowMedianCount} below median (${formatPercent(convergence.belowMedianPercent)}), ` +
      `${convergence.interventionRequiredCount} need intervention, ${convergence.divergentCount} divergent`
  );
  options.onClassified?.(convergence);

  const totalPayroll = employees.reduce((s, e) => s + e.salary, 0);
  const strategies = compareStrategies(eligibleGapsFromReport(convergence), totalPayroll, config);
  log.info(
    `Selected strategy ${strategies.selected.name}: ${formatCurrency(strategies.selected.totalCost)} ` +
      `(${formatPercent(strategies.selected.percentOfPayroll, 2)} of payroll)` +
      (strategies.feasible ? "" : " [infeasible]")
  );

  const classifications = classifyPopulation(employees, peerGroups, config.peerGroupBy);
  const allocation = allocateManagerBudgets(employees, classifications, config, {
    overallBudget: options.overallBudget,
  });

  return {
    config,
    projections: [...projections.values()],
    convergence,
    strategies,
    allocation,
    failures,
    failedCount: failures.length,
    warnings,
  };
}
