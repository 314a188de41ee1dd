/**
 * JSON-ready payload of an analysis run for third-party verification.
 * Includes the effective config so a reviewer sees exactly what the engine used.
 */

import type { EquityAnalysisResult } from "@/lib/model/engine";

export interface AnalysisExport {
  exportedAt: string;
  config: EquityAnalysisResult["config"];
  summary: {
    employeesAnalysed: number;
    failedCount: number;
    belowMedianPercent: number;
    selectedStrategy: string;
    strategyFeasible: boolean;
    totalAllocated: number;
    genderGapBefore: number;
    genderGapAfter: number;
  };
  convergence: EquityAnalysisResult["convergence"];
  strategies: EquityAnalysisResult["strategies"];
  allocation: EquityAnalysisResult["allocation"];
  failures: EquityAnalysisResult["failures"];
  warnings: EquityAnalysisResult["warnings"];
}

export function buildAnalysisExport(
  result: EquityAnalysisResult,
  now: Date = new Date()
): AnalysisExport {
  return {
    exportedAt: now.toISOString(),
    config: result.config,
    summary: {
      employeesAnalysed: result.convergence.totalEmployees,
      failedCount: result.failedCount,
      belowMedianPercent: result.convergence.belowMedianPercent,
      selectedStrategy: result.strategies.selected.name,
      strategyFeasible: result.strategies.feasible,
      totalAllocated: result.allocation.totalAllocated,
      genderGapBefore: result.allocation.kpisBefore.genderGapPercent,
      genderGapAfter: result.allocation.kpisAfter.genderGapPercent,
    },
    convergence: result.convergence,
    strategies: result.strategies,
    allocation: result.allocation,
    failures: result.failures,
    warnings: result.warnings,
  };
}

/** Serialise; "divergent" and Infinity survive as strings. */
export function analysisExportToJson(payload: AnalysisExport): string {
  return JSON.stringify(
    payload,
    (_key, value: unknown) =>
      typeof value === "number" && !Number.isFinite(value) ? String(value) : value,
    2
  );
}
