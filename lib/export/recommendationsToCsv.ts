/**
 * Export allocation recommendations to CSV text.
 * One row per employee, ordered by manager then allocation order.
 */

import type { AllocationResult, Recommendation } from "@/lib/model/manager-budget";
import { explainRecommendation } from "@/lib/utils/why-staged";

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

const HEADERS = [
  "Manager",
  "Employee",
  "Tier",
  "State",
  "Current salary",
  "Gap",
  "Requested",
  "Proposed",
  "Flags",
  "Reason",
];

/** Amounts keep two decimals for spreadsheet compatibility. */
function rowToCells(rec: Recommendation): string[] {
  return [
    String(rec.managerId),
    String(rec.employeeId),
    rec.priorityTier,
    rec.state,
    rec.currentSalary.toFixed(2),
    rec.gapAmount.toFixed(2),
    rec.requestedUplift.toFixed(2),
    rec.proposedUplift.toFixed(2),
    rec.rationale.join(";"),
    explainRecommendation(rec),
  ];
}

export function recommendationsToCsv(allocation: AllocationResult): string {
  const lines = [HEADERS.join(",")];
  for (const rec of allocation.recommendations) {
    lines.push(rowToCells(rec).map(escapeCsvField).join(","));
  }
  return lines.join("\n");
}
