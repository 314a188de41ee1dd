/**
 * Minimum-salary floors by level. A level may carry several bands (e.g. a
 * role with two published minimums); the floor policy decides which applies.
 */

import type { FloorPolicy, SalaryFloorBand } from "@/lib/types/zod";

export function selectSalaryFloor(
  bands: readonly SalaryFloorBand[],
  level: number,
  policy: FloorPolicy
): SalaryFloorBand | null {
  const matching = bands.filter((b) => b.level === level);
  if (matching.length === 0) return null;
  switch (policy) {
    case "FIRST_DECLARED":
      return matching[0];
    case "HIGHEST":
      return matching.reduce((best, b) => (b.minSalary > best.minSalary ? b : best));
    case "LOWEST":
      return matching.reduce((best, b) => (b.minSalary < best.minSalary ? b : best));
  }
}
