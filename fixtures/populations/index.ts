/**
 * Small hand-built populations shared by the engine tests.
 * Salaries are chosen so medians, gaps and caps are easy to trace.
 */

import type { Employee } from "@/lib/types/zod";
import { isEngineError } from "@/lib/model/errors";

export function makeEmployee(overrides: Partial<Employee> & Pick<Employee, "id">): Employee {
  return {
    level: 2,
    salary: 50000,
    gender: "Female",
    performanceRating: "Achieving",
    tenureYears: 3,
    managerId: 100,
    ...overrides,
  };
}

/**
 * One manager (100), level 2, median 60000.
 * 1: below median (gap 20000), 2: below median high performer (gap 10000),
 * 3: at median, 4: above median high performer, 5: above median.
 */
export const TEAM_OF_FIVE: Employee[] = [
  makeEmployee({ id: 1, salary: 40000, gender: "Female" }),
  makeEmployee({ id: 2, salary: 50000, gender: "Female", performanceRating: "High Performing" }),
  makeEmployee({ id: 3, salary: 60000, gender: "Male" }),
  makeEmployee({ id: 4, salary: 70000, gender: "Male", performanceRating: "Exceeding" }),
  makeEmployee({ id: 5, salary: 80000, gender: "Male" }),
];

/** Eight level-1 reports of manager 200; id k earns 38000 - 1000k, median 33500. */
export const DESCENDING_TEAM_OF_EIGHT: Employee[] = [1, 2, 3, 4, 5, 6, 7, 8].map((id) =>
  makeEmployee({ id, level: 1, salary: 38000 - 1000 * id, managerId: 200 })
);

/** Code of the EngineError thrown by fn, or null when it does not throw one. */
export function thrownCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    if (isEngineError(err)) return err.code;
    throw err;
  }
  return null;
}
