/**
 * Per-record validation of the incoming population.
 * A bad record is reported with its employee id and left out; it never
 * aborts the batch. Soft warnings do not remove anyone.
 */

import { z } from "zod";
import { EmployeeSchema, type Employee, type EngineConfig } from "@/lib/types/zod";
import type { EngineErrorCode, RecordFailure, ValidationWarning } from "./errors";
import { selectSalaryFloor } from "./salary-floors";
import { createLogger } from "@/lib/utils/logger";
import { formatCurrency } from "@/lib/utils/format";

const log = createLogger("Validation");

export interface PopulationValidation {
  employees: Employee[];
  failures: RecordFailure[];
  warnings: ValidationWarning[];
}

const RecordIdSchema = z.object({ id: z.number() });

function readId(record: unknown): number | null {
  const parsed = RecordIdSchema.safeParse(record);
  return parsed.success ? parsed.data.id : null;
}

/** Error code for a schema issue; anything unexpected is INVALID_RECORD. */
function codeForIssue(issue: z.ZodIssue): EngineErrorCode {
  if (issue.code === "invalid_type" && issue.received === "undefined") return "INVALID_RECORD";
  switch (issue.path[0]) {
    case "salary":
      return issue.code === "too_small" ? "NON_POSITIVE_SALARY" : "INVALID_RECORD";
    case "performanceRating":
      return issue.code === "invalid_enum_value" ? "UNKNOWN_PERFORMANCE_RATING" : "INVALID_RECORD";
    case "level":
      return issue.code === "invalid_type" && issue.expected === "integer"
        ? "INVALID_LEVEL"
        : "INVALID_RECORD";
    default:
      return "INVALID_RECORD";
  }
}

function failureFromIssues(record: unknown, error: z.ZodError): RecordFailure {
  const issue = error.issues[0];
  const code = issue ? codeForIssue(issue) : "INVALID_RECORD";
  const message = error.issues
    .map((i) => `${i.path.join(".") || "(record)"}: ${i.message}`)
    .join("; ");
  return { code, message, employeeId: readId(record) };
}

type ValidationConfig = Pick<
  EngineConfig,
  "minLevel" | "maxLevel" | "salaryFloors" | "floorPolicy"
>;

export function validateEmployee(
  record: unknown,
  config: ValidationConfig
): { employee: Employee } | { failure: RecordFailure } {
  const parsed = EmployeeSchema.safeParse(record);
  if (!parsed.success) return { failure: failureFromIssues(record, parsed.error) };

  const employee = parsed.data;
  if (employee.level < config.minLevel || employee.level > config.maxLevel) {
    return {
      failure: {
        code: "INVALID_LEVEL",
        message: `Level ${employee.level} outside configured bounds ${config.minLevel}..${config.maxLevel}`,
        employeeId: employee.id,
      },
    };
  }
  return { employee };
}

export function validatePopulation(
  records: readonly unknown[],
  config: ValidationConfig
): PopulationValidation {
  const employees: Employee[] = [];
  const failures: RecordFailure[] = [];
  const warnings: ValidationWarning[] = [];
  const seen = new Set<number>();

  for (const record of records) {
    const result = validateEmployee(record, config);
    if ("failure" in result) {
      failures.push(result.failure);
      continue;
    }
    const { employee } = result;
    if (seen.has(employee.id)) {
      failures.push({
        code: "DUPLICATE_EMPLOYEE_ID",
        message: `Employee id ${employee.id} appears more than once`,
        employeeId: employee.id,
      });
      continue;
    }
    seen.add(employee.id);
    employees.push(Object.freeze(employee));

    const floor = selectSalaryFloor(config.salaryFloors, employee.level, config.floorPolicy);
    if (floor && employee.salary < floor.minSalary) {
      warnings.push({
        code: "BELOW_SALARY_FLOOR",
        message: `Employee ${employee.id} earns ${formatCurrency(employee.salary)}, below the level ${employee.level} floor ${formatCurrency(floor.minSalary)}${floor.label ? ` (${floor.label})` : ""}`,
        employeeId: employee.id,
      });
    }
  }

  const unmanaged = employees.filter((e) => e.managerId == null).length;
  if (unmanaged > 0) {
    warnings.push({
      code: "UNMANAGED_EMPLOYEES",
      message: `${unmanaged} employee(s) have no manager and are left out of budget allocation`,
    });
  }

  for (const f of failures) {
    log.warn(`Record ${f.employeeId ?? "(no id)"} rejected: ${f.code} ${f.message}`);
  }
  return { employees, failures, warnings };
}
