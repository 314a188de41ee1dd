import { describe, it, expect } from "vitest";
import { validateEmployee, validatePopulation } from "./validation";
import { resolveEngineConfig } from "./effective-config";
import { makeEmployee } from "@/fixtures/populations";

const config = resolveEngineConfig();

describe("validateEmployee", () => {
  it("accepts a well-formed record", () => {
    const record = makeEmployee({ id: 1 });
    expect(validateEmployee(record, config)).toEqual({ employee: record });
  });

  it("maps field problems to error codes", () => {
    const cases: [unknown, string][] = [
      [{ ...makeEmployee({ id: 1 }), salary: -5 }, "NON_POSITIVE_SALARY"],
      [{ ...makeEmployee({ id: 2 }), performanceRating: "Stellar" }, "UNKNOWN_PERFORMANCE_RATING"],
      [{ ...makeEmployee({ id: 3 }), level: 1.5 }, "INVALID_LEVEL"],
      [{ ...makeEmployee({ id: 4 }), gender: "" }, "INVALID_RECORD"],
    ];
    for (const [record, code] of cases) {
      const result = validateEmployee(record, config);
      expect("failure" in result && result.failure.code).toBe(code);
    }
  });

  it("keeps NON_POSITIVE_SALARY for salaries at or below zero only", () => {
    const base = makeEmployee({ id: 6 });
    const { salary: _omitted, ...withoutSalary } = base;
    const cases: [unknown, string][] = [
      [{ ...base, salary: 0 }, "NON_POSITIVE_SALARY"],
      [withoutSalary, "INVALID_RECORD"],
      [{ ...base, salary: "50000" }, "INVALID_RECORD"],
      [{ ...base, salary: Infinity }, "INVALID_RECORD"],
      [{ ...base, performanceRating: undefined }, "INVALID_RECORD"],
      [{ ...base, level: "2" }, "INVALID_RECORD"],
    ];
    for (const [record, code] of cases) {
      const result = validateEmployee(record, config);
      expect("failure" in result && [result.failure.code, result.failure.employeeId]).toEqual([code, 6]);
    }
  });

  it("rejects a level outside the configured bounds", () => {
    const result = validateEmployee(makeEmployee({ id: 5, level: 9 }), config);
    expect(result).toEqual({
      failure: {
        code: "INVALID_LEVEL",
        message: "Level 9 outside configured bounds 1..6",
        employeeId: 5,
      },
    });
  });

  it("reports a null id when the record has none", () => {
    const result = validateEmployee({ salary: 1000 }, config);
    expect("failure" in result && result.failure).toMatchObject({
      code: "INVALID_RECORD",
      employeeId: null,
    });
  });
});

describe("validatePopulation", () => {
  it("keeps valid employees and collects failures without aborting", () => {
    const { employees, failures } = validatePopulation(
      [makeEmployee({ id: 1 }), { ...makeEmployee({ id: 2 }), salary: 0 }, makeEmployee({ id: 3 })],
      config
    );
    expect(employees.map((e) => e.id)).toEqual([1, 3]);
    expect(failures.map((f) => [f.code, f.employeeId])).toEqual([["NON_POSITIVE_SALARY", 2]]);
  });

  it("rejects repeated employee ids", () => {
    const { employees, failures } = validatePopulation(
      [makeEmployee({ id: 1 }), makeEmployee({ id: 1, salary: 70000 })],
      config
    );
    expect(employees).toHaveLength(1);
    expect(employees[0].salary).toBe(50000);
    expect(failures[0]).toEqual({
      code: "DUPLICATE_EMPLOYEE_ID",
      message: "Employee id 1 appears more than once",
      employeeId: 1,
    });
  });

  it("warns about salaries under the applicable floor", () => {
    const salaryFloors = [
      { level: 1, minSalary: 25000 },
      { level: 1, minSalary: 27000, label: "London" },
    ];
    const records = [makeEmployee({ id: 1, level: 1, salary: 26000 })];

    const highest = validatePopulation(records, resolveEngineConfig({ salaryFloors }));
    expect(highest.warnings).toEqual([
      {
        code: "BELOW_SALARY_FLOOR",
        message: "Employee 1 earns £26,000, below the level 1 floor £27,000 (London)",
        employeeId: 1,
      },
    ]);

    const first = validatePopulation(
      records,
      resolveEngineConfig({ salaryFloors, floorPolicy: "FIRST_DECLARED" })
    );
    expect(first.warnings).toEqual([]);
  });

  it("warns once about employees without a manager", () => {
    const { employees, warnings } = validatePopulation(
      [
        makeEmployee({ id: 1, managerId: null }),
        makeEmployee({ id: 2, managerId: undefined }),
        makeEmployee({ id: 3 }),
      ],
      config
    );
    expect(employees).toHaveLength(3);
    expect(warnings).toEqual([
      {
        code: "UNMANAGED_EMPLOYEES",
        message: "2 employee(s) have no manager and are left out of budget allocation",
      },
    ]);
  });
});
