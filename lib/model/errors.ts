/**
 * Error kinds raised by the engine. Per-record problems are reported as
 * RecordFailure values instead of being thrown.
 */

export type EngineErrorCode =
  | "INVALID_YEARS"
  | "NON_POSITIVE_SALARY"
  | "INVALID_CONFIDENCE"
  | "INVALID_BUDGET"
  | "UNKNOWN_PERFORMANCE_RATING"
  | "INSUFFICIENT_POPULATION"
  | "INVALID_CONFIG"
  | "INVALID_LEVEL"
  | "INVALID_RECORD"
  | "DUPLICATE_EMPLOYEE_ID"
  | "INVALID_TRANSITION";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly employeeId?: number;

  constructor(code: EngineErrorCode, message: string, employeeId?: number) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    if (employeeId != null) this.employeeId = employeeId;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export interface RecordFailure {
  code: EngineErrorCode;
  message: string;
  /** Null when the record had no readable id. */
  employeeId: number | null;
}

export interface ValidationWarning {
  code: string;
  message: string;
  employeeId?: number;
}
