export type KpiEngineErrorCode =
  | "VALIDATION_FAILED"
  | "INSUFFICIENT_DATA"
  | "DIVISION_BY_ZERO"
  | "NON_FINITE_RESULT";

export type KpiFailure = {
  code: KpiEngineErrorCode | "UNEXPECTED";
  reason: string;
  validation_errors: string[];
  next_action: string;
};

export class KpiEngineError extends Error {
  readonly code: KpiEngineErrorCode;
  readonly validation_errors: string[];
  readonly next_action: string;

  constructor(params: {
    code: KpiEngineErrorCode;
    reason: string;
    validation_errors?: string[];
    next_action: string;
  }) {
    super(params.reason);
    this.name = "KpiEngineError";
    this.code = params.code;
    this.validation_errors = params.validation_errors ?? [];
    this.next_action = params.next_action;
  }

  toFailure(): KpiFailure {
    return {
      code: this.code,
      reason: this.message,
      validation_errors: this.validation_errors,
      next_action: this.next_action,
    };
  }
}

export class ValidationError extends KpiEngineError {
  readonly missing_columns: string[];

  constructor(params: { reason: string; missing_columns?: string[]; validation_errors?: string[] }) {
    super({
      code: "VALIDATION_FAILED",
      reason: params.reason,
      validation_errors: params.validation_errors,
      next_action: "Provide a table with Month, Revenue, and Orders columns and numeric Revenue/Orders values.",
    });
    this.name = "ValidationError";
    this.missing_columns = params.missing_columns ?? [];
  }
}

export class InsufficientDataError extends KpiEngineError {
  readonly row_count: number;
  readonly required_rows: number;

  constructor(params: { row_count: number; required_rows: number }) {
    super({
      code: "INSUFFICIENT_DATA",
      reason: `At least ${params.required_rows} rows are required for a month-over-month comparison (received ${params.row_count}).`,
      next_action: "Add earlier periods to the table and rerun.",
    });
    this.name = "InsufficientDataError";
    this.row_count = params.row_count;
    this.required_rows = params.required_rows;
  }
}

export type DivisionMetric = "revenue" | "orders" | "aov";
export type DivisionOperand = "previous_revenue" | "previous_orders" | "current_orders" | "previous_aov";

export class DivisionByZeroError extends KpiEngineError {
  readonly metric: DivisionMetric;
  readonly operand: DivisionOperand;

  constructor(params: { metric: DivisionMetric; operand: DivisionOperand }) {
    super({
      code: "DIVISION_BY_ZERO",
      reason: `Cannot compute ${params.metric} change: ${params.operand} is zero.`,
      next_action: "Check the last two periods for zero revenue or zero orders.",
    });
    this.name = "DivisionByZeroError";
    this.metric = params.metric;
    this.operand = params.operand;
  }
}

export class NonFiniteResultError extends KpiEngineError {
  readonly metric: DivisionMetric;

  constructor(params: { metric: DivisionMetric; current: number; previous: number }) {
    super({
      code: "NON_FINITE_RESULT",
      reason: `Cannot compute ${params.metric} change: ${params.current} vs ${params.previous} is out of numeric range.`,
      next_action: "Check the last two periods for extreme or near-zero values.",
    });
    this.name = "NonFiniteResultError";
    this.metric = params.metric;
  }
}

export function toKpiFailure(error: unknown): KpiFailure {
  if (error instanceof KpiEngineError) {
    return error.toFailure();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    code: "UNEXPECTED",
    reason,
    validation_errors: [],
    next_action: "Review the logs for the failing step and rerun.",
  };
}
