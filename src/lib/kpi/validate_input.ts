import { InsufficientDataError, ValidationError } from "./errors";
import { normalizeHeader } from "./file_parsers";
import { REQUIRED_COLUMNS, RawRowSchema, type Dataset, type RequiredColumn, type TimeSeriesRow } from "./schema";

export const MIN_ROWS = 2;

const COLUMN_LABELS: Record<RequiredColumn, string> = {
  month: "Month",
  revenue: "Revenue",
  orders: "Orders",
};

export type RawTable = {
  columns: readonly string[];
  rows: readonly Record<string, unknown>[];
};

function normalizeRecord(row: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[normalizeHeader(key)] = value;
  }
  return normalized;
}

/**
 * Checks the table shape and parses every row into a chronological Dataset.
 * Column checks run before the row count, and the row count before any cell is parsed.
 */
export function validateDataset(table: RawTable): Dataset {
  const present = new Set(table.columns.map((column) => normalizeHeader(column)));
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    const labels = missing.map((column) => COLUMN_LABELS[column]);
    throw new ValidationError({
      reason: `Input must contain Month, Revenue, and Orders columns (missing: ${labels.join(", ")}).`,
      missing_columns: labels,
    });
  }

  if (table.rows.length < MIN_ROWS) {
    throw new InsufficientDataError({ row_count: table.rows.length, required_rows: MIN_ROWS });
  }

  const dataset: TimeSeriesRow[] = [];
  const errors: string[] = [];

  table.rows.forEach((row, index) => {
    const parsed = RawRowSchema.safeParse(normalizeRecord(row));
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.join(".") || "row";
        errors.push(`row ${index + 1}: ${field}: ${issue.message}`);
      }
      return;
    }
    dataset.push({
      period: parsed.data.month,
      revenue: parsed.data.revenue,
      orders: parsed.data.orders,
    });
  });

  if (errors.length > 0) {
    throw new ValidationError({
      reason: `Input contains ${errors.length} malformed field${errors.length === 1 ? "" : "s"}.`,
      validation_errors: errors,
    });
  }

  return dataset;
}

/** Convenience for callers that already hold typed rows. */
export function datasetFromRows(rows: readonly { period: string; revenue: number; orders: number }[]): Dataset {
  return validateDataset({
    columns: ["Month", "Revenue", "Orders"],
    rows: rows.map((row) => ({ Month: row.period, Revenue: row.revenue, Orders: row.orders })),
  });
}
