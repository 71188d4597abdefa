import { InsufficientDataError } from "./errors";
import { roundHalfEven } from "./rounding";
import type { Dataset, Forecast } from "./schema";

export type LinearTrend = {
  slope: number;
  intercept: number;
};

/**
 * Ordinary least squares over index 0..n-1, in mean-centred form.
 * A constant series yields slope 0 and the constant as intercept.
 */
export function fitLinearTrend(values: readonly number[]): LinearTrend {
  const n = values.length;
  if (n < 2) {
    throw new InsufficientDataError({ row_count: n, required_rows: 2 });
  }

  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;

  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    const dx = i - meanX;
    num += dx * ((values[i] ?? 0) - meanY);
    den += dx * dx;
  }

  const slope = num / den;
  return { slope, intercept: meanY - slope * meanX };
}

export function evaluateTrend(trend: LinearTrend, index: number): number {
  return trend.slope * index + trend.intercept;
}

export function forecastRevenue(dataset: Dataset): Forecast {
  const trend = fitLinearTrend(dataset.map((row) => row.revenue));
  const next_period_index = dataset.length;
  return {
    next_period_index,
    projected_revenue: roundHalfEven(evaluateTrend(trend, next_period_index)),
    slope: trend.slope,
    intercept: trend.intercept,
  };
}
