import {
  DivisionByZeroError,
  InsufficientDataError,
  NonFiniteResultError,
  type DivisionMetric,
  type DivisionOperand,
} from "./errors";
import type { Dataset, MetricSnapshot } from "./schema";

function pctChange(current: number, previous: number, metric: DivisionMetric, operand: DivisionOperand) {
  if (previous === 0) {
    throw new DivisionByZeroError({ metric, operand });
  }
  const delta = ((current - previous) / previous) * 100;
  // subnormal or huge operands still overflow
  if (!Number.isFinite(delta)) {
    throw new NonFiniteResultError({ metric, current, previous });
  }
  return delta;
}

/** Month-over-month snapshot from the last two rows only. */
export function computeMetrics(dataset: Dataset): MetricSnapshot {
  const current = dataset[dataset.length - 1];
  const previous = dataset[dataset.length - 2];
  if (!current || !previous) {
    throw new InsufficientDataError({ row_count: dataset.length, required_rows: 2 });
  }

  if (previous.orders === 0) {
    throw new DivisionByZeroError({ metric: "orders", operand: "previous_orders" });
  }
  if (current.orders === 0) {
    throw new DivisionByZeroError({ metric: "aov", operand: "current_orders" });
  }

  const revenue_delta_pct = pctChange(current.revenue, previous.revenue, "revenue", "previous_revenue");
  const order_delta_pct = pctChange(current.orders, previous.orders, "orders", "previous_orders");

  const current_aov = current.revenue / current.orders;
  const previous_aov = previous.revenue / previous.orders;
  const aov_delta_pct = pctChange(current_aov, previous_aov, "aov", "previous_aov");

  return {
    current_revenue: current.revenue,
    previous_revenue: previous.revenue,
    revenue_delta_pct,
    current_orders: current.orders,
    previous_orders: previous.orders,
    order_delta_pct,
    current_aov,
    previous_aov,
    aov_delta_pct,
  };
}
