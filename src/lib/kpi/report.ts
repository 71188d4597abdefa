import { DEFAULT_KPI_ENGINE_CONFIG } from "./config";
import { evaluateTrend } from "./forecast";
import type { ChartSeries, Dataset, Forecast, KpiEngineResult } from "./schema";

export type ReportOptions = {
  currency_symbol?: string;
  forecast_label?: string;
};

export function formatPct(value: number) {
  return `${value.toFixed(2)}%`;
}

export function formatMoney(value: number, currencySymbol: string = DEFAULT_KPI_ENGINE_CONFIG.currency_symbol) {
  return `${currencySymbol}${value.toFixed(2)}`;
}

/**
 * Actual revenue, the same series with one synthetic forecast point, and the
 * trend line at every historical index plus the forecast index.
 */
export function buildChartSeries(dataset: Dataset, forecast: Forecast, options: ReportOptions = {}): ChartSeries {
  const forecastLabel = options.forecast_label ?? DEFAULT_KPI_ENGINE_CONFIG.forecast_label;
  const actual = dataset.map((row) => ({ period: row.period, revenue: row.revenue }));
  const trendPeriods = [...dataset.map((row) => row.period), forecastLabel];

  return {
    actual,
    with_forecast: [
      ...actual.map((point) => ({ ...point, is_forecast: false })),
      { period: forecastLabel, revenue: forecast.projected_revenue, is_forecast: true },
    ],
    trend: trendPeriods.map((period, index) => ({
      period,
      value: evaluateTrend(forecast, index),
    })),
  };
}

export function buildTextReport(
  result: Pick<KpiEngineResult, "metrics" | "risk" | "diagnosis" | "risk_score" | "forecast">,
  options: ReportOptions = {}
): string {
  const currency = options.currency_symbol ?? DEFAULT_KPI_ENGINE_CONFIG.currency_symbol;
  const { metrics } = result;

  return [
    `Current Revenue: ${metrics.current_revenue}`,
    `Revenue MoM Change: ${formatPct(metrics.revenue_delta_pct)}`,
    `Current Orders: ${metrics.current_orders}`,
    `Order MoM Change: ${formatPct(metrics.order_delta_pct)}`,
    `Average Order Value: ${formatMoney(metrics.current_aov, currency)} (Δ ${formatPct(metrics.aov_delta_pct)})`,
    `Risk Score: ${result.risk_score}`,
    `Forecasted Revenue: ${currency}${result.forecast.projected_revenue}`,
    `Risk Level: ${result.risk.label}`,
    `Diagnosis: ${result.diagnosis.statement}`,
  ].join("\n");
}
