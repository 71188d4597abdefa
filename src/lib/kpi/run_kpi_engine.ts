import { generateCommentary } from "./commentary";
import { getKpiEngineConfig, type KpiEngineConfig } from "./config";
import { diagnose } from "./diagnosis";
import { toKpiFailure } from "./errors";
import { forecastRevenue } from "./forecast";
import { createKpiLogger, type KpiLogger } from "./kpi_logger";
import { computeMetrics } from "./metrics";
import { buildChartSeries, type ReportOptions } from "./report";
import { classifyRisk, scoreRisk } from "./risk";
import type { Dataset, KpiEngineResult } from "./schema";
import { validateDataset, type RawTable } from "./validate_input";

/**
 * Pure evaluation of an already validated dataset. Every call builds fresh values.
 */
export function evaluateDataset(dataset: Dataset, options: ReportOptions = {}): KpiEngineResult {
  const metrics = computeMetrics(dataset);
  const risk = classifyRisk(metrics.revenue_delta_pct);
  const diagnosis = diagnose(metrics.revenue_delta_pct, metrics.order_delta_pct);
  const risk_score = scoreRisk(metrics);
  const forecast = forecastRevenue(dataset);

  return {
    dataset: dataset.map((row) => ({ ...row })),
    metrics,
    risk,
    diagnosis,
    risk_score,
    forecast,
    commentary: generateCommentary(risk.level),
    chart: buildChartSeries(dataset, forecast, options),
  };
}

export function runKpiEngine(
  table: RawTable,
  params: { logger?: KpiLogger; config?: KpiEngineConfig } = {}
): KpiEngineResult {
  const config = params.config ?? getKpiEngineConfig();
  const logger = params.logger ?? createKpiLogger({ level: config.log_level });

  try {
    const dataset = validateDataset(table);
    logger.info(`validated ${dataset.length} rows`);

    const result = evaluateDataset(dataset, { forecast_label: config.forecast_label });
    logger.info(
      `risk=${result.risk.level} score=${result.risk_score} forecast=${result.forecast.projected_revenue}`
    );
    return result;
  } catch (error) {
    const failure = toKpiFailure(error);
    logger.error(`${failure.code}: ${failure.reason}`);
    throw error;
  }
}
