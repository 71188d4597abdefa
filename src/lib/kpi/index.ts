/**
 * Revenue KPI Engine
 *
 * Central exports for validation, metrics, risk, forecast and presentation.
 */

export { validateDataset, datasetFromRows, MIN_ROWS } from "./validate_input";
export type { RawTable } from "./validate_input";
export { computeMetrics } from "./metrics";
export { classifyRisk, riskLevelFor, scoreRisk, RISK_LABELS, RISK_MESSAGES } from "./risk";
export { diagnose, DIAGNOSIS_STATEMENTS } from "./diagnosis";
export { fitLinearTrend, evaluateTrend, forecastRevenue } from "./forecast";
export type { LinearTrend } from "./forecast";
export { generateCommentary, COMMENTARY_BY_RISK } from "./commentary";
export { roundHalfEven } from "./rounding";
export { buildChartSeries, buildTextReport, formatMoney, formatPct } from "./report";
export {
  buildKpiCards,
  buildPlaceholderDashboard,
  renderDashboardText,
  riskTone,
  EXPECTED_FORMAT_GUIDE,
} from "./dashboard";
export type { KpiCard, PlaceholderDashboard, RiskTone } from "./dashboard";
export { evaluateDataset, runKpiEngine } from "./run_kpi_engine";
export { parseCsvFile, parseXlsxFile, parseFile, normalizeHeader } from "./file_parsers";
export type { ParsedTable } from "./file_parsers";
export {
  KpiEngineError,
  ValidationError,
  InsufficientDataError,
  DivisionByZeroError,
  NonFiniteResultError,
  toKpiFailure,
} from "./errors";
export type { KpiEngineErrorCode, KpiFailure } from "./errors";
export { getKpiEngineConfig, DEFAULT_KPI_ENGINE_CONFIG } from "./config";
export type { KpiEngineConfig } from "./config";
export { createKpiLogger } from "./kpi_logger";
export type { KpiLogger, KpiLogEntry, KpiLogLevel } from "./kpi_logger";
export type {
  Dataset,
  TimeSeriesRow,
  MetricSnapshot,
  RiskLevel,
  RiskAssessment,
  Diagnosis,
  Forecast,
  ChartSeries,
  KpiEngineResult,
} from "./schema";
