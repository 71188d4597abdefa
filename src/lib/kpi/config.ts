import { KPI_LOG_THRESHOLDS, type KpiLogThreshold } from "./kpi_logger";

export type KpiEngineConfig = {
  log_level: KpiLogThreshold;
  currency_symbol: string;
  forecast_label: string;
};

export const DEFAULT_KPI_ENGINE_CONFIG: KpiEngineConfig = {
  log_level: "info",
  currency_symbol: "$",
  forecast_label: "Forecast",
};

function readLogLevel(value: string | undefined, fallback: KpiLogThreshold): KpiLogThreshold {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return KPI_LOG_THRESHOLDS.find((level) => level === normalized) ?? fallback;
}

function readText(value: string | undefined, fallback: string) {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export function getKpiEngineConfig(env: NodeJS.ProcessEnv = process.env): KpiEngineConfig {
  return {
    log_level: readLogLevel(env.KPI_LOG_LEVEL, DEFAULT_KPI_ENGINE_CONFIG.log_level),
    currency_symbol: readText(env.KPI_CURRENCY_SYMBOL, DEFAULT_KPI_ENGINE_CONFIG.currency_symbol),
    forecast_label: readText(env.KPI_FORECAST_LABEL, DEFAULT_KPI_ENGINE_CONFIG.forecast_label),
  };
}
