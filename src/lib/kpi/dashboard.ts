import { DEFAULT_KPI_ENGINE_CONFIG } from "./config";
import { formatMoney, formatPct } from "./report";
import type { KpiEngineResult, RiskLevel } from "./schema";

export type KpiCard = {
  id: "revenue" | "orders" | "aov" | "risk_score";
  label: string;
  value: string;
  delta: string | null;
};

export type RiskTone = "red" | "orange" | "green";

export type PlaceholderDashboard = {
  cards: KpiCard[];
  series: Array<{ period: string; revenue: number }>;
  notice: string;
};

const RISK_TONES: Record<RiskLevel, RiskTone> = {
  High: "red",
  Medium: "orange",
  Healthy: "green",
};

export const EXPECTED_FORMAT_GUIDE = [
  "Expected CSV Format",
  "",
  "The input is a structured table with the following columns:",
  "  Month   - time period (e.g. Jan-2024, 2024-01)",
  "  Revenue - monthly total revenue (numeric)",
  "  Orders  - monthly total order count (numeric, non-zero)",
  "",
  "Rows must be in chronological order, with at least 2 rows for a month-over-month comparison.",
].join("\n");

const PLACEHOLDER_MONTHS = ["Jan", "Feb", "Mar", "Apr", "May"];

export function riskTone(level: RiskLevel): RiskTone {
  return RISK_TONES[level];
}

export function buildKpiCards(
  result: Pick<KpiEngineResult, "metrics" | "risk_score">,
  options: { currency_symbol?: string } = {}
): KpiCard[] {
  const currency = options.currency_symbol ?? DEFAULT_KPI_ENGINE_CONFIG.currency_symbol;
  const { metrics } = result;
  return [
    {
      id: "revenue",
      label: "Current Revenue",
      value: `${currency}${metrics.current_revenue}`,
      delta: formatPct(metrics.revenue_delta_pct),
    },
    {
      id: "orders",
      label: "Current Orders",
      value: String(metrics.current_orders),
      delta: formatPct(metrics.order_delta_pct),
    },
    {
      id: "aov",
      label: "Average Order Value",
      value: formatMoney(metrics.current_aov, currency),
      delta: formatPct(metrics.aov_delta_pct),
    },
    { id: "risk_score", label: "Risk Score", value: String(result.risk_score), delta: null },
  ];
}

function renderCard(card: KpiCard) {
  return card.delta === null ? `${card.label}: ${card.value}` : `${card.label}: ${card.value} (${card.delta})`;
}

/** Plain-text dashboard: cards, risk, diagnosis, commentary and the forecast line. */
export function renderDashboardText(
  result: Pick<KpiEngineResult, "metrics" | "risk" | "diagnosis" | "risk_score" | "forecast" | "commentary">,
  options: { currency_symbol?: string } = {}
): string {
  const currency = options.currency_symbol ?? DEFAULT_KPI_ENGINE_CONFIG.currency_symbol;
  return [
    ...buildKpiCards(result, { currency_symbol: currency }).map(renderCard),
    "",
    `Performance Risk Assessment [${riskTone(result.risk.level)}]: ${result.risk.label}`,
    result.risk.message,
    "",
    `Performance Diagnosis: ${result.diagnosis.statement}`,
    `Executive Commentary: ${result.commentary}`,
    "",
    `Projected Next Month Revenue: ${currency}${result.forecast.projected_revenue}`,
  ].join("\n");
}

/** Zeroed cards and a flat series shown before any table is loaded. */
export function buildPlaceholderDashboard(options: { currency_symbol?: string } = {}): PlaceholderDashboard {
  const currency = options.currency_symbol ?? DEFAULT_KPI_ENGINE_CONFIG.currency_symbol;
  return {
    cards: [
      { id: "revenue", label: "Current Revenue", value: `${currency}0`, delta: "0%" },
      { id: "orders", label: "Current Orders", value: "0", delta: "0%" },
      { id: "aov", label: "Average Order Value", value: `${currency}0.00`, delta: "0%" },
      { id: "risk_score", label: "Risk Score", value: "0", delta: null },
    ],
    series: PLACEHOLDER_MONTHS.map((period) => ({ period, revenue: 0 })),
    notice: "Load a CSV file to see KPIs and forecasts.",
  };
}
