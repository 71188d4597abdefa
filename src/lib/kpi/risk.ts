import { clamp, roundHalfEven } from "./rounding";
import type { MetricSnapshot, RiskAssessment, RiskLevel } from "./schema";

export const HIGH_RISK_THRESHOLD_PCT = -10;

export const RISK_LABELS: Record<RiskLevel, string> = {
  High: "High Risk",
  Medium: "Medium Risk",
  Healthy: "Healthy",
};

export const RISK_MESSAGES: Record<RiskLevel, string> = {
  High: "Significant revenue decline detected. Immediate investigation required.",
  Medium: "Moderate revenue decline. Monitor closely.",
  Healthy: "Revenue performance is stable or growing.",
};

export const RISK_SCORE_WEIGHTS = {
  revenue: 2,
  orders: 1.5,
  aov: 1.2,
} as const;

export const MAX_RISK_SCORE = 100;

// -10 is High, 0 is Healthy
export function riskLevelFor(revenueDeltaPct: number): RiskLevel {
  if (revenueDeltaPct <= HIGH_RISK_THRESHOLD_PCT) return "High";
  if (revenueDeltaPct < 0) return "Medium";
  return "Healthy";
}

export function classifyRisk(revenueDeltaPct: number): RiskAssessment {
  const level = riskLevelFor(revenueDeltaPct);
  return { level, label: RISK_LABELS[level], message: RISK_MESSAGES[level] };
}

/**
 * Weighted sum of absolute MoM changes, rounded half-to-even and capped at 100.
 */
export function scoreRisk(
  metrics: Pick<MetricSnapshot, "revenue_delta_pct" | "order_delta_pct" | "aov_delta_pct">
): number {
  const raw =
    Math.abs(metrics.revenue_delta_pct) * RISK_SCORE_WEIGHTS.revenue +
    Math.abs(metrics.order_delta_pct) * RISK_SCORE_WEIGHTS.orders +
    Math.abs(metrics.aov_delta_pct) * RISK_SCORE_WEIGHTS.aov;
  return clamp(roundHalfEven(raw), 0, MAX_RISK_SCORE);
}
