import { z } from "zod";

export const REQUIRED_COLUMNS = ["month", "revenue", "orders"] as const;
export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export const RiskLevelSchema = z.enum(["High", "Medium", "Healthy"]);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const DiagnosisKindSchema = z.enum([
  "demand_contraction",
  "pricing_issue",
  "no_structural_issue",
]);
export type DiagnosisKind = z.infer<typeof DiagnosisKindSchema>;

// Cells arrive as strings from files and as numbers from callers.
function toNumeric(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  return Number(trimmed);
}

const RevenueCellSchema = z.preprocess(
  toNumeric,
  z.number({ invalid_type_error: "must be numeric", required_error: "is required" }).finite().min(0)
);

const OrdersCellSchema = z.preprocess(
  toNumeric,
  z.number({ invalid_type_error: "must be numeric", required_error: "is required" }).finite().int().min(0)
);

const PeriodCellSchema = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.string({ invalid_type_error: "must be a label", required_error: "is required" }).trim().min(1, "is required")
);

export const RawRowSchema = z.object({
  month: PeriodCellSchema,
  revenue: RevenueCellSchema,
  orders: OrdersCellSchema,
});

export const TimeSeriesRowSchema = z.object({
  period: z.string().min(1),
  revenue: z.number().finite().min(0),
  orders: z.number().finite().int().min(0),
});
export type TimeSeriesRow = z.infer<typeof TimeSeriesRowSchema>;

export type Dataset = readonly TimeSeriesRow[];

export const MetricSnapshotSchema = z.object({
  current_revenue: z.number().finite(),
  previous_revenue: z.number().finite(),
  revenue_delta_pct: z.number().finite(),
  current_orders: z.number().finite(),
  previous_orders: z.number().finite(),
  order_delta_pct: z.number().finite(),
  current_aov: z.number().finite(),
  previous_aov: z.number().finite(),
  aov_delta_pct: z.number().finite(),
});
export type MetricSnapshot = z.infer<typeof MetricSnapshotSchema>;

export const RiskAssessmentSchema = z.object({
  level: RiskLevelSchema,
  label: z.string(),
  message: z.string(),
});
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

export const DiagnosisSchema = z.object({
  kind: DiagnosisKindSchema,
  statement: z.string(),
});
export type Diagnosis = z.infer<typeof DiagnosisSchema>;

export const ForecastSchema = z.object({
  next_period_index: z.number().int().min(0),
  projected_revenue: z.number().finite(),
  slope: z.number().finite(),
  intercept: z.number().finite(),
});
export type Forecast = z.infer<typeof ForecastSchema>;

export const ChartSeriesSchema = z.object({
  actual: z.array(z.object({ period: z.string(), revenue: z.number() })),
  with_forecast: z.array(
    z.object({ period: z.string(), revenue: z.number(), is_forecast: z.boolean() })
  ),
  trend: z.array(z.object({ period: z.string(), value: z.number() })),
});
export type ChartSeries = z.infer<typeof ChartSeriesSchema>;

export const KpiEngineResultSchema = z.object({
  dataset: z.array(TimeSeriesRowSchema),
  metrics: MetricSnapshotSchema,
  risk: RiskAssessmentSchema,
  diagnosis: DiagnosisSchema,
  risk_score: z.number().int().min(0).max(100),
  forecast: ForecastSchema,
  commentary: z.string(),
  chart: ChartSeriesSchema,
});
export type KpiEngineResult = z.infer<typeof KpiEngineResultSchema>;
