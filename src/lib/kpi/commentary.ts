import type { RiskLevel } from "./schema";

export const COMMENTARY_BY_RISK: Record<RiskLevel, string> = {
  High: "Revenue contraction detected alongside order decline. Immediate intervention recommended.",
  Medium: "Early signs of revenue deceleration observed. Close monitoring advised.",
  Healthy:
    "Revenue trajectory remains stable with positive order dynamics. No material performance anomaly detected.",
};

export function generateCommentary(level: RiskLevel): string {
  return COMMENTARY_BY_RISK[level];
}
