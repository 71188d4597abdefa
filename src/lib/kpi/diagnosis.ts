import type { Diagnosis, DiagnosisKind } from "./schema";

export const DIAGNOSIS_STATEMENTS: Record<DiagnosisKind, string> = {
  demand_contraction: "Revenue and order volume declined together. Possible demand contraction.",
  pricing_issue: "Revenue declined while order volume remained stable. Potential pricing issue.",
  no_structural_issue: "No major structural performance issue detected.",
};

export function diagnosisKindFor(revenueDeltaPct: number, orderDeltaPct: number): DiagnosisKind {
  if (revenueDeltaPct < 0 && orderDeltaPct < 0) return "demand_contraction";
  if (revenueDeltaPct < 0) return "pricing_issue";
  return "no_structural_issue";
}

export function diagnose(revenueDeltaPct: number, orderDeltaPct: number): Diagnosis {
  const kind = diagnosisKindFor(revenueDeltaPct, orderDeltaPct);
  return { kind, statement: DIAGNOSIS_STATEMENTS[kind] };
}
