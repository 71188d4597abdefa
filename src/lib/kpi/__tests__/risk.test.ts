import { describe, expect, it } from "vitest";

import { classifyRisk, riskLevelFor, scoreRisk } from "../risk";
import { roundHalfEven } from "../rounding";

function deltas(revenue: number, orders: number, aov: number) {
  return { revenue_delta_pct: revenue, order_delta_pct: orders, aov_delta_pct: aov };
}

describe("classifyRisk", () => {
  it("treats exactly -10 as high risk", () => {
    expect(classifyRisk(-10)).toEqual({
      level: "High",
      label: "High Risk",
      message: "Significant revenue decline detected. Immediate investigation required.",
    });
  });

  it("treats exactly 0 as healthy", () => {
    expect(classifyRisk(0)).toEqual({
      level: "Healthy",
      label: "Healthy",
      message: "Revenue performance is stable or growing.",
    });
  });

  it("uses medium risk strictly between -10 and 0", () => {
    expect(classifyRisk(-9.99).level).toBe("Medium");
    expect(classifyRisk(-0.01)).toEqual({
      level: "Medium",
      label: "Medium Risk",
      message: "Moderate revenue decline. Monitor closely.",
    });
  });

  it("maps the tails", () => {
    expect(riskLevelFor(-10.0001)).toBe("High");
    expect(riskLevelFor(-85)).toBe("High");
    expect(riskLevelFor(42)).toBe("Healthy");
  });
});

describe("scoreRisk", () => {
  it("weights absolute deltas 2 / 1.5 / 1.2", () => {
    expect(scoreRisk(deltas(-10, 0, -10))).toBe(32);
    expect(scoreRisk(deltas(-10, -10, 0))).toBe(35);
    expect(scoreRisk(deltas(0, 0, 0))).toBe(0);
  });

  it("rounds .5 to the even neighbour", () => {
    expect(scoreRisk(deltas(1.25, 0, 0))).toBe(2);
    expect(scoreRisk(deltas(1.75, 0, 0))).toBe(4);
    expect(scoreRisk(deltas(0, 1, 0))).toBe(2);
    expect(scoreRisk(deltas(0, -3, 0))).toBe(4);
  });

  it("clamps at 100", () => {
    expect(scoreRisk(deltas(50, 0, 0))).toBe(100);
    expect(scoreRisk(deltas(60, 0, 0))).toBe(100);
    expect(scoreRisk(deltas(-300, 400, 1000))).toBe(100);
  });

  it("never decreases when any single delta grows in magnitude", () => {
    const steps = [0, 0.5, 1, 2.5, 5, 10, 20, 40, 80];
    for (const axis of [0, 1, 2]) {
      let last = -1;
      for (const step of steps) {
        const values = [3, -2, 1];
        values[axis] = -step;
        const score = scoreRisk(deltas(values[0] ?? 0, values[1] ?? 0, values[2] ?? 0));
        expect(score).toBeGreaterThanOrEqual(last);
        last = score;
      }
    }
  });
});

describe("roundHalfEven", () => {
  it("sends ties to the even integer", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(-0.5)).toBe(0);
    expect(roundHalfEven(-1.5)).toBe(-2);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it("rounds non-ties to the nearest integer", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(-2.6)).toBe(-3);
    expect(roundHalfEven(7)).toBe(7);
  });
});
