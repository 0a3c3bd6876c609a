import { describe, expect, it } from "vitest";
import {
  compositeFromFactors,
  FallRiskAnalyzer,
  fallRiskLevel,
  type FallRiskInput,
} from "./FallRiskAnalyzer";

const NOTHING_MEASURED: FallRiskInput = {
  walkingSpeedMPS: null,
  strideTimeCVPercent: null,
  doubleSupportPercent: null,
  stepWidthVariabilityCm: null,
  swayVelocityMMS: null,
  stepAsymmetryPercent: null,
  tugTimeSec: null,
  footClearanceM: null,
};

describe("FallRiskAnalyzer", () => {
  const analyzer = new FallRiskAnalyzer();

  it("should flag an impaired walker as high risk", () => {
    const result = analyzer.assess({
      walkingSpeedMPS: 0.55,
      strideTimeCVPercent: 9,
      doubleSupportPercent: 40,
      stepWidthVariabilityCm: 4.5,
      swayVelocityMMS: 35,
      stepAsymmetryPercent: 18,
      tugTimeSec: 18,
      footClearanceM: 0.012,
    });

    // 31.25·.25 + 100·.2 + 100·.1 + 100·.1 + 90·.1 + 90·.1 + 95·.1 + 40·.05
    expect(result.compositeScore).toBeCloseTo(77.3125, 8);
    expect(result.compositeScore).toBeGreaterThanOrEqual(60);
    expect(result.riskLevel).toBe("high");
    expect(result.riskFactorCount).toBe(8);
    expect(result.coverage).toBe(1);
  });

  it("should report foot clearance in centimetres", () => {
    const result = analyzer.assess({ ...NOTHING_MEASURED, footClearanceM: 0.012 });
    const [factor] = result.factorBreakdown;

    expect(factor.name).toBe("Foot Clearance");
    expect(factor.value).toBeCloseTo(1.2, 10);
    expect(factor.threshold).toBeCloseTo(2, 10);
    expect(factor.subScore).toBeCloseTo(40, 8);
  });

  it("should scale sparse assessments down by coverage", () => {
    const result = analyzer.assess({
      ...NOTHING_MEASURED,
      walkingSpeedMPS: 1.2,
      strideTimeCVPercent: 2.5,
    });

    // (10·.25 + 25·.2) / .45 × 2/3
    expect(result.coverage).toBeCloseTo(2 / 3, 10);
    expect(result.compositeScore).toBeCloseTo((7.5 / 0.45) * (2 / 3), 8);
    expect(result.riskLevel).toBe("low");
    expect(result.riskFactorCount).toBe(0);
  });

  it("should skip non-finite inputs", () => {
    const result = analyzer.assess({ ...NOTHING_MEASURED, tugTimeSec: Number.NaN });
    expect(result.factorBreakdown).toHaveLength(0);
  });

  it("should score zero with nothing measured", () => {
    const result = analyzer.assess(NOTHING_MEASURED);
    expect(result.compositeScore).toBe(0);
    expect(result.coverage).toBe(0);
    expect(result.riskLevel).toBe("low");
  });
});

describe("fallRiskLevel", () => {
  it("should grade by score", () => {
    expect(fallRiskLevel(60, 0)).toBe("high");
    expect(fallRiskLevel(30, 0)).toBe("moderate");
    expect(fallRiskLevel(29.9, 0)).toBe("low");
  });

  it("should escalate on the count of elevated factors", () => {
    expect(fallRiskLevel(10, 4)).toBe("high");
    expect(fallRiskLevel(10, 2)).toBe("moderate");
  });
});

describe("compositeFromFactors", () => {
  it("should weight present factors only", () => {
    expect(
      compositeFromFactors(
        [
          { subScore: 80, weight: 0.3 },
          { subScore: 20, weight: 0.1 },
        ],
        1,
      ),
    ).toBeCloseTo(65, 10);
  });

  it("should return 0 without weight", () => {
    expect(compositeFromFactors([], 1)).toBe(0);
  });
});
