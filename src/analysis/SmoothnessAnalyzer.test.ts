import { beforeEach, describe, expect, it } from "vitest";
import { computeNormalizedJerk, computeSPARC, SmoothnessAnalyzer } from "./SmoothnessAnalyzer";

/** Deterministic pseudo-random values in [-1, 1). */
function noise(n: number, seed = 7): number[] {
  const values: number[] = [];
  let state = seed;
  for (let i = 0; i < n; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    values.push((state / 2147483648) * 2 - 1);
  }
  return values;
}

describe("computeSPARC", () => {
  it("should measure the arc of a pure DC spectrum", () => {
    // Bins 0..4 at 1 Hz spacing, normalized to a 4 Hz cut-off
    const sparc = computeSPARC([1, 1, 1, 1, 1, 1, 1, 1], 8);
    expect(sparc).toBeCloseTo(-(Math.sqrt(17) / 4 + 0.75), 8);
  });

  it("should return 0 for a silent signal", () => {
    expect(computeSPARC(new Array<number>(64).fill(0), 60)).toBe(0);
  });

  it("should rate a sinusoid smoother than noise", () => {
    const n = 256;
    const sine = Array.from({ length: n }, (_, i) => 1 + 0.5 * Math.sin((2 * Math.PI * 2 * i) / 60));
    const rough = noise(n).map((v) => 1 + 0.5 * v);

    expect(computeSPARC(sine, 60)).toBeGreaterThan(computeSPARC(rough, 60));
  });
});

describe("computeNormalizedJerk", () => {
  it("should scale RMS jerk by duration and amplitude", () => {
    // Unit jerk throughout: 4^1.5 / 4
    expect(computeNormalizedJerk([0, 1, 2, 3, 4], 1, 4)).toBeCloseTo(2, 10);
  });

  it("should return 0 for a constant signal", () => {
    expect(computeNormalizedJerk([1, 1, 1, 1], 60, 1)).toBe(0);
  });
});

describe("SmoothnessAnalyzer", () => {
  let analyzer: SmoothnessAnalyzer;

  beforeEach(() => {
    analyzer = new SmoothnessAnalyzer();
  });

  it("should need at least 128 samples", () => {
    for (let i = 0; i < 127; i++) analyzer.recordSample({ timestamp: i / 60, ap: 0, ml: 0, v: 0.1 });

    expect(analyzer.hasEnoughData).toBe(false);
    expect(analyzer.analyze()).toEqual({
      sparcScore: 0,
      harmonicRatioAP: 0,
      harmonicRatioML: 0,
      normalizedJerk: 0,
    });
  });

  describe("harmonic ratios", () => {
    // 1 Hz stride: AP dominated by the step (2nd harmonic), ML by the stride
    beforeEach(() => {
      for (let i = 0; i < 600; i++) {
        const t = i / 60;
        analyzer.recordSample({
          timestamp: t,
          ap: Math.cos(2 * Math.PI * 2 * t) + 0.1 * Math.cos(2 * Math.PI * t),
          ml: Math.cos(2 * Math.PI * t) + 0.1 * Math.cos(2 * Math.PI * 2 * t),
          v: 0,
        });
      }
    });

    it("should divide even by odd harmonics in AP", () => {
      expect(analyzer.hasEnoughData).toBe(true);
      expect(analyzer.analyze().harmonicRatioAP).toBeCloseTo(10, 6);
    });

    it("should divide odd by even harmonics in ML", () => {
      expect(analyzer.analyze().harmonicRatioML).toBeCloseTo(10, 6);
    });

    it("should report a negative SPARC", () => {
      expect(analyzer.analyze().sparcScore).toBeLessThan(0);
    });
  });

  it("should drop samples on reset", () => {
    analyzer.recordSample({ timestamp: 0, ap: 0, ml: 0, v: 0 });
    analyzer.reset();
    expect(analyzer.sampleCount).toBe(0);
  });
});
