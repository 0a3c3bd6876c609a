import { describe, expect, it } from "vitest";
import { standingJoints } from "../utils/SyntheticSkeleton";
import { PostureAnalyzer } from "./PostureAnalyzer";

const RAD2DEG = 180 / Math.PI;

describe("PostureAnalyzer", () => {
  const analyzer = new PostureAnalyzer();

  describe("analyze", () => {
    it("should return null when the head is missing", () => {
      expect(analyzer.analyze(standingJoints({ head_joint: null }))).toBeNull();
    });

    it("should measure a neutral upright pose", () => {
      const result = analyzer.analyze(standingJoints());
      expect(result).not.toBeNull();
      if (!result) return;

      const m = result.metrics;
      expect(m.sagittalTrunkLeanDeg).toBe(0);
      expect(m.frontalTrunkLeanDeg).toBe(0);
      expect(m.sagittalVerticalAxisCm).toBe(0);
      expect(m.craniovertebralAngleDeg).toBeCloseTo(Math.atan2(0.14, 0.06) * RAD2DEG, 8);
      expect(m.shoulderAsymmetryCm).toBe(0);
      expect(m.pelvicObliquityDeg).toBe(0);
      expect(m.headForwardCm).toBeCloseTo(6, 8);
      expect(m.shoulderProtractionCm).toBe(0);
      expect(m.kneeAlignmentDeg).toBe(0);
      expect(result.coverage).toBeCloseTo(1, 10);
    });

    it("should grade a straight spine as flat back", () => {
      const result = analyzer.analyze(standingJoints());

      expect(result?.metrics.thoracicKyphosisDeg).toBe(0);
      expect(result?.metrics.lumbarLordosisDeg).toBe(0);
      expect(result?.severities.thoracicKyphosis).toBe("moderate");
      expect(result?.severities.lumbarLordosis).toBe("severe");
      expect(result?.posturalType).toBe("flatBack");
    });

    it("should rate the neutral pose on the New York scale", () => {
      // Eight items assessed; only kyphosis loses points
      expect(analyzer.analyze(standingJoints())?.nypr).toEqual({
        score: 38,
        maxScore: 40,
        itemsAssessed: 8,
      });
    });

    it("should detect a forward trunk lean", () => {
      const neutral = analyzer.analyze(standingJoints());
      const leaning = analyzer.analyze(standingJoints({ neck_1_joint: [0, 1.48, 0.48] }));

      expect(leaning?.metrics.sagittalTrunkLeanDeg).toBeCloseTo(45, 8);
      expect(leaning?.metrics.sagittalVerticalAxisCm).toBeCloseTo(48, 8);
      expect(leaning?.severities.trunkLean).toBe("severe");
      expect(leaning?.severities.sagittalVerticalAxis).toBe("severe");
      expect(leaning?.score ?? 100).toBeLessThan(neutral?.score ?? 0);
    });

    it("should measure shoulder asymmetry and tilt", () => {
      const result = analyzer.analyze(standingJoints({ left_shoulder_1_joint: [-0.18, 1.46, 0] }));

      expect(result?.metrics.shoulderAsymmetryCm).toBeCloseTo(4, 8);
      expect(result?.metrics.shoulderTiltDeg).toBeCloseTo(Math.atan2(0.04, 0.36) * RAD2DEG, 8);
      expect(result?.severities.shoulderAsymmetry).toBe("moderate");
    });

    it("should drop factors whose joints are occluded", () => {
      const result = analyzer.analyze(standingJoints({ left_shoulder_1_joint: null }));

      expect(result?.metrics.shoulderAsymmetryCm).toBeNull();
      expect(result?.metrics.shoulderProtractionCm).toBeNull();
      expect(result?.severities.shoulderAsymmetry).toBeUndefined();
      expect(result?.coverage).toBeCloseTo(0.92, 10);
    });
  });

  describe("computeSessionScore", () => {
    it("should score a perfectly upright session at 100", () => {
      expect(analyzer.computeSessionScore([0, 0], [0, 0])).toBe(100);
    });

    it("should weight trunk lean 70/30 against lateral lean", () => {
      expect(analyzer.computeSessionScore([7.5, -7.5], [5, 5])).toBeCloseTo(50, 10);
      expect(analyzer.computeSessionScore([0], [10])).toBeCloseTo(70, 10);
    });

    it("should return 0 without samples", () => {
      expect(analyzer.computeSessionScore([], [])).toBe(0);
    });
  });
});
