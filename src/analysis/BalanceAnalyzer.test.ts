import * as THREE from "three";
import { beforeEach, describe, expect, it } from "vitest";
import { SyntheticSkeleton } from "../utils/SyntheticSkeleton";
import { BalanceAnalyzer, computeBalanceMetrics, type BalanceMetrics } from "./BalanceAnalyzer";

function feed(analyzer: BalanceAnalyzer, radiusM: number, durationSec: number, offsetSec = 0) {
  let metrics: BalanceMetrics | null = null;
  for (const frame of new SyntheticSkeleton().standing(durationSec, radiusM, 0.5)) {
    const root = frame.joints.root ?? new THREE.Vector3();
    metrics = analyzer.processFrame(root, frame.timestamp + offsetSec);
  }
  return metrics;
}

describe("computeBalanceMetrics", () => {
  it("should measure a straight AP drift", () => {
    const metrics = computeBalanceMetrics([
      { x: 0, z: 0, timestamp: 0 },
      { x: 0, z: 0.01, timestamp: 1 },
      { x: 0, z: 0.02, timestamp: 2 },
    ]);

    expect(metrics.swayVelocityMMS).toBeCloseTo(10, 8);
    expect(metrics.apRangeMM).toBeCloseTo(20, 8);
    expect(metrics.mlRangeMM).toBe(0);
    expect(metrics.apMlRatio).toBe(1);
    expect(metrics.swayAreaCm2).toBe(0);
    expect(metrics.meanSwayDistanceMM).toBeCloseTo(20 / 3, 8);
  });

  it("should return empty metrics for a single sample", () => {
    expect(computeBalanceMetrics([{ x: 0, z: 0, timestamp: 0 }]).swayVelocityMMS).toBe(0);
  });
});

describe("BalanceAnalyzer", () => {
  let analyzer: BalanceAnalyzer;

  beforeEach(() => {
    analyzer = new BalanceAnalyzer();
  });

  it("should wait for enough samples", () => {
    const root = new THREE.Vector3(0, 1, 0);
    for (let i = 0; i < 14; i++) {
      expect(analyzer.processFrame(root, i / 60).swayVelocityMMS).toBe(0);
    }
  });

  it("should measure circular sway", () => {
    const metrics = feed(analyzer, 0.01, 5);

    // 2πrf = 10π mm/s
    expect(metrics?.swayVelocityMMS).toBeCloseTo(10 * Math.PI, 1);
    expect(metrics?.apRangeMM).toBeCloseTo(20, 0);
    expect(metrics?.mlRangeMM).toBeCloseTo(20, 0);
    expect(metrics?.swayAreaCm2).toBeGreaterThan(0);
    expect(analyzer.isStanding).toBe(true);
  });

  it("should not count walking as standing", () => {
    for (const frame of new SyntheticSkeleton().walking().slice(0, 120)) {
      const root = frame.joints.root ?? new THREE.Vector3();
      analyzer.processFrame(root, frame.timestamp);
    }
    expect(analyzer.isStanding).toBe(false);
  });

  describe("Romberg", () => {
    it("should compare eyes-closed sway against eyes-open", () => {
      analyzer.startRombergEyesOpen();
      feed(analyzer, 0.005, 2);
      analyzer.startRombergEyesClosed();
      feed(analyzer, 0.01, 2, 2);

      const result = analyzer.completeRomberg();

      expect(result?.ratio).toBeCloseTo(2, 6);
      expect(result?.areaRatio).toBeCloseTo(4, 6);
      expect(analyzer.phase).toBe("none");
    });

    it("should return null without both phases", () => {
      analyzer.startRombergEyesOpen();
      feed(analyzer, 0.005, 2);
      expect(analyzer.completeRomberg()).toBeNull();
    });
  });
});
