/**
 * Balance Analyzer
 * ================
 *
 * Centre-of-mass proxy posturography from the tracker root position.
 *
 * ## Metrics (5 s rolling window)
 * - Sway velocity (XZ path length / time)
 * - 95% confidence ellipse area (PCA of the covariance matrix)
 * - AP / ML ranges and their ratio
 * - Mean sway distance from the centroid
 *
 * ## Protocols
 * - Standing detection (root speed over ~1.5 s)
 * - Romberg: eyes-open then eyes-closed phases
 *
 * References:
 * - Prieto TE et al., IEEE Trans BME, 1996 (sway metrics)
 * - Piirtola M & Era P, Gerontology, 2006 (fall-risk thresholds)
 * - Agrawal Y et al., Otol Neurotol, 2011 (Romberg area ratio)
 *
 * @module analysis/BalanceAnalyzer
 */

import type * as THREE from "three";
import { xzDistance } from "../lib/math/geometry";
import { mean } from "../lib/math/stats";

// ============================================================================
// INTERFACES
// ============================================================================

export interface BalanceMetrics {
  swayVelocityMMS: number; // mm/s
  swayAreaCm2: number; // cm²
  apRangeMM: number; // mm
  mlRangeMM: number; // mm
  /** AP/ML range ratio; 1 when ML range is negligible */
  apMlRatio: number;
  meanSwayDistanceMM: number; // mm
}

export interface RombergResult {
  eyesOpenSwayVelocity: number;
  eyesClosedSwayVelocity: number;
  /** EC/EO sway velocity; > 2.0 suggests a sensory deficit */
  ratio: number;
  /** EC/EO sway area */
  areaRatio: number;
}

export type RombergPhase = "none" | "eyesOpen" | "eyesClosed";

export interface BalanceAnalyzerConfig {
  swayWindowSec: number;
  minSamples: number;
  /** Root speed below which the subject counts as standing (m/s) */
  standingSpeedThreshold: number;
  standingWindowSamples: number;
  standingMinSamples: number;
  standingMinSpanSec: number;
}

const DEFAULT_CONFIG: BalanceAnalyzerConfig = {
  swayWindowSec: 5.0,
  minSamples: 15,
  standingSpeedThreshold: 0.15,
  standingWindowSamples: 45,
  standingMinSamples: 10,
  standingMinSpanSec: 0.5,
};

/** χ²(2 dof, 95%) */
const CHI2_95 = 5.991;

export interface TimedPosition {
  x: number;
  z: number;
  timestamp: number;
}

const EMPTY_METRICS: BalanceMetrics = {
  swayVelocityMMS: 0,
  swayAreaCm2: 0,
  apRangeMM: 0,
  mlRangeMM: 0,
  apMlRatio: 1,
  meanSwayDistanceMM: 0,
};

// ============================================================================
// BALANCE ANALYZER
// ============================================================================

export class BalanceAnalyzer {
  private config: BalanceAnalyzerConfig;
  private positions: TimedPosition[] = [];
  private standing = false;
  private rombergPhase: RombergPhase = "none";
  private eyesOpen: TimedPosition[] = [];
  private eyesClosed: TimedPosition[] = [];

  constructor(config: Partial<BalanceAnalyzerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get isStanding(): boolean {
    return this.standing;
  }

  get phase(): RombergPhase {
    return this.rombergPhase;
  }

  processFrame(rootPosition: THREE.Vector3, timestamp: number): BalanceMetrics {
    const timed: TimedPosition = { x: rootPosition.x, z: rootPosition.z, timestamp };
    this.positions.push(timed);
    this.positions = this.positions.filter(
      (p) => timestamp - p.timestamp <= this.config.swayWindowSec,
    );

    if (this.rombergPhase === "eyesOpen") this.eyesOpen.push(timed);
    else if (this.rombergPhase === "eyesClosed") this.eyesClosed.push(timed);

    this.updateStanding();

    if (this.positions.length < this.config.minSamples) return { ...EMPTY_METRICS };
    return computeBalanceMetrics(this.positions);
  }

  startRombergEyesOpen(): void {
    this.rombergPhase = "eyesOpen";
    this.eyesOpen = [];
    this.eyesClosed = [];
  }

  startRombergEyesClosed(): void {
    this.rombergPhase = "eyesClosed";
    this.eyesClosed = [];
  }

  completeRomberg(): RombergResult | null {
    this.rombergPhase = "none";
    if (
      this.eyesOpen.length < this.config.minSamples ||
      this.eyesClosed.length < this.config.minSamples
    ) {
      return null;
    }

    const eo = computeBalanceMetrics(this.eyesOpen);
    const ec = computeBalanceMetrics(this.eyesClosed);

    return {
      eyesOpenSwayVelocity: eo.swayVelocityMMS,
      eyesClosedSwayVelocity: ec.swayVelocityMMS,
      ratio: eo.swayVelocityMMS > 0.1 ? ec.swayVelocityMMS / eo.swayVelocityMMS : 1,
      areaRatio: eo.swayAreaCm2 > 0.01 ? ec.swayAreaCm2 / eo.swayAreaCm2 : 1,
    };
  }

  reset(): void {
    this.positions = [];
    this.standing = false;
    this.rombergPhase = "none";
    this.eyesOpen = [];
    this.eyesClosed = [];
  }

  private updateStanding(): void {
    const { standingMinSamples, standingWindowSamples, standingMinSpanSec } = this.config;
    if (this.positions.length < standingMinSamples) {
      this.standing = false;
      return;
    }
    const recent = this.positions.slice(-standingWindowSamples);
    const first = recent[0];
    const last = recent[recent.length - 1];
    const dt = last.timestamp - first.timestamp;
    if (dt <= standingMinSpanSec) {
      this.standing = false;
      return;
    }
    this.standing = xzDistance(first, last) / dt < this.config.standingSpeedThreshold;
  }
}

// ============================================================================
// METRICS
// ============================================================================

export function computeBalanceMetrics(samples: readonly TimedPosition[]): BalanceMetrics {
  if (samples.length < 2) return { ...EMPTY_METRICS };

  const xs = samples.map((s) => s.x * 1000); // mm, ML
  const zs = samples.map((s) => s.z * 1000); // mm, AP
  const cx = mean(xs);
  const cz = mean(zs);
  const centeredX = xs.map((x) => x - cx);
  const centeredZ = zs.map((z) => z - cz);

  const apRange = Math.max(...centeredZ) - Math.min(...centeredZ);
  const mlRange = Math.max(...centeredX) - Math.min(...centeredX);

  let pathLength = 0;
  for (let i = 1; i < samples.length; i++) {
    pathLength += Math.hypot(xs[i] - xs[i - 1], zs[i] - zs[i - 1]);
  }
  const totalTime = samples[samples.length - 1].timestamp - samples[0].timestamp;

  return {
    swayVelocityMMS: totalTime > 0 ? pathLength / totalTime : 0,
    swayAreaCm2: ellipseArea95(centeredX, centeredZ) / 100, // mm² → cm²
    apRangeMM: apRange,
    mlRangeMM: mlRange,
    apMlRatio: mlRange > 0.1 ? apRange / mlRange : 1,
    meanSwayDistanceMM: mean(centeredX.map((x, i) => Math.hypot(x, centeredZ[i]))),
  };
}

/** π·χ²·√(λ1·λ2) from the sample covariance of centred XZ positions (mm²). */
function ellipseArea95(xs: readonly number[], zs: readonly number[]): number {
  const n = xs.length;
  if (n < 3) return 0;

  let sxx = 0;
  let szz = 0;
  let sxz = 0;
  for (let i = 0; i < n; i++) {
    sxx += xs[i] * xs[i];
    szz += zs[i] * zs[i];
    sxz += xs[i] * zs[i];
  }
  sxx /= n - 1;
  szz /= n - 1;
  sxz /= n - 1;

  const trace = sxx + szz;
  const det = sxx * szz - sxz * sxz;
  const sqrtDisc = Math.sqrt(Math.max(0, (trace * trace) / 4 - det));
  const lambda1 = trace / 2 + sqrtDisc;
  const lambda2 = trace / 2 - sqrtDisc;
  if (lambda1 <= 0 || lambda2 <= 0) return 0;

  return Math.PI * CHI2_95 * Math.sqrt(lambda1 * lambda2);
}

export const balanceAnalyzer = new BalanceAnalyzer();
