/**
 * Trunk Motion Analyzer
 *
 * Trunk rotation, lateral flexion and turning from the device gyroscope and
 * attitude:
 * - Peak yaw velocity and mean yaw excursion over 1 s windows
 * - Turn detection (≥ 45° yaw change within 3 s)
 * - Left/right rotation-rate asymmetry
 * - Gait regularity from the yaw-rate autocorrelation at stride lag
 *
 * References:
 * - El-Gohary M et al., Sensors, 2013
 * - Mancini M et al., J Biomech, 2015
 */

import { peakAutocorrelation } from "../lib/signal/SignalProcessor";
import { mean } from "../lib/math/stats";
import type { MotionSample } from "../models/frames";

export interface TrunkMotionMetrics {
  peakRotationVelocityDPS: number;
  averageRotationRangeDeg: number;
  turnCount: number;
  averageTurnDurationSec: number;
  /** |L − R| / max × 100 of mean yaw rates; normal < 15 % */
  rotationAsymmetryPercent: number;
  averageLateralFlexionDeg: number;
  /** 0–1, closer to 1 = more periodic */
  movementRegularityIndex: number;
}

export interface TurnEvent {
  startTime: number;
  endTime: number;
  /** rad, + = left */
  yawChange: number;
}

export interface TrunkMotionConfig {
  turnThresholdRad: number;
  maxTurnDurationSec: number;
  /** Minimum gap between the end of one turn and the start of the next (s) */
  turnSeparationSec: number;
  maxSamples: number;
  minSamples: number;
  /** Samples per excursion window (≈1 s) */
  rangeWindow: number;
  regularityMinLag: number;
  regularityMaxLag: number;
  sampleRateHz: number;
}

const DEFAULT_CONFIG: TrunkMotionConfig = {
  turnThresholdRad: Math.PI / 4,
  maxTurnDurationSec: 3,
  turnSeparationSec: 1,
  maxSamples: 3600, // 60 s at 60 Hz
  minSamples: 30,
  rangeWindow: 60,
  regularityMinLag: 50,
  regularityMaxLag: 70,
  sampleRateHz: 60,
};

const RAD_TO_DEG = 180 / Math.PI;

/** Yaw-rate dead band for the asymmetry split (rad/s) */
const ROTATION_DEAD_BAND = 0.1;

const EMPTY_METRICS: TrunkMotionMetrics = {
  peakRotationVelocityDPS: 0,
  averageRotationRangeDeg: 0,
  turnCount: 0,
  averageTurnDurationSec: 0,
  rotationAsymmetryPercent: 0,
  averageLateralFlexionDeg: 0,
  movementRegularityIndex: 0,
};

function wrapAngle(rad: number): number {
  let a = rad;
  while (a > Math.PI) a -= 2 * Math.PI;
  while (a < -Math.PI) a += 2 * Math.PI;
  return a;
}

export class TrunkMotionAnalyzer {
  private config: TrunkMotionConfig;
  private samples: MotionSample[] = [];
  private turns: TurnEvent[] = [];

  constructor(config: Partial<TrunkMotionConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get detectedTurns(): readonly TurnEvent[] {
    return this.turns;
  }

  processSample(sample: MotionSample): void {
    this.samples.push(sample);
    if (this.samples.length > this.config.maxSamples) {
      this.samples.splice(0, this.samples.length - this.config.maxSamples);
    }
    this.detectTurn();
  }

  analyze(): TrunkMotionMetrics {
    if (this.samples.length < this.config.minSamples) return { ...EMPTY_METRICS };

    const yawRates = this.samples.map((s) => s.rotationRate.y);
    const turnDurations = this.turns.map((t) => t.endTime - t.startTime);

    return {
      peakRotationVelocityDPS: Math.max(...yawRates.map((r) => Math.abs(r) * RAD_TO_DEG)),
      averageRotationRangeDeg: this.rotationRange(),
      turnCount: this.turns.length,
      averageTurnDurationSec: mean(turnDurations),
      rotationAsymmetryPercent: rotationAsymmetry(yawRates),
      averageLateralFlexionDeg: mean(this.samples.map((s) => Math.abs(s.roll) * RAD_TO_DEG)),
      movementRegularityIndex:
        this.samples.length >= 2 * this.config.sampleRateHz
          ? peakAutocorrelation(yawRates, this.config.regularityMinLag, this.config.regularityMaxLag)
          : 0,
    };
  }

  reset(): void {
    this.samples = [];
    this.turns = [];
  }

  private detectTurn(): void {
    if (this.samples.length < 10) return;
    const { maxTurnDurationSec, sampleRateHz, turnThresholdRad, turnSeparationSec } = this.config;

    const lookback = Math.min(this.samples.length, Math.round(maxTurnDurationSec * sampleRateHz));
    const first = this.samples[this.samples.length - lookback];
    const last = this.samples[this.samples.length - 1];
    const yawChange = wrapAngle(last.yaw - first.yaw);
    const duration = last.timestamp - first.timestamp;

    if (Math.abs(yawChange) < turnThresholdRad || duration > maxTurnDurationSec) return;

    const previous = this.turns[this.turns.length - 1];
    if (previous && first.timestamp <= previous.endTime + turnSeparationSec) return;

    this.turns.push({ startTime: first.timestamp, endTime: last.timestamp, yawChange });
  }

  /** Mean yaw excursion over half-overlapping ~1 s windows (deg). */
  private rotationRange(): number {
    const w = this.config.rangeWindow;
    if (this.samples.length < w) return 0;
    const hop = Math.max(1, Math.floor(w / 2));
    const ranges: number[] = [];
    for (let i = 0; i < this.samples.length - w; i += hop) {
      const yaws = this.samples.slice(i, i + w).map((s) => s.yaw);
      let span = Math.max(...yaws) - Math.min(...yaws);
      if (span > Math.PI) span = 2 * Math.PI - span; // wrap-around
      ranges.push(span * RAD_TO_DEG);
    }
    return mean(ranges);
  }
}

function rotationAsymmetry(yawRates: readonly number[]): number {
  const left = yawRates.filter((r) => r > ROTATION_DEAD_BAND).map((r) => r * RAD_TO_DEG);
  const right = yawRates.filter((r) => r < -ROTATION_DEAD_BAND).map((r) => -r * RAD_TO_DEG);
  if (left.length === 0 || right.length === 0) return 0;
  const avgLeft = mean(left);
  const avgRight = mean(right);
  const max = Math.max(avgLeft, avgRight);
  return max > 0 ? (Math.abs(avgLeft - avgRight) / max) * 100 : 0;
}

export const trunkMotionAnalyzer = new TrunkMotionAnalyzer();
