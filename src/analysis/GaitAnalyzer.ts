/**
 * Gait Analyzer
 * =============
 *
 * Joint-based heel-strike detection and spatiotemporal gait parameters.
 *
 * A heel strike is the frame whose foot-joint height is the strict minimum of
 * a centred sliding window. Strikes feed:
 * - Cadence over a rolling 10 s window
 * - Stride length (same-foot strike distance) and step length (opposite foot)
 * - Step width (mediolateral foot separation)
 * - Walking speed, stride-time variability, step asymmetry
 * - Stance and double-support percentages from ground-contact time
 *
 * References:
 * - Zeni JA et al., Gait & Posture, 2008 (kinematic event detection)
 * - Hausdorff JM, Hum Mov Sci, 2007 (stride-time variability)
 * - Robinson RO et al., J Manipulative Physiol Ther, 1987 (symmetry index)
 *
 * @module analysis/GaitAnalyzer
 */

import * as THREE from "three";
import { xzDistance } from "../lib/math/geometry";
import { coefficientOfVariation, mean, robinsonSymmetryIndex } from "../lib/math/stats";
import type { StepEvent } from "../models/frames";
import type { JointMap, Side } from "../models/JointName";

// ============================================================================
// INTERFACES
// ============================================================================

export interface GaitMetrics {
  cadenceSPM: number;
  avgStrideLengthM: number;
  walkingSpeedMPS: number;
  /** Step produced on this frame, if any */
  stepDetected: StepEvent | null;
  /** min/max of per-foot mean stride; 1.0 = symmetric */
  symmetryRatio: number | null;
  strideTimeCVPercent: number | null;
  /** Robinson index of left vs right mean step length (%) */
  stepAsymmetryPercent: number | null;
  stanceTimeLeftPercent: number | null;
  stanceTimeRightPercent: number | null;
  doubleSupportPercent: number | null;
  avgStepLengthLeftM: number | null;
  avgStepLengthRightM: number | null;
  /** Width of the latest step; held between strikes */
  stepWidthCm: number | null;
}

export interface GaitAnalyzerConfig {
  /** Frames in the heel-strike window (odd) */
  windowSize: number;
  cadenceWindowSec: number;
  minStrideM: number;
  maxStrideM: number;
  maxStrideSamples: number;
  maxSymmetrySamples: number;
  minSymmetrySamples: number;
  /** Height above strike height still counted as ground contact (m) */
  contactToleranceM: number;
}

const DEFAULT_CONFIG: GaitAnalyzerConfig = {
  windowSize: 15,
  cadenceWindowSec: 10,
  minStrideM: 0.1,
  maxStrideM: 3.0,
  maxStrideSamples: 50,
  maxSymmetrySamples: 20,
  minSymmetrySamples: 3,
  contactToleranceM: 0.02,
};

interface FootSample {
  position: THREE.Vector3;
  timestamp: number;
}

interface FootState {
  window: FootSample[];
  lastStrike: FootSample | null;
  strideLengths: number[];
  strideTimes: number[];
  stepLengths: number[];
  stancePercents: number[];
  contactTime: number;
}

function createFootState(): FootState {
  return {
    window: [],
    lastStrike: null,
    strideLengths: [],
    strideTimes: [],
    stepLengths: [],
    stancePercents: [],
    contactTime: 0,
  };
}

function pushBounded(values: number[], value: number, max: number): void {
  values.push(value);
  if (values.length > max) values.shift();
}

// ============================================================================
// GAIT ANALYZER
// ============================================================================

export class GaitAnalyzer {
  private config: GaitAnalyzerConfig;
  private feet: Record<Side, FootState> = {
    left: createFootState(),
    right: createFootState(),
  };
  private stepTimestamps: number[] = [];
  private strideLengths: number[] = [];
  private stepWidths: number[] = [];
  private sessionStrides = { sum: 0, count: 0 };
  private sessionSteps = { count: 0, first: 0, last: 0 };
  private lastTimestamp: number | null = null;
  private doubleSupportTime = 0;
  private walkingTime = 0;

  constructor(config: Partial<GaitAnalyzerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  reset(): void {
    this.feet = { left: createFootState(), right: createFootState() };
    this.stepTimestamps = [];
    this.strideLengths = [];
    this.stepWidths = [];
    this.sessionStrides = { sum: 0, count: 0 };
    this.sessionSteps = { count: 0, first: 0, last: 0 };
    this.lastTimestamp = null;
    this.doubleSupportTime = 0;
    this.walkingTime = 0;
  }

  /** Step widths (cm) of every strike since the last reset. */
  getStepWidths(): readonly number[] {
    return this.stepWidths;
  }

  /**
   * Feed one body-tracker frame. Returns null when either foot is occluded;
   * the frame is skipped and all history is kept.
   */
  processFrame(joints: JointMap, timestamp: number): GaitMetrics | null {
    const leftFoot = joints.left_foot_joint;
    const rightFoot = joints.right_foot_joint;
    if (!leftFoot || !rightFoot) return null;

    const dt = this.lastTimestamp === null ? 0 : Math.max(0, timestamp - this.lastTimestamp);
    this.lastTimestamp = timestamp;
    this.updateContact(leftFoot, rightFoot, dt);

    const positions: Record<Side, THREE.Vector3> = { left: leftFoot, right: rightFoot };
    let detected: StepEvent | null = null;

    for (const side of ["left", "right"] as const) {
      const foot = this.feet[side];
      foot.window.push({ position: positions[side].clone(), timestamp });
      if (foot.window.length > this.config.windowSize) foot.window.shift();
      if (foot.window.length < this.config.windowSize) continue;

      const step = this.detectStrike(side, positions[side === "left" ? "right" : "left"]);
      if (!step) continue;
      this.stepTimestamps.push(step.timestamp);
      this.countSessionStep(step.timestamp);
      // One step per frame; the first foot wins
      if (!detected) detected = step;
    }

    this.stepTimestamps = this.stepTimestamps.filter(
      (t) => timestamp - t <= this.config.cadenceWindowSec,
    );

    return this.buildMetrics(detected, this.computeCadence(), mean(this.strideLengths));
  }

  /**
   * Whole-session gait: cadence over every strike since the last reset, mean
   * of every accepted stride, mean step width, and the rolling symmetry,
   * variability and stance figures.
   */
  sessionSummary(): GaitMetrics {
    const { count, first, last } = this.sessionSteps;
    const elapsed = last - first;
    const cadenceSPM = count >= 2 && elapsed > 0 ? ((count - 1) / elapsed) * 60 : 0;
    const { sum, count: strides } = this.sessionStrides;
    const metrics = this.buildMetrics(null, cadenceSPM, strides > 0 ? sum / strides : 0);
    return {
      ...metrics,
      stepWidthCm: this.stepWidths.length > 0 ? mean(this.stepWidths) : null,
    };
  }

  private countSessionStep(timestamp: number): void {
    const steps = this.sessionSteps;
    if (steps.count === 0) steps.first = timestamp;
    steps.last = timestamp;
    steps.count++;
  }

  // ==========================================================================
  // STRIKE DETECTION
  // ==========================================================================

  private detectStrike(side: Side, otherFoot: THREE.Vector3): StepEvent | null {
    const foot = this.feet[side];
    const window = foot.window;
    const mid = Math.floor(window.length / 2);
    const midSample = window[mid];
    const midY = midSample.position.y;

    for (let i = 0; i < window.length; i++) {
      if (i !== mid && window[i].position.y <= midY) return null;
    }

    const { position, timestamp } = midSample;

    let strideLengthM: number | null = null;
    if (foot.lastStrike) {
      const stride = xzDistance(position, foot.lastStrike.position);
      if (stride > this.config.minStrideM && stride < this.config.maxStrideM) {
        strideLengthM = stride;
        pushBounded(this.strideLengths, stride, this.config.maxStrideSamples);
        this.sessionStrides.sum += stride;
        this.sessionStrides.count++;
        pushBounded(foot.strideLengths, stride, this.config.maxSymmetrySamples);
      }

      const strideTime = timestamp - foot.lastStrike.timestamp;
      if (strideTime > 0) {
        pushBounded(foot.strideTimes, strideTime, this.config.maxStrideSamples);
        const stance = Math.min(100, (foot.contactTime / strideTime) * 100);
        pushBounded(foot.stancePercents, stance, this.config.maxSymmetrySamples);
      }
    }

    const opposite = this.feet[side === "left" ? "right" : "left"].lastStrike;
    let stepLengthM: number | null = null;
    if (opposite) {
      stepLengthM = xzDistance(position, opposite.position);
      pushBounded(foot.stepLengths, stepLengthM, this.config.maxSymmetrySamples);
    }

    const stepWidthCm = Math.abs(position.x - otherFoot.x) * 100;
    this.stepWidths.push(stepWidthCm);

    // Vertical velocity into the trough and peak lift over the window's first half
    const before = window[mid - 1];
    const impactVelocity =
      midSample.timestamp > before.timestamp
        ? (midSample.position.y - before.position.y) / (midSample.timestamp - before.timestamp)
        : null;
    let peakY = midY;
    for (let i = 0; i < mid; i++) peakY = Math.max(peakY, window[i].position.y);

    foot.lastStrike = { position: position.clone(), timestamp };
    foot.contactTime = 0;

    return {
      timestamp,
      foot: side,
      positionX: position.x,
      positionZ: position.z,
      strideLengthM,
      stepLengthM,
      stepWidthCm,
      impactVelocity,
      footClearanceM: peakY - midY,
      imuConfidence: null,
      lowConfidence: false,
    };
  }

  private updateContact(left: THREE.Vector3, right: THREE.Vector3, dt: number): void {
    const tolerance = this.config.contactToleranceM;
    const contact = (side: Side, position: THREE.Vector3): boolean => {
      const strike = this.feet[side].lastStrike;
      return strike !== null && position.y <= strike.position.y + tolerance;
    };

    const leftContact = contact("left", left);
    const rightContact = contact("right", right);
    if (leftContact) this.feet.left.contactTime += dt;
    if (rightContact) this.feet.right.contactTime += dt;

    if (this.feet.left.lastStrike && this.feet.right.lastStrike) {
      this.walkingTime += dt;
      if (leftContact && rightContact) this.doubleSupportTime += dt;
    }
  }

  // ==========================================================================
  // METRICS
  // ==========================================================================

  private buildMetrics(
    stepDetected: StepEvent | null,
    cadenceSPM: number,
    avgStrideLengthM: number,
  ): GaitMetrics {
    const { left, right } = this.feet;

    const strideTimes = [...left.strideTimes, ...right.strideTimes];
    const minSamples = this.config.minSymmetrySamples;

    const stepAsymmetryPercent =
      left.stepLengths.length >= minSamples && right.stepLengths.length >= minSamples
        ? robinsonSymmetryIndex(mean(left.stepLengths), mean(right.stepLengths))
        : null;

    return {
      cadenceSPM,
      avgStrideLengthM,
      walkingSpeedMPS: (avgStrideLengthM * cadenceSPM) / 120,
      stepDetected,
      symmetryRatio: this.computeSymmetry(),
      strideTimeCVPercent: strideTimes.length >= minSamples ? coefficientOfVariation(strideTimes) : null,
      stepAsymmetryPercent,
      stanceTimeLeftPercent: left.stancePercents.length > 0 ? mean(left.stancePercents) : null,
      stanceTimeRightPercent: right.stancePercents.length > 0 ? mean(right.stancePercents) : null,
      doubleSupportPercent:
        this.walkingTime > 0 ? (this.doubleSupportTime / this.walkingTime) * 100 : null,
      avgStepLengthLeftM: left.stepLengths.length > 0 ? mean(left.stepLengths) : null,
      avgStepLengthRightM: right.stepLengths.length > 0 ? mean(right.stepLengths) : null,
      stepWidthCm:
        this.stepWidths.length > 0 ? this.stepWidths[this.stepWidths.length - 1] : null,
    };
  }

  private computeCadence(): number {
    const times = this.stepTimestamps;
    if (times.length < 2) return 0;
    const elapsed = times[times.length - 1] - times[0];
    return elapsed > 0 ? ((times.length - 1) / elapsed) * 60 : 0;
  }

  private computeSymmetry(): number | null {
    const { left, right } = this.feet;
    const minSamples = this.config.minSymmetrySamples;
    if (left.strideLengths.length < minSamples || right.strideLengths.length < minSamples) {
      return null;
    }
    const avgLeft = mean(left.strideLengths);
    const avgRight = mean(right.strideLengths);
    if (avgLeft <= 0 || avgRight <= 0) return null;
    return Math.min(avgLeft, avgRight) / Math.max(avgLeft, avgRight);
  }
}

export const gaitAnalyzer = new GaitAnalyzer();
