/**
 * Live Metrics
 *
 * Sole owner of the "last value" cells the orchestrator writes each tick.
 * Throttled analyzers update their cell only when they run, so every
 * recorded BodyFrame carries the latest value of every metric. Readers get
 * a frozen snapshot, never the live cells.
 */

import type { BalanceMetrics } from "../analysis/BalanceAnalyzer";
import type { PedometerSnapshot } from "../analysis/DistanceTracker";
import type { REBAResult } from "../analysis/ErgonomicScorer";
import type { GaitMetrics } from "../analysis/GaitAnalyzer";
import type { PostureAssessment, PostureMetrics } from "../analysis/PostureAnalyzer";
import { ROM_KEYS, type ROMMetrics } from "../analysis/ROMAnalyzer";
import { JOINT_NAMES, type JointMap, type JointName } from "../models/JointName";
import type { BodyFrame, Vec3Tuple } from "../models/frames";

export interface ImuLiveMetrics {
  cadenceSPM: number;
  stepCount: number;
}

export interface LiveMetricsSnapshot {
  frameIndex: number;
  posture: PostureAssessment | null;
  gait: GaitMetrics | null;
  rom: ROMMetrics | null;
  balance: BalanceMetrics | null;
  isStanding: boolean;
  reba: REBAResult | null;
  imu: ImuLiveMetrics;
  pedometer: PedometerSnapshot | null;
  /** Steps recorded from body tracking */
  stepCount: number;
}

/** Posture metrics that need joints beyond the core trunk chain. */
const OCCLUDABLE_POSTURE_KEYS = [
  "shoulderAsymmetryCm",
  "shoulderTiltDeg",
  "pelvicObliquityDeg",
  "thoracicKyphosisDeg",
  "lumbarLordosisDeg",
  "coronalSpineDeviationCm",
  "headForwardCm",
  "shoulderProtractionCm",
  "kneeAlignmentDeg",
] as const satisfies ReadonlyArray<keyof PostureMetrics>;

function emptyCells(): LiveMetricsSnapshot {
  return {
    frameIndex: 0,
    posture: null,
    gait: null,
    rom: null,
    balance: null,
    isStanding: false,
    reba: null,
    imu: { cadenceSPM: 0, stepCount: 0 },
    pedometer: null,
    stepCount: 0,
  };
}

export function serializeJoints(joints: JointMap): Partial<Record<JointName, Vec3Tuple>> {
  const out: Partial<Record<JointName, Vec3Tuple>> = {};
  for (const name of JOINT_NAMES) {
    const p = joints[name];
    if (p) out[name] = [p.x, p.y, p.z];
  }
  return out;
}

export class LiveMetrics {
  private cells: LiveMetricsSnapshot = emptyCells();

  setFrameIndex(value: number): void {
    this.cells.frameIndex = value;
  }

  /**
   * Sub-metrics occluded this tick keep their last value; the score and
   * grading stay as computed from this tick's joints.
   */
  setPosture(posture: PostureAssessment): void {
    const previous = this.cells.posture;
    if (!previous) {
      this.cells.posture = posture;
      return;
    }
    const metrics: PostureMetrics = { ...posture.metrics };
    for (const key of OCCLUDABLE_POSTURE_KEYS) {
      if (metrics[key] === null) metrics[key] = previous.metrics[key];
    }
    this.cells.posture = {
      ...posture,
      metrics,
      posturalType: posture.posturalType ?? previous.posturalType,
    };
  }

  setGait(gait: GaitMetrics): void {
    this.cells.gait = gait;
  }

  /** Angles whose joints were occluded this tick keep their last value. */
  setROM(rom: ROMMetrics): void {
    const previous = this.cells.rom;
    if (!previous) {
      this.cells.rom = rom;
      return;
    }
    const merged: ROMMetrics = { ...rom };
    for (const key of ROM_KEYS) {
      if (merged[key] === null) merged[key] = previous[key];
    }
    this.cells.rom = merged;
  }

  setBalance(balance: BalanceMetrics, isStanding: boolean): void {
    this.cells.balance = balance;
    this.cells.isStanding = isStanding;
  }

  setREBA(reba: REBAResult): void {
    this.cells.reba = reba;
  }

  setImu(imu: ImuLiveMetrics): void {
    this.cells.imu = { ...imu };
  }

  setPedometer(snapshot: PedometerSnapshot): void {
    this.cells.pedometer = snapshot;
  }

  setStepCount(count: number): void {
    this.cells.stepCount = count;
  }

  get postureScore(): number | null {
    return this.cells.posture?.score ?? null;
  }

  get gait(): GaitMetrics | null {
    return this.cells.gait;
  }

  snapshot(): Readonly<LiveMetricsSnapshot> {
    return Object.freeze({ ...this.cells, imu: { ...this.cells.imu } });
  }

  /** One recorded instant built from the current cells. */
  toBodyFrame(timestamp: number, joints: JointMap): BodyFrame {
    const { posture, gait, rom, balance, reba } = this.cells;
    const m = posture?.metrics;

    return {
      timestamp,
      joints: serializeJoints(joints),

      sagittalTrunkLeanDeg: m?.sagittalTrunkLeanDeg ?? null,
      frontalTrunkLeanDeg: m?.frontalTrunkLeanDeg ?? null,
      craniovertebralAngleDeg: m?.craniovertebralAngleDeg ?? null,
      sagittalVerticalAxisCm: m?.sagittalVerticalAxisCm ?? null,
      shoulderAsymmetryCm: m?.shoulderAsymmetryCm ?? null,
      shoulderTiltDeg: m?.shoulderTiltDeg ?? null,
      pelvicObliquityDeg: m?.pelvicObliquityDeg ?? null,
      thoracicKyphosisDeg: m?.thoracicKyphosisDeg ?? null,
      lumbarLordosisDeg: m?.lumbarLordosisDeg ?? null,
      coronalSpineDeviationCm: m?.coronalSpineDeviationCm ?? null,
      headForwardCm: m?.headForwardCm ?? null,
      shoulderProtractionCm: m?.shoulderProtractionCm ?? null,
      posturalType: posture?.posturalType ?? null,
      nyprScore: posture?.nypr.score ?? null,
      postureScore: posture?.score ?? null,

      cadenceSPM: gait?.cadenceSPM ?? null,
      avgStrideLengthM: gait?.avgStrideLengthM ?? null,
      walkingSpeedMPS: gait?.walkingSpeedMPS ?? null,
      stepWidthCm: gait?.stepWidthCm ?? null,

      hipFlexionLeftDeg: rom?.hipFlexionLeftDeg ?? null,
      hipFlexionRightDeg: rom?.hipFlexionRightDeg ?? null,
      kneeFlexionLeftDeg: rom?.kneeFlexionLeftDeg ?? null,
      kneeFlexionRightDeg: rom?.kneeFlexionRightDeg ?? null,
      pelvicTiltDeg: rom?.pelvicTiltDeg ?? null,
      trunkRotationDeg: rom?.trunkRotationDeg ?? null,
      armSwingLeftDeg: rom?.armSwingLeftDeg ?? null,
      armSwingRightDeg: rom?.armSwingRightDeg ?? null,

      swayVelocityMMS: balance?.swayVelocityMMS ?? null,
      swayAreaCm2: balance?.swayAreaCm2 ?? null,

      rebaScore: reba?.score ?? null,
    };
  }

  reset(): void {
    this.cells = emptyCells();
  }
}
