/**
 * Distance Tracker
 * ================
 *
 * Best-available walked distance for a session.
 *
 * Sources, highest priority first:
 * 1. Pedometer: sensor-fused cumulative distance
 * 2. Body tracking: XZ path length of the root joint
 * 3. Step estimate: step count × step length
 */

import type { DistanceSource } from "../models/session";

// ============================================================================
// TYPES
// ============================================================================

export interface PedometerSnapshot {
  /** Wall clock (ms) */
  timestamp: number;
  /** Steps since the pedometer started */
  stepCount: number;
  distanceM: number | null;
  cadenceSPM: number | null;
  floorsAscended: number | null;
  floorsDescended: number | null;
}

export interface DistanceEstimate {
  distanceM: number;
  source: DistanceSource;
}

export interface DistanceTrackerConfig {
  /** Root movement below this is tracking jitter (m) */
  minSegmentM: number;
  /** Root jumps above this are tracking resets, not walking (m) */
  maxSegmentM: number;
  /** Step length when none was measured (m) */
  defaultStepLengthM: number;
}

const DEFAULT_CONFIG: DistanceTrackerConfig = {
  minSegmentM: 0.05,
  maxSegmentM: 2.0,
  defaultStepLengthM: 0.65,
};

// ============================================================================
// DISTANCE TRACKER CLASS
// ============================================================================

export class DistanceTracker {
  private config: DistanceTrackerConfig;
  private anchor: { x: number; z: number } | null = null;
  private rootDistanceM = 0;
  private pedometer: PedometerSnapshot | null = null;

  constructor(config: Partial<DistanceTrackerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get bodyTrackingDistanceM(): number {
    return this.rootDistanceM;
  }

  get latestPedometer(): PedometerSnapshot | null {
    return this.pedometer;
  }

  /**
   * Accumulate root travel. Distance is measured from the last accepted
   * anchor so slow walking still adds up across frames.
   */
  addRootPosition(x: number, z: number): void {
    if (!this.anchor) {
      this.anchor = { x, z };
      return;
    }
    const dist = Math.hypot(x - this.anchor.x, z - this.anchor.z);
    if (dist < this.config.minSegmentM) return;
    if (dist <= this.config.maxSegmentM) this.rootDistanceM += dist;
    this.anchor = { x, z };
  }

  updatePedometer(snapshot: PedometerSnapshot): void {
    this.pedometer = snapshot;
  }

  /**
   * @param stepCount Steps seen by body tracking
   * @param avgStrideLengthM Measured stride; one step is half a stride
   */
  estimate(stepCount: number, avgStrideLengthM: number | null): DistanceEstimate {
    const pedometerDistance = this.pedometer?.distanceM ?? 0;
    if (pedometerDistance > 0) return { distanceM: pedometerDistance, source: "pedometer" };
    if (this.rootDistanceM > 0) return { distanceM: this.rootDistanceM, source: "bodyTracking" };

    const steps = Math.max(stepCount, this.pedometer?.stepCount ?? 0);
    const stepLength =
      avgStrideLengthM !== null && avgStrideLengthM > 0
        ? avgStrideLengthM / 2
        : this.config.defaultStepLengthM;
    return { distanceM: steps * stepLength, source: "stepEstimate" };
  }

  reset(): void {
    this.anchor = null;
    this.rootDistanceM = 0;
    this.pedometer = null;
  }
}
