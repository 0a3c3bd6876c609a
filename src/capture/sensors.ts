/**
 * Contracts of the sensor services the capture layer drives. Platform code
 * implements these; tests use in-process fakes.
 */

import type { PedometerSnapshot } from "../analysis/DistanceTracker";
import type { JointMap } from "../models/JointName";
import type { MotionSample } from "../models/frames";

interface SensorService {
  readonly isAvailable: boolean;
  start(): void;
  stop(): void;
}

/** Pushes joint positions at up to 60 Hz; joints may be a partial subset. */
export interface BodyTracker extends SensorService {
  onJointFrame: ((joints: JointMap, timestamp: number) => void) | null;
}

/** Pushes inertial samples at a fixed rate, independent of the tracker. */
export interface MotionService extends SensorService {
  onMotionSample: ((sample: MotionSample) => void) | null;
}

/** Periodic cumulative step and distance snapshots. */
export interface PedometerService extends SensorService {
  onSnapshot: ((snapshot: PedometerSnapshot) => void) | null;
}
