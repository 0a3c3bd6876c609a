/**
 * Time-series record types produced during capture.
 *
 * Timestamps are seconds on the sensor's monotonic clock.
 */

import type { PosturalType } from "../clinical/ClinicalNorms";
import type { JointMap, JointName, Side } from "./JointName";

export type Vec3Tuple = [x: number, y: number, z: number];

/** One body-tracker tick. Joints may be a partial subset when occluded. */
export interface JointFrame {
  joints: JointMap;
  timestamp: number;
}

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

/** One inertial sample from the device motion service. */
export interface MotionSample {
  timestamp: number;
  /** Attitude (rad) */
  roll: number;
  pitch: number;
  yaw: number;
  /** Gravity-removed acceleration (g) */
  userAcceleration: Vec3Like;
  /** Gravity vector (g) */
  gravity: Vec3Like;
  /** Angular rate (rad/s) */
  rotationRate: Vec3Like;
}

export interface StepEvent {
  timestamp: number;
  foot: Side;
  /** Foot position at strike, XZ plane (m) */
  positionX: number;
  positionZ: number;
  strideLengthM: number | null;
  stepLengthM: number | null;
  stepWidthCm: number | null;
  /** Vertical foot velocity just before strike (m/s) */
  impactVelocity: number | null;
  /** Peak foot height above the strike height during the preceding swing (m) */
  footClearanceM: number | null;
  /** IMU validation confidence (0-1), null when no motion data was available */
  imuConfidence: number | null;
  lowConfidence: boolean;
}

/**
 * One recorded instant. Throttled fields carry the analyzer's last value and
 * are null only until that analyzer has produced one.
 */
export interface BodyFrame {
  timestamp: number;
  joints: Partial<Record<JointName, Vec3Tuple>>;

  // Posture
  sagittalTrunkLeanDeg: number | null;
  frontalTrunkLeanDeg: number | null;
  craniovertebralAngleDeg: number | null;
  sagittalVerticalAxisCm: number | null;
  shoulderAsymmetryCm: number | null;
  shoulderTiltDeg: number | null;
  pelvicObliquityDeg: number | null;
  thoracicKyphosisDeg: number | null;
  lumbarLordosisDeg: number | null;
  coronalSpineDeviationCm: number | null;
  headForwardCm: number | null;
  shoulderProtractionCm: number | null;
  posturalType: PosturalType | null;
  nyprScore: number | null;
  postureScore: number | null;

  // Gait
  cadenceSPM: number | null;
  avgStrideLengthM: number | null;
  walkingSpeedMPS: number | null;
  stepWidthCm: number | null;

  // Range of motion
  hipFlexionLeftDeg: number | null;
  hipFlexionRightDeg: number | null;
  kneeFlexionLeftDeg: number | null;
  kneeFlexionRightDeg: number | null;
  pelvicTiltDeg: number | null;
  trunkRotationDeg: number | null;
  armSwingLeftDeg: number | null;
  armSwingRightDeg: number | null;

  // Balance
  swayVelocityMMS: number | null;
  swayAreaCm2: number | null;

  // Ergonomics
  rebaScore: number | null;
}

/** Numeric BodyFrame fields, in declaration order. */
export const BODY_FRAME_METRIC_KEYS = [
  "sagittalTrunkLeanDeg",
  "frontalTrunkLeanDeg",
  "craniovertebralAngleDeg",
  "sagittalVerticalAxisCm",
  "shoulderAsymmetryCm",
  "shoulderTiltDeg",
  "pelvicObliquityDeg",
  "thoracicKyphosisDeg",
  "lumbarLordosisDeg",
  "coronalSpineDeviationCm",
  "headForwardCm",
  "shoulderProtractionCm",
  "nyprScore",
  "postureScore",
  "cadenceSPM",
  "avgStrideLengthM",
  "walkingSpeedMPS",
  "stepWidthCm",
  "hipFlexionLeftDeg",
  "hipFlexionRightDeg",
  "kneeFlexionLeftDeg",
  "kneeFlexionRightDeg",
  "pelvicTiltDeg",
  "trunkRotationDeg",
  "armSwingLeftDeg",
  "armSwingRightDeg",
  "swayVelocityMMS",
  "swayAreaCm2",
  "rebaScore",
] as const satisfies ReadonlyArray<keyof BodyFrame>;

export type BodyFrameMetric = (typeof BODY_FRAME_METRIC_KEYS)[number];

export function createEmptyBodyFrame(timestamp: number): BodyFrame {
  return {
    timestamp,
    joints: {},
    sagittalTrunkLeanDeg: null,
    frontalTrunkLeanDeg: null,
    craniovertebralAngleDeg: null,
    sagittalVerticalAxisCm: null,
    shoulderAsymmetryCm: null,
    shoulderTiltDeg: null,
    pelvicObliquityDeg: null,
    thoracicKyphosisDeg: null,
    lumbarLordosisDeg: null,
    coronalSpineDeviationCm: null,
    headForwardCm: null,
    shoulderProtractionCm: null,
    posturalType: null,
    nyprScore: null,
    postureScore: null,
    cadenceSPM: null,
    avgStrideLengthM: null,
    walkingSpeedMPS: null,
    stepWidthCm: null,
    hipFlexionLeftDeg: null,
    hipFlexionRightDeg: null,
    kneeFlexionLeftDeg: null,
    kneeFlexionRightDeg: null,
    pelvicTiltDeg: null,
    trunkRotationDeg: null,
    armSwingLeftDeg: null,
    armSwingRightDeg: null,
    swayVelocityMMS: null,
    swayAreaCm2: null,
    rebaScore: null,
  };
}
