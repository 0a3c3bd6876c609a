/**
 * Range-of-Motion Analyzer
 *
 * Sagittal hip and knee flexion, pelvic tilt, transverse trunk rotation and
 * arm swing from joint positions, plus per-session excursion ranges.
 *
 * References:
 * - Perry J & Burnfield JM, Gait Analysis, 2010
 * - Meyns P et al., Gait & Posture, 2013 (arm swing)
 */

import * as THREE from "three";
import { GAIT_ROM_LIMITS } from "../clinical/ClinicalNorms";
import {
  sagittalAngleFromDownDeg,
  sagittalAngleFromVerticalDeg,
  signedAngle2D,
  threePointAngleDeg,
} from "../lib/math/geometry";
import { range } from "../lib/math/stats";
import type { JointMap } from "../models/JointName";

// ============================================================================
// TYPES
// ============================================================================

/** Joint angles for one frame (deg); null when a required joint is missing. */
export interface ROMMetrics {
  hipFlexionLeftDeg: number | null;
  hipFlexionRightDeg: number | null;
  kneeFlexionLeftDeg: number | null;
  kneeFlexionRightDeg: number | null;
  pelvicTiltDeg: number | null;
  trunkRotationDeg: number | null;
  armSwingLeftDeg: number | null;
  armSwingRightDeg: number | null;
}

export interface ROMSessionSummary {
  hipROMLeftDeg: number;
  hipROMRightDeg: number;
  kneeROMLeftDeg: number;
  kneeROMRightDeg: number;
  trunkRotationRangeDeg: number;
  pelvicTiltRangeDeg: number;
  armSwingLeftRangeDeg: number;
  armSwingRightRangeDeg: number;
  armSwingAsymmetryPercent: number;
}

export type ROMKey = keyof ROMMetrics;

export const ROM_KEYS: readonly ROMKey[] = [
  "hipFlexionLeftDeg",
  "hipFlexionRightDeg",
  "kneeFlexionLeftDeg",
  "kneeFlexionRightDeg",
  "pelvicTiltDeg",
  "trunkRotationDeg",
  "armSwingLeftDeg",
  "armSwingRightDeg",
];

// ============================================================================
// ANGLES
// ============================================================================

function sagittal(v: THREE.Vector3): THREE.Vector2 {
  return new THREE.Vector2(v.z, v.y);
}

/** Thigh angle from the trunk's downward axis; + = flexion. */
function hipFlexion(
  spine?: THREE.Vector3,
  hip?: THREE.Vector3,
  knee?: THREE.Vector3,
): number | null {
  if (!spine || !hip || !knee) return null;
  const trunkDown = hip.clone().sub(spine);
  const thigh = knee.clone().sub(hip);
  return signedAngle2D(sagittal(trunkDown), sagittal(thigh));
}

function kneeFlexion(
  hip?: THREE.Vector3,
  knee?: THREE.Vector3,
  ankle?: THREE.Vector3,
): number | null {
  if (!hip || !knee || !ankle) return null;
  return 180 - threePointAngleDeg(hip, knee, ankle);
}

function pelvicTilt(root?: THREE.Vector3, spine1?: THREE.Vector3): number | null {
  if (!root || !spine1) return null;
  return sagittalAngleFromVerticalDeg(spine1.clone().sub(root));
}

/** Transverse-plane angle between the shoulder line and the pelvis line. */
function trunkRotation(
  leftShoulder?: THREE.Vector3,
  rightShoulder?: THREE.Vector3,
  leftHip?: THREE.Vector3,
  rightHip?: THREE.Vector3,
): number | null {
  if (!leftShoulder || !rightShoulder || !leftHip || !rightHip) return null;
  const shoulderLine = new THREE.Vector2(
    rightShoulder.x - leftShoulder.x,
    rightShoulder.z - leftShoulder.z,
  );
  const pelvisLine = new THREE.Vector2(rightHip.x - leftHip.x, rightHip.z - leftHip.z);
  return signedAngle2D(shoulderLine, pelvisLine);
}

function armSwing(shoulder?: THREE.Vector3, elbow?: THREE.Vector3): number | null {
  if (!shoulder || !elbow) return null;
  return sagittalAngleFromDownDeg(elbow.clone().sub(shoulder));
}

// ============================================================================
// ROM ANALYZER
// ============================================================================

export class ROMAnalyzer {
  private history: Record<ROMKey, number[]> = createHistory();

  analyze(joints: JointMap): ROMMetrics {
    return {
      hipFlexionLeftDeg: hipFlexion(joints.spine_1_joint, joints.left_upLeg_joint, joints.left_leg_joint),
      hipFlexionRightDeg: hipFlexion(joints.spine_1_joint, joints.right_upLeg_joint, joints.right_leg_joint),
      kneeFlexionLeftDeg: kneeFlexion(joints.left_upLeg_joint, joints.left_leg_joint, joints.left_foot_joint),
      kneeFlexionRightDeg: kneeFlexion(joints.right_upLeg_joint, joints.right_leg_joint, joints.right_foot_joint),
      pelvicTiltDeg: pelvicTilt(joints.root, joints.spine_1_joint),
      trunkRotationDeg: trunkRotation(
        joints.left_shoulder_1_joint,
        joints.right_shoulder_1_joint,
        joints.left_upLeg_joint,
        joints.right_upLeg_joint,
      ),
      armSwingLeftDeg: armSwing(joints.left_arm_joint, joints.left_forearm_joint),
      armSwingRightDeg: armSwing(joints.right_arm_joint, joints.right_forearm_joint),
    };
  }

  recordFrame(metrics: ROMMetrics): void {
    for (const key of ROM_KEYS) {
      const value = metrics[key];
      if (value !== null) this.history[key].push(value);
    }
  }

  sessionSummary(): ROMSessionSummary {
    const armLeft = range(this.history.armSwingLeftDeg);
    const armRight = range(this.history.armSwingRightDeg);
    const meanArm = 0.5 * (armLeft + armRight);

    return {
      hipROMLeftDeg: range(this.history.hipFlexionLeftDeg),
      hipROMRightDeg: range(this.history.hipFlexionRightDeg),
      kneeROMLeftDeg: range(this.history.kneeFlexionLeftDeg),
      kneeROMRightDeg: range(this.history.kneeFlexionRightDeg),
      trunkRotationRangeDeg: range(this.history.trunkRotationDeg),
      pelvicTiltRangeDeg: range(this.history.pelvicTiltDeg),
      armSwingLeftRangeDeg: armLeft,
      armSwingRightRangeDeg: armRight,
      armSwingAsymmetryPercent: meanArm > 0.1 ? (Math.abs(armLeft - armRight) / meanArm) * 100 : 0,
    };
  }

  reset(): void {
    this.history = createHistory();
  }
}

function createHistory(): Record<ROMKey, number[]> {
  return {
    hipFlexionLeftDeg: [],
    hipFlexionRightDeg: [],
    kneeFlexionLeftDeg: [],
    kneeFlexionRightDeg: [],
    pelvicTiltDeg: [],
    trunkRotationDeg: [],
    armSwingLeftDeg: [],
    armSwingRightDeg: [],
  };
}

/** Any bilateral pair differing by more than the ROM asymmetry limit. */
export function hasSignificantAsymmetry(metrics: ROMMetrics): boolean {
  const pairs: Array<[number | null, number | null]> = [
    [metrics.hipFlexionLeftDeg, metrics.hipFlexionRightDeg],
    [metrics.kneeFlexionLeftDeg, metrics.kneeFlexionRightDeg],
    [metrics.armSwingLeftDeg, metrics.armSwingRightDeg],
  ];
  return pairs.some(
    ([left, right]) =>
      left !== null && right !== null && Math.abs(left - right) > GAIT_ROM_LIMITS.romAsymmetryThreshold,
  );
}

export const romAnalyzer = new ROMAnalyzer();
