import * as THREE from "three";
import type { JointFrame, Vec3Tuple } from "../models/frames";
import type { JointMap, JointName } from "../models/JointName";

/**
 * Synthetic Skeleton
 * ==================
 *
 * Produces deterministic joint frames for an upright adult (≈1.7 m) so the
 * analyzers can be exercised without a body tracker. Walking is modelled as a
 * constant forward progression with each foot tracing a cosine lift whose
 * trough falls exactly on a sample.
 */

/** Neutral standing pose, body space (m): +X right, +Y up, +Z forward. */
export const NEUTRAL_POSE: Readonly<Record<JointName, Vec3Tuple>> = {
  root: [0, 1.0, 0],
  hips_joint: [0, 1.0, 0],
  spine_1_joint: [0, 1.06, 0],
  spine_2_joint: [0, 1.12, 0],
  spine_3_joint: [0, 1.18, 0],
  spine_4_joint: [0, 1.24, 0],
  spine_5_joint: [0, 1.3, 0],
  spine_6_joint: [0, 1.36, 0],
  spine_7_joint: [0, 1.42, 0],
  neck_1_joint: [0, 1.48, 0],
  neck_2_joint: [0, 1.51, 0],
  neck_3_joint: [0, 1.54, 0],
  neck_4_joint: [0, 1.57, 0],
  head_joint: [0, 1.62, 0.06],
  left_shoulder_1_joint: [-0.18, 1.42, 0],
  left_arm_joint: [-0.2, 1.4, 0],
  left_forearm_joint: [-0.22, 1.12, 0],
  left_hand_joint: [-0.23, 0.88, 0],
  right_shoulder_1_joint: [0.18, 1.42, 0],
  right_arm_joint: [0.2, 1.4, 0],
  right_forearm_joint: [0.22, 1.12, 0],
  right_hand_joint: [0.23, 0.88, 0],
  left_upLeg_joint: [-0.1, 0.95, 0],
  left_leg_joint: [-0.1, 0.52, 0],
  left_foot_joint: [-0.1, 0.08, 0],
  left_toes_end_joint: [-0.1, 0.02, 0.15],
  right_upLeg_joint: [0.1, 0.95, 0],
  right_leg_joint: [0.1, 0.52, 0],
  right_foot_joint: [0.1, 0.08, 0],
  right_toes_end_joint: [0.1, 0.02, 0.15],
};

/**
 * Build a joint map from the neutral pose. Overrides replace joints; a
 * `null` override removes the joint (occlusion).
 */
export function standingJoints(
  overrides: Partial<Record<JointName, Vec3Tuple | null>> = {},
): JointMap {
  const joints: JointMap = {};
  for (const [name, position] of poseEntries(NEUTRAL_POSE)) {
    const override = overrides[name];
    if (override === null) continue;
    const [x, y, z] = override ?? position;
    joints[name] = new THREE.Vector3(x, y, z);
  }
  return joints;
}

function poseEntries(
  pose: Readonly<Record<JointName, Vec3Tuple>>,
): Array<[JointName, Vec3Tuple]> {
  const entries: Array<[JointName, Vec3Tuple]> = [];
  for (const name of Object.keys(pose)) {
    if (isPoseJoint(pose, name)) entries.push([name, pose[name]]);
  }
  return entries;
}

function isPoseJoint(
  pose: Readonly<Record<JointName, Vec3Tuple>>,
  name: string,
): name is JointName {
  return Object.prototype.hasOwnProperty.call(pose, name);
}

export interface WalkingOptions {
  fps: number;
  durationSec: number;
  /** Steps per minute (two steps per stride) */
  cadenceSPM: number;
  strideLengthM: number;
  /** Peak foot lift above the strike height (m) */
  footLiftM: number;
  /** Time of the first left-foot trough (s) */
  firstStrikeSec: number;
}

const DEFAULT_WALKING: WalkingOptions = {
  fps: 60,
  durationSec: 10,
  cadenceSPM: 120,
  strideLengthM: 1.2,
  footLiftM: 0.08,
  firstStrikeSec: 1 / 6,
};

export class SyntheticSkeleton {
  private options: WalkingOptions;

  constructor(options: Partial<WalkingOptions> = {}) {
    this.options = { ...DEFAULT_WALKING, ...options };
  }

  get strideTimeSec(): number {
    return 120 / this.options.cadenceSPM;
  }

  /** Forward walking sequence; the right foot trails the left by half a stride. */
  walking(): JointFrame[] {
    const { fps, durationSec, strideLengthM, footLiftM, firstStrikeSec } = this.options;
    const strideTime = this.strideTimeSec;
    const speed = strideLengthM / strideTime; // m/s
    const frameCount = Math.round(durationSec * fps);
    const frames: JointFrame[] = [];

    for (let i = 0; i < frameCount; i++) {
      const t = i / fps;
      const progression = speed * t;
      const joints = standingJoints();
      for (const joint of Object.values(joints)) {
        if (joint) joint.z += progression;
      }

      const leftPhase = (2 * Math.PI * (t - firstStrikeSec)) / strideTime;
      const rightPhase = leftPhase - Math.PI;
      const leftFoot = joints.left_foot_joint;
      const rightFoot = joints.right_foot_joint;
      if (leftFoot) leftFoot.y = 0.08 + (footLiftM / 2) * (1 - Math.cos(leftPhase));
      if (rightFoot) rightFoot.y = 0.08 + (footLiftM / 2) * (1 - Math.cos(rightPhase));

      frames.push({ joints, timestamp: t });
    }
    return frames;
  }

  /** Quiet standing with a slow circular sway of the root (m, Hz). */
  standing(durationSec: number, swayRadiusM: number, swayHz: number): JointFrame[] {
    const { fps } = this.options;
    const frameCount = Math.round(durationSec * fps);
    const frames: JointFrame[] = [];
    for (let i = 0; i < frameCount; i++) {
      const t = i / fps;
      const joints = standingJoints();
      const angle = 2 * Math.PI * swayHz * t;
      const root = joints.root;
      if (root) {
        root.x += swayRadiusM * Math.cos(angle);
        root.z += swayRadiusM * Math.sin(angle);
      }
      frames.push({ joints, timestamp: t });
    }
    return frames;
  }
}
