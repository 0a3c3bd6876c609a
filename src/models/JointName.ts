/**
 * Skeleton Joint Names
 *
 * The subset of the body tracker's skeleton that the analyzers read, plus
 * the segment connections used to colour and rate skeletal segments.
 */

import type * as THREE from "three";

export const JOINT_NAMES = [
  "root",
  "hips_joint",
  "spine_1_joint",
  "spine_2_joint",
  "spine_3_joint",
  "spine_4_joint",
  "spine_5_joint",
  "spine_6_joint",
  "spine_7_joint",
  "neck_1_joint",
  "neck_2_joint",
  "neck_3_joint",
  "neck_4_joint",
  "head_joint",
  "left_shoulder_1_joint",
  "left_arm_joint",
  "left_forearm_joint",
  "left_hand_joint",
  "right_shoulder_1_joint",
  "right_arm_joint",
  "right_forearm_joint",
  "right_hand_joint",
  "left_upLeg_joint",
  "left_leg_joint",
  "left_foot_joint",
  "left_toes_end_joint",
  "right_upLeg_joint",
  "right_leg_joint",
  "right_foot_joint",
  "right_toes_end_joint",
] as const;

export type JointName = (typeof JOINT_NAMES)[number];

export type Side = "left" | "right";

/** Joint positions for one tracker tick; occluded joints are absent. */
export type JointMap = Partial<Record<JointName, THREE.Vector3>>;

/** Joint names that differ only by side. */
export const SIDED_JOINTS = {
  shoulder: { left: "left_shoulder_1_joint", right: "right_shoulder_1_joint" },
  arm: { left: "left_arm_joint", right: "right_arm_joint" },
  forearm: { left: "left_forearm_joint", right: "right_forearm_joint" },
  hand: { left: "left_hand_joint", right: "right_hand_joint" },
  upLeg: { left: "left_upLeg_joint", right: "right_upLeg_joint" },
  leg: { left: "left_leg_joint", right: "right_leg_joint" },
  foot: { left: "left_foot_joint", right: "right_foot_joint" },
  toes: { left: "left_toes_end_joint", right: "right_toes_end_joint" },
} as const satisfies Record<string, Record<Side, JointName>>;

/** Bone pairs of the tracked skeleton (parent, child). */
export const SKELETON_CONNECTIONS: ReadonlyArray<readonly [JointName, JointName]> = [
  // Spine
  ["root", "hips_joint"],
  ["hips_joint", "spine_1_joint"],
  ["spine_1_joint", "spine_2_joint"],
  ["spine_2_joint", "spine_3_joint"],
  ["spine_3_joint", "spine_4_joint"],
  ["spine_4_joint", "spine_5_joint"],
  ["spine_5_joint", "spine_6_joint"],
  ["spine_6_joint", "spine_7_joint"],
  ["spine_7_joint", "neck_1_joint"],
  ["neck_1_joint", "neck_2_joint"],
  ["neck_2_joint", "neck_3_joint"],
  ["neck_3_joint", "neck_4_joint"],
  ["neck_4_joint", "head_joint"],
  // Arms
  ["spine_7_joint", "left_shoulder_1_joint"],
  ["left_shoulder_1_joint", "left_arm_joint"],
  ["left_arm_joint", "left_forearm_joint"],
  ["left_forearm_joint", "left_hand_joint"],
  ["spine_7_joint", "right_shoulder_1_joint"],
  ["right_shoulder_1_joint", "right_arm_joint"],
  ["right_arm_joint", "right_forearm_joint"],
  ["right_forearm_joint", "right_hand_joint"],
  // Legs
  ["hips_joint", "left_upLeg_joint"],
  ["left_upLeg_joint", "left_leg_joint"],
  ["left_leg_joint", "left_foot_joint"],
  ["left_foot_joint", "left_toes_end_joint"],
  ["hips_joint", "right_upLeg_joint"],
  ["right_upLeg_joint", "right_leg_joint"],
  ["right_leg_joint", "right_foot_joint"],
  ["right_foot_joint", "right_toes_end_joint"],
];

export function isJointName(value: string): value is JointName {
  return JOINT_NAMES.some((name) => name === value);
}
