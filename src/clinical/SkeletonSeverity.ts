/**
 * Skeleton severity map
 *
 * Projects per-metric posture severities onto the joints they describe and
 * then onto bones: a bone is as bad as its worse endpoint. Joints no
 * metric touches stay "normal".
 */

import type { PostureSeverities, PostureSeverityKey } from "../analysis/PostureAnalyzer";
import { SKELETON_CONNECTIONS, type JointName } from "../models/JointName";
import { worstSeverity, type Severity } from "./ClinicalNorms";

/** Joints graded by each posture metric. */
const METRIC_JOINTS: Record<PostureSeverityKey, readonly JointName[]> = {
  craniovertebralAngle: ["neck_1_joint", "neck_2_joint", "neck_3_joint", "neck_4_joint"],
  headTilt: ["head_joint"],
  sagittalVerticalAxis: ["spine_7_joint"],
  trunkLean: ["spine_5_joint", "spine_6_joint", "spine_7_joint"],
  lateralLean: ["spine_5_joint", "spine_6_joint", "spine_7_joint"],
  shoulderAsymmetry: ["left_shoulder_1_joint", "right_shoulder_1_joint"],
  shoulderProtraction: ["left_arm_joint", "right_arm_joint"],
  thoracicKyphosis: ["spine_4_joint", "spine_5_joint", "spine_6_joint"],
  lumbarLordosis: ["spine_1_joint", "spine_2_joint", "spine_3_joint"],
  coronalDeviation: ["spine_2_joint", "spine_3_joint", "spine_4_joint"],
  pelvicObliquity: ["hips_joint", "left_upLeg_joint", "right_upLeg_joint"],
  kneeAlignment: ["left_leg_joint", "right_leg_joint"],
};

export interface SkeletonSegmentSeverity {
  from: JointName;
  to: JointName;
  severity: Severity;
}

/** Severity of a two-endpoint segment: the worse of the two. */
export function segmentSeverity(a: Severity, b: Severity): Severity {
  return worstSeverity(a, b);
}

export function jointSeverities(
  severities: PostureSeverities,
): Partial<Record<JointName, Severity>> {
  const joints: Partial<Record<JointName, Severity>> = {};
  for (const [metric, severity] of Object.entries(severities)) {
    if (severity === undefined || !isSeverityKey(metric)) continue;
    for (const joint of METRIC_JOINTS[metric]) {
      const current = joints[joint];
      joints[joint] = current === undefined ? severity : worstSeverity(current, severity);
    }
  }
  return joints;
}

export function skeletonSegmentSeverities(
  severities: PostureSeverities,
): SkeletonSegmentSeverity[] {
  const joints = jointSeverities(severities);
  return SKELETON_CONNECTIONS.map(([from, to]) => ({
    from,
    to,
    severity: segmentSeverity(joints[from] ?? "normal", joints[to] ?? "normal"),
  }));
}

function isSeverityKey(value: string): value is PostureSeverityKey {
  return value in METRIC_JOINTS;
}
