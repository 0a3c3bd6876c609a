/**
 * Posture Analyzer
 *
 * Per-frame static posture assessment from body-tracker joint positions.
 *
 * Metrics:
 * - Sagittal / frontal trunk lean (root → C7 proxy)
 * - Craniovertebral angle (CVA) and sagittal vertical axis (SVA)
 * - Shoulder height asymmetry and tilt, pelvic obliquity
 * - Thoracic kyphosis and lumbar lordosis (inter-segment angle proxies)
 * - Coronal spine deviation, head-forward and shoulder protraction offsets
 *
 * Each metric is graded against the clinical ladders in ClinicalNorms and
 * reduced to a coverage-weighted composite score (0-100), a Kendall postural
 * type and a New York Posture Rating.
 *
 * @module analysis/PostureAnalyzer
 */

import * as THREE from "three";
import {
  classifyKendall,
  computeNYPR,
  computePostureComposite,
  coronalDeviationSeverity,
  cvaSeverity,
  kneeAlignmentSeverity,
  kyphosisSeverity,
  lateralLeanSeverity,
  lordosisSeverity,
  pelvicObliquitySeverity,
  shoulderAsymmetrySeverity,
  shoulderProtractionSeverity,
  svaSeverity,
  trunkLeanSeverity,
  type NYPRItem,
  type NYPRResult,
  type PosturalType,
  type Severity,
} from "../clinical/ClinicalNorms";
import {
  frontalAngleFromVerticalDeg,
  pointToSegmentDistance,
  sagittalAngleFromVerticalDeg,
} from "../lib/math/geometry";
import { clamp, mean } from "../lib/math/stats";
import type { JointMap } from "../models/JointName";

// ============================================================================
// TYPES
// ============================================================================

export interface PostureMetrics {
  sagittalTrunkLeanDeg: number; // + forward
  frontalTrunkLeanDeg: number; // + toward +X
  craniovertebralAngleDeg: number;
  sagittalVerticalAxisCm: number;
  headTiltDeg: number;
  shoulderAsymmetryCm: number | null;
  shoulderTiltDeg: number | null;
  pelvicObliquityDeg: number | null;
  thoracicKyphosisDeg: number | null;
  lumbarLordosisDeg: number | null;
  coronalSpineDeviationCm: number | null;
  headForwardCm: number | null;
  shoulderProtractionCm: number | null;
  kneeAlignmentDeg: number | null;
}

export type PostureSeverityKey =
  | "craniovertebralAngle"
  | "sagittalVerticalAxis"
  | "trunkLean"
  | "lateralLean"
  | "headTilt"
  | "shoulderAsymmetry"
  | "pelvicObliquity"
  | "thoracicKyphosis"
  | "lumbarLordosis"
  | "coronalDeviation"
  | "shoulderProtraction"
  | "kneeAlignment";

export type PostureSeverities = Partial<Record<PostureSeverityKey, Severity>>;

export interface PostureAssessment {
  metrics: PostureMetrics;
  severities: PostureSeverities;
  /** null when kyphosis or lordosis could not be measured */
  posturalType: PosturalType | null;
  nypr: NYPRResult;
  /** Composite posture score (0-100) */
  score: number;
  /** Fraction of composite weight backed by a measurement */
  coverage: number;
}

export interface PostureAnalyzerConfig {
  /** Trunk lean giving a zero session trunk score (deg) */
  maxTrunkLeanDeg: number;
  /** Lateral lean giving a zero session lateral score (deg) */
  maxLateralLeanDeg: number;
}

const DEFAULT_CONFIG: PostureAnalyzerConfig = {
  maxTrunkLeanDeg: 15,
  maxLateralLeanDeg: 10,
};

const RAD2DEG = 180 / Math.PI;
const M_TO_CM = 100;

const SPINE_CHAIN = [
  "spine_1_joint",
  "spine_2_joint",
  "spine_3_joint",
  "spine_4_joint",
  "spine_5_joint",
  "spine_6_joint",
  "spine_7_joint",
] as const;

// ============================================================================
// POSTURE ANALYZER
// ============================================================================

export class PostureAnalyzer {
  private config: PostureAnalyzerConfig;

  constructor(config: Partial<PostureAnalyzerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Assess one frame. Returns null when root, neck or head is missing.
   */
  analyze(joints: JointMap): PostureAssessment | null {
    const metrics = this.measure(joints);
    if (!metrics) return null;

    const severities = gradeMetrics(metrics);
    const composite = computePostureComposite({
      craniovertebralAngleDeg: metrics.craniovertebralAngleDeg,
      sagittalVerticalAxisCm: metrics.sagittalVerticalAxisCm,
      sagittalTrunkLeanDeg: metrics.sagittalTrunkLeanDeg,
      frontalTrunkLeanDeg: metrics.frontalTrunkLeanDeg,
      shoulderAsymmetryCm: metrics.shoulderAsymmetryCm,
      thoracicKyphosisDeg: metrics.thoracicKyphosisDeg,
      pelvicObliquityDeg: metrics.pelvicObliquityDeg,
      lumbarLordosisDeg: metrics.lumbarLordosisDeg,
      coronalSpineDeviationCm: metrics.coronalSpineDeviationCm,
    });

    const posturalType =
      metrics.thoracicKyphosisDeg !== null && metrics.lumbarLordosisDeg !== null
        ? classifyKendall({
            thoracicKyphosisDeg: metrics.thoracicKyphosisDeg,
            lumbarLordosisDeg: metrics.lumbarLordosisDeg,
            craniovertebralAngleDeg: metrics.craniovertebralAngleDeg,
            sagittalVerticalAxisCm: metrics.sagittalVerticalAxisCm,
            headForwardCm: metrics.headForwardCm,
            shoulderProtractionCm: metrics.shoulderProtractionCm,
            pelvicTiltDeg: null,
          })
        : null;

    return {
      metrics,
      severities,
      posturalType,
      nypr: computeNYPR(nyprItems(severities)),
      score: composite.score,
      coverage: composite.coverage,
    };
  }

  /**
   * Session posture score from trunk and lateral lean series:
   * 0.7 × trunk score + 0.3 × lateral score.
   */
  computeSessionScore(trunkLeans: readonly number[], lateralLeans: readonly number[]): number {
    if (trunkLeans.length === 0) return 0;

    const avgTrunk = mean(trunkLeans.map(Math.abs));
    const avgLateral = mean(lateralLeans.map(Math.abs));

    const trunkScore = Math.max(0, 100 - (avgTrunk / this.config.maxTrunkLeanDeg) * 100);
    const lateralScore = Math.max(0, 100 - (avgLateral / this.config.maxLateralLeanDeg) * 100);

    return clamp(trunkScore * 0.7 + lateralScore * 0.3, 0, 100);
  }

  // ==========================================================================
  // MEASUREMENT
  // ==========================================================================

  private measure(joints: JointMap): PostureMetrics | null {
    const root = joints.root;
    const neck = joints.neck_1_joint;
    const head = joints.head_joint;
    if (!root || !neck || !head) return null;

    const torso = neck.clone().sub(root);
    const headVec = head.clone().sub(neck);

    const leftShoulder = joints.left_shoulder_1_joint;
    const rightShoulder = joints.right_shoulder_1_joint;
    const leftHip = joints.left_upLeg_joint;
    const rightHip = joints.right_upLeg_joint;
    const c7 = joints.spine_7_joint;

    let shoulderAsymmetryCm: number | null = null;
    let shoulderTiltDeg: number | null = null;
    if (leftShoulder && rightShoulder) {
      const dy = leftShoulder.y - rightShoulder.y;
      shoulderAsymmetryCm = Math.abs(dy) * M_TO_CM;
      shoulderTiltDeg = Math.atan2(dy, Math.abs(leftShoulder.x - rightShoulder.x)) * RAD2DEG;
    }

    let pelvicObliquityDeg: number | null = null;
    if (leftHip && rightHip) {
      pelvicObliquityDeg =
        Math.atan2(leftHip.y - rightHip.y, Math.abs(leftHip.x - rightHip.x)) * RAD2DEG;
    }

    let shoulderProtractionCm: number | null = null;
    if (leftShoulder && rightShoulder && c7) {
      shoulderProtractionCm = ((leftShoulder.z + rightShoulder.z) / 2 - c7.z) * M_TO_CM;
    }

    return {
      sagittalTrunkLeanDeg: sagittalAngleFromVerticalDeg(torso),
      frontalTrunkLeanDeg: frontalAngleFromVerticalDeg(torso),
      // Angle of the C7 → head line above horizontal, sagittal plane
      craniovertebralAngleDeg: Math.atan2(headVec.y, headVec.z) * RAD2DEG,
      sagittalVerticalAxisCm: (neck.z - root.z) * M_TO_CM,
      headTiltDeg: frontalAngleFromVerticalDeg(headVec),
      shoulderAsymmetryCm,
      shoulderTiltDeg,
      pelvicObliquityDeg,
      thoracicKyphosisDeg: thoracicKyphosis(joints),
      lumbarLordosisDeg: lumbarLordosis(joints),
      coronalSpineDeviationCm: coronalDeviation(joints, root, neck),
      headForwardCm: c7 ? (head.z - c7.z) * M_TO_CM : null,
      shoulderProtractionCm,
      kneeAlignmentDeg: kneeAlignment(joints),
    };
  }
}

// ============================================================================
// SPINAL CURVATURE PROXIES
// ============================================================================

/** Forward bend of the upper thoracic segment relative to the lower one. */
function thoracicKyphosis(joints: JointMap): number | null {
  const lower = joints.spine_3_joint;
  const apex = joints.spine_5_joint;
  const upper = joints.neck_1_joint;
  if (!lower || !apex || !upper) return null;
  return (
    sagittalAngleFromVerticalDeg(upper.clone().sub(apex)) -
    sagittalAngleFromVerticalDeg(apex.clone().sub(lower))
  );
}

/** Forward tilt of the pelvic segment relative to the lumbar segment. */
function lumbarLordosis(joints: JointMap): number | null {
  const root = joints.root;
  const l5 = joints.spine_1_joint;
  const l1 = joints.spine_3_joint;
  if (!root || !l5 || !l1) return null;
  return (
    sagittalAngleFromVerticalDeg(l5.clone().sub(root)) -
    sagittalAngleFromVerticalDeg(l1.clone().sub(l5))
  );
}

/** Largest frontal-plane offset of a spine joint from the root–neck line (cm). */
function coronalDeviation(
  joints: JointMap,
  root: THREE.Vector3,
  neck: THREE.Vector3,
): number | null {
  const start = new THREE.Vector3(root.x, root.y, 0);
  const end = new THREE.Vector3(neck.x, neck.y, 0);
  let maxOffset: number | null = null;
  for (const name of SPINE_CHAIN) {
    const joint = joints[name];
    if (!joint) continue;
    const offset = pointToSegmentDistance(new THREE.Vector3(joint.x, joint.y, 0), start, end);
    maxOffset = maxOffset === null ? offset : Math.max(maxOffset, offset);
  }
  return maxOffset === null ? null : maxOffset * M_TO_CM;
}

/** Worst side's frontal-plane angle between thigh and shank. */
function kneeAlignment(joints: JointMap): number | null {
  let worst: number | null = null;
  const sides = [
    [joints.left_upLeg_joint, joints.left_leg_joint, joints.left_foot_joint],
    [joints.right_upLeg_joint, joints.right_leg_joint, joints.right_foot_joint],
  ] as const;
  for (const [hip, knee, ankle] of sides) {
    if (!hip || !knee || !ankle) continue;
    const thigh = frontalAngleFromVerticalDeg(hip.clone().sub(knee));
    const shank = frontalAngleFromVerticalDeg(knee.clone().sub(ankle));
    const deviation = Math.abs(thigh - shank);
    worst = worst === null ? deviation : Math.max(worst, deviation);
  }
  return worst;
}

// ============================================================================
// GRADING
// ============================================================================

export function gradeMetrics(metrics: PostureMetrics): PostureSeverities {
  const severities: PostureSeverities = {
    craniovertebralAngle: cvaSeverity(metrics.craniovertebralAngleDeg),
    sagittalVerticalAxis: svaSeverity(metrics.sagittalVerticalAxisCm),
    trunkLean: trunkLeanSeverity(metrics.sagittalTrunkLeanDeg),
    lateralLean: lateralLeanSeverity(metrics.frontalTrunkLeanDeg),
    headTilt: lateralLeanSeverity(metrics.headTiltDeg),
  };
  if (metrics.shoulderAsymmetryCm !== null) {
    severities.shoulderAsymmetry = shoulderAsymmetrySeverity(metrics.shoulderAsymmetryCm);
  }
  if (metrics.pelvicObliquityDeg !== null) {
    severities.pelvicObliquity = pelvicObliquitySeverity(metrics.pelvicObliquityDeg);
  }
  if (metrics.thoracicKyphosisDeg !== null) {
    severities.thoracicKyphosis = kyphosisSeverity(metrics.thoracicKyphosisDeg);
  }
  if (metrics.lumbarLordosisDeg !== null) {
    severities.lumbarLordosis = lordosisSeverity(metrics.lumbarLordosisDeg);
  }
  if (metrics.coronalSpineDeviationCm !== null) {
    severities.coronalDeviation = coronalDeviationSeverity(metrics.coronalSpineDeviationCm);
  }
  if (metrics.shoulderProtractionCm !== null) {
    severities.shoulderProtraction = shoulderProtractionSeverity(metrics.shoulderProtractionCm);
  }
  if (metrics.kneeAlignmentDeg !== null) {
    severities.kneeAlignment = kneeAlignmentSeverity(metrics.kneeAlignmentDeg);
  }
  return severities;
}

function nyprItems(severities: PostureSeverities): Partial<Record<NYPRItem, Severity>> {
  return {
    headTilt: severities.headTilt,
    shoulderLevel: severities.shoulderAsymmetry,
    cervicalScoliosis: severities.coronalDeviation,
    thoracicKyphosis: severities.thoracicKyphosis,
    trunkAlignment: severities.trunkLean,
    shoulderProtraction: severities.shoulderProtraction,
    hipLevel: severities.pelvicObliquity,
    kneeAlignment: severities.kneeAlignment,
  };
}

export const postureAnalyzer = new PostureAnalyzer();
