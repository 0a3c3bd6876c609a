/**
 * Ergonomic Scorer (REBA)
 *
 * Rapid Entire Body Assessment from joint positions: trunk, neck, legs,
 * upper arm, lower arm and wrist component scores combined through the
 * REBA lookup tables into a 1–15 risk score.
 *
 * External load and coupling cannot be observed by the tracker and score 0;
 * the activity score assumes a sustained posture (+1).
 *
 * Every component must be measured (arms on at least one side); otherwise
 * the frame has no REBA result.
 *
 * Reference: Hignett S & McAtamney L, Applied Ergonomics, 2000
 */

import type * as THREE from "three";
import { rebaRiskLevel, type REBARiskLevel } from "../clinical/ClinicalNorms";
import {
  frontalAngleFromDownDeg,
  frontalAngleFromVerticalDeg,
  sagittalAngleFromDownDeg,
  sagittalAngleFromVerticalDeg,
  threePointAngleDeg,
} from "../lib/math/geometry";
import { clamp } from "../lib/math/stats";
import type { JointMap, Side } from "../models/JointName";
import { SIDED_JOINTS } from "../models/JointName";
import rebaTables from "./data/rebaTables.json";

export interface REBAResult {
  /** 1–15 */
  score: number;
  riskLevel: REBARiskLevel;
  action: string;
  trunkScore: number;
  neckScore: number;
  legScore: number;
  upperArmScore: number;
  lowerArmScore: number;
  wristScore: number;
}

const REBA_ACTIONS: Record<REBARiskLevel, string> = {
  negligible: "No action required",
  low: "May need change",
  medium: "Investigation needed; implement changes",
  high: "Investigation and changes needed soon",
  veryHigh: "Immediate investigation and changes required",
};

const LOAD_SCORE = 0;
const COUPLING_SCORE = 0;
const ACTIVITY_SCORE = 1;

// ============================================================================
// COMPONENT SCORES
// ============================================================================

function scoreTrunk(joints: JointMap): number | null {
  const hips = joints.hips_joint;
  const c7 = joints.spine_7_joint;
  if (!hips || !c7) return null;
  const trunk = c7.clone().sub(hips);
  const flexion = Math.abs(sagittalAngleFromVerticalDeg(trunk));

  let score: number;
  if (flexion < 5) score = 1;
  else if (flexion <= 20) score = 2;
  else if (flexion <= 60) score = 3;
  else score = 4;

  if (Math.abs(frontalAngleFromVerticalDeg(trunk)) > 10) score += 1;
  return Math.min(5, score);
}

function scoreNeck(joints: JointMap): number | null {
  const c7 = joints.spine_7_joint;
  const head = joints.head_joint;
  if (!c7 || !head) return null;
  const neck = head.clone().sub(c7);
  const flexion = sagittalAngleFromVerticalDeg(neck);

  let score = flexion >= 0 && flexion <= 20 ? 1 : 2;
  if (Math.abs(frontalAngleFromVerticalDeg(neck)) > 10) score += 1;
  return Math.min(3, score);
}

function scoreLegs(joints: JointMap): number | null {
  const lh = joints.left_upLeg_joint;
  const lk = joints.left_leg_joint;
  const la = joints.left_foot_joint;
  const rh = joints.right_upLeg_joint;
  const rk = joints.right_leg_joint;
  const ra = joints.right_foot_joint;
  if (!lh || !lk || !la || !rh || !rk || !ra) return null;

  // Unilateral support when one foot is clearly lifted
  let score = Math.abs(la.y - ra.y) > 0.1 ? 2 : 1;

  const kneeFlexion = Math.max(
    180 - threePointAngleDeg(lh, lk, la),
    180 - threePointAngleDeg(rh, rk, ra),
  );
  if (kneeFlexion > 60) score += 2;
  else if (kneeFlexion > 30) score += 1;

  return Math.min(4, score);
}

function scoreUpperArm(joints: JointMap, side: Side): number | null {
  const shoulder = joints[SIDED_JOINTS.arm[side]];
  const elbow = joints[SIDED_JOINTS.forearm[side]];
  if (!shoulder || !elbow) return null;
  const arm = elbow.clone().sub(shoulder);
  const flexion = Math.abs(sagittalAngleFromDownDeg(arm));

  let score: number;
  if (flexion <= 20) score = 1;
  else if (flexion <= 45) score = 2;
  else if (flexion <= 90) score = 3;
  else score = 4;

  const girdle = joints[SIDED_JOINTS.shoulder[side]];
  const c7 = joints.spine_7_joint;
  if (girdle && c7 && girdle.y - c7.y > 0.05) score += 1; // raised shoulder
  if (Math.abs(frontalAngleFromDownDeg(arm)) > 30) score += 1; // abduction

  return Math.min(6, score);
}

function scoreLowerArm(joints: JointMap, side: Side): number | null {
  const shoulder = joints[SIDED_JOINTS.arm[side]];
  const elbow = joints[SIDED_JOINTS.forearm[side]];
  const wrist = joints[SIDED_JOINTS.hand[side]];
  if (!shoulder || !elbow || !wrist) return null;
  const flexion = 180 - threePointAngleDeg(shoulder, elbow, wrist);
  return flexion >= 60 && flexion <= 100 ? 1 : 2;
}

/** Forearm → hand frontal deviation stands in for wrist posture. */
function scoreWrist(forearm?: THREE.Vector3, hand?: THREE.Vector3): number | null {
  if (!forearm || !hand) return null;
  const deviation = Math.abs(frontalAngleFromDownDeg(hand.clone().sub(forearm)));
  return deviation < 15 ? 1 : 2;
}

/** Worse of the two sides; null when neither side was measured. */
function worstSide(left: number | null, right: number | null): number | null {
  if (left === null) return right;
  if (right === null) return left;
  return Math.max(left, right);
}

// ============================================================================
// TABLE LOOKUP
// ============================================================================

function lookupA(trunk: number, neck: number, legs: number): number {
  return rebaTables.tableA[clamp(trunk, 1, 5) - 1][clamp(neck, 1, 3) - 1][clamp(legs, 1, 4) - 1];
}

function lookupB(upperArm: number, lowerArm: number, wrist: number): number {
  return rebaTables.tableB[clamp(upperArm, 1, 6) - 1][clamp(lowerArm, 1, 2) - 1][
    clamp(wrist, 1, 3) - 1
  ];
}

function lookupC(scoreA: number, scoreB: number): number {
  return rebaTables.tableC[clamp(scoreA, 1, 12) - 1][clamp(scoreB, 1, 12) - 1];
}

// ============================================================================
// SCORER
// ============================================================================

export class ErgonomicScorer {
  /** REBA for one frame, or null when a body region is occluded. */
  computeREBA(joints: JointMap): REBAResult | null {
    const trunkScore = scoreTrunk(joints);
    const neckScore = scoreNeck(joints);
    const legScore = scoreLegs(joints);
    const upperArmScore = worstSide(scoreUpperArm(joints, "left"), scoreUpperArm(joints, "right"));
    const lowerArmScore = worstSide(scoreLowerArm(joints, "left"), scoreLowerArm(joints, "right"));
    const wristScore = worstSide(
      scoreWrist(joints.left_forearm_joint, joints.left_hand_joint),
      scoreWrist(joints.right_forearm_joint, joints.right_hand_joint),
    );
    if (
      trunkScore === null ||
      neckScore === null ||
      legScore === null ||
      upperArmScore === null ||
      lowerArmScore === null ||
      wristScore === null
    ) {
      return null;
    }

    const scoreA = lookupA(trunkScore, neckScore, legScore) + LOAD_SCORE;
    const scoreB = lookupB(upperArmScore, lowerArmScore, wristScore) + COUPLING_SCORE;
    const score = clamp(lookupC(scoreA, scoreB) + ACTIVITY_SCORE, 1, 15);
    const riskLevel = rebaRiskLevel(score);

    return {
      score,
      riskLevel,
      action: REBA_ACTIONS[riskLevel],
      trunkScore,
      neckScore,
      legScore,
      upperArmScore,
      lowerArmScore,
      wristScore,
    };
  }
}

export const ergonomicScorer = new ErgonomicScorer();
