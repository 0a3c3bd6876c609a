/**
 * Persisted session shapes.
 *
 * A finished capture is stored as a small summary record plus three encoded
 * time-series blobs kept in a separate table, so listing sessions never
 * touches frame data.
 */

import type {
  CrossedSyndromeType,
  FallRiskLevel,
  GaitPatternType,
  PosturalType,
  REBARiskLevel,
} from "../clinical/ClinicalNorms";
import type { FrailtyClassification } from "../clinical/FrailtyScreener";
import type { BodyFrame, MotionSample, StepEvent } from "./frames";

export type DistanceSource = "pedometer" | "bodyTracking" | "stepEstimate";

export interface SessionRecord {
  id: string;
  /** ms since epoch */
  startedAt: number;
  /** Recording time excluding pauses (s) */
  durationSec: number;
  frameCount: number;
  totalSteps: number;
  /** Stored schema version */
  schemaVersion: number;

  // Averages and peaks
  averageCadenceSPM: number | null;
  averageStrideLengthM: number | null;
  averageWalkingSpeedMPS: number | null;
  averageTrunkLeanDeg: number | null;
  peakTrunkLeanDeg: number | null;
  averageLateralLeanDeg: number | null;
  averageCVADeg: number | null;
  averageSVACm: number | null;
  averageKyphosisDeg: number | null;
  averageLordosisDeg: number | null;
  averageSwayVelocityMMS: number | null;
  strideTimeCVPercent: number | null;
  stepAsymmetryPercent: number | null;
  distanceM: number | null;
  distanceSource: DistanceSource | null;

  // Composite scores (0–100)
  postureScore: number | null;
  fallRiskScore: number | null;
  fatigueIndex: number | null;
  painRiskScore: number | null;
  upperCrossedScore: number | null;
  lowerCrossedScore: number | null;
  /** Worst REBA score seen (1–15) */
  peakRebaScore: number | null;
  sparcScore: number | null;
  estimatedMET: number | null;

  // Labels
  gaitPattern: GaitPatternType | null;
  gaitPatternConfidence: number | null;
  posturalType: PosturalType | null;
  fallRiskLevel: FallRiskLevel | null;
  rebaRiskLevel: REBARiskLevel | null;
  crossedSyndromes: CrossedSyndromeType[];
  frailty: FrailtyClassification | null;
  isFatigued: boolean;
}

export interface SessionTimeSeries {
  frames: BodyFrame[];
  steps: StepEvent[];
  motion: MotionSample[];
}

/** Encoded time series for one session, stored apart from the summary. */
export interface SessionBlobs {
  sessionId: string;
  frames: string;
  steps: string;
  motion: string;
}

export const SESSION_SCHEMA_VERSION = 1;
