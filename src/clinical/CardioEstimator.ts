/**
 * Cardio Estimator
 *
 * Metabolic cost from gait, plus scoring for the six-minute walk test (6MWT)
 * and Timed Up and Go (TUG).
 *
 * - MET from walking speed via the ACSM walking equation
 *   VO2 = 0.1·speed(m/min) + 3.5, MET = VO2 / 3.5
 * - Walk ratio = step length / cadence (step ≈ stride / 2)
 * - Cost-of-transport proxy = MET / speed
 *
 * References:
 * - Ainsworth BE et al., Compendium of Physical Activities, 2011
 * - ATS Statement: Guidelines for the Six-Minute Walk Test, 2002
 * - Enright PL & Sherrill DL, Am J Respir Crit Care Med, 1998
 * - Shumway-Cook A et al., Phys Ther, 2000 (TUG)
 */

import { GAIT_THRESHOLDS, type FallRiskLevel } from "./ClinicalNorms";
import type { BiologicalSex } from "./NormativeData";

export type ActivityIntensity = "sedentary" | "light" | "moderate" | "vigorous";

export interface CardioEstimate {
  estimatedMET: number;
  intensity: ActivityIntensity;
  /** m/(steps/min) */
  walkRatio: number;
  costOfTransportProxy: number;
}

export interface SixMinuteWalkInput {
  distanceM: number;
  ageYears: number | null;
  heightM: number | null;
  weightKg: number | null;
  sex: BiologicalSex | null;
}

export interface SixMinuteWalkResult {
  distanceM: number;
  predictedDistanceM: number | null;
  percentPredicted: number | null;
  classification: string;
}

export interface TUGResult {
  timeSec: number;
  fallRisk: FallRiskLevel;
  mobilityLevel: string;
}

/** Below this speed the cost-of-transport ratio is meaningless. */
const MIN_TRANSPORT_SPEED_MPS = 0.1;

export function activityIntensity(met: number): ActivityIntensity {
  if (met < 1.5) return "sedentary";
  if (met < 3) return "light";
  if (met < 6) return "moderate";
  return "vigorous";
}

/**
 * Enright & Sherrill 1998 reference distance; null unless every
 * anthropometric input is known.
 */
export function predictedSixMinuteWalkM(input: SixMinuteWalkInput): number | null {
  const { ageYears, heightM, weightKg, sex } = input;
  if (ageYears === null || heightM === null || weightKg === null || sex === null) return null;
  const heightCm = heightM * 100;
  const predicted =
    sex === "male"
      ? 7.57 * heightCm - 5.02 * ageYears - 1.76 * weightKg - 309
      : 2.11 * heightCm - 2.29 * weightKg - 5.78 * ageYears + 667;
  return Math.max(0, predicted);
}

function sixMinuteWalkClassification(distanceM: number): string {
  if (distanceM < 300) return "Severely limited functional capacity";
  if (distanceM < 400) return "Moderate functional limitation";
  if (distanceM < 500) return "Mild limitation";
  return "Normal functional capacity";
}

function mobilityLevel(timeSec: number): string {
  if (timeSec < 10) return "Freely mobile";
  if (timeSec < 20) return "Mostly independent";
  if (timeSec < 30) return "Variable mobility";
  return "Impaired mobility; assistive device may be needed";
}

export class CardioEstimator {
  estimate(walkingSpeedMPS: number, cadenceSPM: number, strideLengthM: number): CardioEstimate {
    const vo2 = 0.1 * walkingSpeedMPS * 60 + 3.5;
    const met = vo2 / 3.5;
    const stepLengthM = strideLengthM / 2;

    return {
      estimatedMET: met,
      intensity: activityIntensity(met),
      walkRatio: cadenceSPM > 0 ? stepLengthM / cadenceSPM : 0,
      costOfTransportProxy: walkingSpeedMPS > MIN_TRANSPORT_SPEED_MPS ? met / walkingSpeedMPS : 0,
    };
  }

  evaluateSixMinuteWalk(input: SixMinuteWalkInput): SixMinuteWalkResult {
    const predictedDistanceM = predictedSixMinuteWalkM(input);
    return {
      distanceM: input.distanceM,
      predictedDistanceM,
      percentPredicted:
        predictedDistanceM !== null && predictedDistanceM > 0
          ? (input.distanceM / predictedDistanceM) * 100
          : null,
      classification: sixMinuteWalkClassification(input.distanceM),
    };
  }

  evaluateTUG(timeSec: number): TUGResult {
    let fallRisk: FallRiskLevel = "low";
    if (timeSec > GAIT_THRESHOLDS.tugFallRisk) fallRisk = "high";
    else if (timeSec > 10) fallRisk = "moderate";

    return { timeSec, fallRisk, mobilityLevel: mobilityLevel(timeSec) };
  }
}

export const cardioEstimator = new CardioEstimator();
