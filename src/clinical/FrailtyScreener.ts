/**
 * Frailty Screener (Fried phenotype)
 *
 * Screens three of the five Fried criteria from gait data: slowness
 * (measured), low activity and exhaustion (proxies). Grip strength and
 * weight loss need clinical or self-reported input and are never met here.
 *
 * References:
 * - Fried LP et al., J Gerontol, 2001
 * - Tudor-Locke C et al., Med Sci Sports Exerc, 2004 (step-count proxy)
 */

import type { BiologicalSex } from "./NormativeData";

export type FrailtyClassification = "robust" | "preFrail" | "frail";

export type CriterionSource = "measured" | "proxy" | "selfReport" | "unavailable";

export interface FrailtyCriterion {
  name: string;
  isMet: boolean;
  value: number | null;
  threshold: number | null;
  source: CriterionSource;
}

export interface FrailtyInput {
  walkingSpeedMPS: number | null;
  heightM: number | null;
  sex: BiologicalSex | null;
  dailyStepCount: number | null;
  postureVariabilitySD: number | null;
  strideTimeCVPercent: number | null;
}

export interface FrailtyScreeningResult {
  friedScore: number;
  classification: FrailtyClassification;
  criteria: FrailtyCriterion[];
  interpretation: string;
}

const LOW_ACTIVITY_STEPS = 3000; // steps/day
const EXHAUSTION_CV = 6; // %
const EXHAUSTION_POSTURE_SD = 5;
const DEFAULT_HEIGHT_M = 1.7;

/** Fried 2001, Table 3 (7 m walk time converted to m/s). */
export function slownessCutoff(heightM: number | null, sex: BiologicalSex | null): number {
  const height = heightM ?? DEFAULT_HEIGHT_M;
  const shortCutoff = (sex ?? "male") === "male" ? 1.73 : 1.59;
  return height <= shortCutoff ? 0.65 : 0.76;
}

function unassessed(name: string, source: CriterionSource): FrailtyCriterion {
  return { name, isMet: false, value: null, threshold: null, source };
}

export function classifyFrailty(friedScore: number): FrailtyClassification {
  if (friedScore === 0) return "robust";
  if (friedScore <= 2) return "preFrail";
  return "frail";
}

export class FrailtyScreener {
  screen(input: FrailtyInput): FrailtyScreeningResult {
    const criteria: FrailtyCriterion[] = [];

    if (input.walkingSpeedMPS !== null) {
      const threshold = slownessCutoff(input.heightM, input.sex);
      criteria.push({
        name: "Slowness (Gait Speed)",
        isMet: input.walkingSpeedMPS < threshold,
        value: input.walkingSpeedMPS,
        threshold,
        source: "measured",
      });
    } else {
      criteria.push(unassessed("Slowness (Gait Speed)", "unavailable"));
    }

    if (input.dailyStepCount !== null) {
      criteria.push({
        name: "Low Physical Activity",
        isMet: input.dailyStepCount < LOW_ACTIVITY_STEPS,
        value: input.dailyStepCount,
        threshold: LOW_ACTIVITY_STEPS,
        source: "proxy",
      });
    } else {
      criteria.push(unassessed("Low Physical Activity", "unavailable"));
    }

    // Gait and posture variability together stand in for motor exhaustion
    if (input.postureVariabilitySD !== null && input.strideTimeCVPercent !== null) {
      criteria.push({
        name: "Exhaustion",
        isMet:
          input.strideTimeCVPercent > EXHAUSTION_CV &&
          input.postureVariabilitySD > EXHAUSTION_POSTURE_SD,
        value: input.strideTimeCVPercent,
        threshold: EXHAUSTION_CV,
        source: "proxy",
      });
    } else {
      criteria.push(unassessed("Exhaustion", "selfReport"));
    }

    criteria.push(unassessed("Weakness (Grip Strength)", "unavailable"));
    criteria.push(unassessed("Unintentional Weight Loss", "selfReport"));

    const friedScore = criteria.filter((c) => c.isMet).length;
    const classification = classifyFrailty(friedScore);

    return {
      friedScore,
      classification,
      criteria,
      interpretation: interpret(classification, friedScore, criteria),
    };
  }
}

function interpret(
  classification: FrailtyClassification,
  friedScore: number,
  criteria: readonly FrailtyCriterion[],
): string {
  switch (classification) {
    case "robust": {
      const clinical = criteria.filter(
        (c) => c.source === "unavailable" || c.source === "selfReport",
      ).length;
      return `No frailty indicators detected from available data. ${clinical} criteria require clinical assessment.`;
    }
    case "preFrail":
      return `Pre-frailty indicators present (${friedScore} of 5 criteria). Consider comprehensive geriatric assessment.`;
    case "frail":
      return `Multiple frailty indicators (${friedScore} of 5). Recommend clinical evaluation by geriatrician.`;
  }
}

export const frailtyScreener = new FrailtyScreener();
