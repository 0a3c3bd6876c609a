/**
 * Gait Pattern Classifier
 *
 * Rule-based screening for pathological gait patterns from session-level
 * spatiotemporal and kinematic markers. Every non-normal pattern scores
 * 0–1 from weighted sub-terms; `normal` is 1 − the worst pathological score.
 * The label is the arg-max, with ties resolved by `GAIT_PATTERN_TYPES`
 * order.
 *
 * References:
 * - Perry J & Burnfield JM, Gait Analysis, 2010
 * - Pirker W & Katzenschlager R, Wien Klin Wochenschr, 2017
 */

import { GAIT_PATTERN_TYPES, type GaitPatternType } from "../clinical/ClinicalNorms";

// ============================================================================
// TYPES
// ============================================================================

/** The 14 classifier inputs; `null` = not measured. */
export interface GaitPatternFeatures {
  stanceTimeLeftPercent: number | null;
  stanceTimeRightPercent: number | null;
  stepLengthLeftM: number | null;
  stepLengthRightM: number | null;
  cadenceSPM: number | null;
  avgStepWidthCm: number | null;
  stepWidthVariabilityCm: number | null;
  pelvicObliquityDeg: number | null;
  strideTimeCVPercent: number | null;
  walkingSpeedMPS: number | null;
  strideLengthM: number | null;
  hipFlexionROMDeg: number | null;
  armSwingAsymmetryPercent: number | null;
  kneeFlexionROMDeg: number | null;
}

export const GAIT_PATTERN_FEATURE_KEYS: readonly (keyof GaitPatternFeatures)[] = [
  "stanceTimeLeftPercent",
  "stanceTimeRightPercent",
  "stepLengthLeftM",
  "stepLengthRightM",
  "cadenceSPM",
  "avgStepWidthCm",
  "stepWidthVariabilityCm",
  "pelvicObliquityDeg",
  "strideTimeCVPercent",
  "walkingSpeedMPS",
  "strideLengthM",
  "hipFlexionROMDeg",
  "armSwingAsymmetryPercent",
  "kneeFlexionROMDeg",
];

export type GaitPatternScores = Record<GaitPatternType, number>;

export interface GaitPatternResult {
  primaryPattern: GaitPatternType;
  /** Score of the primary pattern (0–1) */
  confidence: number;
  patternScores: GaitPatternScores;
  /** Findings that contributed to the scores */
  flags: string[];
}

/** Normalized excess (value − start) / span, clamped to ≤ 1. */
function ramp(value: number, start: number, span: number): number {
  return Math.min(1, (value - start) / span);
}

// ============================================================================
// RULES
// ============================================================================

function stanceAsymmetry(f: GaitPatternFeatures): number | null {
  if (f.stanceTimeLeftPercent === null || f.stanceTimeRightPercent === null) return null;
  return Math.abs(f.stanceTimeLeftPercent - f.stanceTimeRightPercent);
}

function antalgic(f: GaitPatternFeatures, flags: string[]): number {
  let score = 0;
  const stance = stanceAsymmetry(f);
  if (stance !== null && stance > 5) {
    score += ramp(stance, 0, 15) * 0.5;
    flags.push(`Stance asymmetry: ${stance.toFixed(1)}%`);
  }
  if (f.stepLengthLeftM !== null && f.stepLengthRightM !== null) {
    const step = Math.abs(f.stepLengthLeftM - f.stepLengthRightM);
    if (step > 0.05) score += ramp(step, 0, 0.15) * 0.3;
  }
  if (f.walkingSpeedMPS !== null && f.walkingSpeedMPS < 0.8) score += 0.2;
  return Math.min(1, score);
}

function trendelenburg(f: GaitPatternFeatures, flags: string[]): number {
  let score = 0;
  if (f.pelvicObliquityDeg !== null && Math.abs(f.pelvicObliquityDeg) > 5) {
    const pelvic = Math.abs(f.pelvicObliquityDeg);
    score += ramp(pelvic, 0, 12) * 0.7;
    flags.push(`Pelvic obliquity: ${pelvic.toFixed(1)}°`);
  }
  // Unilateral: some stance asymmetry, but not gross
  const stance = stanceAsymmetry(f);
  if (stance !== null && stance > 3 && stance < 15) score += 0.3;
  return Math.min(1, score);
}

function festinating(f: GaitPatternFeatures, flags: string[]): number {
  let score = 0;
  if (f.cadenceSPM !== null && f.cadenceSPM > 140) {
    score += ramp(f.cadenceSPM, 140, 40) * 0.4;
    flags.push(`Elevated cadence: ${f.cadenceSPM.toFixed(0)} SPM`);
  }
  if (f.strideLengthM !== null && f.strideLengthM < 0.5) {
    score += Math.min(1, (0.5 - f.strideLengthM) / 0.3) * 0.4;
  }
  if (f.armSwingAsymmetryPercent !== null && f.armSwingAsymmetryPercent > 20) {
    score += 0.2;
    flags.push(`Arm swing asymmetry: ${f.armSwingAsymmetryPercent.toFixed(0)}%`);
  }
  return Math.min(1, score);
}

function ataxic(f: GaitPatternFeatures, flags: string[]): number {
  let score = 0;
  if (f.avgStepWidthCm !== null && f.avgStepWidthCm > 15) {
    score += ramp(f.avgStepWidthCm, 15, 10) * 0.4;
    flags.push(`Wide base: ${f.avgStepWidthCm.toFixed(1)} cm`);
  }
  if (f.stepWidthVariabilityCm !== null && f.stepWidthVariabilityCm > 3) {
    score += ramp(f.stepWidthVariabilityCm, 3, 4) * 0.3;
  }
  if (f.strideTimeCVPercent !== null && f.strideTimeCVPercent > 8) {
    score += ramp(f.strideTimeCVPercent, 8, 10) * 0.3;
  }
  return Math.min(1, score);
}

/** Bilateral Trendelenburg: large pelvic excursion with symmetric, prolonged stance. */
function waddling(f: GaitPatternFeatures): number {
  let score = 0;
  if (f.pelvicObliquityDeg !== null && Math.abs(f.pelvicObliquityDeg) > 8) score += 0.5;
  if (f.avgStepWidthCm !== null && f.avgStepWidthCm > 13) score += 0.3;
  const stance = stanceAsymmetry(f);
  if (
    stance !== null &&
    stance < 3 &&
    ((f.stanceTimeLeftPercent ?? 0) > 63 || (f.stanceTimeRightPercent ?? 0) > 63)
  ) {
    score += 0.2;
  }
  return Math.min(1, score);
}

function circumduction(f: GaitPatternFeatures): number {
  let score = 0;
  if (f.hipFlexionROMDeg !== null && f.hipFlexionROMDeg < 25) {
    score += Math.min(1, (25 - f.hipFlexionROMDeg) / 15) * 0.5;
  }
  if (f.avgStepWidthCm !== null && f.avgStepWidthCm > 13) score += 0.3;
  if (f.walkingSpeedMPS !== null && f.walkingSpeedMPS < 0.7) score += 0.2;
  return Math.min(1, score);
}

/** Normal swing-phase knee flexion ≈ 60–70°. */
function stiffKnee(f: GaitPatternFeatures, circumductionScore: number, flags: string[]): number {
  let score = 0;
  if (f.kneeFlexionROMDeg !== null && f.kneeFlexionROMDeg < 50) {
    score += Math.min(1, (50 - f.kneeFlexionROMDeg) / 30) * 0.5;
    flags.push(`Reduced knee flexion ROM: ${f.kneeFlexionROMDeg.toFixed(0)}°`);
  }
  if (f.hipFlexionROMDeg !== null && f.hipFlexionROMDeg < 25) score += 0.2; // hip compensation
  if (f.walkingSpeedMPS !== null && f.walkingSpeedMPS < 0.8) score += 0.2;
  if (circumductionScore > 0.3) score += 0.1;
  return Math.min(1, score);
}

// ============================================================================
// CLASSIFIER
// ============================================================================

export class GaitPatternClassifier {
  /** Pure: the same features always give the same label, scores and flags. */
  classify(features: GaitPatternFeatures): GaitPatternResult {
    const flags: string[] = [];
    const circumductionScore = circumduction(features);

    const pathological = {
      antalgic: antalgic(features, flags),
      trendelenburg: trendelenburg(features, flags),
      festinating: festinating(features, flags),
      circumduction: circumductionScore,
      ataxic: ataxic(features, flags),
      waddling: waddling(features),
      stiffKnee: stiffKnee(features, circumductionScore, flags),
    } satisfies Record<Exclude<GaitPatternType, "normal">, number>;

    const worst = Math.max(...Object.values(pathological));
    const patternScores: GaitPatternScores = {
      normal: Math.max(0, 1 - worst),
      ...pathological,
    };

    const primaryPattern = selectPrimary(patternScores);
    return {
      primaryPattern,
      confidence: patternScores[primaryPattern],
      patternScores,
      flags,
    };
  }
}

/** Arg-max; the earlier category in declaration order wins a tie. */
export function selectPrimary(scores: GaitPatternScores): GaitPatternType {
  let best: GaitPatternType = GAIT_PATTERN_TYPES[0];
  for (const type of GAIT_PATTERN_TYPES) {
    if (scores[type] > scores[best]) best = type;
  }
  return best;
}

export const gaitPatternClassifier = new GaitPatternClassifier();
