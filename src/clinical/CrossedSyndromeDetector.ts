/**
 * Crossed Syndrome Detector
 *
 * Janda's upper crossed (forward head, protracted shoulders, kyphosis) and
 * lower crossed (anterior pelvic tilt, lumbar hyperlordosis, hip flexor
 * tightness) syndromes from posture markers. Each syndrome scores 0–100
 * from capped contributions and is reported at 40 or above.
 *
 * References:
 * - Janda V, Muscles and Motor Control in Cervicogenic Disorders, 1994
 * - Page P et al., Assessment and Treatment of Muscle Imbalance, 2010
 */

import { clampScore, type CrossedSyndromeType } from "./ClinicalNorms";

export interface CrossedSyndromeInput {
  craniovertebralAngleDeg: number | null;
  shoulderProtractionCm: number | null;
  thoracicKyphosisDeg: number | null;
  cervicalLordosisDeg: number | null;
  /** + = anterior */
  pelvicTiltDeg: number | null;
  lumbarLordosisDeg: number | null;
  /** Resting hip flexion; > 0 suggests tight hip flexors */
  hipFlexionRestDeg: number | null;
}

export const CROSSED_SYNDROME_FEATURE_KEYS: readonly (keyof CrossedSyndromeInput)[] = [
  "craniovertebralAngleDeg",
  "shoulderProtractionCm",
  "thoracicKyphosisDeg",
  "cervicalLordosisDeg",
  "pelvicTiltDeg",
  "lumbarLordosisDeg",
  "hipFlexionRestDeg",
];

export interface CrossedSyndromeResult {
  upperCrossedScore: number;
  lowerCrossedScore: number;
  detectedSyndromes: CrossedSyndromeType[];
  upperFactors: string[];
  lowerFactors: string[];
}

export const CROSSED_SYNDROME_DETECTION_THRESHOLD = 40;

interface Finding {
  /** null = input missing or below trigger */
  contribution: number | null;
  factor: string;
}

function finding(
  value: number | null,
  trigger: (v: number) => boolean,
  contribution: (v: number) => number,
  cap: number,
  label: (v: number) => string,
): Finding {
  if (value === null || !trigger(value)) return { contribution: null, factor: "" };
  return { contribution: Math.min(cap, contribution(value)), factor: label(value) };
}

function total(findings: readonly Finding[]): { score: number; factors: string[] } {
  let score = 0;
  const factors: string[] = [];
  for (const f of findings) {
    if (f.contribution === null) continue;
    score += f.contribution;
    factors.push(f.factor);
  }
  return { score: clampScore(score), factors };
}

export class CrossedSyndromeDetector {
  detect(input: CrossedSyndromeInput): CrossedSyndromeResult {
    const upper = total([
      finding(
        input.craniovertebralAngleDeg,
        (cva) => cva < 45,
        (cva) => (45 - cva) * 2,
        30,
        (cva) => `Forward head (CVA ${cva.toFixed(1)}°)`,
      ),
      finding(
        input.shoulderProtractionCm,
        (cm) => cm > 2,
        (cm) => (cm - 2) * 5,
        25,
        (cm) => `Shoulder protraction (${cm.toFixed(1)} cm)`,
      ),
      finding(
        input.thoracicKyphosisDeg,
        (deg) => deg > 45,
        (deg) => (deg - 45) * 2,
        25,
        (deg) => `Increased kyphosis (${deg.toFixed(1)}°)`,
      ),
      finding(
        input.cervicalLordosisDeg,
        (deg) => deg > 20,
        (deg) => (deg - 20) * 2,
        20,
        (deg) => `Cervical hyperlordosis (${deg.toFixed(1)}°)`,
      ),
    ]);

    const lower = total([
      finding(
        input.pelvicTiltDeg,
        (deg) => deg > 10,
        (deg) => (deg - 10) * 3,
        35,
        (deg) => `Anterior pelvic tilt (${deg.toFixed(1)}°)`,
      ),
      finding(
        input.lumbarLordosisDeg,
        (deg) => deg > 60,
        (deg) => (deg - 60) * 2.5,
        35,
        (deg) => `Lumbar hyperlordosis (${deg.toFixed(1)}°)`,
      ),
      finding(
        input.hipFlexionRestDeg,
        (deg) => deg > 5,
        (deg) => (deg - 5) * 3,
        30,
        (deg) => `Hip flexor tightness (${deg.toFixed(1)}°)`,
      ),
    ]);

    const detectedSyndromes: CrossedSyndromeType[] = [];
    if (upper.score >= CROSSED_SYNDROME_DETECTION_THRESHOLD) detectedSyndromes.push("upperCrossed");
    if (lower.score >= CROSSED_SYNDROME_DETECTION_THRESHOLD) detectedSyndromes.push("lowerCrossed");

    return {
      upperCrossedScore: upper.score,
      lowerCrossedScore: lower.score,
      detectedSyndromes,
      upperFactors: upper.factors,
      lowerFactors: lower.factors,
    };
  }
}

export const crossedSyndromeDetector = new CrossedSyndromeDetector();
