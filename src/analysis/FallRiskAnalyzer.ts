/**
 * Fall Risk Analyzer
 * ==================
 *
 * Composite fall-risk screening from gait and balance parameters. Each
 * factor yields a 0–100 risk sub-score (0 = no risk); the composite is the
 * weighted mean over the factors that were measured, attenuated when fewer
 * than three are available.
 *
 * References:
 * - Hausdorff JM et al., J NeuroEng Rehabil, 2005 (stride-time CV)
 * - Shumway-Cook A et al., Phys Ther, 2000 (TUG)
 * - Studenski S et al., JAMA, 2011 (gait speed)
 * - Brach JS et al., J Gerontol, 2005 (step-width variability)
 *
 * @module analysis/FallRiskAnalyzer
 */

import {
  BALANCE_THRESHOLDS,
  GAIT_THRESHOLDS,
  clampScore,
  type FallRiskLevel,
} from "../clinical/ClinicalNorms";

// ============================================================================
// INTERFACES
// ============================================================================

/** Session-level inputs; `null` = not measured. */
export interface FallRiskInput {
  walkingSpeedMPS: number | null;
  strideTimeCVPercent: number | null;
  doubleSupportPercent: number | null;
  stepWidthVariabilityCm: number | null;
  swayVelocityMMS: number | null;
  stepAsymmetryPercent: number | null;
  tugTimeSec: number | null;
  footClearanceM: number | null;
}

export type FallRiskFactorKey = keyof FallRiskInput;

export interface FallRiskFactor {
  key: FallRiskFactorKey;
  name: string;
  /** Display value (foot clearance in cm) */
  value: number;
  threshold: number;
  isElevated: boolean;
  weight: number;
  /** 0 = no risk, 100 = maximum */
  subScore: number;
}

export interface FallRiskAssessment {
  /** 0–100, higher = more risk */
  compositeScore: number;
  riskLevel: FallRiskLevel;
  factorBreakdown: FallRiskFactor[];
  riskFactorCount: number;
  /** min(1, factors / 3) */
  coverage: number;
}

// ============================================================================
// FACTOR TABLE
// ============================================================================

interface FactorRule {
  key: FallRiskFactorKey;
  name: string;
  weight: number;
  threshold: number;
  /** Multiplier from input units to display units */
  displayScale: number;
  elevated(value: number): boolean;
  subScore(value: number): number;
}

/** Above threshold: 50 + excess scaled over `span`; below: linear to 50. */
function higherIsWorse(threshold: number, span: number) {
  return {
    elevated: (v: number) => v > threshold,
    subScore: (v: number) =>
      v > threshold ? Math.min(100, ((v - threshold) / span) * 100 + 50) : (v / threshold) * 50,
  };
}

/** Below threshold: deficit fraction × 100; above: partial credit fading over `span`. */
function lowerIsWorse(threshold: number, span: number) {
  return {
    elevated: (v: number) => v < threshold,
    subScore: (v: number) =>
      v < threshold
        ? Math.min(100, (1 - v / threshold) * 100)
        : Math.max(0, (1 - (v - threshold) / span) * 30),
  };
}

const DOUBLE_SUPPORT_BASELINE = 20; // % gait cycle
const FOOT_CLEARANCE_MIN_M = 0.02;

/** Weights sum to 1.0; gait speed and stride variability dominate. */
export const FALL_RISK_FACTORS: readonly FactorRule[] = [
  {
    key: "walkingSpeedMPS",
    name: "Gait Speed",
    weight: 0.25,
    threshold: GAIT_THRESHOLDS.speedFrailty,
    displayScale: 1,
    ...lowerIsWorse(GAIT_THRESHOLDS.speedFrailty, 0.6),
  },
  {
    key: "strideTimeCVPercent",
    name: "Stride Variability",
    weight: 0.2,
    threshold: GAIT_THRESHOLDS.strideTimeCVRisk,
    displayScale: 1,
    ...higherIsWorse(GAIT_THRESHOLDS.strideTimeCVRisk, GAIT_THRESHOLDS.strideTimeCVRisk),
  },
  {
    key: "doubleSupportPercent",
    name: "Double Support",
    weight: 0.1,
    threshold: GAIT_THRESHOLDS.doubleSupportFallRisk,
    displayScale: 1,
    elevated: (v) => v > GAIT_THRESHOLDS.doubleSupportFallRisk,
    subScore: (v) => {
      const t = GAIT_THRESHOLDS.doubleSupportFallRisk;
      return v > t
        ? Math.min(100, ((v - t) / 20) * 100 + 50)
        : Math.max(0, ((v - DOUBLE_SUPPORT_BASELINE) / (t - DOUBLE_SUPPORT_BASELINE)) * 50);
    },
  },
  {
    key: "stepWidthVariabilityCm",
    name: "Step Width Variability",
    weight: 0.1,
    threshold: GAIT_THRESHOLDS.stepWidthVariabilityRisk,
    displayScale: 1,
    ...higherIsWorse(GAIT_THRESHOLDS.stepWidthVariabilityRisk, GAIT_THRESHOLDS.stepWidthVariabilityRisk),
  },
  {
    key: "swayVelocityMMS",
    name: "Trunk Sway",
    weight: 0.1,
    threshold: BALANCE_THRESHOLDS.swayVelocityFallRisk,
    displayScale: 1,
    ...higherIsWorse(BALANCE_THRESHOLDS.swayVelocityFallRisk, BALANCE_THRESHOLDS.swayVelocityFallRisk),
  },
  {
    key: "stepAsymmetryPercent",
    name: "Step Asymmetry",
    weight: 0.1,
    threshold: GAIT_THRESHOLDS.symmetryMaxPercent,
    displayScale: 1,
    ...higherIsWorse(GAIT_THRESHOLDS.symmetryMaxPercent, 20),
  },
  {
    key: "tugTimeSec",
    name: "TUG Time",
    weight: 0.1,
    threshold: GAIT_THRESHOLDS.tugFallRisk,
    displayScale: 1,
    ...higherIsWorse(GAIT_THRESHOLDS.tugFallRisk, 10),
  },
  {
    key: "footClearanceM",
    name: "Foot Clearance",
    weight: 0.05,
    threshold: FOOT_CLEARANCE_MIN_M,
    displayScale: 100, // cm
    ...lowerIsWorse(FOOT_CLEARANCE_MIN_M, 0.05),
  },
];

/** Factors below this count scale the composite down proportionally. */
export const FALL_RISK_MIN_FACTORS = 3;

// ============================================================================
// ANALYZER
// ============================================================================

export class FallRiskAnalyzer {
  assess(input: FallRiskInput): FallRiskAssessment {
    const factors: FallRiskFactor[] = [];

    for (const rule of FALL_RISK_FACTORS) {
      const value = input[rule.key];
      if (value === null || !Number.isFinite(value)) continue;
      factors.push({
        key: rule.key,
        name: rule.name,
        value: value * rule.displayScale,
        threshold: rule.threshold * rule.displayScale,
        isElevated: rule.elevated(value),
        weight: rule.weight,
        subScore: clampScore(rule.subScore(value)),
      });
    }

    const coverage = Math.min(1, factors.length / FALL_RISK_MIN_FACTORS);
    const compositeScore = compositeFromFactors(factors, coverage);
    const riskFactorCount = factors.filter((f) => f.isElevated).length;

    return {
      compositeScore,
      riskLevel: fallRiskLevel(compositeScore, riskFactorCount),
      factorBreakdown: factors,
      riskFactorCount,
      coverage,
    };
  }
}

/** Σ(sᵢ·wᵢ) / Σwᵢ × coverage, clamped to 0–100. */
export function compositeFromFactors(
  factors: ReadonlyArray<Pick<FallRiskFactor, "subScore" | "weight">>,
  coverage: number,
): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const f of factors) {
    weighted += f.subScore * f.weight;
    totalWeight += f.weight;
  }
  if (totalWeight <= 0) return 0;
  return clampScore((weighted / totalWeight) * coverage);
}

export function fallRiskLevel(score: number, elevatedCount: number): FallRiskLevel {
  if (score >= 60 || elevatedCount >= 4) return "high";
  if (score >= 30 || elevatedCount >= 2) return "moderate";
  return "low";
}

export const fallRiskAnalyzer = new FallRiskAnalyzer();
