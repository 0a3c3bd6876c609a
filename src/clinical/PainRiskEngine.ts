/**
 * Pain Risk Engine
 *
 * Maps postural and gait deviations to pain risk per body region. Each
 * region adds capped contributions from threshold-triggered findings, lists
 * the findings that fired and picks a recommendation by score band. The
 * overall score is the mean of the three highest regions.
 *
 * References:
 * - Kendall FP et al., Muscles: Testing and Function, 2005
 * - Sahrmann S, Movement System Impairment Syndromes, 2002
 * - Côté P et al., Eur Spine J, 2008 (neck pain)
 * - Hartvigsen J et al., Lancet, 2018 (low back pain)
 */

import { clampScore, type PainRiskRegion, type Severity } from "./ClinicalNorms";

// ============================================================================
// TYPES
// ============================================================================

/** Session-average posture and gait inputs; `null` = not measured. */
export interface PainRiskInput {
  craniovertebralAngleDeg: number | null;
  sagittalVerticalAxisCm: number | null;
  thoracicKyphosisDeg: number | null;
  lumbarLordosisDeg: number | null;
  shoulderAsymmetryCm: number | null;
  pelvicObliquityDeg: number | null;
  pelvicTiltDeg: number | null;
  coronalSpineDeviationCm: number | null;
  kneeFlexionStandingDeg: number | null;
  gaitAsymmetryPercent: number | null;
}

export interface PainRiskAlert {
  region: PainRiskRegion;
  /** 0–100 */
  riskScore: number;
  severity: Severity;
  factors: string[];
  recommendation: string;
}

export interface PainRiskAssessment {
  /** One alert per region, in `PAIN_RISK_REGIONS` order */
  alerts: PainRiskAlert[];
  /** Mean of the top three region scores */
  overallRiskScore: number;
}

/** Score above which a region gets its targeted recommendation. */
const RECOMMENDATION_THRESHOLD = 40;

const RECOMMENDATIONS: Record<PainRiskRegion, string> = {
  neck: "Cervical retraction exercises; monitor workstation ergonomics",
  shoulder: "Scapular stabilization; pectoral stretching",
  upperBack: "Thoracic extension exercises; postural awareness training",
  lowerBack: "Core stabilization; lumbar-pelvic alignment exercises",
  hip: "Hip abductor strengthening; pelvic alignment exercises",
  knee: "Quadriceps strengthening; gait retraining",
};

const MONITOR = "Continue monitoring";

export function painSeverity(score: number): Severity {
  if (score < 25) return "normal";
  if (score < 50) return "mild";
  if (score < 75) return "moderate";
  return "severe";
}

// ============================================================================
// REGION SCORING
// ============================================================================

/** Accumulates capped contributions and their finding strings for one region. */
class RegionScore {
  private risk = 0;
  readonly factors: string[] = [];

  add(contribution: number, cap: number, factor: string): void {
    this.risk += Math.min(cap, contribution);
    this.factors.push(factor);
  }

  toAlert(region: PainRiskRegion): PainRiskAlert {
    const riskScore = clampScore(this.risk);
    return {
      region,
      riskScore,
      severity: painSeverity(riskScore),
      factors: this.factors,
      recommendation: riskScore > RECOMMENDATION_THRESHOLD ? RECOMMENDATIONS[region] : MONITOR,
    };
  }
}

function neck(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const cva = input.craniovertebralAngleDeg;
  if (cva !== null && cva < 45) {
    r.add((45 - cva) * 3, 50, `Forward head posture (CVA ${cva.toFixed(0)}°)`);
  }
  const kyphosis = input.thoracicKyphosisDeg;
  if (kyphosis !== null && kyphosis > 50) {
    r.add((kyphosis - 50) * 2, 25, "Kyphosis-related cervical strain");
  }
  return r.toAlert("neck");
}

function shoulder(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const asymmetry = input.shoulderAsymmetryCm;
  if (asymmetry !== null && asymmetry > 2) {
    r.add((asymmetry - 2) * 10, 40, `Shoulder height asymmetry (${asymmetry.toFixed(1)} cm)`);
  }
  const kyphosis = input.thoracicKyphosisDeg;
  if (kyphosis !== null && kyphosis > 45) {
    r.add((kyphosis - 45) * 2, 30, "Rounded shoulders from kyphosis");
  }
  return r.toAlert("shoulder");
}

function upperBack(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const kyphosis = input.thoracicKyphosisDeg;
  if (kyphosis !== null && kyphosis > 50) {
    r.add((kyphosis - 50) * 3, 50, `Hyperkyphosis (${kyphosis.toFixed(0)}°)`);
  }
  const sva = input.sagittalVerticalAxisCm;
  if (sva !== null && Math.abs(sva) > 5) {
    r.add((Math.abs(sva) - 5) * 5, 30, `Sagittal imbalance (SVA ${sva.toFixed(1)} cm)`);
  }
  return r.toAlert("upperBack");
}

function lowerBack(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const lordosis = input.lumbarLordosisDeg;
  if (lordosis !== null && lordosis > 60) {
    r.add((lordosis - 60) * 3, 30, `Hyperlordosis (${lordosis.toFixed(0)}°)`);
  } else if (lordosis !== null && lordosis < 30) {
    r.add((30 - lordosis) * 2, 30, `Hypolordosis (${lordosis.toFixed(0)}°)`);
  }
  const sva = input.sagittalVerticalAxisCm;
  if (sva !== null && Math.abs(sva) > 7) {
    r.add((Math.abs(sva) - 7) * 5, 25, `Forward lean (SVA ${sva.toFixed(1)} cm)`);
  }
  const tilt = input.pelvicTiltDeg;
  if (tilt !== null && Math.abs(tilt) > 10) {
    r.add((Math.abs(tilt) - 10) * 2, 20, `Pelvic tilt (${tilt.toFixed(1)}°)`);
  }
  const coronal = input.coronalSpineDeviationCm;
  if (coronal !== null && coronal > 1.5) {
    r.add((coronal - 1.5) * 8, 25, `Spinal asymmetry (${coronal.toFixed(1)} cm)`);
  }
  return r.toAlert("lowerBack");
}

function gaitAsymmetryFactor(r: RegionScore, asymmetry: number | null): void {
  if (asymmetry !== null && asymmetry > 15) {
    r.add((asymmetry - 15) * 2, 30, `Gait asymmetry (${asymmetry.toFixed(0)}%)`);
  }
}

function hip(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const obliquity = input.pelvicObliquityDeg;
  if (obliquity !== null && Math.abs(obliquity) > 3) {
    const abs = Math.abs(obliquity);
    r.add((abs - 3) * 8, 40, `Pelvic obliquity (${abs.toFixed(1)}°)`);
  }
  const tilt = input.pelvicTiltDeg;
  if (tilt !== null && Math.abs(tilt) > 15) {
    r.add((Math.abs(tilt) - 15) * 3, 30, `Pelvic tilt (${tilt.toFixed(1)}°)`);
  }
  gaitAsymmetryFactor(r, input.gaitAsymmetryPercent);
  return r.toAlert("hip");
}

function knee(input: PainRiskInput): PainRiskAlert {
  const r = new RegionScore();
  const flexion = input.kneeFlexionStandingDeg;
  if (flexion !== null && flexion > 10) {
    r.add((flexion - 10) * 4, 40, `Knee flexion in standing (${flexion.toFixed(1)}°)`);
  }
  gaitAsymmetryFactor(r, input.gaitAsymmetryPercent);
  return r.toAlert("knee");
}

// ============================================================================
// ENGINE
// ============================================================================

export class PainRiskEngine {
  assess(input: PainRiskInput): PainRiskAssessment {
    const alerts = [neck, shoulder, upperBack, lowerBack, hip, knee].map((region) => region(input));
    return { alerts, overallRiskScore: topThreeMean(alerts.map((a) => a.riskScore)) };
  }
}

export function topThreeMean(scores: readonly number[]): number {
  const top = [...scores].sort((a, b) => b - a).slice(0, 3);
  if (top.length === 0) return 0;
  return top.reduce((sum, s) => sum + s, 0) / top.length;
}

export const painRiskEngine = new PainRiskEngine();
