/**
 * Clinical Posture & Gait Norms
 *
 * Severity ladders, composite scoring weights and categorical vocabularies
 * shared by every analyzer.
 *
 * References:
 * - Yip CH et al., Manual Therapy, 2008 (craniovertebral angle)
 * - Glassman SD et al., Spine, 2005 (sagittal vertical axis)
 * - Fon GT et al., Radiology, 1980 (thoracic kyphosis)
 * - Kendall FP et al., Muscles: Testing and Function, 2005 (postural types)
 * - Perry J & Burnfield JM, Gait Analysis, 2010 (gait ROM limits)
 * - Studenski S et al., JAMA, 2011 (gait speed)
 * - Hignett S & McAtamney L, Applied Ergonomics, 2000 (REBA)
 */

// ============================================================================
// SEVERITY
// ============================================================================

export const SEVERITY_LEVELS = ["normal", "mild", "moderate", "severe"] as const;
export type Severity = (typeof SEVERITY_LEVELS)[number];

export function severityOrdinal(severity: Severity): number {
  return SEVERITY_LEVELS.indexOf(severity);
}

/** 0 → normal, 1 → mild, 2 → moderate, anything else → severe. */
export function severityFromOrdinal(ordinal: number): Severity {
  switch (ordinal) {
    case 0:
      return "normal";
    case 1:
      return "mild";
    case 2:
      return "moderate";
    default:
      return "severe";
  }
}

export function worstSeverity(a: Severity, b: Severity): Severity {
  return severityFromOrdinal(Math.max(severityOrdinal(a), severityOrdinal(b)));
}

/** Three ascending upper bounds: ≤ normal, ≤ mild, ≤ moderate, else severe. */
type Ladder = readonly [normal: number, mild: number, moderate: number];

function ladderInclusive(value: number, [n, m, mod]: Ladder): Severity {
  if (value <= n) return "normal";
  if (value <= m) return "mild";
  if (value <= mod) return "moderate";
  return "severe";
}

function ladderExclusive(value: number, [n, m, mod]: Ladder): Severity {
  if (value < n) return "normal";
  if (value < m) return "mild";
  if (value < mod) return "moderate";
  return "severe";
}

/** Lower is worse: ≥ normal, ≥ mild, ≥ moderate, else severe. */
function ladderDescending(value: number, [n, m, mod]: Ladder): Severity {
  if (value >= n) return "normal";
  if (value >= m) return "mild";
  if (value >= mod) return "moderate";
  return "severe";
}

// ============================================================================
// POSTURE SEVERITY LADDERS
// ============================================================================

export function cvaSeverity(deg: number): Severity {
  return ladderDescending(deg, [49, 40, 30]);
}

export function svaSeverity(cm: number): Severity {
  return ladderExclusive(Math.abs(cm), [5, 7, 9.5]);
}

export function trunkLeanSeverity(deg: number): Severity {
  return ladderInclusive(Math.abs(deg), [5, 10, 20]);
}

export function lateralLeanSeverity(deg: number): Severity {
  return ladderInclusive(Math.abs(deg), [2, 5, 10]);
}

export function shoulderAsymmetrySeverity(cm: number): Severity {
  return ladderInclusive(Math.abs(cm), [1.5, 3, 5]);
}

export function pelvicObliquitySeverity(deg: number): Severity {
  return ladderInclusive(Math.abs(deg), [1, 3, 5]);
}

export function kyphosisSeverity(deg: number): Severity {
  if (deg >= 20 && deg <= 45) return "normal";
  if (deg < 20) return deg < 10 ? "moderate" : "mild";
  if (deg <= 55) return "mild";
  if (deg <= 70) return "moderate";
  return "severe";
}

export function lordosisSeverity(deg: number): Severity {
  if (deg >= 40 && deg <= 60) return "normal";
  if ((deg >= 25 && deg < 40) || (deg > 60 && deg <= 70)) return "mild";
  if ((deg >= 20 && deg < 25) || (deg > 70 && deg <= 80)) return "moderate";
  return "severe";
}

export function coronalDeviationSeverity(cm: number): Severity {
  return ladderInclusive(Math.abs(cm), [1, 2, 3.5]);
}

export function shoulderProtractionSeverity(cm: number): Severity {
  return ladderInclusive(Math.max(0, cm), [2, 4, 6]);
}

export function kneeAlignmentSeverity(deg: number): Severity {
  return ladderInclusive(Math.abs(deg), [5, 10, 15]);
}

// ============================================================================
// GAIT SEVERITY LADDERS
// ============================================================================

export function walkingSpeedSeverity(mps: number): Severity {
  return ladderDescending(mps, [1.0, 0.8, 0.6]);
}

export function gaitAsymmetrySeverity(percent: number): Severity {
  return ladderInclusive(Math.abs(percent), [10, 15, 25]);
}

// ============================================================================
// THRESHOLD TABLES
// ============================================================================

export const GAIT_THRESHOLDS = {
  speedNormalMin: 1.0, // m/s
  speedNormalMax: 1.4, // m/s
  speedFrailty: 0.8, // m/s
  speedSevere: 0.6, // m/s
  speedHousehold: 0.4, // m/s
  cadenceNormalMin: 100, // steps/min
  cadenceNormalMax: 130, // steps/min
  doubleSupportNormalMin: 20, // % gait cycle
  doubleSupportNormalMax: 30, // % gait cycle
  doubleSupportFallRisk: 30, // % gait cycle
  stanceNormalMin: 58, // % gait cycle
  stanceNormalMax: 62, // % gait cycle
  symmetryMaxPercent: 10,
  stepWidthNormalMin: 5, // cm
  stepWidthNormalMax: 13, // cm
  stepWidthVariabilityRisk: 2.5, // cm SD
  strideTimeCVRisk: 5, // %
  trunkSwayRisk: 3.5, // deg
  tugFallRisk: 13.5, // s
  armSwingAsymmetryRisk: 10, // %
  walkRatioNormal: 0.0064, // m/(steps/min)
} as const;

export const GAIT_ROM_LIMITS = {
  hipFlexionMin: 30, // deg
  hipFlexionMax: 40, // deg
  kneeSwingFlexionMin: 60, // deg
  kneeSwingFlexionMax: 70, // deg
  pelvicTiltExcursion: 5, // deg
  trunkRotationMin: 5, // deg per side
  trunkRotationMax: 8, // deg per side
  romAsymmetryThreshold: 5, // deg
} as const;

export const BALANCE_THRESHOLDS = {
  swayVelocityYoungMin: 5, // mm/s
  swayVelocityYoungMax: 10, // mm/s
  swayVelocityElderlyMin: 10, // mm/s
  swayVelocityElderlyMax: 20, // mm/s
  swayVelocityFallRisk: 25, // mm/s
  swayAreaFallRisk: 5, // cm²
  rombergRatioAbnormal: 2.0,
} as const;

// ============================================================================
// CATEGORICAL VOCABULARIES
// ============================================================================

export type PosturalType = "ideal" | "kyphosisLordosis" | "flatBack" | "swayBack";

export type FallRiskLevel = "low" | "moderate" | "high";

export const PAIN_RISK_REGIONS = [
  "neck",
  "shoulder",
  "upperBack",
  "lowerBack",
  "hip",
  "knee",
] as const;
export type PainRiskRegion = (typeof PAIN_RISK_REGIONS)[number];

export type CrossedSyndromeType = "upperCrossed" | "lowerCrossed";

/** Declaration order doubles as the classifier's tie-break order. */
export const GAIT_PATTERN_TYPES = [
  "normal",
  "antalgic",
  "trendelenburg",
  "festinating",
  "circumduction",
  "ataxic",
  "waddling",
  "stiffKnee",
] as const;
export type GaitPatternType = (typeof GAIT_PATTERN_TYPES)[number];

export function isGaitPatternType(value: string): value is GaitPatternType {
  return GAIT_PATTERN_TYPES.some((type) => type === value);
}

export type REBARiskLevel = "negligible" | "low" | "medium" | "high" | "veryHigh";

export function rebaRiskLevel(score: number): REBARiskLevel {
  if (score <= 1) return "negligible";
  if (score <= 3) return "low";
  if (score <= 7) return "medium";
  if (score <= 10) return "high";
  return "veryHigh";
}

// ============================================================================
// POSTURE COMPOSITE
// ============================================================================

export interface PostureCompositeInput {
  craniovertebralAngleDeg: number | null;
  sagittalVerticalAxisCm: number | null;
  sagittalTrunkLeanDeg: number | null;
  frontalTrunkLeanDeg: number | null;
  shoulderAsymmetryCm: number | null;
  thoracicKyphosisDeg: number | null;
  pelvicObliquityDeg: number | null;
  lumbarLordosisDeg: number | null;
  coronalSpineDeviationCm: number | null;
}

interface CompositeFactor {
  key: keyof PostureCompositeInput;
  weight: number;
  ideal: number;
  maxDeviation: number;
  absolute: boolean;
}

/** Weights sum to 1.0. */
export const POSTURE_COMPOSITE_FACTORS: readonly CompositeFactor[] = [
  { key: "craniovertebralAngleDeg", weight: 0.22, ideal: 52.5, maxDeviation: 25, absolute: false },
  { key: "sagittalVerticalAxisCm", weight: 0.22, ideal: 0, maxDeviation: 12, absolute: true },
  { key: "sagittalTrunkLeanDeg", weight: 0.13, ideal: 0, maxDeviation: 25, absolute: true },
  { key: "frontalTrunkLeanDeg", weight: 0.08, ideal: 0, maxDeviation: 15, absolute: true },
  { key: "shoulderAsymmetryCm", weight: 0.08, ideal: 0, maxDeviation: 6, absolute: true },
  { key: "thoracicKyphosisDeg", weight: 0.1, ideal: 32.5, maxDeviation: 40, absolute: false },
  { key: "pelvicObliquityDeg", weight: 0.05, ideal: 0, maxDeviation: 8, absolute: true },
  { key: "lumbarLordosisDeg", weight: 0.07, ideal: 50, maxDeviation: 35, absolute: false },
  { key: "coronalSpineDeviationCm", weight: 0.05, ideal: 0, maxDeviation: 6, absolute: true },
];

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/** 100 at the ideal, falling linearly to 0 at `maxDeviation` away. */
export function factorSubScore(
  measured: number,
  ideal: number,
  maxDeviation: number,
): number {
  return clampScore(100 * (1 - Math.abs(measured - ideal) / maxDeviation));
}

export interface PostureComposite {
  score: number;
  /** Fraction of total weight that had an input (0-1) */
  coverage: number;
  subScores: Partial<Record<keyof PostureCompositeInput, number>>;
}

/**
 * Weighted posture score over the factors that have a measurement. Absent
 * factors leave both the numerator and the weight sum.
 */
export function computePostureComposite(
  input: PostureCompositeInput,
): PostureComposite {
  let weighted = 0;
  let weightSum = 0;
  const subScores: PostureComposite["subScores"] = {};

  for (const factor of POSTURE_COMPOSITE_FACTORS) {
    const raw = input[factor.key];
    if (raw === null || !Number.isFinite(raw)) continue;
    const measured = factor.absolute ? Math.abs(raw) : raw;
    const sub = factorSubScore(measured, factor.ideal, factor.maxDeviation);
    subScores[factor.key] = sub;
    weighted += sub * factor.weight;
    weightSum += factor.weight;
  }

  return {
    score: weightSum > 0 ? clampScore(weighted / weightSum) : 0,
    coverage: weightSum,
    subScores,
  };
}

// ============================================================================
// KENDALL POSTURAL TYPE
// ============================================================================

export interface KendallInput {
  thoracicKyphosisDeg: number;
  lumbarLordosisDeg: number;
  craniovertebralAngleDeg: number | null;
  sagittalVerticalAxisCm: number | null;
  headForwardCm: number | null;
  shoulderProtractionCm: number | null;
  pelvicTiltDeg: number | null;
}

export function classifyKendall(input: KendallInput): PosturalType {
  const forwardHead =
    input.headForwardCm !== null
      ? input.headForwardCm > 3
      : input.craniovertebralAngleDeg !== null &&
        cvaSeverity(input.craniovertebralAngleDeg) !== "normal";
  const forwardShoulder =
    input.shoulderProtractionCm !== null
      ? input.shoulderProtractionCm > 2
      : input.sagittalVerticalAxisCm !== null &&
        svaSeverity(input.sagittalVerticalAxisCm) !== "normal";

  const highKyphosis = input.thoracicKyphosisDeg > 45;
  const highLordosis = input.lumbarLordosisDeg > 55;
  const lowLordosis = input.lumbarLordosisDeg < 35;
  const posteriorPelvic = input.pelvicTiltDeg !== null && input.pelvicTiltDeg < -5;

  if (forwardHead && forwardShoulder && highKyphosis && highLordosis) {
    return "kyphosisLordosis";
  }
  if (lowLordosis && !highKyphosis) {
    return "flatBack";
  }
  if (forwardHead && (posteriorPelvic || lowLordosis) && !forwardShoulder) {
    return "swayBack";
  }
  return "ideal";
}

// ============================================================================
// NEW YORK POSTURE RATING
// ============================================================================

export const NYPR_ITEMS = [
  "headTilt",
  "headRotation",
  "shoulderLevel",
  "cervicalScoliosis",
  "thoracicKyphosis",
  "trunkAlignment",
  "shoulderProtraction",
  "hipLevel",
  "kneeAlignment",
] as const;
export type NYPRItem = (typeof NYPR_ITEMS)[number];

export const NYPR_POINTS_PER_ITEM = 5;

function nyprPoints(severity: Severity): number {
  switch (severity) {
    case "normal":
      return 5;
    case "mild":
    case "moderate":
      return 3;
    case "severe":
      return 1;
  }
}

export interface NYPRResult {
  score: number;
  maxScore: number;
  itemsAssessed: number;
}

/** Items without a severity are not assessed and do not count toward max. */
export function computeNYPR(
  items: Partial<Record<NYPRItem, Severity>>,
): NYPRResult {
  let score = 0;
  let assessed = 0;
  for (const item of NYPR_ITEMS) {
    const severity = items[item];
    if (severity === undefined) continue;
    score += nyprPoints(severity);
    assessed++;
  }
  return {
    score,
    maxScore: assessed * NYPR_POINTS_PER_ITEM,
    itemsAssessed: assessed,
  };
}
