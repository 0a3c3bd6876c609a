/**
 * Normative Data
 *
 * Age- and sex-stratified reference ranges for gait and posture metrics,
 * used to rate a measurement against its population norm.
 *
 * References:
 * - Bohannon RW & Williams Andrews A, Age & Ageing, 2011 (gait speed)
 * - Hollman JH et al., Gait & Posture, 2011 (cadence)
 * - Oberg T et al., J Rehab Res Dev, 1993 (stride length)
 * - Nemmers TM et al., J Geriatr Phys Ther, 2009 (CVA)
 * - Fon GT et al., Radiology, 1980 (thoracic kyphosis)
 */

import bandsJson from "./data/normativeBands.json";
import type { Severity } from "./ClinicalNorms";

// ============================================================================
// TYPES
// ============================================================================

export const NORMATIVE_METRICS = [
  "gaitSpeed",
  "cadence",
  "strideLength",
  "craniovertebralAngle",
  "thoracicKyphosis",
] as const;
export type NormativeMetric = (typeof NORMATIVE_METRICS)[number];

export type BiologicalSex = "male" | "female";

export interface NormalRange {
  low: number;
  high: number;
}

export interface NormativeBand {
  metric: NormativeMetric;
  ageMin: number;
  ageMax: number;
  /** null = applies to both sexes */
  sex: BiologicalSex | null;
  range: NormalRange;
  mildLow: number | null;
  mildHigh: number | null;
}

interface RawBand {
  ageMin: number;
  ageMax: number;
  sex: string | null;
  low: number;
  high: number;
  mildLow: number | null;
  mildHigh: number | null;
}

// ============================================================================
// TABLE LOADING
// ============================================================================

function parseSex(value: string | null): BiologicalSex | null {
  return value === "male" || value === "female" ? value : null;
}

function toBands(metric: NormativeMetric, raw: readonly RawBand[]): NormativeBand[] {
  return raw.map((band) => ({
    metric,
    ageMin: band.ageMin,
    ageMax: band.ageMax,
    sex: parseSex(band.sex),
    range: { low: band.low, high: band.high },
    mildLow: band.mildLow,
    mildHigh: band.mildHigh,
  }));
}

const TABLES: Record<NormativeMetric, NormativeBand[]> = {
  gaitSpeed: toBands("gaitSpeed", bandsJson.gaitSpeed),
  cadence: toBands("cadence", bandsJson.cadence),
  strideLength: toBands("strideLength", bandsJson.strideLength),
  craniovertebralAngle: toBands("craniovertebralAngle", bandsJson.craniovertebralAngle),
  thoracicKyphosis: toBands("thoracicKyphosis", bandsJson.thoracicKyphosis),
};

export function normativeBands(metric: NormativeMetric): readonly NormativeBand[] {
  return TABLES[metric];
}

// ============================================================================
// LOOKUP
// ============================================================================

function midpoint(band: NormativeBand): number {
  return Math.floor((band.ageMin + band.ageMax) / 2);
}

/**
 * Normal range for a metric. Without an age the first band is used;
 * otherwise sex-matched (or sex-agnostic) bands are searched for the age,
 * falling back to the band whose age midpoint is nearest.
 */
export function normalRange(
  metric: NormativeMetric,
  age?: number | null,
  sex?: BiologicalSex | null,
): NormalRange | null {
  const table = TABLES[metric];
  if (age === undefined || age === null) return table[0]?.range ?? null;

  const sexMatched = table.filter(
    (band) => band.sex === null || band.sex === (sex ?? null),
  );
  const pool = sexMatched.length > 0 ? sexMatched : table;

  const exact = pool.find((band) => age >= band.ageMin && age <= band.ageMax);
  if (exact) return exact.range;

  let nearest: NormativeBand | null = null;
  for (const band of pool) {
    if (
      nearest === null ||
      Math.abs(midpoint(band) - age) < Math.abs(midpoint(nearest) - age)
    ) {
      nearest = band;
    }
  }
  return nearest?.range ?? null;
}

/**
 * Rate a value against its normal range by relative deviation
 * (distance outside the band ÷ band span).
 */
export function classifyAgainstNorms(
  value: number,
  metric: NormativeMetric,
  age?: number | null,
  sex?: BiologicalSex | null,
): Severity {
  const range = normalRange(metric, age, sex);
  if (!range) return "normal";
  if (value >= range.low && value <= range.high) return "normal";

  const deviation = value < range.low ? range.low - value : value - range.high;
  const span = range.high - range.low;
  const relative = span > 0 ? deviation / span : deviation;

  if (relative <= 0.25) return "mild";
  if (relative <= 0.75) return "moderate";
  return "severe";
}
