/**
 * Fatigue Analyzer
 *
 * Detects postural and gait fatigue from session-long trends.
 *
 * Time points (posture score, forward lean, lateral lean, cadence, speed)
 * are sampled at most every 2 s. The fatigue index (0-100) adds up capped
 * contributions that only count when they point toward degradation:
 * - Posture-score drop, first vs last third (≤ 40)
 * - Posture variability increase, first vs last third (≤ 20)
 * - Forward-lean slope increase (≤ 15)
 * - Walking-speed slope decrease (≤ 10)
 * - Cadence change between thirds beyond 5 % (≤ 10)
 * - Lateral-lean slope increase (≤ 5)
 *
 * References:
 * - Granacher U et al., Gerontology, 2011 (postural fatigue)
 * - Yoshino K et al., Gait & Posture, 2004 (gait fatigue)
 */

import { linearRegression, mean, standardDeviation } from "../lib/math/stats";

// ============================================
// Types
// ============================================

export interface FatigueTimePoint {
  timestamp: number;
  postureScore: number;
  trunkLeanDeg: number;
  lateralLeanDeg: number;
  cadenceSPM: number;
  walkingSpeedMPS: number;
}

export interface FatigueAssessment {
  /** 0-100, higher = more fatigued */
  fatigueIndex: number;
  postureVariabilitySD: number;
  /** Negative = posture deteriorating */
  postureTrendSlope: number;
  postureTrendR2: number;
  cadenceTrendSlope: number;
  speedTrendSlope: number;
  /** Positive = increasing forward lean */
  forwardLeanTrendSlope: number;
  lateralSwayTrendSlope: number;
  isFatigued: boolean;
}

export interface FatigueConfig {
  /** Minimum time points for trend analysis */
  minSamples: number;
  /** Minimum spacing between recorded time points (s) */
  samplingIntervalSec: number;
  /** Index above which the session counts as fatigued */
  fatigueThreshold: number;
}

const DEFAULT_CONFIG: FatigueConfig = {
  minSamples: 20,
  samplingIntervalSec: 2.0,
  fatigueThreshold: 25,
};

const EMPTY_ASSESSMENT: FatigueAssessment = {
  fatigueIndex: 0,
  postureVariabilitySD: 0,
  postureTrendSlope: 0,
  postureTrendR2: 0,
  cadenceTrendSlope: 0,
  speedTrendSlope: 0,
  forwardLeanTrendSlope: 0,
  lateralSwayTrendSlope: 0,
  isFatigued: false,
};

// ============================================
// Analyzer
// ============================================

export class FatigueAnalyzer {
  private config: FatigueConfig;
  private lastRecordedTime = -Infinity;
  private points: FatigueTimePoint[] = [];

  constructor(config: Partial<FatigueConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get timePointCount(): number {
    return this.points.length;
  }

  get hasEnoughData(): boolean {
    return this.points.length >= this.config.minSamples;
  }

  /** Returns false when the point fell inside the sampling interval. */
  recordTimePoint(point: FatigueTimePoint): boolean {
    if (point.timestamp - this.lastRecordedTime < this.config.samplingIntervalSec) return false;
    this.lastRecordedTime = point.timestamp;
    this.points.push({ ...point, lateralLeanDeg: Math.abs(point.lateralLeanDeg) });
    return true;
  }

  assess(): FatigueAssessment {
    if (this.points.length < this.config.minSamples) return { ...EMPTY_ASSESSMENT };
    return assessFatigue(this.points, this.config.fatigueThreshold);
  }

  reset(): void {
    this.points = [];
    this.lastRecordedTime = -Infinity;
  }
}

/**
 * Fatigue assessment over an already-sampled series. Needs at least three
 * points for the thirds comparison to be meaningful.
 */
export function assessFatigue(
  points: readonly FatigueTimePoint[],
  fatigueThreshold = DEFAULT_CONFIG.fatigueThreshold,
): FatigueAssessment {
  const posture = points.map((p) => p.postureScore);
  const lean = points.map((p) => p.trunkLeanDeg);
  const lateral = points.map((p) => Math.abs(p.lateralLeanDeg));
  const cadence = points.map((p) => p.cadenceSPM);
  const speed = points.map((p) => p.walkingSpeedMPS);

  const postureTrend = linearRegression(posture);
  const cadenceTrend = linearRegression(cadence);
  const speedTrend = linearRegression(speed);
  const leanTrend = linearRegression(lean);
  const lateralTrend = linearRegression(lateral);

  const third = Math.floor(points.length / 3);
  const first = <T>(xs: readonly T[]) => xs.slice(0, third);
  const last = <T>(xs: readonly T[]) => (third > 0 ? xs.slice(-third) : []);

  let index = 0;

  const postureDrop = mean(first(posture)) - mean(last(posture));
  if (postureDrop > 0) index += Math.min(40, postureDrop * 4); // 10-point drop = max

  const sdIncrease = standardDeviation(last(posture)) - standardDeviation(first(posture));
  if (sdIncrease > 0) index += Math.min(20, sdIncrease * 10);

  if (leanTrend.slope > 0) index += Math.min(15, leanTrend.slope * 50);

  if (speedTrend.slope < 0) index += Math.min(10, Math.abs(speedTrend.slope) * 100);

  // Faster-shorter steps and slowing down both count
  const cadenceFirst = mean(first(cadence));
  const cadenceLast = mean(last(cadence));
  const cadenceChangePct =
    cadenceFirst > 0 ? (Math.abs(cadenceLast - cadenceFirst) / cadenceFirst) * 100 : 0;
  if (cadenceChangePct > 5) index += Math.min(10, cadenceChangePct * 1.5);

  if (lateralTrend.slope > 0) index += Math.min(5, lateralTrend.slope * 25);

  return {
    fatigueIndex: Math.min(100, Math.max(0, index)),
    postureVariabilitySD: standardDeviation(posture),
    postureTrendSlope: postureTrend.slope,
    postureTrendR2: postureTrend.rSquared,
    cadenceTrendSlope: cadenceTrend.slope,
    speedTrendSlope: speedTrend.slope,
    forwardLeanTrendSlope: leanTrend.slope,
    lateralSwayTrendSlope: lateralTrend.slope,
    isFatigued: index > fatigueThreshold || (postureDrop > 5 && postureTrend.rSquared > 0.3),
  };
}

export const fatigueAnalyzer = new FatigueAnalyzer();
