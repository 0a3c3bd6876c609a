/**
 * Session Finalizer
 * =================
 *
 * Runs once per capture, after stop: reduces the recorder's buffers and the
 * per-session analyzers into session-level inputs, invokes every
 * session-level analyzer a single time and builds the summary record.
 * Pure with respect to its inputs; persistence happens in the caller.
 */

import type { FallRiskAssessment, FallRiskInput } from "../analysis/FallRiskAnalyzer";
import type { FatigueAssessment } from "../analysis/FatigueAnalyzer";
import type { GaitPatternFeatures, GaitPatternResult } from "../analysis/GaitPatternClassifier";
import type { ROMSessionSummary } from "../analysis/ROMAnalyzer";
import type { SmoothnessMetrics } from "../analysis/SmoothnessAnalyzer";
import type { TrunkMotionMetrics } from "../analysis/TrunkMotionAnalyzer";
import { cardioEstimator, type CardioEstimate } from "../clinical/CardioEstimator";
import {
  rebaRiskLevel,
  type PostureComposite,
  type PostureCompositeInput,
  type PosturalType,
} from "../clinical/ClinicalNorms";
import type { CrossedSyndromeInput, CrossedSyndromeResult } from "../clinical/CrossedSyndromeDetector";
import { frailtyScreener, type FrailtyScreeningResult } from "../clinical/FrailtyScreener";
import type { BiologicalSex } from "../clinical/NormativeData";
import { painRiskEngine, type PainRiskAssessment } from "../clinical/PainRiskEngine";
import { captureLog } from "../lib/logger";
import { mean, standardDeviation } from "../lib/math/stats";
import { createSessionAnalyzers, type SessionAnalyzers } from "../ml/DualPathAnalyzers";
import type { BodyFrame, BodyFrameMetric, StepEvent } from "../models/frames";
import { SESSION_SCHEMA_VERSION, type SessionRecord, type SessionTimeSeries } from "../models/session";
import type { CaptureAnalyzers } from "./CaptureAnalyzers";
import type { RecorderSnapshot } from "./SessionRecorder";

// ============================================================================
// TYPES
// ============================================================================

/** Optional demographics; unknown fields fall back to population defaults. */
export interface SubjectProfile {
  heightM: number | null;
  weightKg: number | null;
  ageYears: number | null;
  sex: BiologicalSex | null;
}

export const UNKNOWN_SUBJECT: SubjectProfile = {
  heightM: null,
  weightKg: null,
  ageYears: null,
  sex: null,
};

export interface FinalizeInput {
  snapshot: RecorderSnapshot;
  analyzers: CaptureAnalyzers;
  profile?: SubjectProfile;
}

/** Full session-level results; the record keeps only their headline values. */
export interface SessionAssessments {
  posture: PostureComposite | null;
  fallRisk: FallRiskAssessment | null;
  gaitPattern: GaitPatternResult | null;
  fatigue: FatigueAssessment | null;
  crossedSyndrome: CrossedSyndromeResult | null;
  painRisk: PainRiskAssessment | null;
  frailty: FrailtyScreeningResult | null;
  cardio: CardioEstimate | null;
  rom: ROMSessionSummary;
  trunkMotion: TrunkMotionMetrics;
  smoothness: SmoothnessMetrics | null;
}

export interface SessionFinalization {
  record: SessionRecord;
  series: SessionTimeSeries;
  assessments: SessionAssessments;
}

/** Fewer steps than this give no gait pattern. */
export const MIN_STEPS_FOR_GAIT_PATTERN = 4;

// ============================================================================
// REDUCERS
// ============================================================================

function presentValues(frames: readonly BodyFrame[], key: BodyFrameMetric): number[] {
  const values: number[] = [];
  for (const frame of frames) {
    const v = frame[key];
    if (v !== null) values.push(v);
  }
  return values;
}

/** Mean of the frames that carry a value; null when none does. */
export function averageMetric(frames: readonly BodyFrame[], key: BodyFrameMetric): number | null {
  const values = presentValues(frames, key);
  return values.length > 0 ? mean(values) : null;
}

export function peakMetric(frames: readonly BodyFrame[], key: BodyFrameMetric): number | null {
  const values = presentValues(frames, key);
  return values.length > 0 ? Math.max(...values) : null;
}

/** Most frequent postural type; the earliest seen wins a tie. */
export function dominantPosturalType(frames: readonly BodyFrame[]): PosturalType | null {
  const counts = new Map<PosturalType, number>();
  for (const frame of frames) {
    if (frame.posturalType !== null) {
      counts.set(frame.posturalType, (counts.get(frame.posturalType) ?? 0) + 1);
    }
  }
  let best: PosturalType | null = null;
  let bestCount = 0;
  for (const [type, count] of counts) {
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

function meanFootClearance(steps: readonly StepEvent[]): number | null {
  const values = steps.flatMap((s) => (s.footClearanceM === null ? [] : [s.footClearanceM]));
  return values.length > 0 ? mean(values) : null;
}

function positiveOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && value > 0 ? value : null;
}

// ============================================================================
// FINALIZER
// ============================================================================

export class SessionFinalizer {
  constructor(
    private readonly sessionAnalyzers: SessionAnalyzers = createSessionAnalyzers(),
    private readonly createId: () => string = () =>
      `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
  ) {}

  finalize(input: FinalizeInput): SessionFinalization {
    const { snapshot, analyzers } = input;
    const profile = input.profile ?? UNKNOWN_SUBJECT;
    const { frames, steps } = snapshot;
    const gait = analyzers.gait.sessionSummary();
    const avg = (key: BodyFrameMetric) => averageMetric(frames, key);

    const cadence = positiveOrNull(gait.cadenceSPM);
    const stride = positiveOrNull(gait.avgStrideLengthM);
    const speed = positiveOrNull(gait.walkingSpeedMPS);
    const strideTimeCV = gait.strideTimeCVPercent;
    const stepAsymmetry = gait.stepAsymmetryPercent;
    const stepWidths = analyzers.gait.getStepWidths();
    const stepWidthSD = stepWidths.length >= 2 ? standardDeviation(stepWidths) : null;
    const swayVelocity = avg("swayVelocityMMS");

    // Posture
    const postureInput: PostureCompositeInput = {
      craniovertebralAngleDeg: avg("craniovertebralAngleDeg"),
      sagittalVerticalAxisCm: avg("sagittalVerticalAxisCm"),
      sagittalTrunkLeanDeg: avg("sagittalTrunkLeanDeg"),
      frontalTrunkLeanDeg: avg("frontalTrunkLeanDeg"),
      shoulderAsymmetryCm: avg("shoulderAsymmetryCm"),
      thoracicKyphosisDeg: avg("thoracicKyphosisDeg"),
      pelvicObliquityDeg: avg("pelvicObliquityDeg"),
      lumbarLordosisDeg: avg("lumbarLordosisDeg"),
      coronalSpineDeviationCm: avg("coronalSpineDeviationCm"),
    };
    const hasPosture = postureInput.craniovertebralAngleDeg !== null;
    const posture = hasPosture ? this.sessionAnalyzers.posture.run(postureInput) : null;

    // Fall risk
    const fallRiskInput: FallRiskInput = {
      walkingSpeedMPS: speed,
      strideTimeCVPercent: strideTimeCV,
      doubleSupportPercent: gait.doubleSupportPercent,
      stepWidthVariabilityCm: stepWidthSD,
      swayVelocityMMS: swayVelocity,
      stepAsymmetryPercent: stepAsymmetry,
      tugTimeSec: null,
      footClearanceM: meanFootClearance(steps),
    };
    const fallRiskCandidate = this.sessionAnalyzers.fallRisk.run(fallRiskInput);
    const fallRisk = fallRiskCandidate.factorBreakdown.length > 0 ? fallRiskCandidate : null;

    // Gait pattern
    const rom = analyzers.rom.sessionSummary();
    let gaitPattern: GaitPatternResult | null = null;
    if (steps.length >= MIN_STEPS_FOR_GAIT_PATTERN) {
      const features: GaitPatternFeatures = {
        stanceTimeLeftPercent: gait.stanceTimeLeftPercent,
        stanceTimeRightPercent: gait.stanceTimeRightPercent,
        stepLengthLeftM: gait.avgStepLengthLeftM,
        stepLengthRightM: gait.avgStepLengthRightM,
        cadenceSPM: cadence,
        avgStepWidthCm: stepWidths.length > 0 ? mean(stepWidths) : null,
        stepWidthVariabilityCm: stepWidthSD,
        pelvicObliquityDeg: postureInput.pelvicObliquityDeg,
        strideTimeCVPercent: strideTimeCV,
        walkingSpeedMPS: speed,
        strideLengthM: stride,
        hipFlexionROMDeg: positiveOrNull(0.5 * (rom.hipROMLeftDeg + rom.hipROMRightDeg)),
        armSwingAsymmetryPercent: rom.armSwingAsymmetryPercent,
        kneeFlexionROMDeg: positiveOrNull(0.5 * (rom.kneeROMLeftDeg + rom.kneeROMRightDeg)),
      };
      gaitPattern = this.sessionAnalyzers.gaitPattern.run(features);
    }

    // Fatigue
    const fatigue = analyzers.fatigue.hasEnoughData
      ? this.sessionAnalyzers.fatigue.run(analyzers.fatigue)
      : null;

    // Crossed syndromes and pain risk
    const pelvicTilt = avg("pelvicTiltDeg");
    let crossedSyndrome: CrossedSyndromeResult | null = null;
    let painRisk: PainRiskAssessment | null = null;
    if (hasPosture) {
      const crossedInput: CrossedSyndromeInput = {
        craniovertebralAngleDeg: postureInput.craniovertebralAngleDeg,
        shoulderProtractionCm: avg("shoulderProtractionCm"),
        thoracicKyphosisDeg: postureInput.thoracicKyphosisDeg,
        cervicalLordosisDeg: null,
        pelvicTiltDeg: pelvicTilt,
        lumbarLordosisDeg: postureInput.lumbarLordosisDeg,
        hipFlexionRestDeg: null,
      };
      crossedSyndrome = this.sessionAnalyzers.crossedSyndrome.run(crossedInput);
      painRisk = painRiskEngine.assess({
        craniovertebralAngleDeg: postureInput.craniovertebralAngleDeg,
        sagittalVerticalAxisCm: postureInput.sagittalVerticalAxisCm,
        thoracicKyphosisDeg: postureInput.thoracicKyphosisDeg,
        lumbarLordosisDeg: postureInput.lumbarLordosisDeg,
        shoulderAsymmetryCm: postureInput.shoulderAsymmetryCm,
        pelvicObliquityDeg: postureInput.pelvicObliquityDeg,
        pelvicTiltDeg: pelvicTilt,
        coronalSpineDeviationCm: postureInput.coronalSpineDeviationCm,
        kneeFlexionStandingDeg: null,
        gaitAsymmetryPercent: stepAsymmetry,
      });
    }

    // Whole-body
    const cardio =
      speed !== null && cadence !== null && stride !== null
        ? cardioEstimator.estimate(speed, cadence, stride)
        : null;
    const frailty =
      speed !== null
        ? frailtyScreener.screen({
            walkingSpeedMPS: speed,
            heightM: profile.heightM,
            sex: profile.sex,
            dailyStepCount: null,
            postureVariabilitySD: fatigue?.postureVariabilitySD ?? null,
            strideTimeCVPercent: strideTimeCV,
          })
        : null;
    const smoothness = analyzers.smoothness.hasEnoughData ? analyzers.smoothness.analyze() : null;
    const trunkMotion = analyzers.trunk.analyze();
    const distance = analyzers.distance.estimate(steps.length, stride);
    const peakReba = peakMetric(frames, "rebaScore");

    const record: SessionRecord = {
      id: this.createId(),
      startedAt: snapshot.startedAt ?? Date.now(),
      durationSec: snapshot.elapsedTime,
      frameCount: frames.length,
      totalSteps: steps.length,
      schemaVersion: SESSION_SCHEMA_VERSION,

      averageCadenceSPM: cadence,
      averageStrideLengthM: stride,
      averageWalkingSpeedMPS: speed,
      averageTrunkLeanDeg: postureInput.sagittalTrunkLeanDeg,
      peakTrunkLeanDeg: peakMetric(frames, "sagittalTrunkLeanDeg"),
      averageLateralLeanDeg: postureInput.frontalTrunkLeanDeg,
      averageCVADeg: postureInput.craniovertebralAngleDeg,
      averageSVACm: postureInput.sagittalVerticalAxisCm,
      averageKyphosisDeg: postureInput.thoracicKyphosisDeg,
      averageLordosisDeg: postureInput.lumbarLordosisDeg,
      averageSwayVelocityMMS: swayVelocity,
      strideTimeCVPercent: strideTimeCV,
      stepAsymmetryPercent: stepAsymmetry,
      distanceM: distance.distanceM > 0 ? distance.distanceM : null,
      distanceSource: distance.distanceM > 0 ? distance.source : null,

      postureScore: posture?.score ?? null,
      fallRiskScore: fallRisk?.compositeScore ?? null,
      fatigueIndex: fatigue?.fatigueIndex ?? null,
      painRiskScore: painRisk?.overallRiskScore ?? null,
      upperCrossedScore: crossedSyndrome?.upperCrossedScore ?? null,
      lowerCrossedScore: crossedSyndrome?.lowerCrossedScore ?? null,
      peakRebaScore: peakReba,
      sparcScore: smoothness?.sparcScore ?? null,
      estimatedMET: cardio?.estimatedMET ?? null,

      gaitPattern: gaitPattern?.primaryPattern ?? null,
      gaitPatternConfidence: gaitPattern?.confidence ?? null,
      posturalType: dominantPosturalType(frames),
      fallRiskLevel: fallRisk?.riskLevel ?? null,
      rebaRiskLevel: peakReba !== null ? rebaRiskLevel(peakReba) : null,
      crossedSyndromes: crossedSyndrome?.detectedSyndromes ?? [],
      frailty: frailty?.classification ?? null,
      isFatigued: fatigue?.isFatigued ?? false,
    };

    captureLog.info(
      `Finalized ${record.id}: ${record.frameCount} frames, ${record.totalSteps} steps, ` +
        `${record.durationSec.toFixed(1)}s`,
    );

    return {
      record,
      series: { frames, steps, motion: snapshot.motion },
      assessments: {
        posture,
        fallRisk,
        gaitPattern,
        fatigue,
        crossedSyndrome,
        painRisk,
        frailty,
        cardio,
        rom,
        trunkMotion,
        smoothness,
      },
    };
  }
}
