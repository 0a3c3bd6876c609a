/**
 * Inference/rule pairs for every session-level analyzer that has a model.
 *
 * Each adapter states the model's feature order and how its outputs merge
 * with the rule-based result. Scores are clamped to 0–100; an output the
 * model did not produce keeps the rule-based value.
 */

import {
  clampScore,
  computePostureComposite,
  isGaitPatternType,
  POSTURE_COMPOSITE_FACTORS,
  type CrossedSyndromeType,
  type GaitPatternType,
  type PostureComposite,
  type PostureCompositeInput,
} from "../clinical/ClinicalNorms";
import {
  CROSSED_SYNDROME_DETECTION_THRESHOLD,
  CROSSED_SYNDROME_FEATURE_KEYS,
  crossedSyndromeDetector,
  type CrossedSyndromeInput,
  type CrossedSyndromeResult,
} from "../clinical/CrossedSyndromeDetector";
import {
  FALL_RISK_FACTORS,
  fallRiskAnalyzer,
  fallRiskLevel,
  type FallRiskAssessment,
  type FallRiskInput,
} from "../analysis/FallRiskAnalyzer";
import type { FatigueAnalyzer, FatigueAssessment } from "../analysis/FatigueAnalyzer";
import {
  GAIT_PATTERN_FEATURE_KEYS,
  gaitPatternClassifier,
  selectPrimary,
  type GaitPatternFeatures,
  type GaitPatternResult,
  type GaitPatternScores,
} from "../analysis/GaitPatternClassifier";
import { DualPath, type InferenceAdapter } from "./DualPath";
import { featuresFrom, readLabel, readNumber, readProbabilities } from "./featureVector";
import { modelService, type ModelOutputs, type ModelSource } from "./ModelService";

function scoreOr(outputs: ModelOutputs, key: string, fallback: number): number {
  const value = readNumber(outputs, key);
  return value === null ? fallback : clampScore(value);
}

// ============================================================================
// ADAPTERS
// ============================================================================

/** Features are the factor sub-scores normalized to 0–1. */
export const postureScorerAdapter: InferenceAdapter<PostureCompositeInput, PostureComposite> = {
  model: "postureScorer",
  features: (_input, rule) =>
    POSTURE_COMPOSITE_FACTORS.map((f) => {
      const sub = rule.subScores[f.key];
      return sub === undefined ? null : sub / 100;
    }),
  interpret: (outputs, rule) => ({
    ...rule,
    score: scoreOr(outputs, "compositeScore", rule.score),
  }),
};

export const fallRiskAdapter: InferenceAdapter<FallRiskInput, FallRiskAssessment> = {
  model: "fallRiskPredictor",
  features: (input) => FALL_RISK_FACTORS.map((f) => input[f.key]),
  interpret: (outputs, rule) => {
    const compositeScore = scoreOr(outputs, "riskScore", rule.compositeScore);
    return {
      ...rule,
      compositeScore,
      riskLevel: fallRiskLevel(compositeScore, rule.riskFactorCount),
    };
  },
};

export const gaitPatternAdapter: InferenceAdapter<GaitPatternFeatures, GaitPatternResult> = {
  model: "gaitPatternClassifier",
  features: (input) => featuresFrom(input, GAIT_PATTERN_FEATURE_KEYS),
  interpret: (outputs, rule) => {
    const probabilities = readProbabilities(outputs, "classProbability") ?? {};
    const p = (type: GaitPatternType) => probabilities[type] ?? 0;
    const patternScores: GaitPatternScores = {
      normal: p("normal"),
      antalgic: p("antalgic"),
      trendelenburg: p("trendelenburg"),
      festinating: p("festinating"),
      circumduction: p("circumduction"),
      ataxic: p("ataxic"),
      waddling: p("waddling"),
      stiffKnee: p("stiffKnee"),
    };

    const label = readLabel(outputs, "label");
    const primaryPattern =
      label !== null && isGaitPatternType(label) ? label : selectPrimary(patternScores);

    return {
      primaryPattern,
      confidence: patternScores[primaryPattern],
      patternScores,
      flags: rule.flags,
    };
  },
};

/** Input is the analyzer holding the session's sampled time points. */
export const fatigueAdapter: InferenceAdapter<FatigueAnalyzer, FatigueAssessment> = {
  model: "fatiguePredictor",
  features: (_analyzer, rule) => [
    rule.postureTrendSlope,
    rule.postureTrendR2,
    rule.postureVariabilitySD,
    rule.cadenceTrendSlope,
    rule.speedTrendSlope,
    rule.forwardLeanTrendSlope,
    rule.lateralSwayTrendSlope,
    rule.fatigueIndex,
  ],
  interpret: (outputs, rule) => {
    const fatigueIndex = scoreOr(outputs, "fatigueIndex", rule.fatigueIndex);
    return { ...rule, fatigueIndex, isFatigued: fatigueIndex > 25 };
  },
};

export const crossedSyndromeAdapter: InferenceAdapter<CrossedSyndromeInput, CrossedSyndromeResult> =
  {
    model: "crossedSyndromeDetector",
    features: (input) => featuresFrom(input, CROSSED_SYNDROME_FEATURE_KEYS),
    interpret: (outputs, rule) => {
      const upperCrossedScore = scoreOr(outputs, "upperCrossedScore", rule.upperCrossedScore);
      const lowerCrossedScore = scoreOr(outputs, "lowerCrossedScore", rule.lowerCrossedScore);
      const detectedSyndromes: CrossedSyndromeType[] = [];
      if (upperCrossedScore >= CROSSED_SYNDROME_DETECTION_THRESHOLD) {
        detectedSyndromes.push("upperCrossed");
      }
      if (lowerCrossedScore >= CROSSED_SYNDROME_DETECTION_THRESHOLD) {
        detectedSyndromes.push("lowerCrossed");
      }
      return { ...rule, upperCrossedScore, lowerCrossedScore, detectedSyndromes };
    },
  };

// ============================================================================
// FACTORY
// ============================================================================

export interface SessionAnalyzers {
  posture: DualPath<PostureCompositeInput, PostureComposite>;
  fallRisk: DualPath<FallRiskInput, FallRiskAssessment>;
  gaitPattern: DualPath<GaitPatternFeatures, GaitPatternResult>;
  fatigue: DualPath<FatigueAnalyzer, FatigueAssessment>;
  crossedSyndrome: DualPath<CrossedSyndromeInput, CrossedSyndromeResult>;
}

export function createSessionAnalyzers(models: ModelSource = modelService): SessionAnalyzers {
  return {
    posture: new DualPath(models, computePostureComposite, postureScorerAdapter),
    fallRisk: new DualPath(models, (input) => fallRiskAnalyzer.assess(input), fallRiskAdapter),
    gaitPattern: new DualPath(
      models,
      (input) => gaitPatternClassifier.classify(input),
      gaitPatternAdapter,
    ),
    fatigue: new DualPath(models, (analyzer) => analyzer.assess(), fatigueAdapter),
    crossedSyndrome: new DualPath(
      models,
      (input) => crossedSyndromeDetector.detect(input),
      crossedSyndromeAdapter,
    ),
  };
}
