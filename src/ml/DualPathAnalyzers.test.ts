import { describe, expect, it } from "vitest";
import type { FallRiskInput } from "../analysis/FallRiskAnalyzer";
import type { GaitPatternFeatures } from "../analysis/GaitPatternClassifier";
import type { PostureCompositeInput } from "../clinical/ClinicalNorms";
import type { CrossedSyndromeInput } from "../clinical/CrossedSyndromeDetector";
import { createSessionAnalyzers } from "./DualPathAnalyzers";
import { ModelService, type ModelId, type ModelOutputs } from "./ModelService";

function servingModels(outputs: Partial<Record<ModelId, ModelOutputs>>): ModelService {
  return new ModelService(
    {
      loadModel: (id) => {
        const result = outputs[id];
        return result === undefined ? null : { predict: () => result };
      },
    },
    true,
  );
}

const POSTURE: PostureCompositeInput = {
  craniovertebralAngleDeg: 52.5,
  sagittalVerticalAxisCm: 6,
  sagittalTrunkLeanDeg: null,
  frontalTrunkLeanDeg: null,
  shoulderAsymmetryCm: null,
  thoracicKyphosisDeg: null,
  pelvicObliquityDeg: null,
  lumbarLordosisDeg: null,
  coronalSpineDeviationCm: null,
};

const CROSSED: CrossedSyndromeInput = {
  craniovertebralAngleDeg: 40,
  shoulderProtractionCm: null,
  thoracicKyphosisDeg: null,
  cervicalLordosisDeg: null,
  pelvicTiltDeg: null,
  lumbarLordosisDeg: null,
  hipFlexionRestDeg: null,
};

const FALL_RISK: FallRiskInput = {
  walkingSpeedMPS: 1.2,
  strideTimeCVPercent: null,
  doubleSupportPercent: null,
  stepWidthVariabilityCm: null,
  swayVelocityMMS: null,
  stepAsymmetryPercent: null,
  tugTimeSec: null,
  footClearanceM: null,
};

const NO_GAIT: GaitPatternFeatures = {
  stanceTimeLeftPercent: null,
  stanceTimeRightPercent: null,
  stepLengthLeftM: null,
  stepLengthRightM: null,
  cadenceSPM: null,
  avgStepWidthCm: null,
  stepWidthVariabilityCm: null,
  pelvicObliquityDeg: null,
  strideTimeCVPercent: null,
  walkingSpeedMPS: null,
  strideLengthM: null,
  hipFlexionROMDeg: null,
  armSwingAsymmetryPercent: null,
  kneeFlexionROMDeg: null,
};

describe("session analyzers", () => {
  it("should return rule results with no models installed", () => {
    const analyzers = createSessionAnalyzers(new ModelService(null, true));
    const posture = analyzers.posture.run(POSTURE);

    expect(posture.score).toBeCloseTo(75, 10);
    expect(analyzers.posture.lastPath).toBe("rule");
  });

  it("should return rule results when a model fails to load", () => {
    const analyzers = createSessionAnalyzers(
      new ModelService(
        {
          loadModel: () => {
            throw new Error("corrupt model file");
          },
        },
        true,
      ),
    );
    const result = analyzers.fallRisk.run(FALL_RISK);

    expect(result.factorBreakdown).toHaveLength(1);
    expect(analyzers.fallRisk.lastPath).toBe("rule");
  });

  it("should clamp the posture model score and keep sub-scores", () => {
    const analyzers = createSessionAnalyzers(
      servingModels({ postureScorer: { compositeScore: 130 } }),
    );
    const posture = analyzers.posture.run(POSTURE);

    expect(posture.score).toBe(100);
    expect(posture.subScores.sagittalVerticalAxisCm).toBe(50);
    expect(analyzers.posture.lastPath).toBe("inference");
  });

  it("should recompute the fall risk level from the model score", () => {
    const analyzers = createSessionAnalyzers(
      servingModels({ fallRiskPredictor: { riskScore: 72 } }),
    );
    const result = analyzers.fallRisk.run(FALL_RISK);

    expect(result.compositeScore).toBe(72);
    expect(result.riskLevel).toBe("high");
    expect(result.factorBreakdown).toHaveLength(1);
  });

  it("should prefer the model label for the gait pattern", () => {
    const analyzers = createSessionAnalyzers(
      servingModels({
        gaitPatternClassifier: {
          label: "antalgic",
          classProbability: { antalgic: 0.7, normal: 0.2 },
        },
      }),
    );
    const result = analyzers.gaitPattern.run(NO_GAIT);

    expect(result.primaryPattern).toBe("antalgic");
    expect(result.confidence).toBe(0.7);
    expect(result.patternScores.ataxic).toBe(0);
  });

  it("should select the most probable pattern for an unknown label", () => {
    const analyzers = createSessionAnalyzers(
      servingModels({
        gaitPatternClassifier: {
          label: "shuffling",
          classProbability: { normal: 0.3, waddling: 0.6 },
        },
      }),
    );
    expect(analyzers.gaitPattern.run(NO_GAIT).primaryPattern).toBe("waddling");
  });

  it("should redetect crossed syndromes from model scores", () => {
    const analyzers = createSessionAnalyzers(
      servingModels({ crossedSyndromeDetector: { upperCrossedScore: 55 } }),
    );
    const result = analyzers.crossedSyndrome.run(CROSSED);

    expect(result.upperCrossedScore).toBe(55);
    expect(result.lowerCrossedScore).toBe(0);
    expect(result.detectedSyndromes).toEqual(["upperCrossed"]);
    expect(result.upperFactors).toEqual(["Forward head (CVA 40.0°)"]);
  });
});
