/**
 * Inference model registry.
 *
 * Models come from an injected `ModelProvider` (an on-disk runtime, a remote
 * host, a test fake). The service caches loaded models, reports their
 * availability and gates all inference behind `useModels`.
 */

import { AppError, errorMessage } from "../lib/errors";
import { mlLog } from "../lib/logger";

// ============================================================================
// MODEL CONTRACT
// ============================================================================

export const MODEL_IDS = [
  "gaitPatternClassifier",
  "postureScorer",
  "fallRiskPredictor",
  "fatiguePredictor",
  "crossedSyndromeDetector",
] as const;

export type ModelId = (typeof MODEL_IDS)[number];

/** Named model outputs: scalars, labels or class-probability maps. */
export type ModelOutputValue = number | string | Readonly<Record<string, number>>;
export type ModelOutputs = Readonly<Record<string, ModelOutputValue>>;

export interface InferenceModel {
  /** May throw; callers go through DualPath which falls back on failure. */
  predict(features: readonly number[]): ModelOutputs;
}

export interface ModelProvider {
  /** null when the model is not installed. */
  loadModel(id: ModelId): InferenceModel | null;
}

export interface ModelDescriptor {
  id: ModelId;
  displayName: string;
  summary: string;
  featureCount: number;
  version: string;
}

export const MODEL_REGISTRY: Readonly<Record<ModelId, ModelDescriptor>> = {
  gaitPatternClassifier: {
    id: "gaitPatternClassifier",
    displayName: "Gait Pattern Classifier",
    summary: "Classifies 8 gait patterns from session metrics",
    featureCount: 14,
    version: "1.0.0",
  },
  postureScorer: {
    id: "postureScorer",
    displayName: "Posture Scorer",
    summary: "Predicts composite posture score from sub-metrics",
    featureCount: 9,
    version: "1.0.0",
  },
  fallRiskPredictor: {
    id: "fallRiskPredictor",
    displayName: "Fall Risk Predictor",
    summary: "Estimates fall risk from gait and balance data",
    featureCount: 8,
    version: "1.0.0",
  },
  fatiguePredictor: {
    id: "fatiguePredictor",
    displayName: "Fatigue Predictor",
    summary: "Estimates fatigue index from session trends",
    featureCount: 8,
    version: "1.0.0",
  },
  crossedSyndromeDetector: {
    id: "crossedSyndromeDetector",
    displayName: "Crossed Syndrome Detector",
    summary: "Scores upper and lower crossed syndromes from posture markers",
    featureCount: 7,
    version: "1.0.0",
  },
};

export interface ModelStatus {
  id: ModelId;
  isAvailable: boolean;
  version: string;
  /** ms epoch of the first successful load, null if never loaded */
  loadedAt: number | null;
}

/** The slice of the service a dual-path analyzer depends on. */
export interface ModelSource {
  readonly useModels: boolean;
  loadModel(id: ModelId): InferenceModel | null;
}

// ============================================================================
// SERVICE
// ============================================================================

export class ModelService implements ModelSource {
  private provider: ModelProvider | null;
  private loaded = new Map<ModelId, { model: InferenceModel; loadedAt: number }>();
  private _useModels: boolean;

  constructor(provider: ModelProvider | null = null, useModels = false) {
    this.provider = provider;
    this._useModels = useModels;
  }

  get useModels(): boolean {
    return this._useModels;
  }

  set useModels(enabled: boolean) {
    this._useModels = enabled;
    mlLog.info(`Inference models ${enabled ? "enabled" : "disabled"}`);
  }

  /** Swap providers; drops every cached model. */
  setProvider(provider: ModelProvider | null): void {
    this.provider = provider;
    this.loaded.clear();
  }

  loadModel(id: ModelId): InferenceModel | null {
    const cached = this.loaded.get(id);
    if (cached) return cached.model;
    if (!this.provider) return null;

    let model: InferenceModel | null;
    try {
      model = this.provider.loadModel(id);
    } catch (error) {
      const failure = new AppError(
        { kind: "inferenceFailed", model: id, stage: "load" },
        { cause: error },
      );
      mlLog.error(failure.message, errorMessage(error));
      return null;
    }

    if (!model) {
      mlLog.info(`Model '${id}' not installed; using rule-based fallback`);
      return null;
    }
    this.loaded.set(id, { model, loadedAt: Date.now() });
    mlLog.info(`Loaded model: ${id}`);
    return model;
  }

  isModelAvailable(id: ModelId): boolean {
    return this.loadModel(id) !== null;
  }

  get modelStatuses(): ModelStatus[] {
    return MODEL_IDS.map((id) => ({
      id,
      isAvailable: this.loaded.has(id),
      version: MODEL_REGISTRY[id].version,
      loadedAt: this.loaded.get(id)?.loadedAt ?? null,
    }));
  }

  get availableModelCount(): number {
    return this.modelStatuses.filter((s) => s.isAvailable).length;
  }

  /** Load every registered model ahead of the first session; returns the loaded count. */
  warmUp(): number {
    for (const id of MODEL_IDS) this.loadModel(id);
    const count = this.availableModelCount;
    mlLog.info(`Model warm-up complete (${count}/${MODEL_IDS.length})`);
    return count;
  }
}

export const modelService = new ModelService();
