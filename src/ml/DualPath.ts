/**
 * DualPath: run an analyzer through its inference model when one is usable,
 * otherwise through its rule-based implementation.
 *
 * The rule-based result is always computed. It is the fallback, and it also
 * supplies the explanation fields (factor lists, flags) an inference result
 * keeps. Failures never reach the caller; they are logged and the rule
 * result is returned.
 */

import { AppError, errorMessage, isAppError } from "../lib/errors";
import { mlLog } from "../lib/logger";
import { encodeFeatures } from "./featureVector";
import type { InferenceModel, ModelId, ModelOutputs, ModelSource } from "./ModelService";

export type ResultPath = "inference" | "rule";

export interface InferenceAdapter<TInput, TResult> {
  model: ModelId;
  /** Raw features in model order; `null` becomes the sentinel. */
  features(input: TInput, rule: TResult): ReadonlyArray<number | null>;
  /** Merge model outputs with the rule-based result. */
  interpret(outputs: ModelOutputs, rule: TResult): TResult;
}

export class DualPath<TInput, TResult> {
  private _lastPath: ResultPath = "rule";

  constructor(
    private readonly models: ModelSource,
    private readonly rule: (input: TInput) => TResult,
    private readonly adapter: InferenceAdapter<TInput, TResult>,
  ) {}

  /** Which path produced the most recent result. */
  get lastPath(): ResultPath {
    return this._lastPath;
  }

  run(input: TInput): TResult {
    const ruleResult = this.rule(input);
    this._lastPath = "rule";

    if (!this.models.useModels) return ruleResult;

    try {
      let model: InferenceModel | null;
      try {
        model = this.models.loadModel(this.adapter.model);
      } catch (error) {
        throw new AppError(
          { kind: "inferenceFailed", model: this.adapter.model, stage: "load" },
          { cause: error },
        );
      }
      if (!model) return ruleResult;

      const features = encodeFeatures(this.adapter.model, this.adapter.features(input, ruleResult));
      let outputs: ModelOutputs;
      try {
        outputs = model.predict(features);
      } catch (error) {
        throw new AppError(
          { kind: "inferenceFailed", model: this.adapter.model, stage: "predict" },
          { cause: error },
        );
      }
      const result = this.adapter.interpret(outputs, ruleResult);
      this._lastPath = "inference";
      return result;
    } catch (error) {
      const reason = isAppError(error) && error.cause !== undefined ? error.cause : error;
      mlLog.warn(
        `${this.adapter.model} inference failed, using rule-based result: ${errorMessage(error)}`,
        errorMessage(reason),
      );
      return ruleResult;
    }
  }
}
