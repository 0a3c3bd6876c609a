/**
 * Feature vector encoding for inference models.
 *
 * Analyzer APIs carry `number | null`; the training-time sentinel is only
 * substituted here, right before a vector is handed to a model.
 */

import { AppError } from "../lib/errors";
import { MODEL_REGISTRY, type ModelId, type ModelOutputs } from "./ModelService";

/** Stand-in for an absent feature. Must match the training data. */
export const FEATURE_SENTINEL = -1;

export function encodeFeatures(
  model: ModelId,
  values: ReadonlyArray<number | null>,
): number[] {
  const expected = MODEL_REGISTRY[model].featureCount;
  if (values.length !== expected) {
    throw new AppError({ kind: "inferenceFailed", model, stage: "features" });
  }
  return values.map((value) => {
    if (value === null) return FEATURE_SENTINEL;
    if (!Number.isFinite(value)) {
      throw new AppError({ kind: "inferenceFailed", model, stage: "features" });
    }
    return value;
  });
}

/** Pick `keys` from a record in order. */
export function featuresFrom<T extends object, K extends keyof T>(
  record: T,
  keys: readonly K[],
): Array<T[K]> {
  return keys.map((key) => record[key]);
}

export function readNumber(outputs: ModelOutputs, key: string): number | null {
  const value = outputs[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function readLabel(outputs: ModelOutputs, key: string): string | null {
  const value = outputs[key];
  return typeof value === "string" ? value : null;
}

export function readProbabilities(
  outputs: ModelOutputs,
  key: string,
): Readonly<Record<string, number>> | null {
  const value = outputs[key];
  return typeof value === "object" ? value : null;
}
