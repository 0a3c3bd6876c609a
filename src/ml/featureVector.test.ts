import { describe, expect, it } from "vitest";
import { isAppError } from "../lib/errors";
import {
  encodeFeatures,
  FEATURE_SENTINEL,
  featuresFrom,
  readLabel,
  readNumber,
  readProbabilities,
} from "./featureVector";

describe("featureVector", () => {
  it("should substitute the sentinel for absent features", () => {
    const values = [0.5, null, 0.25, null, 1, 0, null];
    expect(encodeFeatures("crossedSyndromeDetector", values)).toEqual([
      0.5,
      FEATURE_SENTINEL,
      0.25,
      FEATURE_SENTINEL,
      1,
      0,
      FEATURE_SENTINEL,
    ]);
  });

  it("should reject a vector of the wrong length", () => {
    let caught: unknown = null;
    try {
      encodeFeatures("crossedSyndromeDetector", [1, 2]);
    } catch (error) {
      caught = error;
    }
    expect(isAppError(caught)).toBe(true);
    expect(isAppError(caught) && caught.detail).toEqual({
      kind: "inferenceFailed",
      model: "crossedSyndromeDetector",
      stage: "features",
    });
  });

  it("should reject non-finite features", () => {
    expect(() => encodeFeatures("crossedSyndromeDetector", [NaN, 0, 0, 0, 0, 0, 0])).toThrow(
      "Model 'crossedSyndromeDetector' failed during features.",
    );
  });

  it("should pick record fields in key order", () => {
    expect(featuresFrom({ a: 1, b: null, c: 3 }, ["c", "a", "b"])).toEqual([3, 1, null]);
  });

  it("should read typed outputs", () => {
    const outputs = { score: 42, label: "normal", probabilities: { normal: 0.9 }, bad: NaN };
    expect(readNumber(outputs, "score")).toBe(42);
    expect(readNumber(outputs, "bad")).toBeNull();
    expect(readNumber(outputs, "label")).toBeNull();
    expect(readLabel(outputs, "label")).toBe("normal");
    expect(readLabel(outputs, "missing")).toBeNull();
    expect(readProbabilities(outputs, "probabilities")).toEqual({ normal: 0.9 });
    expect(readProbabilities(outputs, "score")).toBeNull();
  });
});
