import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, loadConfig, resolveConfig } from "./config";

describe("resolveConfig", () => {
  it("should return the defaults without overrides", () => {
    expect(resolveConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("should merge partial throttle settings", () => {
    const config = resolveConfig({ throttle: { romEvery: 5 }, postureAlertThreshold: 40 });

    expect(config.throttle).toEqual({
      romEvery: 5,
      balanceEvery: 2,
      ergonomicsEvery: 10,
      fatigueEvery: 6,
    });
    expect(config.postureAlertThreshold).toBe(40);
    expect(config.calibrationDurationSec).toBe(3);
  });
});

describe("loadConfig", () => {
  it("should read overrides from the environment", () => {
    const config = loadConfig(
      {},
      {
        POSTURE_LOG_LEVEL: "debug",
        POSTURE_USE_ML_MODELS: "TRUE",
        POSTURE_RECORDER_CAPACITY: "1200",
        POSTURE_DB_NAME: " clinic-db ",
      },
    );

    expect(config.logLevel).toBe("debug");
    expect(config.useInferenceModels).toBe(true);
    expect(config.recorderCapacity).toBe(1200);
    expect(config.databaseName).toBe("clinic-db");
  });

  it("should ignore malformed values", () => {
    const config = loadConfig(
      {},
      {
        POSTURE_LOG_LEVEL: "verbose",
        POSTURE_USE_ML_MODELS: "maybe",
        POSTURE_RECORDER_CAPACITY: "-5",
        POSTURE_DB_NAME: "   ",
      },
    );

    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("should let explicit overrides win over the environment", () => {
    const config = loadConfig(
      { recorderCapacity: 100, throttle: { fatigueEvery: 12 } },
      { POSTURE_RECORDER_CAPACITY: "1200", POSTURE_USE_ML_MODELS: "0" },
    );

    expect(config.recorderCapacity).toBe(100);
    expect(config.useInferenceModels).toBe(false);
    expect(config.throttle.fatigueEvery).toBe(12);
    expect(config.throttle.romEvery).toBe(3);
  });
});
