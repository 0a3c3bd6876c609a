import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createEmptyBodyFrame, type MotionSample, type StepEvent } from "../../models/frames";
import type { SessionRecord, SessionTimeSeries } from "../../models/session";
import { isAppError } from "../errors";
import { createDataManager, getDataManager, LocalDataManager, setDataManager } from "./index";

let dbCounter = 0;

function makeRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: "session-1",
    startedAt: 1_000,
    durationSec: 12.5,
    frameCount: 2,
    totalSteps: 1,
    schemaVersion: 1,
    averageCadenceSPM: 110,
    averageStrideLengthM: 1.3,
    averageWalkingSpeedMPS: 1.2,
    averageTrunkLeanDeg: 3,
    peakTrunkLeanDeg: 6,
    averageLateralLeanDeg: 1,
    averageCVADeg: 50,
    averageSVACm: 2,
    averageKyphosisDeg: 35,
    averageLordosisDeg: 45,
    averageSwayVelocityMMS: 10,
    strideTimeCVPercent: 2,
    stepAsymmetryPercent: 3,
    distanceM: 15,
    distanceSource: "bodyTracking",
    postureScore: 82,
    fallRiskScore: 12,
    fatigueIndex: null,
    painRiskScore: 5,
    upperCrossedScore: 0,
    lowerCrossedScore: 0,
    peakRebaScore: 3,
    sparcScore: null,
    estimatedMET: 3.06,
    gaitPattern: "normal",
    gaitPatternConfidence: 1,
    posturalType: "ideal",
    fallRiskLevel: "low",
    rebaRiskLevel: "low",
    crossedSyndromes: [],
    frailty: "robust",
    isFatigued: false,
    ...overrides,
  };
}

function makeStep(timestamp: number): StepEvent {
  return {
    timestamp,
    foot: "left",
    positionX: 0.1,
    positionZ: 0.6,
    strideLengthM: 1.3,
    stepLengthM: 0.65,
    stepWidthCm: 9,
    impactVelocity: null,
    footClearanceM: 0.03,
    imuConfidence: null,
    lowConfidence: false,
  };
}

function makeMotion(timestamp: number): MotionSample {
  return {
    timestamp,
    roll: 0,
    pitch: 0.1,
    yaw: 0,
    userAcceleration: { x: 0, y: 0.05, z: 0 },
    gravity: { x: 0, y: -1, z: 0 },
    rotationRate: { x: 0, y: 0, z: 0.2 },
  };
}

function makeSeries(): SessionTimeSeries {
  const first = createEmptyBodyFrame(0);
  const second = { ...createEmptyBodyFrame(1 / 60), sagittalTrunkLeanDeg: 4.5, postureScore: 80 };
  return { frames: [first, second], steps: [makeStep(0.5)], motion: [makeMotion(0.01)] };
}

describe("LocalDataManager", () => {
  let manager: LocalDataManager;

  beforeEach(() => {
    dbCounter += 1;
    manager = new LocalDataManager({ databaseName: `test-db-${dbCounter}`, blobChunkSize: 1 });
  });

  afterEach(() => {
    manager.close();
  });

  it("should save a record and its time series together", async () => {
    await manager.saveSessionRecord(makeRecord(), makeSeries());

    const stored = await manager.getSession("session-1");
    expect(stored?.postureScore).toBe(82);

    const series = await manager.loadTimeSeries("session-1");
    expect(series?.frames).toHaveLength(2);
    expect(series?.frames[1].sagittalTrunkLeanDeg).toBe(4.5);
    expect(series?.steps[0].stepLengthM).toBe(0.65);
    expect(series?.motion[0].rotationRate.z).toBe(0.2);
  });

  it("should list sessions newest first", async () => {
    await manager.saveSessionRecord(makeRecord({ id: "old", startedAt: 100 }), makeSeries());
    await manager.saveSessionRecord(makeRecord({ id: "new", startedAt: 900 }), makeSeries());

    const sessions = await manager.getAllSessions();
    expect(sessions.map((s) => s.id)).toEqual(["new", "old"]);
  });

  it("should return null time series for an unknown session", async () => {
    expect(await manager.loadTimeSeries("missing")).toBeNull();
    expect(await manager.exportFullSession("missing")).toBeNull();
  });

  it("should delete the record and its blobs", async () => {
    await manager.saveSessionRecord(makeRecord(), makeSeries());
    await manager.deleteSession("session-1");

    expect(await manager.getSession("session-1")).toBeUndefined();
    expect(await manager.db.sessionBlobs.get("session-1")).toBeUndefined();
  });

  it("should clear all data", async () => {
    await manager.saveSessionRecord(makeRecord({ id: "a" }), makeSeries());
    await manager.saveSessionRecord(makeRecord({ id: "b" }), makeSeries());
    await manager.clearAllData();

    expect(await manager.getAllSessions()).toEqual([]);
    expect(await manager.db.sessionBlobs.count()).toBe(0);
  });

  it("should report corrupted blobs as dataCorrupted", async () => {
    await manager.saveSessionRecord(makeRecord(), makeSeries());
    await manager.db.sessionBlobs.put({
      sessionId: "session-1",
      frames: "[{\"timestamp\":\"bad\"}]",
      steps: "[]",
      motion: "[]",
    });

    const error = await manager.loadTimeSeries("session-1").catch((e: unknown) => e);
    expect(isAppError(error) && error.kind).toBe("dataCorrupted");
  });

  it("should wrap write failures as sessionSaveFailed and leave nothing behind", async () => {
    vi.spyOn(manager.db.sessionBlobs, "put").mockRejectedValueOnce(new Error("quota"));

    const error = await manager
      .saveSessionRecord(makeRecord(), makeSeries())
      .catch((e: unknown) => e);

    expect(isAppError(error) && error.kind).toBe("sessionSaveFailed");
    expect(await manager.getSession("session-1")).toBeUndefined();
  });

  it("should export a full session", async () => {
    await manager.saveSessionRecord(makeRecord(), makeSeries());
    const exported = await manager.exportFullSession("session-1");

    expect(exported?.exportVersion).toBe("1.0.0");
    expect(exported?.session.id).toBe("session-1");
    expect(exported?.series.frames).toHaveLength(2);
  });
});

describe("shared data manager", () => {
  afterEach(() => {
    setDataManager(null);
  });

  it("should create the shared manager lazily and reuse it", () => {
    const first = getDataManager();
    expect(first).toBeInstanceOf(LocalDataManager);
    expect(getDataManager()).toBe(first);
  });

  it("should return an injected manager", () => {
    const injected = createDataManager({ databaseName: "injected-db" });
    setDataManager(injected);
    expect(getDataManager()).toBe(injected);
  });
});
