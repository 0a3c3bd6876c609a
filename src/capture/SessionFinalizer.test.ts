import { beforeEach, describe, expect, it } from "vitest";
import type { PosturalType } from "../clinical/ClinicalNorms";
import { createEmptyBodyFrame, type BodyFrame } from "../models/frames";
import { standingJoints, SyntheticSkeleton } from "../utils/SyntheticSkeleton";
import { FrameOrchestrator } from "./FrameOrchestrator";
import {
  averageMetric,
  dominantPosturalType,
  peakMetric,
  SessionFinalizer,
} from "./SessionFinalizer";
import { SessionRecorder } from "./SessionRecorder";

function frameWith(patch: Partial<BodyFrame>): BodyFrame {
  return { ...createEmptyBodyFrame(0), ...patch };
}

function typed(types: Array<PosturalType | null>): BodyFrame[] {
  return types.map((posturalType) => frameWith({ posturalType }));
}

describe("session reducers", () => {
  it("should average only frames that carry a value", () => {
    const frames = [
      frameWith({ craniovertebralAngleDeg: 50 }),
      frameWith({ craniovertebralAngleDeg: null }),
      frameWith({ craniovertebralAngleDeg: 44 }),
    ];
    expect(averageMetric(frames, "craniovertebralAngleDeg")).toBe(47);
    expect(peakMetric(frames, "craniovertebralAngleDeg")).toBe(50);
  });

  it("should return null when no frame carries a value", () => {
    const frames = [frameWith({}), frameWith({})];
    expect(averageMetric(frames, "rebaScore")).toBeNull();
    expect(peakMetric(frames, "rebaScore")).toBeNull();
  });

  it("should pick the most frequent postural type", () => {
    expect(dominantPosturalType(typed(["ideal", "swayBack", "swayBack", null]))).toBe("swayBack");
  });

  it("should break postural type ties by first appearance", () => {
    expect(dominantPosturalType(typed(["flatBack", "ideal", "ideal", "flatBack"]))).toBe("flatBack");
    expect(dominantPosturalType(typed([null, null]))).toBeNull();
  });
});

describe("SessionFinalizer", () => {
  let clock: number;
  let recorder: SessionRecorder;
  let orchestrator: FrameOrchestrator;
  let finalizer: SessionFinalizer;

  beforeEach(() => {
    clock = 50_000;
    recorder = new SessionRecorder({ now: () => clock });
    orchestrator = new FrameOrchestrator({ recorder, now: () => clock });
    finalizer = new SessionFinalizer(undefined, () => "session-test");
  });

  function finalize() {
    return finalizer.finalize({
      snapshot: recorder.snapshot(),
      analyzers: orchestrator.analyzers,
    });
  }

  describe("empty session", () => {
    it("should produce a record with no derived metrics", () => {
      recorder.startRecording();
      clock = 52_000;
      recorder.stop();

      const { record, assessments, series } = finalize();

      expect(record.id).toBe("session-test");
      expect(record.startedAt).toBe(50_000);
      expect(record.durationSec).toBe(2);
      expect(record.frameCount).toBe(0);
      expect(record.totalSteps).toBe(0);
      expect(record.postureScore).toBeNull();
      expect(record.fallRiskScore).toBeNull();
      expect(record.gaitPattern).toBeNull();
      expect(record.distanceM).toBeNull();
      expect(record.distanceSource).toBeNull();
      expect(record.crossedSyndromes).toEqual([]);
      expect(record.isFatigued).toBe(false);
      expect(record.rebaRiskLevel).toBeNull();
      expect(assessments.cardio).toBeNull();
      expect(assessments.frailty).toBeNull();
      expect(assessments.smoothness).toBeNull();
      expect(series.frames).toEqual([]);
    });
  });

  describe("walking session", () => {
    beforeEach(() => {
      recorder.startRecording();
      for (const frame of new SyntheticSkeleton().walking()) {
        orchestrator.onJointFrame(frame.joints, frame.timestamp);
      }
      clock = 60_000;
      recorder.stop();
    });

    it("should summarize gait over the whole walk", () => {
      const { record } = finalize();

      expect(record.frameCount).toBe(600);
      expect(record.totalSteps).toBe(20);
      expect(record.durationSec).toBe(10);
      expect(record.averageCadenceSPM).toBeCloseTo(120, 6);
      expect(record.averageStrideLengthM).toBeCloseTo(1.2, 6);
      expect(record.averageWalkingSpeedMPS).toBeCloseTo(1.2, 6);
    });

    it("should run every session-level analyzer that has input", () => {
      const { record, assessments } = finalize();

      expect(assessments.posture).not.toBeNull();
      expect(record.postureScore).toBe(assessments.posture?.score);
      expect(assessments.gaitPattern).not.toBeNull();
      expect(record.gaitPattern).toBe(assessments.gaitPattern?.primaryPattern);
      expect(assessments.crossedSyndrome).not.toBeNull();
      expect(assessments.painRisk).not.toBeNull();
      expect(assessments.cardio).not.toBeNull();
      expect(assessments.frailty).not.toBeNull();
      expect(assessments.smoothness).toBeNull();
    });

    it("should skip fatigue on a walk too short for a trend", () => {
      const { record, assessments } = finalize();

      expect(orchestrator.analyzers.fatigue.timePointCount).toBeLessThan(20);
      expect(assessments.fatigue).toBeNull();
      expect(record.fatigueIndex).toBeNull();
    });


    it("should measure distance from the root path", () => {
      const { record } = finalize();

      // 0.02 m per frame, counted in 0.06 m segments
      expect(record.distanceSource).toBe("bodyTracking");
      expect(record.distanceM).toBeCloseTo(11.94, 4);
    });

    it("should hand the recorded buffers through unchanged", () => {
      const snapshot = recorder.snapshot();
      const { series } = finalize();

      expect(series.frames).toHaveLength(snapshot.frames.length);
      expect(series.steps.map((s) => s.timestamp)).toEqual(snapshot.steps.map((s) => s.timestamp));
    });
  });

  describe("occluded final frame", () => {
    it("should keep the gait summary when the last frame loses a foot", () => {
      recorder.startRecording();
      for (const frame of new SyntheticSkeleton().walking()) {
        orchestrator.onJointFrame(frame.joints, frame.timestamp);
      }
      orchestrator.onJointFrame(standingJoints({ left_foot_joint: null }), 10);
      recorder.stop();

      const { record } = finalize();

      expect(record.frameCount).toBe(601);
      expect(record.averageCadenceSPM).toBeCloseTo(120, 6);
      expect(record.averageStrideLengthM).toBeCloseTo(1.2, 6);
      expect(record.averageWalkingSpeedMPS).toBeCloseTo(1.2, 6);
    });
  });

  describe("long walking session", () => {
    it("should assess fatigue once enough time points are sampled", () => {
      recorder.startRecording();
      for (const frame of new SyntheticSkeleton({ durationSec: 45 }).walking()) {
        orchestrator.onJointFrame(frame.joints, frame.timestamp);
      }
      recorder.stop();

      const { record, assessments } = finalize();

      expect(orchestrator.analyzers.fatigue.timePointCount).toBeGreaterThanOrEqual(20);
      expect(assessments.fatigue).not.toBeNull();
      expect(record.fatigueIndex).toBe(assessments.fatigue?.fatigueIndex);
      expect(record.isFatigued).toBe(false);
    });
  });
});
