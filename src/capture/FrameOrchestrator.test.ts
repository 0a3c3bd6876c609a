import { beforeEach, describe, expect, it, vi } from "vitest";
import type { PedometerSnapshot } from "../analysis/DistanceTracker";
import { GaitAnalyzer } from "../analysis/GaitAnalyzer";
import type { MotionSample, StepEvent } from "../models/frames";
import { standingJoints, SyntheticSkeleton } from "../utils/SyntheticSkeleton";
import { FrameOrchestrator } from "./FrameOrchestrator";
import { SessionRecorder } from "./SessionRecorder";

function motionSample(timestamp: number, verticalG: number): MotionSample {
  return {
    timestamp,
    roll: 0,
    pitch: 0,
    yaw: 0,
    userAcceleration: { x: 0.01, y: verticalG, z: 0.02 },
    gravity: { x: 0, y: -1, z: 0 },
    rotationRate: { x: 0, y: 0, z: 0 },
  };
}

const PEDOMETER: PedometerSnapshot = {
  timestamp: 2,
  stepCount: 4,
  distanceM: 2.6,
  cadenceSPM: 110,
  floorsAscended: null,
  floorsDescended: null,
};

describe("FrameOrchestrator", () => {
  let clock: number;
  let recorder: SessionRecorder;
  let orchestrator: FrameOrchestrator;
  let onRecordingStarted: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    clock = 0;
    recorder = new SessionRecorder({ now: () => clock });
    onRecordingStarted = vi.fn();
    orchestrator = new FrameOrchestrator({
      recorder,
      now: () => clock,
      onRecordingStarted,
    });
  });

  // ==========================================================================
  // CALIBRATION
  // ==========================================================================

  describe("calibration", () => {
    it("should count down from the first frame and start recording", () => {
      recorder.startCalibration();
      expect(orchestrator.calibrationCountdown).toBe(3);

      orchestrator.onJointFrame(standingJoints(), 0);
      expect(orchestrator.calibrationCountdown).toBe(3);
      expect(orchestrator.isBodyDetected).toBe(true);

      clock = 1_500;
      orchestrator.onJointFrame(standingJoints(), 1.5);
      expect(orchestrator.calibrationCountdown).toBe(2);
      expect(recorder.state).toBe("calibrating");

      clock = 3_000;
      orchestrator.onJointFrame(standingJoints(), 3);
      expect(orchestrator.calibrationCountdown).toBe(0);
      expect(recorder.state).toBe("recording");
      expect(onRecordingStarted).toHaveBeenCalledTimes(1);
    });

    it("should not record frames during calibration", () => {
      recorder.startCalibration();
      orchestrator.onJointFrame(standingJoints(), 0);
      expect(recorder.frameCount).toBe(0);
      expect(orchestrator.currentFrameIndex).toBe(0);
    });
  });

  // ==========================================================================
  // RECORDING LOOP
  // ==========================================================================

  describe("recording", () => {
    beforeEach(() => {
      recorder.startRecording();
    });

    it("should ignore frames when idle", () => {
      recorder.reset();
      const analyze = vi.spyOn(orchestrator.analyzers.posture, "analyze");
      orchestrator.onJointFrame(standingJoints(), 0);
      expect(analyze).not.toHaveBeenCalled();
      expect(recorder.frameCount).toBe(0);
    });

    it("should record one frame per tick", () => {
      for (let i = 0; i < 5; i++) orchestrator.onJointFrame(standingJoints(), i / 60);
      expect(recorder.frameCount).toBe(5);
      expect(orchestrator.currentFrameIndex).toBe(5);
    });

    it("should run throttled analyzers on their schedule", () => {
      const a = orchestrator.analyzers;
      const posture = vi.spyOn(a.posture, "analyze");
      const rom = vi.spyOn(a.rom, "analyze");
      const balance = vi.spyOn(a.balance, "processFrame");
      const reba = vi.spyOn(a.ergonomics, "computeREBA");

      for (let i = 0; i < 6; i++) orchestrator.onJointFrame(standingJoints(), i / 60);

      expect(posture).toHaveBeenCalledTimes(6);
      expect(rom).toHaveBeenCalledTimes(2);
      expect(balance).toHaveBeenCalledTimes(3);
      expect(reba).not.toHaveBeenCalled();
    });

    it("should carry the last throttled value into later frames", () => {
      for (let i = 0; i < 4; i++) orchestrator.onJointFrame(standingJoints(), i / 60);
      const frames = recorder.snapshot().frames;

      expect(frames[0].hipFlexionLeftDeg).toBeNull();
      expect(frames[2].hipFlexionLeftDeg).not.toBeNull();
      expect(frames[3].hipFlexionLeftDeg).toBe(frames[2].hipFlexionLeftDeg);
    });

    it("should fill posture fields of the recorded frame", () => {
      orchestrator.onJointFrame(standingJoints(), 0);
      const [frame] = recorder.snapshot().frames;
      const live = orchestrator.snapshot();

      expect(live.posture).not.toBeNull();
      expect(frame.postureScore).toBe(live.posture?.score);
      expect(frame.joints.root).toEqual([0, 1, 0]);
    });

    it("should skip posture when the head is occluded", () => {
      orchestrator.onJointFrame(standingJoints({ head_joint: null }), 0);
      expect(orchestrator.snapshot().posture).toBeNull();
      expect(recorder.snapshot().frames[0].postureScore).toBeNull();
    });

    it("should keep measured posture fields through a partial occlusion", () => {
      orchestrator.onJointFrame(standingJoints(), 0);
      orchestrator.onJointFrame(standingJoints({ spine_3_joint: null }), 1 / 60);
      const [first, second] = recorder.snapshot().frames;

      expect(first.thoracicKyphosisDeg).not.toBeNull();
      expect(second.thoracicKyphosisDeg).toBe(first.thoracicKyphosisDeg);
      expect(orchestrator.snapshot().posture?.metrics.thoracicKyphosisDeg).toBe(
        first.thoracicKyphosisDeg,
      );
    });

    it("should keep the cached gait when a foot is occluded", () => {
      const frames = new SyntheticSkeleton().walking();
      for (const frame of frames) orchestrator.onJointFrame(frame.joints, frame.timestamp);
      const before = orchestrator.snapshot().gait;

      orchestrator.onJointFrame(standingJoints({ left_foot_joint: null }), 10);

      const recorded = recorder.snapshot().frames;
      expect(before?.cadenceSPM).toBeCloseTo(120, 6);
      expect(orchestrator.snapshot().gait).toBe(before);
      expect(recorded[recorded.length - 1].cadenceSPM).toBe(before?.cadenceSPM);
      expect(recorded[recorded.length - 1].stepWidthCm).toBe(before?.stepWidthCm);
    });

    it("should keep the cached REBA score when the trunk is occluded", () => {
      for (let i = 0; i < 10; i++) orchestrator.onJointFrame(standingJoints(), i / 60);
      for (let i = 10; i < 20; i++) {
        orchestrator.onJointFrame(standingJoints({ spine_7_joint: null }), i / 60);
      }
      const frames = recorder.snapshot().frames;

      expect(frames[9].rebaScore).toBe(2);
      expect(frames[19].rebaScore).toBe(2);
    });

    it("should flag steps the IMU barely supports", () => {
      const base = new GaitAnalyzer().sessionSummary();
      const step: StepEvent = {
        timestamp: 1,
        foot: "left",
        positionX: -0.1,
        positionZ: 0.6,
        strideLengthM: 1.2,
        stepLengthM: 0.6,
        stepWidthCm: 20,
        impactVelocity: null,
        footClearanceM: 0.08,
        imuConfidence: null,
        lowConfidence: false,
      };
      vi.spyOn(orchestrator.analyzers.gait, "processFrame").mockReturnValue({
        ...base,
        stepDetected: step,
      });
      vi.spyOn(orchestrator.analyzers.imuSteps, "covers").mockReturnValue(true);
      vi.spyOn(orchestrator.analyzers.imuSteps, "validateStep").mockReturnValue(0.1);

      orchestrator.onJointFrame(standingJoints(), 1);

      const [recorded] = recorder.snapshot().steps;
      expect(recorded.imuConfidence).toBe(0.1);
      expect(recorded.lowConfidence).toBe(true);
      expect(orchestrator.snapshot().stepCount).toBe(1);
    });

    it("should leave confidence null without motion data", () => {
      const base = new GaitAnalyzer().sessionSummary();
      vi.spyOn(orchestrator.analyzers.gait, "processFrame").mockReturnValue({
        ...base,
        stepDetected: {
          timestamp: 1,
          foot: "right",
          positionX: 0.1,
          positionZ: 0.6,
          strideLengthM: null,
          stepLengthM: null,
          stepWidthCm: null,
          impactVelocity: null,
          footClearanceM: null,
          imuConfidence: null,
          lowConfidence: false,
        },
      });

      orchestrator.onJointFrame(standingJoints(), 1);

      const [recorded] = recorder.snapshot().steps;
      expect(recorded.imuConfidence).toBeNull();
      expect(recorded.lowConfidence).toBe(false);
    });
  });

  // ==========================================================================
  // POSTURE ALERTS
  // ==========================================================================

  describe("posture alerts", () => {
    it("should respect the cooldown between alerts", () => {
      const onPostureAlert = vi.fn();
      orchestrator = new FrameOrchestrator({
        recorder,
        now: () => clock,
        config: { postureAlertThreshold: 101, postureAlertCooldownFrames: 5 },
        onPostureAlert,
      });
      recorder.startRecording();

      for (let i = 0; i < 12; i++) orchestrator.onJointFrame(standingJoints(), i / 60);

      // frames 1, 6, 11
      expect(onPostureAlert).toHaveBeenCalledTimes(3);
    });

    it("should stay silent above the threshold", () => {
      const onPostureAlert = vi.fn();
      orchestrator = new FrameOrchestrator({
        recorder,
        config: { postureAlertThreshold: 0 },
        onPostureAlert,
      });
      recorder.startRecording();

      for (let i = 0; i < 3; i++) orchestrator.onJointFrame(standingJoints(), i / 60);
      expect(onPostureAlert).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // MOTION & PEDOMETER
  // ==========================================================================

  describe("motion and pedometer", () => {
    it("should drop motion samples outside of recording", () => {
      orchestrator.onMotionSample(motionSample(0, 0.1));
      expect(recorder.motionSampleCount).toBe(0);
      expect(orchestrator.analyzers.smoothness.sampleCount).toBe(0);
    });

    it("should feed the motion analyzers while recording", () => {
      recorder.startRecording();
      const trunk = vi.spyOn(orchestrator.analyzers.trunk, "processSample");
      const smooth = vi.spyOn(orchestrator.analyzers.smoothness, "recordSample");

      orchestrator.onMotionSample(motionSample(0.01, 0.3));

      expect(recorder.motionSampleCount).toBe(1);
      expect(trunk).toHaveBeenCalledTimes(1);
      expect(smooth).toHaveBeenCalledWith({ timestamp: 0.01, ap: 0.02, ml: 0.01, v: 0.3 });
    });

    it("should accept pedometer snapshots while paused", () => {
      recorder.startRecording();
      recorder.pause();
      orchestrator.onPedometerSnapshot(PEDOMETER);
      expect(orchestrator.snapshot().pedometer).toEqual(PEDOMETER);
      expect(orchestrator.analyzers.distance.latestPedometer).toEqual(PEDOMETER);
    });

    it("should ignore pedometer snapshots when idle", () => {
      orchestrator.onPedometerSnapshot(PEDOMETER);
      expect(orchestrator.snapshot().pedometer).toBeNull();
    });
  });

  describe("reset", () => {
    it("should clear live state and the frame index", () => {
      recorder.startRecording();
      orchestrator.onJointFrame(standingJoints(), 0);
      orchestrator.reset();

      expect(orchestrator.currentFrameIndex).toBe(0);
      expect(orchestrator.isBodyDetected).toBe(false);
      expect(orchestrator.snapshot().posture).toBeNull();
      expect(orchestrator.calibrationCountdown).toBe(3);
    });
  });
});
