import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PedometerSnapshot } from "../analysis/DistanceTracker";
import type { SessionSink } from "../lib/db/types";
import type { JointMap } from "../models/JointName";
import type { MotionSample } from "../models/frames";
import type { SessionRecord } from "../models/session";
import { useCaptureStore } from "../store/useCaptureStore";
import { useNotificationStore } from "../store/useNotificationStore";
import { standingJoints } from "../utils/SyntheticSkeleton";
import { CaptureController } from "./CaptureController";
import type { BodyTracker, MotionService, PedometerService } from "./sensors";

class FakeBodyTracker implements BodyTracker {
  isAvailable = true;
  running = false;
  onJointFrame: ((joints: JointMap, timestamp: number) => void) | null = null;

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  emit(timestamp: number): void {
    this.onJointFrame?.(standingJoints(), timestamp);
  }
}

class FakeMotionService implements MotionService {
  isAvailable = true;
  running = false;
  onMotionSample: ((sample: MotionSample) => void) | null = null;

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }
}

class FakePedometer implements PedometerService {
  isAvailable = true;
  running = false;
  onSnapshot: ((snapshot: PedometerSnapshot) => void) | null = null;

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }
}

class MemorySink implements SessionSink {
  saved: SessionRecord[] = [];
  failNext = false;

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("quota exceeded");
    }
    this.saved.push(record);
  }
}

describe("CaptureController", () => {
  let clock: number;
  let tracker: FakeBodyTracker;
  let motion: FakeMotionService;
  let pedometer: FakePedometer;
  let controller: CaptureController;

  beforeEach(() => {
    vi.useFakeTimers();
    useCaptureStore.getState().reset();
    useNotificationStore.getState().clearAll();
    clock = 0;
    tracker = new FakeBodyTracker();
    motion = new FakeMotionService();
    pedometer = new FakePedometer();
    controller = new CaptureController({
      bodyTracker: tracker,
      motion,
      pedometer,
      now: () => clock,
    });
  });

  afterEach(() => {
    controller.dispose();
    vi.useRealTimers();
  });

  /** Calibrate and record `frames` ticks at 60 Hz. */
  function recordFrames(frames: number): void {
    controller.startCapture();
    tracker.emit(0);
    clock = 3_000;
    tracker.emit(3);
    for (let i = 1; i <= frames; i++) tracker.emit(3 + i / 60);
  }

  describe("startCapture", () => {
    it("should start calibration and the body tracker", () => {
      expect(controller.startCapture()).toBe(true);
      expect(controller.state).toBe("calibrating");
      expect(tracker.running).toBe(true);
      expect(motion.running).toBe(false);
      expect(useCaptureStore.getState().recordingState).toBe("calibrating");
    });

    it("should start the remaining sensors once calibration completes", () => {
      controller.startCapture();
      tracker.emit(0);
      clock = 3_000;
      tracker.emit(3);

      expect(controller.state).toBe("recording");
      expect(motion.running).toBe(true);
      expect(pedometer.running).toBe(true);
    });

    it("should refuse when body tracking is unavailable", () => {
      tracker.isAvailable = false;

      expect(controller.startCapture()).toBe(false);
      expect(controller.state).toBe("idle");
      expect(useCaptureStore.getState().errorMessage).toBe(
        "Body tracking is not available on this device.",
      );
      const [notification] = useNotificationStore.getState().notifications;
      expect(notification.type).toBe("error");
      expect(notification.source).toBe("sensor");
      expect(notification.message).toBe(
        "Check that the device has the required sensors and permissions.",
      );
    });

    it("should continue without a pedometer", () => {
      pedometer.isAvailable = false;
      recordFrames(1);
      expect(controller.state).toBe("recording");
      expect(pedometer.running).toBe(false);
    });

    it("should refuse a second start while active", () => {
      controller.startCapture();
      expect(controller.startCapture()).toBe(false);
    });
  });

  describe("pause and stop", () => {
    it("should pause and resume the motion service", () => {
      recordFrames(2);

      controller.togglePause();
      expect(controller.state).toBe("paused");
      expect(motion.running).toBe(false);

      controller.togglePause();
      expect(controller.state).toBe("recording");
      expect(motion.running).toBe(true);
    });

    it("should stop every sensor", () => {
      recordFrames(2);
      clock = 5_000;

      expect(controller.stopCapture()).toBe(true);
      expect(controller.state).toBe("finished");
      expect(tracker.running).toBe(false);
      expect(motion.running).toBe(false);
      expect(pedometer.running).toBe(false);
      expect(useCaptureStore.getState().elapsedTime).toBe(2);
    });

    it("should publish elapsed time on the refresh timer", () => {
      recordFrames(1);
      clock = 4_000;
      vi.advanceTimersByTime(500);
      expect(useCaptureStore.getState().elapsedTime).toBe(1);
    });

    it("should discard everything on cancel", () => {
      recordFrames(3);
      expect(controller.cancelCapture()).toBe(true);
      expect(controller.state).toBe("idle");
      expect(controller.recorder.frameCount).toBe(0);
      expect(tracker.running).toBe(false);
    });
  });

  describe("saveSession", () => {
    it("should ignore saves before the session is finished", async () => {
      const sink = new MemorySink();
      recordFrames(2);
      await expect(controller.saveSession(sink)).resolves.toBeNull();
      expect(sink.saved).toHaveLength(0);
    });

    it("should persist and return to idle", async () => {
      const sink = new MemorySink();
      recordFrames(4);
      controller.stopCapture();

      const record = await controller.saveSession(sink);

      expect(record?.frameCount).toBe(4);
      expect(sink.saved).toHaveLength(1);
      expect(controller.state).toBe("idle");
      expect(controller.lastAssessments).not.toBeNull();
      expect(useCaptureStore.getState().lastSavedSessionId).toBe(record?.id);
      const [notification] = useNotificationStore.getState().notifications;
      expect(notification.type).toBe("success");
      expect(notification.title).toBe("Session saved");
    });

    it("should keep the session after a failed write", async () => {
      const sink = new MemorySink();
      sink.failNext = true;
      recordFrames(4);
      controller.stopCapture();

      await expect(controller.saveSession(sink)).resolves.toBeNull();
      expect(controller.state).toBe("finished");
      expect(controller.recorder.frameCount).toBe(4);
      expect(useCaptureStore.getState().errorMessage).toBe("Your session could not be saved.");

      const retried = await controller.saveSession(sink);
      expect(retried?.frameCount).toBe(4);
      expect(sink.saved).toHaveLength(1);
    });

    it("should save with rule results when the model source throws", async () => {
      controller.dispose();
      controller = new CaptureController({
        bodyTracker: tracker,
        motion,
        pedometer,
        now: () => clock,
        models: {
          useModels: true,
          loadModel: () => {
            throw new Error("model file corrupt");
          },
        },
      });
      const sink = new MemorySink();
      recordFrames(4);
      controller.stopCapture();

      const record = await controller.saveSession(sink);

      expect(record?.frameCount).toBe(4);
      expect(record?.postureScore).toBe(controller.lastAssessments?.posture?.score);
      expect(sink.saved).toHaveLength(1);
    });

    it("should report a failed finalize instead of throwing", async () => {
      const sink = new MemorySink();
      recordFrames(4);
      controller.stopCapture();
      vi.spyOn(controller.orchestrator.analyzers.gait, "sessionSummary").mockImplementation(() => {
        throw new Error("corrupt gait history");
      });

      await expect(controller.saveSession(sink)).resolves.toBeNull();
      expect(controller.state).toBe("finished");
      expect(sink.saved).toHaveLength(0);
      expect(useCaptureStore.getState().errorMessage).toBe("Your session could not be saved.");
    });

    it("should drop a finished session on discard", () => {
      recordFrames(2);
      controller.stopCapture();
      expect(controller.discardSession()).toBe(true);
      expect(controller.state).toBe("idle");
      expect(controller.recorder.frameCount).toBe(0);
    });
  });
});
