/**
 * Capture Controller
 *
 * Session lifecycle for callers: wires the sensor services to the
 * orchestrator, drives the recorder through start, pause, stop and cancel,
 * and finalizes and persists a finished session. Errors are published to
 * the notification and capture stores; none is thrown past this class.
 */

import { loadConfig, type EngineConfig, type EngineConfigOverrides } from "../lib/config";
import { AppError, toAppError, type SensorKind } from "../lib/errors";
import { captureLog, setLogLevel } from "../lib/logger";
import type { SessionSink } from "../lib/db/types";
import { createSessionAnalyzers } from "../ml/DualPathAnalyzers";
import { ModelService, type ModelSource } from "../ml/ModelService";
import type { SessionRecord } from "../models/session";
import { useCaptureStore } from "../store/useCaptureStore";
import { useNotificationStore } from "../store/useNotificationStore";
import { FrameOrchestrator } from "./FrameOrchestrator";
import type { LiveMetricsSnapshot } from "./LiveMetrics";
import type { BodyTracker, MotionService, PedometerService } from "./sensors";
import {
  SessionFinalizer,
  type SessionAssessments,
  type SessionFinalization,
  type SubjectProfile,
} from "./SessionFinalizer";
import { SessionRecorder, type RecordingState } from "./SessionRecorder";

export interface CaptureControllerOptions {
  bodyTracker: BodyTracker;
  motion: MotionService;
  pedometer?: PedometerService | null;
  config?: EngineConfigOverrides;
  /** Model source for the session-level analyzers; rule-based only when omitted */
  models?: ModelSource;
  profile?: SubjectProfile;
  /** Wall clock (ms) */
  now?: () => number;
  /** Defaults to a posture warning in the notification store */
  onPostureAlert?: (score: number) => void;
}

export class CaptureController {
  readonly recorder: SessionRecorder;
  readonly orchestrator: FrameOrchestrator;

  private readonly config: EngineConfig;
  private readonly bodyTracker: BodyTracker;
  private readonly motion: MotionService;
  private readonly pedometer: PedometerService | null;
  private readonly finalizer: SessionFinalizer;
  private readonly profile?: SubjectProfile;
  private timer: ReturnType<typeof setInterval> | null = null;
  private _lastAssessments: SessionAssessments | null = null;

  constructor(options: CaptureControllerOptions) {
    this.config = loadConfig(options.config);
    setLogLevel(this.config.logLevel);
    this.bodyTracker = options.bodyTracker;
    this.motion = options.motion;
    this.pedometer = options.pedometer ?? null;
    this.profile = options.profile;

    this.recorder = new SessionRecorder({
      capacity: this.config.recorderCapacity,
      now: options.now,
    });
    this.orchestrator = new FrameOrchestrator({
      recorder: this.recorder,
      config: this.config,
      now: options.now,
      onRecordingStarted: () => this.startSensors(),
      onPostureAlert:
        options.onPostureAlert ?? ((score) => useNotificationStore.getState().postureAlert(score)),
    });
    this.finalizer = new SessionFinalizer(
      createSessionAnalyzers(
        options.models ?? new ModelService(null, this.config.useInferenceModels),
      ),
    );
  }

  get state(): RecordingState {
    return this.recorder.state;
  }

  get elapsedTime(): number {
    return this.recorder.elapsedTime;
  }

  /** Full session-level results of the last successful save. */
  get lastAssessments(): SessionAssessments | null {
    return this._lastAssessments;
  }

  /** Best-effort live view; throttled values may be a few ticks old. */
  liveMetrics(): Readonly<LiveMetricsSnapshot> {
    return this.orchestrator.snapshot();
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /** Begin calibration. False when a session is active or a sensor is missing. */
  startCapture(): boolean {
    if (this.recorder.state !== "idle") return false;

    const missing = this.missingSensor();
    if (missing) {
      this.report(new AppError({ kind: "sensorUnavailable", sensor: missing }));
      return false;
    }
    if (this.pedometer && !this.pedometer.isAvailable) {
      captureLog.warn("Pedometer unavailable, distance falls back to body tracking");
    }

    this.orchestrator.reset();
    this.recorder.startCalibration();

    this.bodyTracker.onJointFrame = (joints, timestamp) =>
      this.orchestrator.onJointFrame(joints, timestamp);
    this.motion.onMotionSample = (sample) => this.orchestrator.onMotionSample(sample);
    if (this.pedometer) {
      this.pedometer.onSnapshot = (snapshot) => this.orchestrator.onPedometerSnapshot(snapshot);
    }
    this.bodyTracker.start();

    useCaptureStore.getState().update({ errorMessage: null });
    this.startTimer();
    this.publish();
    return true;
  }

  togglePause(): void {
    switch (this.recorder.state) {
      case "recording":
        this.recorder.pause();
        this.motion.stop();
        this.stopTimer();
        break;
      case "paused":
        this.recorder.resume();
        this.motion.start();
        this.startTimer();
        break;
      default:
        return;
    }
    this.publish();
  }

  /** Finish recording. Valid from recording or paused. */
  stopCapture(): boolean {
    if (!this.recorder.stop()) return false;
    this.stopAllSensors();
    this.stopTimer();
    this.publish();
    return true;
  }

  /** Discard the session; nothing is persisted. */
  cancelCapture(): boolean {
    if (!this.recorder.cancel()) return false;
    this.stopAllSensors();
    this.stopTimer();
    this.orchestrator.reset();
    this.publish();
    return true;
  }

  /** Drop a finished session without saving it. */
  discardSession(): boolean {
    if (this.recorder.state !== "finished") return false;
    this.recorder.reset();
    this.orchestrator.reset();
    this.publish();
    return true;
  }

  /**
   * Finalize and persist a finished session. Returns null when there is
   * nothing to save or the write fails; after a failure the recorded data
   * is kept so the save can be retried.
   */
  async saveSession(sink: SessionSink): Promise<SessionRecord | null> {
    if (this.recorder.state !== "finished") {
      captureLog.warn(`saveSession ignored in state ${this.recorder.state}`);
      return null;
    }

    let finalized: SessionFinalization;
    try {
      finalized = this.finalizer.finalize({
        snapshot: this.recorder.snapshot(),
        analyzers: this.orchestrator.analyzers,
        profile: this.profile,
      });
      await sink.saveSessionRecord(finalized.record, finalized.series);
    } catch (error) {
      this.report(toAppError(error, { kind: "sessionSaveFailed" }));
      return null;
    }
    const { record, assessments } = finalized;

    this._lastAssessments = assessments;
    this.recorder.reset();
    this.orchestrator.reset();
    useCaptureStore.getState().update({ lastSavedSessionId: record.id, errorMessage: null });
    this.publish();
    useNotificationStore.getState().success("Session saved");
    return record;
  }

  /** Stop timers and sensors; the controller can be dropped afterwards. */
  dispose(): void {
    this.stopTimer();
    this.stopAllSensors();
    this.bodyTracker.onJointFrame = null;
    this.motion.onMotionSample = null;
    if (this.pedometer) this.pedometer.onSnapshot = null;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private missingSensor(): SensorKind | null {
    if (!this.bodyTracker.isAvailable) return "bodyTracking";
    if (!this.motion.isAvailable) return "motion";
    return null;
  }

  private startSensors(): void {
    this.motion.start();
    if (this.pedometer?.isAvailable) this.pedometer.start();
    captureLog.info("Sensor services started");
  }

  private stopAllSensors(): void {
    this.bodyTracker.stop();
    this.motion.stop();
    this.pedometer?.stop();
  }

  private report(error: AppError): void {
    captureLog.error(error.message, error.cause);
    useCaptureStore.getState().setError(error.message);
    useNotificationStore.getState().notifyError(error);
  }

  private startTimer(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.publish(), this.config.elapsedRefreshMs);
  }

  private stopTimer(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Push display state to the capture store. */
  publish(): void {
    const live = this.orchestrator.snapshot();
    useCaptureStore.getState().update({
      recordingState: this.recorder.state,
      elapsedTime: this.recorder.elapsedTime,
      calibrationCountdown: this.orchestrator.calibrationCountdown,
      isBodyDetected: this.orchestrator.isBodyDetected,
      postureScore: live.posture?.score ?? null,
      cadenceSPM: live.gait?.cadenceSPM ?? null,
      stepCount: this.recorder.stepCount,
      frameCount: this.recorder.frameCount,
    });
  }
}
