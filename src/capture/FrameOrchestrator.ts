/**
 * Frame Orchestrator
 * ==================
 *
 * The real-time loop. One `onJointFrame` call per body-tracker tick:
 *
 * - calibrating: counts down from the first callback and starts recording
 *   (and the sensor services) once the calibration time has passed
 * - recording: advances the frame index, runs posture and gait every tick
 *   and the heavier analyzers on their throttle schedule, then pushes one
 *   BodyFrame to the recorder
 * - any other state: no-op
 *
 * Everything runs synchronously on the caller's tick, in a fixed order.
 */

import { resolveConfig, type EngineConfig, type EngineConfigOverrides } from "../lib/config";
import { captureLog } from "../lib/logger";
import type { PedometerSnapshot } from "../analysis/DistanceTracker";
import type { JointMap } from "../models/JointName";
import type { MotionSample, StepEvent } from "../models/frames";
import { createCaptureAnalyzers, resetCaptureAnalyzers, type CaptureAnalyzers } from "./CaptureAnalyzers";
import { FrameIndex } from "./FrameIndex";
import { LiveMetrics, type LiveMetricsSnapshot } from "./LiveMetrics";
import type { SessionRecorder } from "./SessionRecorder";

/** IMU confidence below which a joint-detected step is flagged. */
export const LOW_CONFIDENCE_STEP = 0.2;

export interface FrameOrchestratorOptions {
  recorder: SessionRecorder;
  analyzers?: CaptureAnalyzers;
  config?: EngineConfigOverrides;
  /** Wall clock (ms), drives the calibration countdown */
  now?: () => number;
  /** Called once when calibration completes; start the sensor services here */
  onRecordingStarted?: () => void;
  /** Called when the live posture score drops below the alert threshold */
  onPostureAlert?: (score: number) => void;
}

export class FrameOrchestrator {
  readonly analyzers: CaptureAnalyzers;
  readonly live = new LiveMetrics();

  private readonly recorder: SessionRecorder;
  private readonly config: EngineConfig;
  private readonly now: () => number;
  private readonly onRecordingStarted?: () => void;
  private readonly onPostureAlert?: (score: number) => void;

  private frameIndex = FrameIndex.initial;
  private lastAlertIndex: FrameIndex | null = null;
  private calibrationStartedAt: number | null = null;
  private _calibrationCountdown: number;
  private _isBodyDetected = false;

  constructor(options: FrameOrchestratorOptions) {
    this.recorder = options.recorder;
    this.analyzers = options.analyzers ?? createCaptureAnalyzers();
    this.config = resolveConfig(options.config);
    this.now = options.now ?? Date.now;
    this.onRecordingStarted = options.onRecordingStarted;
    this.onPostureAlert = options.onPostureAlert;
    this._calibrationCountdown = Math.ceil(this.config.calibrationDurationSec);
  }

  /** Whole seconds left in calibration. */
  get calibrationCountdown(): number {
    return this._calibrationCountdown;
  }

  get isBodyDetected(): boolean {
    return this._isBodyDetected;
  }

  get currentFrameIndex(): number {
    return this.frameIndex.value;
  }

  snapshot(): Readonly<LiveMetricsSnapshot> {
    return this.live.snapshot();
  }

  // ==========================================================================
  // BODY TRACKER
  // ==========================================================================

  onJointFrame(joints: JointMap, timestamp: number): void {
    this._isBodyDetected = true;

    switch (this.recorder.state) {
      case "calibrating":
        this.calibrate();
        return;
      case "recording":
        this.processFrame(joints, timestamp);
        return;
      default:
        return;
    }
  }

  private calibrate(): void {
    const now = this.now();
    if (this.calibrationStartedAt === null) this.calibrationStartedAt = now;

    const elapsed = (now - this.calibrationStartedAt) / 1000;
    const duration = this.config.calibrationDurationSec;
    this._calibrationCountdown = Math.max(0, Math.ceil(duration - elapsed));

    if (elapsed >= duration && this.recorder.startRecording()) {
      this._calibrationCountdown = 0;
      captureLog.info(`Calibration complete after ${elapsed.toFixed(2)}s`);
      this.onRecordingStarted?.();
    }
  }

  private processFrame(joints: JointMap, timestamp: number): void {
    const a = this.analyzers;
    this.frameIndex = this.frameIndex.next();
    this.live.setFrameIndex(this.frameIndex.value);
    const due = this.frameIndex.schedule(this.config.throttle);

    // Every tick
    const posture = a.posture.analyze(joints);
    if (posture) this.live.setPosture(posture);

    // Occluded feet: no result this tick, the cached gait stays
    const gait = a.gait.processFrame(joints, timestamp);
    if (gait) {
      this.live.setGait(gait);
      if (gait.stepDetected) this.recordStep(gait.stepDetected);
    }

    if (joints.root) a.distance.addRootPosition(joints.root.x, joints.root.z);

    // Throttled
    if (due.rom) {
      const rom = a.rom.analyze(joints);
      a.rom.recordFrame(rom);
      this.live.setROM(rom);
    }

    if (due.balance && joints.root) {
      const balance = a.balance.processFrame(joints.root, timestamp);
      this.live.setBalance(balance, a.balance.isStanding);
    }

    if (due.ergonomics) {
      const reba = a.ergonomics.computeREBA(joints);
      if (reba) this.live.setREBA(reba);
    }

    if (due.fatigue && posture) {
      const cachedGait = this.live.gait;
      a.fatigue.recordTimePoint({
        timestamp,
        postureScore: posture.score,
        trunkLeanDeg: posture.metrics.sagittalTrunkLeanDeg,
        lateralLeanDeg: posture.metrics.frontalTrunkLeanDeg,
        cadenceSPM: cachedGait?.cadenceSPM ?? 0,
        walkingSpeedMPS: cachedGait?.walkingSpeedMPS ?? 0,
      });
    }

    this.recorder.recordFrame(this.live.toBodyFrame(timestamp, joints));
    this.checkPostureAlert();
  }

  /** Cross-check against the IMU; low-confidence steps are kept and flagged. */
  private recordStep(step: StepEvent): void {
    const imu = this.analyzers.imuSteps;
    const imuConfidence = imu.covers(step.timestamp) ? imu.validateStep(step.timestamp) : null;
    const lowConfidence = imuConfidence !== null && imuConfidence < LOW_CONFIDENCE_STEP;
    if (lowConfidence) {
      captureLog.debug(`Low IMU confidence step at ${step.timestamp.toFixed(3)}s`);
    }
    this.recorder.recordStep({ ...step, imuConfidence, lowConfidence });
    this.live.setStepCount(this.recorder.stepCount);
  }

  private checkPostureAlert(): void {
    const score = this.live.postureScore;
    if (score === null || score >= this.config.postureAlertThreshold) return;
    if (
      this.lastAlertIndex !== null &&
      this.frameIndex.since(this.lastAlertIndex) < this.config.postureAlertCooldownFrames
    ) {
      return;
    }
    this.lastAlertIndex = this.frameIndex;
    this.onPostureAlert?.(score);
  }

  // ==========================================================================
  // MOTION & PEDOMETER
  // ==========================================================================

  onMotionSample(sample: MotionSample): void {
    if (!this.recorder.recordMotionSample(sample)) return;
    const a = this.analyzers;

    const step = a.imuSteps.processSample(sample.timestamp, sample.userAcceleration.y);
    if (step) {
      this.live.setImu({ cadenceSPM: step.instantCadenceSPM, stepCount: a.imuSteps.stepCount });
    }

    a.trunk.processSample(sample);
    a.smoothness.recordSample({
      timestamp: sample.timestamp,
      ap: sample.userAcceleration.z,
      ml: sample.userAcceleration.x,
      v: sample.userAcceleration.y,
    });
  }

  onPedometerSnapshot(snapshot: PedometerSnapshot): void {
    const state = this.recorder.state;
    if (state !== "recording" && state !== "paused") return;
    this.analyzers.distance.updatePedometer(snapshot);
    this.live.setPedometer(snapshot);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  reset(): void {
    resetCaptureAnalyzers(this.analyzers);
    this.live.reset();
    this.frameIndex = FrameIndex.initial;
    this.lastAlertIndex = null;
    this.calibrationStartedAt = null;
    this._calibrationCountdown = Math.ceil(this.config.calibrationDurationSec);
    this._isBodyDetected = false;
  }
}
