/**
 * Session Recorder
 *
 * Recording state machine plus the bounded buffers of one capture:
 *
 *   idle → calibrating → recording ⇄ paused → finished → idle
 *
 * `cancel()` returns to idle from any active state and drops everything
 * buffered. When the frame buffer reaches capacity, the oldest half is
 * thinned to every second frame so the recording keeps its full time span
 * and the newest data stays at full resolution.
 */

import { DEFAULT_ENGINE_CONFIG } from "../lib/config";
import { recorderLog } from "../lib/logger";
import type { BodyFrame, MotionSample, StepEvent } from "../models/frames";
import type { SessionTimeSeries } from "../models/session";

export type RecordingState = "idle" | "calibrating" | "recording" | "paused" | "finished";

export interface SessionRecorderOptions {
  /** Frame buffer capacity; the motion buffer uses the same bound */
  capacity?: number;
  /** Wall clock (ms) */
  now?: () => number;
}

/** Immutable view of the buffers at one instant. */
export interface RecorderSnapshot extends SessionTimeSeries {
  state: RecordingState;
  elapsedTime: number;
  /** Wall-clock start of recording (ms), null before recording */
  startedAt: number | null;
}

const TRANSITIONS: Record<RecordingState, readonly RecordingState[]> = {
  idle: ["calibrating", "recording"],
  calibrating: ["recording", "idle"],
  recording: ["paused", "finished", "idle"],
  paused: ["recording", "finished", "idle"],
  finished: ["idle"],
};

export function canTransition(from: RecordingState, to: RecordingState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Keep every second item of the oldest half, then the newest half intact.
 * A buffer of n items shrinks to ceil(floor(n/2) / 2) + ceil(n/2).
 */
export function decimateOldestHalf<T>(items: readonly T[]): T[] {
  const half = Math.floor(items.length / 2);
  const result: T[] = [];
  for (let i = 0; i < half; i += 2) result.push(items[i]);
  for (let i = half; i < items.length; i++) result.push(items[i]);
  return result;
}

export class SessionRecorder {
  private _state: RecordingState = "idle";
  private readonly capacity: number;
  private readonly now: () => number;

  private startedAt: number | null = null;
  private pausedAt: number | null = null;
  private stoppedAt: number | null = null;
  private accumulatedPauseMs = 0;

  private frames: BodyFrame[] = [];
  private steps: StepEvent[] = [];
  private motion: MotionSample[] = [];
  private _decimations = 0;

  constructor(options: SessionRecorderOptions = {}) {
    this.capacity = Math.max(2, options.capacity ?? DEFAULT_ENGINE_CONFIG.recorderCapacity);
    this.now = options.now ?? Date.now;
  }

  get state(): RecordingState {
    return this._state;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  get stepCount(): number {
    return this.steps.length;
  }

  get motionSampleCount(): number {
    return this.motion.length;
  }

  /** How many times the frame buffer has been thinned this session. */
  get decimations(): number {
    return this._decimations;
  }

  /** Recording time in seconds, excluding paused time. */
  get elapsedTime(): number {
    if (this.startedAt === null) return 0;
    let end: number;
    switch (this._state) {
      case "recording":
        end = this.now();
        break;
      case "paused":
        end = this.pausedAt ?? this.now();
        break;
      case "finished":
        end = this.stoppedAt ?? this.now();
        break;
      default:
        return 0;
    }
    return Math.max(0, (end - this.startedAt - this.accumulatedPauseMs) / 1000);
  }

  // ==========================================================================
  // STATE TRANSITIONS
  // ==========================================================================

  startCalibration(): boolean {
    if (!this.transition("calibrating")) return false;
    recorderLog.info("Calibration started");
    return true;
  }

  startRecording(): boolean {
    if (!this.transition("recording")) return false;
    this.startedAt = this.now();
    this.pausedAt = null;
    this.stoppedAt = null;
    this.accumulatedPauseMs = 0;
    recorderLog.info("Recording started");
    return true;
  }

  pause(): boolean {
    if (this._state !== "recording") return false;
    this._state = "paused";
    this.pausedAt = this.now();
    return true;
  }

  resume(): boolean {
    if (this._state !== "paused" || this.pausedAt === null) return false;
    this.accumulatedPauseMs += this.now() - this.pausedAt;
    this.pausedAt = null;
    this._state = "recording";
    return true;
  }

  /** Valid from recording or paused only. */
  stop(): boolean {
    if (this._state !== "recording" && this._state !== "paused") return false;
    const now = this.now();
    if (this._state === "paused" && this.pausedAt !== null) {
      this.accumulatedPauseMs += now - this.pausedAt;
      this.pausedAt = null;
    }
    this.stoppedAt = now;
    this._state = "finished";
    recorderLog.info(
      `Recording stopped: ${this.frames.length} frames, ${this.steps.length} steps`,
    );
    return true;
  }

  /** Discard the session from calibrating, recording or paused. */
  cancel(): boolean {
    if (this._state !== "calibrating" && this._state !== "recording" && this._state !== "paused") {
      return false;
    }
    const discarded = this.frames.length;
    this.reset();
    recorderLog.info(`Recording cancelled, ${discarded} frames discarded`);
    return true;
  }

  /** Back to idle with empty buffers, from any state. */
  reset(): void {
    this._state = "idle";
    this.startedAt = null;
    this.pausedAt = null;
    this.stoppedAt = null;
    this.accumulatedPauseMs = 0;
    this.frames = [];
    this.steps = [];
    this.motion = [];
    this._decimations = 0;
    recorderLog.debug("Recorder reset");
  }

  private transition(to: RecordingState): boolean {
    if (!canTransition(this._state, to)) {
      recorderLog.debug(`Ignored transition ${this._state} → ${to}`);
      return false;
    }
    this._state = to;
    return true;
  }

  // ==========================================================================
  // DATA COLLECTION
  // ==========================================================================

  recordFrame(frame: BodyFrame): boolean {
    if (this._state !== "recording") return false;
    if (this.frames.length >= this.capacity) {
      this.frames = decimateOldestHalf(this.frames);
      this._decimations++;
      recorderLog.debug(`Frame buffer decimated to ${this.frames.length}`);
    }
    this.frames.push(frame);
    return true;
  }

  recordStep(step: StepEvent): boolean {
    if (this._state !== "recording") return false;
    this.steps.push(step);
    return true;
  }

  recordMotionSample(sample: MotionSample): boolean {
    if (this._state !== "recording") return false;
    if (this.motion.length >= this.capacity) {
      this.motion = decimateOldestHalf(this.motion);
    }
    this.motion.push(sample);
    return true;
  }

  /** Copies of the buffers; later appends never show up in a snapshot. */
  snapshot(): RecorderSnapshot {
    return {
      state: this._state,
      elapsedTime: this.elapsedTime,
      startedAt: this.startedAt,
      frames: this.frames.slice(),
      steps: this.steps.slice(),
      motion: this.motion.slice(),
    };
  }
}
