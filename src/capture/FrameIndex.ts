/**
 * Monotonic frame counter for the recording loop. Immutable: the
 * orchestrator replaces its index on every tick, so the throttle schedule
 * of a tick depends only on the index it was handed.
 */

import type { ThrottleConfig } from "../lib/config";

export interface ThrottleSchedule {
  rom: boolean;
  balance: boolean;
  ergonomics: boolean;
  fatigue: boolean;
}

export class FrameIndex {
  static readonly initial = new FrameIndex(0);

  private constructor(readonly value: number) {}

  next(): FrameIndex {
    return new FrameIndex(this.value + 1);
  }

  /** True on every `every`th index; 1 or less means every tick. */
  isDue(every: number): boolean {
    if (every <= 1) return true;
    return this.value > 0 && this.value % every === 0;
  }

  /** Frames elapsed since `earlier`. */
  since(earlier: FrameIndex): number {
    return this.value - earlier.value;
  }

  schedule(throttle: ThrottleConfig): ThrottleSchedule {
    return {
      rom: this.isDue(throttle.romEvery),
      balance: this.isDue(throttle.balanceEvery),
      ergonomics: this.isDue(throttle.ergonomicsEvery),
      fatigue: this.isDue(throttle.fatigueEvery),
    };
  }
}
