/**
 * IMU Step Detector
 * =================
 *
 * Step detection from device vertical acceleration, used both as an
 * independent cadence source and to validate joint-detected heel strikes.
 *
 * ## Pipeline
 * 1. |vertical user acceleration| (g)
 * 2. 2nd-order Butterworth low-pass at 5 Hz
 * 3. Local peak with one sample of lag
 * 4. Adaptive threshold over recent candidate peaks:
 *    max(0.08 g, min(mean − 1.2·SD, mean / 2))
 * 5. 250 ms refractory period
 *
 * References:
 * - Zijlstra W & Hof AL, Gait & Posture, 2003
 * - Brajdic A & Harle R, UbiComp, 2013 (walk detection and step counting)
 *
 * @module analysis/IMUStepDetector
 */

import { ButterworthLowPass } from "../lib/signal/SignalProcessor";

// ============================================================================
// INTERFACES
// ============================================================================

export interface IMUStepEvent {
  timestamp: number;
  instantCadenceSPM: number;
  /** Filtered peak vertical acceleration (g) */
  impactMagnitudeG: number;
}

export interface IMUStepDetectorConfig {
  sampleRateHz: number;
  cutoffHz: number;
  refractorySec: number;
  /** SD multiplier below the mean peak */
  thresholdK: number;
  minAccelerationG: number;
  /** Candidate peaks kept for the adaptive threshold */
  thresholdWindow: number;
  /** Threshold never exceeds this fraction of the mean peak */
  maxThresholdRatio: number;
  /** ± window for validating a joint-detected step (s) */
  validationWindowSec: number;
  maxSamples: number;
  maxStepHistory: number;
  cadenceWindowSec: number;
}

const DEFAULT_CONFIG: IMUStepDetectorConfig = {
  sampleRateHz: 60,
  cutoffHz: 5,
  refractorySec: 0.25,
  thresholdK: 1.2,
  minAccelerationG: 0.08,
  thresholdWindow: 50,
  maxThresholdRatio: 0.5,
  validationWindowSec: 0.1,
  maxSamples: 300, // 5 s at 60 Hz
  maxStepHistory: 100,
  cadenceWindowSec: 10,
};

interface FilteredSample {
  timestamp: number;
  filtered: number;
}

// ============================================================================
// DETECTOR
// ============================================================================

export class IMUStepDetector {
  private config: IMUStepDetectorConfig;
  private filter: ButterworthLowPass;
  private samples: FilteredSample[] = [];
  private peaks: number[] = [];
  private stepTimes: number[] = [];
  private lastStepTime = -1;
  private steps = 0;

  constructor(config: Partial<IMUStepDetectorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.filter = new ButterworthLowPass(this.config.cutoffHz, this.config.sampleRateHz);
  }

  get stepCount(): number {
    return this.steps;
  }

  get cadenceSPM(): number {
    return this.computeCadence();
  }

  /**
   * Feed one sample of vertical user acceleration (g). Returns the step
   * found at the previous sample, if any.
   */
  processSample(timestamp: number, verticalAccelerationG: number): IMUStepEvent | null {
    const filtered = this.filter.process(Math.abs(verticalAccelerationG));
    this.samples.push({ timestamp, filtered });
    if (this.samples.length > this.config.maxSamples) this.samples.shift();

    const n = this.samples.length;
    if (n < 3) return null;

    const prev = this.samples[n - 3].filtered;
    const candidate = this.samples[n - 2];
    const next = this.samples[n - 1].filtered;

    if (!(candidate.filtered > prev && candidate.filtered > next)) return null;
    if (candidate.filtered <= this.config.minAccelerationG) return null;

    // Every candidate feeds the threshold, accepted or not, so one large
    // transient cannot lock out the rest of the walk
    const threshold = this.adaptiveThreshold();
    this.peaks.push(candidate.filtered);
    if (this.peaks.length > this.config.thresholdWindow) this.peaks.shift();

    if (candidate.filtered < threshold) return null;
    if (candidate.timestamp - this.lastStepTime < this.config.refractorySec) return null;

    this.lastStepTime = candidate.timestamp;
    this.steps++;
    this.stepTimes.push(candidate.timestamp);
    if (this.stepTimes.length > this.config.maxStepHistory) this.stepTimes.shift();

    return {
      timestamp: candidate.timestamp,
      instantCadenceSPM: this.computeCadence(),
      impactMagnitudeG: candidate.filtered,
    };
  }

  /**
   * Confidence (0–1) that a joint-detected step at `timestamp` coincides with
   * an acceleration peak. 0 when no motion data covers the time.
   */
  validateStep(timestamp: number): number {
    const { validationWindowSec } = this.config;
    let best: number | null = null;
    for (const s of this.samples) {
      if (s.timestamp < timestamp - validationWindowSec || s.timestamp > timestamp + validationWindowSec) {
        continue;
      }
      if (best === null || s.filtered > best) best = s.filtered;
    }
    if (best === null) return 0;

    const threshold = this.adaptiveThreshold();
    if (threshold <= 0) return 0.5;
    // ratio 0.5 → 0, ratio 1.0 → 1
    return Math.min(1, Math.max(0, best / threshold - 0.5) * 2);
  }

  /** True when any motion sample falls within the validation window. */
  covers(timestamp: number): boolean {
    const w = this.config.validationWindowSec;
    return this.samples.some((s) => Math.abs(s.timestamp - timestamp) <= w);
  }

  reset(): void {
    this.filter.reset();
    this.samples = [];
    this.peaks = [];
    this.stepTimes = [];
    this.lastStepTime = -1;
    this.steps = 0;
  }

  private adaptiveThreshold(): number {
    const { minAccelerationG, thresholdK, maxThresholdRatio } = this.config;
    if (this.peaks.length === 0) return minAccelerationG;
    let sum = 0;
    for (const p of this.peaks) sum += p;
    const m = sum / this.peaks.length;
    let ss = 0;
    for (const p of this.peaks) ss += (p - m) * (p - m);
    // Population SD over the peak window
    const sd = Math.sqrt(ss / this.peaks.length);
    // Equal peaks give SD 0; the cap keeps a steady rhythm above threshold
    return Math.max(minAccelerationG, Math.min(m - thresholdK * sd, m * maxThresholdRatio));
  }

  private computeCadence(): number {
    if (this.stepTimes.length < 2) return 0;
    const latest = this.stepTimes[this.stepTimes.length - 1];
    const recent = this.stepTimes.filter((t) => t >= latest - this.config.cadenceWindowSec);
    if (recent.length < 2) return 0;
    const duration = recent[recent.length - 1] - recent[0];
    if (duration <= 0.3) return 0;
    return ((recent.length - 1) / duration) * 60;
  }
}

export const imuStepDetector = new IMUStepDetector();
