/**
 * Smoothness Analyzer
 * ===================
 *
 * Movement smoothness from trunk acceleration.
 *
 * ## Metrics
 * - SPARC: negative arc length of the normalized magnitude spectrum of
 *   |a| up to 20 Hz. Normal walking ≈ −1.5 to −2.5; more negative = less smooth
 * - Harmonic ratio: even/odd (AP) and odd/even (ML) harmonic sums of the
 *   stride frequency, 20 harmonics. Normal > 2.0 AP, > 1.5 ML
 * - Normalized jerk of |a|
 *
 * References:
 * - Balasubramanian S et al., J NeuroEng Rehabil, 2015 (SPARC)
 * - Menz HB et al., Gait & Posture, 2003 (harmonic ratio)
 *
 * @module analysis/SmoothnessAnalyzer
 */

import { dftBinMagnitude, magnitudeSpectrum } from "../lib/signal/SignalProcessor";

// ============================================================================
// INTERFACES
// ============================================================================

export interface SmoothnessMetrics {
  sparcScore: number;
  harmonicRatioAP: number;
  harmonicRatioML: number;
  normalizedJerk: number;
}

export interface AccelerationSample {
  timestamp: number;
  /** Anteroposterior (g) */
  ap: number;
  /** Mediolateral (g) */
  ml: number;
  /** Vertical (g) */
  v: number;
}

export interface SmoothnessAnalyzerConfig {
  /** Minimum samples for spectral analysis (~2 s at 60 Hz) */
  minSamples: number;
  minDurationSec: number;
  maxSamples: number;
  sparcMaxFrequencyHz: number;
  harmonics: number;
  strideMinHz: number;
  strideMaxHz: number;
  defaultStrideHz: number;
}

const DEFAULT_CONFIG: SmoothnessAnalyzerConfig = {
  minSamples: 128,
  minDurationSec: 0.5,
  maxSamples: 36_000, // ~10 min at 60 Hz
  sparcMaxFrequencyHz: 20,
  harmonics: 20,
  strideMinHz: 0.7,
  strideMaxHz: 1.3,
  defaultStrideHz: 1.0,
};

const EMPTY_METRICS: SmoothnessMetrics = {
  sparcScore: 0,
  harmonicRatioAP: 0,
  harmonicRatioML: 0,
  normalizedJerk: 0,
};

// ============================================================================
// ANALYZER
// ============================================================================

export class SmoothnessAnalyzer {
  private config: SmoothnessAnalyzerConfig;
  private samples: AccelerationSample[] = [];

  constructor(config: Partial<SmoothnessAnalyzerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  /** Enough samples, over enough time, for a spectral estimate. */
  get hasEnoughData(): boolean {
    const n = this.samples.length;
    if (n < this.config.minSamples) return false;
    return this.samples[n - 1].timestamp - this.samples[0].timestamp > this.config.minDurationSec;
  }

  recordSample(sample: AccelerationSample): void {
    this.samples.push(sample);
    if (this.samples.length > this.config.maxSamples) {
      this.samples.splice(0, this.samples.length - this.config.maxSamples);
    }
  }

  analyze(): SmoothnessMetrics {
    const { minSamples, minDurationSec } = this.config;
    if (this.samples.length < minSamples) return { ...EMPTY_METRICS };

    const duration = this.samples[this.samples.length - 1].timestamp - this.samples[0].timestamp;
    if (duration <= minDurationSec) return { ...EMPTY_METRICS };
    const fs = this.samples.length / duration;

    const magnitudes = this.samples.map((s) => Math.sqrt(s.ap * s.ap + s.ml * s.ml + s.v * s.v));

    return {
      sparcScore: computeSPARC(magnitudes, fs, this.config.sparcMaxFrequencyHz),
      harmonicRatioAP: this.harmonicRatio(this.samples.map((s) => s.ap), fs, false),
      harmonicRatioML: this.harmonicRatio(this.samples.map((s) => s.ml), fs, true),
      normalizedJerk: computeNormalizedJerk(magnitudes, fs, duration),
    };
  }

  reset(): void {
    this.samples = [];
  }

  // ==========================================================================
  // HARMONIC RATIO
  // ==========================================================================

  /** AP/vertical: even ÷ odd. ML: odd ÷ even. 0 when the divisor is ~0. */
  private harmonicRatio(signal: readonly number[], fs: number, mediolateral: boolean): number {
    const n = signal.length;
    if (n < 4) return 0;

    const fundamental = this.estimateStrideFrequency(signal, fs);
    const binSize = fs / n;
    let even = 0;
    let odd = 0;

    for (let h = 1; h <= this.config.harmonics; h++) {
      const k = Math.round((fundamental * h) / binSize);
      if (k >= n / 2) break;
      const magnitude = dftBinMagnitude(signal, k);
      if (h % 2 === 0) even += magnitude;
      else odd += magnitude;
    }

    if (mediolateral) return even > 1e-10 ? odd / even : 0;
    return odd > 1e-10 ? even / odd : 0;
  }

  /** Dominant frequency within the stride band; the default when the band is empty. */
  private estimateStrideFrequency(signal: readonly number[], fs: number): number {
    const { strideMinHz, strideMaxHz, defaultStrideHz } = this.config;
    const n = signal.length;
    const binSize = fs / n;
    const minBin = Math.max(1, Math.floor(strideMinHz / binSize));
    const maxBin = Math.min(Math.floor(n / 2) - 1, Math.floor(strideMaxHz / binSize));
    if (minBin >= maxBin) return defaultStrideHz;

    let peakBin = Math.floor(defaultStrideHz / binSize);
    let peakMagnitude = 0;
    for (let k = minBin; k <= maxBin; k++) {
      const magnitude = dftBinMagnitude(signal, k);
      if (magnitude > peakMagnitude) {
        peakMagnitude = magnitude;
        peakBin = k;
      }
    }
    return peakBin * binSize;
  }
}

// ============================================================================
// SPARC / JERK
// ============================================================================

/**
 * Spectral arc length of the peak-normalized magnitude spectrum, with the
 * frequency axis normalized to the cut-off. Returns ≤ 0.
 */
export function computeSPARC(signal: readonly number[], fs: number, maxFrequencyHz = 20): number {
  if (signal.length < 4) return 0;
  const maxFrequency = Math.min(maxFrequencyHz, fs / 2);
  const { magnitudes, resolution } = magnitudeSpectrum(signal, fs, maxFrequency);
  if (magnitudes.length < 2) return 0;

  const peak = Math.max(...magnitudes);
  if (peak <= 1e-10) return 0;

  const dfNorm = maxFrequency > 0 ? resolution / maxFrequency : 1;
  let arcLength = 0;
  for (let i = 1; i < magnitudes.length; i++) {
    const dMag = (magnitudes[i] - magnitudes[i - 1]) / peak;
    arcLength += Math.sqrt(dfNorm * dfNorm + dMag * dMag);
  }
  return -arcLength;
}

/**
 * RMS central-difference jerk scaled by T^1.5 and the signal's
 * peak-to-peak amplitude (dimensionless).
 */
export function computeNormalizedJerk(
  signal: readonly number[],
  fs: number,
  durationSec: number,
): number {
  if (signal.length < 3 || durationSec <= 0 || fs <= 0) return 0;
  const dt = 1 / fs;
  let jerkSquared = 0;
  for (let i = 1; i < signal.length - 1; i++) {
    const jerk = (signal[i + 1] - signal[i - 1]) / (2 * dt);
    jerkSquared += jerk * jerk;
  }
  const amplitude = Math.max(...signal) - Math.min(...signal);
  if (amplitude <= 1e-10) return 0;
  return (Math.sqrt(jerkSquared / (signal.length - 2)) * Math.pow(durationSec, 1.5)) / amplitude;
}

export const smoothnessAnalyzer = new SmoothnessAnalyzer();
