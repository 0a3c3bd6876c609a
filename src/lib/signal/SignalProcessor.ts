/**
 * Signal Processor
 *
 * Spectral and filtering utilities for inertial data analysis:
 * FFT magnitude spectra, single-bin DFT, a streaming 2nd-order Butterworth
 * low-pass, and autocorrelation.
 */

import FFT from "fft.js";

// ============================================
// Types
// ============================================

export interface MagnitudeSpectrum {
  /** Bin centre frequencies (Hz) */
  frequencies: number[];
  /** |X(k)| / nfft */
  magnitudes: number[];
  /** Bin spacing (Hz) */
  resolution: number;
}

// ============================================
// FFT and Spectral Analysis
// ============================================

export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

/**
 * Magnitude spectrum of a zero-padded real signal, bins 0..maxBin.
 * @param signal - Time series data
 * @param sampleRate - Sampling rate in Hz
 * @param maxFrequency - Highest frequency to keep (defaults to Nyquist)
 */
export function magnitudeSpectrum(
  signal: readonly number[],
  sampleRate: number,
  maxFrequency: number = sampleRate / 2,
): MagnitudeSpectrum {
  // fft.js needs a power of two of at least 2
  const nfft = Math.max(2, nextPowerOfTwo(signal.length));
  const padded = new Array<number>(nfft).fill(0);
  signal.forEach((v, i) => (padded[i] = v));

  const fft = new FFT(nfft);
  const out = fft.createComplexArray();
  fft.realTransform(out, padded);

  const resolution = sampleRate / nfft;
  const maxBin = Math.min(nfft / 2, Math.floor(maxFrequency / resolution));
  const frequencies: number[] = [];
  const magnitudes: number[] = [];

  for (let k = 0; k <= maxBin; k++) {
    const re = out[2 * k] / nfft;
    const im = out[2 * k + 1] / nfft;
    frequencies.push(k * resolution);
    magnitudes.push(Math.sqrt(re * re + im * im));
  }

  return { frequencies, magnitudes, resolution };
}

/**
 * Magnitude of DFT bin `k` over the signal's own length (no padding),
 * normalized by n.
 */
export function dftBinMagnitude(signal: readonly number[], k: number): number {
  const n = signal.length;
  if (n === 0) return 0;
  let real = 0;
  let imag = 0;
  for (let i = 0; i < n; i++) {
    const angle = (-2 * Math.PI * k * i) / n;
    real += signal[i] * Math.cos(angle);
    imag += signal[i] * Math.sin(angle);
  }
  return Math.sqrt(real * real + imag * imag) / n;
}

// ============================================
// Filtering
// ============================================

/**
 * Streaming 2nd-order Butterworth low-pass biquad (bilinear transform, Q = 1/√2).
 */
export class ButterworthLowPass {
  private readonly b0: number;
  private readonly b1: number;
  private readonly b2: number;
  private readonly a1: number;
  private readonly a2: number;
  private x1 = 0;
  private x2 = 0;
  private y1 = 0;
  private y2 = 0;

  /**
   * @param cutoffHz Cutoff frequency
   * @param sampleRateHz Sample rate
   */
  constructor(cutoffHz: number, sampleRateHz: number) {
    const omega = (2 * Math.PI * cutoffHz) / sampleRateHz;
    const sinW = Math.sin(omega);
    const cosW = Math.cos(omega);
    // α = sin ω / 2Q
    const alpha = sinW / Math.SQRT2;
    const a0 = 1 + alpha;

    this.b0 = (1 - cosW) / 2 / a0;
    this.b1 = (1 - cosW) / a0;
    this.b2 = this.b0;
    this.a1 = (-2 * cosW) / a0;
    this.a2 = (1 - alpha) / a0;
  }

  /** Filter one sample (real-time streaming). */
  process(x: number): number {
    const y =
      this.b0 * x + this.b1 * this.x1 + this.b2 * this.x2 - this.a1 * this.y1 - this.a2 * this.y2;
    this.x2 = this.x1;
    this.x1 = x;
    this.y2 = this.y1;
    this.y1 = y;
    return y;
  }

  /** Reset filter state (call when starting new recording) */
  reset(): void {
    this.x1 = 0;
    this.x2 = 0;
    this.y1 = 0;
    this.y2 = 0;
  }
}

// ============================================
// Correlation
// ============================================

/**
 * Best normalized autocorrelation over [minLag, maxLag], clamped to 0–1.
 * Returns 0 for a flat signal (variance ≤ 1e-4).
 */
export function peakAutocorrelation(
  signal: readonly number[],
  minLag: number,
  maxLag: number,
): number {
  const n = signal.length;
  if (n === 0) return 0;
  let sum = 0;
  for (const v of signal) sum += v;
  const m = sum / n;
  const centered = signal.map((v) => v - m);

  let variance = 0;
  for (const c of centered) variance += c * c;
  variance /= n;
  if (variance <= 0.0001) return 0;

  let best = 0;
  for (let lag = minLag; lag <= Math.min(maxLag, Math.floor(n / 2)); lag++) {
    let correlation = 0;
    for (let i = 0; i < n - lag; i++) correlation += centered[i] * centered[i + lag];
    correlation /= (n - lag) * variance;
    best = Math.max(best, correlation);
  }
  return Math.min(1, Math.max(0, best));
}
