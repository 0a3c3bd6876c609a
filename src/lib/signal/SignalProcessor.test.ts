import { describe, expect, it } from "vitest";
import {
  ButterworthLowPass,
  dftBinMagnitude,
  magnitudeSpectrum,
  nextPowerOfTwo,
  peakAutocorrelation,
} from "./SignalProcessor";

describe("SignalProcessor", () => {
  describe("ButterworthLowPass", () => {
    it("should pass a constant signal at unit gain", () => {
      const filter = new ButterworthLowPass(5, 60);
      let y = 0;
      for (let i = 0; i < 600; i++) y = filter.process(1);
      expect(y).toBeCloseTo(1, 6);
    });

    it("should pass walking frequencies without resonance", () => {
      const filter = new ButterworthLowPass(5, 60);
      let peak = 0;
      for (let i = 0; i < 300; i++) {
        const y = filter.process(Math.cos(2 * Math.PI * 2 * (i / 60)));
        if (i >= 240) peak = Math.max(peak, Math.abs(y));
      }
      expect(peak).toBeGreaterThan(0.95);
      expect(peak).toBeLessThan(1);
    });

    it("should attenuate well above the cutoff", () => {
      const filter = new ButterworthLowPass(5, 60);
      let peak = 0;
      for (let i = 0; i < 300; i++) {
        const y = filter.process(Math.cos(2 * Math.PI * 20 * (i / 60)));
        if (i >= 240) peak = Math.max(peak, Math.abs(y));
      }
      expect(peak).toBeLessThan(0.1);
    });

    it("should forget its state on reset", () => {
      const filter = new ButterworthLowPass(5, 60);
      for (let i = 0; i < 50; i++) filter.process(1);
      filter.reset();
      expect(filter.process(0)).toBe(0);
    });
  });

  describe("magnitudeSpectrum", () => {
    it("should find a pure tone in its bin", () => {
      // 64 samples at 64 Hz, 8 Hz tone lands exactly on bin 8
      const signal = Array.from({ length: 64 }, (_, i) => Math.cos((2 * Math.PI * 8 * i) / 64));
      const spectrum = magnitudeSpectrum(signal, 64);

      expect(spectrum.resolution).toBe(1);
      expect(spectrum.frequencies).toHaveLength(33);
      expect(spectrum.magnitudes[8]).toBeCloseTo(0.5, 6);
      expect(spectrum.magnitudes[3]).toBeCloseTo(0, 6);
    });
  });

  it("should round up to a power of two", () => {
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(100)).toBe(128);
  });

  it("should measure a single DFT bin", () => {
    const signal = [1, 0, -1, 0];
    expect(dftBinMagnitude(signal, 1)).toBeCloseTo(0.5, 10);
    expect(dftBinMagnitude([], 1)).toBe(0);
  });

  describe("peakAutocorrelation", () => {
    it("should be zero for a flat signal", () => {
      expect(peakAutocorrelation([2, 2, 2, 2, 2, 2], 1, 3)).toBe(0);
    });

    it("should be high at the period of a repeating signal", () => {
      const signal = Array.from({ length: 120 }, (_, i) => Math.sin((2 * Math.PI * i) / 20));
      expect(peakAutocorrelation(signal, 15, 25)).toBeGreaterThan(0.9);
    });
  });
});
