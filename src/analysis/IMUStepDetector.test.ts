import { beforeEach, describe, expect, it } from "vitest";
import { IMUStepDetector, type IMUStepEvent } from "./IMUStepDetector";

/** Vertical acceleration bouncing twice per second (120 steps/min). */
function walkingSignal(detector: IMUStepDetector, seconds: number): IMUStepEvent[] {
  const events: IMUStepEvent[] = [];
  for (let i = 0; i < seconds * 60; i++) {
    const t = i / 60;
    const event = detector.processSample(t, 0.15 + 0.15 * Math.cos(2 * Math.PI * 2 * t));
    if (event) events.push(event);
  }
  return events;
}

describe("IMUStepDetector", () => {
  let detector: IMUStepDetector;

  beforeEach(() => {
    detector = new IMUStepDetector();
  });

  it("should ignore a quiet signal", () => {
    for (let i = 0; i < 120; i++) expect(detector.processSample(i / 60, 0.01)).toBeNull();
    expect(detector.stepCount).toBe(0);
    expect(detector.cadenceSPM).toBe(0);
  });

  it("should count one step per acceleration peak", () => {
    const events = walkingSignal(detector, 10);

    expect(detector.stepCount).toBe(events.length);
    expect(events.length).toBeGreaterThanOrEqual(18);
    expect(events.length).toBeLessThanOrEqual(21);
    expect(detector.cadenceSPM).toBeGreaterThan(115);
    expect(detector.cadenceSPM).toBeLessThan(125);
  });

  it("should keep counting after one hard impact", () => {
    // Half-second 1 g bump, then the usual 2 Hz walk
    let steps = 0;
    for (let i = 0; i < 30; i++) {
      const t = i / 60;
      if (detector.processSample(t, Math.sin((Math.PI * t) / 0.5))) steps++;
    }
    for (let i = 30; i < 630; i++) {
      const t = i / 60;
      if (detector.processSample(t, 0.15 + 0.15 * Math.cos(2 * Math.PI * 2 * t))) steps++;
    }

    expect(detector.stepCount).toBe(steps);
    expect(steps).toBeGreaterThanOrEqual(17);
  });

  it("should keep steps apart by the refractory period", () => {
    const events = walkingSignal(detector, 5);
    for (let i = 1; i < events.length; i++) {
      expect(events[i].timestamp - events[i - 1].timestamp).toBeGreaterThanOrEqual(0.25);
    }
  });

  describe("validateStep", () => {
    it("should be fully confident at a detected peak", () => {
      const events = walkingSignal(detector, 10);
      const last = events[events.length - 1];

      expect(detector.covers(last.timestamp)).toBe(true);
      expect(detector.validateStep(last.timestamp)).toBe(1);
    });

    it("should be zero without motion data", () => {
      expect(detector.covers(1)).toBe(false);
      expect(detector.validateStep(1)).toBe(0);
    });

    it("should be zero when the device was still", () => {
      for (let i = 0; i < 60; i++) detector.processSample(i / 60, 0);
      expect(detector.covers(0.5)).toBe(true);
      expect(detector.validateStep(0.5)).toBe(0);
    });
  });

  it("should start over on reset", () => {
    walkingSignal(detector, 3);
    detector.reset();
    expect(detector.stepCount).toBe(0);
    expect(detector.covers(1)).toBe(false);
  });
});
