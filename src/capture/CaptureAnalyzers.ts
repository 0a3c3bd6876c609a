/**
 * Per-session analyzer instances.
 *
 * Each capture gets its own set so that nothing one session accumulates
 * leaks into the next; `resetCaptureAnalyzers` clears them between takes.
 */

import { BalanceAnalyzer } from "../analysis/BalanceAnalyzer";
import { DistanceTracker } from "../analysis/DistanceTracker";
import { ErgonomicScorer } from "../analysis/ErgonomicScorer";
import { FatigueAnalyzer } from "../analysis/FatigueAnalyzer";
import { GaitAnalyzer } from "../analysis/GaitAnalyzer";
import { IMUStepDetector } from "../analysis/IMUStepDetector";
import { PostureAnalyzer } from "../analysis/PostureAnalyzer";
import { ROMAnalyzer } from "../analysis/ROMAnalyzer";
import { SmoothnessAnalyzer } from "../analysis/SmoothnessAnalyzer";
import { TrunkMotionAnalyzer } from "../analysis/TrunkMotionAnalyzer";

export interface CaptureAnalyzers {
  posture: PostureAnalyzer;
  gait: GaitAnalyzer;
  rom: ROMAnalyzer;
  balance: BalanceAnalyzer;
  ergonomics: ErgonomicScorer;
  fatigue: FatigueAnalyzer;
  imuSteps: IMUStepDetector;
  trunk: TrunkMotionAnalyzer;
  smoothness: SmoothnessAnalyzer;
  distance: DistanceTracker;
}

export function createCaptureAnalyzers(overrides: Partial<CaptureAnalyzers> = {}): CaptureAnalyzers {
  return {
    posture: new PostureAnalyzer(),
    gait: new GaitAnalyzer(),
    rom: new ROMAnalyzer(),
    balance: new BalanceAnalyzer(),
    ergonomics: new ErgonomicScorer(),
    fatigue: new FatigueAnalyzer(),
    imuSteps: new IMUStepDetector(),
    trunk: new TrunkMotionAnalyzer(),
    smoothness: new SmoothnessAnalyzer(),
    distance: new DistanceTracker(),
    ...overrides,
  };
}

export function resetCaptureAnalyzers(analyzers: CaptureAnalyzers): void {
  analyzers.gait.reset();
  analyzers.rom.reset();
  analyzers.balance.reset();
  analyzers.fatigue.reset();
  analyzers.imuSteps.reset();
  analyzers.trunk.reset();
  analyzers.smoothness.reset();
  analyzers.distance.reset();
}
