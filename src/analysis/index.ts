/**
 * Analysis Module Barrel Export
 */
export { postureAnalyzer, PostureAnalyzer, type PostureAssessment, type PostureMetrics, type PostureSeverities } from "./PostureAnalyzer";
export { gaitAnalyzer, GaitAnalyzer, type GaitMetrics } from "./GaitAnalyzer";
export { balanceAnalyzer, BalanceAnalyzer, computeBalanceMetrics, type BalanceMetrics, type RombergResult } from "./BalanceAnalyzer";
export { romAnalyzer, ROMAnalyzer, hasSignificantAsymmetry, type ROMMetrics, type ROMSessionSummary } from "./ROMAnalyzer";
export { ergonomicScorer, ErgonomicScorer, type REBAResult } from "./ErgonomicScorer";
export { DistanceTracker, type DistanceEstimate, type PedometerSnapshot } from "./DistanceTracker";

// Motion (IMU) analyzers
export { imuStepDetector, IMUStepDetector, type IMUStepEvent } from "./IMUStepDetector";
export { trunkMotionAnalyzer, TrunkMotionAnalyzer, type TrunkMotionMetrics, type TurnEvent } from "./TrunkMotionAnalyzer";
export { smoothnessAnalyzer, SmoothnessAnalyzer, computeSPARC, computeNormalizedJerk, type SmoothnessMetrics } from "./SmoothnessAnalyzer";

// Session-level analyzers
export { fallRiskAnalyzer, FallRiskAnalyzer, type FallRiskAssessment, type FallRiskInput } from "./FallRiskAnalyzer";
export { gaitPatternClassifier, GaitPatternClassifier, type GaitPatternFeatures, type GaitPatternResult } from "./GaitPatternClassifier";
export { fatigueAnalyzer, FatigueAnalyzer, assessFatigue, type FatigueAssessment, type FatigueTimePoint } from "./FatigueAnalyzer";
