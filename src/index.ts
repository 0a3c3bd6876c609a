/**
 * Posture & gait engine public API
 */

// Capture pipeline
export { CaptureController, type CaptureControllerOptions } from "./capture/CaptureController";
export { FrameOrchestrator, type FrameOrchestratorOptions } from "./capture/FrameOrchestrator";
export { SessionRecorder, canTransition, type RecordingState, type RecorderSnapshot } from "./capture/SessionRecorder";
export { SessionFinalizer, type SessionAssessments, type SessionFinalization, type SubjectProfile } from "./capture/SessionFinalizer";
export { createCaptureAnalyzers, type CaptureAnalyzers } from "./capture/CaptureAnalyzers";
export type { LiveMetricsSnapshot } from "./capture/LiveMetrics";
export type { BodyTracker, MotionService, PedometerService } from "./capture/sensors";

// Analyzers
export * from "./analysis";

// Clinical scoring
export * from "./clinical/ClinicalNorms";
export { CardioEstimator, cardioEstimator, type CardioEstimate } from "./clinical/CardioEstimator";
export { CrossedSyndromeDetector, crossedSyndromeDetector, type CrossedSyndromeResult } from "./clinical/CrossedSyndromeDetector";
export { FrailtyScreener, frailtyScreener, type FrailtyScreeningResult } from "./clinical/FrailtyScreener";
export { PainRiskEngine, painRiskEngine, type PainRiskAssessment } from "./clinical/PainRiskEngine";
export { classifyAgainstNorms, normalRange, type NormativeMetric } from "./clinical/NormativeData";
export { skeletonSegmentSeverities, type SkeletonSegmentSeverity } from "./clinical/SkeletonSeverity";

// Inference
export { DualPath, type InferenceAdapter, type ResultPath } from "./ml/DualPath";
export { createSessionAnalyzers, type SessionAnalyzers } from "./ml/DualPathAnalyzers";
export { ModelService, modelService, MODEL_IDS, type InferenceModel, type ModelId, type ModelProvider } from "./ml/ModelService";
export { FEATURE_SENTINEL } from "./ml/featureVector";

// Data model
export * from "./models/JointName";
export * from "./models/frames";
export * from "./models/session";

// Persistence and configuration
export { createDataManager, getDataManager, setDataManager, type IDataManager, type SessionSink } from "./lib/db";
export { parseSessionImportPayload, type ParsedSessionImport } from "./lib/sessionImport";
export { loadConfig, resolveConfig, DEFAULT_ENGINE_CONFIG, type EngineConfig, type EngineConfigOverrides } from "./lib/config";
export { AppError, toAppError, type AppErrorDetail } from "./lib/errors";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./lib/logger";
export { useCaptureStore } from "./store/useCaptureStore";
export { useNotificationStore, type Notification } from "./store/useNotificationStore";
