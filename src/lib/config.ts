/**
 * Engine Configuration
 *
 * Tuning knobs for the capture pipeline. Defaults match a 60 Hz body
 * tracker; environment overrides are read once through `loadConfig`.
 */

import { isLogLevel, type LogLevel } from "./logger";

// ============================================================================
// TYPES
// ============================================================================

export interface ThrottleConfig {
  /** Range-of-motion analysis every Nth frame */
  romEvery: number;
  /** Balance / sway analysis every Nth frame */
  balanceEvery: number;
  /** REBA ergonomic scoring every Nth frame */
  ergonomicsEvery: number;
  /** Fatigue time-point sampling every Nth frame */
  fatigueEvery: number;
}

export interface EngineConfig {
  throttle: ThrottleConfig;
  /** Calibration countdown before recording starts (s) */
  calibrationDurationSec: number;
  /** Recorder buffer capacity (frames); ~10 min at 60 Hz */
  recorderCapacity: number;
  /** Live posture score below which a posture alert fires */
  postureAlertThreshold: number;
  /** Minimum frames between two posture alerts */
  postureAlertCooldownFrames: number;
  /** Elapsed-time refresh period for the capture store (ms) */
  elapsedRefreshMs: number;
  /** Prefer trained models over rule-based analyzers */
  useInferenceModels: boolean;
  /** IndexedDB database name */
  databaseName: string;
  /** Items per chunk when encoding time-series blobs */
  blobChunkSize: number;
  logLevel: LogLevel;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_THROTTLE: ThrottleConfig = {
  romEvery: 3,
  balanceEvery: 2,
  ergonomicsEvery: 10,
  fatigueEvery: 6,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  throttle: DEFAULT_THROTTLE,
  calibrationDurationSec: 3.0,
  recorderCapacity: 36_000,
  postureAlertThreshold: 50,
  postureAlertCooldownFrames: 120,
  elapsedRefreshMs: 500,
  useInferenceModels: false,
  databaseName: "posture-gait-db",
  blobChunkSize: 2000,
  logLevel: "warn",
};

export type EngineConfigOverrides = Partial<Omit<EngineConfig, "throttle">> & {
  throttle?: Partial<ThrottleConfig>;
};

export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    throttle: { ...DEFAULT_ENGINE_CONFIG.throttle, ...overrides.throttle },
  };
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Build a config from environment variables, then apply explicit
 * overrides. Malformed environment values are ignored and the default is
 * kept.
 */
export function loadConfig(
  overrides: EngineConfigOverrides = {},
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const fromEnv: EngineConfigOverrides = {};

  const level = env.POSTURE_LOG_LEVEL;
  if (isLogLevel(level)) fromEnv.logLevel = level;

  const useModels = parseBoolean(env.POSTURE_USE_ML_MODELS);
  if (useModels !== undefined) fromEnv.useInferenceModels = useModels;

  const capacity = parsePositiveInt(env.POSTURE_RECORDER_CAPACITY);
  if (capacity !== undefined) fromEnv.recorderCapacity = capacity;

  const dbName = env.POSTURE_DB_NAME?.trim();
  if (dbName) fromEnv.databaseName = dbName;

  return resolveConfig({
    ...fromEnv,
    ...overrides,
    throttle: overrides.throttle,
  });
}
