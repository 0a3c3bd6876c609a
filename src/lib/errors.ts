/**
 * Application error domain.
 *
 * Every service maps failures into `AppError` so the capture layer can
 * publish a single user-facing message (and optional recovery hint) to the
 * notification channel.
 */

export type SensorKind = "bodyTracking" | "motion" | "pedometer";
export type InferenceStage = "load" | "features" | "predict";

export type AppErrorDetail =
  | { kind: "sensorUnavailable"; sensor: SensorKind }
  | { kind: "inferenceFailed"; model: string; stage: InferenceStage }
  | { kind: "sessionSaveFailed" }
  | { kind: "sessionLoadFailed" }
  | { kind: "dataCorrupted"; detail: string }
  | { kind: "unknown" };

export type AppErrorKind = AppErrorDetail["kind"];

const SENSOR_LABEL: Record<SensorKind, string> = {
  bodyTracking: "Body tracking",
  motion: "Motion sensors",
  pedometer: "Step counting",
};

function describe(detail: AppErrorDetail): string {
  switch (detail.kind) {
    case "sensorUnavailable":
      return `${SENSOR_LABEL[detail.sensor]} is not available on this device.`;
    case "inferenceFailed":
      return `Model '${detail.model}' failed during ${detail.stage}.`;
    case "sessionSaveFailed":
      return "Your session could not be saved.";
    case "sessionLoadFailed":
      return "Session data could not be loaded.";
    case "dataCorrupted":
      return "Some data appears to be corrupted.";
    case "unknown":
      return "An unexpected error occurred.";
  }
}

function recoveryFor(detail: AppErrorDetail): string | undefined {
  switch (detail.kind) {
    case "sessionSaveFailed":
      return "Please try saving again. The recorded data is still in memory.";
    case "sessionLoadFailed":
    case "dataCorrupted":
      return "Try closing and reopening the session.";
    case "sensorUnavailable":
      return detail.sensor === "pedometer"
        ? undefined
        : "Check that the device has the required sensors and permissions.";
    default:
      return undefined;
  }
}

export class AppError extends Error {
  readonly detail: AppErrorDetail;
  readonly recoverySuggestion?: string;

  constructor(detail: AppErrorDetail, options?: { cause?: unknown }) {
    super(describe(detail), options);
    this.name = "AppError";
    this.detail = detail;
    this.recoverySuggestion = recoveryFor(detail);
  }

  get kind(): AppErrorKind {
    return this.detail.kind;
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

/**
 * Normalize anything thrown into an AppError, keeping the original as
 * `cause`.
 */
export function toAppError(
  error: unknown,
  fallback: AppErrorDetail = { kind: "unknown" },
): AppError {
  if (isAppError(error)) return error;
  return new AppError(fallback, { cause: error });
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
