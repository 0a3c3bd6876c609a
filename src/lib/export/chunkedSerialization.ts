import type { BodyFrame } from "../../models/frames";
import type { SessionBlobs, SessionRecord, SessionTimeSeries } from "../../models/session";

export const DEFAULT_EXPORT_CHUNK_SIZE = 2000;

export type SeriesPhase = keyof SessionTimeSeries;

interface CsvChunkProgress {
  processed: number;
  total: number;
}

interface JsonChunkProgress {
  phase: SeriesPhase;
  processed: number;
  total: number;
}

interface SerializeFramesCsvChunkedInput {
  session: SessionRecord;
  frames: BodyFrame[];
  chunkSize?: number;
  onProgress?: (progress: CsvChunkProgress) => void;
}

interface SerializeSessionJsonChunkedInput {
  session: SessionRecord;
  series: SessionTimeSeries;
  chunkSize?: number;
  onProgress?: (progress: JsonChunkProgress) => void;
}

/** Column header → BodyFrame field, in CSV order. */
const FRAME_COLUMNS: ReadonlyArray<readonly [string, keyof BodyFrame]> = [
  ["trunk_lean_deg", "sagittalTrunkLeanDeg"],
  ["lateral_lean_deg", "frontalTrunkLeanDeg"],
  ["cva_deg", "craniovertebralAngleDeg"],
  ["sva_cm", "sagittalVerticalAxisCm"],
  ["kyphosis_deg", "thoracicKyphosisDeg"],
  ["lordosis_deg", "lumbarLordosisDeg"],
  ["pelvic_obliquity_deg", "pelvicObliquityDeg"],
  ["posture_score", "postureScore"],
  ["cadence_spm", "cadenceSPM"],
  ["stride_length_m", "avgStrideLengthM"],
  ["walking_speed_mps", "walkingSpeedMPS"],
  ["hip_flexion_l_deg", "hipFlexionLeftDeg"],
  ["hip_flexion_r_deg", "hipFlexionRightDeg"],
  ["knee_flexion_l_deg", "kneeFlexionLeftDeg"],
  ["knee_flexion_r_deg", "kneeFlexionRightDeg"],
  ["sway_velocity_mms", "swayVelocityMMS"],
  ["reba_score", "rebaScore"],
];

export function serializeBodyFramesCsvChunked({
  session,
  frames,
  chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
  onProgress,
}: SerializeFramesCsvChunkedInput): string | null {
  if (frames.length === 0) {
    return null;
  }

  const lines: string[] = [];
  lines.push("# Posture & Gait Session Export");
  lines.push(`# Session: ${session.id}`);
  lines.push(`# Date: ${new Date(session.startedAt).toISOString()}`);
  lines.push(`# Duration: ${session.durationSec.toFixed(2)}s`);
  lines.push(`# Frames: ${frames.length}`);
  lines.push(`# Steps: ${session.totalSteps}`);
  lines.push("#");

  lines.push(["time_s", ...FRAME_COLUMNS.map(([header]) => header)].join(","));

  const total = frames.length;
  for (let index = 0; index < total; index += chunkSize) {
    const end = Math.min(index + chunkSize, total);
    for (let i = index; i < end; i += 1) {
      lines.push(formatCsvFrameLine(frames[i]));
    }
    onProgress?.({ processed: end, total });
  }

  return lines.join("\n");
}

export function serializeSessionJsonChunked({
  session,
  series,
  chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
  onProgress,
}: SerializeSessionJsonChunkedInput): string {
  const progress = (phase: SeriesPhase) => (processed: number, total: number) =>
    onProgress?.({ phase, processed, total });

  const frames = stringifyArrayChunked(series.frames, chunkSize, progress("frames"));
  const steps = stringifyArrayChunked(series.steps, chunkSize, progress("steps"));
  const motion = stringifyArrayChunked(series.motion, chunkSize, progress("motion"));

  return `{"exportVersion":"1.0.0","exportedAt":"${new Date().toISOString()}","session":${JSON.stringify(
    session,
  )},"series":{"frames":${frames},"steps":${steps},"motion":${motion}}}`;
}

/** The three out-of-line blobs stored beside a session record. */
export function encodeSessionBlobs(
  sessionId: string,
  series: SessionTimeSeries,
  chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
): SessionBlobs {
  return {
    sessionId,
    frames: stringifyArrayChunked(series.frames, chunkSize),
    steps: stringifyArrayChunked(series.steps, chunkSize),
    motion: stringifyArrayChunked(series.motion, chunkSize),
  };
}

export function stringifyArrayChunked<T>(
  source: readonly T[],
  chunkSize: number,
  onProgress?: (processed: number, total: number) => void,
): string {
  if (source.length === 0) {
    onProgress?.(0, 0);
    return "[]";
  }

  const chunks: string[] = [];
  const total = source.length;
  const step = Math.max(1, chunkSize);

  for (let index = 0; index < total; index += step) {
    const end = Math.min(index + step, total);
    const chunk = source
      .slice(index, end)
      .map((value) => JSON.stringify(value))
      .join(",");
    chunks.push(chunk);
    onProgress?.(end, total);
  }

  return `[${chunks.join(",")}]`;
}

function formatCsvFrameLine(frame: BodyFrame): string {
  const cells = FRAME_COLUMNS.map(([, key]) => {
    const value = frame[key];
    return typeof value === "number" ? value.toFixed(3) : "";
  });
  return [frame.timestamp.toFixed(4), ...cells].join(",");
}
