import { BODY_FRAME_METRIC_KEYS, type BodyFrame, type MotionSample, type StepEvent } from "../models/frames";
import type { SessionBlobs, SessionRecord, SessionTimeSeries } from "../models/session";
import { AppError } from "./errors";

export interface ParsedSessionImport {
  session: SessionRecord;
  series: SessionTimeSeries;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

function isVec3(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.x === "number" &&
    typeof value.y === "number" &&
    typeof value.z === "number"
  );
}

export function isBodyFrame(value: unknown): value is BodyFrame {
  if (!isRecord(value) || typeof value.timestamp !== "number" || !isRecord(value.joints)) {
    return false;
  }
  if (value.posturalType !== null && typeof value.posturalType !== "string") return false;
  return BODY_FRAME_METRIC_KEYS.every((key) => isNullableNumber(value[key]));
}

export function isStepEvent(value: unknown): value is StepEvent {
  return (
    isRecord(value) &&
    typeof value.timestamp === "number" &&
    (value.foot === "left" || value.foot === "right") &&
    typeof value.positionX === "number" &&
    typeof value.positionZ === "number" &&
    isNullableNumber(value.strideLengthM) &&
    isNullableNumber(value.stepLengthM)
  );
}

export function isMotionSample(value: unknown): value is MotionSample {
  return (
    isRecord(value) &&
    typeof value.timestamp === "number" &&
    typeof value.roll === "number" &&
    typeof value.pitch === "number" &&
    typeof value.yaw === "number" &&
    isVec3(value.userAcceleration) &&
    isVec3(value.gravity) &&
    isVec3(value.rotationRate)
  );
}

export function isSessionRecord(value: unknown): value is SessionRecord {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.startedAt === "number" &&
    typeof value.durationSec === "number" &&
    Array.isArray(value.crossedSyndromes)
  );
}

function arrayOf<T>(value: unknown, guard: (item: unknown) => item is T): T[] | null {
  if (!Array.isArray(value)) return null;
  const items: T[] = [];
  for (const item of value) {
    if (!guard(item)) return null;
    items.push(item);
  }
  return items;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new AppError({ kind: "dataCorrupted", detail: `${what} is not valid JSON` }, { cause: error });
  }
}

function corrupted(detail: string): AppError {
  return new AppError({ kind: "dataCorrupted", detail });
}

function parseSeries(frames: unknown, steps: unknown, motion: unknown): SessionTimeSeries {
  const parsedFrames = arrayOf(frames, isBodyFrame);
  if (!parsedFrames) throw corrupted("body frames");
  const parsedSteps = arrayOf(steps, isStepEvent);
  if (!parsedSteps) throw corrupted("step events");
  // Older exports may lack motion data
  const parsedMotion = motion === undefined ? [] : arrayOf(motion, isMotionSample);
  if (!parsedMotion) throw corrupted("motion samples");
  return { frames: parsedFrames, steps: parsedSteps, motion: parsedMotion };
}

/** Decode the three stored blobs of one session. */
export function decodeSessionBlobs(blobs: SessionBlobs): SessionTimeSeries {
  return parseSeries(
    parseJson(blobs.frames, "body frames"),
    parseJson(blobs.steps, "step events"),
    parseJson(blobs.motion, "motion samples"),
  );
}

/** Validate a JSON session export (see `serializeSessionJsonChunked`). */
export function parseSessionImportPayload(input: unknown): ParsedSessionImport {
  if (!isRecord(input) || !isRecord(input.series)) {
    throw new Error("Invalid session file format");
  }
  if (!isSessionRecord(input.session)) {
    throw new Error("Invalid session metadata");
  }
  const { frames, steps, motion } = input.series;
  return { session: input.session, series: parseSeries(frames, steps, motion) };
}
