/**
 * Capture Store - display state of the current capture.
 *
 * Written by the CaptureController on state changes and on its refresh
 * timer, never per frame. Advisory only: nothing reads it back to decide
 * what gets recorded.
 */

import { createStore } from "zustand/vanilla";
import type { RecordingState } from "../capture/SessionRecorder";

export interface CaptureDisplayState {
  recordingState: RecordingState;
  /** Recording time excluding pauses (s) */
  elapsedTime: number;
  calibrationCountdown: number;
  isBodyDetected: boolean;
  postureScore: number | null;
  cadenceSPM: number | null;
  stepCount: number;
  frameCount: number;
  errorMessage: string | null;
  lastSavedSessionId: string | null;
}

interface CaptureState extends CaptureDisplayState {
  update: (patch: Partial<CaptureDisplayState>) => void;
  setError: (message: string | null) => void;
  reset: () => void;
}

const INITIAL_STATE: CaptureDisplayState = {
  recordingState: "idle",
  elapsedTime: 0,
  calibrationCountdown: 0,
  isBodyDetected: false,
  postureScore: null,
  cadenceSPM: null,
  stepCount: 0,
  frameCount: 0,
  errorMessage: null,
  lastSavedSessionId: null,
};

export const useCaptureStore = createStore<CaptureState>((set) => ({
  ...INITIAL_STATE,

  update: (patch) => set(patch),

  setError: (message) => set({ errorMessage: message }),

  reset: () => set({ ...INITIAL_STATE }),
}));
