/**
 * Notification Store - user-facing messages from the capture layer
 */

import { createStore } from "zustand/vanilla";
import type { AppError, AppErrorKind } from "../lib/errors";

export type NotificationType = "success" | "error" | "warning" | "info";

/** Which part of the pipeline raised the notification */
export type NotificationSource = "capture" | "sensor" | "persistence" | "inference" | "posture";

export interface Notification {
  id: string;
  type: NotificationType;
  source: NotificationSource;
  title: string;
  message?: string;
  duration?: number; // ms, 0 = persistent
  /** Times an identical notification was raised while this one was visible */
  repeatCount: number;
}

export type NotificationInput = Omit<Notification, "id" | "source" | "repeatCount"> & {
  source?: NotificationSource;
};

interface NotificationState {
  notifications: Notification[];

  // Actions
  addNotification: (notification: NotificationInput) => string;
  removeNotification: (id: string) => void;
  clearAll: () => void;

  // Convenience methods
  success: (title: string, message?: string) => void;
  error: (title: string, message?: string) => void;
  warning: (title: string, message?: string) => void;
  info: (title: string, message?: string) => void;

  notifyError: (error: AppError) => void;
  postureAlert: (score: number) => void;
}

export const MAX_NOTIFICATIONS = 5;

const ERROR_SOURCE: Record<AppErrorKind, NotificationSource> = {
  sensorUnavailable: "sensor",
  inferenceFailed: "inference",
  sessionSaveFailed: "persistence",
  sessionLoadFailed: "persistence",
  dataCorrupted: "persistence",
  unknown: "capture",
};

let notificationId = 0;
const timers = new Map<string, ReturnType<typeof setTimeout>>();

function schedule(id: string, duration: number | undefined, remove: (id: string) => void): void {
  const pending = timers.get(id);
  if (pending !== undefined) clearTimeout(pending);
  if (!duration || duration <= 0) return;
  timers.set(
    id,
    setTimeout(() => remove(id), duration),
  );
}

export const useNotificationStore = createStore<NotificationState>((set, get) => ({
  notifications: [],

  addNotification: (notification) => {
    const source = notification.source ?? "capture";
    const duration = notification.duration ?? 4000;

    // Same source and title: bump the visible one instead of stacking
    const existing = get().notifications.find(
      (n) => n.source === source && n.title === notification.title && n.type === notification.type,
    );
    if (existing) {
      set((state) => ({
        notifications: state.notifications.map((n) =>
          n.id === existing.id
            ? { ...n, message: notification.message, repeatCount: n.repeatCount + 1 }
            : n,
        ),
      }));
      schedule(existing.id, duration, get().removeNotification);
      return existing.id;
    }

    const id = `notification-${++notificationId}`;
    const newNotification: Notification = {
      ...notification,
      id,
      source,
      duration,
      repeatCount: 0,
    };

    const notifications = [...get().notifications, newNotification];
    const overflow = Math.max(0, notifications.length - MAX_NOTIFICATIONS);
    for (const dropped of notifications.slice(0, overflow)) {
      schedule(dropped.id, 0, get().removeNotification);
      timers.delete(dropped.id);
    }
    set({ notifications: notifications.slice(overflow) });

    schedule(id, duration, get().removeNotification);
    return id;
  },

  removeNotification: (id) => {
    schedule(id, 0, get().removeNotification);
    timers.delete(id);
    set((state) => ({
      notifications: state.notifications.filter((n) => n.id !== id),
    }));
  },

  clearAll: () => {
    for (const timer of timers.values()) clearTimeout(timer);
    timers.clear();
    set({ notifications: [] });
  },

  success: (title, message) => {
    get().addNotification({ type: "success", title, message });
  },

  // Persistent until dismissed
  error: (title, message) => {
    get().addNotification({ type: "error", title, message, duration: 0 });
  },

  warning: (title, message) => {
    get().addNotification({ type: "warning", title, message, duration: 5000 });
  },

  info: (title, message) => {
    get().addNotification({ type: "info", title, message });
  },

  notifyError: (error) => {
    get().addNotification({
      type: "error",
      source: ERROR_SOURCE[error.kind],
      title: error.message,
      message: error.recoverySuggestion,
      duration: 0,
    });
  },

  postureAlert: (score) => {
    get().addNotification({
      type: "warning",
      source: "posture",
      title: "Check your posture",
      message: `Posture score dropped to ${Math.round(score)}.`,
      duration: 5000,
    });
  },
}));
