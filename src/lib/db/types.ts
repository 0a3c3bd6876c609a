import type { SessionRecord, SessionTimeSeries } from "../../models/session";

/**
 * Complete session export: summary plus decoded time series.
 */
export interface SessionExportData {
  session: SessionRecord;
  series: SessionTimeSeries;
  exportedAt: string; // ISO 8601
  exportVersion: string;
}

/**
 * The part of the data manager a session finalizer writes through.
 */
export interface SessionSink {
  /** Writes the summary and its blobs atomically. */
  saveSessionRecord(record: SessionRecord, series: SessionTimeSeries): Promise<void>;
}

/**
 * Data Manager Interface
 * Abstracts the session store (IndexedDB via Dexie, or a test double).
 */
export interface IDataManager extends SessionSink {
  getSession(id: string): Promise<SessionRecord | undefined>;
  /** Newest first */
  getAllSessions(): Promise<SessionRecord[]>;
  loadTimeSeries(id: string): Promise<SessionTimeSeries | null>;
  deleteSession(id: string): Promise<void>;
  exportFullSession(id: string): Promise<SessionExportData | null>;
  clearAllData(): Promise<void>;
}
