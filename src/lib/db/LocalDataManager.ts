import Dexie, { type Table } from "dexie";
import { DEFAULT_ENGINE_CONFIG } from "../config";
import { AppError } from "../errors";
import { encodeSessionBlobs } from "../export/chunkedSerialization";
import { persistenceLog } from "../logger";
import { decodeSessionBlobs } from "../sessionImport";
import type { SessionBlobs, SessionRecord, SessionTimeSeries } from "../../models/session";
import type { IDataManager, SessionExportData } from "./types";

export class PostureSessionDB extends Dexie {
  sessions!: Table<SessionRecord, string>;
  sessionBlobs!: Table<SessionBlobs, string>;

  constructor(name: string = DEFAULT_ENGINE_CONFIG.databaseName) {
    super(name);

    // Version 1: summary records with out-of-line time-series blobs
    this.version(1).stores({
      sessions: "id, startedAt",
      sessionBlobs: "sessionId",
    });
  }
}

export interface LocalDataManagerOptions {
  databaseName?: string;
  blobChunkSize?: number;
}

export class LocalDataManager implements IDataManager {
  private _db: PostureSessionDB;
  private blobChunkSize: number;

  constructor(options: LocalDataManagerOptions = {}) {
    this._db = new PostureSessionDB(options.databaseName);
    this.blobChunkSize = options.blobChunkSize ?? DEFAULT_ENGINE_CONFIG.blobChunkSize;
  }

  get db(): PostureSessionDB {
    return this._db;
  }

  async saveSessionRecord(record: SessionRecord, series: SessionTimeSeries): Promise<void> {
    const blobs = encodeSessionBlobs(record.id, series, this.blobChunkSize);
    try {
      await this._db.transaction("rw", this._db.sessions, this._db.sessionBlobs, async () => {
        await this._db.sessions.put(record);
        await this._db.sessionBlobs.put(blobs);
      });
    } catch (error) {
      throw new AppError({ kind: "sessionSaveFailed" }, { cause: error });
    }
    persistenceLog.info(
      `Saved session ${record.id} (${series.frames.length} frames, ${series.steps.length} steps)`,
    );
  }

  async getSession(id: string): Promise<SessionRecord | undefined> {
    return await this._db.sessions.get(id);
  }

  async getAllSessions(): Promise<SessionRecord[]> {
    return await this._db.sessions.orderBy("startedAt").reverse().toArray();
  }

  async loadTimeSeries(id: string): Promise<SessionTimeSeries | null> {
    let blobs: SessionBlobs | undefined;
    try {
      blobs = await this._db.sessionBlobs.get(id);
    } catch (error) {
      throw new AppError({ kind: "sessionLoadFailed" }, { cause: error });
    }
    if (!blobs) return null;
    return decodeSessionBlobs(blobs);
  }

  async deleteSession(id: string): Promise<void> {
    await this._db.transaction("rw", this._db.sessions, this._db.sessionBlobs, async () => {
      await this._db.sessionBlobs.delete(id);
      await this._db.sessions.delete(id);
    });
  }

  /**
   * Export complete session with all time series and metadata.
   */
  async exportFullSession(id: string): Promise<SessionExportData | null> {
    const session = await this.getSession(id);
    if (!session) return null;

    const series = await this.loadTimeSeries(id);

    return {
      session,
      series: series ?? { frames: [], steps: [], motion: [] },
      exportedAt: new Date().toISOString(),
      exportVersion: "1.0.0",
    };
  }

  async clearAllData(): Promise<void> {
    await this._db.transaction("rw", this._db.sessions, this._db.sessionBlobs, async () => {
      await this._db.sessionBlobs.clear();
      await this._db.sessions.clear();
    });
  }

  close(): void {
    this._db.close();
  }
}
