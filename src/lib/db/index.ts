import { loadConfig } from "../config";
import { LocalDataManager, PostureSessionDB, type LocalDataManagerOptions } from "./LocalDataManager";
import type { IDataManager } from "./types";

// Re-export types
export * from "./types";

// Re-export manager classes
export { LocalDataManager, PostureSessionDB };

export function createDataManager(options?: LocalDataManagerOptions): IDataManager {
  return new LocalDataManager(options);
}

let _activeManager: IDataManager | null = null;

/**
 * Shared data manager, created on first use. Replace it with
 * `setDataManager` to point the app at another store.
 */
export function getDataManager(): IDataManager {
  if (!_activeManager) {
    const { databaseName, blobChunkSize } = loadConfig();
    _activeManager = createDataManager({ databaseName, blobChunkSize });
  }
  return _activeManager;
}

export function setDataManager(manager: IDataManager | null): void {
  _activeManager = manager;
}
