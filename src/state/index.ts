export {
  STATE_VERSION,
  SyncMappingSchema,
  SyncStateSchema,
  type SyncMapping,
  type SyncState,
  type SyncStateStore,
} from './types.js';

export {
  createEmptySyncState,
  addMapping,
  removeMapping,
  verifyStateIntegrity,
  readSyncStateFile,
  writeSyncStateFile,
  stateFilePath,
  MemorySyncStateStore,
  FileSyncStateStore,
  type FileSyncStateStoreOptions,
} from './store.js';

export {
  acquireLock,
  releaseLock,
  getLockPath,
  LockTimeoutError,
  type LockOptions,
} from './lock.js';
