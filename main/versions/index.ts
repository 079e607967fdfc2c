export { VersionStore } from './store';
export type { VersionStoreOptions } from './store';
export { FileHistoryStorage, MemoryHistoryStorage } from './storage';
export type { HistoryStorage } from './storage';
export { DocumentLockManager } from './locks';
export type { LockHandle } from './locks';
