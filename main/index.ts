import { RevisionApi } from './api';
import { loadConfig, type ConfigManagerOptions, type EngineConfig } from './config';
import { DiffEngine } from './diff';
import { Logger } from './logger';
import {
  DocumentLockManager,
  FileHistoryStorage,
  MemoryHistoryStorage,
  VersionStore,
  type HistoryStorage,
} from './versions';

const logger = new Logger('engine');

export interface RevisionEngine {
  config: EngineConfig;
  api: RevisionApi;
  store: VersionStore;
  diffEngine: DiffEngine;
}

export interface CreateRevisionEngineOptions extends ConfigManagerOptions {
  /** Applied after the config file and environment. */
  overrides?: Partial<EngineConfig>;
  /** Replaces the backend named by `config.storage`. */
  storage?: HistoryStorage;
}

function createStorage(config: EngineConfig): HistoryStorage {
  return config.storage === 'memory'
    ? new MemoryHistoryStorage()
    : new FileHistoryStorage(config.versionsDir);
}

export function createRevisionEngine(options: CreateRevisionEngineOptions = {}): RevisionEngine {
  const config: EngineConfig = { ...loadConfig(options), ...options.overrides };

  Logger.configure({ level: config.logLevel, logDir: config.logDir });

  const diffEngine = new DiffEngine({ maxInputLength: config.maxCompareLength });
  const store = new VersionStore({
    storage: options.storage ?? createStorage(config),
    diffEngine,
    locks: new DocumentLockManager(),
  });
  const api = new RevisionApi({ store, diffEngine });

  logger.info('Revision engine ready', {
    storage: options.storage ? 'custom' : config.storage,
    versionsDir: config.versionsDir,
    maxCompareLength: config.maxCompareLength,
  });

  return { config, api, store, diffEngine };
}

export { RevisionApi, OperationHandler } from './api';
export { ConfigManager, defaultConfig, loadConfig } from './config';
export type { EngineConfig, ConfigManagerOptions } from './config';
export {
  DiffEngine,
  SequenceMatcher,
  diffSegments,
  escapeHtml,
  renderHtml,
  similarity,
  splitLines,
  summarize,
} from './diff';
export {
  RevisionError,
  ValidationError,
  PersistenceFault,
  ResourceLimitExceeded,
  NotFoundError,
} from './errors';
export { Logger } from './logger';
export type { LogLevel } from './logger';
export { DocumentLockManager, FileHistoryStorage, MemoryHistoryStorage, VersionStore } from './versions';
export type { HistoryStorage } from './versions';
export { OPERATIONS } from '../shared/operations';
export type * from '../shared/operations';
export { toDiffResultRecord, toVersionRecord, preview } from '../shared/records';
export type * from '../shared/types';
