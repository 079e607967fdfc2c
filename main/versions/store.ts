import { createHash } from 'crypto';
import type { DiffResult, Granularity, TextVersion } from '../../shared/types';
import type { DiffEngine } from '../diff';
import { PersistenceFault, errorMessage } from '../errors';
import { Logger } from '../logger';
import { assertDocumentId } from '../validation';
import { DocumentLockManager } from './locks';
import type { HistoryStorage } from './storage';

const logger = new Logger('versions');

export interface VersionStoreOptions {
  storage: HistoryStorage;
  diffEngine: DiffEngine;
  locks?: DocumentLockManager;
  /** Clock used for version timestamps. */
  now?: () => Date;
}

/**
 * Ordered, per-document history of immutable text snapshots.
 *
 * Histories are loaded lazily from storage and kept resident. Every
 * operation on a document runs under that document's lock, so a save
 * always rewrites the history it just read.
 */
export class VersionStore {
  private readonly histories = new Map<string, readonly TextVersion[]>();
  private readonly storage: HistoryStorage;
  private readonly diffEngine: DiffEngine;
  private readonly locks: DocumentLockManager;
  private readonly now: () => Date;

  constructor(options: VersionStoreOptions) {
    this.storage = options.storage;
    this.diffEngine = options.diffEngine;
    this.locks = options.locks ?? new DocumentLockManager();
    this.now = options.now ?? (() => new Date());
  }

  async save(
    documentId: string,
    content: string,
    label: string | null = null,
    style: string | null = null
  ): Promise<TextVersion> {
    assertDocumentId(documentId);

    return this.locks.run(documentId, async () => {
      const history = await this.resident(documentId);
      const timestamp = this.nextTimestamp(history);
      const versionId = VersionStore.deriveVersionId(content, timestamp);

      if (history.some((existing) => existing.versionId === versionId)) {
        logger.warn('Version id already present in history', { documentId, versionId });
      }

      const version: TextVersion = Object.freeze({ versionId, content, timestamp, label, style });
      const next = [...history, version];

      try {
        await this.storage.store(documentId, next);
      } catch (error) {
        logger.error('Failed to persist version', { documentId, versionId, error: errorMessage(error) });
        if (error instanceof PersistenceFault) {
          throw error;
        }
        throw new PersistenceFault(`Failed to persist version for ${documentId}`, { documentId }, { cause: error });
      }

      this.histories.set(documentId, next);
      logger.info('Saved version', { documentId, versionId, versions: next.length });
      return version;
    });
  }

  async list(documentId: string): Promise<readonly TextVersion[]> {
    assertDocumentId(documentId);
    return this.locks.run(documentId, () => this.resident(documentId));
  }

  async get(documentId: string, versionId: string): Promise<TextVersion | null> {
    const history = await this.list(documentId);
    return history.find((version) => version.versionId === versionId) ?? null;
  }

  async compareVersions(
    documentId: string,
    versionIdA: string,
    versionIdB: string,
    granularity: Granularity = 'char'
  ): Promise<DiffResult | null> {
    const [versionA, versionB] = await Promise.all([
      this.get(documentId, versionIdA),
      this.get(documentId, versionIdB),
    ]);

    if (!versionA || !versionB) {
      logger.debug('Version not found for comparison', {
        documentId,
        versionIdA,
        versionIdB,
        foundA: Boolean(versionA),
        foundB: Boolean(versionB),
      });
      return null;
    }

    return this.diffEngine.compare(versionA.content, versionB.content, granularity);
  }

  async clear(documentId: string): Promise<void> {
    assertDocumentId(documentId);

    await this.locks.run(documentId, async () => {
      try {
        await this.storage.remove(documentId);
        this.histories.delete(documentId);
        logger.info('Cleared versions', { documentId });
      } catch (error) {
        // The file is still there; keep an empty resident history so this
        // process does not read it back.
        this.histories.set(documentId, []);
        logger.error('Failed to delete stored history', { documentId, error: errorMessage(error) });
      }
    });
  }

  /** Version ids are the first 12 hex digits of md5(content + timestamp). */
  static deriveVersionId(content: string, timestamp: string): string {
    return createHash('md5').update(`${content}${timestamp}`, 'utf8').digest('hex').slice(0, 12);
  }

  // Callers hold the document lock.
  private async resident(documentId: string): Promise<readonly TextVersion[]> {
    const cached = this.histories.get(documentId);
    if (cached) {
      return cached;
    }

    let history: readonly TextVersion[] = [];
    try {
      history = await this.storage.load(documentId);
    } catch (error) {
      logger.error('Failed to load history, starting empty', { documentId, error: errorMessage(error) });
    }

    this.histories.set(documentId, history);
    return history;
  }

  private nextTimestamp(history: readonly TextVersion[]): string {
    const timestamp = this.now().toISOString();
    const last = history[history.length - 1];

    // ISO-8601 UTC strings of equal length order lexically.
    if (last && last.timestamp > timestamp) {
      return last.timestamp;
    }
    return timestamp;
  }
}
