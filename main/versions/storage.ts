import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import type { TextVersion } from '../../shared/types';
import { fromVersionRecord, toVersionRecord } from '../../shared/records';
import { PersistenceFault, errorMessage } from '../errors';
import { Logger } from '../logger';
import { assertDocumentId, historySchema } from '../validation';

const logger = new Logger('storage');

/**
 * Durable backing for document histories. Implementations hold whole
 * histories: `store` replaces everything previously stored for the id.
 */
export interface HistoryStorage {
  /** `[]` when nothing is stored. Throws `PersistenceFault` on read or parse failure. */
  load(documentId: string): Promise<TextVersion[]>;
  store(documentId: string, history: readonly TextVersion[]): Promise<void>;
  /** No-op when nothing is stored. */
  remove(documentId: string): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** One pretty-printed JSON array per document: `<dir>/<documentId>.json`. */
export class FileHistoryStorage implements HistoryStorage {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  pathFor(documentId: string): string {
    return join(this.directory, `${assertDocumentId(documentId)}.json`);
  }

  async load(documentId: string): Promise<TextVersion[]> {
    const path = this.pathFor(documentId);

    let data: string;
    try {
      data = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new PersistenceFault(`Failed to read history for ${documentId}`, { documentId, path }, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      await this.quarantine(documentId, path);
      throw new PersistenceFault(`History file for ${documentId} is not valid JSON`, { documentId, path }, { cause: error });
    }

    const result = historySchema.safeParse(parsed);
    if (!result.success) {
      await this.quarantine(documentId, path);
      throw new PersistenceFault(
        `History file for ${documentId} has an unexpected shape`,
        { documentId, path },
        { cause: result.error }
      );
    }

    logger.debug('Loaded history', { documentId, versions: result.data.length });
    return result.data.map(fromVersionRecord);
  }

  async store(documentId: string, history: readonly TextVersion[]): Promise<void> {
    const path = this.pathFor(documentId);
    const data = JSON.stringify(history.map(toVersionRecord), null, 2);

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await this.writeFileAtomic(path, data);
    } catch (error) {
      throw new PersistenceFault(`Failed to write history for ${documentId}`, { documentId, path }, { cause: error });
    }

    logger.debug('Stored history', { documentId, versions: history.length });
  }

  async remove(documentId: string): Promise<void> {
    const path = this.pathFor(documentId);

    try {
      await fs.unlink(path);
      logger.debug('Removed history', { documentId });
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new PersistenceFault(`Failed to delete history for ${documentId}`, { documentId, path }, { cause: error });
    }
  }

  private async writeFileAtomic(path: string, data: string): Promise<void> {
    const tempPath = `${path}.tmp.${Date.now()}`;

    try {
      await fs.writeFile(tempPath, data, { encoding: 'utf-8' });
      await fs.rename(tempPath, path);
    } catch (error) {
      await fs.unlink(tempPath).catch((cleanupError: unknown) => {
        if (!isMissingFile(cleanupError)) {
          logger.warn('Failed to clean up temp file', { path: tempPath, error: errorMessage(cleanupError) });
        }
      });
      throw error;
    }
  }

  /** Moves an unreadable file aside so the next save cannot overwrite it. */
  private async quarantine(documentId: string, path: string): Promise<void> {
    const target = join(this.directory, `${documentId}.corrupt-${Date.now()}.json`);
    try {
      await fs.rename(path, target);
      logger.warn('Moved corrupt history aside', { documentId, path: target });
    } catch (error) {
      logger.error('Failed to move corrupt history aside', { documentId, error: errorMessage(error) });
    }
  }
}

/** Keeps histories in process memory. Nothing survives a restart. */
export class MemoryHistoryStorage implements HistoryStorage {
  private readonly histories = new Map<string, TextVersion[]>();

  async load(documentId: string): Promise<TextVersion[]> {
    return [...(this.histories.get(documentId) ?? [])];
  }

  async store(documentId: string, history: readonly TextVersion[]): Promise<void> {
    this.histories.set(documentId, [...history]);
  }

  async remove(documentId: string): Promise<void> {
    this.histories.delete(documentId);
  }

  has(documentId: string): boolean {
    return this.histories.has(documentId);
  }
}
