import type {
  OperationError,
  OperationName,
  OperationResponseMap,
  OperationResult,
} from '../../shared/operations';
import { errorMessage, isRevisionError } from '../errors';
import { Logger } from '../logger';

const logger = new Logger('api');

interface OperationStats {
  calls: number;
  errors: number;
  totalDuration: number;
}

/**
 * Runs operations for the boundary: logs each call with its duration and
 * turns every thrown error into a failed `OperationResult`.
 */
export class OperationHandler {
  private stats = new Map<OperationName, OperationStats>();

  async execute<K extends OperationName>(
    operation: K,
    task: () => Promise<OperationResponseMap[K]>
  ): Promise<OperationResult<OperationResponseMap[K]>> {
    const startTime = Date.now();
    logger.debug('Operation invoke', { operation });

    try {
      const data = await task();
      const duration = Date.now() - startTime;
      this.record(operation, duration, false);
      logger.debug('Operation response', { operation, duration, success: true });
      return { ok: true, data };
    } catch (error) {
      const duration = Date.now() - startTime;
      this.record(operation, duration, true);
      return { ok: false, error: this.toOperationError(operation, error, duration) };
    }
  }

  private toOperationError(operation: OperationName, error: unknown, duration: number): OperationError {
    if (isRevisionError(error)) {
      const level = error.code === 'PERSISTENCE_FAULT' ? 'error' : 'info';
      logger[level]('Operation failed', { operation, code: error.code, error: error.message, duration });
      return {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {}),
      };
    }

    logger.error('Operation error', { operation, error: errorMessage(error), duration });
    return { code: 'INTERNAL_ERROR', message: errorMessage(error) };
  }

  private record(operation: OperationName, duration: number, failed: boolean): void {
    const entry = this.stats.get(operation) ?? { calls: 0, errors: 0, totalDuration: 0 };
    entry.calls++;
    entry.totalDuration += duration;
    if (failed) {
      entry.errors++;
    }
    this.stats.set(operation, entry);
  }

  getStats(): Partial<Record<OperationName, { calls: number; errors: number; avgDuration: number }>> {
    const stats: Partial<Record<OperationName, { calls: number; errors: number; avgDuration: number }>> = {};

    for (const [operation, entry] of this.stats) {
      stats[operation] = {
        calls: entry.calls,
        errors: entry.errors,
        avgDuration: entry.calls > 0 ? entry.totalDuration / entry.calls : 0,
      };
    }

    return stats;
  }
}
