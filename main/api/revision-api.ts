import {
  OPERATIONS,
  type OperationRequestMap,
  type OperationResponseMap,
  type OperationResult,
} from '../../shared/operations';
import { toDiffResultRecord, toVersionRecord } from '../../shared/records';
import type { Granularity } from '../../shared/types';
import type { DiffEngine } from '../diff';
import { NotFoundError } from '../errors';
import { schemas, validate } from '../validation';
import type { VersionStore } from '../versions';
import { OperationHandler } from './handler';

type RequestOf<K extends keyof OperationRequestMap> = OperationRequestMap[K];
type ResultOf<K extends keyof OperationResponseMap> = Promise<OperationResult<OperationResponseMap[K]>>;

export interface RevisionApiOptions {
  store: VersionStore;
  diffEngine: DiffEngine;
  handler?: OperationHandler;
}

function granularityOf(charLevel: boolean | undefined): Granularity {
  return charLevel === false ? 'line' : 'char';
}

/**
 * The operations offered to the surrounding system. Requests are validated
 * before anything runs; every call resolves, failures included.
 */
export class RevisionApi {
  private readonly store: VersionStore;
  private readonly diffEngine: DiffEngine;
  readonly handler: OperationHandler;

  constructor(options: RevisionApiOptions) {
    this.store = options.store;
    this.diffEngine = options.diffEngine;
    this.handler = options.handler ?? new OperationHandler();
  }

  saveVersion(request: RequestOf<typeof OPERATIONS.VERSION.SAVE>): ResultOf<typeof OPERATIONS.VERSION.SAVE> {
    return this.handler.execute(OPERATIONS.VERSION.SAVE, async () => {
      const args = validate(schemas.saveVersionArgs, request);
      const version = await this.store.save(args.documentId, args.content, args.label ?? null, args.style ?? null);
      return toVersionRecord(version);
    });
  }

  listVersions(request: RequestOf<typeof OPERATIONS.VERSION.LIST>): ResultOf<typeof OPERATIONS.VERSION.LIST> {
    return this.handler.execute(OPERATIONS.VERSION.LIST, async () => {
      const args = validate(schemas.documentArgs, request);
      const history = await this.store.list(args.documentId);
      return history.map(toVersionRecord);
    });
  }

  getVersion(request: RequestOf<typeof OPERATIONS.VERSION.GET>): ResultOf<typeof OPERATIONS.VERSION.GET> {
    return this.handler.execute(OPERATIONS.VERSION.GET, async () => {
      const args = validate(schemas.getVersionArgs, request);
      const version = await this.store.get(args.documentId, args.versionId);
      if (!version) {
        throw new NotFoundError(`Version ${args.versionId} not found`, {
          documentId: args.documentId,
          versionId: args.versionId,
        });
      }
      return toVersionRecord(version);
    });
  }

  compare(request: RequestOf<typeof OPERATIONS.DIFF.COMPARE>): ResultOf<typeof OPERATIONS.DIFF.COMPARE> {
    return this.handler.execute(OPERATIONS.DIFF.COMPARE, async () => {
      const args = validate(schemas.compareArgs, request);
      const result = this.diffEngine.compare(args.textA, args.textB, granularityOf(args.charLevel));
      return toDiffResultRecord(result);
    });
  }

  compareVersions(
    request: RequestOf<typeof OPERATIONS.VERSION.COMPARE>
  ): ResultOf<typeof OPERATIONS.VERSION.COMPARE> {
    return this.handler.execute(OPERATIONS.VERSION.COMPARE, async () => {
      const args = validate(schemas.compareVersionsArgs, request);
      const result = await this.store.compareVersions(
        args.documentId,
        args.versionIdA,
        args.versionIdB,
        granularityOf(args.charLevel)
      );
      if (!result) {
        throw new NotFoundError('One or both versions not found', {
          documentId: args.documentId,
          versionIdA: args.versionIdA,
          versionIdB: args.versionIdB,
        });
      }
      return toDiffResultRecord(result);
    });
  }

  clearVersions(request: RequestOf<typeof OPERATIONS.VERSION.CLEAR>): ResultOf<typeof OPERATIONS.VERSION.CLEAR> {
    return this.handler.execute(OPERATIONS.VERSION.CLEAR, async () => {
      const args = validate(schemas.documentArgs, request);
      await this.store.clear(args.documentId);
      return { cleared: true as const };
    });
  }
}
