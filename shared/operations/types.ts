import { OPERATIONS } from './channels';
import type { DiffResultRecord, VersionRecord } from '../types';

// Request/Response type mapping
export interface OperationRequestMap {
  [OPERATIONS.VERSION.SAVE]: {
    documentId: string;
    content: string;
    label?: string | null;
    style?: string | null;
  };
  [OPERATIONS.VERSION.LIST]: { documentId: string };
  [OPERATIONS.VERSION.GET]: { documentId: string; versionId: string };
  [OPERATIONS.VERSION.COMPARE]: {
    documentId: string;
    versionIdA: string;
    versionIdB: string;
    charLevel?: boolean;
  };
  [OPERATIONS.VERSION.CLEAR]: { documentId: string };

  [OPERATIONS.DIFF.COMPARE]: { textA: string; textB: string; charLevel?: boolean };
}

export interface OperationResponseMap {
  [OPERATIONS.VERSION.SAVE]: VersionRecord;
  [OPERATIONS.VERSION.LIST]: VersionRecord[];
  [OPERATIONS.VERSION.GET]: VersionRecord;
  [OPERATIONS.VERSION.COMPARE]: DiffResultRecord;
  [OPERATIONS.VERSION.CLEAR]: { cleared: true };

  [OPERATIONS.DIFF.COMPARE]: DiffResultRecord;
}

export type OperationErrorCode =
  | 'VALIDATION_ERROR'
  | 'PERSISTENCE_FAULT'
  | 'RESOURCE_LIMIT_EXCEEDED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface OperationError {
  code: OperationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type OperationResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: OperationError };
