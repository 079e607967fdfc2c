import type { OperationErrorCode } from '../shared/operations';

type RevisionErrorCode = Exclude<OperationErrorCode, 'INTERNAL_ERROR'>;

export abstract class RevisionError extends Error {
  abstract readonly code: RevisionErrorCode;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed identifiers or missing text. Raised before any state changes. */
export class ValidationError extends RevisionError {
  readonly code = 'VALIDATION_ERROR';
}

export class PersistenceFault extends RevisionError {
  readonly code = 'PERSISTENCE_FAULT';
}

export class ResourceLimitExceeded extends RevisionError {
  readonly code = 'RESOURCE_LIMIT_EXCEEDED';
}

/** A requested version is absent. Raised only at the operation boundary. */
export class NotFoundError extends RevisionError {
  readonly code = 'NOT_FOUND';
}

export function isRevisionError(error: unknown): error is RevisionError {
  return error instanceof RevisionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
