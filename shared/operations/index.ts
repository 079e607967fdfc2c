export { OPERATIONS } from './channels';
export type { OperationName } from './channels';
export type {
  OperationRequestMap,
  OperationResponseMap,
  OperationErrorCode,
  OperationError,
  OperationResult,
} from './types';
