export { RevisionApi } from './revision-api';
export type { RevisionApiOptions } from './revision-api';
export { OperationHandler } from './handler';
