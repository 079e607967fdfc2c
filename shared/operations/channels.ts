// Operation naming convention: domain:action
export const OPERATIONS = {
  VERSION: {
    SAVE: 'version:save',
    LIST: 'version:list',
    GET: 'version:get',
    COMPARE: 'version:compare',
    CLEAR: 'version:clear',
  },

  DIFF: {
    COMPARE: 'diff:compare',
  },
} as const;

type ValueOf<T> = T[keyof T];

export type OperationName =
  | ValueOf<typeof OPERATIONS.VERSION>
  | ValueOf<typeof OPERATIONS.DIFF>;
