export {
  DiffError,
  HashingError,
  ConflictingKeyError,
  InconsistentStateError,
  ApplyError,
  wrapError,
} from './diff-error.js';
export type {
  DiffErrorCode,
  DiffErrorDetails,
  ApplyFailure,
  ApplyCancellation,
  WrapErrorOptions,
} from './diff-error.js';
