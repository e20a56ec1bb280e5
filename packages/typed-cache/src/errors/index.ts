export type {
  BackendOperation,
  BackendError,
  DecodeError,
  EncodeError,
  TypeMismatchError,
  ValidationError,
  UnsupportedOperationFailure,
  CacheError,
  CacheErrorCode,
} from './types.js';

export {
  UnsupportedOperationError,
  describeCause,
  createBackendError,
  createUnsupportedOperationFailure,
  classifyBackendFailure,
  createDecodeError,
  createEncodeError,
  createTypeMismatchError,
  createInvalidKeyError,
  createInvalidTtlError,
  formatCacheError,
} from './errors.js';
