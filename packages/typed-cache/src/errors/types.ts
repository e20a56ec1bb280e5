/**
 * Backend operations named in error reports.
 */
export type BackendOperation =
  | 'read'
  | 'readAll'
  | 'write'
  | 'delete'
  | 'clear'
  | 'keysByTag'
  | 'deleteTag'
  | 'purgeExpired';

/**
 * The storage layer itself failed (I/O, connectivity).
 */
export interface BackendError {
  readonly code: 'BACKEND_ERROR';
  readonly message: string;
  readonly operation: BackendOperation;
  readonly key?: string | undefined;
  readonly cause?: unknown;
}

/**
 * A stored payload could not be turned back into a value.
 */
export interface DecodeError {
  readonly code: 'DECODE_ERROR';
  readonly message: string;
  readonly key: string;
  readonly typeId: string;
  readonly cause?: unknown;
}

/**
 * The codec threw while encoding a value.
 */
export interface EncodeError {
  readonly code: 'ENCODE_ERROR';
  readonly message: string;
  readonly key: string;
  readonly typeId: string;
  readonly cause?: unknown;
}

/**
 * The stored typeId differs from the reading codec's typeId.
 */
export interface TypeMismatchError {
  readonly code: 'TYPE_MISMATCH';
  readonly message: string;
  readonly key: string;
  readonly storedTypeId: string;
  readonly requestedTypeId: string;
}

/**
 * An argument was rejected before any backend call.
 */
export interface ValidationError {
  readonly code: 'VALIDATION_ERROR';
  readonly message: string;
  readonly field: 'key' | 'ttlMs';
  readonly value: unknown;
}

/**
 * The backend does not implement an optional capability.
 */
export interface UnsupportedOperationFailure {
  readonly code: 'UNSUPPORTED_OPERATION';
  readonly message: string;
  readonly operation: BackendOperation;
  readonly cause?: unknown;
}

/**
 * Discriminated union of every cache failure kind.
 */
export type CacheError =
  | BackendError
  | DecodeError
  | EncodeError
  | TypeMismatchError
  | ValidationError
  | UnsupportedOperationFailure;

/**
 * Failure codes, one per kind.
 */
export type CacheErrorCode = CacheError['code'];
