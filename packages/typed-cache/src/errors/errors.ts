import type {
  BackendError,
  BackendOperation,
  CacheError,
  DecodeError,
  EncodeError,
  TypeMismatchError,
  UnsupportedOperationFailure,
  ValidationError,
} from './types.js';

/**
 * Thrown by a backend for a capability it does not implement
 * (for example, dropping a tag index).
 *
 * The cache store classifies it as `UNSUPPORTED_OPERATION` rather than a
 * storage failure.
 */
export class UnsupportedOperationError extends Error {
  /**
   * Name of the unsupported backend operation.
   */
  readonly operation: BackendOperation;

  constructor(operation: BackendOperation, message?: string) {
    super(message ?? `Backend does not support "${operation}"`);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

/**
 * Extracts a readable message from a thrown value.
 */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const forKey = (key: string | undefined): string => (key === undefined ? '' : ` for key="${key}"`);

/**
 * Creates a BackendError.
 *
 * @param operation - The backend operation that failed
 * @param key - Key involved, if any
 * @param cause - Original error
 * @returns A BackendError object
 */
export const createBackendError = (
  operation: BackendOperation,
  key: string | undefined,
  cause: unknown
): BackendError => ({
  code: 'BACKEND_ERROR',
  message: `Backend ${operation} failed${forKey(key)}: ${describeCause(cause)}`,
  operation,
  key,
  cause,
});

/**
 * Creates an UnsupportedOperationFailure.
 */
export const createUnsupportedOperationFailure = (
  operation: BackendOperation,
  cause?: unknown
): UnsupportedOperationFailure => ({
  code: 'UNSUPPORTED_OPERATION',
  message: `Backend does not support "${operation}"`,
  operation,
  cause,
});

/**
 * Maps a value thrown by a backend to the matching failure kind.
 *
 * @param operation - The backend operation that threw
 * @param key - Key involved, if any
 * @param cause - The thrown value
 * @returns UNSUPPORTED_OPERATION for UnsupportedOperationError, BACKEND_ERROR otherwise
 */
export const classifyBackendFailure = (
  operation: BackendOperation,
  key: string | undefined,
  cause: unknown
): BackendError | UnsupportedOperationFailure =>
  cause instanceof UnsupportedOperationError
    ? createUnsupportedOperationFailure(operation, cause)
    : createBackendError(operation, key, cause);

/**
 * Creates a DecodeError.
 */
export const createDecodeError = (key: string, typeId: string, cause: unknown): DecodeError => ({
  code: 'DECODE_ERROR',
  message: `Decode failed for key="${key}" typeId="${typeId}": ${describeCause(cause)}`,
  key,
  typeId,
  cause,
});

/**
 * Creates an EncodeError.
 */
export const createEncodeError = (key: string, typeId: string, cause: unknown): EncodeError => ({
  code: 'ENCODE_ERROR',
  message: `Encode failed for key="${key}" typeId="${typeId}": ${describeCause(cause)}`,
  key,
  typeId,
  cause,
});

/**
 * Creates a TypeMismatchError.
 *
 * @param key - The key that was read
 * @param storedTypeId - typeId recorded on the entry
 * @param requestedTypeId - typeId of the reading codec
 * @returns A TypeMismatchError object
 */
export const createTypeMismatchError = (
  key: string,
  storedTypeId: string,
  requestedTypeId: string
): TypeMismatchError => ({
  code: 'TYPE_MISMATCH',
  message: `Type mismatch for key="${key}": stored="${storedTypeId}" requested="${requestedTypeId}"`,
  key,
  storedTypeId,
  requestedTypeId,
});

/**
 * Creates a ValidationError for an empty key.
 */
export const createInvalidKeyError = (key: string): ValidationError => ({
  code: 'VALIDATION_ERROR',
  message: 'Cache key must be a non-empty string',
  field: 'key',
  value: key,
});

/**
 * Creates a ValidationError for a TTL that is not a number.
 */
export const createInvalidTtlError = (ttlMs: number): ValidationError => ({
  code: 'VALIDATION_ERROR',
  message: `ttlMs must be a number, got ${String(ttlMs)}`,
  field: 'ttlMs',
  value: ttlMs,
});

/**
 * Formats any cache failure as a single line.
 *
 * @example
 * ```typescript
 * formatCacheError(createTypeMismatchError('user:1', 'user:v1', 'user:v2'));
 * // => '[TYPE_MISMATCH] Type mismatch for key="user:1": stored="user:v1" requested="user:v2"'
 * ```
 */
export const formatCacheError = (error: CacheError): string => `[${error.code}] ${error.message}`;
