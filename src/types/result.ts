/**
 * Store results
 *
 * Store operations never throw: they return either the data or one of
 * three failure codes, so callers can tell an empty answer from a broken store.
 */

export type StoreErrorCode = "NOT_FOUND" | "CONFLICT" | "UNAVAILABLE";

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: StoreErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type StoreResult<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: StoreErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Failure {
  const error: Failure["error"] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: StoreResult<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Check whether a result failed with the given code
 */
export function hasErrorCode<T>(
  result: StoreResult<T>,
  code: StoreErrorCode,
): boolean {
  return result.success === false && result.error.code === code;
}
