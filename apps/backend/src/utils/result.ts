/**
 * Type definitions for the Result pattern
 */

/**
 * Success variant of Result
 */
export type Success<T> = {
  success: true;
  data: T;
};

/**
 * Error variant of Result
 */
export type Failure<E> = {
  success: false;
  error: E;
};

/**
 * Result type representing either success with data or failure with an error
 */
export type Result<T, E> = Success<T> | Failure<E>;

export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success === true;
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure<E> {
  return result.success === false;
}

export const createSuccess = <T>(data: T): Success<T> => {
  return { success: true, data };
};

export const createError = <E>(error: E): Failure<E> => {
  return { success: false, error };
};

/**
 * Safely map a Result's data, preserving the error if present
 */
export const mapResult = <T1, E, T2>(
  result: Result<T1, E>,
  mapFunc: (data: T1) => T2
): Result<T2, E> => {
  if (isSuccess(result)) {
    return createSuccess(mapFunc(result.data));
  }
  return createError(result.error);
};

/**
 * Extract the data from a Result if it's a success, or throw the error if it's a failure
 */
export function unwrapResult<T, E extends Error>(result: Result<T, E>): T {
  if (isSuccess(result)) {
    return result.data;
  }
  throw result.error;
}
