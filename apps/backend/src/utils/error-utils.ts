import { AppError, CancellationError } from './errors';

// AbortSignal reasons are DOMExceptions, which are not always `instanceof Error`.
export function isAbortError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'name' in error
        && (error.name === 'AbortError' || error.name === 'CanceledError');
}

/**
 * Normalise anything thrown into an AppError. `fallback` builds the error for
 * failures that are neither AppErrors nor cancellations.
 */
export function toAppError(
    error: unknown,
    fallback: (message: string, cause: unknown) => AppError,
    signal?: AbortSignal
): AppError {
    if (error instanceof AppError) {
        return error;
    }

    if (signal?.aborted || isAbortError(error)) {
        return new CancellationError();
    }

    if (error instanceof Error) {
        return fallback(error.message, error);
    }

    return fallback('An unknown error occurred', error);
}
