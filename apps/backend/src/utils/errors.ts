export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number,
        public readonly details?: ErrorDetails
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    constructor(
        message: string = "Invalid request",
        details?: ErrorDetails
    ) {
        super(message, "VALIDATION_ERROR", 400, details);
    }
}

export class UnsupportedProviderError extends AppError {
    constructor(providerName: string) {
        super(`Provider ${providerName} not supported.`, "UNSUPPORTED_PROVIDER", 400, { providerName });
    }
}

export class UnauthorizedError extends AppError {
    constructor(message: string = "Unauthorized") {
        super(message, "UNAUTHORIZED", 401);
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string = "Forbidden") {
        super(message, "FORBIDDEN", 403);
    }
}

export class UpstreamError extends AppError {
    constructor(
        message: string = "Invalid response from upstream provider",
        details?: ErrorDetails
    ) {
        super(message, "UPSTREAM_ERROR", 502, details);
    }
}

export class CacheInfrastructureError extends AppError {
    constructor(
        message: string = "Cache store unavailable",
        details?: ErrorDetails
    ) {
        super(message, "CACHE_UNAVAILABLE", 503, details);
    }
}

// 499 is the de facto "client closed request" status.
export class CancellationError extends AppError {
    constructor(message: string = "Request was cancelled") {
        super(message, "REQUEST_CANCELLED", 499);
    }
}
