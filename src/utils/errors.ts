/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Fails one user, the run continues
    TRANSIENT = "TRANSIENT", // Temporary issue, retry might succeed
    FATAL = "FATAL", // Cannot continue the run
}

/**
 * Error codes double as the "kind" reported in the run summary.
 */
export enum ErrorCode {
    CONFIGURATION = "ConfigurationError",
    CREDENTIAL_INCOMPLETE = "CredentialIncomplete",
    AUTH = "AuthError",
    DATA_FETCH = "DataFetchError",
    RATE_LIMIT = "RateLimitError",
    GENERATION = "GenerationError",
    PUBLISH = "PublishError",
    CANCELLED = "Cancelled",
    UNEXPECTED = "UnexpectedError",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.CONFIGURATION, ErrorCategory.FATAL, message, details);
        this.name = "ConfigurationError";
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export class AuthError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.AUTH, ErrorCategory.RECOVERABLE, message, details);
        this.name = "AuthError";
        Object.setPrototypeOf(this, AuthError.prototype);
    }
}

export class DataFetchError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.DATA_FETCH, ErrorCategory.RECOVERABLE, message, details);
        this.name = "DataFetchError";
        Object.setPrototypeOf(this, DataFetchError.prototype);
    }
}

export class RateLimitError extends AppError {
    constructor(
        public service: string,
        public attempts: number,
        details?: ErrorDetails
    ) {
        super(
            ErrorCode.RATE_LIMIT,
            ErrorCategory.TRANSIENT,
            `${service} rate limit persisted after ${attempts} attempt(s)`,
            details
        );
        this.name = "RateLimitError";
        Object.setPrototypeOf(this, RateLimitError.prototype);
    }
}

/**
 * `malformed` marks output that parsed or validated badly; only those are
 * worth regenerating.
 */
export class GenerationError extends AppError {
    constructor(
        message: string,
        public malformed: boolean,
        details?: ErrorDetails
    ) {
        super(ErrorCode.GENERATION, ErrorCategory.RECOVERABLE, message, details);
        this.name = "GenerationError";
        Object.setPrototypeOf(this, GenerationError.prototype);
    }
}

export class PublishError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.PUBLISH, ErrorCategory.RECOVERABLE, message, details);
        this.name = "PublishError";
        Object.setPrototypeOf(this, PublishError.prototype);
    }
}

export class CancelledError extends AppError {
    constructor(message = "Run cancelled") {
        super(ErrorCode.CANCELLED, ErrorCategory.TRANSIENT, message);
        this.name = "CancelledError";
        Object.setPrototypeOf(this, CancelledError.prototype);
    }
}

export function isFatal(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.FATAL;
}

/**
 * Kind reported for an error caught at the orchestrator boundary.
 */
export function errorKind(error: unknown): ErrorCode {
    if (error instanceof AppError) {
        return error.code;
    }
    return ErrorCode.UNEXPECTED;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error ?? "Unknown error");
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}
