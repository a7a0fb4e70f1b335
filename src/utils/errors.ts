/**
 * Error taxonomy for the reputation bot.
 * Each error carries a machine-readable `code` and, when it wraps something, the wrapped `cause`.
 */

export const ERROR_CODES = {
    VALIDATION_ERROR: "VALIDATION_ERROR",
    PERMISSION_DENIED: "PERMISSION_DENIED",
    NOT_FOUND: "NOT_FOUND",
    PERSISTENCE_FAILURE: "PERSISTENCE_FAILURE",
    NOTIFICATION_FAILURE: "NOTIFICATION_FAILURE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class AppError extends Error {
    public readonly code: ErrorCode;
    public readonly details?: Record<string, unknown>;
    public readonly cause?: unknown;

    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Bad command input, rejected before anything is mutated. Safe to show to the caller. */
export class ValidationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

export class PermissionDeniedError extends AppError {
    constructor(message = "Administrator permissions required", details?: Record<string, unknown>) {
        super(ERROR_CODES.PERMISSION_DENIED, message, details);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** A snapshot write or read failed. In-memory state stays authoritative. */
export class PersistenceError extends AppError {
    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(ERROR_CODES.PERSISTENCE_FAILURE, message, details, cause);
    }
}

/** The audit sink could not be reached. */
export class NotificationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(ERROR_CODES.NOTIFICATION_FAILURE, message, details, cause);
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}

/** Best-effort one-line description of any thrown value. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
