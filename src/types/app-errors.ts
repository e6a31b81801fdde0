/**
 * @fileoverview Canonical application error taxonomy and typed error classes.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for consistent error handling across the service.
 */
export enum AppErrorCode {
    // Time table source
    SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
    PARSE_ERROR = 'PARSE_ERROR',
    DATA_QUALITY = 'DATA_QUALITY',

    // Assets
    FETCH_FAILED = 'FETCH_FAILED',

    // Playback
    PLAYBACK_FAILED = 'PLAYBACK_FAILED',
    PREEMPTION_TIMEOUT = 'PREEMPTION_TIMEOUT',

    // Configuration / storage
    CONFIG_INVALID = 'CONFIG_INVALID',
    STORAGE_CORRUPTED = 'STORAGE_CORRUPTED',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether a later attempt might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Error carrying an {@link AppErrorCode}. Every error the service raises on
 * purpose extends this class.
 */
export class CodedError extends Error implements AppError {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;
    public readonly context: Record<string, unknown> | undefined;

    constructor(
        code: AppErrorCode,
        message: string,
        recoverable: boolean = false,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'CodedError';
        this.code = code;
        this.recoverable = recoverable;
        this.context = context;
    }

    public toAppError(): AppError {
        const error: AppError = {
            code: this.code,
            message: this.message,
            recoverable: this.recoverable,
        };
        if (this.context !== undefined) {
            error.context = this.context;
        }
        return error;
    }
}

/** Time table source could not be reached (network, HTTP status, timeout). */
export class SourceUnavailableError extends CodedError {
    public readonly httpStatus: number | undefined;

    constructor(message: string, httpStatus?: number, context?: Record<string, unknown>) {
        super(AppErrorCode.SOURCE_UNAVAILABLE, message, true, context);
        this.name = 'SourceUnavailableError';
        this.httpStatus = httpStatus;
    }
}

/** Time table source answered, but the payload could not be read. */
export class TimeTableParseError extends CodedError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(AppErrorCode.PARSE_ERROR, message, true, context);
        this.name = 'TimeTableParseError';
    }
}

/** Time table is incomplete or its times are out of canonical order. */
export class DataQualityError extends CodedError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(AppErrorCode.DATA_QUALITY, message, true, context);
        this.name = 'DataQualityError';
    }
}

/** Audio asset download or transcode failed. */
export class FetchError extends CodedError {
    /** Logical asset identifier, once known (audio sources do not know it) */
    public readonly assetId: string | undefined;
    /** Media reference that was being fetched */
    public readonly reference: string | undefined;

    constructor(message: string, details: { assetId?: string; reference?: string } = {}) {
        super(AppErrorCode.FETCH_FAILED, message, true, { ...details });
        this.name = 'FetchError';
        this.assetId = details.assetId;
        this.reference = details.reference;
    }
}

/** Playback backend rejected a start or stop command. */
export class PlaybackError extends CodedError {
    public readonly backend: string;

    constructor(backend: string, message: string, context?: Record<string, unknown>) {
        super(AppErrorCode.PLAYBACK_FAILED, message, true, { backend, ...context });
        this.name = 'PlaybackError';
        this.backend = backend;
    }
}

/** Stop during preemption did not complete within the bound. Non-fatal. */
export class PreemptionTimeoutError extends CodedError {
    constructor(timeoutMs: number, context?: Record<string, unknown>) {
        super(
            AppErrorCode.PREEMPTION_TIMEOUT,
            `Stop did not complete within ${timeoutMs}ms`,
            true,
            { timeoutMs, ...context }
        );
        this.name = 'PreemptionTimeoutError';
    }
}

/** Configuration file or settings patch failed validation. */
export class ConfigError extends CodedError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(AppErrorCode.CONFIG_INVALID, message, false, context);
        this.name = 'ConfigError';
    }
}

/**
 * Normalize anything thrown into an {@link AppError}.
 */
export function toAppError(error: unknown): AppError {
    if (error instanceof CodedError) {
        return error.toAppError();
    }
    return {
        code: AppErrorCode.UNKNOWN,
        message: error instanceof Error ? error.message : String(error),
        recoverable: false,
    };
}

/**
 * Reduce an unknown error to fields that are safe and useful in a log line.
 */
export function summarizeErrorForLog(error: unknown): { name?: string; code?: unknown; message?: string } {
    if (!error || typeof error !== 'object') return {};
    return {
        ...('name' in error && typeof error.name === 'string' ? { name: error.name } : {}),
        ...('code' in error ? { code: error.code } : {}),
        ...('message' in error && typeof error.message === 'string' ? { message: error.message } : {}),
    };
}
