/**
 * @fileoverview Constants for the control server.
 * @module modules/control/constants
 * @version 1.0.0
 */

export const CONTROL_CONSTANTS = {
    /** Largest accepted request body */
    MAX_BODY_BYTES: 64 * 1024,
} as const;

/** Content types for served audio files. */
export const MEDIA_CONTENT_TYPES: Readonly<Record<string, string>> = {
    '.mp3': 'audio/mpeg',
    '.m4a': 'audio/mp4',
    '.aac': 'audio/aac',
    '.ogg': 'audio/ogg',
    '.opus': 'audio/opus',
    '.wav': 'audio/wav',
    '.flac': 'audio/flac',
};

export const CONTROL_ERROR_CODES = {
    UNAUTHORIZED: 'UNAUTHORIZED',
    BAD_REQUEST: 'BAD_REQUEST',
    NOT_FOUND: 'NOT_FOUND',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export const CONTROL_ERROR_MESSAGES = {
    MISSING_TOKEN: 'Missing Authorization header',
    INVALID_TOKEN: 'Invalid token',
    INVALID_JSON: 'Request body is not valid JSON',
    BODY_TOO_LARGE: 'Request body too large',
    UNKNOWN_KIND: 'Unknown event kind',
} as const;
