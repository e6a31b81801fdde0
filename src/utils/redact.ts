/**
 * @fileoverview Redaction helpers for safe logging.
 * @module utils/redact
 * @version 1.0.0
 */

/**
 * Redact bearer tokens and token-like query parameters in a string.
 * Intended for log lines only.
 */
export function redactSensitiveTokens(value: string): string {
    return value
        .replace(/Bearer\s+[^\s"']+/gi, 'Bearer REDACTED')
        .replace(/access_token=[^&\s]*/gi, 'access_token=REDACTED')
        .replace(/\b(api_?key|token)=[^&\s]*/gi, '$1=REDACTED');
}
