/**
 * @fileoverview fetch() with an abort-driven timeout.
 * @module utils/http
 * @version 1.0.0
 */

/**
 * Thrown when {@link fetchWithTimeout} aborts a request.
 */
export class RequestTimeoutError extends Error {
    constructor(public readonly url: string, public readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

/**
 * Issue a fetch that is aborted after `timeoutMs`, or earlier when
 * `init.signal` aborts.
 * @throws RequestTimeoutError on timeout, or whatever fetch throws otherwise
 */
export async function fetchWithTimeout(
    url: string,
    init: RequestInit,
    timeoutMs: number
): Promise<Response> {
    const controller = new AbortController();
    const callerSignal = init.signal ?? null;
    const abort = (): void => controller.abort();
    if (callerSignal?.aborted) {
        controller.abort();
    } else {
        callerSignal?.addEventListener('abort', abort, { once: true });
    }
    const timeoutId = setTimeout(abort, timeoutMs);
    try {
        return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
        if (controller.signal.aborted && !callerSignal?.aborted) {
            throw new RequestTimeoutError(url, timeoutMs);
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
        callerSignal?.removeEventListener('abort', abort);
    }
}
