/**
 * @fileoverview Unit tests for fetchWithTimeout.
 * @module utils/__tests__/http.test
 */

import { fetchWithTimeout, RequestTimeoutError } from '../http';

describe('fetchWithTimeout', () => {
    const originalFetch = globalThis.fetch;

    afterEach(() => {
        (globalThis as unknown as { fetch: typeof fetch }).fetch = originalFetch;
        jest.useRealTimers();
    });

    it('passes the request through with an abort signal', async () => {
        const response = { ok: true, status: 200 };
        const mock = jest.fn().mockResolvedValue(response);
        (globalThis as unknown as { fetch: jest.Mock }).fetch = mock;

        await expect(fetchWithTimeout('http://gateway.local/api', { method: 'POST' }, 1000)).resolves.toBe(response);
        expect(mock).toHaveBeenCalledWith('http://gateway.local/api', {
            method: 'POST',
            signal: expect.any(AbortSignal),
        });
    });

    it('throws RequestTimeoutError once the timeout aborts the request', async () => {
        jest.useFakeTimers();
        (globalThis as unknown as { fetch: jest.Mock }).fetch = jest.fn(
            (_url: string, init: RequestInit) =>
                new Promise((_resolve, reject) => {
                    init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                })
        );

        const result = fetchWithTimeout('http://gateway.local/slow', {}, 500);
        const assertion = expect(result).rejects.toThrow(new RequestTimeoutError('http://gateway.local/slow', 500));
        await jest.advanceTimersByTimeAsync(500);

        await assertion;
    });

    it('aborts when the caller signal aborts, without calling it a timeout', async () => {
        const failure = new Error('aborted');
        (globalThis as unknown as { fetch: jest.Mock }).fetch = jest.fn(
            (_url: string, init: RequestInit) =>
                new Promise((_resolve, reject) => {
                    init.signal?.addEventListener('abort', () => reject(failure));
                })
        );
        const controller = new AbortController();

        const result = fetchWithTimeout('http://media.local/a.mp3', { signal: controller.signal }, 60_000);
        controller.abort();

        await expect(result).rejects.toBe(failure);
    });

    it('rethrows other failures unchanged', async () => {
        const failure = new Error('ECONNREFUSED');
        (globalThis as unknown as { fetch: jest.Mock }).fetch = jest.fn().mockRejectedValue(failure);

        await expect(fetchWithTimeout('http://gateway.local/api', {}, 1000)).rejects.toBe(failure);
    });
});
