/**
 * @fileoverview Audio source for direct file URLs.
 * @module modules/assets/HttpDownloadSource
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import { FetchError } from '../../types/app-errors';
import { fetchWithTimeout } from '../../utils/http';
import { ASSET_CONSTANTS, ASSET_ERROR_MESSAGES } from './constants';
import type { IAudioSource } from './interfaces';

export interface HttpDownloadSourceConfig {
    timeoutMs?: number;
}

/**
 * Downloads a file over HTTP(S) into a partial file, then renames it.
 */
export class HttpDownloadSource implements IAudioSource {
    private readonly _timeoutMs: number;

    constructor(config: HttpDownloadSourceConfig = {}) {
        this._timeoutMs = config.timeoutMs ?? ASSET_CONSTANTS.DOWNLOAD_TIMEOUT_MS;
    }

    public async fetch(reference: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
        const body = await this._download(reference, signal);
        const partialPath = destinationPath + ASSET_CONSTANTS.PARTIAL_SUFFIX;
        try {
            await fs.writeFile(partialPath, body);
            await fs.rename(partialPath, destinationPath);
        } catch (error) {
            await fs.rm(partialPath, { force: true });
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Could not write ${destinationPath}: ${message}`, { reference });
        }
        return destinationPath;
    }

    private async _download(reference: string, signal: AbortSignal | undefined): Promise<Uint8Array> {
        let response: Response;
        try {
            response = await fetchWithTimeout(reference, { method: 'GET', ...(signal ? { signal } : {}) }, this._timeoutMs);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Download failed: ${message}`, { reference });
        }

        if (!response.ok) {
            throw new FetchError(`Download failed: HTTP ${response.status}`, { reference });
        }

        const body = new Uint8Array(await response.arrayBuffer());
        if (body.byteLength === 0) {
            throw new FetchError(ASSET_ERROR_MESSAGES.EMPTY_FILE, { reference });
        }

        const announced = Number(response.headers.get('content-length'));
        if (Number.isFinite(announced) && announced > 0 && body.byteLength < announced) {
            throw new FetchError(ASSET_ERROR_MESSAGES.TRUNCATED, { reference });
        }
        return body;
    }
}
