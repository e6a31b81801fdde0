/**
 * @fileoverview Audio source for files already on disk.
 * @module modules/assets/LocalFileSource
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { FetchError } from '../../types/app-errors';
import { ASSET_CONSTANTS, ASSET_ERROR_MESSAGES } from './constants';
import type { IAudioSource } from './interfaces';

/**
 * Filesystem path for a local reference (`file://` URL or plain path),
 * or null when the reference is remote.
 */
export function toLocalPath(reference: string): string | null {
    if (reference.startsWith('file://')) {
        return fileURLToPath(reference);
    }
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(reference)) {
        return null;
    }
    return reference;
}

/**
 * Copies a local file into the cache directory.
 */
export class LocalFileSource implements IAudioSource {
    public async fetch(reference: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
        const sourcePath = toLocalPath(reference);
        if (sourcePath === null) {
            throw new FetchError(ASSET_ERROR_MESSAGES.UNSUPPORTED_REFERENCE, { reference });
        }
        if (signal?.aborted) {
            throw new FetchError(ASSET_ERROR_MESSAGES.DISPOSED, { reference });
        }

        const partialPath = destinationPath + ASSET_CONSTANTS.PARTIAL_SUFFIX;
        try {
            await fs.copyFile(sourcePath, partialPath);
            await fs.rename(partialPath, destinationPath);
        } catch (error) {
            await fs.rm(partialPath, { force: true });
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Could not copy ${sourcePath}: ${message}`, { reference });
        }
        return destinationPath;
    }
}
