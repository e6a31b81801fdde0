/**
 * @fileoverview Routes a media reference to the audio source that handles it.
 * @module modules/assets/CompositeAudioSource
 * @version 1.0.0
 */

import path from 'node:path';
import { FetchError } from '../../types/app-errors';
import { ASSET_ERROR_MESSAGES, AUDIO_EXTENSIONS } from './constants';
import type { IAudioSource } from './interfaces';
import { toLocalPath } from './LocalFileSource';

export type ReferenceKind = 'local' | 'direct' | 'extractor' | 'unsupported';

/**
 * Classify a reference:
 * - `local`: file:// URL or plain path
 * - `direct`: http(s) URL whose path ends in an audio extension
 * - `extractor`: any other http(s) URL (video-hosting pages)
 */
export function classifyReference(reference: string): ReferenceKind {
    if (toLocalPath(reference) !== null) {
        return reference.trim() === '' ? 'unsupported' : 'local';
    }
    let url: URL;
    try {
        url = new URL(reference);
    } catch {
        return 'unsupported';
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return 'unsupported';
    }
    return AUDIO_EXTENSIONS.includes(path.extname(url.pathname).toLowerCase()) ? 'direct' : 'extractor';
}

export interface CompositeAudioSources {
    local: IAudioSource;
    direct: IAudioSource;
    extractor: IAudioSource;
}

export class CompositeAudioSource implements IAudioSource {
    constructor(private readonly _sources: CompositeAudioSources) {}

    public fetch(reference: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
        const kind = classifyReference(reference);
        if (kind === 'unsupported') {
            return Promise.reject(new FetchError(ASSET_ERROR_MESSAGES.UNSUPPORTED_REFERENCE, { reference }));
        }
        return this._sources[kind].fetch(reference, destinationPath, signal);
    }
}
