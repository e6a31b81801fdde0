/**
 * @fileoverview Asset Cache implementation.
 * Resolves logical audio identifiers to ready local files with
 * single-flight fetching per identifier.
 * @module modules/assets/AssetCache
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { EventEmitter } from '../../utils/EventEmitter';
import { redactSensitiveTokens } from '../../utils/redact';
import type { IDisposable } from '../../utils/interfaces';
import { FetchError, summarizeErrorForLog } from '../../types/app-errors';
import { ASSET_CONSTANTS, ASSET_ERROR_MESSAGES, ASSET_IDS, AUDIO_EXTENSIONS } from './constants';
import type { IAssetCache, IAudioSource } from './interfaces';
import type {
    AssetCacheEventMap,
    AssetFetchState,
    AssetId,
    AssetRequest,
    AudioAsset,
    PersistedAssetEntry,
} from './types';

export interface AssetCacheConfig {
    /** Directory that holds ready files */
    cacheDir: string;
    /** Download / transcode pipeline */
    source: IAudioSource;
    /** Entries restored from persisted state */
    initialEntries?: Partial<Record<AssetId, PersistedAssetEntry>>;
    debugMode?: boolean;
}

interface InFlightFetch {
    sourceUrl: string;
    promise: Promise<string>;
}

/**
 * File name for an asset: `<id><ext>`, keeping a recognisable audio
 * extension from the reference.
 */
export function assetFileName(id: AssetId, reference: string): string {
    let pathname = reference;
    try {
        pathname = new URL(reference).pathname;
    } catch {
        // Not a URL: treat the reference as a path
    }
    const ext = path.extname(pathname).toLowerCase();
    return id + (AUDIO_EXTENSIONS.includes(ext) ? ext : ASSET_CONSTANTS.DEFAULT_EXTENSION);
}

async function hasContent(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}

/**
 * Asset Cache.
 *
 * An asset stays valid until its configured reference changes; a Ready entry
 * whose file disappeared is fetched again. Failed fetches are not retried
 * here: the next `resolve` is the retry.
 *
 * @implements {IAssetCache}
 */
export class AssetCache implements IAssetCache {
    private readonly _emitter = new EventEmitter<AssetCacheEventMap>('AssetCache');
    private readonly _assets = new Map<AssetId, AudioAsset>();
    private readonly _inFlight = new Map<AssetId, InFlightFetch>();
    private readonly _abort = new AbortController();
    private readonly _cacheDir: string;
    private readonly _source: IAudioSource;
    private readonly _debugMode: boolean;

    constructor(config: AssetCacheConfig) {
        this._cacheDir = config.cacheDir;
        this._source = config.source;
        this._debugMode = config.debugMode ?? false;

        for (const id of ASSET_IDS) {
            const entry = config.initialEntries?.[id];
            this._assets.set(id, entry
                ? { id, sourceUrl: entry.sourceUrl, state: { status: 'ready', path: entry.path, readyAt: 0 } }
                : { id, sourceUrl: null, state: { status: 'absent' } });
        }
    }

    // ============================================
    // Resolution
    // ============================================

    public resolve(id: AssetId, sourceUrl: string): Promise<string> {
        const pending = this._inFlight.get(id);
        if (pending) {
            if (pending.sourceUrl === sourceUrl) {
                return pending.promise;
            }
            // Reference changed mid-fetch: let the old fetch settle, then start over
            const retry = (): Promise<string> => this.resolve(id, sourceUrl);
            return pending.promise.then(retry, retry);
        }

        const entry: InFlightFetch = {
            sourceUrl,
            promise: this._resolveUncached(id, sourceUrl).finally(() => {
                if (this._inFlight.get(id) === entry) {
                    this._inFlight.delete(id);
                }
            }),
        };
        this._inFlight.set(id, entry);
        return entry.promise;
    }

    public isReady(id: AssetId, sourceUrl: string): boolean {
        const asset = this.getAsset(id);
        return asset.state.status === 'ready' && asset.sourceUrl === sourceUrl;
    }

    public getAsset(id: AssetId): AudioAsset {
        const asset = this._assets.get(id);
        if (asset) {
            return { ...asset, state: { ...asset.state } };
        }
        return { id, sourceUrl: null, state: { status: 'absent' } };
    }

    public snapshot(): AudioAsset[] {
        return ASSET_IDS.map((id) => this.getAsset(id));
    }

    /**
     * Ready entries in persistable form.
     */
    public persistableEntries(): Partial<Record<AssetId, PersistedAssetEntry>> {
        const entries: Partial<Record<AssetId, PersistedAssetEntry>> = {};
        for (const asset of this._assets.values()) {
            if (asset.state.status === 'ready' && asset.sourceUrl !== null) {
                entries[asset.id] = { sourceUrl: asset.sourceUrl, path: asset.state.path };
            }
        }
        return entries;
    }

    public async prefetch(requests: AssetRequest[]): Promise<AssetId[]> {
        const ready: AssetId[] = [];
        for (const request of requests) {
            try {
                await this.resolve(request.id, request.sourceUrl);
                ready.push(request.id);
            } catch (error) {
                console.warn('[AssetCache] Prefetch failed for ' + request.id, summarizeErrorForLog(error));
            }
        }
        return ready;
    }

    public dispose(): void {
        if (!this._abort.signal.aborted) {
            console.info(`[AssetCache] Disposed, aborting ${this._inFlight.size} fetches`);
            this._abort.abort();
        }
    }

    public on<K extends keyof AssetCacheEventMap>(
        event: K,
        handler: (payload: AssetCacheEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    // ============================================
    // Private Methods
    // ============================================

    private async _resolveUncached(id: AssetId, sourceUrl: string): Promise<string> {
        const current = this.getAsset(id);

        if (current.sourceUrl !== null && current.sourceUrl !== sourceUrl) {
            await this._discardStale(current);
        } else if (current.state.status === 'ready') {
            if (await hasContent(current.state.path)) {
                if (this._debugMode) {
                    console.debug('[AssetCache] Cache hit:', id);
                }
                return current.state.path;
            }
            console.warn('[AssetCache] Cached file missing, fetching again:', current.state.path);
        }

        if (this._abort.signal.aborted) {
            throw new FetchError(ASSET_ERROR_MESSAGES.DISPOSED, { assetId: id, reference: sourceUrl });
        }
        this._setState(id, sourceUrl, { status: 'fetching', startedAt: Date.now() });
        console.info(`[AssetCache] Fetching ${id} from ${redactSensitiveTokens(sourceUrl)}`);

        try {
            await fs.mkdir(this._cacheDir, { recursive: true });
            const destination = path.join(this._cacheDir, assetFileName(id, sourceUrl));
            const produced = await this._source.fetch(sourceUrl, destination, this._abort.signal);
            if (!(await hasContent(produced))) {
                throw new FetchError(ASSET_ERROR_MESSAGES.EMPTY_FILE, { reference: sourceUrl });
            }

            this._setState(id, sourceUrl, { status: 'ready', path: produced, readyAt: Date.now() });
            console.info(`[AssetCache] Asset ${id} ready: ${produced}`);
            return produced;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this._setState(id, sourceUrl, { status: 'failed', reason, failedAt: Date.now() });
            throw new FetchError(reason, { assetId: id, reference: sourceUrl });
        }
    }

    private async _discardStale(asset: AudioAsset): Promise<void> {
        console.info(`[AssetCache] Reference for ${asset.id} changed, discarding cached file`);
        if (asset.state.status === 'ready') {
            try {
                await fs.rm(asset.state.path, { force: true });
            } catch (error) {
                console.warn('[AssetCache] Could not remove stale file ' + asset.state.path, summarizeErrorForLog(error));
            }
        }
        this._setState(asset.id, null, { status: 'absent' });
    }

    private _setState(id: AssetId, sourceUrl: string | null, state: AssetFetchState): void {
        const asset: AudioAsset = { id, sourceUrl, state };
        this._assets.set(id, asset);
        this._emitter.emit('assetStateChange', this.getAsset(id));
    }
}
