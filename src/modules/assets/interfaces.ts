/**
 * @fileoverview Interface definitions for the Asset Cache module.
 * @module modules/assets/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { AssetCacheEventMap, AssetId, AssetRequest, AudioAsset } from './types';

/**
 * Turns a media reference (local path, direct file URL or video-hosting URL)
 * into a playable local file.
 */
export interface IAudioSource {
    /**
     * Produce the file at `destinationPath`. Implementations write to a
     * partial file first and only rename it into place once complete.
     * @param signal - Aborts the transfer; partial output is removed
     * @returns The path of the produced file
     * @throws FetchError on any failure
     */
    fetch(reference: string, destinationPath: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Maps logical asset identifiers to ready local files.
 */
export interface IAssetCache {
    /**
     * Resolve an asset to a ready file, fetching it if needed. Concurrent calls
     * for one identifier share a single fetch and receive the same result.
     * A changed `sourceUrl` discards the stale file first.
     * @throws FetchError when the fetch fails (not retried automatically)
     */
    resolve(id: AssetId, sourceUrl: string): Promise<string>;

    /** True when `resolve` would return without fetching. */
    isReady(id: AssetId, sourceUrl: string): boolean;

    getAsset(id: AssetId): AudioAsset;

    /** Every known asset, in identifier order. */
    snapshot(): AudioAsset[];

    /**
     * Warm the cache. Failures are logged and left for the next resolve.
     * @returns Identifiers that ended up ready
     */
    prefetch(requests: AssetRequest[]): Promise<AssetId[]>;

    /** Abort every fetch in progress. Later resolves fail. */
    dispose(): void;

    on<K extends keyof AssetCacheEventMap>(
        event: K,
        handler: (payload: AssetCacheEventMap[K]) => void
    ): IDisposable;
}
