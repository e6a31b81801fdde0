/**
 * @fileoverview Type definitions for the Asset Cache module.
 * @module modules/assets/types
 * @version 1.0.0
 */

/**
 * Logical asset identifiers. `primary` plays for every kind unless a
 * kind-specific asset (`fajr`) is configured.
 */
export type AssetId = 'primary' | 'fajr';

/**
 * Fetch state of one asset.
 */
export type AssetFetchState =
    | { status: 'absent' }
    | { status: 'fetching'; startedAt: number }
    | { status: 'ready'; path: string; readyAt: number }
    | { status: 'failed'; reason: string; failedAt: number };

/**
 * Read-only view of one cached asset.
 */
export interface AudioAsset {
    id: AssetId;
    /** Media reference the cached file was produced from */
    sourceUrl: string | null;
    state: AssetFetchState;
}

/**
 * What survives a restart for each asset.
 */
export interface PersistedAssetEntry {
    sourceUrl: string;
    path: string;
}

/**
 * One prefetch request.
 */
export interface AssetRequest {
    id: AssetId;
    sourceUrl: string;
}

/**
 * Asset Cache event map.
 */
export interface AssetCacheEventMap extends Record<string, unknown> {
    /** Fired on every state transition */
    assetStateChange: AudioAsset;
}
