/**
 * @fileoverview Public exports for the Asset Cache module.
 * @module modules/assets
 * @version 1.0.0
 */

export { AssetCache, assetFileName } from './AssetCache';
export type { AssetCacheConfig } from './AssetCache';
export { LocalFileSource, toLocalPath } from './LocalFileSource';
export { HttpDownloadSource } from './HttpDownloadSource';
export type { HttpDownloadSourceConfig } from './HttpDownloadSource';
export { ExternalToolSource, buildExtractorArgs, execFileRunner } from './ExternalToolSource';
export type { ExternalToolSourceConfig, ToolRunner } from './ExternalToolSource';
export { CompositeAudioSource, classifyReference } from './CompositeAudioSource';
export type { CompositeAudioSources, ReferenceKind } from './CompositeAudioSource';
export { ASSET_IDS, ASSET_CONSTANTS, AUDIO_EXTENSIONS, ASSET_ERROR_MESSAGES } from './constants';
export type { IAssetCache, IAudioSource } from './interfaces';
export type {
    AssetId,
    AssetFetchState,
    AudioAsset,
    PersistedAssetEntry,
    AssetRequest,
    AssetCacheEventMap,
} from './types';
