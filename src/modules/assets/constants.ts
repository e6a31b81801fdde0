/**
 * @fileoverview Constants for the Asset Cache module.
 * @module modules/assets/constants
 * @version 1.0.0
 */

import type { AssetId } from './types';

export const ASSET_IDS: readonly AssetId[] = ['primary', 'fajr'];

export const ASSET_CONSTANTS = {
    /** Suffix for in-progress writes; never reported ready */
    PARTIAL_SUFFIX: '.part',

    /** Extension used when the reference does not reveal one */
    DEFAULT_EXTENSION: '.mp3',

    /** Direct download timeout (2 minutes) */
    DOWNLOAD_TIMEOUT_MS: 120_000,

    /** External tool timeout (5 minutes) */
    TOOL_TIMEOUT_MS: 300_000,

    /** Extractor binary for video-hosting references */
    DEFAULT_TOOL_BINARY: 'yt-dlp',
} as const;

/** Extensions treated as directly playable files. */
export const AUDIO_EXTENSIONS: readonly string[] = ['.mp3', '.m4a', '.aac', '.ogg', '.opus', '.wav', '.flac'];

export const ASSET_ERROR_MESSAGES = {
    EMPTY_FILE: 'Fetched file is empty',
    TRUNCATED: 'Download ended before the announced length',
    UNSUPPORTED_REFERENCE: 'Unsupported media reference',
    TOOL_NO_OUTPUT: 'Extractor finished without producing audio',
    DISPOSED: 'Asset cache is shutting down',
} as const;
