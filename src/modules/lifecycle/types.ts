/**
 * @fileoverview Type definitions for the lifecycle module.
 * @module modules/lifecycle/types
 * @version 1.0.0
 */

import type { AssetId, PersistedAssetEntry } from '../assets/types';
import type { Settings } from '../scheduler/types';

/**
 * Contents of the state file.
 * Includes version for migrations.
 */
export interface PersistentState {
    /** Schema version for migrations */
    version: number;
    /** User settings; null until first saved, config file values apply */
    settings: Settings | null;
    /** Cached audio files by asset identifier */
    assets: Partial<Record<AssetId, PersistedAssetEntry>>;
    /** Last update timestamp */
    lastUpdated: number;
}

/**
 * Upgrades raw state from version N to N+1.
 */
export type StateMigration = (state: Record<string, unknown>) => Record<string, unknown>;
