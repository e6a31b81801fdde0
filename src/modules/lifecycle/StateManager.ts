/**
 * @fileoverview State Manager for state file persistence with versioning.
 * @module modules/lifecycle/StateManager
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SettingsSchema } from '../../config/schema';
import { AppErrorCode, summarizeErrorForLog } from '../../types/app-errors';
import { Mutex } from '../../utils/Mutex';
import { ASSET_IDS } from '../assets/constants';
import type { AssetId, PersistedAssetEntry } from '../assets/types';
import type { Settings } from '../scheduler/types';
import { IStateManager } from './interfaces';
import { PersistentState } from './types';
import { LIFECYCLE_ERROR_MESSAGES, MIGRATIONS, STORAGE_CONFIG } from './constants';

/**
 * Manages application state persistence to a JSON file.
 * Handles versioning, migrations and repair of partially valid files.
 */
export class StateManager implements IStateManager {
    private readonly _filePath: string;
    private readonly _currentVersion: number;
    private readonly _writeLock = new Mutex();

    /**
     * @param filePath - Absolute path of the state file
     */
    constructor(filePath: string) {
        this._filePath = filePath;
        this._currentVersion = STORAGE_CONFIG.STATE_VERSION;
    }

    /**
     * Save state. Writes a temp file beside the target, then renames it
     * over the target so readers never observe a partial file.
     */
    public async save(state: PersistentState): Promise<void> {
        const stateToSave: PersistentState = {
            ...state,
            version: this._currentVersion,
            lastUpdated: Date.now(),
        };
        const serialized = JSON.stringify(stateToSave, null, 2);

        await this._writeLock.runExclusive(async () => {
            const tempPath = this._filePath + STORAGE_CONFIG.TEMP_SUFFIX;
            await fs.mkdir(path.dirname(this._filePath), { recursive: true });
            await fs.writeFile(tempPath, serialized, 'utf8');
            await fs.rename(tempPath, this._filePath);
        });
    }

    /**
     * Load state from disk and apply migrations if needed.
     * @returns Loaded state, or null if absent or invalid
     */
    public async load(): Promise<PersistentState | null> {
        let serialized: string;
        try {
            serialized = await fs.readFile(this._filePath, 'utf8');
        } catch (error) {
            if (this._isNotFound(error)) {
                return null;
            }
            throw error;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(serialized);
        } catch (error) {
            this._warnCorrupted(summarizeErrorForLog(error));
            return null;
        }

        if (!this._isMinimalState(parsed)) {
            this._warnCorrupted({ reason: 'missing version' });
            return null;
        }

        const migrated = this._migrateState(parsed);
        if (migrated === null) {
            this._warnCorrupted({ reason: `no migration from version ${String(parsed['version'])}` });
            return null;
        }

        return this._repairState(migrated);
    }

    /**
     * Remove the state file. Missing files are ignored.
     */
    public async clear(): Promise<void> {
        await this._writeLock.runExclusive(() => fs.rm(this._filePath, { force: true }));
    }

    public createDefaultState(): PersistentState {
        return {
            version: this._currentVersion,
            settings: null,
            assets: {},
            lastUpdated: Date.now(),
        };
    }

    /**
     * Apply version migrations to state.
     * @returns Migrated state, or null if a migration step is missing
     */
    private _migrateState(state: Record<string, unknown>): Record<string, unknown> | null {
        const version = state['version'];
        if (typeof version !== 'number') {
            return null;
        }

        // Newer files are read as-is
        if (version > this._currentVersion) {
            return state;
        }

        let currentState = state;
        let currentVersion = version;

        while (currentVersion < this._currentVersion) {
            const migration = MIGRATIONS[currentVersion];
            if (!migration) {
                return null;
            }

            currentState = migration(currentState);
            currentVersion = currentVersion + 1;
        }

        return currentState;
    }

    private _isMinimalState(data: unknown): data is Record<string, unknown> {
        if (!this._isRecord(data)) {
            return false;
        }
        return typeof data['version'] === 'number';
    }

    /**
     * Repair state shape after migration. Invalid settings fall back to
     * null, invalid asset entries are dropped.
     */
    private _repairState(state: Record<string, unknown>): PersistentState {
        const version =
            typeof state['version'] === 'number' ? state['version'] : this._currentVersion;
        const lastUpdated =
            typeof state['lastUpdated'] === 'number' ? state['lastUpdated'] : Date.now();

        return {
            version,
            settings: this._parseSettings(state['settings']),
            assets: this._filterValidAssets(state['assets']),
            lastUpdated,
        };
    }

    private _parseSettings(value: unknown): Settings | null {
        if (value === null || value === undefined) {
            return null;
        }
        const parsed = SettingsSchema.safeParse(value);
        if (!parsed.success) {
            console.warn('[StateManager] Discarding invalid persisted settings:', parsed.error.issues.length, 'issue(s)');
            return null;
        }
        return parsed.data;
    }

    private _filterValidAssets(value: unknown): Partial<Record<AssetId, PersistedAssetEntry>> {
        const assets: Partial<Record<AssetId, PersistedAssetEntry>> = {};
        if (!this._isRecord(value)) {
            return assets;
        }
        for (const id of ASSET_IDS) {
            const entry = value[id];
            if (this._isValidAssetEntry(entry)) {
                assets[id] = { sourceUrl: entry.sourceUrl, path: entry.path };
            }
        }
        return assets;
    }

    private _isValidAssetEntry(value: unknown): value is PersistedAssetEntry {
        if (!this._isRecord(value)) {
            return false;
        }
        const sourceUrl = value['sourceUrl'];
        const filePath = value['path'];
        return (
            typeof sourceUrl === 'string' &&
            sourceUrl.length > 0 &&
            typeof filePath === 'string' &&
            filePath.length > 0
        );
    }

    private _isRecord(value: unknown): value is Record<string, unknown> {
        return typeof value === 'object' && value !== null && !Array.isArray(value);
    }

    private _isNotFound(error: unknown): boolean {
        return this._isRecord(error) && error['code'] === 'ENOENT';
    }

    private _warnCorrupted(context: Record<string, unknown>): void {
        console.warn(`[StateManager] ${LIFECYCLE_ERROR_MESSAGES.STORAGE_CORRUPTED}`, {
            code: AppErrorCode.STORAGE_CORRUPTED,
            path: this._filePath,
            ...context,
        });
    }
}
