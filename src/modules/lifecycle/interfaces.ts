/**
 * @fileoverview Interface definitions for the lifecycle module.
 * @module modules/lifecycle/interfaces
 * @version 1.0.0
 */

import type { PersistentState } from './types';

/**
 * State Manager Interface.
 * Handles state file persistence with versioning and migrations.
 */
export interface IStateManager {
    /**
     * Write state atomically. Version and timestamp are stamped on save.
     */
    save(state: PersistentState): Promise<void>;

    /**
     * Load state from disk.
     * Applies migrations if needed.
     * @returns Loaded state, or null if absent or unreadable
     */
    load(): Promise<PersistentState | null>;

    /**
     * Remove the state file.
     */
    clear(): Promise<void>;

    createDefaultState(): PersistentState;
}
