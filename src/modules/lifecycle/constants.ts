/**
 * @fileoverview Constants for the lifecycle module.
 * @module modules/lifecycle/constants
 * @version 1.0.0
 */

import type { StateMigration } from './types';

/**
 * State file configuration.
 */
export const STORAGE_CONFIG = {
    /** Current state schema version */
    STATE_VERSION: 1,
    /** Suffix of the file written before the atomic rename */
    TEMP_SUFFIX: '.tmp',
} as const;

export const LIFECYCLE_ERROR_MESSAGES = {
    STORAGE_CORRUPTED: 'State file is corrupted; starting from defaults',
} as const;

/**
 * State version migrations.
 * Each migration function upgrades state from version N to N+1; none exist
 * while the state file is at its first version.
 */
export const MIGRATIONS: Record<number, StateMigration> = {};
