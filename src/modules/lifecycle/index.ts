/**
 * @fileoverview Public exports for the lifecycle module.
 * @module modules/lifecycle
 * @version 1.0.0
 */

export { StateManager } from './StateManager';
export type { IStateManager } from './interfaces';
export type { PersistentState, StateMigration } from './types';
export { STORAGE_CONFIG, LIFECYCLE_ERROR_MESSAGES } from './constants';
