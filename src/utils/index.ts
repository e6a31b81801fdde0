/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export { Mutex } from './Mutex';
export { redactSensitiveTokens } from './redact';
export { fetchWithTimeout, RequestTimeoutError } from './http';
export {
    MINUTE_MS,
    delay,
    settleWithin,
    toDayKey,
    parseDayKey,
    localTimeOnDay,
    nextLocalMidnight,
} from './timing';
export type { SettleResult } from './timing';
export type { IEventEmitter, IDisposable } from './interfaces';
