/**
 * @fileoverview Public exports for the Event Scheduler module.
 * @module modules/scheduler
 * @version 1.0.0
 */

export { EventScheduler } from './EventScheduler';
export type { EventSchedulerConfig } from './EventScheduler';
export { PointInTimeTimer } from './PointInTimeTimer';
export {
    buildScheduleEntries,
    selectArmableEntries,
    findNextEntry,
    firedKey,
    assetForKind,
    isValidOffset,
} from './ScheduleCalculator';
export { mergeSettings } from './settings';
export {
    MAX_TIMER_SLICE_MS,
    REFRESH_INTERVAL_MS,
    PREEMPTION_TIMEOUT_MS,
    SESSION_MAX_DURATION_MS,
    OFFSET_MINUTES_LIMIT,
    SCHEDULER_ERROR_MESSAGES,
} from './constants';
export type { IEventScheduler } from './interfaces';
export type {
    Settings,
    SettingsPatch,
    AudioReferences,
    ScheduleEntry,
    PlaybackStatus,
    SessionStatus,
    PlaybackSession,
    TriggerOutcome,
    RefreshResult,
    StatusChange,
    SchedulerEventMap,
} from './types';
