/**
 * @fileoverview Interface definitions for the Event Scheduler module.
 * @module modules/scheduler/interfaces
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';
import type { IDisposable } from '../../utils/interfaces';
import type { AssetId, AssetRequest } from '../assets/types';
import type { EventKind, ScheduledEventKind, TimeTable } from '../timetable/types';
import type {
    PlaybackSession,
    PlaybackStatus,
    RefreshResult,
    ScheduleEntry,
    SchedulerEventMap,
    Settings,
    SettingsPatch,
    TriggerOutcome,
} from './types';

/**
 * Event Scheduler Interface.
 * Single scheduling authority of the process: owns the armed set, the active
 * session and the playback status.
 */
export interface IEventScheduler {
    // ========================================
    // Lifecycle
    // ========================================

    /**
     * Arm the periodic and midnight refresh timers, then refresh once.
     */
    start(): Promise<RefreshResult>;

    /**
     * Cancel every timer, stop the active session (best effort), go Idle.
     */
    shutdown(): Promise<void>;

    // ========================================
    // Operations
    // ========================================

    /**
     * Fetch the table for the day of `now` and re-arm. On failure the
     * previous armed set is kept and the error is reported. Once the day's
     * last entry has passed, the next day's table is loaded for
     * {@link getNextEntry} but armed only by the midnight refresh.
     */
    refresh(now?: number): Promise<RefreshResult>;

    /**
     * Play `kind` now. Preempts the active session; the latest request wins.
     * Never rejects: failures are reported through `error` and the outcome.
     */
    trigger(kind: EventKind, now?: number): Promise<TriggerOutcome>;

    /**
     * Stop the active session, if any, and supersede waiting triggers.
     * Idempotent.
     */
    stop(): Promise<void>;

    /**
     * Persist a settings change, then re-arm from the current table
     * (refetching only when the source changed).
     * @throws ConfigError for an invalid patch
     */
    updateSettings(patch: SettingsPatch): Promise<Settings>;
    setEnabled(kind: ScheduledEventKind, enabled: boolean): Promise<Settings>;
    setOffsetMinutes(minutes: number): Promise<Settings>;

    /**
     * Warm the asset cache, showing Downloading while a fetch runs.
     * @returns Identifiers that ended up ready
     */
    prefetch(requests: AssetRequest[]): Promise<AssetId[]>;

    // ========================================
    // State
    // ========================================

    getStatus(): PlaybackStatus;
    getSettings(): Settings;
    getTimeTable(): TimeTable | null;
    /** Every entry of the current table, enabled or not */
    getEntries(): ScheduleEntry[];
    /** Currently armed entries, in instant order */
    getArmedEntries(): ScheduleEntry[];
    /** Earliest enabled entry after `now`, looking into the next day's table once loaded */
    getNextEntry(now: number): ScheduleEntry | null;
    getActiveSession(): PlaybackSession | null;
    getLastError(): AppError | null;
    /** When the midnight refresh will run, or null when not started */
    getNextRefreshAt(): number | null;

    on<K extends keyof SchedulerEventMap>(
        event: K,
        handler: (payload: SchedulerEventMap[K]) => void
    ): IDisposable;
}
