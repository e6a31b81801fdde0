/**
 * @fileoverview Type definitions for the Event Scheduler module.
 * @module modules/scheduler/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';
import type { AssetId } from '../assets/types';
import type { PlaybackBackendConfig, PlaybackBackendType } from '../playback/types';
import type { EventKind, ScheduledEventKind, TimeTable, TimeTableSourceConfig } from '../timetable/types';

// ============================================
// Settings
// ============================================

/**
 * Media references per asset identifier. Fajr plays `fajr` when set,
 * every other kind plays `primary`.
 */
export interface AudioReferences {
    primary: string;
    fajr: string | null;
}

/**
 * User settings. Persisted; survive restarts.
 */
export interface Settings {
    enabled: Record<ScheduledEventKind, boolean>;
    /** Minutes added to every scheduled instant (negative plays early) */
    offsetMinutes: number;
    source: TimeTableSourceConfig;
    backend: PlaybackBackendConfig;
    audio: AudioReferences;
}

export interface SettingsPatch {
    enabled?: Partial<Record<ScheduledEventKind, boolean>>;
    offsetMinutes?: number;
    source?: TimeTableSourceConfig;
    backend?: PlaybackBackendConfig;
    audio?: Partial<AudioReferences>;
}

// ============================================
// Schedule
// ============================================

/**
 * One kind's slot for a day, after the enabled flag and offset are applied.
 */
export interface ScheduleEntry {
    kind: ScheduledEventKind;
    /** Offset-applied instant (Unix ms) */
    instant: number;
    enabled: boolean;
    offsetMinutes: number;
    /** Day key of the TimeTable the entry came from */
    day: string;
}

// ============================================
// Playback
// ============================================

export type PlaybackStatus = 'idle' | 'downloading' | 'playing';

export type SessionStatus = 'playing' | 'completed' | 'stopped' | 'preempted';

export interface PlaybackSession {
    id: number;
    kind: EventKind;
    assetId: AssetId;
    backend: PlaybackBackendType;
    target: string;
    status: SessionStatus;
    startedAt: number;
    endedAt: number | null;
}

/**
 * How a trigger request ended.
 * - `started`: a session is playing
 * - `superseded`: a later request (trigger or stop) took over
 * - `failed`: fetch or start failed; the error was reported
 */
export type TriggerOutcome = 'started' | 'superseded' | 'failed';

export interface RefreshResult {
    ok: boolean;
    day: string;
    /** Entries armed by this refresh (unchanged set when `ok` is false) */
    armed: ScheduleEntry[];
}

// ============================================
// Events
// ============================================

export interface StatusChange {
    from: PlaybackStatus;
    to: PlaybackStatus;
}

/**
 * Event Scheduler event map.
 */
export interface SchedulerEventMap extends Record<string, unknown> {
    statusChange: StatusChange;
    /** Armed set after every re-arm, in instant order */
    armed: ScheduleEntry[];
    fired: ScheduleEntry;
    sessionStart: PlaybackSession;
    sessionEnd: PlaybackSession;
    refreshed: TimeTable;
    error: AppError;
}
