/**
 * @fileoverview Type definitions for the Status Publisher module.
 * @module modules/status/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';
import type { AudioAsset } from '../assets/types';
import type { PlaybackSession, PlaybackStatus } from '../scheduler/types';
import type { ScheduledEventKind } from '../timetable/types';

export interface NextEvent {
    kind: ScheduledEventKind;
    instant: number;
}

/**
 * Everything an observer can read at one instant.
 */
export interface StatusSnapshot {
    status: PlaybackStatus;
    /** Day key of the loaded table, or null before the first refresh */
    day: string | null;
    nextEvent: NextEvent | null;
    /** Whole seconds until `nextEvent`, rounded up */
    countdownSeconds: number | null;
    /** Offset-applied instant per kind */
    times: Partial<Record<ScheduledEventKind, number>>;
    hijriDate: string | null;
    enabled: Record<ScheduledEventKind, boolean>;
    offsetMinutes: number;
    activeSession: PlaybackSession | null;
    assets: AudioAsset[];
    lastError: AppError | null;
    generatedAt: number;
}
