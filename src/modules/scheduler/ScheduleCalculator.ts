/**
 * @fileoverview Pure schedule calculations.
 * Turns a TimeTable and settings into ScheduleEntries and decides which of
 * them may be armed.
 * @module modules/scheduler/ScheduleCalculator
 * @version 1.0.0
 */

import type { AssetRequest } from '../assets/types';
import { SCHEDULED_EVENT_KINDS } from '../timetable/constants';
import { EventKind } from '../timetable/types';
import type { TimeTable } from '../timetable/types';
import { MINUTE_MS } from '../../utils/timing';
import { OFFSET_MINUTES_LIMIT } from './constants';
import type { AudioReferences, ScheduleEntry, Settings } from './types';

/**
 * Build one entry per scheduled kind, in canonical order.
 * `instant = T[kind] + offsetMinutes`; the day stays the TimeTable's day even
 * when the offset crosses midnight.
 */
export function buildScheduleEntries(
    table: TimeTable,
    settings: Pick<Settings, 'enabled' | 'offsetMinutes'>
): ScheduleEntry[] {
    return SCHEDULED_EVENT_KINDS.map((kind) => ({
        kind,
        instant: table.times[kind] + settings.offsetMinutes * MINUTE_MS,
        enabled: settings.enabled[kind],
        offsetMinutes: settings.offsetMinutes,
        day: table.day,
    }));
}

/**
 * Key under which a firing is remembered, so a kind fires at most once per day.
 */
export function firedKey(entry: Pick<ScheduleEntry, 'day' | 'kind'>): string {
    return `${entry.day}:${entry.kind}`;
}

/**
 * Entries to arm: enabled, strictly after `now`, not yet fired.
 */
export function selectArmableEntries(
    entries: readonly ScheduleEntry[],
    now: number,
    fired: ReadonlySet<string>
): ScheduleEntry[] {
    return entries
        .filter((entry) => entry.enabled && entry.instant > now && !fired.has(firedKey(entry)))
        .sort((a, b) => a.instant - b.instant);
}

/**
 * Earliest enabled entry strictly after `now`, or null.
 */
export function findNextEntry(entries: readonly ScheduleEntry[], now: number): ScheduleEntry | null {
    let next: ScheduleEntry | null = null;
    for (const entry of entries) {
        if (entry.enabled && entry.instant > now && (next === null || entry.instant < next.instant)) {
            next = entry;
        }
    }
    return next;
}

/**
 * Asset played for a kind.
 */
export function assetForKind(kind: EventKind, audio: AudioReferences): AssetRequest {
    if (kind === EventKind.Fajr && audio.fajr) {
        return { id: 'fajr', sourceUrl: audio.fajr };
    }
    return { id: 'primary', sourceUrl: audio.primary };
}

export function isValidOffset(minutes: number): boolean {
    return Number.isInteger(minutes) && Math.abs(minutes) <= OFFSET_MINUTES_LIMIT;
}

