/**
 * @fileoverview Pure helpers that turn parsed source values into a validated TimeTable.
 * @module modules/timetable/TimeTableValidator
 * @version 1.0.0
 */

import { DataQualityError } from '../../types/app-errors';
import { localTimeOnDay } from '../../utils/timing';
import { SCHEDULED_EVENT_KINDS, TIMETABLE_ERROR_MESSAGES } from './constants';
import type { ClockTime, ScheduledEventKind, TimeTable, TimeTableSourceType } from './types';

const CLOCK_PATTERN = /^\s*(\d{1,2})[:.](\d{2})\s*(am|pm)?/i;

/**
 * Parse `HH:MM`, `H.MM` or `h:mm am` (anything after the time is ignored,
 * so `"05:12 (+04)"` parses).
 * @returns Parsed time, or null when unreadable or out of range
 */
export function parseClockTime(value: string): ClockTime | null {
    const match = CLOCK_PATTERN.exec(value);
    if (!match) {
        return null;
    }
    let hours = Number(match[1]);
    const minutes = Number(match[2]);
    const meridiem = match[3]?.toLowerCase();

    if (meridiem !== undefined) {
        if (hours < 1 || hours > 12) return null;
        if (meridiem === 'am') {
            hours = hours === 12 ? 0 : hours;
        } else {
            hours = hours === 12 ? 12 : hours + 12;
        }
    }

    if (hours > 23 || minutes > 59) {
        return null;
    }
    return { hours, minutes };
}

/**
 * Build and validate a table from per-kind clock times on `day`.
 * @throws DataQualityError if a kind is missing or times are out of order
 */
export function assembleTimeTable(
    day: string,
    clockTimes: Partial<Record<ScheduledEventKind, ClockTime>>,
    meta: {
        source: TimeTableSourceType;
        method: string;
        hijriDate: string | null;
        fetchedAt: number;
    }
): TimeTable {
    const times: Partial<Record<ScheduledEventKind, number>> = {};
    for (const kind of SCHEDULED_EVENT_KINDS) {
        const clock = clockTimes[kind];
        if (clock === undefined) {
            throw new DataQualityError(`${TIMETABLE_ERROR_MESSAGES.MISSING_KIND}: ${kind}`, { day, kind });
        }
        times[kind] = localTimeOnDay(day, clock.hours, clock.minutes);
    }

    const table: TimeTable = {
        day,
        times: completeTimes(times, day),
        source: meta.source,
        method: meta.method,
        hijriDate: meta.hijriDate,
        fetchedAt: meta.fetchedAt,
    };
    validateTimeTable(table);
    return table;
}

/**
 * Check a table's invariants: every scheduled kind present as a finite
 * instant, and times non-decreasing in canonical order.
 * @throws DataQualityError on violation
 */
export function validateTimeTable(table: TimeTable): void {
    let previousKind: ScheduledEventKind | null = null;
    let previous = Number.NEGATIVE_INFINITY;

    for (const kind of SCHEDULED_EVENT_KINDS) {
        const instant = table.times[kind];
        if (typeof instant !== 'number' || !Number.isFinite(instant)) {
            throw new DataQualityError(`${TIMETABLE_ERROR_MESSAGES.INVALID_TIME}: ${kind}`, {
                day: table.day,
                kind,
            });
        }
        if (instant < previous) {
            throw new DataQualityError(TIMETABLE_ERROR_MESSAGES.OUT_OF_ORDER, {
                day: table.day,
                kind,
                previousKind,
            });
        }
        previous = instant;
        previousKind = kind;
    }
}

function completeTimes(
    times: Partial<Record<ScheduledEventKind, number>>,
    day: string
): Record<ScheduledEventKind, number> {
    const { Fajr, Sunrise, Dhuhr, Asr, Maghrib, Isha } = times;
    if (
        Fajr === undefined || Sunrise === undefined || Dhuhr === undefined ||
        Asr === undefined || Maghrib === undefined || Isha === undefined
    ) {
        throw new DataQualityError(TIMETABLE_ERROR_MESSAGES.MISSING_KIND, { day });
    }
    return { Fajr, Sunrise, Dhuhr, Asr, Maghrib, Isha };
}
