/**
 * @fileoverview TimeTable provider that scrapes a published prayer-time page.
 * @module modules/timetable/PortalProvider
 * @version 1.0.0
 */

import { SourceUnavailableError, TimeTableParseError } from '../../types/app-errors';
import { fetchWithTimeout } from '../../utils/http';
import { parseDayKey } from '../../utils/timing';
import {
    DEFAULT_PORTAL_LABELS,
    SCHEDULED_EVENT_KINDS,
    TIMETABLE_CONSTANTS,
    TIMETABLE_ERROR_MESSAGES,
} from './constants';
import type { ITimeTableProvider } from './interfaces';
import { assembleTimeTable, parseClockTime } from './TimeTableValidator';
import { formatHijriDate } from './hijri';
import { EventKind, type ClockTime, type PortalSourceConfig, type ScheduledEventKind, type TimeTable } from './types';

/** Kinds that always fall in the afternoon or evening. */
const AFTERNOON_KINDS: ReadonlySet<ScheduledEventKind> = new Set([
    EventKind.Asr,
    EventKind.Maghrib,
    EventKind.Isha,
]);

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip tags and collapse whitespace so labels and times sit in plain text.
 */
export function htmlToText(html: string): string {
    return html
        .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
        .replace(/<[^>]+>/g, ' ')
        .replace(/&nbsp;/gi, ' ')
        .replace(/&amp;/gi, '&')
        .replace(/\s+/g, ' ');
}

/**
 * Pages often print a 12-hour clock without am/pm. Move afternoon kinds
 * (and an early-looking Dhuhr) into the afternoon.
 */
export function normalizeTwelveHourClock(kind: ScheduledEventKind, clock: ClockTime, hadMeridiem: boolean): ClockTime {
    if (hadMeridiem || clock.hours >= 12) {
        return clock;
    }
    if (AFTERNOON_KINDS.has(kind) || (kind === EventKind.Dhuhr && clock.hours < 10)) {
        return { hours: clock.hours + 12, minutes: clock.minutes };
    }
    return clock;
}

/**
 * Extract per-kind clock times from page text.
 * @throws TimeTableParseError when two kinds resolve to the same printed time,
 * as happens on pages that print every label before any time
 */
export function extractClockTimes(
    text: string,
    extraLabels: Partial<Record<ScheduledEventKind, string[]>> = {}
): Partial<Record<ScheduledEventKind, ClockTime>> {
    const result: Partial<Record<ScheduledEventKind, ClockTime>> = {};
    const claimed = new Map<number, ScheduledEventKind>();

    for (const kind of SCHEDULED_EVENT_KINDS) {
        const labels = [...(extraLabels[kind] ?? []), ...DEFAULT_PORTAL_LABELS[kind]];
        for (const label of labels) {
            const pattern = new RegExp(
                `\\b${escapeRegExp(label)}\\b[^0-9]{0,${TIMETABLE_CONSTANTS.PORTAL_LABEL_WINDOW}}?(\\d{1,2}[:.]\\d{2}(?:\\s*[ap]m)?)`,
                'i'
            );
            const match = pattern.exec(text);
            const raw = match?.[1];
            if (match === null || raw === undefined) {
                continue;
            }
            const clock = parseClockTime(raw);
            if (!clock) {
                continue;
            }

            const position = match.index + match[0].length - raw.length;
            const owner = claimed.get(position);
            if (owner !== undefined) {
                throw new TimeTableParseError(TIMETABLE_ERROR_MESSAGES.AMBIGUOUS_TIME, {
                    kinds: [owner, kind],
                    time: raw,
                });
            }
            claimed.set(position, kind);
            result[kind] = normalizeTwelveHourClock(kind, clock, /[ap]m/i.test(raw));
            break;
        }
    }
    return result;
}

/**
 * Scrapes a portal page that lists one day of times.
 * @implements {ITimeTableProvider}
 */
export class PortalProvider implements ITimeTableProvider {
    public readonly type = 'portal' as const;

    constructor(private readonly _config: PortalSourceConfig) {}

    public async fetch(day: string): Promise<TimeTable> {
        const url = this.buildUrl(day);
        let response: Response;
        try {
            response = await fetchWithTimeout(
                url,
                { method: 'GET', headers: { Accept: 'text/html' } },
                TIMETABLE_CONSTANTS.REQUEST_TIMEOUT_MS
            );
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'unknown error';
            throw new SourceUnavailableError(`Portal unreachable: ${reason}`, undefined, { day });
        }

        if (!response.ok) {
            throw new SourceUnavailableError(
                `Portal responded with status ${response.status}`,
                response.status,
                { day }
            );
        }

        const html = await response.text();
        const clockTimes = extractClockTimes(htmlToText(html), this._config.labels);
        if (Object.keys(clockTimes).length === 0) {
            throw new TimeTableParseError(TIMETABLE_ERROR_MESSAGES.INVALID_PAYLOAD, { day });
        }

        const table = assembleTimeTable(day, clockTimes, {
            source: 'portal',
            method: this._config.url,
            hijriDate: null,
            fetchedAt: Date.now(),
        });
        return { ...table, hijriDate: formatHijriDate(table.times.Dhuhr) };
    }

    /**
     * Substitute day placeholders in the configured URL.
     */
    public buildUrl(day: string): string {
        const { year, month, day: dayOfMonth } = parseDayKey(day);
        return this._config.url
            .replace(/\{date\}/g, day)
            .replace(/\{year\}/g, String(year))
            .replace(/\{month\}/g, String(month).padStart(2, '0'))
            .replace(/\{day\}/g, String(dayOfMonth).padStart(2, '0'));
    }
}
