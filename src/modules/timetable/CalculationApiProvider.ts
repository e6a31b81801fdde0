/**
 * @fileoverview TimeTable provider backed by a prayer-time calculation API.
 * @module modules/timetable/CalculationApiProvider
 * @version 1.0.0
 */

import { z } from 'zod';
import { SourceUnavailableError, TimeTableParseError } from '../../types/app-errors';
import { fetchWithTimeout, RequestTimeoutError } from '../../utils/http';
import { parseDayKey } from '../../utils/timing';
import { SCHEDULED_EVENT_KINDS, TIMETABLE_CONSTANTS, TIMETABLE_ERROR_MESSAGES } from './constants';
import type { ITimeTableProvider } from './interfaces';
import { parseClockTime, assembleTimeTable } from './TimeTableValidator';
import { formatHijriDate } from './hijri';
import type { CalculationSourceConfig, ClockTime, ScheduledEventKind, TimeTable } from './types';

const TimingsResponseSchema = z.object({
    code: z.number(),
    data: z.object({
        timings: z.record(z.string()),
        date: z
            .object({
                hijri: z
                    .object({
                        day: z.string(),
                        month: z.object({ en: z.string() }),
                        year: z.string(),
                    })
                    .optional(),
            })
            .optional(),
        meta: z
            .object({
                method: z.object({ name: z.string() }).partial().optional(),
            })
            .optional(),
    }),
});

type TimingsResponse = z.infer<typeof TimingsResponseSchema>;

/**
 * Fetches computed prayer times for a coordinate and calculation method.
 *
 * Endpoint: `GET {baseUrl}/timings/{DD-MM-YYYY}?latitude=&longitude=&method=[&school=]`
 *
 * @implements {ITimeTableProvider}
 */
export class CalculationApiProvider implements ITimeTableProvider {
    public readonly type = 'calculation' as const;

    constructor(private readonly _config: CalculationSourceConfig) {}

    public async fetch(day: string): Promise<TimeTable> {
        const url = this._buildUrl(day);
        let response: Response;
        try {
            response = await fetchWithTimeout(
                url,
                { method: 'GET', headers: { Accept: 'application/json' } },
                TIMETABLE_CONSTANTS.REQUEST_TIMEOUT_MS
            );
        } catch (error) {
            const reason = error instanceof RequestTimeoutError
                ? error.message
                : error instanceof Error ? error.message : 'unknown error';
            throw new SourceUnavailableError(`Calculation API unreachable: ${reason}`, undefined, { day });
        }

        if (!response.ok) {
            throw new SourceUnavailableError(
                `Calculation API responded with status ${response.status}`,
                response.status,
                { day }
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new TimeTableParseError(TIMETABLE_ERROR_MESSAGES.INVALID_PAYLOAD, { day });
        }

        const parsed = TimingsResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new TimeTableParseError(TIMETABLE_ERROR_MESSAGES.INVALID_PAYLOAD, {
                day,
                issues: parsed.error.issues.map((issue) => issue.path.join('.')),
            });
        }

        return this._toTimeTable(day, parsed.data);
    }

    private _toTimeTable(day: string, payload: TimingsResponse): TimeTable {
        const clockTimes: Partial<Record<ScheduledEventKind, ClockTime>> = {};
        for (const kind of SCHEDULED_EVENT_KINDS) {
            const raw = payload.data.timings[kind];
            if (raw === undefined) {
                continue;
            }
            const clock = parseClockTime(raw);
            if (!clock) {
                throw new TimeTableParseError(`${TIMETABLE_ERROR_MESSAGES.INVALID_TIME}: ${kind}=${raw}`, { day });
            }
            clockTimes[kind] = clock;
        }

        const fetchedAt = Date.now();
        const hijri = payload.data.date?.hijri;
        const table = assembleTimeTable(day, clockTimes, {
            source: 'calculation',
            method: payload.data.meta?.method?.name ?? `method ${this._config.method}`,
            hijriDate: hijri ? `${hijri.day} ${hijri.month.en} ${hijri.year} AH` : null,
            fetchedAt,
        });
        if (table.hijriDate !== null) {
            return table;
        }
        return { ...table, hijriDate: formatHijriDate(table.times.Dhuhr) };
    }

    private _buildUrl(day: string): string {
        const { year, month, day: dayOfMonth } = parseDayKey(day);
        const datePath = `${String(dayOfMonth).padStart(2, '0')}-${String(month).padStart(2, '0')}-${year}`;
        const baseUrl = (this._config.baseUrl ?? TIMETABLE_CONSTANTS.CALCULATION_API_BASE_URL).replace(/\/+$/, '');

        const params = new URLSearchParams({
            latitude: String(this._config.latitude),
            longitude: String(this._config.longitude),
            method: String(this._config.method),
        });
        if (this._config.school !== undefined) {
            params.set('school', String(this._config.school));
        }
        return `${baseUrl}/timings/${datePath}?${params.toString()}`;
    }
}
