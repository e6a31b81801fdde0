/**
 * @fileoverview Type definitions for the TimeTable module.
 * @module modules/timetable/types
 * @version 1.0.0
 */

/**
 * Named daily occurrences that can trigger playback.
 * `Test` is synthetic: usable on demand, never scheduled.
 */
export enum EventKind {
    Fajr = 'Fajr',
    Sunrise = 'Sunrise',
    Dhuhr = 'Dhuhr',
    Asr = 'Asr',
    Maghrib = 'Maghrib',
    Isha = 'Isha',
    Test = 'Test',
}

/** Every kind except the synthetic `Test`. */
export type ScheduledEventKind = Exclude<EventKind, EventKind.Test>;

/** Which concrete source produced a table. */
export type TimeTableSourceType = 'calculation' | 'portal';

/**
 * One day's event instants from a single source.
 * Times are non-decreasing in canonical {@link EventKind} order.
 */
export interface TimeTable {
    /** Local calendar day (`YYYY-MM-DD`) the table applies to */
    readonly day: string;
    /** Unix ms per scheduled kind */
    readonly times: Readonly<Record<ScheduledEventKind, number>>;
    readonly source: TimeTableSourceType;
    /** Calculation method name or portal URL */
    readonly method: string;
    /** Hijri calendar date, e.g. `"14 Rajab 1448 AH"` */
    readonly hijriDate: string | null;
    readonly fetchedAt: number;
}

/**
 * Calculation API source (prayer-time computation service).
 */
export interface CalculationSourceConfig {
    type: 'calculation';
    latitude: number;
    longitude: number;
    /** Calculation method id understood by the API */
    method: number;
    /** Juristic school for Asr: 0 = Shafi'i, 1 = Hanafi */
    school?: 0 | 1;
    /** Override API base URL */
    baseUrl?: string;
}

/**
 * Portal source: an HTML page that lists the day's times.
 */
export interface PortalSourceConfig {
    type: 'portal';
    /**
     * Page URL. `{date}`, `{year}`, `{month}` and `{day}` are replaced with
     * the requested day's values.
     */
    url: string;
    /** Extra labels to look for, per kind (matched case-insensitively) */
    labels?: Partial<Record<ScheduledEventKind, string[]>>;
}

/** Tagged union of the supported time table sources. */
export type TimeTableSourceConfig = CalculationSourceConfig | PortalSourceConfig;

/** Wall-clock time of day as parsed from a source. */
export interface ClockTime {
    hours: number;
    minutes: number;
}
