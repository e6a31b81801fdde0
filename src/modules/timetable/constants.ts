/**
 * @fileoverview Constants for the TimeTable module.
 * @module modules/timetable/constants
 * @version 1.0.0
 */

import { EventKind, type ScheduledEventKind } from './types';

/** Scheduled kinds in canonical (chronological) order. */
export const SCHEDULED_EVENT_KINDS: readonly ScheduledEventKind[] = [
    EventKind.Fajr,
    EventKind.Sunrise,
    EventKind.Dhuhr,
    EventKind.Asr,
    EventKind.Maghrib,
    EventKind.Isha,
];

/** All kinds, `Test` last. */
export const ALL_EVENT_KINDS: readonly EventKind[] = [...SCHEDULED_EVENT_KINDS, EventKind.Test];

export const TIMETABLE_CONSTANTS = {
    /** Default calculation API base URL */
    CALCULATION_API_BASE_URL: 'https://api.aladhan.com/v1',

    /** Request timeout for either source (10 seconds) */
    REQUEST_TIMEOUT_MS: 10_000,

    /** Max characters between a label and its time on a portal page */
    PORTAL_LABEL_WINDOW: 160,

    /** Calendar used when a source supplies no Hijri date */
    HIJRI_LOCALE: 'en-u-ca-islamic-umalqura',
} as const;

/**
 * Labels searched on portal pages, per kind. Config labels are tried first.
 */
export const DEFAULT_PORTAL_LABELS: Readonly<Record<ScheduledEventKind, readonly string[]>> = {
    [EventKind.Fajr]: ['Fajr', 'Subuh'],
    [EventKind.Sunrise]: ['Sunrise', 'Shuruq', 'Shurooq', 'Syuruk'],
    [EventKind.Dhuhr]: ['Dhuhr', 'Zuhr', 'Zohr', 'Duhr'],
    [EventKind.Asr]: ['Asr'],
    [EventKind.Maghrib]: ['Maghrib'],
    [EventKind.Isha]: ['Isha'],
};

export const TIMETABLE_ERROR_MESSAGES = {
    MISSING_KIND: 'Time table is missing required kind',
    OUT_OF_ORDER: 'Time table times are not in canonical order',
    INVALID_TIME: 'Time table contains an invalid time',
    INVALID_PAYLOAD: 'Time table source returned an unreadable payload',
    AMBIGUOUS_TIME: 'Two kinds resolved to the same printed time',
} as const;
