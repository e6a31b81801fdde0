/**
 * @fileoverview Hijri calendar formatting fallback.
 * @module modules/timetable/hijri
 */

import { TIMETABLE_CONSTANTS } from './constants';

/**
 * Format the Hijri date of an instant with the platform's Umm al-Qura
 * calendar. Used when a source does not report one.
 * @returns Formatted date, or null when the runtime lacks the calendar
 */
export function formatHijriDate(timeMs: number): string | null {
    try {
        const formatter = new Intl.DateTimeFormat(TIMETABLE_CONSTANTS.HIJRI_LOCALE, {
            day: 'numeric',
            month: 'long',
            year: 'numeric',
        });
        return formatter.format(new Date(timeMs));
    } catch {
        return null;
    }
}
