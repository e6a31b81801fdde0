/**
 * @fileoverview Interface definitions for the TimeTable module.
 * @module modules/timetable/interfaces
 * @version 1.0.0
 */

import type { TimeTable, TimeTableSourceType } from './types';

/**
 * Source of a day's event times.
 *
 * Providers are built once from their source configuration; the scheduler
 * only ever sees this contract. No retries happen inside a provider.
 */
export interface ITimeTableProvider {
    /** Which variant this is (for logs and status) */
    readonly type: TimeTableSourceType;

    /**
     * Fetch the table for a local calendar day.
     * @param day - Day key `YYYY-MM-DD`
     * @throws SourceUnavailableError when the source cannot be reached
     * @throws TimeTableParseError when the payload is unreadable
     * @throws DataQualityError when kinds are missing or out of order
     */
    fetch(day: string): Promise<TimeTable>;
}
