/**
 * @fileoverview Public exports for the TimeTable module.
 * @module modules/timetable
 * @version 1.0.0
 */

export { CalculationApiProvider } from './CalculationApiProvider';
export { PortalProvider } from './PortalProvider';
export { createTimeTableProvider } from './createTimeTableProvider';
export { assembleTimeTable, validateTimeTable, parseClockTime } from './TimeTableValidator';
export { formatHijriDate } from './hijri';

export type { ITimeTableProvider } from './interfaces';

export { EventKind } from './types';
export type {
    ScheduledEventKind,
    TimeTable,
    TimeTableSourceType,
    TimeTableSourceConfig,
    CalculationSourceConfig,
    PortalSourceConfig,
    ClockTime,
} from './types';

export {
    SCHEDULED_EVENT_KINDS,
    ALL_EVENT_KINDS,
    TIMETABLE_CONSTANTS,
    TIMETABLE_ERROR_MESSAGES,
} from './constants';
