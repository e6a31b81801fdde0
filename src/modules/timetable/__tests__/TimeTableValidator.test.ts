/**
 * @fileoverview Unit tests for TimeTable parsing and validation helpers.
 * @module modules/timetable/__tests__/TimeTableValidator.test
 */

import { parseClockTime, assembleTimeTable, validateTimeTable } from '../TimeTableValidator';
import { EventKind, type TimeTable } from '../types';
import { DataQualityError } from '../../../types/app-errors';

const META = { source: 'calculation' as const, method: 'test', hijriDate: null, fetchedAt: 0 };

const CLOCKS = {
    [EventKind.Fajr]: { hours: 5, minutes: 0 },
    [EventKind.Sunrise]: { hours: 6, minutes: 20 },
    [EventKind.Dhuhr]: { hours: 12, minutes: 5 },
    [EventKind.Asr]: { hours: 15, minutes: 30 },
    [EventKind.Maghrib]: { hours: 18, minutes: 10 },
    [EventKind.Isha]: { hours: 19, minutes: 40 },
};

describe('parseClockTime', () => {
    it.each([
        ['05:12', { hours: 5, minutes: 12 }],
        ['5.07', { hours: 5, minutes: 7 }],
        ['19:40 (+04)', { hours: 19, minutes: 40 }],
        ['1:05 pm', { hours: 13, minutes: 5 }],
        ['12:30 AM', { hours: 0, minutes: 30 }],
        ['12:10 pm', { hours: 12, minutes: 10 }],
    ])('parses %s', (input, expected) => {
        expect(parseClockTime(input)).toEqual(expected);
    });

    it.each(['', 'noon', '24:00', '10:75', '13:00 pm'])('rejects %p', (input) => {
        expect(parseClockTime(input)).toBeNull();
    });
});

describe('assembleTimeTable', () => {
    it('should convert clock times to local instants on the given day', () => {
        const table = assembleTimeTable('2026-01-15', CLOCKS, META);

        expect(table.day).toBe('2026-01-15');
        expect(table.times.Fajr).toBe(new Date(2026, 0, 15, 5, 0).getTime());
        expect(table.times.Isha).toBe(new Date(2026, 0, 15, 19, 40).getTime());
        expect(table.source).toBe('calculation');
    });

    it('should reject a table with a missing kind', () => {
        const { [EventKind.Asr]: _omitted, ...partial } = CLOCKS;

        expect(() => assembleTimeTable('2026-01-15', partial, META)).toThrow(DataQualityError);
        expect(() => assembleTimeTable('2026-01-15', partial, META)).toThrow(/Asr/);
    });

    it('should reject times out of canonical order', () => {
        const swapped = { ...CLOCKS, [EventKind.Maghrib]: { hours: 15, minutes: 0 } };

        expect(() => assembleTimeTable('2026-01-15', swapped, META)).toThrow(DataQualityError);
    });

    it('should accept equal adjacent times', () => {
        const equal = { ...CLOCKS, [EventKind.Asr]: { hours: 12, minutes: 5 } };

        expect(() => assembleTimeTable('2026-01-15', equal, META)).not.toThrow();
    });
});

describe('validateTimeTable', () => {
    it('should reject a non-finite instant', () => {
        const table = assembleTimeTable('2026-01-15', CLOCKS, META);
        const broken: TimeTable = { ...table, times: { ...table.times, Dhuhr: Number.NaN } };

        expect(() => validateTimeTable(broken)).toThrow(DataQualityError);
    });
});
