/**
 * @fileoverview Promise timing helpers and local calendar-day arithmetic.
 * @module utils/timing
 * @version 1.0.0
 */

/** Milliseconds in one minute. */
export const MINUTE_MS = 60_000;

/**
 * Resolve after `ms` milliseconds.
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Outcome of {@link settleWithin}.
 */
export type SettleResult<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; reason: unknown }
    | { status: 'timeout' };

/**
 * Wait for `promise` for at most `timeoutMs`. Never rejects; the caller decides
 * what a timeout means. The timer is always cleared.
 */
export async function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<SettleResult<T>> {
    let timeoutId: ReturnType<typeof setTimeout> | null = null;
    const timeout = new Promise<SettleResult<T>>((resolve) => {
        timeoutId = setTimeout(() => resolve({ status: 'timeout' }), timeoutMs);
    });
    const settled = promise.then(
        (value): SettleResult<T> => ({ status: 'fulfilled', value }),
        (reason: unknown): SettleResult<T> => ({ status: 'rejected', reason })
    );
    try {
        return await Promise.race([settled, timeout]);
    } finally {
        if (timeoutId !== null) {
            clearTimeout(timeoutId);
        }
    }
}

/**
 * Local calendar day key (`YYYY-MM-DD`) of a Unix ms timestamp.
 */
export function toDayKey(timeMs: number): string {
    const d = new Date(timeMs);
    const month = String(d.getMonth() + 1).padStart(2, '0');
    const day = String(d.getDate()).padStart(2, '0');
    return `${d.getFullYear()}-${month}-${day}`;
}

/**
 * Parse a `YYYY-MM-DD` key into its numeric parts.
 * @throws Error if the key is malformed
 */
export function parseDayKey(dayKey: string): { year: number; month: number; day: number } {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dayKey);
    if (!match) {
        throw new Error(`Invalid day key: ${dayKey}`);
    }
    return {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
    };
}

/**
 * Unix ms of a local wall-clock time on a given day.
 * DST gaps and overlaps are resolved by the platform's time zone rules.
 */
export function localTimeOnDay(dayKey: string, hours: number, minutes: number): number {
    const { year, month, day } = parseDayKey(dayKey);
    return new Date(year, month - 1, day, hours, minutes, 0, 0).getTime();
}

/**
 * Unix ms of the next local midnight strictly after `timeMs`.
 */
export function nextLocalMidnight(timeMs: number): number {
    const d = new Date(timeMs);
    return new Date(d.getFullYear(), d.getMonth(), d.getDate() + 1, 0, 0, 0, 0).getTime();
}
