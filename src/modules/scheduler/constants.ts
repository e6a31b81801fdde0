/**
 * @fileoverview Constants for the Event Scheduler module.
 * @module modules/scheduler/constants
 * @version 1.0.0
 */

// ============================================
// Timer Constants
// ============================================

/** Longest single timer wait; the wall clock is re-read after each slice */
export const MAX_TIMER_SLICE_MS = 60_000;

/** Periodic refresh interval (6 hours) */
export const REFRESH_INTERVAL_MS = 6 * 60 * 60 * 1000;

// ============================================
// Session Constants
// ============================================

/** Upper bound on waiting for the previous session to stop */
export const PREEMPTION_TIMEOUT_MS = 10_000;

/** Sessions without an end signal are finished after this long */
export const SESSION_MAX_DURATION_MS = 5 * 60 * 1000;

// ============================================
// Settings Limits
// ============================================

export const OFFSET_MINUTES_LIMIT = 180;

// ============================================
// Error Messages
// ============================================

export const SCHEDULER_ERROR_MESSAGES = {
    INVALID_OFFSET: `Offset must be an integer between -${OFFSET_MINUTES_LIMIT} and ${OFFSET_MINUTES_LIMIT}`,
} as const;
