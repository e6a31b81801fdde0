/**
 * @fileoverview Settings patch application.
 * @module modules/scheduler/settings
 * @version 1.0.0
 */

import { ConfigError } from '../../types/app-errors';
import { SCHEDULER_ERROR_MESSAGES } from './constants';
import { isValidOffset } from './ScheduleCalculator';
import type { Settings, SettingsPatch } from './types';

/**
 * Apply `patch` on top of `current` without mutating either.
 * @throws ConfigError when the result is invalid
 */
export function mergeSettings(current: Settings, patch: SettingsPatch): Settings {
    const next: Settings = {
        enabled: { ...current.enabled, ...patch.enabled },
        offsetMinutes: patch.offsetMinutes ?? current.offsetMinutes,
        source: patch.source ?? current.source,
        backend: patch.backend ?? current.backend,
        audio: { ...current.audio, ...patch.audio },
    };

    if (!isValidOffset(next.offsetMinutes)) {
        throw new ConfigError(SCHEDULER_ERROR_MESSAGES.INVALID_OFFSET, { offsetMinutes: next.offsetMinutes });
    }
    if (next.audio.primary.trim() === '') {
        throw new ConfigError('Primary audio reference must not be empty');
    }
    return next;
}
