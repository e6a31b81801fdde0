/**
 * @fileoverview Read-only projection of scheduler and asset cache state.
 * @module modules/status/StatusPublisher
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { IAssetCache } from '../assets/interfaces';
import type { IEventScheduler } from '../scheduler/interfaces';
import type { StatusChange } from '../scheduler/types';
import type { ScheduledEventKind } from '../timetable/types';
import type { StatusSnapshot } from './types';

/**
 * Status Publisher. Holds no state of its own; the countdown is computed on
 * every read.
 */
export class StatusPublisher {
    constructor(
        private readonly _scheduler: IEventScheduler,
        private readonly _assetCache: IAssetCache
    ) {}

    public getSnapshot(now: number = Date.now()): StatusSnapshot {
        const settings = this._scheduler.getSettings();
        const table = this._scheduler.getTimeTable();
        const entries = this._scheduler.getEntries();

        const times: Partial<Record<ScheduledEventKind, number>> = {};
        for (const entry of entries) {
            times[entry.kind] = entry.instant;
        }

        const next = this._scheduler.getNextEntry(now);
        return {
            status: this._scheduler.getStatus(),
            day: table?.day ?? null,
            nextEvent: next ? { kind: next.kind, instant: next.instant } : null,
            countdownSeconds: next ? Math.ceil((next.instant - now) / 1000) : null,
            times,
            hijriDate: table?.hijriDate ?? null,
            enabled: { ...settings.enabled },
            offsetMinutes: settings.offsetMinutes,
            activeSession: this._scheduler.getActiveSession(),
            assets: this._assetCache.snapshot(),
            lastError: this._scheduler.getLastError(),
            generatedAt: now,
        };
    }

    /**
     * Relay status transitions to push consumers.
     */
    public onChange(listener: (change: StatusChange) => void): IDisposable {
        return this._scheduler.on('statusChange', listener);
    }
}
