/**
 * @fileoverview Event Scheduler implementation.
 * Arms one wall-clock timer per upcoming event, runs playback when a timer
 * fires and arbitrates between overlapping trigger and stop requests.
 * @module modules/scheduler/EventScheduler
 * @version 1.0.0
 */

import { isDeepStrictEqual } from 'node:util';
import { PreemptionTimeoutError, toAppError } from '../../types/app-errors';
import type { AppError } from '../../types/app-errors';
import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable } from '../../utils/interfaces';
import { Mutex } from '../../utils/Mutex';
import { nextLocalMidnight, settleWithin, toDayKey } from '../../utils/timing';
import type { IAssetCache } from '../assets/interfaces';
import type { AssetId, AssetRequest } from '../assets/types';
import type { IPlaybackDriver } from '../playback/interfaces';
import type { PlaybackBackendConfig } from '../playback/types';
import { createTimeTableProvider } from '../timetable/createTimeTableProvider';
import type { ITimeTableProvider } from '../timetable/interfaces';
import type { EventKind, ScheduledEventKind, TimeTable, TimeTableSourceConfig } from '../timetable/types';
import {
    MAX_TIMER_SLICE_MS,
    PREEMPTION_TIMEOUT_MS,
    REFRESH_INTERVAL_MS,
    SESSION_MAX_DURATION_MS,
} from './constants';
import type { IEventScheduler } from './interfaces';
import { PointInTimeTimer } from './PointInTimeTimer';
import {
    assetForKind,
    buildScheduleEntries,
    findNextEntry,
    firedKey,
    selectArmableEntries,
} from './ScheduleCalculator';
import { mergeSettings } from './settings';
import type {
    PlaybackSession,
    PlaybackStatus,
    RefreshResult,
    ScheduleEntry,
    SchedulerEventMap,
    SessionStatus,
    Settings,
    SettingsPatch,
    TriggerOutcome,
} from './types';

export interface EventSchedulerConfig {
    settings: Settings;
    assetCache: IAssetCache;
    /** Builds the driver for a backend; called again when the backend changes */
    createDriver: (backend: PlaybackBackendConfig) => IPlaybackDriver;
    createProvider?: (source: TimeTableSourceConfig) => ITimeTableProvider;
    /** Called with the new settings before they take effect */
    persistSettings?: (settings: Settings) => Promise<void>;
    preemptionTimeoutMs?: number;
    sessionMaxDurationMs?: number;
    refreshIntervalMs?: number;
    maxTimerSliceMs?: number;
    debugMode?: boolean;
}

interface ArmedEntry {
    entry: ScheduleEntry;
    timer: PointInTimeTimer;
}

interface ActiveSession {
    session: PlaybackSession;
    driver: IPlaybackDriver;
    resetTimer: ReturnType<typeof setTimeout>;
}

interface InFlightRefresh {
    day: string;
    provider: ITimeTableProvider;
    promise: Promise<TimeTable>;
}

// ============================================
// EventScheduler Class
// ============================================

/**
 * Event Scheduler implementation.
 *
 * Requests are numbered in issue order; only the latest request may start a
 * session, so a trigger or stop issued later always wins over one still
 * waiting for its asset. Session and armed-set mutation runs in a Mutex;
 * settings changes are serialised by a second one.
 *
 * On a day rollover the previous table is kept as a carry for as long as one
 * of its entries (pushed past midnight by a positive offset) is still ahead.
 *
 * @implements {IEventScheduler}
 *
 * @example
 * ```typescript
 * const scheduler = new EventScheduler({ settings, assetCache, createDriver });
 * scheduler.on('statusChange', ({ to }) => console.log('status', to));
 * await scheduler.start();
 * ```
 */
export class EventScheduler implements IEventScheduler {
    // ============================================
    // Private State
    // ============================================

    private readonly _emitter = new EventEmitter<SchedulerEventMap>('EventScheduler');
    private readonly _mutex = new Mutex();
    private readonly _settingsMutex = new Mutex();
    private readonly _assetCache: IAssetCache;
    private readonly _createDriver: (backend: PlaybackBackendConfig) => IPlaybackDriver;
    private readonly _createProvider: (source: TimeTableSourceConfig) => ITimeTableProvider;
    private readonly _persistSettings: ((settings: Settings) => Promise<void>) | null;
    private readonly _preemptionTimeoutMs: number;
    private readonly _sessionMaxDurationMs: number;
    private readonly _refreshIntervalMs: number;
    private readonly _maxTimerSliceMs: number;
    private readonly _debugMode: boolean;

    private _settings: Settings;
    private _provider: ITimeTableProvider;
    private _driver: IPlaybackDriver;

    private _timeTable: TimeTable | null = null;
    private _carryTable: TimeTable | null = null;
    private _upcomingTable: TimeTable | null = null;
    private _entries: ScheduleEntry[] = [];
    private _carried: ScheduleEntry[] = [];
    /** Keyed by {@link firedKey}, so a carried Isha and today's Isha coexist */
    private readonly _armed = new Map<string, ArmedEntry>();
    private readonly _fired = new Set<string>();
    private _inFlightRefresh: InFlightRefresh | null = null;
    private _refreshSeq = 0;
    private _appliedRefreshSeq = 0;

    private _status: PlaybackStatus = 'idle';
    private _active: ActiveSession | null = null;
    private _requestSeq = 0;
    private _sessionSeq = 0;
    /** Asset fetches in progress: warm-up and triggers that found no ready file */
    private _downloads = 0;
    private _lastError: AppError | null = null;

    private _running = false;
    private _disposed = false;
    private _midnightTimer: PointInTimeTimer | null = null;
    private _refreshInterval: ReturnType<typeof setInterval> | null = null;

    constructor(config: EventSchedulerConfig) {
        this._settings = config.settings;
        this._assetCache = config.assetCache;
        this._createDriver = config.createDriver;
        this._createProvider = config.createProvider ?? createTimeTableProvider;
        this._persistSettings = config.persistSettings ?? null;
        this._preemptionTimeoutMs = config.preemptionTimeoutMs ?? PREEMPTION_TIMEOUT_MS;
        this._sessionMaxDurationMs = config.sessionMaxDurationMs ?? SESSION_MAX_DURATION_MS;
        this._refreshIntervalMs = config.refreshIntervalMs ?? REFRESH_INTERVAL_MS;
        this._maxTimerSliceMs = config.maxTimerSliceMs ?? MAX_TIMER_SLICE_MS;
        this._debugMode = config.debugMode ?? false;

        this._provider = this._createProvider(this._settings.source);
        this._driver = this._createDriver(this._settings.backend);
    }

    // ============================================
    // Lifecycle
    // ============================================

    public start(): Promise<RefreshResult> {
        if (!this._running) {
            this._running = true;
            this._disposed = false;
            this._refreshInterval = globalThis.setInterval(() => {
                this._refreshInBackground('interval');
            }, this._refreshIntervalMs);
            console.info('[EventScheduler] Started');
        }
        return this.refresh();
    }

    public async shutdown(): Promise<void> {
        this._running = false;
        this._disposed = true;
        if (this._refreshInterval !== null) {
            globalThis.clearInterval(this._refreshInterval);
            this._refreshInterval = null;
        }
        this._midnightTimer?.cancel();
        this._midnightTimer = null;
        this._cancelArmed();

        this._requestSeq++;
        await this._mutex.runExclusive(() => this._endActiveSession('stopped'));
        this._setStatus('idle');
        console.info('[EventScheduler] Shut down');
    }

    // ============================================
    // Refresh
    // ============================================

    /**
     * Each call is numbered; a result that arrives after a newer one was
     * applied, or from a provider that has since been replaced, is dropped.
     * An explicit `now` pins the clock; otherwise it is read again once the
     * fetch has settled.
     */
    public async refresh(now?: number): Promise<RefreshResult> {
        const refreshId = ++this._refreshSeq;
        const day = toDayKey(now ?? Date.now());
        const provider = this._provider;

        let table: TimeTable;
        try {
            table = await this._fetchTimeTable(day, provider);
        } catch (error) {
            const appError = toAppError(error);
            console.warn(
                `[EventScheduler] Refresh for ${day} failed, keeping ${this._armed.size} armed entries:`,
                appError.message
            );
            this._report(appError);
            this._scheduleMidnightRefresh(now ?? Date.now());
            return { ok: false, day, armed: this.getArmedEntries() };
        }

        const applied = await this._mutex.runExclusive(async () => {
            if (!this._isCurrentRefresh(refreshId, provider, table.day)) {
                if (this._debugMode) {
                    console.debug(`[EventScheduler] Dropping stale refresh for ${table.day}`);
                }
                return null;
            }
            const at = now ?? Date.now();
            this._appliedRefreshSeq = refreshId;
            this._applyTimeTable(table);
            const armed = this._disposed ? [] : this._rearm(at);
            this._scheduleMidnightRefresh(at);
            this._emitter.emit('refreshed', table);
            console.info(`[EventScheduler] Refreshed ${table.day} from ${table.source}, armed ${armed.length}`);
            return { at, armed };
        });
        if (applied === null) {
            return { ok: true, day, armed: this.getArmedEntries() };
        }

        if (this._nextPendingEntry(applied.at) === null) {
            await this._loadUpcoming(toDayKey(nextLocalMidnight(applied.at)), provider, refreshId);
        }
        return { ok: true, day, armed: applied.armed };
    }

    // ============================================
    // Trigger / Stop
    // ============================================

    public async trigger(kind: EventKind, now: number = Date.now()): Promise<TriggerOutcome> {
        const requestId = ++this._requestSeq;
        const asset = assetForKind(kind, this._settings.audio);
        console.info(`[EventScheduler] Trigger ${kind} (request ${requestId})`);

        let downloading = false;
        try {
            const preempted = await this._mutex.runExclusive(async () => {
                if (!this._isLatest(requestId)) {
                    return false;
                }
                await this._endActiveSession('preempted');
                return true;
            });
            if (!preempted) {
                return this._superseded(kind, requestId);
            }

            if (!this._assetCache.isReady(asset.id, asset.sourceUrl)) {
                downloading = true;
                this._downloads++;
                if (this._isLatest(requestId)) {
                    this._setStatus('downloading');
                }
            }
            const filePath = await this._resolveAsset(kind, asset, requestId);
            if (filePath === null) {
                return this._isLatest(requestId) ? 'failed' : 'superseded';
            }

            return await this._mutex.runExclusive(async () => {
                if (!this._isLatest(requestId)) {
                    return this._superseded(kind, requestId);
                }
                await this._endActiveSession('preempted');
                return this._startSession(kind, asset, filePath, now);
            });
        } catch (error) {
            this._report(toAppError(error));
            if (this._isLatest(requestId)) {
                this._settleStatus();
            }
            return 'failed';
        } finally {
            if (downloading) {
                this._endDownload();
            }
        }
    }

    public async stop(): Promise<void> {
        this._requestSeq++;
        await this._mutex.runExclusive(() => this._endActiveSession('stopped'));
        this._settleStatus();
    }

    /**
     * Warm the asset cache. Status shows Downloading while anything is
     * actually fetched.
     */
    public async prefetch(requests: AssetRequest[]): Promise<AssetId[]> {
        if (requests.every((request) => this._assetCache.isReady(request.id, request.sourceUrl))) {
            return this._assetCache.prefetch(requests);
        }
        this._downloads++;
        if (this._status === 'idle') {
            this._setStatus('downloading');
        }
        try {
            return await this._assetCache.prefetch(requests);
        } finally {
            this._endDownload();
        }
    }

    // ============================================
    // Settings
    // ============================================

    public async updateSettings(patch: SettingsPatch): Promise<Settings> {
        const { next, sourceChanged } = await this._settingsMutex.runExclusive(async () => {
            const previous = this._settings;
            const merged = mergeSettings(previous, patch);
            if (this._persistSettings) {
                await this._persistSettings(merged);
            }

            const changedSource = !isDeepStrictEqual(previous.source, merged.source);
            await this._mutex.runExclusive(async () => {
                this._settings = merged;
                if (!isDeepStrictEqual(previous.backend, merged.backend)) {
                    this._driver = this._createDriver(merged.backend);
                    console.info(`[EventScheduler] Playback backend now ${this._driver.backend} (${this._driver.target})`);
                }
                if (changedSource) {
                    this._provider = this._createProvider(merged.source);
                    this._inFlightRefresh = null;
                    this._upcomingTable = null;
                } else if (this._timeTable !== null && !this._disposed) {
                    this._rearm(Date.now());
                }
            });
            return { next: merged, sourceChanged: changedSource };
        });

        if (sourceChanged) {
            await this.refresh();
        }
        return next;
    }

    public setEnabled(kind: ScheduledEventKind, enabled: boolean): Promise<Settings> {
        const patch: Partial<Record<ScheduledEventKind, boolean>> = {};
        patch[kind] = enabled;
        return this.updateSettings({ enabled: patch });
    }

    public setOffsetMinutes(minutes: number): Promise<Settings> {
        return this.updateSettings({ offsetMinutes: minutes });
    }

    // ============================================
    // State
    // ============================================

    public getStatus(): PlaybackStatus {
        return this._status;
    }

    public getSettings(): Settings {
        return this._settings;
    }

    public getTimeTable(): TimeTable | null {
        return this._timeTable;
    }

    public getEntries(): ScheduleEntry[] {
        return [...this._entries];
    }

    public getArmedEntries(): ScheduleEntry[] {
        return [...this._armed.values()]
            .map((armed) => armed.entry)
            .sort((a, b) => a.instant - b.instant);
    }

    public getActiveSession(): PlaybackSession | null {
        return this._active ? { ...this._active.session } : null;
    }

    public getLastError(): AppError | null {
        return this._lastError;
    }

    public getNextEntry(now: number): ScheduleEntry | null {
        const upcoming = this._upcomingTable ? buildScheduleEntries(this._upcomingTable, this._settings) : [];
        return findNextEntry([...this._carried, ...this._entries, ...upcoming], now);
    }

    public getNextRefreshAt(): number | null {
        return this._midnightTimer?.targetTime ?? null;
    }

    public on<K extends keyof SchedulerEventMap>(
        event: K,
        handler: (payload: SchedulerEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    // ============================================
    // Private Methods: arming
    // ============================================

    /**
     * One fetch per day and provider at a time; concurrent refreshes share it.
     */
    private _fetchTimeTable(day: string, provider: ITimeTableProvider): Promise<TimeTable> {
        const pending = this._inFlightRefresh;
        if (pending !== null && pending.day === day && pending.provider === provider) {
            return pending.promise;
        }
        const inFlight: InFlightRefresh = {
            day,
            provider,
            promise: provider.fetch(day).finally(() => {
                if (this._inFlightRefresh === inFlight) {
                    this._inFlightRefresh = null;
                }
            }),
        };
        this._inFlightRefresh = inFlight;
        return inFlight.promise;
    }

    private _isCurrentRefresh(refreshId: number, provider: ITimeTableProvider, day: string): boolean {
        if (provider !== this._provider || refreshId < this._appliedRefreshSeq) {
            return false;
        }
        return this._timeTable === null || day >= this._timeTable.day;
    }

    /**
     * Install a fetched table. Must run inside the mutex.
     */
    private _applyTimeTable(table: TimeTable): void {
        const previous = this._timeTable;
        if (previous !== null && previous.day < table.day) {
            this._carryTable = previous;
        }
        if (this._upcomingTable !== null && this._upcomingTable.day <= table.day) {
            this._upcomingTable = null;
        }
        this._timeTable = table;

        const keep = [table.day, this._carryTable?.day].filter((day): day is string => day !== undefined);
        this._pruneFired(keep);
    }

    /**
     * Fetch the next day's table so the next event can be published before
     * midnight. Not armed: the midnight refresh does that.
     */
    private async _loadUpcoming(day: string, provider: ITimeTableProvider, refreshId: number): Promise<void> {
        let table: TimeTable;
        try {
            table = await this._fetchTimeTable(day, provider);
        } catch (error) {
            console.warn(`[EventScheduler] Could not load ${day} ahead of midnight:`, toAppError(error).message);
            return;
        }
        await this._mutex.runExclusive(async () => {
            if (provider === this._provider && refreshId === this._appliedRefreshSeq && !this._disposed) {
                this._upcomingTable = table;
            }
        });
    }

    /** Earliest enabled entry of the carried or current table still ahead. */
    private _nextPendingEntry(now: number): ScheduleEntry | null {
        return findNextEntry([...this._carried, ...this._entries], now);
    }

    /**
     * Cancel every armed timer, then arm the upcoming entries of the current
     * table and of the carried one.
     */
    private _rearm(now: number): ScheduleEntry[] {
        this._cancelArmed();
        if (this._timeTable === null) {
            this._entries = [];
            this._carried = [];
            return [];
        }

        this._entries = buildScheduleEntries(this._timeTable, this._settings);
        this._carried = [];
        if (this._carryTable !== null) {
            const carryEntries = buildScheduleEntries(this._carryTable, this._settings);
            if (carryEntries.some((entry) => entry.instant > now)) {
                this._carried = selectArmableEntries(carryEntries, now, this._fired);
            } else {
                this._carryTable = null;
            }
        }

        const armable = [...this._carried, ...selectArmableEntries(this._entries, now, this._fired)]
            .sort((a, b) => a.instant - b.instant);
        for (const entry of armable) {
            const timer = new PointInTimeTimer(
                entry.instant,
                () => this._onEntryDue(entry),
                this._maxTimerSliceMs
            );
            this._armed.set(firedKey(entry), { entry, timer });
            timer.start();
        }

        if (this._debugMode) {
            console.debug(
                '[EventScheduler] Armed:',
                armable.map((entry) => `${entry.kind}@${new Date(entry.instant).toISOString()}`).join(', ')
            );
        }
        this._emitter.emit('armed', armable);
        return armable;
    }

    private _cancelArmed(): void {
        for (const armed of this._armed.values()) {
            armed.timer.cancel();
        }
        this._armed.clear();
    }

    /**
     * Only the current and carried days can still fire.
     */
    private _pruneFired(days: string[]): void {
        for (const key of [...this._fired]) {
            if (!days.some((day) => key.startsWith(day + ':'))) {
                this._fired.delete(key);
            }
        }
    }

    private _onEntryDue(entry: ScheduleEntry): void {
        const key = firedKey(entry);
        if (this._armed.get(key)?.entry === entry) {
            this._armed.delete(key);
        }
        this._fired.add(key);
        console.info(`[EventScheduler] ${entry.kind} due for ${entry.day}`);
        this._emitter.emit('fired', entry);
        void this.trigger(entry.kind);
    }

    private _scheduleMidnightRefresh(now: number): void {
        if (!this._running) {
            return;
        }
        const target = nextLocalMidnight(now);
        if (this._midnightTimer?.targetTime === target && this._midnightTimer.isArmed()) {
            return;
        }
        this._midnightTimer?.cancel();
        this._midnightTimer = new PointInTimeTimer(
            target,
            () => this._refreshInBackground('midnight'),
            this._maxTimerSliceMs
        ).start();
    }

    private _refreshInBackground(reason: string): void {
        if (this._debugMode) {
            console.debug(`[EventScheduler] ${reason} refresh`);
        }
        this.refresh().catch((error: unknown) => {
            this._report(toAppError(error));
        });
    }

    // ============================================
    // Private Methods: sessions
    // ============================================

    private _isLatest(requestId: number): boolean {
        return requestId === this._requestSeq;
    }

    private _superseded(kind: EventKind, requestId: number): TriggerOutcome {
        if (this._debugMode) {
            console.debug(`[EventScheduler] Trigger ${kind} (request ${requestId}) superseded`);
        }
        return 'superseded';
    }

    /**
     * Ready path for the asset, or null when the fetch failed. Only the
     * latest request touches the status.
     */
    private async _resolveAsset(kind: EventKind, asset: AssetRequest, requestId: number): Promise<string | null> {
        try {
            return await this._assetCache.resolve(asset.id, asset.sourceUrl);
        } catch (error) {
            const appError = toAppError(error);
            console.error(`[EventScheduler] Asset ${asset.id} for ${kind} unavailable:`, appError.message);
            this._report(appError);
            if (this._isLatest(requestId)) {
                this._settleStatus();
            }
            return null;
        }
    }

    private async _startSession(
        kind: EventKind,
        asset: AssetRequest,
        filePath: string,
        now: number
    ): Promise<TriggerOutcome> {
        const driver = this._driver;
        try {
            await driver.start(filePath);
        } catch (error) {
            const appError = toAppError(error);
            console.error(`[EventScheduler] Playback of ${kind} failed:`, appError.message);
            this._report(appError);
            this._settleStatus();
            return 'failed';
        }

        const session: PlaybackSession = {
            id: ++this._sessionSeq,
            kind,
            assetId: asset.id,
            backend: driver.backend,
            target: driver.target,
            status: 'playing',
            startedAt: now,
            endedAt: null,
        };
        const resetTimer = setTimeout(() => this._finishSession(session.id), this._sessionMaxDurationMs);
        this._active = { session, driver, resetTimer };
        this._setStatus('playing');
        this._emitter.emit('sessionStart', { ...session });
        return 'started';
    }

    /**
     * Stop the active session, waiting at most the preemption timeout.
     * Must run inside the mutex.
     */
    private async _endActiveSession(status: Exclude<SessionStatus, 'playing' | 'completed'>): Promise<void> {
        const active = this._active;
        if (active === null) {
            return;
        }
        this._active = null;
        clearTimeout(active.resetTimer);

        const result = await settleWithin(active.driver.stop(), this._preemptionTimeoutMs);
        if (result.status === 'timeout') {
            const warning = new PreemptionTimeoutError(this._preemptionTimeoutMs, { kind: active.session.kind });
            console.warn(`[EventScheduler] ${warning.message}; continuing`);
        } else if (result.status === 'rejected') {
            this._report(toAppError(result.reason));
        }

        this._emitter.emit('sessionEnd', { ...active.session, status, endedAt: Date.now() });
    }

    private _finishSession(sessionId: number): void {
        const active = this._active;
        if (active === null || active.session.id !== sessionId) {
            return;
        }
        this._active = null;
        this._settleStatus();
        this._emitter.emit('sessionEnd', { ...active.session, status: 'completed', endedAt: Date.now() });
    }

    /**
     * Idle, unless an asset fetch is still running.
     */
    private _settleStatus(): void {
        this._setStatus(this._downloads > 0 ? 'downloading' : 'idle');
    }

    private _endDownload(): void {
        this._downloads--;
        if (this._downloads === 0 && this._status === 'downloading') {
            this._setStatus('idle');
        }
    }

    private _setStatus(to: PlaybackStatus): void {
        const from = this._status;
        if (from === to) {
            return;
        }
        this._status = to;
        if (this._debugMode) {
            console.debug(`[EventScheduler] Status ${from} -> ${to}`);
        }
        this._emitter.emit('statusChange', { from, to });
    }

    private _report(error: AppError): void {
        this._lastError = error;
        this._emitter.emit('error', error);
    }
}
