/**
 * @fileoverview Unit tests for EventScheduler.
 * @module modules/scheduler/__tests__/EventScheduler.test
 */

import { EventScheduler } from '../EventScheduler';
import type { EventSchedulerConfig } from '../EventScheduler';
import type { PlaybackSession, ScheduleEntry, Settings, StatusChange } from '../types';
import type { IAssetCache } from '../../assets/interfaces';
import type { AssetId, AssetRequest } from '../../assets/types';
import type { IPlaybackDriver } from '../../playback/interfaces';
import type { ITimeTableProvider } from '../../timetable/interfaces';
import { EventKind } from '../../timetable/types';
import type { TimeTable } from '../../timetable/types';
import {
    AppErrorCode,
    ConfigError,
    FetchError,
    PlaybackError,
    SourceUnavailableError,
} from '../../../types/app-errors';
import type { AppError } from '../../../types/app-errors';
import { localTimeOnDay } from '../../../utils/timing';

// ============================================
// Fixtures
// ============================================

const DAY = '2026-06-15';
const NEXT_DAY = '2026-06-16';
const PRIMARY_URL = 'https://media.example.test/adhan.mp3';

function at(hours: number, minutes: number, day: string = DAY): number {
    return localTimeOnDay(day, hours, minutes);
}

function makeTable(day: string): TimeTable {
    return {
        day,
        times: {
            [EventKind.Fajr]: localTimeOnDay(day, 5, 0),
            [EventKind.Sunrise]: localTimeOnDay(day, 6, 20),
            [EventKind.Dhuhr]: localTimeOnDay(day, 12, 5),
            [EventKind.Asr]: localTimeOnDay(day, 15, 30),
            [EventKind.Maghrib]: localTimeOnDay(day, 18, 10),
            [EventKind.Isha]: localTimeOnDay(day, 19, 40),
        },
        source: 'calculation',
        method: 'test method',
        hijriDate: '29 Dhu al-Hijjah 1447 AH',
        fetchedAt: 0,
    };
}

function makeSettings(overrides: Partial<Settings> = {}): Settings {
    return {
        enabled: {
            [EventKind.Fajr]: true,
            [EventKind.Sunrise]: true,
            [EventKind.Dhuhr]: true,
            [EventKind.Asr]: true,
            [EventKind.Maghrib]: true,
            [EventKind.Isha]: true,
        },
        offsetMinutes: -5,
        source: { type: 'calculation', latitude: 21.42, longitude: 39.83, method: 4 },
        backend: { type: 'cast', entityId: 'media_player.hall', mediaBaseUrl: 'http://192.168.1.20:8080/media' },
        audio: { primary: PRIMARY_URL, fajr: null },
        ...overrides,
    };
}

interface FakeProvider extends ITimeTableProvider {
    fetch: jest.Mock<Promise<TimeTable>, [string]>;
}

interface FakeAssetCache extends IAssetCache {
    resolve: jest.Mock<Promise<string>, [AssetId, string]>;
    isReady: jest.Mock<boolean, [AssetId, string]>;
    prefetch: jest.Mock<Promise<AssetId[]>, [AssetRequest[]]>;
}

interface FakeDriver extends IPlaybackDriver {
    start: jest.Mock<Promise<void>, [string]>;
    stop: jest.Mock<Promise<void>, []>;
}

function createFakeProvider(): FakeProvider {
    return {
        type: 'calculation',
        fetch: jest.fn<Promise<TimeTable>, [string]>(async (day) => makeTable(day)),
    };
}

function createFakeAssetCache(): FakeAssetCache {
    return {
        resolve: jest.fn<Promise<string>, [AssetId, string]>(async (id) => `/cache/${id}.mp3`),
        isReady: jest.fn<boolean, [AssetId, string]>(() => true),
        getAsset: (id) => ({ id, sourceUrl: null, state: { status: 'absent' } }),
        snapshot: () => [],
        prefetch: jest.fn<Promise<AssetId[]>, [AssetRequest[]]>(async () => []),
        dispose: () => undefined,
        on: () => ({ dispose: () => undefined }),
    };
}

function createFakeDriver(): FakeDriver {
    return {
        backend: 'cast',
        target: 'media_player.hall',
        start: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
        stop: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
    };
}

/** Isha late enough that a positive offset pushes it past midnight. */
function makeLateIshaTable(day: string): TimeTable {
    const table = makeTable(day);
    return { ...table, times: { ...table.times, [EventKind.Isha]: localTimeOnDay(day, 23, 45) } };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return { promise, resolve };
}

// ============================================
// Tests
// ============================================

describe('EventScheduler', () => {
    let provider: FakeProvider;
    let assetCache: FakeAssetCache;
    let driver: FakeDriver;
    let createProvider: jest.Mock<ITimeTableProvider, []>;
    let persistSettings: jest.Mock<Promise<void>, [Settings]>;
    let scheduler: EventScheduler;
    let statusChanges: StatusChange[];
    let errors: AppError[];

    function createScheduler(overrides: Partial<EventSchedulerConfig> = {}): EventScheduler {
        const created = new EventScheduler({
            settings: makeSettings(),
            assetCache,
            createDriver: () => driver,
            createProvider,
            persistSettings,
            ...overrides,
        });
        created.on('statusChange', (change) => statusChanges.push(change));
        created.on('error', (error) => errors.push(error));
        return created;
    }

    function armedInstants(): number[] {
        return scheduler.getArmedEntries().map((entry) => entry.instant);
    }

    beforeEach(() => {
        jest.useFakeTimers();
        jest.setSystemTime(at(4, 0));
        jest.spyOn(console, 'info').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        provider = createFakeProvider();
        assetCache = createFakeAssetCache();
        driver = createFakeDriver();
        createProvider = jest.fn<ITimeTableProvider, []>(() => provider);
        persistSettings = jest.fn<Promise<void>, [Settings]>().mockResolvedValue(undefined);
        statusChanges = [];
        errors = [];
        scheduler = createScheduler();
    });

    afterEach(async () => {
        await scheduler.shutdown();
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    // ========================================
    // Refresh
    // ========================================

    describe('refresh', () => {
        it('arms one callback per enabled entry with the offset applied', async () => {
            const result = await scheduler.refresh(at(4, 0));

            const expected = [at(4, 55), at(6, 15), at(12, 0), at(15, 25), at(18, 5), at(19, 35)];
            expect(result.ok).toBe(true);
            expect(result.day).toBe(DAY);
            expect(result.armed.map((entry) => entry.instant)).toEqual(expected);
            expect(armedInstants()).toEqual(expected);
            expect(provider.fetch).toHaveBeenCalledWith(DAY);
        });

        it('re-arms the identical set when refreshed again', async () => {
            await scheduler.refresh(at(4, 0));
            const first = armedInstants();

            await scheduler.refresh(at(4, 30));

            expect(armedInstants()).toEqual(first);
            expect(first).toHaveLength(6);
        });

        it('arms nothing past the last entry and targets tomorrow at midnight', async () => {
            jest.setSystemTime(at(19, 36));

            const result = await scheduler.start();

            expect(result.armed).toEqual([]);
            expect(armedInstants()).toEqual([]);
            expect(scheduler.getNextRefreshAt()).toBe(at(0, 0, NEXT_DAY));
        });

        it('fetches the next day at local midnight', async () => {
            jest.setSystemTime(at(19, 36));
            await scheduler.start();

            await jest.advanceTimersByTimeAsync(at(0, 0, NEXT_DAY) - at(19, 36));

            expect(provider.fetch).toHaveBeenLastCalledWith(NEXT_DAY);
            expect(armedInstants()).toHaveLength(6);
            expect(scheduler.getTimeTable()?.day).toBe(NEXT_DAY);
        });

        it('keeps the previous armed set when the source fails', async () => {
            await scheduler.refresh(at(4, 0));
            const before = armedInstants();
            provider.fetch.mockRejectedValueOnce(new SourceUnavailableError('Calculation API unreachable: down'));

            const result = await scheduler.refresh(at(4, 30));

            expect(result.ok).toBe(false);
            expect(armedInstants()).toEqual(before);
            expect(scheduler.getLastError()?.code).toBe(AppErrorCode.SOURCE_UNAVAILABLE);
            expect(errors.map((error) => error.code)).toEqual([AppErrorCode.SOURCE_UNAVAILABLE]);
        });

        it('shares one fetch between concurrent refreshes of a day', async () => {
            await Promise.all([scheduler.refresh(at(4, 0)), scheduler.refresh(at(4, 0))]);

            expect(provider.fetch).toHaveBeenCalledTimes(1);
        });

        it('drops a slow refresh that resolves after a newer one was applied', async () => {
            const slow = deferred<TimeTable>();
            provider.fetch.mockReturnValueOnce(slow.promise);

            const older = scheduler.refresh(at(23, 50));
            await scheduler.refresh(at(0, 10, NEXT_DAY));
            slow.resolve(makeTable(DAY));
            await older;

            expect(scheduler.getTimeTable()?.day).toBe(NEXT_DAY);
            expect(armedInstants()).toEqual([
                at(4, 55, NEXT_DAY), at(6, 15, NEXT_DAY), at(12, 0, NEXT_DAY),
                at(15, 25, NEXT_DAY), at(18, 5, NEXT_DAY), at(19, 35, NEXT_DAY),
            ]);
        });

        it('drops a table fetched from a source that has since been replaced', async () => {
            const replacement = createFakeProvider();
            createProvider.mockReturnValueOnce(replacement);
            const slow = deferred<TimeTable>();
            provider.fetch.mockReturnValueOnce(slow.promise);

            const older = scheduler.refresh(at(4, 0));
            await scheduler.updateSettings({
                source: { type: 'portal', url: 'https://portal.example.test/times?d={date}' },
            });
            slow.resolve({ ...makeTable(DAY), method: 'replaced source' });
            await older;

            expect(replacement.fetch).toHaveBeenCalledWith(DAY);
            expect(scheduler.getTimeTable()?.method).toBe('test method');
        });

        it('arms against the clock as it reads once the fetch settles', async () => {
            const slow = deferred<TimeTable>();
            provider.fetch.mockReturnValueOnce(slow.promise);

            const pending = scheduler.refresh();
            jest.setSystemTime(at(5, 30));
            slow.resolve(makeTable(DAY));
            await pending;

            expect(scheduler.getArmedEntries().map((entry) => entry.kind)).toEqual([
                EventKind.Sunrise, EventKind.Dhuhr, EventKind.Asr, EventKind.Maghrib, EventKind.Isha,
            ]);
        });

        it('loads the next day for the next event once the last entry has passed', async () => {
            const result = await scheduler.refresh(at(19, 36));

            expect(result.armed).toEqual([]);
            expect(provider.fetch).toHaveBeenLastCalledWith(NEXT_DAY);
            expect(scheduler.getTimeTable()?.day).toBe(DAY);
            expect(scheduler.getNextEntry(at(19, 36))).toEqual({
                kind: EventKind.Fajr,
                instant: at(4, 55, NEXT_DAY),
                enabled: true,
                offsetMinutes: -5,
                day: NEXT_DAY,
            });
        });

        it('publishes no next event when the next day cannot be loaded', async () => {
            provider.fetch.mockImplementation(async (day) => {
                if (day === NEXT_DAY) {
                    throw new SourceUnavailableError('Calculation API unreachable: down');
                }
                return makeTable(day);
            });

            const result = await scheduler.refresh(at(19, 36));

            expect(result.ok).toBe(true);
            expect(scheduler.getNextEntry(at(19, 36))).toBeNull();
            expect(console.warn).toHaveBeenCalledWith(
                '[EventScheduler] Could not load 2026-06-16 ahead of midnight:',
                'Calculation API unreachable: down'
            );
        });
    });

    // ========================================
    // Firing
    // ========================================

    describe('firing', () => {
        it('plays the entry when its instant arrives', async () => {
            const fired: ScheduleEntry[] = [];
            scheduler.on('fired', (entry) => fired.push(entry));
            await scheduler.refresh(at(4, 0));

            await jest.advanceTimersByTimeAsync(55 * 60_000);

            expect(fired.map((entry) => entry.kind)).toEqual([EventKind.Fajr]);
            expect(assetCache.resolve).toHaveBeenCalledWith('primary', PRIMARY_URL);
            expect(driver.start).toHaveBeenCalledWith('/cache/primary.mp3');
            expect(scheduler.getStatus()).toBe('playing');
            expect(scheduler.getActiveSession()).toMatchObject({
                kind: EventKind.Fajr,
                assetId: 'primary',
                backend: 'cast',
                target: 'media_player.hall',
                status: 'playing',
            });
        });

        it('never re-arms an entry that already fired that day', async () => {
            await scheduler.refresh(at(4, 0));
            await jest.advanceTimersByTimeAsync(55 * 60_000);

            await scheduler.setOffsetMinutes(10);

            const kinds = scheduler.getArmedEntries().map((entry) => entry.kind);
            expect(kinds).not.toContain(EventKind.Fajr);
            expect(kinds).toEqual([
                EventKind.Sunrise, EventKind.Dhuhr, EventKind.Asr, EventKind.Maghrib, EventKind.Isha,
            ]);
        });

        it('abandons a firing whose asset fails and leaves later entries armed', async () => {
            const noSunrise = makeSettings();
            noSunrise.enabled[EventKind.Sunrise] = false;
            scheduler = createScheduler({ settings: noSunrise });
            assetCache.isReady.mockReturnValue(false);
            assetCache.resolve.mockRejectedValueOnce(
                new FetchError('Download failed: HTTP 404', { assetId: 'primary', reference: PRIMARY_URL })
            );
            await scheduler.refresh(at(4, 0));

            await jest.advanceTimersByTimeAsync(55 * 60_000);

            expect(statusChanges).toEqual([
                { from: 'idle', to: 'downloading' },
                { from: 'downloading', to: 'idle' },
            ]);
            expect(driver.start).not.toHaveBeenCalled();
            expect(scheduler.getActiveSession()).toBeNull();
            expect(errors.map((error) => error.code)).toEqual([AppErrorCode.FETCH_FAILED]);
            expect(scheduler.getArmedEntries()[0]?.kind).toBe(EventKind.Dhuhr);

            await jest.advanceTimersByTimeAsync(at(12, 0) - at(4, 55));

            expect(driver.start).toHaveBeenCalledTimes(1);
            expect(scheduler.getActiveSession()?.kind).toBe(EventKind.Dhuhr);
            expect(scheduler.getStatus()).toBe('playing');
        });

        it('fires an entry pushed past midnight after the day rolls over', async () => {
            provider.fetch.mockImplementation(async (day) => makeLateIshaTable(day));
            scheduler = createScheduler({ settings: makeSettings({ offsetMinutes: 60 }) });
            const fired: ScheduleEntry[] = [];
            scheduler.on('fired', (entry) => fired.push(entry));
            jest.setSystemTime(at(22, 0));
            await scheduler.start();

            await jest.advanceTimersByTimeAsync(at(0, 0, NEXT_DAY) - at(22, 0));

            expect(scheduler.getTimeTable()?.day).toBe(NEXT_DAY);
            expect(scheduler.getArmedEntries()[0]).toMatchObject({
                kind: EventKind.Isha,
                day: DAY,
                instant: at(0, 45, NEXT_DAY),
            });

            await jest.advanceTimersByTimeAsync(45 * 60_000);

            expect(fired.map((entry) => [entry.kind, entry.day])).toEqual([[EventKind.Isha, DAY]]);
            expect(driver.start).toHaveBeenCalledTimes(1);
            expect(scheduler.getActiveSession()?.kind).toBe(EventKind.Isha);
            expect(scheduler.getArmedEntries()[0]?.kind).toBe(EventKind.Fajr);
        });

        it('ends a session without an end signal after five minutes', async () => {
            const ended: PlaybackSession[] = [];
            scheduler.on('sessionEnd', (session) => ended.push(session));

            await scheduler.trigger(EventKind.Dhuhr);
            await jest.advanceTimersByTimeAsync(5 * 60_000);

            expect(scheduler.getStatus()).toBe('idle');
            expect(scheduler.getActiveSession()).toBeNull();
            expect(ended.map((session) => session.status)).toEqual(['completed']);
        });
    });

    // ========================================
    // Trigger / Stop
    // ========================================

    describe('trigger and stop', () => {
        it('plays the Fajr asset for Fajr when configured', async () => {
            scheduler = createScheduler({
                settings: makeSettings({ audio: { primary: PRIMARY_URL, fajr: 'https://media.example.test/fajr.mp3' } }),
            });

            await expect(scheduler.trigger(EventKind.Fajr)).resolves.toBe('started');

            expect(assetCache.resolve).toHaveBeenCalledWith('fajr', 'https://media.example.test/fajr.mp3');
            expect(driver.start).toHaveBeenCalledWith('/cache/fajr.mp3');
        });

        it('stops the playing session before starting a new one', async () => {
            const ended: PlaybackSession[] = [];
            scheduler.on('sessionEnd', (session) => ended.push(session));
            await scheduler.trigger(EventKind.Fajr);
            const stopGate = deferred<void>();
            driver.stop.mockReturnValueOnce(stopGate.promise);

            const testRun = scheduler.trigger(EventKind.Test);
            await jest.advanceTimersByTimeAsync(0);

            expect(driver.stop).toHaveBeenCalledTimes(1);
            expect(driver.start).toHaveBeenCalledTimes(1);

            stopGate.resolve();
            await expect(testRun).resolves.toBe('started');

            expect(driver.start).toHaveBeenCalledTimes(2);
            expect(scheduler.getActiveSession()?.kind).toBe(EventKind.Test);
            expect(ended.map((session) => [session.kind, session.status])).toEqual([[EventKind.Fajr, 'preempted']]);
        });

        it('starts the new session once the preemption timeout elapses', async () => {
            await scheduler.trigger(EventKind.Fajr);
            driver.stop.mockReturnValueOnce(new Promise<void>(() => undefined));

            const testRun = scheduler.trigger(EventKind.Test);
            await jest.advanceTimersByTimeAsync(9_999);
            expect(driver.start).toHaveBeenCalledTimes(1);

            await jest.advanceTimersByTimeAsync(1);
            await expect(testRun).resolves.toBe('started');

            expect(driver.start).toHaveBeenCalledTimes(2);
            expect(console.warn).toHaveBeenCalledWith('[EventScheduler] Stop did not complete within 10000ms; continuing');
        });

        it('lets the latest of two overlapping triggers win', async () => {
            assetCache.isReady.mockReturnValue(false);
            const fetchGate = deferred<string>();
            assetCache.resolve.mockReturnValue(fetchGate.promise);

            const first = scheduler.trigger(EventKind.Fajr);
            const second = scheduler.trigger(EventKind.Dhuhr);
            await jest.advanceTimersByTimeAsync(0);
            fetchGate.resolve('/cache/primary.mp3');

            await expect(Promise.all([first, second])).resolves.toEqual(['superseded', 'started']);
            expect(driver.start).toHaveBeenCalledTimes(1);
            expect(scheduler.getActiveSession()?.kind).toBe(EventKind.Dhuhr);
        });

        it('stop supersedes a trigger waiting for its asset', async () => {
            assetCache.isReady.mockReturnValue(false);
            const fetchGate = deferred<string>();
            assetCache.resolve.mockReturnValue(fetchGate.promise);

            const pending = scheduler.trigger(EventKind.Asr);
            await jest.advanceTimersByTimeAsync(0);
            expect(scheduler.getStatus()).toBe('downloading');

            await scheduler.stop();
            fetchGate.resolve('/cache/primary.mp3');

            await expect(pending).resolves.toBe('superseded');
            expect(driver.start).not.toHaveBeenCalled();
            expect(scheduler.getStatus()).toBe('idle');
        });

        it('stop with nothing active is a no-op', async () => {
            await expect(scheduler.stop()).resolves.toBeUndefined();

            expect(driver.stop).not.toHaveBeenCalled();
            expect(scheduler.getStatus()).toBe('idle');
            expect(statusChanges).toEqual([]);
        });

        it('stop ends the playing session', async () => {
            await scheduler.trigger(EventKind.Maghrib);

            await scheduler.stop();

            expect(driver.stop).toHaveBeenCalledTimes(1);
            expect(scheduler.getActiveSession()).toBeNull();
            expect(scheduler.getStatus()).toBe('idle');
        });

        it('reports a playback failure and returns to idle', async () => {
            driver.start.mockRejectedValueOnce(new PlaybackError('cast', 'Failed to start playback: status 500'));

            await expect(scheduler.trigger(EventKind.Isha)).resolves.toBe('failed');

            expect(scheduler.getStatus()).toBe('idle');
            expect(scheduler.getActiveSession()).toBeNull();
            expect(scheduler.getLastError()).toMatchObject({
                code: AppErrorCode.PLAYBACK_FAILED,
                message: 'Failed to start playback: status 500',
            });
        });
    });

    // ========================================
    // Prefetch
    // ========================================

    describe('prefetch', () => {
        const REQUESTS: AssetRequest[] = [{ id: 'primary', sourceUrl: PRIMARY_URL }];

        it('shows Downloading while an asset is fetched', async () => {
            assetCache.isReady.mockReturnValue(false);
            const gate = deferred<AssetId[]>();
            assetCache.prefetch.mockReturnValueOnce(gate.promise);

            const warm = scheduler.prefetch(REQUESTS);

            expect(scheduler.getStatus()).toBe('downloading');

            gate.resolve(['primary']);
            await expect(warm).resolves.toEqual(['primary']);
            expect(statusChanges).toEqual([
                { from: 'idle', to: 'downloading' },
                { from: 'downloading', to: 'idle' },
            ]);
        });

        it('leaves the status alone when every asset is ready', async () => {
            await expect(scheduler.prefetch(REQUESTS)).resolves.toEqual([]);

            expect(assetCache.prefetch).toHaveBeenCalledWith(REQUESTS);
            expect(statusChanges).toEqual([]);
        });

        it('keeps Playing when the warm-up finishes during a session', async () => {
            assetCache.isReady.mockReturnValueOnce(false);
            const gate = deferred<AssetId[]>();
            assetCache.prefetch.mockReturnValueOnce(gate.promise);

            const warm = scheduler.prefetch(REQUESTS);
            await scheduler.trigger(EventKind.Test);
            gate.resolve(['primary']);
            await warm;

            expect(scheduler.getStatus()).toBe('playing');
            expect(statusChanges).toEqual([
                { from: 'idle', to: 'downloading' },
                { from: 'downloading', to: 'playing' },
            ]);
        });
    });

    // ========================================
    // Settings
    // ========================================

    describe('settings', () => {
        it('persists and re-arms without refetching', async () => {
            await scheduler.refresh(at(4, 0));

            const updated = await scheduler.setEnabled(EventKind.Dhuhr, false);

            expect(updated.enabled[EventKind.Dhuhr]).toBe(false);
            expect(persistSettings).toHaveBeenCalledWith(updated);
            expect(provider.fetch).toHaveBeenCalledTimes(1);
            expect(scheduler.getArmedEntries().map((entry) => entry.kind)).not.toContain(EventKind.Dhuhr);
            expect(scheduler.getEntries()).toHaveLength(6);
        });

        it('moves every armed instant with the offset', async () => {
            await scheduler.refresh(at(4, 0));

            await scheduler.setOffsetMinutes(0);

            expect(armedInstants()).toEqual([at(5, 0), at(6, 20), at(12, 5), at(15, 30), at(18, 10), at(19, 40)]);
        });

        it('applies both of two concurrent changes', async () => {
            await scheduler.refresh(at(4, 0));

            await Promise.all([
                scheduler.setEnabled(EventKind.Fajr, false),
                scheduler.setEnabled(EventKind.Asr, false),
            ]);

            const { enabled } = scheduler.getSettings();
            expect(enabled[EventKind.Fajr]).toBe(false);
            expect(enabled[EventKind.Asr]).toBe(false);
            expect(persistSettings.mock.calls[1]?.[0].enabled).toMatchObject({
                [EventKind.Fajr]: false,
                [EventKind.Asr]: false,
            });
            expect(scheduler.getArmedEntries().map((entry) => entry.kind)).toEqual([
                EventKind.Sunrise, EventKind.Dhuhr, EventKind.Maghrib, EventKind.Isha,
            ]);
        });

        it('rejects an invalid offset without persisting', async () => {
            await expect(scheduler.setOffsetMinutes(500)).rejects.toBeInstanceOf(ConfigError);

            expect(persistSettings).not.toHaveBeenCalled();
            expect(scheduler.getSettings().offsetMinutes).toBe(-5);
        });

        it('rebuilds the provider and refetches when the source changes', async () => {
            await scheduler.refresh(at(4, 0));

            await scheduler.updateSettings({
                source: { type: 'portal', url: 'https://portal.example.test/times?d={date}' },
            });

            expect(createProvider).toHaveBeenCalledTimes(2);
            expect(provider.fetch).toHaveBeenCalledTimes(2);
        });
    });

    // ========================================
    // Lifecycle
    // ========================================

    describe('shutdown', () => {
        it('cancels timers and stops the active session', async () => {
            await scheduler.start();
            await scheduler.trigger(EventKind.Test);

            await scheduler.shutdown();

            expect(driver.stop).toHaveBeenCalledTimes(1);
            expect(scheduler.getArmedEntries()).toEqual([]);
            expect(scheduler.getNextRefreshAt()).toBeNull();
            expect(scheduler.getStatus()).toBe('idle');
            expect(jest.getTimerCount()).toBe(0);
        });
    });
});
