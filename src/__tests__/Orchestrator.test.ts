/**
 * @fileoverview Unit tests for AppOrchestrator.
 * @module __tests__/Orchestrator.test
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AppOrchestrator, type OrchestratorDependencies } from '../Orchestrator';
import { parseConfig } from '../config/loadConfig';
import type { AppConfig } from '../config/schema';
import type { IStateManager, PersistentState } from '../modules/lifecycle';
import type { IAudioSource } from '../modules/assets';
import type { IDeviceGateway } from '../modules/playback';
import type { Settings } from '../modules/scheduler';
import { EventKind, type TimeTable } from '../modules/timetable';
import { SourceUnavailableError } from '../types/app-errors';
import { toDayKey } from '../utils/timing';

const HOUR_MS = 60 * 60 * 1000;
const PRIMARY_URL = 'https://media.example.test/adhan.mp3';

// ============================================
// Test Doubles
// ============================================

class MemoryStateManager implements IStateManager {
    public readonly saved: PersistentState[] = [];

    constructor(private _stored: PersistentState | null = null) {}

    async load(): Promise<PersistentState | null> {
        return this._stored;
    }

    async save(state: PersistentState): Promise<void> {
        this.saved.push(state);
    }

    async clear(): Promise<void> {
        this._stored = null;
    }

    createDefaultState(): PersistentState {
        return { version: 1, settings: null, assets: {}, lastUpdated: 0 };
    }

    lastSaved(): PersistentState | undefined {
        return this.saved[this.saved.length - 1];
    }
}

function futureTable(day: string): TimeTable {
    const base = Date.now();
    return {
        day,
        times: {
            [EventKind.Fajr]: base + 1 * HOUR_MS,
            [EventKind.Sunrise]: base + 2 * HOUR_MS,
            [EventKind.Dhuhr]: base + 3 * HOUR_MS,
            [EventKind.Asr]: base + 4 * HOUR_MS,
            [EventKind.Maghrib]: base + 5 * HOUR_MS,
            [EventKind.Isha]: base + 6 * HOUR_MS,
        },
        source: 'calculation',
        method: 'test method',
        hijriDate: null,
        fetchedAt: base,
    };
}

describe('AppOrchestrator', () => {
    let dir: string;
    let config: AppConfig;
    let stateManager: MemoryStateManager;
    let fetchAudio: jest.Mock<Promise<string>, [string, string, AbortSignal?]>;
    let fetchTable: jest.Mock<Promise<TimeTable>, [string]>;
    let orchestrator: AppOrchestrator;

    function dependencies(): OrchestratorDependencies {
        const audioSource: IAudioSource = { fetch: fetchAudio };
        const gateway: IDeviceGateway = {
            callService: async () => undefined,
            getState: async () => null,
        };
        return {
            stateManager,
            audioSource,
            gateway,
            createProvider: () => ({ type: 'calculation', fetch: fetchTable }),
        };
    }

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'minaret-app-'));
        config = parseConfig(
            {
                settings: {
                    source: { type: 'calculation', latitude: 21.42, longitude: 39.83, method: 4 },
                    backend: { type: 'cast', entityId: 'media_player.hall', mediaBaseUrl: 'http://127.0.0.1/media' },
                    audio: { primary: PRIMARY_URL },
                },
                gateway: { baseUrl: 'http://gateway.local:8123' },
                cache: { dir: 'cache' },
                server: { host: '127.0.0.1', port: 0 },
            },
            {},
            dir
        );
        stateManager = new MemoryStateManager();
        fetchAudio = jest.fn(async (_reference: string, destination: string, _signal?: AbortSignal) => {
            await fs.writeFile(destination, 'ID3test');
            return destination;
        });
        fetchTable = jest.fn(async (day: string) => futureTable(day));
        orchestrator = new AppOrchestrator();

        jest.spyOn(console, 'info').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        await orchestrator.shutdown();
        await fs.rm(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    describe('start', () => {
        it('should listen and arm the enabled kinds', async () => {
            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();

            expect(orchestrator.isReady()).toBe(true);
            expect(orchestrator.getServerAddress()?.port).toBeGreaterThan(0);
            expect(fetchTable).toHaveBeenCalledWith(toDayKey(Date.now()));
            expect(orchestrator.getScheduler()?.getArmedEntries().map((entry) => entry.kind)).toEqual([
                EventKind.Fajr,
                EventKind.Dhuhr,
                EventKind.Asr,
                EventKind.Maghrib,
                EventKind.Isha,
            ]);
        });

        it('should stay up when the first refresh fails', async () => {
            fetchTable.mockRejectedValue(new SourceUnavailableError('Calculation API unreachable'));

            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();

            expect(orchestrator.isReady()).toBe(true);
            expect(orchestrator.getScheduler()?.getArmedEntries()).toEqual([]);
            expect(console.warn).toHaveBeenCalledWith(
                '[Orchestrator] Initial refresh failed; retrying on the periodic interval'
            );
        });

        it('should prefetch audio and persist the cached path', async () => {
            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();
            await orchestrator.whenPrefetched();

            const destination = path.join(dir, 'cache', 'primary.mp3');
            expect(fetchAudio).toHaveBeenCalledWith(PRIMARY_URL, destination, expect.any(AbortSignal));
            expect(stateManager.lastSaved()?.assets).toEqual({
                primary: { sourceUrl: PRIMARY_URL, path: destination },
            });
        });

        it('should show Downloading while the startup prefetch runs', async () => {
            let markStarted: () => void = () => undefined;
            const started = new Promise<void>((resolve) => {
                markStarted = resolve;
            });
            let release: () => void = () => undefined;
            const gate = new Promise<void>((resolve) => {
                release = resolve;
            });
            fetchAudio.mockImplementationOnce(async (_reference, destination) => {
                markStarted();
                await gate;
                await fs.writeFile(destination, 'ID3test');
                return destination;
            });

            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();
            await started;

            expect(orchestrator.getScheduler()?.getStatus()).toBe('downloading');
            expect(orchestrator.getStatusPublisher()?.getSnapshot().status).toBe('downloading');

            release();
            await orchestrator.whenPrefetched();

            expect(orchestrator.getScheduler()?.getStatus()).toBe('idle');
        });
    });

    describe('persistence', () => {
        it('should prefer persisted settings over the config file', async () => {
            const persisted: Settings = { ...config.settings, offsetMinutes: 7 };
            stateManager = new MemoryStateManager({
                version: 1,
                settings: persisted,
                assets: {},
                lastUpdated: 1,
            });

            await orchestrator.initialize(config, dependencies());

            expect(orchestrator.getScheduler()?.getSettings().offsetMinutes).toBe(7);
        });

        it('should save settings changes', async () => {
            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();

            await orchestrator.getScheduler()?.setOffsetMinutes(-3);

            expect(stateManager.lastSaved()?.settings?.offsetMinutes).toBe(-3);
        });

        it('should fetch new audio when the reference changes', async () => {
            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();
            await orchestrator.whenPrefetched();

            await orchestrator.getScheduler()?.updateSettings({
                audio: { primary: 'https://media.example.test/other.mp3' },
            });
            await orchestrator.whenPrefetched();

            expect(fetchAudio).toHaveBeenLastCalledWith(
                'https://media.example.test/other.mp3',
                path.join(dir, 'cache', 'primary.mp3'),
                expect.any(AbortSignal)
            );
            expect(stateManager.lastSaved()?.assets.primary?.sourceUrl).toBe('https://media.example.test/other.mp3');
        });
    });

    describe('shutdown', () => {
        it('should stop serving and report not ready', async () => {
            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();

            await orchestrator.shutdown();

            expect(orchestrator.isReady()).toBe(false);
            expect(orchestrator.getScheduler()?.getNextRefreshAt()).toBeNull();
        });

        it('should abort a running audio fetch instead of waiting for it', async () => {
            let markStarted: () => void = () => undefined;
            const started = new Promise<void>((resolve) => {
                markStarted = resolve;
            });
            let seenSignal: AbortSignal | undefined;
            fetchAudio.mockImplementation(
                (_reference, _destination, signal) =>
                    new Promise<string>((_resolve, reject) => {
                        seenSignal = signal;
                        signal?.addEventListener('abort', () => reject(new Error('aborted')));
                        markStarted();
                    })
            );

            await orchestrator.initialize(config, dependencies());
            await orchestrator.start();
            await started;

            await orchestrator.shutdown();

            expect(seenSignal?.aborted).toBe(true);
            expect(console.warn).toHaveBeenCalledWith('[AssetCache] Prefetch failed for primary', {
                name: 'FetchError',
                code: 'FETCH_FAILED',
                message: 'aborted',
            });
        });
    });
});
