/**
 * @fileoverview Application Orchestrator - creates and wires every module.
 * @module Orchestrator
 * @version 1.0.0
 *
 * Responsibilities:
 * - Module creation in dependency order
 * - State restoration on startup and persistence on change
 * - Background audio prefetch, shown as Downloading by the scheduler
 * - Ordered shutdown; fetches still running are aborted
 */

import type { AppConfig } from './config/schema';
import { summarizeErrorForLog } from './types';
import type { IDisposable } from './utils';
import {
    AssetCache,
    CompositeAudioSource,
    ExternalToolSource,
    HttpDownloadSource,
    LocalFileSource,
    type AssetRequest,
    type IAudioSource,
} from './modules/assets';
import { ControlServer, type ListeningAddress } from './modules/control';
import { StateManager, type IStateManager, type PersistentState } from './modules/lifecycle';
import { HttpDeviceGateway, createPlaybackDriver, type IDeviceGateway } from './modules/playback';
import { EventScheduler, type IEventScheduler, type Settings, type AudioReferences } from './modules/scheduler';
import { StatusPublisher } from './modules/status';
import type { ITimeTableProvider, TimeTableSourceConfig } from './modules/timetable';

/**
 * Collaborators replaced in tests.
 */
export interface OrchestratorDependencies {
    stateManager?: IStateManager;
    audioSource?: IAudioSource;
    gateway?: IDeviceGateway;
    createProvider?: (source: TimeTableSourceConfig) => ITimeTableProvider;
}

export interface IAppOrchestrator {
    initialize(config: AppConfig, dependencies?: OrchestratorDependencies): Promise<void>;
    start(): Promise<void>;
    shutdown(): Promise<void>;
    isReady(): boolean;
    getScheduler(): IEventScheduler | null;
    getStatusPublisher(): StatusPublisher | null;
    getServerAddress(): ListeningAddress | null;
    /** Settles when the most recent background prefetch has finished */
    whenPrefetched(): Promise<void>;
}

function audioRequests(audio: AudioReferences): AssetRequest[] {
    const requests: AssetRequest[] = [{ id: 'primary', sourceUrl: audio.primary }];
    if (audio.fajr !== null) {
        requests.push({ id: 'fajr', sourceUrl: audio.fajr });
    }
    return requests;
}

function sameAudio(a: AudioReferences, b: AudioReferences): boolean {
    return a.primary === b.primary && a.fajr === b.fajr;
}

/**
 * AppOrchestrator - Central coordinator for all application modules.
 * Single-use: after shutdown the instance is discarded.
 */
export class AppOrchestrator implements IAppOrchestrator {
    private _stateManager: IStateManager | null = null;
    private _state: PersistentState | null = null;
    private _assetCache: AssetCache | null = null;
    private _scheduler: EventScheduler | null = null;
    private _status: StatusPublisher | null = null;
    private _server: ControlServer | null = null;
    private _address: ListeningAddress | null = null;
    private _eventSubscriptions: IDisposable[] = [];
    private _prefetch: Promise<void> = Promise.resolve();
    private _ready = false;

    /**
     * Create all module instances; restores persisted state. Does not start
     * timers or listen.
     */
    async initialize(config: AppConfig, dependencies: OrchestratorDependencies = {}): Promise<void> {
        const debugMode = config.logging.debug;

        this._stateManager = dependencies.stateManager ?? new StateManager(config.stateFile);
        const restored = await this._stateManager.load();
        this._state = restored ?? this._stateManager.createDefaultState();
        const settings = this._state.settings ?? config.settings;
        if (restored?.settings) {
            console.info('[Orchestrator] Restored settings from', config.stateFile);
        }

        const audioSource =
            dependencies.audioSource ??
            new CompositeAudioSource({
                local: new LocalFileSource(),
                direct: new HttpDownloadSource(),
                extractor: new ExternalToolSource({ binary: config.cache.toolBinary }),
            });
        const assetCache = new AssetCache({
            cacheDir: config.cache.dir,
            source: audioSource,
            initialEntries: this._state.assets,
            debugMode,
        });
        this._assetCache = assetCache;

        const gateway = dependencies.gateway ?? new HttpDeviceGateway(config.gateway);
        const scheduler = new EventScheduler({
            settings,
            assetCache,
            createDriver: (backend) => createPlaybackDriver(backend, gateway),
            ...(dependencies.createProvider ? { createProvider: dependencies.createProvider } : {}),
            persistSettings: (next) => this._persistSettings(next),
            debugMode,
        });
        this._scheduler = scheduler;
        this._status = new StatusPublisher(scheduler, assetCache);
        this._server = new ControlServer({
            scheduler,
            status: this._status,
            mediaDir: config.cache.dir,
            host: config.server.host,
            port: config.server.port,
            token: config.server.token,
            debugMode,
        });

        this._setupEventWiring();
    }

    /**
     * Listen, arm the schedule and start fetching audio in the background.
     * A failed first refresh is reported but does not fail startup.
     */
    async start(): Promise<void> {
        if (!this._scheduler || !this._server) {
            throw new Error('Orchestrator not initialized');
        }
        this._address = await this._server.start();
        const result = await this._scheduler.start();
        if (!result.ok) {
            console.warn('[Orchestrator] Initial refresh failed; retrying on the periodic interval');
        }
        this._startPrefetch(this._scheduler.getSettings().audio);
        this._ready = true;
    }

    async shutdown(): Promise<void> {
        this._ready = false;
        for (const subscription of this._eventSubscriptions) {
            subscription.dispose();
        }
        this._eventSubscriptions = [];

        if (this._server) {
            await this._server.stop();
        }
        if (this._scheduler) {
            await this._scheduler.shutdown();
        }
        this._assetCache?.dispose();
        await this._prefetch;
    }

    isReady(): boolean {
        return this._ready;
    }

    getScheduler(): IEventScheduler | null {
        return this._scheduler;
    }

    getStatusPublisher(): StatusPublisher | null {
        return this._status;
    }

    getServerAddress(): ListeningAddress | null {
        return this._address;
    }

    whenPrefetched(): Promise<void> {
        return this._prefetch;
    }

    // ============================================
    // Private Methods
    // ============================================

    private _setupEventWiring(): void {
        const assetCache = this._assetCache;
        if (!assetCache) {
            return;
        }

        this._eventSubscriptions.push(
            assetCache.on('assetStateChange', (asset) => {
                if (asset.state.status !== 'ready') {
                    return;
                }
                this._saveState({ assets: assetCache.persistableEntries() }).catch((error: unknown) => {
                    console.warn('[Orchestrator] Failed to persist asset cache:', summarizeErrorForLog(error));
                });
            })
        );
    }

    private async _persistSettings(next: Settings): Promise<void> {
        const previous = this._scheduler?.getSettings() ?? null;
        await this._saveState({ settings: next });
        if (this._ready && previous !== null && !sameAudio(previous.audio, next.audio)) {
            this._startPrefetch(next.audio);
        }
    }

    private _saveState(patch: Partial<Pick<PersistentState, 'settings' | 'assets'>>): Promise<void> {
        if (!this._stateManager || !this._state) {
            return Promise.resolve();
        }
        this._state = { ...this._state, ...patch };
        return this._stateManager.save(this._state);
    }

    private _startPrefetch(audio: AudioReferences): void {
        const scheduler = this._scheduler;
        if (!scheduler) {
            return;
        }
        const requests = audioRequests(audio);
        this._prefetch = this._prefetch
            .then(() => scheduler.prefetch(requests))
            .then((ready) => {
                console.info(`[Orchestrator] Audio ready: ${ready.length}/${requests.length}`);
            });
    }
}
