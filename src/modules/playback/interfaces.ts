/**
 * @fileoverview Interface definitions for the Playback Driver module.
 * @module modules/playback/interfaces
 * @version 1.0.0
 */

import type { EntityState, PlaybackBackendType } from './types';

/**
 * Home-automation gateway through which targets are commanded.
 */
export interface IDeviceGateway {
    /**
     * Invoke `<domain>.<service>`. Resolves once the gateway accepted the call.
     * @throws PlaybackError on non-2xx, network failure or timeout
     */
    callService(domain: string, service: string, data: Record<string, unknown>): Promise<void>;

    /**
     * Current state of an entity, or null when the gateway does not know it.
     */
    getState(entityId: string): Promise<EntityState | null>;
}

/**
 * Uniform start/stop contract over every playback backend.
 */
export interface IPlaybackDriver {
    readonly backend: PlaybackBackendType;
    /** Entity or device the driver commands */
    readonly target: string;

    /**
     * Start playing a cached file on the target.
     * @throws PlaybackError
     */
    start(filePath: string): Promise<void>;

    /**
     * Stop whatever the target is playing. Nothing playing is success.
     * @throws PlaybackError
     */
    stop(): Promise<void>;
}
