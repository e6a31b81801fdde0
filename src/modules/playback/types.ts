/**
 * @fileoverview Type definitions for the Playback Driver module.
 * @module modules/playback/types
 * @version 1.0.0
 */

export type PlaybackBackendType = 'cast' | 'wakeAndLaunch';

/**
 * Media player entity driven through play/stop service calls.
 */
export interface CastBackendConfig {
    type: 'cast';
    /** Media player entity id, e.g. `media_player.kitchen` */
    entityId: string;
    /** Base URL under which the target can reach cached files */
    mediaBaseUrl: string;
}

/**
 * Device that must be woken before an external player is launched on it.
 */
export interface WakeAndLaunchBackendConfig {
    type: 'wakeAndLaunch';
    /** Notify service name of the device, e.g. `mobile_app_tablet` */
    notifyService: string;
    mediaBaseUrl: string;
    /**
     * When true the launch follows the acknowledged wake immediately;
     * otherwise it waits `wakeGraceMs` after the wake.
     */
    acknowledgeWake: boolean;
    wakeGraceMs?: number;
    /** Package of the external player */
    playerPackage?: string;
}

export type PlaybackBackendConfig = CastBackendConfig | WakeAndLaunchBackendConfig;

/**
 * Entity state as reported by the device gateway.
 */
export interface EntityState {
    entityId: string;
    state: string;
    attributes: Record<string, unknown>;
}

export interface DeviceGatewayConfig {
    baseUrl: string;
    token: string;
    timeoutMs?: number;
}
