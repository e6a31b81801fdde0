/**
 * @fileoverview Public exports for the Playback Driver module.
 * @module modules/playback
 * @version 1.0.0
 */

export { CastDriver, toPlaybackError } from './CastDriver';
export { WakeAndLaunchDriver } from './WakeAndLaunchDriver';
export { HttpDeviceGateway } from './HttpDeviceGateway';
export { createPlaybackDriver } from './createPlaybackDriver';
export { buildMediaUrl } from './mediaUrl';
export { PLAYBACK_CONSTANTS, ACTIVE_MEDIA_STATES, DEVICE_COMMANDS, PLAYBACK_ERROR_MESSAGES } from './constants';
export type { IDeviceGateway, IPlaybackDriver } from './interfaces';
export type {
    PlaybackBackendType,
    PlaybackBackendConfig,
    CastBackendConfig,
    WakeAndLaunchBackendConfig,
    EntityState,
    DeviceGatewayConfig,
} from './types';
