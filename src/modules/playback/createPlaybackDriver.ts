/**
 * @fileoverview Factory that dispatches a backend configuration to its driver.
 * @module modules/playback/createPlaybackDriver
 */

import { CastDriver } from './CastDriver';
import type { IDeviceGateway, IPlaybackDriver } from './interfaces';
import type { PlaybackBackendConfig } from './types';
import { WakeAndLaunchDriver } from './WakeAndLaunchDriver';

export function createPlaybackDriver(config: PlaybackBackendConfig, gateway: IDeviceGateway): IPlaybackDriver {
    switch (config.type) {
        case 'cast':
            return new CastDriver(config, gateway);
        case 'wakeAndLaunch':
            return new WakeAndLaunchDriver(config, gateway);
    }
}
