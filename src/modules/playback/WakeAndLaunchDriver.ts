/**
 * @fileoverview Playback driver for devices that are woken, then told to
 * open the media URL in an external player.
 * @module modules/playback/WakeAndLaunchDriver
 * @version 1.0.0
 */

import { delay } from '../../utils/timing';
import { DEVICE_COMMANDS, PLAYBACK_CONSTANTS, PLAYBACK_ERROR_MESSAGES } from './constants';
import { toPlaybackError } from './CastDriver';
import type { IDeviceGateway, IPlaybackDriver } from './interfaces';
import { buildMediaUrl } from './mediaUrl';
import type { WakeAndLaunchBackendConfig } from './types';

const NOTIFY_DOMAIN = 'notify';

/**
 * Start sequence: wake, then launch. The launch never precedes the wake:
 * with `acknowledgeWake` it follows the gateway's acceptance of the wake,
 * otherwise it also waits out the grace delay.
 *
 * @implements {IPlaybackDriver}
 */
export class WakeAndLaunchDriver implements IPlaybackDriver {
    public readonly backend = 'wakeAndLaunch' as const;
    public readonly target: string;
    private readonly _playerPackage: string;
    private readonly _graceMs: number;

    constructor(
        private readonly _config: WakeAndLaunchBackendConfig,
        private readonly _gateway: IDeviceGateway
    ) {
        this.target = _config.notifyService;
        this._playerPackage = _config.playerPackage ?? PLAYBACK_CONSTANTS.DEFAULT_PLAYER_PACKAGE;
        this._graceMs = _config.wakeGraceMs ?? PLAYBACK_CONSTANTS.DEFAULT_WAKE_GRACE_MS;
    }

    public async start(filePath: string): Promise<void> {
        const mediaUrl = buildMediaUrl(this._config.mediaBaseUrl, filePath);

        try {
            await this._notify(DEVICE_COMMANDS.SCREEN_ON, {});
        } catch (error) {
            throw toPlaybackError(this.backend, PLAYBACK_ERROR_MESSAGES.WAKE_FAILED, error);
        }
        if (!this._config.acknowledgeWake) {
            await delay(this._graceMs);
        }

        console.info(`[WakeAndLaunchDriver] Launching ${mediaUrl} on ${this.target}`);
        try {
            await this._notify(DEVICE_COMMANDS.ACTIVITY, {
                intent_action: DEVICE_COMMANDS.VIEW_INTENT,
                intent_uri: mediaUrl,
                intent_type: PLAYBACK_CONSTANTS.MEDIA_MIME_TYPE,
                intent_package_name: this._playerPackage,
            });
        } catch (error) {
            throw toPlaybackError(this.backend, PLAYBACK_ERROR_MESSAGES.START_FAILED, error);
        }
    }

    public async stop(): Promise<void> {
        try {
            await this._notify(DEVICE_COMMANDS.MEDIA, {
                media_command: 'stop',
                media_package_name: this._playerPackage,
            });
        } catch (error) {
            throw toPlaybackError(this.backend, PLAYBACK_ERROR_MESSAGES.STOP_FAILED, error);
        }
    }

    private _notify(message: string, data: Record<string, unknown>): Promise<void> {
        return this._gateway.callService(NOTIFY_DOMAIN, this.target, {
            message,
            data: { ...data, ttl: 0, priority: 'high' },
        });
    }
}
