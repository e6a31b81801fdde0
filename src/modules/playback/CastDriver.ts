/**
 * @fileoverview Playback driver for media player entities.
 * @module modules/playback/CastDriver
 * @version 1.0.0
 */

import { PlaybackError } from '../../types/app-errors';
import { ACTIVE_MEDIA_STATES, PLAYBACK_CONSTANTS, PLAYBACK_ERROR_MESSAGES } from './constants';
import type { IDeviceGateway, IPlaybackDriver } from './interfaces';
import { buildMediaUrl } from './mediaUrl';
import type { CastBackendConfig } from './types';

/**
 * Wrap any failure as a PlaybackError for `backend`.
 */
export function toPlaybackError(backend: string, prefix: string, error: unknown): PlaybackError {
    const reason = error instanceof Error ? error.message : String(error);
    return new PlaybackError(backend, `${prefix}: ${reason}`);
}

/**
 * @implements {IPlaybackDriver}
 */
export class CastDriver implements IPlaybackDriver {
    public readonly backend = 'cast' as const;
    public readonly target: string;

    constructor(
        private readonly _config: CastBackendConfig,
        private readonly _gateway: IDeviceGateway
    ) {
        this.target = _config.entityId;
    }

    public async start(filePath: string): Promise<void> {
        const mediaUrl = buildMediaUrl(this._config.mediaBaseUrl, filePath);
        console.info(`[CastDriver] Playing ${mediaUrl} on ${this.target}`);
        try {
            await this._gateway.callService('media_player', 'play_media', {
                entity_id: this.target,
                media_content_id: mediaUrl,
                media_content_type: PLAYBACK_CONSTANTS.MEDIA_CONTENT_TYPE,
            });
        } catch (error) {
            throw toPlaybackError(this.backend, PLAYBACK_ERROR_MESSAGES.START_FAILED, error);
        }
    }

    public async stop(): Promise<void> {
        try {
            const state = await this._gateway.getState(this.target);
            if (state === null || !ACTIVE_MEDIA_STATES.includes(state.state)) {
                return;
            }
            await this._gateway.callService('media_player', 'media_stop', { entity_id: this.target });
            console.info(`[CastDriver] Stopped ${this.target}`);
        } catch (error) {
            throw toPlaybackError(this.backend, PLAYBACK_ERROR_MESSAGES.STOP_FAILED, error);
        }
    }
}
