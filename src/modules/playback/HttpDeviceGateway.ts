/**
 * @fileoverview REST client for the home-automation gateway.
 * @module modules/playback/HttpDeviceGateway
 * @version 1.0.0
 */

import { z } from 'zod';
import { PlaybackError } from '../../types/app-errors';
import { fetchWithTimeout } from '../../utils/http';
import { PLAYBACK_CONSTANTS, PLAYBACK_ERROR_MESSAGES } from './constants';
import type { IDeviceGateway } from './interfaces';
import type { DeviceGatewayConfig, EntityState } from './types';

const EntityStateSchema = z.object({
    entity_id: z.string(),
    state: z.string(),
    attributes: z.record(z.unknown()).optional(),
});

const BACKEND = 'gateway';

/**
 * Bearer-token client:
 * - `POST {baseUrl}/api/services/{domain}/{service}`
 * - `GET {baseUrl}/api/states/{entityId}`
 *
 * @implements {IDeviceGateway}
 */
export class HttpDeviceGateway implements IDeviceGateway {
    private readonly _baseUrl: string;
    private readonly _token: string;
    private readonly _timeoutMs: number;

    constructor(config: DeviceGatewayConfig) {
        this._baseUrl = config.baseUrl.replace(/\/+$/, '');
        this._token = config.token;
        this._timeoutMs = config.timeoutMs ?? PLAYBACK_CONSTANTS.GATEWAY_TIMEOUT_MS;
    }

    public async callService(domain: string, service: string, data: Record<string, unknown>): Promise<void> {
        const response = await this._request(`/api/services/${domain}/${service}`, {
            method: 'POST',
            headers: { ...this._headers(), 'Content-Type': 'application/json' },
            body: JSON.stringify(data),
        });
        if (!response.ok) {
            throw new PlaybackError(BACKEND, `${domain}.${service} rejected with status ${response.status}`, {
                httpStatus: response.status,
            });
        }
    }

    public async getState(entityId: string): Promise<EntityState | null> {
        const response = await this._request(`/api/states/${entityId}`, {
            method: 'GET',
            headers: this._headers(),
        });
        if (response.status === 404) {
            return null;
        }
        if (!response.ok) {
            throw new PlaybackError(BACKEND, `State of ${entityId} unavailable (status ${response.status})`, {
                httpStatus: response.status,
            });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new PlaybackError(BACKEND, PLAYBACK_ERROR_MESSAGES.INVALID_STATE, { entityId });
        }
        const parsed = EntityStateSchema.safeParse(body);
        if (!parsed.success) {
            throw new PlaybackError(BACKEND, PLAYBACK_ERROR_MESSAGES.INVALID_STATE, { entityId });
        }
        return {
            entityId: parsed.data.entity_id,
            state: parsed.data.state,
            attributes: parsed.data.attributes ?? {},
        };
    }

    private _headers(): Record<string, string> {
        return {
            Accept: 'application/json',
            Authorization: `Bearer ${this._token}`,
        };
    }

    private async _request(pathname: string, init: RequestInit): Promise<Response> {
        try {
            return await fetchWithTimeout(this._baseUrl + pathname, init, this._timeoutMs);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new PlaybackError(BACKEND, `Gateway unreachable: ${reason}`, { path: pathname });
        }
    }
}
