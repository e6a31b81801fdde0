/**
 * @fileoverview Type definitions for the control server.
 * @module modules/control/types
 * @version 1.0.0
 */

import type { IEventScheduler } from '../scheduler/interfaces';
import type { StatusPublisher } from '../status/StatusPublisher';

export interface ControlServerConfig {
    scheduler: IEventScheduler;
    status: StatusPublisher;
    /** Directory served under `/media/` */
    mediaDir: string;
    host: string;
    /** 0 picks a free port */
    port: number;
    /** Bearer token required on every route except `/media/`; null disables auth */
    token: string | null;
    debugMode?: boolean;
}

export interface ErrorBody {
    code: string;
    message: string;
}

/**
 * JSON envelope of every non-media response.
 */
export interface ResponseEnvelope {
    success: boolean;
    data?: unknown;
    error?: ErrorBody;
    meta: { timestamp: string };
}

export interface ListeningAddress {
    host: string;
    port: number;
}
