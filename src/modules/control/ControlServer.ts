/**
 * @fileoverview HTTP control surface: status, manual trigger and stop,
 * refresh, settings edits, and the cached audio files targets play from.
 * @module modules/control/ControlServer
 * @version 1.0.0
 */

import { createReadStream, promises as fs } from 'node:fs';
import http from 'node:http';
import path from 'node:path';
import { timingSafeEqual } from 'node:crypto';
import { pipeline } from 'node:stream/promises';
import { z } from 'zod';
import { formatZodIssues } from '../../config/schema';
import { CodedError, ConfigError, summarizeErrorForLog } from '../../types/app-errors';
import { ALL_EVENT_KINDS, SCHEDULED_EVENT_KINDS } from '../timetable/constants';
import type { EventKind, ScheduledEventKind } from '../timetable/types';
import type { IEventScheduler } from '../scheduler/interfaces';
import type { StatusPublisher } from '../status/StatusPublisher';
import {
    CONTROL_CONSTANTS,
    CONTROL_ERROR_CODES,
    CONTROL_ERROR_MESSAGES,
    MEDIA_CONTENT_TYPES,
} from './constants';
import type { ControlServerConfig, ErrorBody, ListeningAddress, ResponseEnvelope } from './types';

// ============================================
// Request helpers
// ============================================

class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

const EnabledBodySchema = z.object({ enabled: z.boolean() });
const OffsetBodySchema = z.object({ minutes: z.number().int() });

function sendJson(res: http.ServerResponse, status: number, body: ResponseEnvelope): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

function respond(res: http.ServerResponse, status: number, data: unknown): void {
    sendJson(res, status, { success: true, data, meta: { timestamp: new Date().toISOString() } });
}

function respondError(res: http.ServerResponse, status: number, error: ErrorBody): void {
    sendJson(res, status, { success: false, error, meta: { timestamp: new Date().toISOString() } });
}

function extractBearerToken(header: string | undefined): string | null {
    return header?.startsWith('Bearer ') ? header.slice(7) : null;
}

function tokensMatch(given: string, expected: string): boolean {
    const a = Buffer.from(given);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        size += buffer.length;
        if (size > CONTROL_CONSTANTS.MAX_BODY_BYTES) {
            throw new HttpError(413, CONTROL_ERROR_CODES.BAD_REQUEST, CONTROL_ERROR_MESSAGES.BODY_TOO_LARGE);
        }
        chunks.push(buffer);
    }
    if (chunks.length === 0) {
        return {};
    }
    try {
        return JSON.parse(Buffer.concat(chunks).toString('utf8'));
    } catch {
        throw new HttpError(400, CONTROL_ERROR_CODES.BAD_REQUEST, CONTROL_ERROR_MESSAGES.INVALID_JSON);
    }
}

async function parseBody<S extends z.ZodTypeAny>(req: http.IncomingMessage, schema: S): Promise<z.infer<S>> {
    const parsed = schema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
        throw new HttpError(400, CONTROL_ERROR_CODES.BAD_REQUEST, formatZodIssues(parsed.error.issues));
    }
    return parsed.data;
}

function parseKind(value: string): EventKind {
    const kind = ALL_EVENT_KINDS.find((candidate) => candidate === value);
    if (kind === undefined) {
        throw new HttpError(400, CONTROL_ERROR_CODES.BAD_REQUEST, `${CONTROL_ERROR_MESSAGES.UNKNOWN_KIND}: ${value}`);
    }
    return kind;
}

function parseScheduledKind(value: string): ScheduledEventKind {
    const kind = SCHEDULED_EVENT_KINDS.find((candidate) => candidate === value);
    if (kind === undefined) {
        throw new HttpError(400, CONTROL_ERROR_CODES.BAD_REQUEST, `${CONTROL_ERROR_MESSAGES.UNKNOWN_KIND}: ${value}`);
    }
    return kind;
}

// ============================================
// Routing
// ============================================

type RouteHandler = (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    params: Record<string, string>
) => Promise<void>;

interface Route {
    method: string;
    pattern: RegExp;
    paramNames: string[];
    /** Reachable without the bearer token */
    public: boolean;
    handler: RouteHandler;
}

function route(method: string, routePath: string, handler: RouteHandler, isPublic = false): Route {
    const paramNames: string[] = [];
    const pattern = new RegExp(
        '^' +
            routePath.replace(/:(\w+)/g, (_match: string, name: string) => {
                paramNames.push(name);
                return '([^/]+)';
            }) +
            '$'
    );
    return { method, pattern, paramNames, public: isPublic, handler };
}

/**
 * Control Server.
 * JSON envelope `{ success, data | error, meta }` on every route except
 * `/media/`, which streams files from the cache directory.
 */
export class ControlServer {
    private readonly _scheduler: IEventScheduler;
    private readonly _status: StatusPublisher;
    private readonly _mediaDir: string;
    private readonly _host: string;
    private readonly _port: number;
    private readonly _token: string | null;
    private readonly _debugMode: boolean;
    private readonly _routes: Route[];
    private _server: http.Server | null = null;

    constructor(config: ControlServerConfig) {
        this._scheduler = config.scheduler;
        this._status = config.status;
        this._mediaDir = config.mediaDir;
        this._host = config.host;
        this._port = config.port;
        this._token = config.token;
        this._debugMode = config.debugMode ?? false;
        this._routes = this._buildRoutes();
    }

    /**
     * Begin listening.
     * @returns The bound address (the real port when configured with 0)
     */
    public async start(): Promise<ListeningAddress> {
        if (this._server) {
            throw new Error('Control server already started');
        }
        const server = http.createServer((req, res) => {
            this._handle(req, res).catch((error: unknown) => {
                console.error('[ControlServer] Unhandled request failure:', summarizeErrorForLog(error));
                res.destroy();
            });
        });

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this._port, this._host, () => {
                server.off('error', reject);
                resolve();
            });
        });
        this._server = server;

        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Control server has no TCP address');
        }
        console.info(`[ControlServer] Listening on http://${address.address}:${address.port}`);
        return { host: address.address, port: address.port };
    }

    public async stop(): Promise<void> {
        const server = this._server;
        if (!server) {
            return;
        }
        this._server = null;
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
            server.closeAllConnections();
        });
    }

    private _buildRoutes(): Route[] {
        return [
            route('GET', '/status', async (_req, res) => {
                respond(res, 200, this._status.getSnapshot());
            }),
            route('POST', '/trigger/:kind', async (_req, res, p) => {
                const kind = parseKind(p['kind'] ?? '');
                void this._scheduler.trigger(kind).then(
                    (outcome) => {
                        if (this._debugMode) {
                            console.debug(`[ControlServer] Trigger ${kind}: ${outcome}`);
                        }
                    },
                    (error: unknown) => {
                        console.error(`[ControlServer] Trigger ${kind} failed:`, summarizeErrorForLog(error));
                    }
                );
                respond(res, 202, { kind, accepted: true });
            }),
            route('POST', '/stop', async (_req, res) => {
                await this._scheduler.stop();
                respond(res, 200, { status: this._scheduler.getStatus() });
            }),
            route('POST', '/refresh', async (_req, res) => {
                const result = await this._scheduler.refresh();
                if (result.ok) {
                    respond(res, 200, result);
                    return;
                }
                const lastError = this._scheduler.getLastError();
                respondError(res, 502, {
                    code: lastError?.code ?? CONTROL_ERROR_CODES.INTERNAL_ERROR,
                    message: lastError?.message ?? 'Refresh failed',
                });
            }),
            route('PUT', '/enabled/:kind', async (req, res, p) => {
                const kind = parseScheduledKind(p['kind'] ?? '');
                const body = await parseBody(req, EnabledBodySchema);
                const settings = await this._scheduler.setEnabled(kind, body.enabled);
                respond(res, 200, { enabled: settings.enabled });
            }),
            route('PUT', '/offset', async (req, res) => {
                const body = await parseBody(req, OffsetBodySchema);
                const settings = await this._scheduler.setOffsetMinutes(body.minutes);
                respond(res, 200, { offsetMinutes: settings.offsetMinutes });
            }),
            route('GET', '/media/:file', (req, res, p) => this._serveMedia(req, res, p['file'] ?? ''), true),
            route('HEAD', '/media/:file', (req, res, p) => this._serveMedia(req, res, p['file'] ?? ''), true),
        ];
    }

    private async _handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const url = (req.url ?? '').split('?')[0] ?? '';
        const method = req.method ?? 'GET';

        try {
            for (const r of this._routes) {
                if (r.method !== method) continue;
                const match = url.match(r.pattern);
                if (!match) continue;

                if (!r.public) {
                    this._authorize(req);
                }
                const params: Record<string, string> = {};
                r.paramNames.forEach((name, i) => {
                    params[name] = decodeURIComponent(match[i + 1] ?? '');
                });
                await r.handler(req, res, params);
                this._logRequest(method, url, res.statusCode);
                return;
            }
            throw new HttpError(404, CONTROL_ERROR_CODES.NOT_FOUND, `${method} ${url} not found`);
        } catch (error) {
            this._sendFailure(res, error);
            this._logRequest(method, url, res.statusCode);
        }
    }

    private _authorize(req: http.IncomingMessage): void {
        if (this._token === null) {
            return;
        }
        const token = extractBearerToken(req.headers.authorization);
        if (token === null) {
            throw new HttpError(401, CONTROL_ERROR_CODES.UNAUTHORIZED, CONTROL_ERROR_MESSAGES.MISSING_TOKEN);
        }
        if (!tokensMatch(token, this._token)) {
            throw new HttpError(401, CONTROL_ERROR_CODES.UNAUTHORIZED, CONTROL_ERROR_MESSAGES.INVALID_TOKEN);
        }
    }

    private async _serveMedia(req: http.IncomingMessage, res: http.ServerResponse, file: string): Promise<void> {
        const ext = path.extname(file).toLowerCase();
        const contentType = MEDIA_CONTENT_TYPES[ext];
        if (file !== path.basename(file) || file.startsWith('.') || contentType === undefined) {
            throw new HttpError(404, CONTROL_ERROR_CODES.NOT_FOUND, `Media ${file} not found`);
        }

        const filePath = path.join(this._mediaDir, file);
        const stats = await fs.stat(filePath).catch(() => null);
        if (stats === null || !stats.isFile()) {
            throw new HttpError(404, CONTROL_ERROR_CODES.NOT_FOUND, `Media ${file} not found`);
        }

        res.writeHead(200, { 'Content-Type': contentType, 'Content-Length': stats.size });
        if (req.method === 'HEAD') {
            res.end();
            return;
        }
        await pipeline(createReadStream(filePath), res);
    }

    private _sendFailure(res: http.ServerResponse, error: unknown): void {
        if (res.headersSent) {
            console.warn('[ControlServer] Response aborted:', summarizeErrorForLog(error));
            res.destroy();
            return;
        }
        if (error instanceof HttpError) {
            respondError(res, error.status, { code: error.code, message: error.message });
            return;
        }
        if (error instanceof URIError) {
            respondError(res, 400, { code: CONTROL_ERROR_CODES.BAD_REQUEST, message: error.message });
            return;
        }
        if (error instanceof ConfigError) {
            respondError(res, 400, { code: error.code, message: error.message });
            return;
        }
        console.error('[ControlServer] Request failed:', summarizeErrorForLog(error));
        respondError(res, 500, {
            code: error instanceof CodedError ? error.code : CONTROL_ERROR_CODES.INTERNAL_ERROR,
            message: error instanceof Error ? error.message : String(error),
        });
    }

    private _logRequest(method: string, url: string, status: number): void {
        if (this._debugMode) {
            console.debug(`[ControlServer] ${method} ${url} -> ${status}`);
        }
    }
}
