/**
 * @fileoverview Type-safe event emitter with error isolation.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { IEventEmitter, IDisposable } from './interfaces';

type Listener = (payload: unknown) => void;

/**
 * Type-safe event emitter. One listener's error does not stop delivery to
 * the remaining listeners.
 *
 * @example
 * ```typescript
 * interface SchedulerEvents {
 *   statusChange: { from: PlaybackStatus; to: PlaybackStatus };
 * }
 *
 * const emitter = new EventEmitter<SchedulerEvents>();
 * const sub = emitter.on('statusChange', (change) => console.log(change.to));
 * sub.dispose();
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private readonly _listeners = new Map<keyof TEventMap, Listener[]>();

    constructor(private readonly _name: string = 'EventEmitter') {}

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const list = this._listeners.get(event) ?? [];
        list.push(handler as Listener);
        this._listeners.set(event, list);

        let disposed = false;
        return {
            dispose: (): void => {
                if (disposed) return;
                disposed = true;
                this.off(event, handler);
            },
        };
    }

    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        const list = this._listeners.get(event);
        if (!list) return;
        const index = list.indexOf(handler as Listener);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            this._listeners.delete(event);
        }
    }

    public once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const wrapped = (payload: TEventMap[K]): void => {
            this.off(event, wrapped);
            handler(payload);
        };
        return this.on(event, wrapped);
    }

    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
        const list = this._listeners.get(event);
        if (!list) return;

        // Copy so listeners may unsubscribe while we iterate
        for (const listener of [...list]) {
            try {
                listener(payload);
            } catch (error) {
                console.error(`[${this._name}] Listener error for '${String(event)}':`, error);
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event === undefined) {
            this._listeners.clear();
            return;
        }
        this._listeners.delete(event);
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._listeners.get(event)?.length ?? 0;
    }
}
