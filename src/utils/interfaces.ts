/**
 * @fileoverview Interface definitions for shared utilities.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable handle returned by subscriptions and timers.
 */
export interface IDisposable {
    /**
     * Release the resource. Calling more than once is a no-op.
     */
    dispose(): void;
}

/**
 * Type-safe event emitter with listener error isolation.
 *
 * @template TEventMap - Maps event names to payload types
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    on<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): IDisposable;
    off<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): void;
    once<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): IDisposable;
    /**
     * Deliver a payload to every listener. A throwing listener is logged and
     * does not prevent delivery to the others.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;
    removeAllListeners(event?: keyof TEventMap): void;
    listenerCount(event: keyof TEventMap): number;
}
