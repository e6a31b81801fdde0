/**
 * @fileoverview Cancellable timer keyed by a wall-clock instant.
 * @module modules/scheduler/PointInTimeTimer
 * @version 1.0.0
 */

import { MAX_TIMER_SLICE_MS } from './constants';

/**
 * Fires `callback` once `Date.now()` reaches `targetTime`.
 *
 * Waits in slices of at most `maxSliceMs` and re-reads the wall clock after
 * each one, so clock adjustments and host suspension move the firing with the
 * wall clock instead of the elapsed-time counter.
 */
export class PointInTimeTimer {
    private _handle: ReturnType<typeof setTimeout> | null = null;
    private _armed = false;

    constructor(
        public readonly targetTime: number,
        private readonly _callback: () => void,
        private readonly _maxSliceMs: number = MAX_TIMER_SLICE_MS
    ) {}

    public start(): this {
        if (!this._armed) {
            this._armed = true;
            this._wait();
        }
        return this;
    }

    public cancel(): void {
        this._armed = false;
        if (this._handle !== null) {
            clearTimeout(this._handle);
            this._handle = null;
        }
    }

    public isArmed(): boolean {
        return this._armed;
    }

    private _wait(): void {
        const remaining = this.targetTime - Date.now();
        if (remaining <= 0) {
            this._handle = null;
            this._armed = false;
            this._callback();
            return;
        }
        this._handle = setTimeout(() => {
            if (this._armed) {
                this._wait();
            }
        }, Math.min(remaining, this._maxSliceMs));
    }
}
