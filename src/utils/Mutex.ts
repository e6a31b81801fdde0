/**
 * @fileoverview Minimal async mutual-exclusion region.
 * @module utils/Mutex
 * @version 1.0.0
 */

/**
 * FIFO async lock. Callers queue on a promise chain; a rejected task releases
 * the lock exactly like a fulfilled one.
 */
export class Mutex {
    private _tail: Promise<void> = Promise.resolve();
    private _pending = 0;

    /**
     * Run `task` once every previously queued task has settled.
     * @returns The task's result
     */
    public runExclusive<T>(task: () => Promise<T>): Promise<T> {
        this._pending++;
        const run = this._tail.then(task);
        this._tail = run.then(
            () => this._release(),
            () => this._release()
        );
        return run;
    }

    /** True while a task holds or waits for the lock. */
    public isLocked(): boolean {
        return this._pending > 0;
    }

    private _release(): void {
        this._pending--;
    }
}
