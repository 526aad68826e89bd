/**
 * SingleShotTask — Cancellable, Re-armable One-Shot Timer
 *
 * Owns at most one outstanding timer. Arming again replaces (and cancels)
 * the previous timer instead of stacking a second one, so only the most
 * recent arm ever fires.
 *
 * ```
 *   arm(0.5) ──► arm(0.5) ──► arm(0.5) ──► (quiet 0.5s) ──► run()
 *      ✗ cancelled   ✗ cancelled
 * ```
 *
 * The handle is released before `run` is called, so `run` may re-arm
 * the same task.
 *
 * @module
 */

export class SingleShotTask {
    private readonly _run: () => void;
    private _handle: ReturnType<typeof setTimeout> | undefined;

    /**
     * @param run - Body executed when the timer fires. Must not throw;
     *   wrap it with `runContained()` at the call site.
     */
    constructor(run: () => void) {
        this._run = run;
    }

    /**
     * Cancel any pending timer and arm a new one.
     *
     * @param delaySeconds - Seconds from now. Negative or non-finite values
     *   are clamped to 0, which fires on the next timer tick.
     */
    arm(delaySeconds: number): void {
        this.cancel();
        const delayMs = Number.isFinite(delaySeconds) ? Math.max(0, delaySeconds) * 1000 : 0;
        this._handle = setTimeout(() => {
            this._handle = undefined;
            this._run();
        }, delayMs);
    }

    /** Discard the pending timer, if any. Idempotent. */
    cancel(): void {
        if (this._handle === undefined) return;
        clearTimeout(this._handle);
        this._handle = undefined;
    }

    /** Whether a timer is currently outstanding. */
    get armed(): boolean {
        return this._handle !== undefined;
    }
}
