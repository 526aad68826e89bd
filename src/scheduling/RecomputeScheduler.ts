/**
 * RecomputeScheduler — Burst Coalescing for Inference Passes
 *
 * Every accepted sensor edge calls {@link RecomputeScheduler.schedule}.
 * Each call cancels the pending pass and arms a new one, so a burst of
 * edges collapses into a single pass that runs once the sensors have
 * been quiet for `delay` seconds and sees the state after the last edge.
 *
 * The pass runs synchronously when the timer fires and the scheduler
 * does not re-arm itself.
 *
 * @module
 */
import { type FailureReporter, runContained } from '../observability/contain.js';
import { SingleShotTask } from './SingleShotTask.js';

/** Inference pass body. Receives the label of the last trigger. */
export type RecomputePass = (reason: string) => void;

export class RecomputeScheduler {
    private readonly _task: SingleShotTask;
    private _reason = 'startup';

    /**
     * @param pass - Inference pass to run on fire
     * @param report - Receives failures thrown by `pass`
     */
    constructor(pass: RecomputePass, report: FailureReporter) {
        this._task = new SingleShotTask(() => {
            runContained('recompute', () => pass(this._reason), report);
        });
    }

    /**
     * Replace any pending pass with one that fires `delaySeconds` from now.
     *
     * @param reason - Trigger label kept for diagnostics (last one wins)
     * @param delaySeconds - Quiet period; 0 fires on the next timer tick
     */
    schedule(reason: string, delaySeconds: number): void {
        this._reason = reason;
        this._task.arm(delaySeconds);
    }

    /** Drop the pending pass without running it. */
    cancel(): void {
        this._task.cancel();
    }

    /** Whether a pass is waiting to fire. */
    get pending(): boolean {
        return this._task.armed;
    }

    /** Trigger label the next (or last) pass carries. */
    get reason(): string {
        return this._reason;
    }
}
