/**
 * Containment boundary for every externally triggered step.
 *
 * Edge handlers and timer bodies run on the host's event loop. A throw
 * there would reach the host process, so each entry point goes through
 * {@link runContained}: the failure becomes an `error` event and the step
 * simply produces no new state.
 *
 * @module
 */
import { type ContainedStep } from './DebugObserver.js';

/** Receives the step name and message of a contained failure. */
export type FailureReporter = (step: ContainedStep, message: string) => void;

function describe(err: unknown): string {
    if (err instanceof Error) return err.message || err.name;
    return String(err);
}

/**
 * Run `fn` and swallow anything it throws after reporting it.
 *
 * A reporter that throws while reporting is ignored as well.
 *
 * @returns The value of `fn`, or `undefined` when it threw
 */
export function runContained<T>(
    step: ContainedStep,
    fn: () => T,
    report: FailureReporter,
): T | undefined {
    try {
        return fn();
    } catch (err) {
        try {
            report(step, describe(err));
        } catch {
            // The reporter is the last line; nothing left to tell.
        }
        return undefined;
    }
}
