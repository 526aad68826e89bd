/**
 * SingleShotTask + RecomputeScheduler — Test Suite
 *
 * Covers: single fire, re-arm replaces, cancel, zero delay, clamping,
 * re-arming from inside the body, burst coalescing, reason tracking,
 * and failure containment on fire.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SingleShotTask } from '../../src/scheduling/SingleShotTask.js';
import { RecomputeScheduler } from '../../src/scheduling/RecomputeScheduler.js';
import type { ContainedStep } from '../../src/observability/DebugObserver.js';

beforeEach(() => { vi.useFakeTimers(); });
afterEach(() => { vi.useRealTimers(); });

// ============================================================================
// SingleShotTask
// ============================================================================

describe('SingleShotTask', () => {
    it('should fire once after the delay', () => {
        const run = vi.fn();
        const task = new SingleShotTask(run);

        task.arm(0.5);
        vi.advanceTimersByTime(499);
        expect(run).not.toHaveBeenCalled();
        expect(task.armed).toBe(true);

        vi.advanceTimersByTime(1);
        expect(run).toHaveBeenCalledOnce();
        expect(task.armed).toBe(false);

        vi.advanceTimersByTime(10_000);
        expect(run).toHaveBeenCalledOnce();
    });

    it('should replace the pending timer when armed again', () => {
        const run = vi.fn();
        const task = new SingleShotTask(run);

        task.arm(0.2);
        vi.advanceTimersByTime(150);
        task.arm(0.2);
        vi.advanceTimersByTime(150);
        expect(run).not.toHaveBeenCalled();

        vi.advanceTimersByTime(50);
        expect(run).toHaveBeenCalledOnce();
    });

    it('should not fire after cancel', () => {
        const run = vi.fn();
        const task = new SingleShotTask(run);

        task.arm(0.1);
        task.cancel();
        task.cancel();
        vi.advanceTimersByTime(1000);
        expect(run).not.toHaveBeenCalled();
        expect(task.armed).toBe(false);
    });

    it('should fire a zero delay on the next tick, not synchronously', () => {
        const run = vi.fn();
        const task = new SingleShotTask(run);

        task.arm(0);
        expect(run).not.toHaveBeenCalled();
        vi.advanceTimersByTime(0);
        expect(run).toHaveBeenCalledOnce();
    });

    it('should clamp negative and non-finite delays to 0', () => {
        const run = vi.fn();
        const task = new SingleShotTask(run);

        task.arm(-3);
        vi.advanceTimersByTime(0);
        task.arm(Number.NaN);
        vi.advanceTimersByTime(0);
        expect(run).toHaveBeenCalledTimes(2);
    });

    it('should allow the body to re-arm the same task', () => {
        let fires = 0;
        const task: SingleShotTask = new SingleShotTask(() => {
            fires++;
            if (fires < 3) task.arm(0.1);
        });

        task.arm(0.1);
        vi.advanceTimersByTime(1000);
        expect(fires).toBe(3);
        expect(task.armed).toBe(false);
    });
});

// ============================================================================
// RecomputeScheduler
// ============================================================================

describe('RecomputeScheduler', () => {
    it('should collapse a burst into one pass after the quiet period', () => {
        const pass = vi.fn();
        const scheduler = new RecomputeScheduler(pass, vi.fn());

        scheduler.schedule('t0', 0.05);
        vi.advanceTimersByTime(20);
        scheduler.schedule('t1', 0.05);
        vi.advanceTimersByTime(20);
        scheduler.schedule('e', 0.05);
        vi.advanceTimersByTime(49);
        expect(pass).not.toHaveBeenCalled();

        vi.advanceTimersByTime(1);
        expect(pass).toHaveBeenCalledOnce();
        expect(pass).toHaveBeenCalledWith('e');
    });

    it('should run separate passes for edges further apart than the delay', () => {
        const pass = vi.fn();
        const scheduler = new RecomputeScheduler(pass, vi.fn());

        scheduler.schedule('t0', 0.05);
        vi.advanceTimersByTime(60);
        scheduler.schedule('t1', 0.05);
        vi.advanceTimersByTime(60);

        expect(pass.mock.calls).toEqual([['t0'], ['t1']]);
    });

    it('should not re-arm itself after firing', () => {
        const pass = vi.fn();
        const scheduler = new RecomputeScheduler(pass, vi.fn());

        scheduler.schedule('startup', 0);
        vi.advanceTimersByTime(0);
        expect(scheduler.pending).toBe(false);
        vi.advanceTimersByTime(10_000);
        expect(pass).toHaveBeenCalledOnce();
    });

    it('should keep the last reason', () => {
        const scheduler = new RecomputeScheduler(vi.fn(), vi.fn());
        expect(scheduler.reason).toBe('startup');
        scheduler.schedule('t2', 1);
        expect(scheduler.reason).toBe('t2');
        expect(scheduler.pending).toBe(true);
    });

    it('should drop the pending pass on cancel', () => {
        const pass = vi.fn();
        const scheduler = new RecomputeScheduler(pass, vi.fn());

        scheduler.schedule('t0', 0.1);
        scheduler.cancel();
        vi.advanceTimersByTime(1000);
        expect(pass).not.toHaveBeenCalled();
    });

    it('should contain a failing pass and keep scheduling', () => {
        const failures: Array<[ContainedStep, string]> = [];
        const pass = vi.fn()
            .mockImplementationOnce(() => { throw new Error('sensor table corrupt'); })
            .mockImplementationOnce(() => undefined);
        const scheduler = new RecomputeScheduler(pass, (step, message) => failures.push([step, message]));

        scheduler.schedule('t0', 0);
        expect(() => vi.advanceTimersByTime(0)).not.toThrow();
        expect(failures).toEqual([['recompute', 'sensor table corrupt']]);

        scheduler.schedule('t1', 0);
        vi.advanceTimersByTime(0);
        expect(pass).toHaveBeenCalledTimes(2);
        expect(failures).toHaveLength(1);
    });
});
