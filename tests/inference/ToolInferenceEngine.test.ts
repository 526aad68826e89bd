/**
 * ToolInferenceEngine + InferredTool — Test Suite
 *
 * Covers the decision table row by row, invalid values, N = 0,
 * absent sensors, diagnostics, and the integer status projection.
 */
import { describe, it, expect } from 'vitest';
import { inferTool } from '../../src/inference/ToolInferenceEngine.js';
import {
    fromStatusCode,
    mountedTool,
    toStatusCode,
    unknownTool,
    unmountedTool,
} from '../../src/inference/InferredTool.js';

function snap(values: Record<string, number>): Map<string, number> {
    return new Map(Object.entries(values));
}

// ============================================================================
// Decision Table
// ============================================================================

describe('inferTool — decision table', () => {
    it('should report unmounted when disengaged and every bay occupied', () => {
        for (const n of [1, 2, 5]) {
            const values: Record<string, number> = { e: 0 };
            for (let i = 0; i < n; i++) values[`t${i}`] = 1;
            expect(inferTool(snap(values), n).tool).toEqual({ kind: 'unmounted' });
        }
    });

    it('should report the single empty bay when engaged', () => {
        for (let empty = 0; empty < 4; empty++) {
            const values: Record<string, number> = { e: 1 };
            for (let i = 0; i < 4; i++) values[`t${i}`] = i === empty ? 0 : 1;
            expect(inferTool(snap(values), 4).tool).toEqual({ kind: 'mounted', index: empty });
        }
    });

    it('should report unknown when engaged with two empty bays', () => {
        const result = inferTool(snap({ e: 1, t0: 0, t1: 0, t2: 1 }), 3);
        expect(result.tool).toEqual({ kind: 'unknown' });
    });

    it('should report unknown when engaged with every bay occupied', () => {
        expect(inferTool(snap({ e: 1, t0: 1, t1: 1 }), 2).tool).toEqual({ kind: 'unknown' });
    });

    it('should report unknown when disengaged with an empty bay', () => {
        expect(inferTool(snap({ e: 0, t0: 1, t1: 0 }), 2).tool).toEqual({ kind: 'unknown' });
    });

    it('should report unknown for the all-zero startup snapshot', () => {
        const result = inferTool(snap({ e: 0, t0: 0, t1: 0, t2: 0 }), 3);
        expect(result.tool).toEqual({ kind: 'unknown' });
        expect(result.diagnostics).toEqual({
            toolCount: 3, engaged: 0, occupied: 0, empties: 3, invalid: false,
        });
    });

    it('should follow a mount / unmount sequence', () => {
        expect(inferTool(snap({ e: 1, t0: 1, t1: 0, t2: 1 }), 3).tool)
            .toEqual({ kind: 'mounted', index: 1 });
        expect(inferTool(snap({ e: 0, t0: 1, t1: 1, t2: 1 }), 3).tool)
            .toEqual({ kind: 'unmounted' });
    });

    it('should mount bay 0 on a single-bay machine', () => {
        expect(inferTool(snap({ e: 1, t0: 0 }), 1).tool).toEqual({ kind: 'mounted', index: 0 });
    });
});

// ============================================================================
// Invalid Values & Absent Sensors
// ============================================================================

describe('inferTool — invalid and absent values', () => {
    it('should report unknown for an engagement value outside {0, 1}', () => {
        const result = inferTool(snap({ e: 2, t0: 1, t1: 1 }), 2);
        expect(result.tool).toEqual({ kind: 'unknown' });
        expect(result.diagnostics.invalid).toBe(true);
    });

    it('should report unknown for a bay value outside {0, 1}', () => {
        const result = inferTool(snap({ e: 1, t0: 0, t1: -1 }), 2);
        expect(result.tool).toEqual({ kind: 'unknown' });
        expect(result.diagnostics.invalid).toBe(true);
    });

    it('should not let an invalid value that balances the sum pass', () => {
        // S = 2 + 0 = 2 = N, but t0 is invalid
        const result = inferTool(snap({ e: 0, t0: 2, t1: 0 }), 2);
        expect(result.tool).toEqual({ kind: 'unknown' });
        expect(result.diagnostics.occupied).toBe(2);
    });

    it('should read an absent engagement sensor as 0', () => {
        const result = inferTool(snap({ t0: 1, t1: 1 }), 2);
        expect(result.tool).toEqual({ kind: 'unmounted' });
        expect(result.diagnostics.engaged).toBe(0);
    });

    it('should read a missing bay in a gap as empty', () => {
        // t1 not configured: reads 0, so it is the single empty bay
        const result = inferTool(snap({ e: 1, t0: 1, t2: 1 }), 3);
        expect(result.tool).toEqual({ kind: 'mounted', index: 1 });
    });

    it('should ignore labels that are neither e nor t<i>', () => {
        const result = inferTool(snap({ e: 0, t0: 1, aux: 7 }), 1);
        expect(result.tool).toEqual({ kind: 'unmounted' });
        expect(result.diagnostics.invalid).toBe(false);
    });
});

// ============================================================================
// No Bays
// ============================================================================

describe('inferTool — N = 0', () => {
    it('should always report unknown, even with a valid engagement sensor', () => {
        const result = inferTool(snap({ e: 1 }), 0);
        expect(result.tool).toEqual({ kind: 'unknown' });
        expect(result.diagnostics).toEqual({
            toolCount: 0, engaged: null, occupied: null, empties: null, invalid: true,
        });
    });
});

// ============================================================================
// Status Codes
// ============================================================================

describe('InferredTool — status codes', () => {
    it('should project each variant onto its integer', () => {
        expect(toStatusCode(unknownTool())).toBe(-2);
        expect(toStatusCode(unmountedTool())).toBe(-1);
        expect(toStatusCode(mountedTool(0))).toBe(0);
        expect(toStatusCode(mountedTool(4))).toBe(4);
    });

    it('should map codes back to variants', () => {
        expect(fromStatusCode(-1)).toEqual({ kind: 'unmounted' });
        expect(fromStatusCode(3)).toEqual({ kind: 'mounted', index: 3 });
        expect(fromStatusCode(-2)).toEqual({ kind: 'unknown' });
        expect(fromStatusCode(-7)).toEqual({ kind: 'unknown' });
        expect(fromStatusCode(1.5)).toEqual({ kind: 'unknown' });
    });
});
