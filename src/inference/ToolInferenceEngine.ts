/**
 * ToolInferenceEngine — Sensor Snapshot → Tool Identity
 *
 * Pure function of the sensor snapshot and the tool count N. It commits
 * to an identity only when the engagement sensor and the bay sensors
 * agree:
 *
 * ```
 *   invalid value anywhere          → unknown
 *   e = 0, every bay occupied       → unmounted
 *   e = 1, exactly one bay empty    → mounted(empty bay)
 *   anything else                   → unknown
 * ```
 *
 * Transient combinations seen during a physical tool change fall into the
 * last row and are reported as `unknown`, never guessed.
 *
 * @module
 */
import { ENGAGED_LABEL, bayLabel } from '../sensors/SensorLabel.js';
import { type SensorSnapshot } from '../sensors/SensorStateStore.js';
import {
    type InferredTool,
    mountedTool,
    unknownTool,
    unmountedTool,
} from './InferredTool.js';

/**
 * Intermediate values of an inference pass, reported for observability.
 *
 * When N < 1 the pass stops before reading any sensor, so the sensor
 * fields are `null` and `invalid` is `true`.
 */
export interface InferenceDiagnostics {
    /** Tool count N */
    readonly toolCount: number;
    /** Value of the engagement sensor (0 when absent) */
    readonly engaged: number | null;
    /** Sum of all bay occupancy values */
    readonly occupied: number | null;
    /** Number of bays reading 0 */
    readonly empties: number | null;
    /** Whether any value read was outside {0, 1} */
    readonly invalid: boolean;
}

export interface InferenceResult {
    readonly tool: InferredTool;
    readonly diagnostics: InferenceDiagnostics;
}

function isBinary(value: number): boolean {
    return value === 0 || value === 1;
}

/**
 * Run one inference pass.
 *
 * @param snapshot - Sensor values by label; absent labels read as 0
 * @param toolCount - Number of configured tool bays (N)
 *
 * @example
 * ```typescript
 * const snapshot = new Map([['e', 1], ['t0', 1], ['t1', 0], ['t2', 1]]);
 * inferTool(snapshot, 3).tool; // { kind: 'mounted', index: 1 }
 * ```
 */
export function inferTool(snapshot: SensorSnapshot, toolCount: number): InferenceResult {
    if (toolCount < 1) {
        return {
            tool: unknownTool(),
            diagnostics: { toolCount, engaged: null, occupied: null, empties: null, invalid: true },
        };
    }

    const engaged = snapshot.get(ENGAGED_LABEL) ?? 0;
    let invalid = !isBinary(engaged);

    let occupied = 0;
    let empties = 0;
    let emptyIndex = -1;

    for (let i = 0; i < toolCount; i++) {
        const occ = snapshot.get(bayLabel(i)) ?? 0;
        if (!isBinary(occ)) invalid = true;
        occupied += occ;
        if (occ === 0) {
            empties++;
            emptyIndex = i;
        }
    }

    const diagnostics: InferenceDiagnostics = { toolCount, engaged, occupied, empties, invalid };

    let tool: InferredTool;
    if (invalid) {
        tool = unknownTool();
    } else if (engaged === 0 && occupied === toolCount) {
        tool = unmountedTool();
    } else if (engaged === 1 && occupied === toolCount - 1 && empties === 1) {
        tool = mountedTool(emptyIndex);
    } else {
        tool = unknownTool();
    }

    return { tool, diagnostics };
}
