/**
 * InferredTool — Discrete Conclusion of an Inference Pass
 *
 * A tagged value with exactly three shapes. External consumers see it as
 * a single integer (the `current_tool` status field):
 *
 * | Variant         | Status code |
 * |-----------------|-------------|
 * | `unknown`       | `-2`        |
 * | `unmounted`     | `-1`        |
 * | `mounted(i)`    | `i` (≥ 0)   |
 *
 * @module
 */

export interface UnknownTool {
    readonly kind: 'unknown';
}

export interface UnmountedTool {
    readonly kind: 'unmounted';
}

export interface MountedTool {
    readonly kind: 'mounted';
    /** Bay index of the mounted tool */
    readonly index: number;
}

/**
 * Union of all inference outcomes.
 *
 * Switch on `tool.kind` for exhaustive handling.
 */
export type InferredTool = UnknownTool | UnmountedTool | MountedTool;

/** Status code reported for {@link UnknownTool}. */
export const UNKNOWN_TOOL_CODE = -2;
/** Status code reported for {@link UnmountedTool}. */
export const UNMOUNTED_TOOL_CODE = -1;

const UNKNOWN: UnknownTool = Object.freeze({ kind: 'unknown' });
const UNMOUNTED: UnmountedTool = Object.freeze({ kind: 'unmounted' });

export function unknownTool(): UnknownTool {
    return UNKNOWN;
}

export function unmountedTool(): UnmountedTool {
    return UNMOUNTED;
}

export function mountedTool(index: number): MountedTool {
    return Object.freeze({ kind: 'mounted', index });
}

/**
 * Project an inferred tool onto its integer status code.
 *
 * @example
 * ```typescript
 * toStatusCode(mountedTool(2)); // 2
 * toStatusCode(unknownTool());  // -2
 * ```
 */
export function toStatusCode(tool: InferredTool): number {
    switch (tool.kind) {
        case 'unknown': return UNKNOWN_TOOL_CODE;
        case 'unmounted': return UNMOUNTED_TOOL_CODE;
        case 'mounted': return tool.index;
    }
}

/**
 * Inverse of {@link toStatusCode}. Any code that is not `-1` or a
 * non-negative integer maps to `unknown`.
 */
export function fromStatusCode(code: number): InferredTool {
    if (code === UNMOUNTED_TOOL_CODE) return UNMOUNTED;
    if (Number.isInteger(code) && code >= 0) return mountedTool(code);
    return UNKNOWN;
}
