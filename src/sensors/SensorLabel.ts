/**
 * SensorLabel — Sensor Naming Conventions
 *
 * Every binary input is registered under a label taken from its
 * `pin_<label>` option:
 *
 * - `e`         the "tool engaged" sensor at the business end
 * - `t<index>`  the occupancy sensor of tool bay `<index>`
 *
 * Any other label is accepted and stored, but never read by inference.
 *
 * @module
 */

/** Opaque sensor identifier. */
export type SensorLabel = string;

/** Label reserved for the tool-engaged sensor. */
export const ENGAGED_LABEL: SensorLabel = 'e';

const BAY_LABEL = /^t(\d+)$/;

/**
 * Parse the bay index out of a `t<index>` label.
 *
 * @returns The bay index, or `undefined` when the label is not a bay label
 *
 * @example
 * ```typescript
 * parseBayIndex('t3'); // 3
 * parseBayIndex('e');  // undefined
 * ```
 */
export function parseBayIndex(label: SensorLabel): number | undefined {
    const match = BAY_LABEL.exec(label);
    if (!match?.[1]) return undefined;
    return Number.parseInt(match[1], 10);
}

/** Label of the occupancy sensor for bay `index`. */
export function bayLabel(index: number): SensorLabel {
    return `t${index}`;
}

/**
 * Derive the tool count N from the configured labels: one greater than
 * the highest bay index present, or 0 when no bay sensor is configured.
 *
 * Gaps are not filled: `t0` and `t2` alone still give N = 3, and the
 * missing `t1` reads as an empty bay.
 */
export function deriveToolCount(labels: Iterable<SensorLabel>): number {
    let highest = -1;
    for (const label of labels) {
        const index = parseBayIndex(label);
        if (index !== undefined && index > highest) highest = index;
    }
    return highest + 1;
}
