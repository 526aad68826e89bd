/**
 * SensorStateStore — Latest Debounced Value per Sensor
 *
 * Holds the last known value of every labeled sensor. Values start at 0
 * for every configured label and change only through {@link SensorStateStore.update}.
 *
 * The store does not range-check values: anything outside {0, 1} is kept
 * as-is and left for the inference engine to reject.
 *
 * @module
 */
import { type SensorLabel } from './SensorLabel.js';

/** Read-only view of the sensor values, keyed by label. */
export type SensorSnapshot = ReadonlyMap<SensorLabel, number>;

export class SensorStateStore {
    private readonly _values = new Map<SensorLabel, number>();

    /**
     * @param labels - Configured labels, each seeded with 0
     */
    constructor(labels: Iterable<SensorLabel> = []) {
        for (const label of labels) {
            this._values.set(label, 0);
        }
    }

    /**
     * Record a new value for `label`.
     *
     * Unknown labels are stored as-is.
     *
     * @returns `true` when the stored value changed, `false` for a duplicate edge
     */
    update(label: SensorLabel, value: number): boolean {
        if (this._values.get(label) === value) return false;
        this._values.set(label, value);
        return true;
    }

    /** Current value of `label`, or `undefined` if it was never seen. */
    get(label: SensorLabel): number | undefined {
        return this._values.get(label);
    }

    /** Labels currently held, in insertion order. */
    labels(): SensorLabel[] {
        return [...this._values.keys()];
    }

    /** Copy of the current values. Later updates do not affect it. */
    snapshot(): SensorSnapshot {
        return new Map(this._values);
    }
}
