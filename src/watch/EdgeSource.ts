/**
 * Inbound sensor edges.
 *
 * The host's button watcher debounces the raw pins and delivers level
 * changes through a registered handler. The watch still drops duplicate
 * values itself.
 *
 * @module
 */

/**
 * Receives one debounced level change.
 *
 * @param eventtime - Host clock time of the edge, in seconds
 * @param state - New level; booleans map to 1/0, numbers are truncated
 */
export type EdgeHandler = (eventtime: number, state: number | boolean) => void;

export interface EdgeSource {
    /**
     * Start delivering edges of `pin` to `handler`.
     *
     * @returns An optional function that stops delivery
     */
    register(pin: string, handler: EdgeHandler): (() => void) | void;
}
