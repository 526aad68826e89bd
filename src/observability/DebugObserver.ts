/**
 * DebugObserver — Typed Diagnostics for a Tool Watch
 *
 * Every diagnostic the watch produces is a structured, immutable event
 * in one discriminated union. A watch built with `verbose: false`
 * forwards only `error` events; with `verbose: true` it forwards all.
 *
 * @example
 * ```typescript
 * import { createDebugObserver } from 'toolhead-watch';
 *
 * // Default: compact console output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to the host's console)
 * const debug = createDebugObserver((event) => {
 *     host.respondInfo(formatDebugEvent(event));
 * });
 *
 * const watch = new ToolWatch(config, host, { debug });
 * ```
 *
 * @module
 */
import { type InferenceDiagnostics } from '../inference/ToolInferenceEngine.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Boundaries where a failure is caught and contained. */
export type ContainedStep = 'edge' | 'recompute' | 'dispatch' | 'retry';

/**
 * Emitted once at construction, listing every registered sensor.
 */
export interface ConfigureEvent {
    readonly type: 'configure';
    readonly watch: string;
    /** `label → pin` pairs, sorted by label */
    readonly pins: ReadonlyArray<{ readonly label: string; readonly pin: string }>;
    readonly timestamp: number;
}

/**
 * Emitted when a sensor edge changes the stored value.
 * Duplicate edges emit nothing.
 */
export interface EdgeEvent {
    readonly type: 'edge';
    readonly watch: string;
    readonly label: string;
    readonly value: number;
    /** Host event time of the edge, in seconds */
    readonly eventtime: number;
    readonly timestamp: number;
}

/**
 * Emitted after each inference pass with the new `current_tool`.
 */
export interface ApplyEvent {
    readonly type: 'apply';
    readonly watch: string;
    /** Status code: -2 unknown, -1 unmounted, ≥0 bay index */
    readonly currentTool: number;
    /** Label of the last edge before the pass, or `'startup'` */
    readonly reason: string;
    readonly diagnostics: InferenceDiagnostics;
    readonly timestamp: number;
}

/**
 * Emitted when an unselect is withheld because a print is running.
 */
export interface SkipEvent {
    readonly type: 'skip';
    readonly watch: string;
    readonly currentTool: number;
    readonly timestamp: number;
}

/**
 * Emitted when a sync decision is parked because the tool-changer is busy.
 */
export interface DeferEvent {
    readonly type: 'defer';
    readonly watch: string;
    /** Status code of the parked target */
    readonly target: number;
    readonly toolchangerStatus: string | undefined;
    readonly timestamp: number;
}

/**
 * Emitted after a command is handed to the command executor.
 */
export interface DispatchEvent {
    readonly type: 'dispatch';
    readonly watch: string;
    readonly command: string;
    readonly target: number;
    readonly timestamp: number;
}

/**
 * Emitted when a contained step throws. Never suppressed.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly watch: string;
    readonly step: ContainedStep;
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 */
export type DebugEvent =
    | ConfigureEvent
    | EdgeEvent
    | ApplyEvent
    | SkipEvent
    | DeferEvent
    | DispatchEvent
    | ErrorEvent;

/**
 * Observer function that receives debug events.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Formatting
// ============================================================================

const PREFIX = '[toolwatch]';

/**
 * Render an event as one compact log line.
 *
 * ```
 * [toolwatch] head edge      t1 -> 0 (t=12.500000)
 * [toolwatch] head apply     current_tool=1 (reason=t1 N=3 ex=1 S=2 empties=1 bad=0)
 * [toolwatch] head dispatch  INITIALIZE_TOOLCHANGER T=1
 * ```
 */
export function formatDebugEvent(event: DebugEvent): string {
    const head = `${PREFIX} ${event.watch}`;

    switch (event.type) {
        case 'configure': {
            const pins = event.pins.map(p => `${p.label}=${p.pin}`).join(', ');
            return `${head} configure configured ${event.pins.length} pin(s): ${pins}`;
        }

        case 'edge':
            return `${head} edge      ${event.label} -> ${event.value} (t=${event.eventtime.toFixed(6)})`;

        case 'apply': {
            const d = event.diagnostics;
            return `${head} apply     current_tool=${event.currentTool} `
                + `(reason=${event.reason} N=${d.toolCount} ex=${String(d.engaged)} `
                + `S=${String(d.occupied)} empties=${String(d.empties)} bad=${d.invalid ? 1 : 0})`;
        }

        case 'skip':
            return `${head} skip      printing, UNSELECT withheld (current_tool=${event.currentTool})`;

        case 'defer':
            return `${head} defer     toolchanger busy (status=${String(event.toolchangerStatus)})`;

        case 'dispatch':
            return `${head} dispatch  ${event.command}`;

        case 'error':
            return `${head} ERROR     [${event.step}] ${event.error}`;
    }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided it is returned unchanged. Otherwise
 * events are printed with {@link formatDebugEvent}: errors through
 * `console.error`, everything else through `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const line = formatDebugEvent(event);
        if (event.type === 'error') {
            console.error(line);
        } else {
            console.debug(line);
        }
    };
}
