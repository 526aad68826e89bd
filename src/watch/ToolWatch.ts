/**
 * ToolWatch — Mounted-Tool Inference Wired to a Machine
 *
 * Composition root. Connects the host's debounced sensor edges to the
 * inference core and the tool-changer:
 *
 * ```
 *   edge ──► SensorStateStore.update ──changed──► RecomputeScheduler.schedule
 *                                                        │ (quiet for assign_delay)
 *                                                        ▼
 *                 StatusExporter ◄── inferTool(snapshot, N)
 *                                                        │ (sync_toolchanger)
 *                                                        ▼
 *                                          SyncDispatcher.request ──► command
 * ```
 *
 * Everything runs on the host's event loop. Every entry point (edge
 * handler, recompute fire, dispatch, retry fire) is contained: a failure
 * becomes an `error` debug event and never reaches the host.
 *
 * @example
 * ```typescript
 * const watch = new ToolWatch(parseWatchConfig('head', section), {
 *     edges: buttons,
 *     commands: { run: (line) => gcode.runScript(line) },
 *     printStatus: { state: () => printStats?.state },
 *     resolveToolchanger: (name) => ({ status: () => lookup(name)?.status }),
 * });
 *
 * watch.getStatus(); // { current_tool: -2 } until the first pass runs
 * ```
 *
 * @module
 */
import { type ToolWatchStatus, StatusExporter } from '../status/StatusExporter.js';
import { ConfigError, type WatchConfig } from '../config/WatchConfig.js';
import { type InferredTool } from '../inference/InferredTool.js';
import { inferTool } from '../inference/ToolInferenceEngine.js';
import {
    type DebugEvent,
    type DebugObserverFn,
    createDebugObserver,
} from '../observability/DebugObserver.js';
import { type FailureReporter, runContained } from '../observability/contain.js';
import { type WatchTracer, withSpan } from '../observability/Tracing.js';
import { RecomputeScheduler } from '../scheduling/RecomputeScheduler.js';
import { deriveToolCount } from '../sensors/SensorLabel.js';
import { type SensorSnapshot, SensorStateStore } from '../sensors/SensorStateStore.js';
import {
    type CommandExecutor,
    type PrintStatusProvider,
    type ToolchangerStatusProvider,
} from '../sync/ports.js';
import { SyncDispatcher } from '../sync/SyncDispatcher.js';
import { type EdgeHandler, type EdgeSource } from './EdgeSource.js';

// ── Types ────────────────────────────────────────────────

/** Machine-side collaborators, injected once at construction. */
export interface ToolWatchHost {
    readonly edges: EdgeSource;
    readonly commands: CommandExecutor;
    /** Absent: never printing */
    readonly printStatus?: PrintStatusProvider;
    /**
     * Resolve the tool-changer named by the `toolchanger` option. Called
     * once, at construction; absent or returning `undefined` means never
     * busy for the life of the watch. When the tool-changer may load after
     * the watch, return a provider whose `status()` looks it up on each call
     * and reports `undefined` until it exists.
     */
    resolveToolchanger?(name: string): ToolchangerStatusProvider | undefined;
}

export interface ToolWatchOptions {
    /** Diagnostics sink (default: console output) */
    readonly debug?: DebugObserverFn;
    readonly tracer?: WatchTracer;
    /** Seconds between polls of a busy tool-changer (default: 0.1) */
    readonly retryInterval?: number;
}

// ── ToolWatch ────────────────────────────────────────────

export class ToolWatch {
    private readonly _config: WatchConfig;
    private readonly _toolCount: number;
    private readonly _store: SensorStateStore;
    private readonly _status = new StatusExporter();
    private readonly _scheduler: RecomputeScheduler;
    private readonly _dispatcher: SyncDispatcher | undefined;
    private readonly _observer: DebugObserverFn;
    private readonly _tracer: WatchTracer | undefined;
    private readonly _report: FailureReporter;
    private readonly _unsubscribers: Array<() => void> = [];
    private _disposed = false;

    /**
     * Register every configured pin and schedule the startup pass.
     *
     * @throws ConfigError when `config` has no pins
     */
    constructor(config: WatchConfig, host: ToolWatchHost, options: ToolWatchOptions = {}) {
        if (config.pins.length === 0) {
            throw new ConfigError(`${config.name}: no pins found. Add pin_<name>: <pin> options.`);
        }

        this._config = config;
        this._observer = options.debug ?? createDebugObserver();
        this._tracer = options.tracer;
        this._report = (step, message) => this._emit({
            type: 'error',
            watch: config.name,
            step,
            error: message,
            timestamp: Date.now(),
        });

        const labels = config.pins.map(p => p.label);
        this._store = new SensorStateStore(labels);
        this._toolCount = deriveToolCount(labels);

        this._scheduler = new RecomputeScheduler(reason => this._recompute(reason), this._report);

        if (config.syncToolchanger) {
            this._dispatcher = new SyncDispatcher({
                name: config.name,
                commands: host.commands,
                printStatus: host.printStatus,
                toolchanger: host.resolveToolchanger?.(config.toolchanger),
                retryInterval: options.retryInterval,
                debug: event => this._emit(event),
                tracer: options.tracer,
                report: this._report,
            });
        }

        for (const { label, pin } of config.pins) {
            const off = host.edges.register(pin, this._edgeHandler(label));
            if (typeof off === 'function') this._unsubscribers.push(off);
        }

        this._emit({
            type: 'configure',
            watch: config.name,
            pins: [...config.pins].sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0)),
            timestamp: Date.now(),
        });

        this._scheduler.schedule('startup', 0);
    }

    // ── Status ───────────────────────────────────────────

    get name(): string {
        return this._config.name;
    }

    /** Number of configured tool bays (N). */
    get toolCount(): number {
        return this._toolCount;
    }

    /** Latest inferred tool as a status code: -2 unknown, -1 unmounted, ≥0 bay index. */
    get currentTool(): number {
        return this._status.read();
    }

    /** Latest inferred tool as a tagged value. */
    get tool(): InferredTool {
        return this._status.tool;
    }

    /** Status object for external consumers. Never triggers a recompute. */
    getStatus(): ToolWatchStatus {
        return this._status.getStatus();
    }

    /** Copy of the current sensor values. */
    sensors(): SensorSnapshot {
        return this._store.snapshot();
    }

    // ── Lifecycle ────────────────────────────────────────

    /**
     * Stop delivering edges and cancel both timers. The last status stays
     * readable. Idempotent.
     */
    dispose(): void {
        if (this._disposed) return;
        this._disposed = true;
        this._scheduler.cancel();
        this._dispatcher?.dispose();
        for (const off of this._unsubscribers.splice(0)) {
            runContained('edge', off, this._report);
        }
    }

    // ── Internal ─────────────────────────────────────────

    private _edgeHandler(label: string): EdgeHandler {
        return (eventtime, state) => {
            if (this._disposed) return;
            runContained('edge', () => this._onEdge(label, eventtime, state), this._report);
        };
    }

    private _onEdge(label: string, eventtime: number, state: number | boolean): void {
        const value = toSensorValue(label, state);
        if (!this._store.update(label, value)) return;

        this._emit({
            type: 'edge',
            watch: this._config.name,
            label,
            value,
            eventtime,
            timestamp: Date.now(),
        });
        this._scheduler.schedule(label, this._config.assignDelay);
    }

    private _recompute(reason: string): void {
        withSpan(this._tracer, 'toolwatch.recompute', {
            'toolwatch.name': this._config.name,
            'toolwatch.reason': reason,
        }, (span) => {
            const { tool, diagnostics } = inferTool(this._store.snapshot(), this._toolCount);
            this._status.publish(tool);

            const currentTool = this._status.read();
            span?.setAttribute('toolwatch.current_tool', currentTool);

            this._emit({
                type: 'apply',
                watch: this._config.name,
                currentTool,
                reason,
                diagnostics,
                timestamp: Date.now(),
            });

            this._dispatcher?.request(tool);
        });
    }

    private _emit(event: DebugEvent): void {
        if (!this._config.verbose && event.type !== 'error') return;
        this._observer(event);
    }
}

function toSensorValue(label: string, state: number | boolean): number {
    if (typeof state === 'boolean') return state ? 1 : 0;
    if (!Number.isFinite(state)) {
        throw new Error(`non-numeric state for sensor "${label}": ${String(state)}`);
    }
    return Math.trunc(state);
}
