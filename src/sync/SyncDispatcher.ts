/**
 * SyncDispatcher — Busy-Aware Tool-Changer Synchronization
 *
 * Turns each new inferred tool into at most one command for the
 * tool-changer, and never sends one while the tool-changer is busy.
 *
 * Policy:
 *
 * | Printing | Inferred            | Command                         |
 * |----------|---------------------|---------------------------------|
 * | yes      | mounted(i)          | `INITIALIZE_TOOLCHANGER T=i`    |
 * | yes      | unmounted / unknown | none (the print is not touched) |
 * | no       | mounted(i)          | `INITIALIZE_TOOLCHANGER T=i`    |
 * | no       | unmounted / unknown | `UNSELECT_TOOL`                 |
 *
 * Busy deferral:
 *
 * ```
 *   request(T1) ── busy ──► pending = T1, arm retry(0.1s)
 *   request(T2) ── busy ──► pending = T2            (last decision wins)
 *   retry fires ── busy ──► re-arm, send nothing
 *   retry fires ── throws ─► re-arm, send nothing   (failure reported)
 *   retry fires ── free ──► send T2, pending cleared
 * ```
 *
 * The printing policy is applied again when a parked target is sent.
 *
 * @module
 */
import { type InferredTool, toStatusCode } from '../inference/InferredTool.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type FailureReporter, runContained } from '../observability/contain.js';
import { type WatchTracer, withSpan } from '../observability/Tracing.js';
import { SingleShotTask } from '../scheduling/SingleShotTask.js';
import {
    type CommandExecutor,
    type PrintStatusProvider,
    type ToolchangerStatusProvider,
    isPrinting,
    isToolchangerBusy,
} from './ports.js';
import { syncCommandFor } from './SyncCommand.js';

/** Seconds between polls of a busy tool-changer. */
export const DEFAULT_RETRY_INTERVAL = 0.1;

export interface SyncDispatcherOptions {
    /** Watch name carried by every emitted event */
    readonly name: string;
    readonly commands: CommandExecutor;
    /** Absent provider reads as "not printing" */
    readonly printStatus?: PrintStatusProvider | undefined;
    /** Absent provider reads as "not busy" */
    readonly toolchanger?: ToolchangerStatusProvider | undefined;
    /** Poll interval in seconds while the tool-changer is busy */
    readonly retryInterval?: number | undefined;
    /** Receives `skip`, `defer` and `dispatch` events */
    readonly debug?: DebugObserverFn | undefined;
    readonly tracer?: WatchTracer | undefined;
    /** Receives failures contained at the dispatch and retry boundaries */
    readonly report: FailureReporter;
}

export class SyncDispatcher {
    private readonly _name: string;
    private readonly _commands: CommandExecutor;
    private readonly _printStatus: PrintStatusProvider | undefined;
    private readonly _toolchanger: ToolchangerStatusProvider | undefined;
    private readonly _retryInterval: number;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _tracer: WatchTracer | undefined;
    private readonly _report: FailureReporter;
    private readonly _retry: SingleShotTask;
    private _pending: InferredTool | undefined;

    constructor(options: SyncDispatcherOptions) {
        this._name = options.name;
        this._commands = options.commands;
        this._printStatus = options.printStatus;
        this._toolchanger = options.toolchanger;
        this._retryInterval = options.retryInterval ?? DEFAULT_RETRY_INTERVAL;
        this._debug = options.debug;
        this._tracer = options.tracer;
        this._report = options.report;
        this._retry = new SingleShotTask(() => {
            runContained('retry', () => this._onRetry(), this._report);
            // A failed poll leaves the target parked; keep polling for it.
            if (this._pending !== undefined && !this._retry.armed) {
                this._retry.arm(this._retryInterval);
            }
        });
    }

    // ── Public API ───────────────────────────────────────

    /**
     * Decide what to send for a freshly inferred tool, and send it now
     * or park it until the tool-changer is free.
     */
    request(tool: InferredTool): void {
        runContained('dispatch', () => {
            if (this._withheld(tool)) return;
            this._syncOrDefer(tool);
        }, this._report);
    }

    /** Target parked while the tool-changer is busy, if any. */
    get pendingTarget(): InferredTool | undefined {
        return this._pending;
    }

    /** Whether a retry poll is outstanding. */
    get retryArmed(): boolean {
        return this._retry.armed;
    }

    /** Drop the parked target and stop polling. */
    dispose(): void {
        this._clearPending();
    }

    // ── Private ──────────────────────────────────────────

    private _syncOrDefer(tool: InferredTool): void {
        if (isToolchangerBusy(this._toolchanger)) {
            this._pending = tool;
            if (!this._retry.armed) this._retry.arm(this._retryInterval);
            this._debug?.({
                type: 'defer',
                watch: this._name,
                target: toStatusCode(tool),
                toolchangerStatus: this._toolchanger?.status(),
                timestamp: Date.now(),
            });
            return;
        }

        // A decision sent now supersedes anything still parked.
        this._clearPending();
        this._send(tool);
    }

    private _onRetry(): void {
        if (this._pending === undefined) return;

        if (isToolchangerBusy(this._toolchanger)) {
            this._retry.arm(this._retryInterval);
            return;
        }

        // A print may have started while the target was parked.
        const target = this._pending;
        const withheld = this._withheld(target);
        this._pending = undefined;
        if (!withheld) this._send(target);
    }

    /** Unselects never reach the tool-changer during a print; report a `skip` instead. */
    private _withheld(tool: InferredTool): boolean {
        if (tool.kind === 'mounted' || !isPrinting(this._printStatus)) return false;
        this._debug?.({
            type: 'skip',
            watch: this._name,
            currentTool: toStatusCode(tool),
            timestamp: Date.now(),
        });
        return true;
    }

    private _clearPending(): void {
        this._pending = undefined;
        this._retry.cancel();
    }

    private _send(target: InferredTool): void {
        const command = syncCommandFor(target);
        const code = toStatusCode(target);

        withSpan(this._tracer, 'toolwatch.dispatch', {
            'toolwatch.name': this._name,
            'toolwatch.command': command,
            'toolwatch.target': code,
        }, () => this._commands.run(command));

        this._debug?.({
            type: 'dispatch',
            watch: this._name,
            command,
            target: code,
            timestamp: Date.now(),
        });
    }
}
