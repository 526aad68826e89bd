/**
 * StatusExporter — Read-Only Projection of the Inferred Tool
 *
 * Caches the result of the latest inference pass. Reading never blocks
 * and never triggers a recompute; only the pass itself publishes.
 *
 * @module
 */
import { type InferredTool, toStatusCode, unknownTool } from '../inference/InferredTool.js';

/**
 * Status object polled by external consumers (macros, dashboards).
 * The field name is part of the external contract.
 */
export interface ToolWatchStatus {
    readonly current_tool: number;
}

export class StatusExporter {
    private _tool: InferredTool = unknownTool();

    /** Replace the cached value wholesale. */
    publish(tool: InferredTool): void {
        this._tool = tool;
    }

    /** Latest inferred tool as a status code: -2 unknown, -1 unmounted, ≥0 bay index. */
    read(): number {
        return toStatusCode(this._tool);
    }

    /** Latest inferred tool as a tagged value. */
    get tool(): InferredTool {
        return this._tool;
    }

    getStatus(): ToolWatchStatus {
        return { current_tool: this.read() };
    }
}
