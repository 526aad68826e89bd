/**
 * toolhead-watch — Root Barrel Export
 *
 * Architecture:
 *   src/
 *   ├── sensors/       ← Sensor labels, SensorStateStore
 *   ├── inference/     ← InferredTool, ToolInferenceEngine
 *   ├── scheduling/    ← SingleShotTask, RecomputeScheduler
 *   ├── sync/          ← Collaborator ports, SyncDispatcher
 *   ├── status/        ← StatusExporter
 *   ├── observability/ ← Debug Observer, Tracing, containment
 *   ├── config/        ← WatchConfig schema, file loader
 *   └── watch/         ← ToolWatch composition root
 */

// ── Sensors ──────────────────────────────────────────────
/** @category Sensors */
export { ENGAGED_LABEL, parseBayIndex, bayLabel, deriveToolCount } from './sensors/SensorLabel.js';
/** @category Sensors */
export type { SensorLabel } from './sensors/SensorLabel.js';
/** @category Sensors */
export { SensorStateStore } from './sensors/SensorStateStore.js';
/** @category Sensors */
export type { SensorSnapshot } from './sensors/SensorStateStore.js';

// ── Inference ────────────────────────────────────────────
/** @category Inference */
export {
    UNKNOWN_TOOL_CODE, UNMOUNTED_TOOL_CODE,
    unknownTool, unmountedTool, mountedTool,
    toStatusCode, fromStatusCode,
} from './inference/InferredTool.js';
/** @category Inference */
export type { InferredTool, UnknownTool, UnmountedTool, MountedTool } from './inference/InferredTool.js';
/** @category Inference */
export { inferTool } from './inference/ToolInferenceEngine.js';
/** @category Inference */
export type { InferenceDiagnostics, InferenceResult } from './inference/ToolInferenceEngine.js';

// ── Scheduling ───────────────────────────────────────────
/** @category Scheduling */
export { SingleShotTask } from './scheduling/SingleShotTask.js';
/** @category Scheduling */
export { RecomputeScheduler } from './scheduling/RecomputeScheduler.js';
/** @category Scheduling */
export type { RecomputePass } from './scheduling/RecomputeScheduler.js';

// ── Sync ─────────────────────────────────────────────────
/** @category Sync */
export {
    BUSY_TOOLCHANGER_STATUSES, isPrinting, isToolchangerBusy,
} from './sync/ports.js';
/** @category Sync */
export type {
    CommandExecutor, PrintStatusProvider, ToolchangerStatusProvider,
} from './sync/ports.js';
/** @category Sync */
export { SELECT_COMMAND, UNSELECT_COMMAND, syncCommandFor } from './sync/SyncCommand.js';
/** @category Sync */
export { SyncDispatcher, DEFAULT_RETRY_INTERVAL } from './sync/SyncDispatcher.js';
/** @category Sync */
export type { SyncDispatcherOptions } from './sync/SyncDispatcher.js';

// ── Status ───────────────────────────────────────────────
/** @category Status */
export { StatusExporter } from './status/StatusExporter.js';
/** @category Status */
export type { ToolWatchStatus } from './status/StatusExporter.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver, formatDebugEvent } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn, ContainedStep,
    ConfigureEvent, EdgeEvent, ApplyEvent, SkipEvent, DeferEvent, DispatchEvent, ErrorEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export { SpanStatusCode } from './observability/Tracing.js';
/** @category Observability */
export type { WatchTracer, WatchSpan, WatchAttributeValue } from './observability/Tracing.js';
/** @category Observability */
export { runContained } from './observability/contain.js';
/** @category Observability */
export type { FailureReporter } from './observability/contain.js';

// ── Config ───────────────────────────────────────────────
/** @category Config */
export { ConfigError, DEFAULT_OPTIONS, parseWatchConfig } from './config/WatchConfig.js';
/** @category Config */
export type { WatchConfig, PinSpec } from './config/WatchConfig.js';
/** @category Config */
export { loadConfig, parseConfigText, CONFIG_FILENAMES } from './config/ConfigLoader.js';

// ── Watch ────────────────────────────────────────────────
/** @category Watch */
export { ToolWatch } from './watch/ToolWatch.js';
/** @category Watch */
export type { ToolWatchHost, ToolWatchOptions } from './watch/ToolWatch.js';
/** @category Watch */
export type { EdgeSource, EdgeHandler } from './watch/EdgeSource.js';
