/**
 * Collaborator interfaces injected into a tool watch.
 *
 * The watch never looks anything up by name at call time: the host hands
 * these in at construction. Status providers may report `undefined` while
 * the underlying subsystem is not available yet.
 *
 * @module
 */

/**
 * Executes opaque text commands on the machine. Fire-and-forget: the
 * watch reads no acknowledgement back.
 */
export interface CommandExecutor {
    run(command: string): void;
}

/**
 * Reports the print job state (e.g. `'printing'`, `'paused'`, `'standby'`).
 */
export interface PrintStatusProvider {
    state(): string | undefined;
}

/**
 * Reports the tool-changer status (e.g. `'ready'`, `'changing'`,
 * `'initializing'`).
 */
export interface ToolchangerStatusProvider {
    status(): string | undefined;
}

/** Tool-changer statuses during which no command may be sent. */
export const BUSY_TOOLCHANGER_STATUSES: ReadonlySet<string> = new Set(['changing', 'initializing']);

export function isPrinting(provider: PrintStatusProvider | undefined): boolean {
    return provider?.state() === 'printing';
}

export function isToolchangerBusy(provider: ToolchangerStatusProvider | undefined): boolean {
    const status = provider?.status();
    return status !== undefined && BUSY_TOOLCHANGER_STATUSES.has(status);
}
