import { type InferredTool } from '../inference/InferredTool.js';

/** Command that tells the tool-changer which tool is mounted. */
export const SELECT_COMMAND = 'INITIALIZE_TOOLCHANGER';
/** Command that tells the tool-changer no tool is mounted. */
export const UNSELECT_COMMAND = 'UNSELECT_TOOL';

/**
 * Text of the command that brings the tool-changer in line with `target`.
 * `unknown` is treated like `unmounted`.
 */
export function syncCommandFor(target: InferredTool): string {
    return target.kind === 'mounted'
        ? `${SELECT_COMMAND} T=${target.index}`
        : UNSELECT_COMMAND;
}
