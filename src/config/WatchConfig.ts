/**
 * WatchConfig — Validated Configuration of One Tool Watch
 *
 * A watch is configured from a flat option section:
 *
 * ```yaml
 * head:
 *   pin_e:  "^PG11"
 *   pin_t0: "^PG12"
 *   pin_t1: "^PG13"
 *   toolchanger: toolchanger
 *   sync_toolchanger: 1
 *   verbose: 0
 *   assign_delay: 0.05
 * ```
 *
 * Every `pin_<label>` option registers a sensor under `<label>`.
 * Unrecognized options are ignored.
 *
 * @module
 */
import { z } from 'zod';

// ── Errors ───────────────────────────────────────────────

/**
 * Raised at startup when a section cannot produce a working watch.
 * The only error a watch ever throws.
 */
export class ConfigError extends Error {
    /** One `<path>: <message>` line per problem found. */
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
        this.name = 'ConfigError';
        this.issues = Object.freeze([...issues]);
    }
}

// ── Types ────────────────────────────────────────────────

/** One registered sensor: its label and the pin the edge source watches. */
export interface PinSpec {
    readonly label: string;
    readonly pin: string;
}

export interface WatchConfig {
    /** Watch name, used in diagnostics */
    readonly name: string;
    /** Registered sensors, in section order */
    readonly pins: readonly PinSpec[];
    /** Name of the tool-changer status provider */
    readonly toolchanger: string;
    /** Whether inferred tools are pushed to the tool-changer */
    readonly syncToolchanger: boolean;
    /** Whether non-error diagnostics are emitted */
    readonly verbose: boolean;
    /** Recompute coalescing window, in seconds */
    readonly assignDelay: number;
}

/** Values used for every option a section leaves out. */
export const DEFAULT_OPTIONS = {
    toolchanger: 'toolchanger',
    syncToolchanger: true,
    verbose: false,
    assignDelay: 0,
} as const;

const PIN_PREFIX = 'pin_';

// ── Schema ───────────────────────────────────────────────

/** `true/false`, any number (non-zero is true), or `'0' | '1' | 'true' | 'false'`. */
const BooleanOption = z
    .union([z.boolean(), z.number(), z.enum(['0', '1', 'true', 'false'])])
    .transform((value) => {
        if (typeof value === 'boolean') return value;
        if (typeof value === 'number') return value !== 0;
        return value === '1' || value === 'true';
    });

/** Seconds as a number or numeric string, finite and non-negative. */
const SecondsOption = z
    .union([z.number(), z.string().trim().min(1).transform(Number)])
    .pipe(z.number().finite().min(0));

const PinOption = z
    .union([z.string(), z.number()])
    .transform(value => String(value).trim())
    .pipe(z.string().min(1, 'pin must not be empty'));

const SectionSchema = z.object({
    toolchanger: z.string().trim().min(1).default(DEFAULT_OPTIONS.toolchanger),
    sync_toolchanger: BooleanOption.default(DEFAULT_OPTIONS.syncToolchanger),
    verbose: BooleanOption.default(DEFAULT_OPTIONS.verbose),
    assign_delay: SecondsOption.default(DEFAULT_OPTIONS.assignDelay),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(section)';
        return `${path}: ${issue.message}`;
    });
}

function isSection(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Public API ───────────────────────────────────────────

/**
 * Validate a raw option section and build a {@link WatchConfig}.
 *
 * @param name - Watch name (the section name)
 * @param section - Raw options as read from a file or passed in code
 * @throws ConfigError when the section is not a mapping, has no `pin_`
 *   option, or has an invalid value
 *
 * @example
 * ```typescript
 * const config = parseWatchConfig('head', {
 *     pin_e: 'PG11', pin_t0: 'PG12', pin_t1: 'PG13',
 *     assign_delay: 0.05,
 * });
 * config.pins.length; // 3
 * ```
 */
export function parseWatchConfig(name: string, section: unknown): WatchConfig {
    if (!isSection(section)) {
        throw new ConfigError(`${name}: configuration section must be a mapping of options.`);
    }

    const pinKeys = Object.keys(section).filter(key => key.startsWith(PIN_PREFIX));
    if (pinKeys.length === 0) {
        throw new ConfigError(`${name}: no pins found. Add pin_<name>: <pin> options.`);
    }

    const issues: string[] = [];
    const pins: PinSpec[] = [];

    for (const key of pinKeys) {
        const label = key.slice(PIN_PREFIX.length);
        if (label.length === 0) {
            issues.push(`${key}: sensor label must not be empty`);
            continue;
        }
        const parsed = PinOption.safeParse(section[key]);
        if (parsed.success) {
            pins.push({ label, pin: parsed.data });
        } else {
            for (const issue of parsed.error.issues) issues.push(`${key}: ${issue.message}`);
        }
    }

    const options = SectionSchema.safeParse(section);
    if (!options.success) issues.push(...formatIssues(options.error));

    if (issues.length > 0 || !options.success) {
        throw new ConfigError(`${name}: invalid configuration.`, issues);
    }

    return {
        name,
        pins,
        toolchanger: options.data.toolchanger,
        syncToolchanger: options.data.sync_toolchanger,
        verbose: options.data.verbose,
        assignDelay: options.data.assign_delay,
    };
}
