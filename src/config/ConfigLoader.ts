/**
 * ConfigLoader — YAML / JSON Configuration File Reader
 *
 * Loads a file whose top-level mapping names one section per watch:
 *
 * ```yaml
 * head:
 *   pin_e: PG11
 *   pin_t0: PG12
 * dock:
 *   pin_e: PB1
 *   pin_t0: PB2
 *   sync_toolchanger: false
 * ```
 *
 * Each section is validated with {@link parseWatchConfig}.
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, type WatchConfig, parseWatchConfig } from './WatchConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'toolwatch.yaml',
    'toolwatch.yml',
    'toolwatch.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load every watch configured in a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect one of {@link CONFIG_FILENAMES} in `cwd`
 *   3. Nothing found: no watches
 *
 * @param configPath - Explicit path to the config file (optional)
 * @param cwd - Working directory for resolution (default: `process.cwd()`)
 * @throws ConfigError when the file is missing, unparsable, or a section is invalid
 */
export function loadConfig(configPath?: string, cwd?: string): WatchConfig[] {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigError(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return [];
}

/**
 * Parse configuration text that has already been read.
 *
 * @param content - File contents
 * @param format - `'json'` or `'yaml'`
 * @param source - Label used in error messages
 */
export function parseConfigText(content: string, format: 'json' | 'yaml', source = '<inline>'): WatchConfig[] {
    let raw: unknown;
    try {
        raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Failed to parse config file "${source}": ${detail}`);
    }

    // An empty YAML document parses to null.
    if (raw === null || raw === undefined) return [];

    if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ConfigError(`Config file "${source}" must contain a mapping of watch names to sections.`);
    }

    return Object.entries(raw).map(([name, section]) => parseWatchConfig(name, section));
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(absPath: string): WatchConfig[] {
    const content = readFileSync(absPath, 'utf-8');
    const format = extname(absPath).toLowerCase() === '.json' ? 'json' : 'yaml';
    return parseConfigText(content, format, absPath);
}
