import * as fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { DEFAULT_LOG_DIRECTORY } from '../utils/logger.js';
import { describeError, isErrnoException } from '../utils/fs-errors.js';
import { DEFAULT_EXCLUDED_DIRECTORIES } from '../services/directory-watcher.js';
import { CONFIG_PATH_ENV_KEY, ENV_OVERRIDE_SCHEMA, type EnvOverrideSpec } from './env-schema.js';

export const CONFIG_FILE_NAME = 'diffwatch.json';

export interface WatcherConfig {
    debounceMs: number;
    eventBufferSize: number;
    errorBufferSize: number;
    excludedDirectories: string[];
    usePolling: boolean;
}

export interface DiffConfig {
    contextLines: number;
    maxFileSizeBytes: number;
    binarySampleBytes: number;
    binaryThreshold: number;
}

export interface LoggingConfig {
    enabled: boolean;
    directory: string;
}

export interface DiffwatchConfig {
    watcher: WatcherConfig;
    diff: DiffConfig;
    logging: LoggingConfig;
}

export const DEFAULT_CONFIG: DiffwatchConfig = {
    watcher: {
        debounceMs: 100,
        eventBufferSize: 100,
        errorBufferSize: 10,
        excludedDirectories: [...DEFAULT_EXCLUDED_DIRECTORIES],
        usePolling: false,
    },
    diff: {
        contextLines: 3,
        maxFileSizeBytes: 1024 * 1024,
        binarySampleBytes: 8192,
        binaryThreshold: 0.3,
    },
    logging: {
        enabled: true,
        directory: DEFAULT_LOG_DIRECTORY,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = process.env[CONFIG_PATH_ENV_KEY];
    if (fromEnv) return path.resolve(fromEnv);
    return path.resolve(CONFIG_FILE_NAME);
}

/** Read the config file merged over the defaults; a missing file yields the defaults. */
export async function readConfig(overridePath?: string): Promise<DiffwatchConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${describeError(error)}`, { cause: error });
    }
    return mergeWithDefaults(parsed);
}

export async function writeConfig(config: DiffwatchConfig, overridePath?: string): Promise<string> {
    const targetPath = getConfigPath(overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        if (existsSync(tempPath)) {
            await fs.unlink(tempPath).catch((cleanupError: unknown) => {
                console.error(`[Diffwatch Config] Failed to remove ${tempPath}: ${describeError(cleanupError)}`);
            });
        }
        throw new Error(`Failed to save config to ${targetPath}: ${describeError(error)}`, { cause: error });
    }
    return targetPath;
}

/**
 * Apply the overrides declared in `ENV_OVERRIDE_SCHEMA`. Blank or unparsable
 * values are ignored with a warning.
 */
export function applyEnvOverrides(config: DiffwatchConfig, env: NodeJS.ProcessEnv = process.env): DiffwatchConfig {
    const next = cloneConfig(config);

    for (const spec of ENV_OVERRIDE_SCHEMA) {
        const raw = env[spec.key];
        if (raw === undefined || raw.trim() === '') continue;

        const value = parseEnvValue(spec, raw.trim());
        if (value === undefined) {
            console.warn(`[Diffwatch Config] Ignoring ${spec.key}='${raw}': expected ${spec.type}.`);
            continue;
        }

        switch (spec.target) {
            case 'watcher.debounceMs':
                if (typeof value === 'number') next.watcher.debounceMs = value;
                break;
            case 'watcher.usePolling':
                if (typeof value === 'boolean') next.watcher.usePolling = value;
                break;
            case 'diff.maxFileSizeBytes':
                if (typeof value === 'number') next.diff.maxFileSizeBytes = value;
                break;
            case 'logging.enabled':
                if (typeof value === 'boolean') next.logging.enabled = value;
                break;
            case 'logging.directory':
                if (typeof value === 'string') next.logging.directory = value;
                break;
        }
    }

    return next;
}

/** Config file merged over defaults, then environment overrides. */
export async function loadConfig(overridePath?: string): Promise<DiffwatchConfig> {
    return applyEnvOverrides(await readConfig(overridePath));
}

// ── Validation ───────────────────────────────────────────────────────────────

function parseEnvValue(spec: EnvOverrideSpec, raw: string): number | boolean | string | undefined {
    switch (spec.type) {
        case 'integer': {
            if (!/^\d+$/.test(raw)) return undefined;
            return Number.parseInt(raw, 10);
        }
        case 'boolean': {
            const lowered = raw.toLowerCase();
            if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
            if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
            return undefined;
        }
        case 'path':
            return path.resolve(raw);
    }
}

function cloneConfig(config: DiffwatchConfig): DiffwatchConfig {
    return {
        watcher: { ...config.watcher, excludedDirectories: [...config.watcher.excludedDirectories] },
        diff: { ...config.diff },
        logging: { ...config.logging },
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickInteger(source: Record<string, unknown>, key: string, fallback: number, min: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isInteger(value) && value >= min ? value : fallback;
}

function pickRatio(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && value >= 0 && value <= 1 ? value : fallback;
}

function pickBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickStringArray(source: Record<string, unknown>, key: string, fallback: string[]): string[] {
    const value = source[key];
    return Array.isArray(value)
        ? value.filter((entry): entry is string => typeof entry === 'string')
        : [...fallback];
}

/** Fields of the wrong type or out of range fall back to their defaults. */
export function mergeWithDefaults(loaded: unknown): DiffwatchConfig {
    const root: Record<string, unknown> = isRecord(loaded) ? loaded : {};
    const watcher: Record<string, unknown> = isRecord(root.watcher) ? root.watcher : {};
    const diff: Record<string, unknown> = isRecord(root.diff) ? root.diff : {};
    const logging: Record<string, unknown> = isRecord(root.logging) ? root.logging : {};
    const defaults = DEFAULT_CONFIG;

    return {
        watcher: {
            debounceMs: pickInteger(watcher, 'debounceMs', defaults.watcher.debounceMs, 0),
            eventBufferSize: pickInteger(watcher, 'eventBufferSize', defaults.watcher.eventBufferSize, 1),
            errorBufferSize: pickInteger(watcher, 'errorBufferSize', defaults.watcher.errorBufferSize, 1),
            excludedDirectories: pickStringArray(watcher, 'excludedDirectories', defaults.watcher.excludedDirectories),
            usePolling: pickBoolean(watcher, 'usePolling', defaults.watcher.usePolling),
        },
        diff: {
            contextLines: pickInteger(diff, 'contextLines', defaults.diff.contextLines, 0),
            maxFileSizeBytes: pickInteger(diff, 'maxFileSizeBytes', defaults.diff.maxFileSizeBytes, 0),
            binarySampleBytes: pickInteger(diff, 'binarySampleBytes', defaults.diff.binarySampleBytes, 1),
            binaryThreshold: pickRatio(diff, 'binaryThreshold', defaults.diff.binaryThreshold),
        },
        logging: {
            enabled: pickBoolean(logging, 'enabled', defaults.logging.enabled),
            directory: pickString(logging, 'directory', defaults.logging.directory),
        },
    };
}
