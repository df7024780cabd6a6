import * as fs from 'node:fs/promises';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, getConfigPath, loadConfig, writeConfig } from '../config/json-config.js';
import { ChangeMonitor, type ChangeOutcome } from '../services/change-monitor.js';
import { DiffEngine } from '../services/diff-engine.js';
import { DirectoryWatcher } from '../services/directory-watcher.js';
import { ChokidarWatchBackend } from '../services/watch-backend.js';
import { configureLogger, logThought } from '../utils/logger.js';
import { describeError } from '../utils/fs-errors.js';
import type { WatchBackend } from '../types/file-watcher.js';
import { handleLogsCli } from './logs-cli.js';

// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: diffwatch [options]
       diffwatch <command> [options]

Commands:
  init                 Write ${CONFIG_FILE_NAME} with the default settings
  logs                 Print a day's activity log

Options:
  --path, -p <dir>     Directory to watch (default: current directory)
  --recursive, -r      Watch all subdirectories as well
  --config <file>      Config file to use instead of ./${CONFIG_FILE_NAME}
  --date <YYYY-MM-DD>  Day to print (logs only, default: today)
  --help, -h           Show this help message

Examples:
  diffwatch
  diffwatch -p ./src -r
  diffwatch init --config ./tools/${CONFIG_FILE_NAME}
  diffwatch logs --date 2026-01-31
`.trim();

// ── Argument parsing ─────────────────────────────────────────────────────────

export type ParsedArgs =
    | { kind: 'help' }
    | { kind: 'watch'; path: string; recursive: boolean; configPath?: string }
    | { kind: 'init'; configPath?: string }
    | { kind: 'logs'; date?: string; configPath?: string }
    | { kind: 'error'; message: string };

const COMMANDS = new Set(['init', 'logs']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
    if (argv.includes('--help') || argv.includes('-h')) return { kind: 'help' };

    let command = 'watch';
    let rest = argv;
    const first = argv[0];
    if (first !== undefined && !first.startsWith('-')) {
        if (!COMMANDS.has(first)) {
            return { kind: 'error', message: `Unknown command: '${first}'` };
        }
        command = first;
        rest = argv.slice(1);
    }

    let watchPath = '.';
    let recursive = false;
    let configPath: string | undefined;
    let date: string | undefined;

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        const takeValue = (): string | undefined => {
            const value = rest[i + 1];
            if (value === undefined || value.startsWith('-')) return undefined;
            i += 1;
            return value;
        };

        switch (arg) {
            case '--path':
            case '-p': {
                const value = takeValue();
                if (value === undefined) return { kind: 'error', message: `Option '${arg}' requires a directory.` };
                watchPath = value;
                break;
            }
            case '--recursive':
            case '-r':
                recursive = true;
                break;
            case '--config': {
                const value = takeValue();
                if (value === undefined) return { kind: 'error', message: `Option '${arg}' requires a file path.` };
                configPath = value;
                break;
            }
            case '--date': {
                const value = takeValue();
                if (value === undefined) return { kind: 'error', message: `Option '${arg}' requires a date.` };
                date = value;
                break;
            }
            default:
                return { kind: 'error', message: `Unknown option: '${arg}'` };
        }
    }

    if (command === 'init') return { kind: 'init', configPath };
    if (command === 'logs') return { kind: 'logs', date, configPath };
    return { kind: 'watch', path: watchPath, recursive, configPath };
}

// ── Output ───────────────────────────────────────────────────────────────────

export interface CliIo {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export interface CliContext {
    io?: CliIo;
    /** Aborting stops the watcher and lets `runCli` resolve. */
    signal?: AbortSignal;
    /** Replaces the chokidar backend (tests). */
    backend?: WatchBackend;
}

const processIo: CliIo = {
    stdout: (text) => {
        process.stdout.write(text);
    },
    stderr: (text) => {
        process.stderr.write(text);
    },
};

/** Plain-text rendering of an outcome, or `null` when there is nothing to show. */
export function formatOutcome(outcome: ChangeOutcome): string | null {
    const { event } = outcome;
    const prefix = `[${event.timestamp.slice(11, 19)}] ${event.operation}: ${event.path}`;

    switch (outcome.kind) {
        case 'diff': {
            const body = outcome.result.unifiedText;
            return `${prefix}\n${body.endsWith('\n') ? body : `${body}\n`}`;
        }
        case 'too-large':
            return `${prefix}\nfile too large for diff (${outcome.sizeBytes} bytes, max ${outcome.limitBytes} bytes)\n`;
        case 'unchanged':
        case 'missing':
        case 'directory':
            return null;
    }
}

// ── Command handlers ─────────────────────────────────────────────────────────

async function handleInitCli(configPath: string | undefined, io: CliIo): Promise<number> {
    const target = getConfigPath(configPath);
    try {
        await fs.access(target);
        io.stderr(`[Diffwatch] Config already exists at ${target}.\n`);
        return 1;
    } catch {
        // Absent: write it below.
    }

    const written = await writeConfig(DEFAULT_CONFIG, target);
    io.stdout(`Wrote default config to ${written}\n`);
    return 0;
}

async function handleWatchCli(
    args: { path: string; recursive: boolean; configPath?: string },
    context: CliContext,
    io: CliIo,
): Promise<number> {
    try {
        await fs.stat(args.path);
    } catch {
        io.stderr(`Error: path does not exist: ${args.path}\n`);
        return 1;
    }

    const config = await loadConfig(args.configPath);
    configureLogger(config.logging);

    let watcher: DirectoryWatcher;
    try {
        watcher = await DirectoryWatcher.create(args.path, {
            recursive: args.recursive,
            debounceMs: config.watcher.debounceMs,
            eventBufferSize: config.watcher.eventBufferSize,
            errorBufferSize: config.watcher.errorBufferSize,
            excludedDirectories: config.watcher.excludedDirectories,
            backend: context.backend ?? new ChokidarWatchBackend({ usePolling: config.watcher.usePolling }),
        });
    } catch (err) {
        io.stderr(`Error creating watcher: ${describeError(err)}\n`);
        return 1;
    }

    const stop = (): void => {
        void watcher.close();
    };
    if (context.signal?.aborted) {
        stop();
    } else {
        context.signal?.addEventListener('abort', stop, { once: true });
    }

    const monitor = new ChangeMonitor({
        maxFileSizeBytes: config.diff.maxFileSizeBytes,
        engine: new DiffEngine(config.diff),
    });

    io.stdout(`Watching ${watcher.root}${args.recursive ? ' (recursive)' : ''}. Press Ctrl+C to stop.\n`);

    try {
        await monitor.run(watcher, {
            onOutcome: (outcome) => {
                const text = formatOutcome(outcome);
                if (text) io.stdout(text);
            },
            onError: (error) => {
                io.stderr(`Error: ${error.message}\n`);
            },
        });
    } finally {
        context.signal?.removeEventListener('abort', stop);
        await watcher.close();
    }

    void logThought(`[Diffwatch] Session for ${watcher.root} ended.`);
    return 0;
}

/** Entry point shared by the binary and the tests. Resolves to the exit code. */
export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
    const io = context.io ?? processIo;
    const parsed = parseArgs(argv);

    switch (parsed.kind) {
        case 'help':
            io.stdout(`${HELP_TEXT}\n`);
            return 0;
        case 'error':
            io.stderr(`[Diffwatch] ${parsed.message}\nRun 'diffwatch --help' to see available commands.\n`);
            return 1;
        case 'init':
            return handleInitCli(parsed.configPath, io);
        case 'logs': {
            const config = await loadConfig(parsed.configPath);
            configureLogger(config.logging);
            return handleLogsCli(parsed.date, io);
        }
        case 'watch':
            return handleWatchCli(parsed, context, io);
    }
}
