import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { logThought } from '../utils/logger.js';
import { BoundedChannel, type ReceiveChannel } from '../utils/bounded-channel.js';
import { describeError, isNotFoundError, isPermissionError } from '../utils/fs-errors.js';
import { Debouncer, DEFAULT_DEBOUNCE_MS } from './debouncer.js';
import { ChokidarWatchBackend } from './watch-backend.js';
import type {
    DirectoryWatcherOptions,
    RawWatchEvent,
    WatchBackend,
    WatchEvent,
    WatchOperation,
} from '../types/file-watcher.js';

/** Build output, VCS metadata and dependency caches never worth subscribing to. */
export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = [
    '.git',
    'node_modules',
    '.cache',
    '.npm',
    '.cargo',
    '.rustup',
    '__pycache__',
    '.pytest_cache',
    '.venv',
    'venv',
    '.tox',
    'dist',
    'build',
    'target',
    '.next',
    '.nuxt',
    'vendor',
    '.gradle',
    '.m2',
    '.idea',
    '.vscode',
];

export const DEFAULT_EVENT_BUFFER_SIZE = 100;
export const DEFAULT_ERROR_BUFFER_SIZE = 10;

const OPERATION_BY_RAW_EVENT: ReadonlyMap<string, WatchOperation> = new Map([
    ['add', 'create'],
    ['addDir', 'create'],
    ['create', 'create'],
    ['change', 'write'],
    ['write', 'write'],
    ['unlink', 'remove'],
    ['unlinkDir', 'remove'],
    ['remove', 'remove'],
    ['rename', 'rename'],
    ['chmod', 'chmod'],
]);

/** Map a backend event name onto the closed operation set. */
export function normalizeOperation(rawEventName: string): WatchOperation {
    return OPERATION_BY_RAW_EVENT.get(rawEventName) ?? 'unknown';
}

/**
 * Watches a directory (optionally its whole subtree) and publishes debounced,
 * normalized change events on a bounded channel.
 *
 * Usage:
 * ```ts
 * const watcher = await DirectoryWatcher.create('./src', { recursive: true });
 * for await (const event of watcher.events) {
 *   console.log(event.operation, event.path);
 * }
 * ```
 *
 * Sends never block: once a channel is full, further events or errors are
 * dropped until the consumer catches up.
 */
export class DirectoryWatcher {
    readonly #root: string;
    readonly #recursive: boolean;
    readonly #backend: WatchBackend;
    readonly #debouncer: Debouncer;
    readonly #events: BoundedChannel<WatchEvent>;
    readonly #errors: BoundedChannel<Error>;
    readonly #excluded: ReadonlySet<string>;
    readonly #watchedDirs: Set<string> = new Set();
    readonly #pendingWalks: Set<Promise<void>> = new Set();
    readonly #unsubscribers: (() => void)[] = [];
    #closed = false;
    #closing: Promise<void> | null = null;

    private constructor(root: string, options: DirectoryWatcherOptions, backend: WatchBackend) {
        this.#root = root;
        this.#recursive = options.recursive;
        this.#backend = backend;
        this.#debouncer = new Debouncer({ delayMs: options.debounceMs ?? DEFAULT_DEBOUNCE_MS });
        this.#events = new BoundedChannel(options.eventBufferSize ?? DEFAULT_EVENT_BUFFER_SIZE);
        this.#errors = new BoundedChannel(options.errorBufferSize ?? DEFAULT_ERROR_BUFFER_SIZE);
        this.#excluded = new Set(options.excludedDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES);
    }

    /**
     * Resolve `target`, subscribe to it and, when recursive, start subscribing its
     * subtree in the background. Rejects when the root cannot be watched.
     */
    static async create(target: string, options: DirectoryWatcherOptions): Promise<DirectoryWatcher> {
        const root = path.resolve(target);

        let isDirectory: boolean;
        try {
            isDirectory = (await fs.stat(root)).isDirectory();
        } catch (err) {
            throw new Error(`[DirectoryWatcher] Cannot watch '${root}': ${describeError(err)}`, { cause: err });
        }

        const backend = options.backend ?? new ChokidarWatchBackend();
        const watcher = new DirectoryWatcher(root, options, backend);

        try {
            await watcher.#start(isDirectory);
        } catch (err) {
            await watcher.close();
            throw new Error(`[DirectoryWatcher] Failed to subscribe '${root}': ${describeError(err)}`, { cause: err });
        }

        return watcher;
    }

    get root(): string {
        return this.#root;
    }

    get recursive(): boolean {
        return this.#recursive;
    }

    get closed(): boolean {
        return this.#closed;
    }

    get events(): ReceiveChannel<WatchEvent> {
        return this.#events;
    }

    get errors(): ReceiveChannel<Error> {
        return this.#errors;
    }

    /** Sorted copy of every directory subscribed so far. */
    watchedDirectories(): string[] {
        return [...this.#watchedDirs].sort();
    }

    /** Resolves once every in-flight subtree subscription has finished. */
    async whenIdle(): Promise<void> {
        while (this.#pendingWalks.size > 0) {
            await Promise.all([...this.#pendingWalks]);
        }
    }

    /** Idempotent: stops the debouncer, closes both channels and releases the backend. */
    close(): Promise<void> {
        if (this.#closing) return this.#closing;

        this.#closed = true;
        this.#debouncer.stop();
        this.#events.close();
        this.#errors.close();
        for (const unsubscribe of this.#unsubscribers.splice(0)) {
            unsubscribe();
        }

        this.#closing = this.#backend.close().then(() => {
            void logThought(`[DirectoryWatcher] Stopped watching ${this.#root}.`);
        });
        return this.#closing;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #start(rootIsDirectory: boolean): Promise<void> {
        this.#unsubscribers.push(
            this.#backend.onEvent((event) => this.#handleRawEvent(event)),
            this.#backend.onError((error) => this.#sendError(error)),
        );

        await this.#backend.subscribe(this.#root);
        this.#watchedDirs.add(this.#root);

        if (this.#recursive && rootIsDirectory) {
            this.#spawnSubtreeWalk(this.#root, false, 'Recursive watch setup failed');
        }

        void logThought(
            `[DirectoryWatcher] Started watching ${this.#root}${this.#recursive ? ' (recursive)' : ''}.`,
        );
    }

    #handleRawEvent(raw: RawWatchEvent): void {
        if (this.#closed) return;

        const operation = normalizeOperation(raw.name);

        if (
            this.#recursive
            && operation === 'create'
            && raw.isDirectory
            && !this.#excluded.has(path.basename(raw.path))
        ) {
            this.#spawnSubtreeWalk(raw.path, true, 'Failed to watch new directory');
        }

        const event: WatchEvent = {
            path: raw.path,
            operation,
            timestamp: new Date().toISOString(),
        };

        this.#debouncer.add(raw.path, () => {
            this.#sendEvent(event);
        });
    }

    #spawnSubtreeWalk(directory: string, resubscribe: boolean, failureContext: string): void {
        const walk = this.#subscribeTree(directory, resubscribe).catch((err: unknown) => {
            this.#sendError(new Error(`[DirectoryWatcher] ${failureContext} '${directory}': ${describeError(err)}`, { cause: err }));
        });

        this.#pendingWalks.add(walk);
        void walk.finally(() => {
            this.#pendingWalks.delete(walk);
        });
    }

    /**
     * Subscribe `directory` and every non-excluded directory below it.
     * Descendants already in the set are skipped with their children. With
     * `resubscribe`, the starting directory is subscribed again even when known,
     * so a directory that was deleted and recreated is picked up. Permission
     * errors and directories that vanish mid-walk end that branch quietly.
     */
    async #subscribeTree(directory: string, resubscribe: boolean): Promise<void> {
        if (this.#closed) return;

        const known = this.#watchedDirs.has(directory);
        if (!known || resubscribe) {
            this.#watchedDirs.add(directory);
            try {
                await this.#backend.subscribe(directory);
            } catch (err) {
                if (!known) this.#watchedDirs.delete(directory);
                if (this.#closed || isPermissionError(err)) return;
                throw err;
            }
        }

        let entries: Dirent[];
        try {
            entries = await fs.readdir(directory, { withFileTypes: true });
        } catch (err) {
            if (isPermissionError(err) || isNotFoundError(err)) return;
            throw err;
        }

        for (const entry of entries) {
            if (this.#closed) return;
            if (!entry.isDirectory() || this.#excluded.has(entry.name)) continue;

            const child = path.join(directory, entry.name);
            if (this.#watchedDirs.has(child)) continue;

            await this.#subscribeTree(child, false);
        }
    }

    #sendEvent(event: WatchEvent): void {
        if (this.#closed) return;
        this.#events.trySend(event);
    }

    #sendError(error: Error): void {
        if (this.#closed) return;
        this.#errors.trySend(error);
    }
}
