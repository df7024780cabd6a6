import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { logThought } from '../utils/logger.js';
import { describeError, isNotFoundError } from '../utils/fs-errors.js';
import { DiffEngine } from './diff-engine.js';
import { SnapshotStore } from './snapshot-store.js';
import type { DiffResult } from '../types/diff.js';
import type { WatchEvent } from '../types/file-watcher.js';

export const DEFAULT_MAX_FILE_SIZE_BYTES = 1024 * 1024;

export type ChangeOutcome =
    | { kind: 'diff'; event: WatchEvent; result: DiffResult }
    | { kind: 'unchanged'; event: WatchEvent }
    | { kind: 'missing'; event: WatchEvent }
    | { kind: 'directory'; event: WatchEvent }
    | { kind: 'too-large'; event: WatchEvent; sizeBytes: number; limitBytes: number };

/** Where `run` reads events and errors from; a `DirectoryWatcher` fits. */
export interface ChangeSource {
    readonly events: AsyncIterable<WatchEvent>;
    readonly errors: AsyncIterable<Error>;
}

export interface ChangeHandlers {
    onOutcome(outcome: ChangeOutcome): void | Promise<void>;
    onError(error: Error): void | Promise<void>;
}

export interface ChangeMonitorOptions {
    /** Files above this size are reported instead of diffed. @default 1 MiB */
    maxFileSizeBytes: number;
    store: SnapshotStore;
    engine: DiffEngine;
    stat: (path: string) => Promise<Stats>;
}

/**
 * Turns watcher events into diff outcomes: gates oversized files and
 * directories, refreshes the snapshot for the path and diffs it against the
 * previous one.
 */
export class ChangeMonitor {
    readonly #maxFileSizeBytes: number;
    readonly #store: SnapshotStore;
    readonly #engine: DiffEngine;
    readonly #stat: (path: string) => Promise<Stats>;

    constructor(options: Partial<ChangeMonitorOptions> = {}) {
        this.#maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
        this.#store = options.store ?? new SnapshotStore();
        this.#engine = options.engine ?? new DiffEngine();
        this.#stat = options.stat ?? ((filePath) => fs.stat(filePath));
    }

    get store(): SnapshotStore {
        return this.#store;
    }

    async process(event: WatchEvent): Promise<ChangeOutcome> {
        // A removed path cannot be stat'ed; diff against the last snapshot directly.
        if (event.operation === 'remove') {
            return this.#diff(event);
        }

        let stats: Stats;
        try {
            stats = await this.#stat(event.path);
        } catch (err) {
            if (isNotFoundError(err)) return { kind: 'missing', event };
            throw new Error(`[ChangeMonitor] Cannot stat '${event.path}': ${describeError(err)}`, { cause: err });
        }

        if (stats.isDirectory()) {
            return { kind: 'directory', event };
        }

        if (stats.size > this.#maxFileSizeBytes) {
            return { kind: 'too-large', event, sizeBytes: stats.size, limitBytes: this.#maxFileSizeBytes };
        }

        return this.#diff(event);
    }

    /**
     * Drain `source` until both of its streams end. Events are processed one at
     * a time; processing failures and source errors go to `onError`.
     */
    async run(source: ChangeSource, handlers: ChangeHandlers): Promise<void> {
        const drainEvents = async (): Promise<void> => {
            for await (const event of source.events) {
                let outcome: ChangeOutcome;
                try {
                    outcome = await this.process(event);
                } catch (err) {
                    await handlers.onError(err instanceof Error ? err : new Error(String(err)));
                    continue;
                }
                await handlers.onOutcome(outcome);
            }
        };

        const drainErrors = async (): Promise<void> => {
            for await (const error of source.errors) {
                void logThought(`[ChangeMonitor] Watcher error: ${error.message}`);
                await handlers.onError(error);
            }
        };

        await Promise.all([drainEvents(), drainErrors()]);
    }

    async #diff(event: WatchEvent): Promise<ChangeOutcome> {
        const { previous, current } = await this.#store.update(event.path);
        const result = this.#engine.compute(previous, current);
        return result.hasDiff ? { kind: 'diff', event, result } : { kind: 'unchanged', event };
    }
}
