import * as fs from 'node:fs/promises';
import type { Snapshot, SnapshotUpdate } from '../types/diff.js';
import { describeError, isNotFoundError } from '../utils/fs-errors.js';

export interface SnapshotStoreOptions {
    readFile?: (path: string) => Promise<Buffer>;
}

/**
 * Keeps the last-read content of every path it has been asked about.
 *
 * Updates for one path run one after another, so the `previous` snapshot of a
 * call is always the `current` snapshot of the call before it. The stored entry
 * is swapped in a single synchronous step once the read has settled.
 */
export class SnapshotStore {
    readonly #snapshots: Map<string, Snapshot> = new Map();
    readonly #inFlight: Map<string, Promise<void>> = new Map();
    readonly #readFile: (path: string) => Promise<Buffer>;

    constructor(options: SnapshotStoreOptions = {}) {
        this.#readFile = options.readFile ?? ((filePath) => fs.readFile(filePath));
    }

    get size(): number {
        return this.#snapshots.size;
    }

    get(path: string): Snapshot | undefined {
        return this.#snapshots.get(path);
    }

    /**
     * Read `path` and replace its stored snapshot.
     * A missing file yields an absent snapshot; any other read error rejects and
     * leaves the stored entry as it was.
     */
    async update(path: string): Promise<SnapshotUpdate> {
        const prior = this.#inFlight.get(path) ?? Promise.resolve();
        const task = prior.then(() => this.#capture(path));
        const settled = task.then(
            () => undefined,
            () => undefined,
        );
        this.#inFlight.set(path, settled);

        try {
            return await task;
        } finally {
            if (this.#inFlight.get(path) === settled) {
                this.#inFlight.delete(path);
            }
        }
    }

    remove(path: string): boolean {
        return this.#snapshots.delete(path);
    }

    clear(): void {
        this.#snapshots.clear();
    }

    async #capture(path: string): Promise<SnapshotUpdate> {
        let content: Buffer | null;
        try {
            content = await this.#readFile(path);
        } catch (err) {
            if (!isNotFoundError(err)) {
                throw new Error(`[SnapshotStore] Failed to read '${path}': ${describeError(err)}`, { cause: err });
            }
            content = null;
        }

        const previous: Snapshot = this.#snapshots.get(path) ?? { path, exists: false };
        const current: Snapshot = content === null
            ? { path, exists: false }
            : { path, exists: true, content };

        this.#snapshots.set(path, current);
        return { previous, current };
    }
}
