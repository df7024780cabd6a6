import { watch, type FSWatcher } from 'chokidar';
import type {
    RawWatchEventListener,
    WatchBackend,
    WatchErrorListener,
} from '../types/file-watcher.js';

export interface ChokidarWatchBackendOptions {
    /** Poll instead of using native events (network drives, containers). */
    usePolling: boolean;
    /** Polling interval in ms when `usePolling` is set. */
    interval: number;
}

const DEFAULT_POLL_INTERVAL_MS = 100;

/**
 * `WatchBackend` on top of a single chokidar watcher.
 *
 * The watcher runs at `depth: 0`, so every `subscribe` covers one directory and
 * its direct entries; recursion is driven by the caller. The first subscription
 * resolves once chokidar reports `ready`.
 */
export class ChokidarWatchBackend implements WatchBackend {
    readonly #options: ChokidarWatchBackendOptions;
    readonly #eventListeners: Set<RawWatchEventListener> = new Set();
    readonly #errorListeners: Set<WatchErrorListener> = new Set();
    #watcher: FSWatcher | null = null;
    #closed = false;

    constructor(options: Partial<ChokidarWatchBackendOptions> = {}) {
        this.#options = {
            usePolling: options.usePolling ?? false,
            interval: options.interval ?? DEFAULT_POLL_INTERVAL_MS,
        };
    }

    async subscribe(directory: string): Promise<void> {
        if (this.#closed) {
            throw new Error(`[WatchBackend] Cannot subscribe '${directory}' after close.`);
        }

        if (this.#watcher) {
            this.#watcher.add(directory);
            return;
        }

        const watcher = watch(directory, {
            depth: 0,
            persistent: true,
            ignoreInitial: true,
            ignorePermissionErrors: true,
            followSymlinks: false,
            usePolling: this.#options.usePolling,
            interval: this.#options.interval,
        });
        this.#watcher = watcher;

        watcher.on('all', (eventName, filePath) => {
            const event = {
                name: eventName,
                path: filePath,
                isDirectory: eventName === 'addDir' || eventName === 'unlinkDir',
            };
            for (const listener of this.#eventListeners) {
                listener(event);
            }
        });

        watcher.on('error', (err: unknown) => {
            const error = err instanceof Error ? err : new Error(String(err));
            for (const listener of this.#errorListeners) {
                listener(error);
            }
        });

        await new Promise<void>((resolve, reject) => {
            const onReady = (): void => {
                watcher.off('error', onStartupError);
                resolve();
            };
            const onStartupError = (err: Error): void => {
                watcher.off('ready', onReady);
                reject(err);
            };
            watcher.once('ready', onReady);
            watcher.once('error', onStartupError);
        });
    }

    onEvent(listener: RawWatchEventListener): () => void {
        this.#eventListeners.add(listener);
        return () => {
            this.#eventListeners.delete(listener);
        };
    }

    onError(listener: WatchErrorListener): () => void {
        this.#errorListeners.add(listener);
        return () => {
            this.#errorListeners.delete(listener);
        };
    }

    async close(): Promise<void> {
        if (this.#closed) return;
        this.#closed = true;

        this.#eventListeners.clear();
        this.#errorListeners.clear();

        const watcher = this.#watcher;
        this.#watcher = null;
        if (watcher) {
            await watcher.close();
        }
    }
}
