import type {
    RawWatchEvent,
    RawWatchEventListener,
    WatchBackend,
    WatchErrorListener,
} from '../../src/types/file-watcher.js';

/** In-memory backend: records subscriptions and lets tests push raw notifications. */
export class FakeWatchBackend implements WatchBackend {
    readonly #subscribed: string[] = [];
    readonly #failures = new Map<string, Error>();
    readonly #eventListeners = new Set<RawWatchEventListener>();
    readonly #errorListeners = new Set<WatchErrorListener>();
    #closeCount = 0;

    /** Directories subscribed so far, in order. */
    get subscribed(): readonly string[] {
        return this.#subscribed;
    }

    /** Errors to throw from `subscribe`, by directory. */
    get failures(): Map<string, Error> {
        return this.#failures;
    }

    get closeCount(): number {
        return this.#closeCount;
    }

    async subscribe(directory: string): Promise<void> {
        const failure = this.#failures.get(directory);
        if (failure) throw failure;
        this.#subscribed.push(directory);
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
        this.#closeCount += 1;
    }

    get listenerCount(): number {
        return this.#eventListeners.size + this.#errorListeners.size;
    }

    emit(name: string, path: string, isDirectory = false): void {
        const event: RawWatchEvent = { name, path, isDirectory };
        for (const listener of this.#eventListeners) {
            listener(event);
        }
    }

    emitError(error: Error): void {
        for (const listener of this.#errorListeners) {
            listener(error);
        }
    }
}

export function errnoError(code: string, message = `${code}: simulated`): NodeJS.ErrnoException {
    const err: NodeJS.ErrnoException = new Error(message);
    err.code = code;
    return err;
}
