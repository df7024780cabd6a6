/** Normalized kinds of filesystem change emitted by the directory watcher. */
export type WatchOperation = 'create' | 'write' | 'remove' | 'rename' | 'chmod' | 'unknown';

/** Normalized, debounced filesystem event payload. */
export interface WatchEvent {
    /** Absolute path of the affected file or directory. */
    readonly path: string;
    readonly operation: WatchOperation;
    /** ISO-8601 timestamp when the raw notification was received. */
    readonly timestamp: string;
}

/** A notification as reported by the underlying watch backend, before normalization. */
export interface RawWatchEvent {
    /** Backend-specific event name (e.g. chokidar's `add`, `change`, `unlinkDir`). */
    name: string;
    path: string;
    isDirectory: boolean;
}

export type RawWatchEventListener = (event: RawWatchEvent) => void;

export type WatchErrorListener = (error: Error) => void;

/**
 * OS-level subscription source. One backend instance serves a whole watcher;
 * each `subscribe` call adds one directory (non-recursively).
 */
export interface WatchBackend {
    subscribe(directory: string): Promise<void>;
    /** Returns an unsubscribe function. */
    onEvent(listener: RawWatchEventListener): () => void;
    /** Returns an unsubscribe function. */
    onError(listener: WatchErrorListener): () => void;
    close(): Promise<void>;
}

export interface DirectoryWatcherOptions {
    /** Subscribe to every non-excluded directory below the root as well. */
    recursive: boolean;
    /** Quiet period per path before an event is emitted. @default 100 */
    debounceMs?: number;
    /** Capacity of the event channel. @default 100 */
    eventBufferSize?: number;
    /** Capacity of the error channel. @default 10 */
    errorBufferSize?: number;
    /** Directory basenames skipped during recursive subscription. */
    excludedDirectories?: readonly string[];
    /** Defaults to a chokidar-backed backend. */
    backend?: WatchBackend;
}
