/** Read side of a channel, handed to consumers. */
export interface ReceiveChannel<T> extends AsyncIterable<T> {
    readonly capacity: number;
    readonly size: number;
    readonly closed: boolean;
    /** Items rejected by `trySend` because the buffer was full. */
    readonly droppedCount: number;
    receive(): Promise<IteratorResult<T, undefined>>;
}

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Fixed-capacity FIFO with a non-blocking, drop-on-full send.
 *
 * Producers never wait: `trySend` hands the item to a waiting receiver, buffers
 * it, or drops it when the buffer is full. After `close()` the buffered items
 * can still be received, then every receive reports `done`.
 */
export class BoundedChannel<T> implements ReceiveChannel<T> {
    readonly #capacity: number;
    readonly #buffer: T[] = [];
    readonly #waiters: Waiter<T>[] = [];
    #closed = false;
    #dropped = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`[BoundedChannel] Capacity must be a positive integer, got ${capacity}.`);
        }
        this.#capacity = capacity;
    }

    get capacity(): number {
        return this.#capacity;
    }

    get size(): number {
        return this.#buffer.length;
    }

    get closed(): boolean {
        return this.#closed;
    }

    get droppedCount(): number {
        return this.#dropped;
    }

    /** Returns `false` when the item was dropped (channel full or closed). */
    trySend(item: T): boolean {
        if (this.#closed) return false;

        const waiter = this.#waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
            return true;
        }

        if (this.#buffer.length >= this.#capacity) {
            this.#dropped += 1;
            return false;
        }

        this.#buffer.push(item);
        return true;
    }

    receive(): Promise<IteratorResult<T, undefined>> {
        if (this.#buffer.length > 0) {
            const item = this.#buffer[0];
            this.#buffer.shift();
            return Promise.resolve({ value: item, done: false });
        }

        if (this.#closed) {
            return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise((resolve) => {
            this.#waiters.push(resolve);
        });
    }

    close(): void {
        if (this.#closed) return;
        this.#closed = true;

        for (const waiter of this.#waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.receive(),
        };
    }
}
