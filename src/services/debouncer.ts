export interface DebouncerOptions {
    delayMs: number;
}

export const DEFAULT_DEBOUNCE_MS = 100;

/**
 * Per-key delayed-callback coalescer.
 *
 * Each `add` for a key restarts that key's timer and replaces its callback, so
 * only the most recently supplied callback fires once the key has been quiet
 * for `delayMs`. Entries are dropped as soon as their timer fires.
 */
export class Debouncer {
    readonly #delayMs: number;
    readonly #timers: Map<string, NodeJS.Timeout> = new Map();
    #stopped = false;

    constructor(options: Partial<DebouncerOptions> = {}) {
        this.#delayMs = Math.max(0, Math.floor(options.delayMs ?? DEFAULT_DEBOUNCE_MS));
    }

    get delayMs(): number {
        return this.#delayMs;
    }

    get stopped(): boolean {
        return this.#stopped;
    }

    add(key: string, callback: () => void): void {
        if (this.#stopped) return;

        const existing = this.#timers.get(key);
        if (existing) {
            clearTimeout(existing);
        }

        const timer = setTimeout(() => {
            this.#timers.delete(key);
            try {
                callback();
            } catch (err) {
                console.error(`[Debouncer] Callback for '${key}' threw an error:`, err);
            }
        }, this.#delayMs);

        this.#timers.set(key, timer);
    }

    /** Cancel every pending callback. Later `add` calls are ignored. */
    stop(): void {
        this.#stopped = true;
        for (const timer of this.#timers.values()) {
            clearTimeout(timer);
        }
        this.#timers.clear();
    }

    getPendingCount(): number {
        return this.#timers.size;
    }
}
