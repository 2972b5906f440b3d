interface CacheEntry<T> {
    value: T;
    storedAt: number;
}

export type Clock = () => number;

/**
 * Small keyed cache whose entries expire after a fixed freshness window.
 * Expired entries are refetched on the next read; concurrent loads of one key share a single promise.
 */
export class TtlCache<T> {
    private entries: Map<string, CacheEntry<T>> = new Map();
    private inFlight: Map<string, Promise<T>> = new Map();
    private readonly ttlMs: number;
    private readonly now: Clock;

    constructor(ttlMs: number, now: Clock = Date.now) {
        this.ttlMs = ttlMs;
        this.now = now;
    }

    public get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (this.now() - entry.storedAt >= this.ttlMs) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    public set(key: string, value: T): void {
        this.entries.set(key, { value, storedAt: this.now() });
    }

    /**
     * Returns the fresh cached value, or runs `loader` and caches what it resolves to.
     * A rejected load is not cached.
     */
    public async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
        const cached = this.get(key);
        if (cached !== undefined) {
            return cached;
        }
        const pending = this.inFlight.get(key);
        if (pending) {
            return pending;
        }

        const load = loader()
            .then(value => {
                this.set(key, value);
                return value;
            })
            .finally(() => {
                this.inFlight.delete(key);
            });
        this.inFlight.set(key, load);
        return load;
    }
}
