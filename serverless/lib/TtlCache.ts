/**
 * In-memory key/value store with an independent expiry per key.
 *
 * Expired entries are evicted lazily: `get` drops an entry it finds expired, and
 * `cleanupExpired` sweeps everything when maintenance asks for it. Nothing runs in the
 * background. Every method is a synchronous map operation, so callers on the event loop
 * never observe a half-applied write.
 */

export interface CacheEntry<T> {
    value: T;
    expiresAt: number; // epoch ms
    createdAt: number; // epoch ms
}

export interface CacheStats {
    totalEntries: number;
    activeEntries: number;
    expiredEntries: number;
}

export interface TtlCacheOptions {
    name?: string;
    debug?: boolean;
    now?: () => number;
}

export class TtlCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();
    private readonly name: string;
    private readonly debug: boolean;
    private readonly now: () => number;

    constructor(options: TtlCacheOptions = {}) {
        this.name = options.name ?? 'cache';
        this.debug = options.debug ?? false;
        this.now = options.now ?? Date.now;
    }

    get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }

        if (this.now() > entry.expiresAt) {
            this.entries.delete(key);
            if (this.debug) console.log(`[${this.name}] Key '${key}' expired and removed`);
            return undefined;
        }

        if (this.debug) console.log(`[${this.name}] Hit for key '${key}'`);
        return entry.value;
    }

    /**
     * Store a value for ttlSeconds. A later set on the same key replaces the entry;
     * a non-positive TTL stores nothing and drops any existing entry.
     */
    set(key: string, value: T, ttlSeconds: number): void {
        if (ttlSeconds <= 0) {
            this.entries.delete(key);
            return;
        }

        const createdAt = this.now();
        this.entries.set(key, {
            value,
            expiresAt: createdAt + ttlSeconds * 1000,
            createdAt,
        });
        if (this.debug) console.log(`[${this.name}] Key '${key}' set with TTL ${ttlSeconds}s`);
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    cleanupExpired(): number {
        const now = this.now();
        let removed = 0;

        for (const [key, entry] of this.entries) {
            if (now > entry.expiresAt) {
                this.entries.delete(key);
                removed++;
            }
        }

        if (removed > 0) {
            console.log(`[${this.name}] Cleaned up ${removed} expired entries`);
        }

        return removed;
    }

    stats(): CacheStats {
        const now = this.now();
        let activeEntries = 0;

        for (const entry of this.entries.values()) {
            if (now <= entry.expiresAt) activeEntries++;
        }

        return {
            totalEntries: this.entries.size,
            activeEntries,
            expiredEntries: this.entries.size - activeEntries,
        };
    }
}

export default TtlCache;
