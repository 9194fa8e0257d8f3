/**
 * In-memory TTL cache
 *
 * Entries carry their own expiry, set per write. Expired entries are dropped
 * on read. The clock is injectable so tests can move time.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

interface CacheEntry<T> {
    value: T;
    cachedAt: number;
    expiresAt: number;
}

export class TtlCache<T> {
    private entries = new Map<string, CacheEntry<T>>();

    constructor(private readonly clock: Clock = systemClock) {}

    get(key: string): T | null {
        const entry = this.entries.get(key);
        if (!entry) return null;

        if (this.clock() >= entry.expiresAt) {
            this.entries.delete(key);
            return null;
        }
        return entry.value;
    }

    set(key: string, value: T, ttlMs: number): void {
        const now = this.clock();
        this.entries.set(key, { value, cachedAt: now, expiresAt: now + ttlMs });
    }

    has(key: string): boolean {
        return this.get(key) !== null;
    }

    delete(key: string): void {
        this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    getStats(): { size: number; keys: string[] } {
        return {
            size: this.entries.size,
            keys: Array.from(this.entries.keys()),
        };
    }
}
