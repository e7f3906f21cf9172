import { RegistryEntry } from '../../types';
import { RegistrySource } from './provider';

interface CacheEntry {
    results: RegistryEntry[];
    timestamp: number;
}

export interface CacheOptions {
    ttlMs: number;
    maxEntries: number;
    now?: () => number;
}

/**
 * Memoizes successful lookups of another source. Failures are never cached,
 * so an outage is retried on the next query.
 */
export class CachedRegistrySource implements RegistrySource {
    readonly name: string;
    private cache = new Map<string, CacheEntry>();
    private hits = 0;
    private misses = 0;
    private readonly now: () => number;

    constructor(private readonly inner: RegistrySource, private readonly options: CacheOptions) {
        this.name = `Cached(${inner.name})`;
        this.now = options.now ?? Date.now;
    }

    async fetchCandidates(query: string): Promise<RegistryEntry[]> {
        const key = query.trim();
        const cached = this.getCached(key);
        if (cached) {
            this.hits++;
            return cached;
        }

        this.misses++;
        const results = await this.inner.fetchCandidates(query);
        this.setCache(key, results);
        return results;
    }

    clear(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
    }

    getStats(): { size: number; hits: number; misses: number } {
        return { size: this.cache.size, hits: this.hits, misses: this.misses };
    }

    private getCached(key: string): RegistryEntry[] | null {
        const entry = this.cache.get(key);
        if (!entry) return null;

        if (this.now() - entry.timestamp < this.options.ttlMs) {
            return entry.results;
        }

        // Remove expired entry
        this.cache.delete(key);
        return null;
    }

    private setCache(key: string, results: RegistryEntry[]): void {
        this.purgeExpiredEntries();
        this.cache.set(key, { results, timestamp: this.now() });
        this.enforceCacheLimit();
    }

    private purgeExpiredEntries(): void {
        const now = this.now();
        for (const [key, entry] of this.cache.entries()) {
            if (now - entry.timestamp >= this.options.ttlMs) {
                this.cache.delete(key);
            }
        }
    }

    private enforceCacheLimit(): void {
        if (this.cache.size <= this.options.maxEntries) {
            return;
        }

        // Map keeps insertion order, so the oldest entries come first
        const overflow = this.cache.size - this.options.maxEntries;
        const oldest = Array.from(this.cache.keys()).slice(0, overflow);
        for (const key of oldest) {
            this.cache.delete(key);
        }
    }
}
