/**
 * In-memory TTL cache for upstream data, partitioned by category.
 *
 * Entries are replaced, never mutated. Expired entries are purged lazily on
 * lookup. `getOrLoad` joins an in-flight load for the same key so concurrent
 * requests for one symbol cause a single upstream call.
 */

import type { FinancialIndicatorSet, NewsItem, PriceSeries } from '../../src/types/scoring';

export type CacheCategory = 'price' | 'fundamental' | 'news';

export interface CachePayloads {
    price: PriceSeries;
    fundamental: FinancialIndicatorSet;
    news: NewsItem[];
}

export interface CacheEntry<T> {
    payload: T;
    fetchedAt: number;
    ttl: number;
}

export type CacheTtls = Record<CacheCategory, number>;

export const DEFAULT_CACHE_TTLS: CacheTtls = {
    price: 60 * 60 * 1000,            // 1 hour
    fundamental: 6 * 60 * 60 * 1000,  // 6 hours
    news: 2 * 60 * 60 * 1000,         // 2 hours
};

const isValid = <T>(entry: CacheEntry<T>, now: number): boolean => now - entry.fetchedAt < entry.ttl;

export class TtlStore<T> {
    private entries = new Map<string, CacheEntry<T>>();
    private inflight = new Map<string, Promise<T>>();

    constructor(
        private ttl: number,
        private now: () => number = Date.now
    ) {}

    get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (!isValid(entry, this.now())) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.payload;
    }

    put(key: string, payload: T): void {
        this.entries.set(key, { payload, fetchedAt: this.now(), ttl: this.ttl });
    }

    async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
        const cached = this.get(key);
        if (cached !== undefined) return cached;

        const pending = this.inflight.get(key);
        if (pending) return pending;

        // Loader runs on a later tick so the in-flight entry exists before it can settle.
        const load = Promise.resolve()
            .then(loader)
            .then(payload => {
                this.put(key, payload);
                return payload;
            })
            .finally(() => {
                this.inflight.delete(key);
            });
        this.inflight.set(key, load);
        return load;
    }

    purgeExpired(): number {
        const now = this.now();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (!isValid(entry, now)) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.entries.size;
    }

    get pendingLoads(): number {
        return this.inflight.size;
    }
}

type Stores = { [C in CacheCategory]: TtlStore<CachePayloads[C]> };

export class DataCache {
    private stores: Stores;

    constructor(ttls: CacheTtls = DEFAULT_CACHE_TTLS, now: () => number = Date.now) {
        this.stores = {
            price: new TtlStore<PriceSeries>(ttls.price, now),
            fundamental: new TtlStore<FinancialIndicatorSet>(ttls.fundamental, now),
            news: new TtlStore<NewsItem[]>(ttls.news, now),
        };
    }

    private store<C extends CacheCategory>(category: C): Stores[C] {
        return this.stores[category];
    }

    get<C extends CacheCategory>(category: C, key: string): CachePayloads[C] | undefined {
        return this.store(category).get(key);
    }

    put<C extends CacheCategory>(category: C, key: string, value: CachePayloads[C]): void {
        this.store(category).put(key, value);
    }

    getOrLoad<C extends CacheCategory>(
        category: C,
        key: string,
        loader: () => Promise<CachePayloads[C]>
    ): Promise<CachePayloads[C]> {
        return this.store(category).getOrLoad(key, loader);
    }

    purgeExpired(): number {
        const removed = this.stores.price.purgeExpired()
            + this.stores.fundamental.purgeExpired()
            + this.stores.news.purgeExpired();
        if (removed > 0) console.log(`[Cache] Purged ${removed} expired entries`);
        return removed;
    }

    stats(): Record<CacheCategory, { entries: number; loading: number }> {
        return {
            price: { entries: this.stores.price.size, loading: this.stores.price.pendingLoads },
            fundamental: { entries: this.stores.fundamental.size, loading: this.stores.fundamental.pendingLoads },
            news: { entries: this.stores.news.size, loading: this.stores.news.pendingLoads },
        };
    }
}
