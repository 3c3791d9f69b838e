import { describe, it, expect, vi } from 'vitest';
import { DataCache, TtlStore } from '../../services/utils/cache';
import { emptyIndicatorSet } from '../../services/scoring/fundamentalScore';

describe('TtlStore', () => {
    it('should return the stored value until the ttl elapses', () => {
        let now = 1_000;
        const store = new TtlStore<string>(100, () => now);
        store.put('AAPL', 'payload');

        expect(store.get('AAPL')).toBe('payload');
        now = 1_099;
        expect(store.get('AAPL')).toBe('payload');
        now = 1_100;
        expect(store.get('AAPL')).toBeUndefined();
        expect(store.size).toBe(0);
    });

    it('should replace an entry and restart its ttl on put', () => {
        let now = 0;
        const store = new TtlStore<number>(100, () => now);
        store.put('k', 1);
        now = 80;
        store.put('k', 2);
        now = 150;
        expect(store.get('k')).toBe(2);
    });

    it('should call the loader once for concurrent requests of one key', async () => {
        const store = new TtlStore<number>(1_000);
        const loader = vi.fn(() => new Promise<number>(resolve => setTimeout(() => resolve(42), 10)));

        const results = await Promise.all([
            store.getOrLoad('k', loader),
            store.getOrLoad('k', loader),
            store.getOrLoad('k', loader),
        ]);

        expect(results).toEqual([42, 42, 42]);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(store.get('k')).toBe(42);
        expect(store.pendingLoads).toBe(0);
    });

    it('should not cache a failed load', async () => {
        const store = new TtlStore<number>(1_000);
        const failing = vi.fn(() => Promise.reject(new Error('upstream down')));

        await expect(store.getOrLoad('k', failing)).rejects.toThrow('upstream down');
        expect(store.get('k')).toBeUndefined();
        expect(store.pendingLoads).toBe(0);

        await expect(store.getOrLoad('k', async () => 7)).resolves.toBe(7);
    });

    it('should clear the in-flight entry when the loader throws synchronously', async () => {
        const store = new TtlStore<number>(1_000);
        const loader = (): Promise<number> => {
            throw new Error('bad request');
        };

        await expect(store.getOrLoad('k', loader)).rejects.toThrow('bad request');
        expect(store.pendingLoads).toBe(0);
    });
});

describe('DataCache', () => {
    it('should expire each category on its own ttl', () => {
        let now = 0;
        const cache = new DataCache({ price: 10, fundamental: 100, news: 50 }, () => now);
        cache.put('price', 'US:AAPL:180', []);
        cache.put('fundamental', 'US:AAPL', emptyIndicatorSet());
        cache.put('news', 'US:AAPL:100', []);

        now = 60;
        expect(cache.purgeExpired()).toBe(2);
        expect(cache.get('price', 'US:AAPL:180')).toBeUndefined();
        expect(cache.get('fundamental', 'US:AAPL')).toEqual(emptyIndicatorSet());
        expect(cache.stats()).toEqual({
            price: { entries: 0, loading: 0 },
            fundamental: { entries: 1, loading: 0 },
            news: { entries: 0, loading: 0 },
        });
    });

    it('should return exactly what was put', () => {
        const cache = new DataCache();
        const bars = [{ timestamp: 1, open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }];
        cache.put('price', 'k', bars);
        expect(cache.get('price', 'k')).toBe(bars);
    });
});
