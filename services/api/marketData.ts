import type {
    FinancialIndicatorSet,
    IndicatorName,
    Market,
    NewsItem,
    PriceBar,
    PriceSeries,
    ScoreCategory,
} from '../../src/types/scoring';
import { INDICATOR_NAMES } from '../../src/types/scoring';
import type { CacheCategory, CachePayloads, DataCache } from '../utils/cache';
import { FetchError } from '../utils/errors';
import { emptyIndicatorSet } from '../scoring/fundamentalScore';

/** Upstream collaborator. Implementations throw FetchError (or ApiError) on failure. */
export interface MarketDataSource {
    readonly name: string;
    fetchPriceSeries(symbol: string, market: Market, periodDays: number, signal?: AbortSignal): Promise<PriceSeries>;
    fetchFinancialIndicators(symbol: string, market: Market, signal?: AbortSignal): Promise<FinancialIndicatorSet>;
    fetchNews(symbol: string, market: Market, maxCount: number, signal?: AbortSignal): Promise<NewsItem[]>;
}

// ============ NORMALISATION ============

/** Ascending, one bar per timestamp (last one wins), finite closes only. */
export const normalizePriceSeries = (bars: readonly PriceBar[]): PriceSeries => {
    const byTime = new Map<number, PriceBar>();
    for (const bar of bars) {
        if (!Number.isFinite(bar.close) || !Number.isFinite(bar.timestamp)) continue;
        byTime.set(bar.timestamp, bar);
    }
    return [...byTime.values()].sort((a, b) => a.timestamp - b.timestamp);
};

/** Fills every name; non-finite values become null, never 0. */
export const normalizeIndicators = (
    values: Partial<Record<IndicatorName, number | null | undefined>>
): FinancialIndicatorSet => {
    const set = emptyIndicatorSet();
    for (const name of INDICATOR_NAMES) {
        const value = values[name];
        set[name] = typeof value === 'number' && Number.isFinite(value) ? value : null;
    }
    return set;
};

/** Newest first, deduplicated by id (first occurrence wins); undated items are dropped. */
export const normalizeNews = (items: readonly NewsItem[]): NewsItem[] => {
    const seen = new Set<string>();
    const unique = items.filter(item => {
        if (!Number.isFinite(item.timestamp) || seen.has(item.id)) return false;
        seen.add(item.id);
        return true;
    });
    return unique.sort((a, b) => b.timestamp - a.timestamp);
};

// ============ CACHED ACCESS ============

const CATEGORY_OF: Record<CacheCategory, ScoreCategory> = {
    price: 'technical',
    fundamental: 'fundamental',
    news: 'sentiment',
};

/**
 * Rejects with the signal's reason when it aborts, without cancelling the
 * underlying promise. Shared cache loads keep running for other waiters.
 */
const abortable = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
    new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) onAbort();
        else signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            error => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });

export interface MarketDataOptions {
    fetchTimeoutMs: number;
}

/**
 * Cache-first access to the collaborator. Each upstream call is bounded by
 * `fetchTimeoutMs` and concurrent requests for one key share a single load.
 */
export class CachedMarketData {
    constructor(
        private source: MarketDataSource,
        private cache: DataCache,
        private options: MarketDataOptions
    ) {}

    get sourceName(): string {
        return this.source.name;
    }

    private async withTimeout<T>(category: CacheCategory, fetcher: (signal: AbortSignal) => Promise<T>): Promise<T> {
        const scoreCategory = CATEGORY_OF[category];
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new FetchError(scoreCategory, 'TIMEOUT', `${category} fetch exceeded ${this.options.fetchTimeoutMs}ms`));
            }, this.options.fetchTimeoutMs);
        });
        try {
            return await Promise.race([fetcher(controller.signal), timeout]);
        } catch (error) {
            throw FetchError.from(scoreCategory, error);
        } finally {
            clearTimeout(timer);
        }
    }

    private load<C extends CacheCategory>(
        category: C,
        key: string,
        fetcher: (signal: AbortSignal) => Promise<CachePayloads[C]>,
        signal?: AbortSignal
    ): Promise<CachePayloads[C]> {
        const pending = this.cache.getOrLoad(category, key, () => {
            console.log(`[MarketData] Cache miss ${category}:${key}, fetching from ${this.source.name}`);
            return this.withTimeout(category, fetcher);
        });
        return signal ? abortable(pending, signal) : pending;
    }

    getPriceSeries(symbol: string, market: Market, periodDays: number, signal?: AbortSignal): Promise<PriceSeries> {
        return this.load('price', `${market}:${symbol}:${periodDays}`, async s =>
            normalizePriceSeries(await this.source.fetchPriceSeries(symbol, market, periodDays, s)), signal);
    }

    getFinancialIndicators(symbol: string, market: Market, signal?: AbortSignal): Promise<FinancialIndicatorSet> {
        return this.load('fundamental', `${market}:${symbol}`, async s =>
            normalizeIndicators(await this.source.fetchFinancialIndicators(symbol, market, s)), signal);
    }

    getNews(symbol: string, market: Market, maxCount: number, signal?: AbortSignal): Promise<NewsItem[]> {
        return this.load('news', `${market}:${symbol}:${maxCount}`, async s =>
            normalizeNews(await this.source.fetchNews(symbol, market, maxCount, s)), signal);
    }
}
