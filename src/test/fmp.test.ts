import { describe, it, expect, vi } from 'vitest';
import { FmpDataSource } from '../../services/api/fmp';
import { DEFAULT_CONFIG, type DataSourceConfig } from '../../config/strategyConfig';
import { FetchError } from '../../services/utils/errors';

const NOW = Date.UTC(2026, 2, 2, 18);

const config: DataSourceConfig = {
    ...DEFAULT_CONFIG.dataSource,
    fmpApiKey: 'test-secret',
    fmpBaseUrl: 'https://fmp.test',
    maxRetries: 0,
    retryDelayMs: 1,
};

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

/** Answers each request from the first route whose key occurs in the URL. */
const route = (routes: Record<string, () => Response>) => {
    vi.mocked(fetch).mockImplementation(async input => {
        const url = String(input);
        const match = Object.keys(routes).find(key => url.includes(key));
        return match ? routes[match]() : new Response('', { status: 404 });
    });
};

const rejection = (promise: Promise<unknown>) => promise.then(() => undefined, (e: unknown) => e);

describe('FmpDataSource', () => {
    const fmp = new FmpDataSource(config, { now: () => NOW });

    it('should refuse to run without a key', async () => {
        const unkeyed = new FmpDataSource({ ...config, fmpApiKey: '' });
        const error = await rejection(unkeyed.fetchNews('AAPL', 'US', 5));

        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ category: 'sentiment', code: 'MISSING_KEY' });
        expect(fetch).not.toHaveBeenCalled();
    });

    it('should only cover US symbols', async () => {
        const error = await rejection(fmp.fetchPriceSeries('00700', 'HK', 30));
        expect(error).toMatchObject({ category: 'technical', code: 'UNSUPPORTED_MARKET' });
        expect(fetch).not.toHaveBeenCalled();
    });

    it('should request the history window and read dates as UTC', async () => {
        route({
            '/historical-price-eod/full': () => json([
                { symbol: 'AAPL', date: '2026-03-02', open: 10, high: 12, low: 9, close: 11, volume: 500 },
                { symbol: 'AAPL', date: '2026-02-27', open: 9, high: 10, low: 8, close: 10, volume: 400 },
                { symbol: 'AAPL', date: '2026-02-26' },
            ]),
        });

        const bars = await fmp.fetchPriceSeries('AAPL', 'US', 10);

        expect(fetch).toHaveBeenCalledWith(
            'https://fmp.test/historical-price-eod/full?symbol=AAPL&from=2026-02-20&to=2026-03-02&apikey=test-secret',
            expect.anything()
        );
        expect(bars).toEqual([
            { timestamp: Date.UTC(2026, 2, 2), open: 10, high: 12, low: 9, close: 11, volume: 500 },
            { timestamp: Date.UTC(2026, 1, 27), open: 9, high: 10, low: 8, close: 10, volume: 400 },
        ]);
    });

    it('should accept the wrapped history shape', async () => {
        route({
            '/historical-price-eod/full': () => json({
                symbol: 'AAPL',
                historical: [{ date: '2026-03-02', open: 1, high: 1, low: 1, close: 1, volume: 1 }],
            }),
        });
        await expect(fmp.fetchPriceSeries('AAPL', 'US', 10)).resolves.toHaveLength(1);
    });

    it('should report a symbol without history as not found', async () => {
        route({});
        await expect(rejection(fmp.fetchPriceSeries('ZZZZ', 'US', 10))).resolves.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('should map HTTP failures to fetch error codes', async () => {
        route({ '/historical-price-eod': () => new Response('', { status: 429 }) });
        await expect(rejection(fmp.fetchPriceSeries('AAPL', 'US', 10))).resolves.toMatchObject({ code: 'RATE_LIMIT' });

        route({ '/historical-price-eod': () => new Response('', { status: 401 }) });
        await expect(rejection(fmp.fetchPriceSeries('AAPL', 'US', 10))).resolves.toMatchObject({ code: 'MISSING_KEY' });

        route({ '/historical-price-eod': () => json({ 'Error Message': 'Invalid symbol format' }) });
        await expect(rejection(fmp.fetchPriceSeries('AAPL', 'US', 10))).resolves.toMatchObject({ code: 'UNKNOWN' });
    });

    it('should retry a server error', async () => {
        const retrying = new FmpDataSource({ ...config, maxRetries: 1 }, { now: () => NOW });
        let calls = 0;
        route({
            '/historical-price-eod': () => {
                calls++;
                return calls === 1
                    ? new Response('', { status: 502 })
                    : json([{ date: '2026-03-02', open: 1, high: 1, low: 1, close: 1, volume: 1 }]);
            },
        });

        await expect(retrying.fetchPriceSeries('AAPL', 'US', 10)).resolves.toHaveLength(1);
        expect(calls).toBe(2);
    });

    it('should convert TTM ratios to percentages and skip restricted endpoints', async () => {
        route({
            '/ratios-ttm': () => json([{
                symbol: 'AAPL',
                netProfitMarginTTM: 0.25,
                debtToAssetsRatioTTM: 0.5,
                currentRatioTTM: 1.5,
                priceToEarningsRatioTTM: 30,
                dividendYieldTTM: null,
            }]),
            '/key-metrics-ttm': () => json([{ symbol: 'AAPL', returnOnEquityTTM: 1.5 }]),
            '/financial-growth': () => new Response('', { status: 403 }),
        });

        const set = await fmp.fetchFinancialIndicators('AAPL', 'US');

        expect(set).toMatchObject({
            netProfitMargin: 25,
            debtRatio: 50,
            currentRatio: 1.5,
            priceToEarnings: 30,
            returnOnEquity: 150,
            dividendYield: null,
            revenueGrowth: null,
            currentAssetTurnover: null,
        });
        expect(Object.keys(set)).toHaveLength(25);
    });

    it('should report missing financials when every endpoint is restricted', async () => {
        route({ '/': () => json({ 'Error Message': 'Premium Query Parameter: upgrade required' }) });
        const error = await rejection(fmp.fetchFinancialIndicators('AAPL', 'US'));
        expect(error).toMatchObject({ category: 'fundamental', code: 'NOT_FOUND' });
    });

    it('should merge stories and press releases newest first', async () => {
        route({
            '/news/stock': () => json([
                { symbol: 'AAPL', title: 'Story', publishedDate: '2026-03-01 10:00:00', url: 'https://news.test/1', publisher: 'Wire', text: 'Body' },
                { symbol: 'AAPL', title: 'No date' },
            ]),
            '/news/press-releases': () => json([
                { symbol: 'AAPL', title: 'Release', publishedDate: '2026-03-02 08:00:00', url: 'https://news.test/2', text: 'Text' },
            ]),
        });

        const items = await fmp.fetchNews('AAPL', 'US', 5);

        expect(items).toEqual([
            { id: 'https://news.test/2', timestamp: Date.UTC(2026, 2, 2, 8), source: 'FMP', title: 'Release', body: 'Text', category: 'announcement' },
            { id: 'https://news.test/1', timestamp: Date.UTC(2026, 2, 1, 10), source: 'Wire', title: 'Story', body: 'Body', category: 'company_news' },
        ]);
        expect(fetch).toHaveBeenCalledWith('https://fmp.test/news/stock?symbols=AAPL&limit=5&apikey=test-secret', expect.anything());
    });
});
