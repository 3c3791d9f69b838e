/**
 * Financial Modeling Prep API Client (stable endpoints)
 * Free tier: 250 requests/day
 * Docs: https://site.financialmodelingprep.com/developer/docs
 *
 * Implements MarketDataSource for the US market. Caching happens one layer up
 * in CachedMarketData; this client only retries transient failures.
 */

import type {
  FinancialGrowth,
  HistoricalPrice,
  HistoricalPriceEnvelope,
  KeyMetricsTTM,
  RatiosTTM,
  StockNewsArticle,
} from '../../types';
import type { FinancialIndicatorSet, Market, NewsCategory, NewsItem, PriceSeries, ScoreCategory } from '../../src/types/scoring';
import type { DataSourceConfig } from '../../config/strategyConfig';
import { fetchWithRetry, ApiError } from '../utils/retry';
import { FetchError } from '../utils/errors';
import type { MarketDataSource } from './marketData';
import { normalizeIndicators } from './marketData';

const DAY_MS = 24 * 60 * 60 * 1000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isHistoricalPrice = (value: unknown): value is HistoricalPrice =>
  isRecord(value) && typeof value.date === 'string' && typeof value.close === 'number';

const isEnvelope = (value: unknown): value is HistoricalPriceEnvelope =>
  isRecord(value) && Array.isArray(value.historical);

const isSymbolRow = (value: unknown): value is RatiosTTM & KeyMetricsTTM & FinancialGrowth =>
  isRecord(value) && typeof value.symbol === 'string';

const isNewsArticle = (value: unknown): value is StockNewsArticle =>
  isRecord(value) && typeof value.title === 'string' && typeof value.publishedDate === 'string';

const finite = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

// FMP ratio fields are fractions; the indicator set stores percentages.
const pct = (value: unknown): number | null => {
  const n = finite(value);
  return n === null ? null : n * 100;
};

const toDateString = (ms: number) => new Date(ms).toISOString().slice(0, 10);

/** FMP timestamps are "YYYY-MM-DD HH:mm:ss" without a zone; read them as UTC. */
const parseFmpDate = (value: string): number => Date.parse(`${value.replace(' ', 'T')}${value.length > 10 ? 'Z' : 'T00:00:00Z'}`);

export interface FmpOptions {
  now?: () => number;
}

export class FmpDataSource implements MarketDataSource {
  readonly name = 'fmp';
  private now: () => number;

  constructor(private config: DataSourceConfig, options: FmpOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  private validateApiKey(category: ScoreCategory): void {
    if (!this.config.fmpApiKey) {
      console.error("[FMP] API Key is missing or empty.");
      throw new FetchError(category, 'MISSING_KEY', 'FMP_API_KEY not configured');
    }
  }

  private validateMarket(category: ScoreCategory, market: Market): void {
    if (market !== 'US') {
      throw new FetchError(category, 'UNSUPPORTED_MARKET', `FMP does not cover ${market} symbols`);
    }
  }

  /** Returns null when FMP says the resource is absent or outside the plan. */
  private fetchData(endpoint: string, signal?: AbortSignal): Promise<unknown> {
    return fetchWithRetry(async () => {
      const url = `${this.config.fmpBaseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apikey=${this.config.fmpApiKey}`;
      console.log(`[FMP] Fetching ${endpoint}`);

      const res = await fetch(url, { signal });

      if (res.status === 429) {
        console.error("[FMP] Rate Limit Hit");
        throw new ApiError('RATE_LIMIT', 'FMP API rate limit exceeded', 429);
      }

      if (res.status === 401) {
        console.warn("[FMP] Invalid Key (401) - Check your API key.");
        throw new ApiError('MISSING_KEY', 'FMP rejected the API key', 401);
      }

      if (res.status === 402 || res.status === 403) {
        console.warn(`[FMP] Access Restricted (${res.status}) for ${endpoint}. Feature likely not in plan.`);
        return null;
      }

      if (res.status === 404) {
        console.warn(`[FMP] Resource not found: ${endpoint}`);
        return null;
      }

      if (!res.ok) {
        throw new ApiError('NETWORK', `FMP API Error: ${res.status}`, res.status);
      }

      const data: unknown = await res.json();

      // FMP sometimes returns error messages in 200 OK responses
      if (isRecord(data) && typeof data['Error Message'] === 'string') {
        const message = data['Error Message'];
        if (message.includes('Limit') || message.includes('Premium')) {
          console.warn(`[FMP] API Limit/Premium Restriction: ${message}`);
          return null;
        }
        throw new ApiError('UNKNOWN', message);
      }

      return data;
    }, {
      maxRetries: this.config.maxRetries,
      delayMs: this.config.retryDelayMs,
      backoffMultiplier: 2,
      signal,
      label: 'FMP',
    });
  }

  private async fetchRows(endpoint: string, signal?: AbortSignal): Promise<unknown[]> {
    const data = await this.fetchData(endpoint, signal);
    return Array.isArray(data) ? data : [];
  }

  // ============ ENDPOINTS ============

  async fetchPriceSeries(symbol: string, market: Market, periodDays: number, signal?: AbortSignal): Promise<PriceSeries> {
    this.validateApiKey('technical');
    this.validateMarket('technical', market);

    const to = this.now();
    const from = to - periodDays * DAY_MS;
    try {
      const data = await this.fetchData(
        `/historical-price-eod/full?symbol=${encodeURIComponent(symbol)}&from=${toDateString(from)}&to=${toDateString(to)}`,
        signal
      );
      // Stable API returns a bare array; v3 wrapped it in { historical }.
      const rows = isEnvelope(data) ? data.historical : Array.isArray(data) ? data : [];
      const bars = rows.filter(isHistoricalPrice).map(row => ({
        timestamp: parseFmpDate(row.date),
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: row.volume,
      }));
      if (bars.length === 0) throw new FetchError('technical', 'NOT_FOUND', `No price history for ${symbol}`);
      return bars;
    } catch (error) {
      console.error(`[FMP] Error fetching historical price for ${symbol}:`, error instanceof Error ? error.message : error);
      throw FetchError.from('technical', error);
    }
  }

  async fetchFinancialIndicators(symbol: string, market: Market, signal?: AbortSignal): Promise<FinancialIndicatorSet> {
    this.validateApiKey('fundamental');
    this.validateMarket('fundamental', market);

    const s = encodeURIComponent(symbol);
    try {
      const [ratioRows, metricRows, growthRows] = await Promise.all([
        this.fetchRows(`/ratios-ttm?symbol=${s}`, signal),
        this.fetchRows(`/key-metrics-ttm?symbol=${s}`, signal),
        this.fetchRows(`/financial-growth?symbol=${s}&limit=1`, signal),
      ]);
      const ratios = ratioRows.find(isSymbolRow);
      const metrics = metricRows.find(isSymbolRow);
      const growth = growthRows.find(isSymbolRow);

      if (!ratios && !metrics && !growth) {
        throw new FetchError('fundamental', 'NOT_FOUND', `No financial data for ${symbol}`);
      }

      return normalizeIndicators({
        netProfitMargin: pct(ratios?.netProfitMarginTTM),
        returnOnEquity: pct(metrics?.returnOnEquityTTM),
        returnOnAssets: pct(metrics?.returnOnAssetsTTM),
        grossMargin: pct(ratios?.grossProfitMarginTTM),
        operatingMargin: pct(ratios?.operatingProfitMarginTTM),

        currentRatio: finite(ratios?.currentRatioTTM) ?? finite(metrics?.currentRatioTTM),
        quickRatio: finite(ratios?.quickRatioTTM),
        debtRatio: pct(ratios?.debtToAssetsRatioTTM),
        debtToEquity: finite(ratios?.debtToEquityRatioTTM),
        interestCoverage: finite(ratios?.interestCoverageRatioTTM),

        assetTurnover: finite(ratios?.assetTurnoverTTM),
        inventoryTurnover: finite(ratios?.inventoryTurnoverTTM),
        receivablesTurnover: finite(ratios?.receivablesTurnoverTTM),
        currentAssetTurnover: null, // not published by FMP
        fixedAssetTurnover: finite(ratios?.fixedAssetTurnoverTTM),

        revenueGrowth: pct(growth?.revenueGrowth),
        netProfitGrowth: pct(growth?.netIncomeGrowth),
        totalAssetGrowth: pct(growth?.assetGrowth),
        equityGrowth: pct(growth?.bookValueperShareGrowth),
        operatingCashFlowGrowth: pct(growth?.operatingCashFlowGrowth),

        priceToEarnings: finite(ratios?.priceToEarningsRatioTTM),
        priceToBook: finite(ratios?.priceToBookRatioTTM),
        priceToSales: finite(ratios?.priceToSalesRatioTTM),
        priceEarningsToGrowth: finite(ratios?.priceToEarningsGrowthRatioTTM),
        dividendYield: pct(ratios?.dividendYieldTTM),
      });
    } catch (error) {
      console.error(`[FMP] Error fetching financials for ${symbol}:`, error instanceof Error ? error.message : error);
      throw FetchError.from('fundamental', error);
    }
  }

  async fetchNews(symbol: string, market: Market, maxCount: number, signal?: AbortSignal): Promise<NewsItem[]> {
    this.validateApiKey('sentiment');
    this.validateMarket('sentiment', market);

    const s = encodeURIComponent(symbol);
    const toItems = (rows: unknown[], category: NewsCategory): NewsItem[] =>
      rows.filter(isNewsArticle).map(article => ({
        id: article.url || `${article.publishedDate}:${article.title}`,
        timestamp: parseFmpDate(article.publishedDate),
        source: article.publisher ?? article.site ?? 'FMP',
        title: article.title,
        body: article.text ?? '',
        category,
      }));

    try {
      const [stories, releases] = await Promise.all([
        this.fetchRows(`/news/stock?symbols=${s}&limit=${maxCount}`, signal),
        this.fetchRows(`/news/press-releases?symbols=${s}&limit=${maxCount}`, signal),
      ]);
      return [...toItems(releases, 'announcement'), ...toItems(stories, 'company_news')]
        .sort((a, b) => b.timestamp - a.timestamp)
        .slice(0, maxCount);
    } catch (error) {
      console.error(`[FMP] Error fetching news for ${symbol}:`, error instanceof Error ? error.message : error);
      throw FetchError.from('sentiment', error);
    }
  }
}
