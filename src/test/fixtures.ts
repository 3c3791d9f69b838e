import type {
    AnalysisReport,
    FinancialIndicatorSet,
    Market,
    NewsItem,
    PriceSeries,
    ReportDraft,
} from '../types/scoring';
import type { MarketDataSource } from '../../services/api/marketData';
import type { NarrativePrompt, NarrativeProvider } from '../../services/ai/provider';
import { emptyIndicatorSet } from '../../services/scoring/fundamentalScore';

const DAY_MS = 24 * 60 * 60 * 1000;
export const START = Date.UTC(2026, 0, 5);

export const draftFor = (symbol = 'AAPL'): ReportDraft => ({
    symbol,
    market: 'US',
    marketInfo: { market: 'US', name: 'United States', currency: 'USD', timezone: 'America/New_York', tradingHours: '09:30-16:00' },
    analysisDate: '2026-03-02',
    priceInfo: null,
    technical: null,
    fundamental: null,
    sentiment: null,
    scores: { technical: null, fundamental: 62, sentiment: null, composite: 62, recommendation: 'BUY' },
    effectiveWeights: { fundamental: 1 },
    recommendation: 'BUY',
    partial: true,
    missing: ['technical', 'sentiment'],
    failures: [],
    dataQuality: { indicatorsUsed: 3, indicatorsTotal: 25, newsAnalyzed: 0, completeness: 'partial' },
});

export const reportFor = (symbol = 'AAPL'): AnalysisReport => ({
    ...draftFor(symbol),
    narrative: 'Narrative.',
    narrativeSource: 'rule-based',
});

/** Daily bars closing at `closes`, volume flat. */
export const barsFrom = (closes: readonly number[]): PriceSeries =>
    closes.map((close, i) => ({
        timestamp: START + i * DAY_MS,
        open: close,
        high: close,
        low: close,
        close,
        volume: 1_000,
    }));

export const ramp = (from: number, to: number): number[] =>
    Array.from({ length: to - from + 1 }, (_, i) => from + i);

type Responder<T> = (symbol: string, market: Market, signal?: AbortSignal) => Promise<T>;

/** In-memory MarketDataSource; each fetch can be overridden per test. */
export class FakeSource implements MarketDataSource {
    readonly name = 'fake';
    calls = { price: 0, fundamental: 0, news: 0 };

    prices: Responder<PriceSeries> = async () => barsFrom(ramp(1, 60));
    indicators: Responder<FinancialIndicatorSet> = async () => ({
        ...emptyIndicatorSet(),
        netProfitMargin: 20,
        debtRatio: 50,
        priceToEarnings: 12,
    });
    news: Responder<NewsItem[]> = async () => [];

    fetchPriceSeries(symbol: string, market: Market, _periodDays: number, signal?: AbortSignal): Promise<PriceSeries> {
        this.calls.price++;
        return this.prices(symbol, market, signal);
    }

    fetchFinancialIndicators(symbol: string, market: Market, signal?: AbortSignal): Promise<FinancialIndicatorSet> {
        this.calls.fundamental++;
        return this.indicators(symbol, market, signal);
    }

    fetchNews(symbol: string, market: Market, _maxCount: number, signal?: AbortSignal): Promise<NewsItem[]> {
        this.calls.news++;
        return this.news(symbol, market, signal);
    }
}

export interface ProviderScript {
    tokens?: string[];
    /** Thrown after the scripted tokens were emitted. */
    error?: unknown;
}

/** Scripted NarrativeProvider. */
export class FakeProvider implements NarrativeProvider {
    prompts: NarrativePrompt[] = [];

    constructor(
        readonly name: string,
        private script: ProviderScript
    ) {}

    async generate(prompt: NarrativePrompt): Promise<string> {
        this.prompts.push(prompt);
        if (this.script.error !== undefined) throw this.script.error;
        return (this.script.tokens ?? []).join('');
    }

    async *generateStream(prompt: NarrativePrompt): AsyncGenerator<string> {
        this.prompts.push(prompt);
        for (const token of this.script.tokens ?? []) yield token;
        if (this.script.error !== undefined) throw this.script.error;
    }
}

/** Resolves once `predicate` holds, polling the event loop. */
export const waitUntil = async (predicate: () => boolean, attempts = 200): Promise<void> => {
    for (let i = 0; i < attempts; i++) {
        if (predicate()) return;
        await new Promise(resolve => setTimeout(resolve, 1));
    }
    throw new Error('condition not met in time');
};
