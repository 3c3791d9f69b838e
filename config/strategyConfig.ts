/**
 * Centralized Strategy Configuration
 *
 * Defines the defaults for scoring, caching, streaming and the AI chain.
 * `loadConfig` merges a JSON5 file and environment secrets over these values,
 * validates the result and freezes it; components receive it explicitly.
 */

import type {
    Market,
    NewsCategory,
    RecommendationThreshold,
    ScoreWeights,
    TechnicalSignalName,
} from '../src/types/scoring';
import type { CacheTtls } from '../services/utils/cache';
import { DEFAULT_CACHE_TTLS } from '../services/utils/cache';
import { DEFAULT_FUNDAMENTAL_CURVES, type FundamentalCurves } from './fundamentalCurves';

export type ProviderName = 'openai' | 'anthropic' | 'zhipu' | 'gemini' | 'ollama';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'zhipu', 'gemini', 'ollama'];

export interface MarketSettings {
    enabled: boolean;
    name: string;
    currency: string;
    timezone: string;
    tradingHours: string;
}

export interface TechnicalConfig {
    periodDays: number;
    maWindows: number[];
    rsiWindow: number;
    rsiOverbought: number;
    rsiOversold: number;
    macdFast: number;
    macdSlow: number;
    macdSignal: number;
    bollingerWindow: number;
    bollingerStdDev: number;
    volumeWindow: number;
    weights: Record<TechnicalSignalName, number>;
}

export interface SentimentConfig {
    maxNewsCount: number;
    maxContentLength: number;
    categoryWeights: Record<NewsCategory, number>;
    trendThreshold: number;
}

export interface ScoringConfig {
    weights: ScoreWeights;
    thresholds: RecommendationThreshold[];
}

export interface ProviderSettings {
    /** API key, or the host for Ollama. Empty means not configured. */
    apiKey: string;
    model: string;
    baseUrl: string;
}

export interface AIConfig {
    order: ProviderName[];
    providers: Record<ProviderName, ProviderSettings>;
    temperature: number;
    maxTokens: number;
    requestTimeoutMs: number;
}

export interface OrchestratorConfig {
    concurrency: number;
    maxBatchSize: number;
    fetchTimeoutMs: number;
}

export interface StreamConfig {
    queueBound: number;
    heartbeatMs: number;
}

export interface DataSourceConfig {
    fmpApiKey: string;
    fmpBaseUrl: string;
    maxRetries: number;
    retryDelayMs: number;
}

export interface AnalysisConfig {
    markets: Record<Market, MarketSettings>;
    technical: TechnicalConfig;
    fundamental: { curves: FundamentalCurves };
    sentiment: SentimentConfig;
    scoring: ScoringConfig;
    cache: { ttls: CacheTtls };
    ai: AIConfig;
    orchestrator: OrchestratorConfig;
    stream: StreamConfig;
    dataSource: DataSourceConfig;
}

export const DEFAULT_CONFIG: AnalysisConfig = {
    markets: {
        CN: { enabled: true, name: 'China A-share', currency: 'CNY', timezone: 'Asia/Shanghai', tradingHours: '09:30-15:00' },
        HK: { enabled: true, name: 'Hong Kong', currency: 'HKD', timezone: 'Asia/Hong_Kong', tradingHours: '09:30-16:00' },
        US: { enabled: true, name: 'United States', currency: 'USD', timezone: 'America/New_York', tradingHours: '09:30-16:00' },
    },

    // TECHNICALS
    technical: {
        periodDays: 180,
        maWindows: [5, 10, 20, 60],
        rsiWindow: 14,
        rsiOverbought: 70,
        rsiOversold: 30,
        macdFast: 12,
        macdSlow: 26,
        macdSignal: 9,
        bollingerWindow: 20,
        bollingerStdDev: 2,
        volumeWindow: 20,
        weights: { trend: 0.3, rsi: 0.15, macd: 0.25, bollinger: 0.1, volume: 0.2 },
    },

    // FUNDAMENTALS
    fundamental: { curves: DEFAULT_FUNDAMENTAL_CURVES },

    // SENTIMENT
    sentiment: {
        maxNewsCount: 100,
        maxContentLength: 500, // chars per item, bounds prompt size
        categoryWeights: { announcement: 1.2, company_news: 1.0, industry_news: 0.8, research_report: 0.9 },
        trendThreshold: 0.1,
    },

    // COMPOSITE
    scoring: {
        weights: { technical: 0.4, fundamental: 0.4, sentiment: 0.2 },
        thresholds: [
            { min: 80, label: 'STRONG_BUY' },
            { min: 60, label: 'BUY' },
            { min: 40, label: 'HOLD' },
            { min: 20, label: 'SELL' },
            { min: 0, label: 'STRONG_SELL' },
        ],
    },

    cache: { ttls: DEFAULT_CACHE_TTLS },

    ai: {
        order: ['openai', 'anthropic', 'zhipu', 'gemini', 'ollama'],
        providers: {
            openai: { apiKey: '', model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' },
            anthropic: { apiKey: '', model: 'claude-3-haiku-20240307', baseUrl: 'https://api.anthropic.com' },
            zhipu: { apiKey: '', model: 'glm-4-flash', baseUrl: 'https://open.bigmodel.cn/api/paas/v4' },
            gemini: { apiKey: '', model: 'gemini-2.0-flash', baseUrl: '' },
            ollama: { apiKey: '', model: 'llama3.1', baseUrl: '' },
        },
        temperature: 0.7,
        maxTokens: 4000,
        requestTimeoutMs: 120_000,
    },

    orchestrator: {
        concurrency: 4,
        maxBatchSize: 10,
        fetchTimeoutMs: 15_000,
    },

    stream: {
        queueBound: 500,
        heartbeatMs: 30_000,
    },

    dataSource: {
        fmpApiKey: '',
        fmpBaseUrl: 'https://financialmodelingprep.com/stable',
        maxRetries: 2,
        retryDelayMs: 1000,
    },
};

/** Keyed providers need an API key; Ollama needs a host. */
export const isProviderConfigured = (ai: AIConfig, name: ProviderName): boolean =>
    name === 'ollama' ? ai.providers.ollama.baseUrl !== '' : ai.providers[name].apiKey !== '';
