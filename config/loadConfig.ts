import { existsSync, readFileSync } from 'node:fs';
import JSON5 from 'json5';
import type { Market, NewsCategory, Recommendation, RecommendationThreshold, TechnicalSignalName } from '../src/types/scoring';
import { INDICATOR_NAMES, type IndicatorName } from '../src/types/scoring';
import { ConfigurationError } from '../services/utils/errors';
import { validateThresholds, validateWeights } from '../services/scoring/compositeScore';
import type { CurvePoint, FundamentalCurves } from './fundamentalCurves';
import {
    DEFAULT_CONFIG,
    PROVIDER_NAMES,
    isProviderConfigured,
    type AnalysisConfig,
    type MarketSettings,
    type ProviderName,
    type ProviderSettings,
} from './strategyConfig';

export const DEFAULT_CONFIG_PATH = 'config/analysis.config.json5';

type Env = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

interface NumberRule {
    min?: number;
    max?: number;
    integer?: boolean;
    exclusiveMin?: boolean;
}

/** Typed reader over one object of the JSON5 file. Absent keys fall back to the default. */
class Section {
    private constructor(
        private raw: Record<string, unknown>,
        private path: string
    ) {}

    static of(raw: unknown, path: string): Section {
        if (raw === undefined) return new Section({}, path);
        if (!isRecord(raw)) throw new ConfigurationError(path || '<root>', 'must be an object');
        return new Section(raw, path);
    }

    at(key: string): string {
        return this.path ? `${this.path}.${key}` : key;
    }

    child(key: string): Section {
        return Section.of(this.raw[key], this.at(key));
    }

    value(key: string): unknown {
        return this.raw[key];
    }

    has(key: string): boolean {
        return this.raw[key] !== undefined;
    }

    keys(): string[] {
        return Object.keys(this.raw);
    }

    number(key: string, fallback: number, rule: NumberRule = {}): number {
        const value = this.raw[key];
        if (value === undefined) return fallback;
        return checkNumber(value, this.at(key), rule);
    }

    string(key: string, fallback: string): string {
        const value = this.raw[key];
        if (value === undefined) return fallback;
        if (typeof value !== 'string') throw new ConfigurationError(this.at(key), 'must be a string');
        return value;
    }

    boolean(key: string, fallback: boolean): boolean {
        const value = this.raw[key];
        if (value === undefined) return fallback;
        if (typeof value !== 'boolean') throw new ConfigurationError(this.at(key), 'must be a boolean');
        return value;
    }
}

const checkNumber = (value: unknown, path: string, rule: NumberRule): number => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(path, `must be a finite number, got ${JSON.stringify(value)}`);
    }
    if (rule.integer && !Number.isInteger(value)) {
        throw new ConfigurationError(path, `must be an integer, got ${value}`);
    }
    if (rule.min !== undefined && (rule.exclusiveMin ? value <= rule.min : value < rule.min)) {
        throw new ConfigurationError(path, `must be ${rule.exclusiveMin ? '>' : '>='} ${rule.min}, got ${value}`);
    }
    if (rule.max !== undefined && value > rule.max) {
        throw new ConfigurationError(path, `must be <= ${rule.max}, got ${value}`);
    }
    return value;
};

const POSITIVE_INT: NumberRule = { integer: true, min: 1 };
const POSITIVE: NumberRule = { min: 0, exclusiveMin: true };
const NON_NEGATIVE: NumberRule = { min: 0 };

const RECOMMENDATIONS: readonly Recommendation[] = ['STRONG_BUY', 'BUY', 'HOLD', 'SELL', 'STRONG_SELL'];
const isRecommendation = (value: unknown): value is Recommendation =>
    RECOMMENDATIONS.some(r => r === value);

const isProviderName = (value: unknown): value is ProviderName =>
    PROVIDER_NAMES.some(p => p === value);

const isIndicatorName = (value: string): value is IndicatorName =>
    INDICATOR_NAMES.some(n => n === value);

// ============ SECTIONS ============

const readMarkets = (section: Section): Record<Market, MarketSettings> => {
    const read = (market: Market): MarketSettings => {
        const s = section.child(market);
        const d = DEFAULT_CONFIG.markets[market];
        return {
            enabled: s.boolean('enabled', d.enabled),
            name: s.string('name', d.name),
            currency: s.string('currency', d.currency),
            timezone: s.string('timezone', d.timezone),
            tradingHours: s.string('tradingHours', d.tradingHours),
        };
    };
    return { CN: read('CN'), HK: read('HK'), US: read('US') };
};

const readTechnical = (s: Section): AnalysisConfig['technical'] => {
    const d = DEFAULT_CONFIG.technical;
    const maRaw = s.value('maWindows');
    let maWindows = [...d.maWindows];
    if (maRaw !== undefined) {
        if (!Array.isArray(maRaw) || maRaw.length === 0) {
            throw new ConfigurationError(s.at('maWindows'), 'must be a non-empty array');
        }
        maWindows = maRaw.map((w, i) => checkNumber(w, `${s.at('maWindows')}[${i}]`, POSITIVE_INT));
    }

    const w = s.child('weights');
    const readWeight = (name: TechnicalSignalName) => w.number(name, d.weights[name], NON_NEGATIVE);
    const weights = {
        trend: readWeight('trend'),
        rsi: readWeight('rsi'),
        macd: readWeight('macd'),
        bollinger: readWeight('bollinger'),
        volume: readWeight('volume'),
    };
    if (Object.values(weights).every(v => v === 0)) {
        throw new ConfigurationError(s.at('weights'), 'at least one indicator weight must be positive');
    }

    const technical = {
        periodDays: s.number('periodDays', d.periodDays, POSITIVE_INT),
        maWindows,
        rsiWindow: s.number('rsiWindow', d.rsiWindow, POSITIVE_INT),
        rsiOverbought: s.number('rsiOverbought', d.rsiOverbought, { min: 0, max: 100 }),
        rsiOversold: s.number('rsiOversold', d.rsiOversold, { min: 0, max: 100 }),
        macdFast: s.number('macdFast', d.macdFast, POSITIVE_INT),
        macdSlow: s.number('macdSlow', d.macdSlow, POSITIVE_INT),
        macdSignal: s.number('macdSignal', d.macdSignal, POSITIVE_INT),
        bollingerWindow: s.number('bollingerWindow', d.bollingerWindow, POSITIVE_INT),
        bollingerStdDev: s.number('bollingerStdDev', d.bollingerStdDev, POSITIVE),
        volumeWindow: s.number('volumeWindow', d.volumeWindow, POSITIVE_INT),
        weights,
    };
    if (technical.rsiOversold >= technical.rsiOverbought) {
        throw new ConfigurationError(s.at('rsiOversold'), 'must be below rsiOverbought');
    }
    if (technical.macdFast >= technical.macdSlow) {
        throw new ConfigurationError(s.at('macdFast'), 'must be below macdSlow');
    }
    return technical;
};

const readCurve = (raw: unknown, path: string): CurvePoint[] => {
    if (!Array.isArray(raw) || raw.length === 0) {
        throw new ConfigurationError(path, 'must be a non-empty array of [value, score] points');
    }
    const points = raw.map((point, i): CurvePoint => {
        if (!Array.isArray(point) || point.length !== 2) {
            throw new ConfigurationError(`${path}[${i}]`, 'must be a [value, score] pair');
        }
        return [
            checkNumber(point[0], `${path}[${i}][0]`, {}),
            checkNumber(point[1], `${path}[${i}][1]`, { min: 0, max: 100 }),
        ];
    });
    points.forEach((p, i) => {
        if (i > 0 && !(p[0] > points[i - 1][0])) {
            throw new ConfigurationError(`${path}[${i}]`, 'curve values must be strictly ascending');
        }
    });
    return points;
};

const readCurves = (s: Section): FundamentalCurves => {
    const curves: FundamentalCurves = { ...DEFAULT_CONFIG.fundamental.curves };
    for (const key of s.keys()) {
        if (!isIndicatorName(key)) {
            throw new ConfigurationError(s.at(key), 'unknown financial indicator');
        }
        curves[key] = readCurve(s.value(key), s.at(key));
    }
    return curves;
};

const readSentiment = (s: Section): AnalysisConfig['sentiment'] => {
    const d = DEFAULT_CONFIG.sentiment;
    const w = s.child('categoryWeights');
    const readWeight = (category: NewsCategory) => w.number(category, d.categoryWeights[category], NON_NEGATIVE);
    return {
        maxNewsCount: s.number('maxNewsCount', d.maxNewsCount, POSITIVE_INT),
        maxContentLength: s.number('maxContentLength', d.maxContentLength, POSITIVE_INT),
        categoryWeights: {
            announcement: readWeight('announcement'),
            company_news: readWeight('company_news'),
            industry_news: readWeight('industry_news'),
            research_report: readWeight('research_report'),
        },
        trendThreshold: s.number('trendThreshold', d.trendThreshold, NON_NEGATIVE),
    };
};

const readScoring = (s: Section): AnalysisConfig['scoring'] => {
    const d = DEFAULT_CONFIG.scoring;
    const w = s.child('weights');
    const weights = {
        technical: w.number('technical', d.weights.technical),
        fundamental: w.number('fundamental', d.weights.fundamental),
        sentiment: w.number('sentiment', d.weights.sentiment),
    };
    validateWeights(weights, s.at('weights'));

    let thresholds: RecommendationThreshold[] = d.thresholds.map(t => ({ ...t }));
    const raw = s.value('thresholds');
    if (raw !== undefined) {
        if (!Array.isArray(raw)) throw new ConfigurationError(s.at('thresholds'), 'must be an array');
        thresholds = raw.map((entry, i): RecommendationThreshold => {
            const path = `${s.at('thresholds')}[${i}]`;
            const t = Section.of(entry, path);
            const label = t.value('label');
            if (!isRecommendation(label)) {
                throw new ConfigurationError(`${path}.label`, `must be one of ${RECOMMENDATIONS.join(', ')}`);
            }
            return { min: checkNumber(t.value('min'), `${path}.min`, {}), label };
        });
    }
    validateThresholds(thresholds, s.at('thresholds'));
    return { weights, thresholds };
};

const readProviderOrder = (raw: unknown, path: string): ProviderName[] => {
    const list = typeof raw === 'string'
        ? raw.split(',').map(p => p.trim().toLowerCase()).filter(p => p.length > 0)
        : raw;
    if (!Array.isArray(list)) throw new ConfigurationError(path, 'must be a list of provider names');
    const order: ProviderName[] = [];
    list.forEach((name, i) => {
        if (!isProviderName(name)) {
            throw new ConfigurationError(`${path}[${i}]`, `unknown AI provider "${String(name)}"`);
        }
        if (order.includes(name)) {
            throw new ConfigurationError(`${path}[${i}]`, `provider "${name}" listed twice`);
        }
        order.push(name);
    });
    return order;
};

const readAI = (s: Section): AnalysisConfig['ai'] => {
    const d = DEFAULT_CONFIG.ai;
    const p = s.child('providers');
    for (const key of p.keys()) {
        if (!isProviderName(key)) throw new ConfigurationError(p.at(key), 'unknown AI provider');
    }
    const readProvider = (name: ProviderName): ProviderSettings => {
        const ps = p.child(name);
        const def = d.providers[name];
        return {
            apiKey: ps.string('apiKey', def.apiKey),
            model: ps.string('model', def.model),
            baseUrl: ps.string('baseUrl', def.baseUrl),
        };
    };
    return {
        order: s.has('order') ? readProviderOrder(s.value('order'), s.at('order')) : [...d.order],
        providers: {
            openai: readProvider('openai'),
            anthropic: readProvider('anthropic'),
            zhipu: readProvider('zhipu'),
            gemini: readProvider('gemini'),
            ollama: readProvider('ollama'),
        },
        temperature: s.number('temperature', d.temperature, { min: 0, max: 2 }),
        maxTokens: s.number('maxTokens', d.maxTokens, POSITIVE_INT),
        requestTimeoutMs: s.number('requestTimeoutMs', d.requestTimeoutMs, POSITIVE),
    };
};

// ============ ENV OVERRIDES ============

const applyEnv = (config: AnalysisConfig, env: Env): AnalysisConfig => {
    const set = (value: string | undefined, apply: (v: string) => void) => {
        const trimmed = value?.trim();
        if (trimmed) apply(trimmed);
    };
    const { providers } = config.ai;
    set(env.OPENAI_API_KEY, v => { providers.openai.apiKey = v; });
    set(env.OPENAI_BASE_URL, v => { providers.openai.baseUrl = v; });
    set(env.ANTHROPIC_API_KEY, v => { providers.anthropic.apiKey = v; });
    set(env.ZHIPU_API_KEY, v => { providers.zhipu.apiKey = v; });
    set(env.GEMINI_API_KEY, v => { providers.gemini.apiKey = v; });
    set(env.OLLAMA_HOST, v => { providers.ollama.baseUrl = v.startsWith('http') ? v : `http://${v}`; });
    set(env.AI_PROVIDER_ORDER, v => { config.ai.order = readProviderOrder(v, 'AI_PROVIDER_ORDER'); });
    set(env.FMP_API_KEY, v => { config.dataSource.fmpApiKey = v; });
    set(env.FMP_BASE_URL, v => { config.dataSource.fmpBaseUrl = v; });
    return config;
};

export const deepFreeze = <T>(value: T): T => {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
};

/** Validates a parsed config object merged over the defaults. Pure apart from `env`. */
export const buildConfig = (raw: unknown, env: Env = {}): AnalysisConfig => {
    const root = Section.of(raw, '');
    const c = root.child('cache').child('ttls');
    const o = root.child('orchestrator');
    const st = root.child('stream');
    const ds = root.child('dataSource');
    const d = DEFAULT_CONFIG;

    const config: AnalysisConfig = {
        markets: readMarkets(root.child('markets')),
        technical: readTechnical(root.child('technical')),
        fundamental: { curves: readCurves(root.child('fundamental').child('curves')) },
        sentiment: readSentiment(root.child('sentiment')),
        scoring: readScoring(root.child('scoring')),
        cache: {
            ttls: {
                price: c.number('price', d.cache.ttls.price, POSITIVE),
                fundamental: c.number('fundamental', d.cache.ttls.fundamental, POSITIVE),
                news: c.number('news', d.cache.ttls.news, POSITIVE),
            },
        },
        ai: readAI(root.child('ai')),
        orchestrator: {
            concurrency: o.number('concurrency', d.orchestrator.concurrency, POSITIVE_INT),
            maxBatchSize: o.number('maxBatchSize', d.orchestrator.maxBatchSize, POSITIVE_INT),
            fetchTimeoutMs: o.number('fetchTimeoutMs', d.orchestrator.fetchTimeoutMs, POSITIVE),
        },
        stream: {
            queueBound: st.number('queueBound', d.stream.queueBound, POSITIVE_INT),
            heartbeatMs: st.number('heartbeatMs', d.stream.heartbeatMs, POSITIVE),
        },
        dataSource: {
            fmpApiKey: ds.string('fmpApiKey', d.dataSource.fmpApiKey),
            fmpBaseUrl: ds.string('fmpBaseUrl', d.dataSource.fmpBaseUrl),
            maxRetries: ds.number('maxRetries', d.dataSource.maxRetries, { integer: true, min: 0 }),
            retryDelayMs: ds.number('retryDelayMs', d.dataSource.retryDelayMs, NON_NEGATIVE),
        },
    };

    return deepFreeze(applyEnv(config, env));
};

export interface LoadConfigOptions {
    path?: string;
    env?: Env;
}

/**
 * Reads the optional JSON5 file, merges it over DEFAULT_CONFIG, applies
 * environment secrets and returns a frozen, validated configuration.
 * Throws ConfigurationError on any invalid value.
 */
export const loadConfig = (options: LoadConfigOptions = {}): AnalysisConfig => {
    const env = options.env ?? process.env;
    const explicit = options.path ?? env.ANALYSIS_CONFIG;
    const path = explicit ?? DEFAULT_CONFIG_PATH;

    let raw: unknown = {};
    if (existsSync(path)) {
        try {
            raw = JSON5.parse(readFileSync(path, 'utf-8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(path, `cannot parse: ${reason}`);
        }
        console.log(`[Config] Loaded ${path}`);
    } else if (explicit) {
        throw new ConfigurationError(path, 'config file not found');
    } else {
        console.log(`[Config] ${path} not found, using defaults`);
    }

    const config = buildConfig(raw, env);
    const configured = config.ai.order.filter(name => isProviderConfigured(config.ai, name));
    console.log(`[Config] AI providers: ${configured.length > 0 ? configured.join(' -> ') : 'none (rule-based narrative)'}`);
    return config;
};
