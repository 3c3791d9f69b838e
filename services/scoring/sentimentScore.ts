import { readFileSync } from 'node:fs';
import { load } from 'cheerio';
import type {
    CategorySentiment,
    NewsCategory,
    NewsItem,
    SentimentLabel,
    SentimentScore,
    SentimentTrend,
} from '../../src/types/scoring';
import type { SentimentConfig } from '../../config/strategyConfig';
import { stdDev } from './indicators';

/**
 * Sentiment Score (0-100)
 * Goal: What is the tone of recent news, and is it getting better or worse?
 *
 * Lexicon polarity per item, category-weighted mean across items.
 */

export interface SentimentLexicon {
    readonly positive: ReadonlyMap<string, number>;
    readonly negative: ReadonlyMap<string, number>;
}

export const DEFAULT_LEXICON_PATH = new URL('../../data/sentimentLexicon.json', import.meta.url);

const isWeightTable = (value: unknown): value is Record<string, number> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(w => typeof w === 'number' && Number.isFinite(w) && w > 0);

export const createLexicon = (raw: unknown): SentimentLexicon => {
    if (typeof raw !== 'object' || raw === null || !('positive' in raw) || !('negative' in raw)) {
        throw new Error('Sentiment lexicon must have "positive" and "negative" tables');
    }
    const { positive, negative } = raw;
    if (!isWeightTable(positive) || !isWeightTable(negative)) {
        throw new Error('Sentiment lexicon weights must be positive numbers');
    }
    const toMap = (table: Record<string, number>) =>
        new Map(Object.entries(table).map(([term, w]): [string, number] => [term.toLowerCase(), w]));
    return Object.freeze({ positive: toMap(positive), negative: toMap(negative) });
};

export const loadLexicon = (path: URL | string = DEFAULT_LEXICON_PATH): SentimentLexicon => {
    const lexicon = createLexicon(JSON.parse(readFileSync(path, 'utf-8')));
    console.log(`[Sentiment] Lexicon loaded: ${lexicon.positive.size} positive, ${lexicon.negative.size} negative terms`);
    return lexicon;
};

// ============ TEXT PREPARATION ============

/** Strips markup, collapses whitespace, truncates to `maxLength` characters. */
export const cleanContent = (body: string, maxLength: number): string => {
    const text = body.includes('<') ? load(body).root().text() : body;
    const collapsed = text.replace(/\s+/g, ' ').trim();
    return collapsed.length > maxLength ? collapsed.slice(0, maxLength) : collapsed;
};

/** Dedupes by id (first wins), orders newest first, caps the count. */
export const prepareNews = (items: readonly NewsItem[], config: SentimentConfig): NewsItem[] => {
    const seen = new Set<string>();
    const unique: NewsItem[] = [];
    for (const item of items) {
        if (seen.has(item.id)) continue;
        seen.add(item.id);
        unique.push({ ...item, body: cleanContent(item.body, config.maxContentLength) });
    }
    unique.sort((a, b) => b.timestamp - a.timestamp);
    return unique.slice(0, config.maxNewsCount);
};

// ============ SCORING ============

const ASCII_WORD = /^[a-z0-9']+$/;

const matchWeight = (text: string, words: ReadonlySet<string>, table: ReadonlyMap<string, number>): number => {
    let total = 0;
    for (const [term, weight] of table) {
        const hit = ASCII_WORD.test(term) ? words.has(term) : text.includes(term);
        if (hit) total += weight;
    }
    return total;
};

/** (pos - neg) / (pos + neg) over matched term weights; 0 when nothing matches. */
export const scoreText = (text: string, lexicon: SentimentLexicon): number => {
    const lower = text.toLowerCase();
    const words = new Set(lower.match(/[a-z0-9']+/g) ?? []);
    const pos = matchWeight(lower, words, lexicon.positive);
    const neg = matchWeight(lower, words, lexicon.negative);
    return pos + neg === 0 ? 0 : (pos - neg) / (pos + neg);
};

export const labelSentiment = (overall: number): SentimentLabel => {
    if (overall > 0.3) return 'very_positive';
    if (overall > 0.1) return 'positive';
    if (overall > -0.1) return 'neutral';
    if (overall > -0.3) return 'negative';
    return 'very_negative';
};

const mean = (values: number[]): number =>
    values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;

/** Newer half vs older half of a newest-first list. */
const detectTrend = (scores: number[], threshold: number): SentimentTrend => {
    if (scores.length < 2) return 'stable';
    const mid = Math.floor(scores.length / 2);
    const delta = mean(scores.slice(0, mid)) - mean(scores.slice(mid));
    if (delta > threshold) return 'improving';
    if (delta < -threshold) return 'deteriorating';
    return 'stable';
};

export const computeSentimentScore = (
    news: readonly NewsItem[],
    lexicon: SentimentLexicon,
    config: SentimentConfig
): SentimentScore => {
    const items = prepareNews(news, config);

    if (items.length === 0) {
        return {
            score: 50,
            overall: 0,
            label: 'neutral',
            trend: 'stable',
            confidence: 0,
            newsAnalyzed: 0,
            positiveRatio: 0,
            negativeRatio: 0,
            byCategory: {},
            noNews: true,
        };
    }

    const scores = items.map(item => scoreText(`${item.title} ${item.body}`, lexicon));

    let weightedSum = 0;
    let weightTotal = 0;
    const buckets: Partial<Record<NewsCategory, number[]>> = {};
    items.forEach((item, i) => {
        const weight = config.categoryWeights[item.category];
        weightedSum += weight * scores[i];
        weightTotal += weight;
        const bucket = buckets[item.category] ?? [];
        bucket.push(scores[i]);
        buckets[item.category] = bucket;
    });

    const overall = weightTotal > 0 ? weightedSum / weightTotal : 0;

    const byCategory: Partial<Record<NewsCategory, CategorySentiment>> = {};
    for (const [category, values] of Object.entries(buckets)) {
        if (!values || !isNewsCategory(category)) continue;
        byCategory[category] = { count: values.length, meanScore: mean(values) };
    }

    return {
        score: (overall + 1) * 50,
        overall,
        label: labelSentiment(overall),
        trend: detectTrend(scores, config.trendThreshold),
        confidence: Math.min(1, Math.max(0, 1 - stdDev(scores))),
        newsAnalyzed: items.length,
        positiveRatio: scores.filter(s => s > 0).length / items.length,
        negativeRatio: scores.filter(s => s < 0).length / items.length,
        byCategory,
        noNews: false,
    };
};

export const isNewsCategory = (value: unknown): value is NewsCategory =>
    value === 'company_news' || value === 'announcement' || value === 'research_report' || value === 'industry_news';
