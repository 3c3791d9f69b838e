import type { ReportDraft } from '../../src/types/scoring';
import type { NarrativePrompt } from './provider';

export const NARRATIVE_SYSTEM_PROMPT = `
You are a senior equity analyst writing for retail investors.
Write a structured analysis in English Markdown using ONLY the data provided.

OUTPUT RULES:
1. Use these sections in order: Market Context, Score Overview, Technical Picture,
   Financial Highlights, News Sentiment, Strategy & Risks.
2. Quote the numbers you rely on. Do not invent figures that are not in the data.
3. If a data category is marked missing, say so plainly in its section.
4. End with a one-line disclaimer that this is not investment advice.
`.trim();

const num = (value: number | null | undefined, digits = 2): string =>
    value === null || value === undefined ? 'n/a' : value.toFixed(digits);

const technicalBlock = (draft: ReportDraft): string => {
    const t = draft.technical;
    if (!t) return 'Technical data: MISSING';
    const { movingAverages, rsi, macd, bollinger, volume } = t.indicators;
    const mas = Object.entries(movingAverages.values)
        .map(([w, v]) => `MA${w}=${num(v)}`)
        .join(', ');
    return [
        `Technical score: ${t.score.toFixed(1)}/100`,
        `Moving averages: ${mas}; trend ${movingAverages.trend ?? 'n/a'}`,
        `RSI: ${rsi ? rsi.value.toFixed(1) : 'n/a'}`,
        `MACD: ${macd ? `${macd.macd.toFixed(3)} (signal ${macd.signal.toFixed(3)})${macd.bullishCross ? ', bullish cross' : ''}${macd.bearishCross ? ', bearish cross' : ''}` : 'n/a'}`,
        `Bollinger position: ${bollinger ? `${(bollinger.position * 100).toFixed(0)}%` : 'n/a'}`,
        `Volume: ${volume ? `${volume.ratio.toFixed(2)}x average, ${volume.confirming ? 'confirming' : 'divergent'}` : 'n/a'}`,
    ].join('\n');
};

const fundamentalBlock = (draft: ReportDraft): string => {
    const f = draft.fundamental;
    if (!f) return 'Fundamental data: MISSING';
    const categories = Object.entries(f.categoryScores)
        .map(([category, score]) => `${category} ${num(score, 1)}`)
        .join(', ');
    return [
        `Fundamental score: ${f.score.toFixed(1)}/100 (${f.indicatorsUsed}/${f.indicatorsTotal} indicators)`,
        `Category scores: ${categories}`,
    ].join('\n');
};

const sentimentBlock = (draft: ReportDraft): string => {
    const s = draft.sentiment;
    if (!s) return 'Sentiment data: MISSING';
    if (s.noNews) return 'Sentiment: no news items were available; neutral score 50 with zero confidence';
    return [
        `Sentiment score: ${s.score.toFixed(1)}/100 (overall ${s.overall.toFixed(2)}, ${s.label}, trend ${s.trend})`,
        `Confidence: ${s.confidence.toFixed(2)}; ${s.newsAnalyzed} items; ${(s.positiveRatio * 100).toFixed(0)}% positive, ${(s.negativeRatio * 100).toFixed(0)}% negative`,
    ].join('\n');
};

export const buildNarrativePrompt = (draft: ReportDraft): NarrativePrompt => {
    const { marketInfo, priceInfo, scores } = draft;
    const weights = Object.entries(draft.effectiveWeights)
        .map(([category, w]) => `${category} ${((w ?? 0) * 100).toFixed(0)}%`)
        .join(', ');

    const user = [
        `## ${draft.symbol} (${marketInfo.name}, ${marketInfo.currency})`,
        `Analysis date: ${draft.analysisDate}; exchange timezone ${marketInfo.timezone}, trading hours ${marketInfo.tradingHours}`,
        priceInfo
            ? `Last close ${priceInfo.close.toFixed(2)} (${priceInfo.changePct >= 0 ? '+' : ''}${priceInfo.changePct.toFixed(2)}%), annualised volatility ${num(priceInfo.volatilityPct, 1)}%`
            : 'Price data: MISSING',
        '',
        `Composite score: ${scores.composite.toFixed(1)}/100 -> ${scores.recommendation}`,
        `Effective weights: ${weights}${draft.partial ? ` (partial: missing ${draft.missing.join(', ')})` : ''}`,
        '',
        technicalBlock(draft),
        '',
        fundamentalBlock(draft),
        '',
        sentimentBlock(draft),
    ].join('\n');

    return { system: NARRATIVE_SYSTEM_PROMPT, user };
};
