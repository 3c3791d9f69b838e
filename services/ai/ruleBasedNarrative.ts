import type { Recommendation, ReportDraft } from '../../src/types/scoring';

const STRATEGY: Record<Recommendation, string> = {
    STRONG_BUY: 'Signals align strongly. Consider building a position in stages and review on any break of the short-term trend.',
    BUY: 'The balance of evidence is positive. A measured position with a defined stop level is reasonable.',
    HOLD: 'Evidence is mixed. Existing holders can keep their position; new buyers may wait for a clearer signal.',
    SELL: 'The balance of evidence is negative. Consider reducing exposure and avoid adding on weakness.',
    STRONG_SELL: 'Signals are broadly negative. Capital preservation takes priority; consider exiting the position.',
};

const fixed = (value: number | null | undefined, digits = 1): string =>
    value === null || value === undefined ? 'n/a' : value.toFixed(digits);

const technicalSection = (draft: ReportDraft): string => {
    const t = draft.technical;
    if (!t) return 'Price data was unavailable, so no technical reading was made.';
    const { movingAverages, rsi, macd, volume } = t.indicators;
    const parts = [`Technical score ${t.score.toFixed(1)}/100.`];
    if (movingAverages.trend) parts.push(`Moving averages are ${movingAverages.trend}.`);
    if (rsi) {
        const zone = rsi.overbought ? ' (overbought)' : rsi.oversold ? ' (oversold)' : '';
        parts.push(`RSI stands at ${rsi.value.toFixed(1)}${zone}.`);
    }
    if (macd) {
        if (macd.bullishCross) parts.push('MACD has just crossed above its signal line.');
        else if (macd.bearishCross) parts.push('MACD has just crossed below its signal line.');
        else parts.push(`MACD is ${macd.macd >= macd.signal ? 'above' : 'below'} its signal line.`);
    }
    if (volume) {
        parts.push(volume.confirming
            ? `Volume at ${volume.ratio.toFixed(2)}x its average confirms the move.`
            : `Volume at ${volume.ratio.toFixed(2)}x its average does not confirm the trend.`);
    }
    return parts.join(' ');
};

const fundamentalSection = (draft: ReportDraft): string => {
    const f = draft.fundamental;
    if (!f) return 'Financial indicators were unavailable.';
    const ranked = Object.entries(f.categoryScores)
        .filter((entry): entry is [string, number] => entry[1] !== null)
        .sort((a, b) => b[1] - a[1]);
    const best = ranked[0];
    const worst = ranked[ranked.length - 1];
    const lines = [`Fundamental score ${f.score.toFixed(1)}/100 from ${f.indicatorsUsed} of ${f.indicatorsTotal} indicators.`];
    if (best && worst && best !== worst) {
        lines.push(`Strongest area: ${best[0]} (${best[1].toFixed(1)}); weakest: ${worst[0]} (${worst[1].toFixed(1)}).`);
    }
    return lines.join(' ');
};

const sentimentSection = (draft: ReportDraft): string => {
    const s = draft.sentiment;
    if (!s) return 'News data was unavailable.';
    if (s.noNews) return 'No recent news was found. Sentiment is treated as neutral (50) with zero confidence.';
    return `Sentiment score ${s.score.toFixed(1)}/100 across ${s.newsAnalyzed} items: ${s.label.replace('_', ' ')}, `
        + `trend ${s.trend}, confidence ${s.confidence.toFixed(2)}.`;
};

/**
 * Deterministic Markdown narrative used when no AI provider is configured or
 * every provider failed. Paragraphs are separated by blank lines.
 */
export const buildRuleBasedNarrative = (draft: ReportDraft): string => {
    const { marketInfo, priceInfo, scores } = draft;
    const price = priceInfo
        ? `Last close ${priceInfo.close.toFixed(2)} ${marketInfo.currency} (${priceInfo.changePct >= 0 ? '+' : ''}${priceInfo.changePct.toFixed(2)}%), annualised volatility ${fixed(priceInfo.volatilityPct)}%.`
        : 'No price data.';

    const sections = [
        `## ${draft.symbol} Analysis (${draft.analysisDate})`,
        `**Market Context.** ${marketInfo.name} market, quoted in ${marketInfo.currency}, trading ${marketInfo.tradingHours} (${marketInfo.timezone}). ${price}`,
        `**Score Overview.** Composite ${scores.composite.toFixed(1)}/100, recommendation **${scores.recommendation}**.`
            + (draft.partial ? ` This is a partial result: ${draft.missing.join(', ')} data was missing and the remaining weights were renormalised.` : ''),
        `**Technical Picture.** ${technicalSection(draft)}`,
        `**Financial Highlights.** ${fundamentalSection(draft)}`,
        `**News Sentiment.** ${sentimentSection(draft)}`,
        `**Strategy & Risks.** ${STRATEGY[scores.recommendation]}`,
        '_Generated by rules without an AI model. Not investment advice._',
    ];
    return sections.join('\n\n');
};
