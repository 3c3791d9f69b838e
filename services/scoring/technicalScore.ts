import type {
    PriceInfo,
    PriceSeries,
    TechnicalIndicators,
    TechnicalScore,
    TechnicalSignalName,
} from '../../src/types/scoring';
import type { TechnicalConfig } from '../../config/strategyConfig';
import { ScoringError } from '../utils/errors';
import {
    annualizedVolatility,
    computeBollinger,
    computeMacd,
    computeMovingAverages,
    computeRsi,
    computeVolume,
} from './indicators';

/**
 * Technical Score (0-100)
 * Goal: Do trend, momentum and volume agree on a direction?
 *
 * Each computable indicator emits a signal in [-1, 1]; the score is
 * 50 + 50 * (weighted mean signal) over the indicators that exist.
 */

type Signal = { score: number; detail: string } | null;

const fmt = (value: number) => `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;

// 1. Moving average alignment
const scoreTrend = (ind: TechnicalIndicators): Signal => {
    const { trend, values } = ind.movingAverages;
    if (!trend) return null;
    const score = trend === 'bullish' ? 1 : trend === 'bearish' ? -1 : 0;
    const mas = Object.entries(values)
        .filter((entry): entry is [string, number] => entry[1] !== null)
        .map(([w, v]) => `MA${w} ${v.toFixed(2)}`)
        .join(', ');
    return { score, detail: `Trend: ${trend} (${mas}) ${fmt(score)}` };
};

// 2. RSI extremes
const scoreRsi = (ind: TechnicalIndicators): Signal => {
    if (!ind.rsi) return null;
    const score = ind.rsi.oversold ? 0.5 : ind.rsi.overbought ? -0.5 : 0;
    const zone = ind.rsi.oversold ? 'oversold' : ind.rsi.overbought ? 'overbought' : 'neutral';
    return { score, detail: `RSI: ${ind.rsi.value.toFixed(1)} ${zone} ${fmt(score)}` };
};

// 3. MACD crosses and position vs signal line
const scoreMacd = (ind: TechnicalIndicators): Signal => {
    const m = ind.macd;
    if (!m) return null;
    let score = 0;
    let state = 'flat';
    if (m.bullishCross) { score = 1; state = 'bullish cross'; }
    else if (m.bearishCross) { score = -1; state = 'bearish cross'; }
    else if (m.macd > m.signal) { score = 0.5; state = 'above signal'; }
    else if (m.macd < m.signal) { score = -0.5; state = 'below signal'; }
    return { score, detail: `MACD: ${m.macd.toFixed(3)} vs ${m.signal.toFixed(3)} ${state} ${fmt(score)}` };
};

// 4. Bollinger position
const scoreBollinger = (ind: TechnicalIndicators): Signal => {
    const b = ind.bollinger;
    if (!b) return null;
    let score = 0;
    if (b.belowLower) score = 0.5;
    else if (b.aboveUpper) score = -0.5;
    else if (b.position < 0.2) score = 0.25;
    else if (b.position > 0.8) score = -0.25;
    return { score, detail: `Bollinger: position ${(b.position * 100).toFixed(0)}% ${fmt(score)}` };
};

// 5. Volume confirmation
const scoreVolume = (ind: TechnicalIndicators): Signal => {
    const v = ind.volume;
    if (!v) return null;
    const score = v.confirming ? v.recentTrend : 0;
    const state = v.confirming ? 'confirms trend' : 'divergence';
    return { score, detail: `Volume: ${v.ratio.toFixed(2)}x average, ${state} ${fmt(score)}` };
};

const SCORERS: Record<TechnicalSignalName, (ind: TechnicalIndicators) => Signal> = {
    trend: scoreTrend,
    rsi: scoreRsi,
    macd: scoreMacd,
    bollinger: scoreBollinger,
    volume: scoreVolume,
};

const SIGNAL_ORDER: readonly TechnicalSignalName[] = ['trend', 'rsi', 'macd', 'bollinger', 'volume'];

export const computeIndicators = (series: PriceSeries, config: TechnicalConfig): TechnicalIndicators => {
    const closes = series.map(b => b.close);
    return {
        movingAverages: computeMovingAverages(closes, config.maWindows),
        rsi: computeRsi(closes, config.rsiWindow, config.rsiOverbought, config.rsiOversold),
        macd: computeMacd(closes, config.macdFast, config.macdSlow, config.macdSignal),
        bollinger: computeBollinger(closes, config.bollingerWindow, config.bollingerStdDev),
        volume: computeVolume(series, config.volumeWindow),
    };
};

export const computePriceInfo = (series: PriceSeries, indicators: TechnicalIndicators): PriceInfo => {
    const last = series[series.length - 1];
    const prev = series[series.length - 2];
    const changePct = prev && prev.close > 0 ? ((last.close - prev.close) / prev.close) * 100 : 0;
    return {
        close: last.close,
        changePct,
        volumeRatio: indicators.volume ? indicators.volume.ratio : null,
        volatilityPct: annualizedVolatility(series.map(b => b.close)),
    };
};

export const computeTechnicalScore = (series: PriceSeries, config: TechnicalConfig): TechnicalScore => {
    if (series.length < 2) {
        throw new ScoringError('technical', `need at least 2 price bars, got ${series.length}`);
    }

    const indicators = computeIndicators(series, config);
    const signals: Partial<Record<TechnicalSignalName, number>> = {};
    const details: string[] = [];
    let weighted = 0;
    let totalWeight = 0;

    for (const name of SIGNAL_ORDER) {
        const signal = SCORERS[name](indicators);
        if (!signal) continue;
        const weight = config.weights[name];
        signals[name] = signal.score;
        details.push(signal.detail);
        weighted += weight * signal.score;
        totalWeight += weight;
    }

    if (Object.keys(signals).length === 0) {
        throw new ScoringError('technical', `no indicator computable from ${series.length} bars`);
    }

    const score = totalWeight > 0 ? 50 + 50 * (weighted / totalWeight) : 50;

    return {
        score,
        indicators,
        signals,
        priceInfo: computePriceInfo(series, indicators),
        details,
    };
};
