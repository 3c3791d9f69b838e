import type {
    BollingerReading,
    MacdReading,
    MovingAverages,
    PriceBar,
    RsiReading,
    TrendDirection,
    VolumeReading,
} from '../../src/types/scoring';

/**
 * Indicator math over ascending close/volume arrays.
 * Every function returns null when the series is shorter than its window;
 * values are never padded or extrapolated.
 */

const TRADING_DAYS_PER_YEAR = 252;

const mean = (values: readonly number[]): number =>
    values.reduce((sum, v) => sum + v, 0) / values.length;

/** Population standard deviation. */
export const stdDev = (values: readonly number[]): number => {
    if (values.length === 0) return 0;
    const m = mean(values);
    return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
};

const sign = (value: number): -1 | 0 | 1 => (value > 0 ? 1 : value < 0 ? -1 : 0);

export const sma = (values: readonly number[], window: number): number | null => {
    if (window <= 0 || values.length < window) return null;
    return mean(values.slice(values.length - window));
};

// 1. Moving averages + trend alignment
export const computeMovingAverages = (closes: readonly number[], windows: readonly number[]): MovingAverages => {
    const sorted = [...windows].sort((a, b) => a - b);
    const values: Record<number, number | null> = {};
    for (const w of sorted) values[w] = sma(closes, w);

    const computed = sorted
        .map(w => values[w])
        .filter((v): v is number => v !== null);

    if (computed.length === 0 || closes.length === 0) return { values, trend: null };

    const chain = [closes[closes.length - 1], ...computed];
    let bullish = true;
    let bearish = true;
    for (let i = 1; i < chain.length; i++) {
        if (!(chain[i - 1] > chain[i])) bullish = false;
        if (!(chain[i - 1] < chain[i])) bearish = false;
    }
    const trend: TrendDirection = bullish ? 'bullish' : bearish ? 'bearish' : 'mixed';
    return { values, trend };
};

// 2. RSI with Wilder smoothing
export const computeRsi = (
    closes: readonly number[],
    window: number,
    overbought = 70,
    oversold = 30
): RsiReading | null => {
    if (window <= 0 || closes.length < window + 1) return null;

    let avgGain = 0;
    let avgLoss = 0;
    for (let i = 1; i <= window; i++) {
        const delta = closes[i] - closes[i - 1];
        if (delta > 0) avgGain += delta;
        else avgLoss -= delta;
    }
    avgGain /= window;
    avgLoss /= window;

    for (let i = window + 1; i < closes.length; i++) {
        const delta = closes[i] - closes[i - 1];
        avgGain = (avgGain * (window - 1) + Math.max(delta, 0)) / window;
        avgLoss = (avgLoss * (window - 1) + Math.max(-delta, 0)) / window;
    }

    let value: number;
    if (avgGain === 0 && avgLoss === 0) value = 50;
    else if (avgLoss === 0) value = 100;
    else value = 100 - 100 / (1 + avgGain / avgLoss);

    return { value, overbought: value > overbought, oversold: value < oversold };
};

/** EMA seeded with the first value, alpha = 2 / (span + 1). */
export const emaSeries = (values: readonly number[], span: number): number[] => {
    if (values.length === 0) return [];
    const alpha = 2 / (span + 1);
    const out = [values[0]];
    for (let i = 1; i < values.length; i++) {
        out.push(alpha * values[i] + (1 - alpha) * out[i - 1]);
    }
    return out;
};

// 3. MACD
export const computeMacd = (
    closes: readonly number[],
    fast: number,
    slow: number,
    signalSpan: number
): MacdReading | null => {
    if (closes.length < slow + 1) return null;

    const emaFast = emaSeries(closes, fast);
    const emaSlow = emaSeries(closes, slow);
    const line = emaFast.map((v, i) => v - emaSlow[i]);
    const signal = emaSeries(line, signalSpan);

    const last = line.length - 1;
    const macd = line[last];
    const sig = signal[last];
    const prevMacd = line[last - 1];
    const prevSig = signal[last - 1];

    return {
        macd,
        signal: sig,
        histogram: macd - sig,
        bullishCross: prevMacd < prevSig && macd > sig,
        bearishCross: prevMacd > prevSig && macd < sig,
    };
};

// 4. Bollinger Bands
export const computeBollinger = (
    closes: readonly number[],
    window: number,
    stdDevs: number
): BollingerReading | null => {
    if (window <= 0 || closes.length < window) return null;

    const recent = closes.slice(closes.length - window);
    const middle = mean(recent);
    const sd = stdDev(recent);
    const upper = middle + stdDevs * sd;
    const lower = middle - stdDevs * sd;
    const close = closes[closes.length - 1];
    const width = upper - lower;

    const position = width === 0 ? 0.5 : Math.min(1, Math.max(0, (close - lower) / width));

    return {
        upper,
        middle,
        lower,
        position,
        aboveUpper: close > upper,
        belowLower: close < lower,
    };
};

// 5. Volume confirmation
export const computeVolume = (bars: readonly PriceBar[], window: number): VolumeReading | null => {
    if (window <= 0 || bars.length < window + 1) return null;

    const last = bars.length - 1;
    const baseline = mean(bars.slice(last - window, last).map(b => b.volume));
    if (!(baseline > 0)) return null;

    const ratio = bars[last].volume / baseline;
    const priceDirection = sign(bars[last].close - bars[last - 1].close);
    const recentTrend = sign(bars[last].close - bars[last - window].close);
    const confirming = ratio > 1 && recentTrend !== 0 && priceDirection === recentTrend;

    return { ratio, priceDirection, recentTrend, confirming, divergence: !confirming };
};

/** Annualised volatility of daily simple returns, in percent. */
export const annualizedVolatility = (closes: readonly number[]): number | null => {
    const returns: number[] = [];
    for (let i = 1; i < closes.length; i++) {
        if (closes[i - 1] > 0) returns.push(closes[i] / closes[i - 1] - 1);
    }
    if (returns.length < 2) return null;
    return stdDev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
};
