import { describe, it, expect } from 'vitest';
import type { PriceBar } from '../../src/types/scoring';
import { DEFAULT_CONFIG } from '../../config/strategyConfig';
import {
    annualizedVolatility,
    computeBollinger,
    computeMacd,
    computeMovingAverages,
    computeRsi,
    computeVolume,
    emaSeries,
} from '../../services/scoring/indicators';
import { computeTechnicalScore } from '../../services/scoring/technicalScore';
import { ScoringError } from '../../services/utils/errors';

const DAY = 24 * 60 * 60 * 1000;

const makeBars = (closes: number[], volumes: number[] = []): PriceBar[] =>
    closes.map((close, i) => ({
        timestamp: i * DAY,
        open: close,
        high: close,
        low: close,
        close,
        volume: volumes[i] ?? 1_000,
    }));

const ramp = (from: number, to: number): number[] =>
    Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe('Indicators', () => {
    describe('RSI', () => {
        it('should be 50 for flat prices', () => {
            const rsi = computeRsi(Array(20).fill(100), 14);
            expect(rsi).toEqual({ value: 50, overbought: false, oversold: false });
        });

        it('should be 100 when there are no losses', () => {
            const rsi = computeRsi(ramp(1, 16), 14);
            expect(rsi?.value).toBe(100);
            expect(rsi?.overbought).toBe(true);
        });

        it('should apply Wilder smoothing after the seed window', () => {
            // seed gains/losses 0.5/0.5, then +2 -> 1.25/0.25, RS 5
            const rsi = computeRsi([10, 11, 10, 12], 2);
            expect(rsi?.value).toBeCloseTo(100 - 100 / 6, 10);
        });

        it('should not change when prices are scaled', () => {
            const closes = [44, 44.3, 44.1, 43.6, 44.3, 44.8, 45.1, 45.4, 45.8, 46.1, 45.9, 46.2, 45.6, 46.3, 46.3, 46, 46.4];
            const base = computeRsi(closes, 14);
            const scaled = computeRsi(closes.map(c => c * 7.5), 14);
            expect(base).not.toBeNull();
            expect(scaled?.value).toBeCloseTo(base?.value ?? Number.NaN, 9);
        });

        it('should need window + 1 closes', () => {
            expect(computeRsi(ramp(1, 14), 14)).toBeNull();
        });
    });

    describe('Moving averages', () => {
        it('should report mixed trend for flat prices and omit windows longer than the series', () => {
            const ma = computeMovingAverages(Array(20).fill(100), [5, 10, 20, 60]);
            expect(ma.trend).toBe('mixed');
            expect(ma.values).toEqual({ 5: 100, 10: 100, 20: 100, 60: null });
        });

        it('should detect a bullish alignment on a rising series', () => {
            const ma = computeMovingAverages(ramp(1, 60), [20, 5, 60, 10]);
            expect(ma.values).toEqual({ 5: 58, 10: 55.5, 20: 50.5, 60: 30.5 });
            expect(ma.trend).toBe('bullish');
        });

        it('should detect a bearish alignment on a falling series', () => {
            const ma = computeMovingAverages(ramp(1, 30).reverse(), [5, 10]);
            expect(ma.trend).toBe('bearish');
        });

        it('should report no trend when no window fits', () => {
            expect(computeMovingAverages([1, 2], [5]).trend).toBeNull();
        });
    });

    describe('MACD', () => {
        it('should seed the EMA with the first value', () => {
            expect(emaSeries([1, 2], 3)).toEqual([1, 1.5]);
        });

        it('should need slow + 1 closes', () => {
            expect(computeMacd(ramp(1, 26), 12, 26, 9)).toBeNull();
        });

        it('should sit above its signal line on a steady rise without a fresh cross', () => {
            const macd = computeMacd(ramp(1, 40), 12, 26, 9);
            expect(macd?.macd).toBeGreaterThan(0);
            expect(macd?.histogram).toBeGreaterThan(0);
            expect(macd?.bullishCross).toBe(false);
            expect(macd?.bearishCross).toBe(false);
        });
    });

    describe('Bollinger bands', () => {
        it('should place a zero-width band at the middle', () => {
            expect(computeBollinger(Array(20).fill(100), 20, 2)).toEqual({
                upper: 100,
                middle: 100,
                lower: 100,
                position: 0.5,
                aboveUpper: false,
                belowLower: false,
            });
        });

        it('should flag a close above the upper band and clamp the position', () => {
            const band = computeBollinger([...Array(19).fill(10), 20], 20, 2);
            expect(band?.middle).toBe(10.5);
            expect(band?.aboveUpper).toBe(true);
            expect(band?.position).toBe(1);
        });
    });

    describe('Volume', () => {
        it('should confirm a rising trend on above-average volume', () => {
            const bars = makeBars(ramp(100, 120), [...Array(20).fill(1_000), 3_000]);
            expect(computeVolume(bars, 20)).toEqual({
                ratio: 3,
                priceDirection: 1,
                recentTrend: 1,
                confirming: true,
                divergence: false,
            });
        });

        it('should flag divergence when volume is at or below average', () => {
            const reading = computeVolume(makeBars(ramp(100, 120)), 20);
            expect(reading?.ratio).toBe(1);
            expect(reading?.confirming).toBe(false);
            expect(reading?.divergence).toBe(true);
        });
    });

    it('should compute zero volatility for flat prices and need two returns', () => {
        expect(annualizedVolatility(Array(5).fill(100))).toBe(0);
        expect(annualizedVolatility([100, 101])).toBeNull();
    });
});

describe('computeTechnicalScore', () => {
    const config = DEFAULT_CONFIG.technical;

    it('should score 20 flat bars as neutral', () => {
        const result = computeTechnicalScore(makeBars(Array(20).fill(100)), config);
        expect(result.score).toBe(50);
        expect(result.indicators.movingAverages.trend).toBe('mixed');
        expect(result.indicators.rsi?.value).toBe(50);
        expect(result.indicators.macd).toBeNull();
        expect(result.indicators.volume).toBeNull();
        expect(result.signals).toEqual({ trend: 0, rsi: 0, bollinger: 0 });
    });

    it('should combine the weighted signals of a steady rise', () => {
        // trend +1, RSI overbought -0.5, MACD above signal +0.5, upper fifth -0.25, volume flat 0
        const result = computeTechnicalScore(makeBars(ramp(1, 60)), config);
        expect(result.signals).toEqual({ trend: 1, rsi: -0.5, macd: 0.5, bollinger: -0.25, volume: 0 });
        expect(result.score).toBeCloseTo(50 + 50 * 0.325, 10);
        expect(result.priceInfo.close).toBe(60);
        expect(result.priceInfo.changePct).toBeCloseTo(100 / 59, 10);
        expect(result.priceInfo.volumeRatio).toBe(1);
    });

    it('should stay within 0..100', () => {
        const crash = computeTechnicalScore(makeBars(ramp(1, 80).reverse()), config);
        expect(crash.score).toBeGreaterThanOrEqual(0);
        expect(crash.score).toBeLessThanOrEqual(100);
    });

    it('should reject a series too short to score', () => {
        expect(() => computeTechnicalScore(makeBars([100]), config)).toThrow(ScoringError);
        expect(() => computeTechnicalScore(makeBars([100, 101]), config)).toThrow(/no indicator computable/);
    });
});
