import {
    INDICATORS_BY_CATEGORY,
    INDICATOR_NAMES,
    type FinancialIndicatorSet,
    type FundamentalCategory,
    type FundamentalScore,
    type IndicatorName,
} from '../../src/types/scoring';
import type { CurvePoint, FundamentalCurves } from '../../config/fundamentalCurves';
import { ScoringError } from '../utils/errors';

/**
 * Maps a value through a piecewise-linear curve. Points are sorted by x;
 * values outside the range take the nearest end's score.
 */
export const interpolateCurve = (curve: readonly CurvePoint[], x: number): number => {
    const first = curve[0];
    const last = curve[curve.length - 1];
    if (x <= first[0]) return first[1];
    if (x >= last[0]) return last[1];

    for (let i = 1; i < curve.length; i++) {
        const [x1, y1] = curve[i];
        if (x <= x1) {
            const [x0, y0] = curve[i - 1];
            return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
        }
    }
    return last[1];
};

const average = (values: number[]): number | null =>
    values.length === 0 ? null : values.reduce((s, v) => s + v, 0) / values.length;

/** Builds a set with every indicator missing; callers fill what they have. */
export const emptyIndicatorSet = (): FinancialIndicatorSet => ({
    netProfitMargin: null, returnOnEquity: null, returnOnAssets: null, grossMargin: null, operatingMargin: null,
    currentRatio: null, quickRatio: null, debtRatio: null, debtToEquity: null, interestCoverage: null,
    assetTurnover: null, inventoryTurnover: null, receivablesTurnover: null, currentAssetTurnover: null, fixedAssetTurnover: null,
    revenueGrowth: null, netProfitGrowth: null, totalAssetGrowth: null, equityGrowth: null, operatingCashFlowGrowth: null,
    priceToEarnings: null, priceToBook: null, priceToSales: null, priceEarningsToGrowth: null, dividendYield: null,
});

export const computeFundamentalScore = (
    indicators: FinancialIndicatorSet,
    curves: FundamentalCurves
): FundamentalScore => {
    const indicatorScores: Partial<Record<IndicatorName, number>> = {};
    const details: string[] = [];
    const used: number[] = [];

    const scoreCategory = (category: FundamentalCategory): number | null => {
        const names = INDICATORS_BY_CATEGORY[category];
        const scores: number[] = [];
        for (const name of names) {
            const value = indicators[name];
            if (value === null || !Number.isFinite(value)) continue;
            const score = interpolateCurve(curves[name], value);
            indicatorScores[name] = score;
            scores.push(score);
            used.push(score);
        }
        const avg = average(scores);
        details.push(avg === null
            ? `${category}: no data`
            : `${category}: ${avg.toFixed(1)} (${scores.length}/${names.length} indicators)`);
        return avg;
    };

    const categoryScores: Record<FundamentalCategory, number | null> = {
        profitability: scoreCategory('profitability'),
        solvency: scoreCategory('solvency'),
        efficiency: scoreCategory('efficiency'),
        growth: scoreCategory('growth'),
        valuation: scoreCategory('valuation'),
    };

    const score = average(used);
    if (score === null) {
        throw new ScoringError('fundamental', 'no usable financial indicator');
    }

    return {
        score,
        indicatorsUsed: used.length,
        indicatorsTotal: INDICATOR_NAMES.length,
        indicatorScores,
        categoryScores,
        details,
    };
};
