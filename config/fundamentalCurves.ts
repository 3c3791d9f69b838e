import type { IndicatorName } from '../src/types/scoring';

/** [indicator value, score 0-100]; x strictly ascending. Ends are clamped. */
export type CurvePoint = [number, number];

export type FundamentalCurves = Record<IndicatorName, CurvePoint[]>;

const MARGIN: CurvePoint[] = [[-10, 0], [0, 30], [10, 60], [20, 85], [30, 100]];
const EARNINGS_GROWTH: CurvePoint[] = [[-30, 0], [0, 40], [15, 65], [30, 85], [50, 100]];
const BALANCE_GROWTH: CurvePoint[] = [[-10, 20], [0, 45], [10, 70], [20, 90], [30, 100]];

export const DEFAULT_FUNDAMENTAL_CURVES: FundamentalCurves = {
    // Profitability (%)
    netProfitMargin: MARGIN,
    returnOnEquity: MARGIN,
    returnOnAssets: [[-5, 0], [0, 30], [5, 60], [10, 85], [15, 100]],
    grossMargin: [[0, 0], [20, 40], [40, 70], [60, 90], [80, 100]],
    operatingMargin: MARGIN,

    // Solvency
    currentRatio: [[0.5, 0], [1, 40], [1.5, 70], [2, 90], [3, 100]],
    quickRatio: [[0.3, 0], [0.7, 40], [1, 70], [1.5, 90], [2, 100]],
    debtRatio: [[20, 100], [40, 80], [60, 50], [80, 20], [100, 0]], // %
    debtToEquity: [[0, 100], [0.5, 85], [1, 65], [2, 35], [4, 0]],
    interestCoverage: [[0, 0], [1.5, 30], [3, 60], [6, 85], [10, 100]],

    // Efficiency
    assetTurnover: [[0.1, 10], [0.5, 45], [1, 75], [2, 100]],
    inventoryTurnover: [[1, 10], [4, 50], [8, 80], [12, 100]],
    receivablesTurnover: [[2, 10], [6, 50], [10, 80], [15, 100]],
    currentAssetTurnover: [[0.5, 10], [1, 40], [2, 75], [3, 100]],
    fixedAssetTurnover: [[0.5, 10], [2, 50], [5, 80], [10, 100]],

    // Growth (%)
    revenueGrowth: [[-20, 0], [0, 40], [10, 65], [20, 85], [40, 100]],
    netProfitGrowth: EARNINGS_GROWTH,
    totalAssetGrowth: BALANCE_GROWTH,
    equityGrowth: BALANCE_GROWTH,
    operatingCashFlowGrowth: EARNINGS_GROWTH,

    // Valuation
    priceToEarnings: [[-1, 0], [5, 80], [10, 100], [15, 90], [25, 65], [40, 35], [80, 0]],
    priceToBook: [[-1, 0], [0.5, 90], [1, 100], [3, 70], [6, 30], [10, 0]],
    priceToSales: [[0.5, 100], [2, 80], [5, 50], [10, 20], [20, 0]],
    priceEarningsToGrowth: [[-1, 0], [0, 20], [0.5, 100], [1, 85], [2, 50], [3, 20], [5, 0]],
    dividendYield: [[0, 40], [1, 55], [2, 70], [4, 90], [6, 100]], // %
};
