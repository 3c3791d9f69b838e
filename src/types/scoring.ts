export type Market = 'CN' | 'HK' | 'US';

export interface MarketInfo {
    market: Market;
    name: string;
    currency: string;
    timezone: string;
    tradingHours: string;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface PriceBar {
    timestamp: number; // epoch ms, start of the trading day
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/** Ascending by timestamp, no duplicate timestamps. */
export type PriceSeries = PriceBar[];

export type FundamentalCategory = 'profitability' | 'solvency' | 'efficiency' | 'growth' | 'valuation';

export const INDICATORS_BY_CATEGORY = {
    profitability: ['netProfitMargin', 'returnOnEquity', 'returnOnAssets', 'grossMargin', 'operatingMargin'],
    solvency: ['currentRatio', 'quickRatio', 'debtRatio', 'debtToEquity', 'interestCoverage'],
    efficiency: ['assetTurnover', 'inventoryTurnover', 'receivablesTurnover', 'currentAssetTurnover', 'fixedAssetTurnover'],
    growth: ['revenueGrowth', 'netProfitGrowth', 'totalAssetGrowth', 'equityGrowth', 'operatingCashFlowGrowth'],
    valuation: ['priceToEarnings', 'priceToBook', 'priceToSales', 'priceEarningsToGrowth', 'dividendYield'],
} as const;

export type IndicatorName = (typeof INDICATORS_BY_CATEGORY)[FundamentalCategory][number];

export const FUNDAMENTAL_CATEGORIES: readonly FundamentalCategory[] = [
    'profitability', 'solvency', 'efficiency', 'growth', 'valuation',
];

export const INDICATOR_NAMES: readonly IndicatorName[] = FUNDAMENTAL_CATEGORIES.flatMap(
    (category): readonly IndicatorName[] => INDICATORS_BY_CATEGORY[category]
);

/** Every name present; null marks a missing value. */
export type FinancialIndicatorSet = Record<IndicatorName, number | null>;

export type NewsCategory = 'company_news' | 'announcement' | 'research_report' | 'industry_news';

export interface NewsItem {
    id: string;
    timestamp: number;
    source: string;
    title: string;
    body: string;
    category: NewsCategory;
}

// ---------------------------------------------------------------------------
// Technical
// ---------------------------------------------------------------------------

export type TrendDirection = 'bullish' | 'bearish' | 'mixed';

export interface MovingAverages {
    values: Record<number, number | null>; // window -> MA
    trend: TrendDirection | null;
}

export interface RsiReading {
    value: number;
    overbought: boolean;
    oversold: boolean;
}

export interface MacdReading {
    macd: number;
    signal: number;
    histogram: number;
    bullishCross: boolean;
    bearishCross: boolean;
}

export interface BollingerReading {
    upper: number;
    middle: number;
    lower: number;
    position: number; // 0..1
    aboveUpper: boolean;
    belowLower: boolean;
}

export interface VolumeReading {
    ratio: number;
    priceDirection: -1 | 0 | 1;
    recentTrend: -1 | 0 | 1;
    confirming: boolean;
    divergence: boolean;
}

export interface TechnicalIndicators {
    movingAverages: MovingAverages;
    rsi: RsiReading | null;
    macd: MacdReading | null;
    bollinger: BollingerReading | null;
    volume: VolumeReading | null;
}

export type TechnicalSignalName = 'trend' | 'rsi' | 'macd' | 'bollinger' | 'volume';

export interface PriceInfo {
    close: number;
    changePct: number;
    volumeRatio: number | null;
    volatilityPct: number | null; // annualised
}

export interface TechnicalScore {
    score: number; // 0-100
    indicators: TechnicalIndicators;
    signals: Partial<Record<TechnicalSignalName, number>>;
    priceInfo: PriceInfo;
    details: string[];
}

// ---------------------------------------------------------------------------
// Fundamental
// ---------------------------------------------------------------------------

export interface FundamentalScore {
    score: number; // 0-100
    indicatorsUsed: number;
    indicatorsTotal: number;
    indicatorScores: Partial<Record<IndicatorName, number>>;
    categoryScores: Record<FundamentalCategory, number | null>;
    details: string[];
}

// ---------------------------------------------------------------------------
// Sentiment
// ---------------------------------------------------------------------------

export type SentimentLabel = 'very_positive' | 'positive' | 'neutral' | 'negative' | 'very_negative';
export type SentimentTrend = 'improving' | 'deteriorating' | 'stable';

export interface CategorySentiment {
    count: number;
    meanScore: number;
}

export interface SentimentScore {
    score: number; // 0-100
    overall: number; // -1..1
    label: SentimentLabel;
    trend: SentimentTrend;
    confidence: number;
    newsAnalyzed: number;
    positiveRatio: number;
    negativeRatio: number;
    byCategory: Partial<Record<NewsCategory, CategorySentiment>>;
    noNews: boolean;
}

// ---------------------------------------------------------------------------
// Composite
// ---------------------------------------------------------------------------

export type ScoreCategory = 'technical' | 'fundamental' | 'sentiment';

export const SCORE_CATEGORIES: readonly ScoreCategory[] = ['technical', 'fundamental', 'sentiment'];

export type Recommendation = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';

export type ScoreWeights = Record<ScoreCategory, number>;

export interface RecommendationThreshold {
    min: number;
    label: Recommendation;
}

export interface ScoreResult {
    technical: number | null;
    fundamental: number | null;
    sentiment: number | null;
    composite: number;
    recommendation: Recommendation;
}

export interface CompositeScore extends ScoreResult {
    effectiveWeights: Partial<ScoreWeights>;
    missing: ScoreCategory[];
    partial: boolean;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface CategoryFailure {
    category: ScoreCategory;
    kind: string;
    message: string;
}

export interface AnalysisReport {
    symbol: string;
    market: Market;
    marketInfo: MarketInfo;
    analysisDate: string;
    priceInfo: PriceInfo | null;
    technical: TechnicalScore | null;
    fundamental: FundamentalScore | null;
    sentiment: SentimentScore | null;
    scores: ScoreResult;
    effectiveWeights: Partial<ScoreWeights>;
    recommendation: Recommendation;
    narrative: string;
    narrativeSource: string;
    partial: boolean;
    missing: ScoreCategory[];
    failures: CategoryFailure[];
    dataQuality: {
        indicatorsUsed: number;
        indicatorsTotal: number;
        newsAnalyzed: number;
        completeness: 'complete' | 'partial';
    };
}

/** Everything in the report except the narrative, which is built from it. */
export type ReportDraft = Omit<AnalysisReport, 'narrative' | 'narrativeSource'>;
