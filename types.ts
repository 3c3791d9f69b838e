// ============ FMP (STABLE API) RESPONSE TYPES ============
// Only the fields the data source reads. Ratio fields are fractions (0.25 = 25%).

export interface HistoricalPrice {
  symbol?: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  change?: number;
  changePercent?: number;
  vwap?: number;
}

/** Older endpoint versions wrap the bars; the stable API returns a bare array. */
export interface HistoricalPriceEnvelope {
  symbol: string;
  historical: HistoricalPrice[];
}

export interface RatiosTTM {
  symbol: string;
  grossProfitMarginTTM?: number | null;
  operatingProfitMarginTTM?: number | null;
  netProfitMarginTTM?: number | null;
  currentRatioTTM?: number | null;
  quickRatioTTM?: number | null;
  debtToAssetsRatioTTM?: number | null;
  debtToEquityRatioTTM?: number | null;
  interestCoverageRatioTTM?: number | null;
  assetTurnoverTTM?: number | null;
  inventoryTurnoverTTM?: number | null;
  receivablesTurnoverTTM?: number | null;
  fixedAssetTurnoverTTM?: number | null;
  priceToEarningsRatioTTM?: number | null;
  priceToBookRatioTTM?: number | null;
  priceToSalesRatioTTM?: number | null;
  priceToEarningsGrowthRatioTTM?: number | null;
  dividendYieldTTM?: number | null;
}

export interface KeyMetricsTTM {
  symbol: string;
  returnOnEquityTTM?: number | null;
  returnOnAssetsTTM?: number | null;
  currentRatioTTM?: number | null;
}

export interface FinancialGrowth {
  symbol: string;
  date: string;
  revenueGrowth?: number | null;
  netIncomeGrowth?: number | null;
  assetGrowth?: number | null;
  bookValueperShareGrowth?: number | null;
  operatingCashFlowGrowth?: number | null;
}

export interface StockNewsArticle {
  symbol: string;
  publishedDate: string; // "2025-02-03 21:05:14"
  publisher?: string;
  site?: string;
  title: string;
  text?: string;
  url: string;
}
