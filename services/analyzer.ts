/**
 * Analyzer - runs one symbol through fetch, scoring and report assembly.
 *
 * The orchestrator calls the two stages separately so it can move the task
 * through Fetching and Scoring and publish score updates in between.
 */

import type {
  CategoryFailure,
  FinancialIndicatorSet,
  FundamentalScore,
  Market,
  NewsItem,
  PriceSeries,
  ReportDraft,
  ScoreCategory,
  SentimentScore,
  TechnicalScore,
} from '../src/types/scoring';
import { INDICATOR_NAMES } from '../src/types/scoring';
import type { AnalysisConfig } from '../config/strategyConfig';
import type { CachedMarketData } from './api/marketData';
import { computeTechnicalScore } from './scoring/technicalScore';
import { computeFundamentalScore } from './scoring/fundamentalScore';
import { computeSentimentScore, type SentimentLexicon } from './scoring/sentimentScore';
import { computeCompositeScore } from './scoring/compositeScore';
import { ScoringError, describeError } from './utils/errors';
import { getMarketInfo } from './utils/market';

export interface AnalysisInputs {
  series: PriceSeries | null;
  indicators: FinancialIndicatorSet | null;
  news: NewsItem[] | null;
  failures: CategoryFailure[];
}

export interface CategoryScores {
  technical: TechnicalScore | null;
  fundamental: FundamentalScore | null;
  sentiment: SentimentScore | null;
  failures: CategoryFailure[];
}

export interface AnalyzerDeps {
  config: AnalysisConfig;
  data: CachedMarketData;
  lexicon: SentimentLexicon;
  now?: () => Date;
}

const toFailure = (category: ScoreCategory, error: unknown): CategoryFailure => ({
  category,
  ...describeError(error),
});

const settledValue = <T>(
  category: ScoreCategory,
  result: PromiseSettledResult<T>,
  failures: CategoryFailure[]
): T | null => {
  if (result.status === 'fulfilled') return result.value;
  console.warn(`[Analyzer] ${category} data unavailable:`, result.reason instanceof Error ? result.reason.message : result.reason);
  failures.push(toFailure(category, result.reason));
  return null;
};

/** Runs a scorer; a ScoringError marks the category missing, anything else propagates. */
const scoreOrNull = <T>(category: ScoreCategory, failures: CategoryFailure[], fn: () => T): T | null => {
  try {
    return fn();
  } catch (error) {
    if (!(error instanceof ScoringError)) throw error;
    console.warn(`[Analyzer] ${category} score unavailable: ${error.message}`);
    failures.push(toFailure(category, error));
    return null;
  }
};

export class StockAnalyzer {
  private now: () => Date;

  constructor(private deps: AnalyzerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetches the three categories concurrently. A failure in one is recorded,
   * never thrown; the caller checks `signal` for cancellation afterwards.
   */
  async fetchInputs(symbol: string, market: Market, signal?: AbortSignal): Promise<AnalysisInputs> {
    const { config, data } = this.deps;
    console.log(`[Analyzer] Fetching data for ${market}:${symbol} from ${data.sourceName}`);

    // allSettled so one upstream failure does not sink the others
    const [priceRes, fundamentalRes, newsRes] = await Promise.allSettled([
      data.getPriceSeries(symbol, market, config.technical.periodDays, signal),
      data.getFinancialIndicators(symbol, market, signal),
      data.getNews(symbol, market, config.sentiment.maxNewsCount, signal),
    ]);

    const failures: CategoryFailure[] = [];
    return {
      series: settledValue('technical', priceRes, failures),
      indicators: settledValue('fundamental', fundamentalRes, failures),
      news: settledValue('sentiment', newsRes, failures),
      failures,
    };
  }

  scoreCategories(inputs: AnalysisInputs): CategoryScores {
    const { config, lexicon } = this.deps;
    const failures = [...inputs.failures];
    const { series, indicators, news } = inputs;

    return {
      technical: series && scoreOrNull('technical', failures, () => computeTechnicalScore(series, config.technical)),
      fundamental: indicators && scoreOrNull('fundamental', failures, () => computeFundamentalScore(indicators, config.fundamental.curves)),
      sentiment: news && scoreOrNull('sentiment', failures, () => computeSentimentScore(news, lexicon, config.sentiment)),
      failures,
    };
  }

  /** Combines the category scores. Throws ScoringError('composite') when none is present. */
  buildDraft(symbol: string, market: Market, categories: CategoryScores): ReportDraft {
    const { config } = this.deps;
    const { technical, fundamental, sentiment, failures } = categories;

    const composite = computeCompositeScore(
      {
        technical: technical ? technical.score : null,
        fundamental: fundamental ? fundamental.score : null,
        sentiment: sentiment ? sentiment.score : null,
      },
      config.scoring
    );

    console.log(`[Analyzer] ${market}:${symbol} composite ${composite.composite.toFixed(1)} -> ${composite.recommendation}${composite.partial ? ` (missing: ${composite.missing.join(', ')})` : ''}`);

    return {
      symbol,
      market,
      marketInfo: getMarketInfo(market, config.markets),
      analysisDate: this.now().toISOString().slice(0, 10),
      priceInfo: technical ? technical.priceInfo : null,
      technical,
      fundamental,
      sentiment,
      scores: {
        technical: composite.technical,
        fundamental: composite.fundamental,
        sentiment: composite.sentiment,
        composite: composite.composite,
        recommendation: composite.recommendation,
      },
      effectiveWeights: composite.effectiveWeights,
      recommendation: composite.recommendation,
      partial: composite.partial,
      missing: composite.missing,
      failures,
      dataQuality: {
        indicatorsUsed: fundamental ? fundamental.indicatorsUsed : 0,
        indicatorsTotal: INDICATOR_NAMES.length,
        newsAnalyzed: sentiment ? sentiment.newsAnalyzed : 0,
        completeness: composite.partial ? 'partial' : 'complete',
      },
    };
  }
}
