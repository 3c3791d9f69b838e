import type { AnalysisConfig } from '../config/strategyConfig';
import { loadConfig } from '../config/loadConfig';
import { DataCache } from './utils/cache';
import { FmpDataSource } from './api/fmp';
import { CachedMarketData, type MarketDataSource } from './api/marketData';
import { loadLexicon, type SentimentLexicon } from './scoring/sentimentScore';
import { NarrativeService, createProviders } from './ai/narrativeService';
import type { NarrativeProvider } from './ai/provider';
import { StockAnalyzer } from './analyzer';
import { Broadcaster, type BroadcasterStats } from './broadcaster';
import { Orchestrator, type OrchestratorStats } from './orchestrator';

export interface EngineOptions {
  config?: AnalysisConfig;
  /** Defaults to the FMP client. */
  source?: MarketDataSource;
  /** Defaults to the configured providers. */
  providers?: NarrativeProvider[];
  lexicon?: SentimentLexicon;
  now?: () => number;
}

export interface EngineStatus {
  dataSource: string;
  aiProviders: string[];
  markets: string[];
  cache: ReturnType<DataCache['stats']>;
  stream: BroadcasterStats;
  orchestrator: OrchestratorStats;
}

export interface Engine {
  config: AnalysisConfig;
  cache: DataCache;
  data: CachedMarketData;
  narrative: NarrativeService;
  broadcaster: Broadcaster;
  orchestrator: Orchestrator;
  status(): EngineStatus;
  shutdown(): void;
}

/** Wires every component from one frozen configuration. */
export const createEngine = (options: EngineOptions = {}): Engine => {
  const config = options.config ?? loadConfig();
  const now = options.now ?? Date.now;

  const cache = new DataCache(config.cache.ttls, now);
  const source = options.source ?? new FmpDataSource(config.dataSource, { now });
  const data = new CachedMarketData(source, cache, { fetchTimeoutMs: config.orchestrator.fetchTimeoutMs });
  const narrative = new NarrativeService(options.providers ?? createProviders(config.ai));
  const analyzer = new StockAnalyzer({
    config,
    data,
    lexicon: options.lexicon ?? loadLexicon(),
    now: () => new Date(now()),
  });
  const broadcaster = new Broadcaster(config.stream.queueBound);
  const orchestrator = new Orchestrator({ config, analyzer, narrative, broadcaster });

  console.log(`[Engine] Ready: data=${source.name}, ai=[${narrative.providerNames.join(', ') || 'rule-based'}], concurrency=${config.orchestrator.concurrency}`);

  return {
    config,
    cache,
    data,
    narrative,
    broadcaster,
    orchestrator,
    status: () => ({
      dataSource: data.sourceName,
      aiProviders: narrative.providerNames,
      markets: Object.entries(config.markets).filter(([, m]) => m.enabled).map(([code]) => code),
      cache: cache.stats(),
      stream: broadcaster.stats(),
      orchestrator: orchestrator.stats(),
    }),
    shutdown: () => {
      orchestrator.shutdown();
      cache.purgeExpired();
    },
  };
};
