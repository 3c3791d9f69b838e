/**
 * Task Orchestrator
 *
 * One task per (client, symbol, market). Task bodies run on a bounded worker
 * pool; every step is published to the owning client through the Broadcaster.
 * A client disconnect aborts its tasks and discards them.
 */

import { randomUUID } from 'node:crypto';
import type { AnalysisReport, Market, ReportDraft, ScoreCategory } from '../src/types/scoring';
import { SCORE_CATEGORIES } from '../src/types/scoring';
import type { AnalysisTask, LogLevel, StreamEventBody, TaskState } from '../src/types/stream';
import { TASK_STATES, isTerminalState } from '../src/types/stream';
import type { AnalysisConfig } from '../config/strategyConfig';
import type { StockAnalyzer, CategoryScores } from './analyzer';
import type { NarrativeService, NarrativeResult } from './ai/narrativeService';
import type { Broadcaster } from './broadcaster';
import { WorkerPool } from './utils/workerPool';
import { AnalysisRequestError, describeError } from './utils/errors';
import { resolveSymbol, type ResolvedSymbol } from './utils/market';

export interface SubmitOptions {
  /** Relay AI tokens as they arrive. Defaults to true. */
  streaming?: boolean;
}

export interface OrchestratorStats {
  tasks: Record<TaskState, number>;
  pool: { concurrency: number; active: number; pending: number };
}

interface TaskRecord extends AnalysisTask {
  controller: AbortController;
  done: Promise<void>;
}

export interface OrchestratorDeps {
  config: AnalysisConfig;
  analyzer: StockAnalyzer;
  narrative: NarrativeService;
  broadcaster: Broadcaster;
}

const snapshot = (task: TaskRecord): AnalysisTask => ({
  id: task.id,
  symbol: task.symbol,
  market: task.market,
  clientId: task.clientId,
  state: task.state,
  streaming: task.streaming,
  error: task.error,
  report: task.report,
  createdAt: task.createdAt,
  updatedAt: task.updatedAt,
});

export class Orchestrator {
  private tasks = new Map<string, TaskRecord>();
  private active = new Map<string, string>(); // client|market:symbol -> taskId
  private pool: WorkerPool;
  private unsubscribe: () => void;

  constructor(private deps: OrchestratorDeps) {
    this.pool = new WorkerPool(deps.config.orchestrator.concurrency);
    this.unsubscribe = deps.broadcaster.onDisconnect(clientId => {
      this.cancelClient(clientId);
    });
  }

  // ============ SUBMISSION ============

  submitAnalysis(symbol: string, market: Market | undefined, clientId: string, options: SubmitOptions = {}): string {
    const resolved = resolveSymbol(symbol, market, this.deps.config.markets);
    return this.schedule(resolved, clientId, options.streaming ?? true);
  }

  /** Validates every symbol before scheduling any of them. */
  submitBatchAnalysis(symbols: readonly string[], market: Market | undefined, clientId: string, options: SubmitOptions = {}): string[] {
    const { maxBatchSize } = this.deps.config.orchestrator;
    if (symbols.length === 0) {
      throw new AnalysisRequestError('EMPTY_BATCH', 'Batch contains no symbols');
    }
    if (symbols.length > maxBatchSize) {
      throw new AnalysisRequestError('BATCH_TOO_LARGE', `Batch of ${symbols.length} exceeds the limit of ${maxBatchSize}`);
    }
    const resolved = symbols.map(s => resolveSymbol(s, market, this.deps.config.markets));
    console.log(`[Orchestrator] Batch of ${resolved.length} for client ${clientId}`);
    return resolved.map(r => this.schedule(r, clientId, options.streaming ?? true));
  }

  private schedule({ symbol, market }: ResolvedSymbol, clientId: string, streaming: boolean): string {
    const key = `${clientId}|${market}:${symbol}`;
    const existing = this.active.get(key);
    if (existing) {
      console.log(`[Orchestrator] ${market}:${symbol} already active for ${clientId} as ${existing}`);
      return existing;
    }

    const now = new Date().toISOString();
    const task: TaskRecord = {
      id: randomUUID(),
      symbol,
      market,
      clientId,
      state: 'Queued',
      streaming,
      createdAt: now,
      updatedAt: now,
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    this.tasks.set(task.id, task);
    this.active.set(key, task.id);
    this.emit(task, { type: 'progress', taskId: task.id, symbol, market, state: 'Queued' });

    task.done = this.pool
      .run(() => this.execute(task))
      .catch(error => {
        console.error(`[Orchestrator] Task ${task.id} crashed:`, error);
      })
      .finally(() => {
        if (this.active.get(key) === task.id) this.active.delete(key);
      });
    return task.id;
  }

  // ============ EXECUTION ============

  private async execute(task: TaskRecord): Promise<void> {
    const { analyzer } = this.deps;
    const { signal } = task.controller;
    if (signal.aborted) return;

    try {
      this.transition(task, 'Fetching');
      const inputs = await analyzer.fetchInputs(task.symbol, task.market, signal);
      signal.throwIfAborted();
      for (const failure of inputs.failures) {
        this.log(task, 'warn', failure.message);
      }

      this.transition(task, 'Scoring');
      const categories = analyzer.scoreCategories(inputs);
      this.publishScores(task, categories);
      const draft = analyzer.buildDraft(task.symbol, task.market, categories);
      this.emit(task, {
        type: 'score_update',
        taskId: task.id,
        symbol: task.symbol,
        category: 'composite',
        score: draft.scores.composite,
        recommendation: draft.recommendation,
      });

      this.transition(task, 'Narrating');
      const narrative = task.streaming
        ? await this.streamNarrative(task, draft)
        : await this.deps.narrative.generate(draft, signal);
      signal.throwIfAborted();

      const report: AnalysisReport = { ...draft, narrative: narrative.text, narrativeSource: narrative.provider };
      task.report = report;
      this.transition(task, 'Done');
      this.emit(task, { type: 'final_result', taskId: task.id, report });
    } catch (error) {
      if (signal.aborted) {
        console.log(`[Orchestrator] Task ${task.id} (${task.market}:${task.symbol}) cancelled`);
        return;
      }
      const classified = describeError(error);
      console.error(`[Orchestrator] Task ${task.id} failed: [${classified.kind}] ${classified.message}`);
      task.error = classified;
      this.transition(task, 'Failed');
      this.emit(task, { type: 'error', taskId: task.id, ...classified });
    }
  }

  private publishScores(task: TaskRecord, categories: CategoryScores): void {
    const scoreOf = (category: ScoreCategory): number | null => {
      const result = categories[category];
      return result ? result.score : null;
    };
    for (const category of SCORE_CATEGORIES) {
      this.emit(task, { type: 'score_update', taskId: task.id, symbol: task.symbol, category, score: scoreOf(category) });
    }
  }

  private async streamNarrative(task: TaskRecord, draft: ReportDraft): Promise<NarrativeResult> {
    for await (const chunk of this.deps.narrative.stream(draft, task.controller.signal)) {
      switch (chunk.type) {
        case 'token':
          this.emit(task, { type: 'ai_token', taskId: task.id, provider: chunk.provider, token: chunk.text, reset: false });
          break;
        case 'restart':
          this.log(task, 'warn', `AI provider ${chunk.provider} failed (${chunk.reason}), switching provider`);
          this.emit(task, { type: 'ai_token', taskId: task.id, provider: chunk.provider, token: '', reset: true });
          break;
        case 'done':
          return { provider: chunk.provider, text: chunk.text, attempts: chunk.attempts };
      }
    }
    throw new Error('Narrative stream ended without a result');
  }

  // ============ STATE ============

  /** Forward-only; a backwards move is ignored. */
  private transition(task: TaskRecord, state: TaskState): void {
    if (isTerminalState(task.state) || TASK_STATES.indexOf(state) <= TASK_STATES.indexOf(task.state)) return;
    task.state = state;
    task.updatedAt = new Date().toISOString();
    console.log(`[Orchestrator] ${task.market}:${task.symbol} (${task.id}) -> ${state}`);
    this.emit(task, { type: 'progress', taskId: task.id, symbol: task.symbol, market: task.market, state });
  }

  private log(task: TaskRecord, level: LogLevel, message: string): void {
    this.emit(task, { type: 'log', taskId: task.id, level, message: `${task.market}:${task.symbol} ${message}` });
  }

  /** Drops events for tasks that were discarded, so a gone client's queue is not recreated. */
  private emit(task: TaskRecord, body: StreamEventBody): void {
    if (this.tasks.get(task.id) !== task) return;
    this.deps.broadcaster.publish(task.clientId, body);
  }

  // ============ QUERIES & LIFECYCLE ============

  getTaskStatus(taskId: string): AnalysisTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? snapshot(task) : undefined;
  }

  /** Resolves once the task settles. Undefined for unknown ids. */
  async waitForTask(taskId: string): Promise<AnalysisTask | undefined> {
    const task = this.tasks.get(taskId);
    if (!task) return undefined;
    await task.done;
    return snapshot(task);
  }

  /**
   * Discards a settled task. Returns false for unknown or still running tasks.
   * The client's last task takes its unread event queue with it unless a
   * stream is attached.
   */
  acknowledge(taskId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task || !isTerminalState(task.state)) return false;
    this.tasks.delete(taskId);
    const clientHasTasks = [...this.tasks.values()].some(t => t.clientId === task.clientId);
    if (!clientHasTasks) this.deps.broadcaster.release(task.clientId);
    return true;
  }

  /** Aborts and discards every task of the client. Shared cache loads keep running. */
  cancelClient(clientId: string): number {
    let cancelled = 0;
    for (const task of [...this.tasks.values()]) {
      if (task.clientId !== clientId) continue;
      if (!isTerminalState(task.state)) {
        task.controller.abort(new Error(`Client ${clientId} disconnected`));
        cancelled++;
      }
      this.tasks.delete(task.id);
      const key = `${clientId}|${task.market}:${task.symbol}`;
      if (this.active.get(key) === task.id) this.active.delete(key);
    }
    if (cancelled > 0) console.log(`[Orchestrator] Cancelled ${cancelled} task(s) for ${clientId}`);
    return cancelled;
  }

  stats(): OrchestratorStats {
    const tasks: Record<TaskState, number> = { Queued: 0, Fetching: 0, Scoring: 0, Narrating: 0, Done: 0, Failed: 0 };
    for (const task of this.tasks.values()) tasks[task.state]++;
    return {
      tasks,
      pool: { concurrency: this.deps.config.orchestrator.concurrency, active: this.pool.active, pending: this.pool.pending },
    };
  }

  /** Aborts everything and detaches from the broadcaster. */
  shutdown(): void {
    for (const task of this.tasks.values()) {
      if (!isTerminalState(task.state)) task.controller.abort(new Error('Orchestrator shutting down'));
    }
    this.tasks.clear();
    this.active.clear();
    this.unsubscribe();
  }
}
