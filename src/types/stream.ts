import type { AnalysisReport, Market, Recommendation, ScoreCategory } from './scoring';

export type TaskState = 'Queued' | 'Fetching' | 'Scoring' | 'Narrating' | 'Done' | 'Failed';

export const TASK_STATES: readonly TaskState[] = ['Queued', 'Fetching', 'Scoring', 'Narrating', 'Done', 'Failed'];

export const isTerminalState = (state: TaskState): boolean => state === 'Done' || state === 'Failed';

export interface ClassifiedError {
    kind: string;
    message: string;
}

/** Public view of a task. */
export interface AnalysisTask {
    id: string;
    symbol: string;
    market: Market;
    clientId: string;
    state: TaskState;
    streaming: boolean;
    error?: ClassifiedError;
    report?: AnalysisReport;
    createdAt: string;
    updatedAt: string;
}

export type LogLevel = 'info' | 'warn' | 'error';

export type StreamEventBody =
    | { type: 'connected'; clientId: string }
    | { type: 'log'; taskId?: string; level: LogLevel; message: string }
    | { type: 'progress'; taskId: string; symbol: string; market: Market; state: TaskState }
    | {
          type: 'score_update';
          taskId: string;
          symbol: string;
          category: ScoreCategory | 'composite';
          score: number | null;
          recommendation?: Recommendation;
      }
    /** `reset` tells the client to discard the narrative text received so far. */
    | { type: 'ai_token'; taskId: string; provider: string; token: string; reset: boolean }
    | { type: 'final_result'; taskId: string; report: AnalysisReport }
    | { type: 'error'; taskId?: string; kind: string; message: string };

export type StreamEventType = StreamEventBody['type'];

export type StreamEvent = StreamEventBody & {
    seq: number;
    timestamp: string;
};
