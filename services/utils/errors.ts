import type { ScoreCategory } from '../../src/types/scoring';
import { ApiError } from './retry';

export type FetchErrorCode =
    | 'NETWORK'
    | 'RATE_LIMIT'
    | 'NOT_FOUND'
    | 'MISSING_KEY'
    | 'TIMEOUT'
    | 'UNSUPPORTED_MARKET'
    | 'UNKNOWN';

/** Raised by the data layer. The engine never retries it. */
export class FetchError extends Error {
    constructor(
        public category: ScoreCategory,
        public code: FetchErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'FetchError';
    }

    /** Wraps whatever a collaborator threw, keeping ApiError codes. */
    static from(category: ScoreCategory, error: unknown): FetchError {
        if (error instanceof FetchError) return error;
        if (error instanceof ApiError) return new FetchError(category, error.code, error.message);
        const message = error instanceof Error ? error.message : String(error);
        return new FetchError(category, 'UNKNOWN', message);
    }
}

/** Insufficient or malformed input for one category. */
export class ScoringError extends Error {
    constructor(
        public category: ScoreCategory | 'composite',
        message: string
    ) {
        super(message);
        this.name = 'ScoringError';
    }
}

export type AIFailureKind = 'auth' | 'quota' | 'network' | 'malformed';

export interface AIAttempt {
    provider: string;
    kind: AIFailureKind;
    message: string;
}

export class AIProviderError extends Error {
    /** Populated on the aggregated error thrown once every provider failed. */
    public attempts: AIAttempt[];

    constructor(
        public provider: string,
        public kind: AIFailureKind,
        message: string,
        attempts: AIAttempt[] = []
    ) {
        super(message);
        this.name = 'AIProviderError';
        this.attempts = attempts;
    }

    static aggregate(attempts: AIAttempt[]): AIProviderError {
        const summary = attempts.map(a => `${a.provider}: ${a.kind} (${a.message})`).join('; ');
        const last = attempts[attempts.length - 1];
        return new AIProviderError(
            'all',
            last ? last.kind : 'network',
            attempts.length > 0 ? `All AI providers failed: ${summary}` : 'No AI provider configured',
            attempts
        );
    }
}

export class ConfigurationError extends Error {
    constructor(
        public path: string,
        message: string
    ) {
        super(`${path}: ${message}`);
        this.name = 'ConfigurationError';
    }
}

export type AnalysisRequestCode = 'INVALID_SYMBOL' | 'MARKET_DISABLED' | 'BATCH_TOO_LARGE' | 'EMPTY_BATCH';

/** Raised synchronously by submit operations. */
export class AnalysisRequestError extends Error {
    constructor(
        public code: AnalysisRequestCode,
        message: string
    ) {
        super(message);
        this.name = 'AnalysisRequestError';
    }
}

const FETCH_DESCRIPTIONS: Record<FetchErrorCode, string> = {
    NETWORK: 'the data provider could not be reached',
    RATE_LIMIT: 'the data provider rate limit was hit',
    NOT_FOUND: 'no data exists for this symbol',
    MISSING_KEY: 'the data provider key is not configured',
    TIMEOUT: 'the data provider did not answer in time',
    UNSUPPORTED_MARKET: 'this market is not covered by the data provider',
    UNKNOWN: 'the data provider returned an unexpected error',
};

/** One-line, client-safe classification. Never includes a stack trace. */
export const describeError = (error: unknown): { kind: string; message: string } => {
    if (error instanceof FetchError) {
        return { kind: `fetch.${error.code}`, message: `${error.category} data unavailable: ${FETCH_DESCRIPTIONS[error.code]}` };
    }
    if (error instanceof ScoringError) {
        return { kind: 'scoring', message: `${error.category} score unavailable: ${error.message}` };
    }
    if (error instanceof AIProviderError) {
        return { kind: `ai.${error.kind}`, message: error.message };
    }
    if (error instanceof ConfigurationError) {
        return { kind: 'configuration', message: error.message };
    }
    if (error instanceof AnalysisRequestError) {
        return { kind: `request.${error.code}`, message: error.message };
    }
    if (error instanceof ApiError) {
        return { kind: `api.${error.code}`, message: error.message };
    }
    if (error instanceof Error) {
        return { kind: 'internal', message: error.message };
    }
    return { kind: 'internal', message: String(error) };
};
