import axios from 'axios';
import { AIProviderError, type AIFailureKind } from '../utils/errors';
import { isAbortError } from '../utils/retry';

export interface NarrativePrompt {
    system: string;
    user: string;
}

/** One backend able to turn a prompt into narrative text. */
export interface NarrativeProvider {
    readonly name: string;
    generate(prompt: NarrativePrompt, signal?: AbortSignal): Promise<string>;
    generateStream(prompt: NarrativePrompt, signal?: AbortSignal): AsyncIterable<string>;
}

export interface GenerationOptions {
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

export const classifyStatus = (status: number | undefined): AIFailureKind => {
    if (status === undefined) return 'network';
    if (status === 401 || status === 403) return 'auth';
    if (status === 402 || status === 429) return 'quota';
    if (status >= 500) return 'network';
    return 'malformed';
};

/**
 * Maps anything a transport threw to AIProviderError. Aborts are rethrown
 * untouched so callers can tell cancellation from failure.
 */
export const toProviderError = (provider: string, error: unknown): AIProviderError | Error => {
    if (error instanceof AIProviderError) return error;
    if (isAbortError(error) || axios.isCancel(error)) {
        return error instanceof Error ? error : new Error('aborted');
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const kind = classifyStatus(status);
        return new AIProviderError(provider, kind, status ? `HTTP ${status}` : error.message);
    }
    if (error instanceof SyntaxError) {
        return new AIProviderError(provider, 'malformed', `unparseable response: ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AIProviderError(provider, 'network', message);
};

/** Drains a token stream; used by providers whose `generate` reuses streaming. */
export const collectStream = async (tokens: AsyncIterable<string>): Promise<string> => {
    let text = '';
    for await (const token of tokens) text += token;
    return text;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Signal that fires on the caller's abort or after `ms`, whichever comes first. */
export interface LinkedTimeout {
    signal: AbortSignal;
    abort: (reason: unknown) => void;
    dispose: () => void;
}

export const linkedTimeout = (signal: AbortSignal | undefined, ms: number): LinkedTimeout => {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    else signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new Error(`timed out after ${ms}ms`)), ms);
    return {
        signal: controller.signal,
        abort: reason => controller.abort(reason),
        dispose: () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        },
    };
};
