import type { ReportDraft } from '../../src/types/scoring';
import { isProviderConfigured, type AIConfig } from '../../config/strategyConfig';
import { AIProviderError, type AIAttempt, type AIFailureKind } from '../utils/errors';
import { AnthropicProvider } from './anthropic';
import { GeminiProvider } from './gemini';
import { OllamaProvider } from './ollama';
import { OpenAICompatibleProvider } from './openai';
import { buildNarrativePrompt } from './prompts';
import { toProviderError, type GenerationOptions, type NarrativeProvider } from './provider';
import { buildRuleBasedNarrative } from './ruleBasedNarrative';

export const RULE_BASED_SOURCE = 'rule-based';

export type NarrativeChunk =
    | { type: 'token'; provider: string; text: string }
    /** The named provider failed mid-stream; discard text received so far. */
    | { type: 'restart'; provider: string; reason: AIFailureKind }
    | { type: 'done'; provider: string; text: string; attempts: AIAttempt[] };

export interface NarrativeResult {
    provider: string;
    text: string;
    attempts: AIAttempt[];
}

const toAttempt = (provider: string, error: unknown): AIAttempt => {
    const classified = toProviderError(provider, error);
    if (classified instanceof AIProviderError) {
        return { provider, kind: classified.kind, message: classified.message };
    }
    // An abort that did not come from our caller, e.g. a transport timeout.
    return { provider, kind: 'network', message: classified.message };
};

const splitParagraphs = (text: string): string[] => {
    const paragraphs = text.split('\n\n');
    return paragraphs.map((p, i) => (i < paragraphs.length - 1 ? `${p}\n\n` : p));
};

/**
 * Tries providers in preference order and degrades to the rule-based
 * narrative when none is configured or all of them fail. Never throws
 * except on cancellation through `signal`.
 */
export class NarrativeService {
    constructor(private providers: readonly NarrativeProvider[]) {}

    get providerNames(): string[] {
        return this.providers.map(p => p.name);
    }

    private logExhausted(attempts: AIAttempt[]): void {
        if (this.providers.length === 0) {
            console.log('[AI] No provider configured, using rule-based narrative');
            return;
        }
        console.warn(`[AI] ${AIProviderError.aggregate(attempts).message}; using rule-based narrative`);
    }

    async *stream(draft: ReportDraft, signal?: AbortSignal): AsyncGenerator<NarrativeChunk> {
        const prompt = buildNarrativePrompt(draft);
        const attempts: AIAttempt[] = [];

        for (const provider of this.providers) {
            signal?.throwIfAborted();
            let text = '';
            try {
                for await (const token of provider.generateStream(prompt, signal)) {
                    signal?.throwIfAborted();
                    text += token;
                    yield { type: 'token', provider: provider.name, text: token };
                }
                signal?.throwIfAborted();
                if (!text.trim()) throw new AIProviderError(provider.name, 'malformed', 'empty narrative');
                yield { type: 'done', provider: provider.name, text, attempts };
                return;
            } catch (error) {
                if (signal?.aborted) throw error;
                const attempt = toAttempt(provider.name, error);
                attempts.push(attempt);
                console.warn(`[AI:${provider.name}] ${attempt.kind} failure (${attempt.message}), trying next provider`);
                if (text) yield { type: 'restart', provider: provider.name, reason: attempt.kind };
            }
        }

        this.logExhausted(attempts);
        const narrative = buildRuleBasedNarrative(draft);
        for (const paragraph of splitParagraphs(narrative)) {
            signal?.throwIfAborted();
            yield { type: 'token', provider: RULE_BASED_SOURCE, text: paragraph };
        }
        yield { type: 'done', provider: RULE_BASED_SOURCE, text: narrative, attempts };
    }

    /** Non-streaming variant, same fallback order. */
    async generate(draft: ReportDraft, signal?: AbortSignal): Promise<NarrativeResult> {
        const prompt = buildNarrativePrompt(draft);
        const attempts: AIAttempt[] = [];

        for (const provider of this.providers) {
            signal?.throwIfAborted();
            try {
                const text = await provider.generate(prompt, signal);
                if (!text.trim()) throw new AIProviderError(provider.name, 'malformed', 'empty narrative');
                return { provider: provider.name, text, attempts };
            } catch (error) {
                if (signal?.aborted) throw error;
                const attempt = toAttempt(provider.name, error);
                attempts.push(attempt);
                console.warn(`[AI:${provider.name}] ${attempt.kind} failure (${attempt.message}), trying next provider`);
            }
        }

        this.logExhausted(attempts);
        return { provider: RULE_BASED_SOURCE, text: buildRuleBasedNarrative(draft), attempts };
    }
}

/** Instantiates the configured providers in preference order. */
export const createProviders = (ai: AIConfig): NarrativeProvider[] => {
    const options: GenerationOptions = {
        temperature: ai.temperature,
        maxTokens: ai.maxTokens,
        timeoutMs: ai.requestTimeoutMs,
    };
    return ai.order
        .filter(name => isProviderConfigured(ai, name))
        .map((name): NarrativeProvider => {
            const settings = ai.providers[name];
            switch (name) {
                case 'openai':
                case 'zhipu':
                    return new OpenAICompatibleProvider(name, settings, options);
                case 'anthropic':
                    return new AnthropicProvider(settings, options);
                case 'gemini':
                    return new GeminiProvider(settings, options);
                case 'ollama':
                    return new OllamaProvider(settings, options);
            }
        });
};
