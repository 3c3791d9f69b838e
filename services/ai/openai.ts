import axios, { type AxiosInstance } from 'axios';
import type { Readable } from 'node:stream';
import type { ProviderSettings } from '../../config/strategyConfig';
import { AIProviderError } from '../utils/errors';
import {
    isRecord,
    toProviderError,
    type GenerationOptions,
    type NarrativePrompt,
    type NarrativeProvider,
} from './provider';
import { parseSSE } from './sse';

/**
 * OpenAI-compatible chat completions client (OpenAI itself, Zhipu GLM, relays).
 * Streams `data: {choices:[{delta:{content}}]}` events until `data: [DONE]`.
 */

const deltaContent = (payload: unknown): string | null => {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) return null;
    const [choice] = payload.choices;
    if (!isRecord(choice)) return null;
    const delta = choice.delta;
    if (isRecord(delta) && typeof delta.content === 'string') return delta.content;
    const message = choice.message;
    if (isRecord(message) && typeof message.content === 'string') return message.content;
    return '';
};

export class OpenAICompatibleProvider implements NarrativeProvider {
    private http: AxiosInstance;

    constructor(
        readonly name: string,
        private settings: ProviderSettings,
        private options: GenerationOptions,
        http?: AxiosInstance
    ) {
        this.http = http ?? axios.create({ timeout: options.timeoutMs });
    }

    private body(prompt: NarrativePrompt, stream: boolean) {
        return {
            model: this.settings.model,
            messages: [
                { role: 'system', content: prompt.system },
                { role: 'user', content: prompt.user },
            ],
            temperature: this.options.temperature,
            max_tokens: this.options.maxTokens,
            stream,
        };
    }

    private get headers() {
        return {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.settings.apiKey}`,
        };
    }

    private get url() {
        return `${this.settings.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    }

    async generate(prompt: NarrativePrompt, signal?: AbortSignal): Promise<string> {
        try {
            const res = await this.http.post<unknown>(this.url, this.body(prompt, false), { headers: this.headers, signal });
            const content = deltaContent(res.data);
            if (!content) throw new AIProviderError(this.name, 'malformed', 'response has no message content');
            return content;
        } catch (error) {
            throw toProviderError(this.name, error);
        }
    }

    async *generateStream(prompt: NarrativePrompt, signal?: AbortSignal): AsyncGenerator<string> {
        console.log(`[AI:${this.name}] Streaming with model ${this.settings.model}...`);
        try {
            const res = await this.http.post<Readable>(this.url, this.body(prompt, true), {
                headers: this.headers,
                responseType: 'stream',
                signal,
            });

            for await (const message of parseSSE(res.data)) {
                if (message.data === '[DONE]') return;
                const payload: unknown = JSON.parse(message.data);
                if (isRecord(payload) && isRecord(payload.error)) {
                    throw new AIProviderError(this.name, 'network', String(payload.error.message ?? 'stream error'));
                }
                const token = deltaContent(payload);
                if (token === null) throw new AIProviderError(this.name, 'malformed', 'unexpected stream event');
                if (token) yield token;
            }
        } catch (error) {
            throw toProviderError(this.name, error);
        }
    }
}
