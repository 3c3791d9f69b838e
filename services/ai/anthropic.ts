import axios, { type AxiosInstance } from 'axios';
import type { Readable } from 'node:stream';
import type { ProviderSettings } from '../../config/strategyConfig';
import { AIProviderError, type AIFailureKind } from '../utils/errors';
import {
    isRecord,
    toProviderError,
    type GenerationOptions,
    type NarrativePrompt,
    type NarrativeProvider,
} from './provider';
import { parseSSE } from './sse';

const API_VERSION = '2023-06-01';

// Anthropic error event types -> fallback classification
const ERROR_KINDS: Record<string, AIFailureKind> = {
    authentication_error: 'auth',
    permission_error: 'auth',
    rate_limit_error: 'quota',
    overloaded_error: 'network',
    api_error: 'network',
};

export class AnthropicProvider implements NarrativeProvider {
    readonly name = 'anthropic';
    private http: AxiosInstance;

    constructor(
        private settings: ProviderSettings,
        private options: GenerationOptions,
        http?: AxiosInstance
    ) {
        this.http = http ?? axios.create({ timeout: options.timeoutMs });
    }

    private request(prompt: NarrativePrompt, stream: boolean) {
        return {
            model: this.settings.model,
            max_tokens: this.options.maxTokens,
            temperature: Math.min(1, this.options.temperature),
            system: prompt.system,
            messages: [{ role: 'user', content: prompt.user }],
            stream,
        };
    }

    private get headers() {
        return {
            'Content-Type': 'application/json',
            'x-api-key': this.settings.apiKey,
            'anthropic-version': API_VERSION,
        };
    }

    private get url() {
        return `${this.settings.baseUrl.replace(/\/+$/, '')}/v1/messages`;
    }

    async generate(prompt: NarrativePrompt, signal?: AbortSignal): Promise<string> {
        try {
            const res = await this.http.post<unknown>(this.url, this.request(prompt, false), { headers: this.headers, signal });
            const body = res.data;
            if (!isRecord(body) || !Array.isArray(body.content)) {
                throw new AIProviderError(this.name, 'malformed', 'response has no content blocks');
            }
            return body.content
                .map(block => (isRecord(block) && typeof block.text === 'string' ? block.text : ''))
                .join('');
        } catch (error) {
            throw toProviderError(this.name, error);
        }
    }

    async *generateStream(prompt: NarrativePrompt, signal?: AbortSignal): AsyncGenerator<string> {
        console.log(`[AI:${this.name}] Streaming with model ${this.settings.model}...`);
        try {
            const res = await this.http.post<Readable>(this.url, this.request(prompt, true), {
                headers: this.headers,
                responseType: 'stream',
                signal,
            });

            for await (const message of parseSSE(res.data)) {
                const payload: unknown = JSON.parse(message.data);
                if (!isRecord(payload)) throw new AIProviderError(this.name, 'malformed', 'unexpected stream event');

                const type = message.event ?? payload.type;
                if (type === 'message_stop') return;
                if (type === 'error') {
                    const err = isRecord(payload.error) ? payload.error : {};
                    const errType = typeof err.type === 'string' ? err.type : '';
                    throw new AIProviderError(this.name, ERROR_KINDS[errType] ?? 'malformed', String(err.message ?? errType));
                }
                if (type === 'content_block_delta' && isRecord(payload.delta) && typeof payload.delta.text === 'string') {
                    if (payload.delta.text) yield payload.delta.text;
                }
            }
        } catch (error) {
            throw toProviderError(this.name, error);
        }
    }
}
