import type { ProviderSettings } from '../../config/strategyConfig';
import { AIProviderError } from '../utils/errors';
import { isAbortError } from '../utils/retry';
import {
    classifyStatus,
    isRecord,
    linkedTimeout,
    type GenerationOptions,
    type NarrativePrompt,
    type NarrativeProvider,
} from './provider';
import { parseNDJSON, readBody } from './sse';

/**
 * Local Ollama server. `settings.baseUrl` is the host (OLLAMA_HOST);
 * streaming replies are NDJSON lines of `{ message: { content }, done }`.
 */
export class OllamaProvider implements NarrativeProvider {
    readonly name = 'ollama';

    constructor(
        private settings: ProviderSettings,
        private options: GenerationOptions
    ) {}

    private payload(prompt: NarrativePrompt, stream: boolean) {
        return {
            model: this.settings.model,
            messages: [
                { role: 'system', content: prompt.system },
                { role: 'user', content: prompt.user },
            ],
            stream,
            options: {
                temperature: this.options.temperature,
                num_predict: this.options.maxTokens,
                num_ctx: 8192,
            },
        };
    }

    private async post(prompt: NarrativePrompt, stream: boolean, signal: AbortSignal): Promise<Response> {
        const host = this.settings.baseUrl.replace(/\/+$/, '');
        console.log(`[Ollama] Connecting to ${host} with model ${this.settings.model}...`);

        let response: Response;
        try {
            response = await fetch(`${host}/api/chat`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(this.payload(prompt, stream)),
                signal,
            });
        } catch (error) {
            if (isAbortError(error)) throw error;
            throw new AIProviderError(this.name, 'network', error instanceof Error ? error.message : String(error));
        }

        if (!response.ok) {
            throw new AIProviderError(this.name, classifyStatus(response.status), `Ollama API Error: ${response.status} ${response.statusText}`);
        }
        return response;
    }

    private static content(line: unknown): { text: string; done: boolean } {
        if (!isRecord(line)) throw new AIProviderError('ollama', 'malformed', 'unexpected reply line');
        if (typeof line.error === 'string') throw new AIProviderError('ollama', 'network', line.error);
        const message = line.message;
        const text = isRecord(message) && typeof message.content === 'string' ? message.content : '';
        return { text, done: line.done === true };
    }

    async generate(prompt: NarrativePrompt, signal?: AbortSignal): Promise<string> {
        const timeout = linkedTimeout(signal, this.options.timeoutMs);
        try {
            const response = await this.post(prompt, false, timeout.signal);
            let data: unknown;
            try {
                data = await response.json();
            } catch (error) {
                throw new AIProviderError(this.name, 'malformed', error instanceof Error ? error.message : String(error));
            }
            return OllamaProvider.content(data).text;
        } finally {
            timeout.dispose();
        }
    }

    async *generateStream(prompt: NarrativePrompt, signal?: AbortSignal): AsyncGenerator<string> {
        const timeout = linkedTimeout(signal, this.options.timeoutMs);
        let finished = false;
        try {
            const response = await this.post(prompt, true, timeout.signal);
            if (!response.body) throw new AIProviderError(this.name, 'malformed', 'empty response body');

            try {
                for await (const line of parseNDJSON(readBody(response.body))) {
                    const { text, done } = OllamaProvider.content(line);
                    if (text) yield text;
                    if (done) break;
                }
                finished = true;
            } catch (error) {
                if (error instanceof AIProviderError || isAbortError(error)) throw error;
                if (error instanceof SyntaxError) throw new AIProviderError(this.name, 'malformed', error.message);
                throw new AIProviderError(this.name, 'network', error instanceof Error ? error.message : String(error));
            }
        } finally {
            // The consumer stopped reading or the stream failed: drop the request.
            if (!finished) timeout.abort(new Error('stream closed before completion'));
            timeout.dispose();
        }
    }
}
