import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'node:stream';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import type { GenerateContentParameters } from '@google/genai';
import { OpenAICompatibleProvider } from '../../services/ai/openai';
import { AnthropicProvider } from '../../services/ai/anthropic';
import { OllamaProvider } from '../../services/ai/ollama';
import { GeminiProvider, type GeminiModels } from '../../services/ai/gemini';
import { collectStream, type GenerationOptions, type NarrativePrompt } from '../../services/ai/provider';
import { AIProviderError } from '../../services/utils/errors';

const prompt: NarrativePrompt = { system: 'You are an analyst.', user: 'Summarise AAPL.' };
const options: GenerationOptions = { temperature: 0.7, maxTokens: 256, timeoutMs: 5_000 };

interface Captured {
    url?: string;
    headers: Record<string, unknown>;
    body: unknown;
}

/** In-process axios transport: answers every request with `status` and `data`. */
const fakeHttp = (status: number, data: () => unknown) => {
    const captured: Captured = { headers: {}, body: undefined };
    const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
        captured.url = config.url;
        captured.headers = config.headers.toJSON();
        captured.body = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
        const response = { data: data(), status, statusText: String(status), headers: {}, config };
        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
        }
        return response;
    };
    return { http: axios.create({ adapter }), captured };
};

const sse = (...events: string[]) => () => Readable.from(events.map(e => `${e}\n\n`));

const expectFailure = async (promise: Promise<unknown>, kind: AIProviderError['kind']) => {
    const error = await promise.then(() => undefined, (e: unknown) => e);
    expect(error).toBeInstanceOf(AIProviderError);
    expect(error).toMatchObject({ kind });
};

describe('OpenAICompatibleProvider', () => {
    const settings = { apiKey: 'test-secret', model: 'gpt-test', baseUrl: 'https://llm.test/v1/' };

    it('should stream content deltas until [DONE]', async () => {
        const { http, captured } = fakeHttp(200, sse(
            'data: {"choices":[{"delta":{"role":"assistant"}}]}',
            ': keep-alive',
            'data: {"choices":[{"delta":{"content":"Hel"}}]}',
            'data: {"choices":[{"delta":{"content":"lo"}}]}',
            'data: [DONE]',
            'data: {"choices":[{"delta":{"content":"ignored"}}]}',
        ));
        const provider = new OpenAICompatibleProvider('openai', settings, options, http);

        const tokens: string[] = [];
        for await (const token of provider.generateStream(prompt)) tokens.push(token);

        expect(tokens).toEqual(['Hel', 'lo']);
        expect(captured.url).toBe('https://llm.test/v1/chat/completions');
        expect(captured.headers.Authorization).toBe('Bearer test-secret');
        expect(captured.body).toMatchObject({
            model: 'gpt-test',
            stream: true,
            max_tokens: 256,
            messages: [
                { role: 'system', content: 'You are an analyst.' },
                { role: 'user', content: 'Summarise AAPL.' },
            ],
        });
    });

    it('should read a non-streamed completion', async () => {
        const { http } = fakeHttp(200, () => ({ choices: [{ message: { content: 'Full text' } }] }));
        const provider = new OpenAICompatibleProvider('zhipu', settings, options, http);
        await expect(provider.generate(prompt)).resolves.toBe('Full text');
    });

    it('should classify HTTP failures', async () => {
        const quota = new OpenAICompatibleProvider('openai', settings, options, fakeHttp(429, () => '').http);
        const auth = new OpenAICompatibleProvider('openai', settings, options, fakeHttp(401, () => '').http);
        const outage = new OpenAICompatibleProvider('openai', settings, options, fakeHttp(503, () => '').http);

        await expectFailure(collectStream(quota.generateStream(prompt)), 'quota');
        await expectFailure(collectStream(auth.generateStream(prompt)), 'auth');
        await expectFailure(outage.generate(prompt), 'network');
    });

    it('should classify an unparseable event as malformed', async () => {
        const { http } = fakeHttp(200, sse('data: {not json'));
        const provider = new OpenAICompatibleProvider('openai', settings, options, http);
        await expectFailure(collectStream(provider.generateStream(prompt)), 'malformed');
    });

    it('should surface cancellation rather than a provider failure', async () => {
        const { http } = fakeHttp(200, sse('data: [DONE]'));
        const provider = new OpenAICompatibleProvider('openai', settings, options, http);
        const controller = new AbortController();
        controller.abort();

        const error = await collectStream(provider.generateStream(prompt, controller.signal)).then(() => undefined, (e: unknown) => e);
        expect(axios.isCancel(error)).toBe(true);
        expect(error).not.toBeInstanceOf(AIProviderError);
    });
});

describe('AnthropicProvider', () => {
    const settings = { apiKey: 'test-secret', model: 'claude-test', baseUrl: 'https://anthropic.test' };

    it('should stream text deltas until message_stop', async () => {
        const { http, captured } = fakeHttp(200, sse(
            'event: message_start\ndata: {"type":"message_start","message":{}}',
            'event: content_block_delta\ndata: {"type":"content_block_delta","delta":{"type":"text_delta","text":"Buy"}}',
            'event: ping\ndata: {"type":"ping"}',
            'event: content_block_delta\ndata: {"type":"content_block_delta","delta":{"type":"text_delta","text":" rating"}}',
            'event: message_stop\ndata: {"type":"message_stop"}',
        ));
        const provider = new AnthropicProvider({ ...settings }, { ...options, temperature: 1.5 }, http);

        await expect(collectStream(provider.generateStream(prompt))).resolves.toBe('Buy rating');
        expect(captured.url).toBe('https://anthropic.test/v1/messages');
        expect(captured.headers['x-api-key']).toBe('test-secret');
        expect(captured.headers['anthropic-version']).toBe('2023-06-01');
        expect(captured.body).toMatchObject({ system: 'You are an analyst.', temperature: 1, stream: true });
    });

    it('should map stream error events to failure kinds', async () => {
        const { http } = fakeHttp(200, sse('event: error\ndata: {"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}'));
        const provider = new AnthropicProvider(settings, options, http);
        await expectFailure(collectStream(provider.generateStream(prompt)), 'network');
    });

    it('should join content blocks of a non-streamed reply', async () => {
        const { http } = fakeHttp(200, () => ({ content: [{ type: 'text', text: 'Part one. ' }, { type: 'text', text: 'Part two.' }] }));
        const provider = new AnthropicProvider(settings, options, http);
        await expect(provider.generate(prompt)).resolves.toBe('Part one. Part two.');
    });
});

describe('OllamaProvider', () => {
    const settings = { apiKey: '', model: 'llama-test', baseUrl: 'http://localhost:11434/' };

    it('should stream NDJSON message chunks', async () => {
        vi.mocked(fetch).mockResolvedValueOnce(new Response(
            '{"message":{"role":"assistant","content":"Hold"},"done":false}\n' +
            '{"message":{"role":"assistant","content":" steady"},"done":true}\n'
        ));
        const provider = new OllamaProvider(settings, options);

        await expect(collectStream(provider.generateStream(prompt))).resolves.toBe('Hold steady');
        expect(fetch).toHaveBeenCalledWith('http://localhost:11434/api/chat', expect.objectContaining({ method: 'POST' }));
    });

    it('should classify an unreachable host as a network failure', async () => {
        vi.mocked(fetch).mockRejectedValueOnce(new TypeError('fetch failed'));
        const provider = new OllamaProvider(settings, options);
        await expectFailure(provider.generate(prompt), 'network');
    });

    it('should classify an error line as a network failure', async () => {
        vi.mocked(fetch).mockResolvedValueOnce(new Response('{"error":"model not loaded"}\n'));
        const provider = new OllamaProvider(settings, options);
        await expectFailure(collectStream(provider.generateStream(prompt)), 'network');
    });

    it('should classify a garbled line as malformed', async () => {
        vi.mocked(fetch).mockResolvedValueOnce(new Response('not json\n'));
        const provider = new OllamaProvider(settings, options);
        await expectFailure(collectStream(provider.generateStream(prompt)), 'malformed');
    });

    it('should cancel the body and abort the request when the reader stops early', async () => {
        let cancelled = false;
        let requestSignal: AbortSignal | undefined;
        const body = new ReadableStream<Uint8Array>({
            start(controller) {
                controller.enqueue(new TextEncoder().encode('{"message":{"content":"Hi"},"done":false}\n'));
            },
            cancel() {
                cancelled = true;
            },
        });
        vi.mocked(fetch).mockImplementationOnce(async (_input, init) => {
            requestSignal = init?.signal ?? undefined;
            return new Response(body);
        });
        const provider = new OllamaProvider(settings, options);

        const tokens: string[] = [];
        for await (const token of provider.generateStream(prompt)) {
            tokens.push(token);
            break;
        }

        expect(tokens).toEqual(['Hi']);
        expect(cancelled).toBe(true);
        expect(requestSignal?.aborted).toBe(true);
    });
});

describe('GeminiProvider', () => {
    const settings = { apiKey: 'test-secret', model: 'gemini-test', baseUrl: '' };

    const fakeModels = (impl: (params: GenerateContentParameters) => Promise<AsyncIterable<{ text?: string }>>) => {
        const generateContentStream = vi.fn(impl);
        const models: GeminiModels = { generateContentStream };
        return { models, generateContentStream };
    };

    it('should stream chunk text with the system instruction', async () => {
        async function* chunks() {
            yield { text: 'Strong ' };
            yield {};
            yield { text: 'fundamentals' };
        }
        const { models, generateContentStream } = fakeModels(async () => chunks());
        const provider = new GeminiProvider(settings, options, models);

        await expect(provider.generate(prompt)).resolves.toBe('Strong fundamentals');
        expect(generateContentStream).toHaveBeenCalledWith(expect.objectContaining({
            model: 'gemini-test',
            contents: 'Summarise AAPL.',
            config: expect.objectContaining({ systemInstruction: 'You are an analyst.', maxOutputTokens: 256 }),
        }));
    });

    it('should classify SDK errors by status', async () => {
        const quotaError = Object.assign(new Error('Resource exhausted'), { status: 429 });
        const keyError = Object.assign(new Error('API key not valid'), { status: 400 });

        await expectFailure(new GeminiProvider(settings, options, fakeModels(() => Promise.reject(quotaError)).models).generate(prompt), 'quota');
        await expectFailure(new GeminiProvider(settings, options, fakeModels(() => Promise.reject(keyError)).models).generate(prompt), 'auth');
    });
});
