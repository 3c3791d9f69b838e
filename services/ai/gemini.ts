import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type { ProviderSettings } from '../../config/strategyConfig';
import { AIProviderError } from '../utils/errors';
import { isAbortError } from '../utils/retry';
import {
  classifyStatus,
  collectStream,
  type GenerationOptions,
  type NarrativePrompt,
  type NarrativeProvider,
} from './provider';

/** The slice of `ai.models` this provider calls. */
export interface GeminiModels {
  generateContentStream(params: GenerateContentParameters): Promise<AsyncIterable<{ text?: string }>>;
}

// The SDK's ApiError carries an HTTP `status`; classify by shape rather than class.
const classifyGeminiError = (error: unknown): AIProviderError | Error => {
  if (error instanceof AIProviderError) return error;
  if (isAbortError(error)) return error instanceof Error ? error : new Error('aborted');

  const message = error instanceof Error ? error.message : String(error);
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    const kind = error.status === 400 && /api key/i.test(message) ? 'auth' : classifyStatus(error.status);
    return new AIProviderError('gemini', kind, message);
  }
  if (error instanceof SyntaxError) return new AIProviderError('gemini', 'malformed', message);
  return new AIProviderError('gemini', 'network', message);
};

export class GeminiProvider implements NarrativeProvider {
  readonly name = 'gemini';
  private models: GeminiModels;

  constructor(
    private settings: ProviderSettings,
    private options: GenerationOptions,
    models?: GeminiModels
  ) {
    this.models = models ?? new GoogleGenAI({ apiKey: settings.apiKey }).models;
  }

  generate(prompt: NarrativePrompt, signal?: AbortSignal): Promise<string> {
    return collectStream(this.generateStream(prompt, signal));
  }

  async *generateStream(prompt: NarrativePrompt, signal?: AbortSignal): AsyncGenerator<string> {
    console.log(`[AI:gemini] Streaming with model ${this.settings.model}...`);
    try {
      const stream = await this.models.generateContentStream({
        model: this.settings.model,
        contents: prompt.user,
        config: {
          systemInstruction: prompt.system,
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxTokens,
          abortSignal: signal,
        },
      });
      for await (const chunk of stream) {
        if (signal?.aborted) return;
        if (chunk.text) yield chunk.text;
      }
    } catch (error) {
      throw classifyGeminiError(error);
    }
  }
}
