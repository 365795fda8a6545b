/**
 * OpenAI-compatible Chat Model
 * Serves both OpenRouter and a local Ollama server through their OpenAI-compatible APIs
 */

import OpenAI from 'openai';
import { ModelInvocationError, createLogger } from '@commitwright/shared';
import type { CompletionOptions, LanguageModel } from './model.js';

const logger = createLogger('model:openai-compatible');

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

// Short aliases accepted for OpenRouter models
export const OPENROUTER_MODELS: Record<string, string> = {
  'claude-3.5-sonnet': 'anthropic/claude-3.5-sonnet',
  'claude-3-haiku': 'anthropic/claude-3-haiku',
  'gpt-4o': 'openai/gpt-4o',
  'gpt-4o-mini': 'openai/gpt-4o-mini',
  'llama-3.1-8b': 'meta-llama/llama-3.1-8b-instruct',
  'deepseek-chat': 'deepseek/deepseek-chat',
};

export type OpenAICompatibleProvider = 'openrouter' | 'ollama';

export interface OpenAICompatibleOptions {
  provider: OpenAICompatibleProvider;
  apiKey: string;
  baseURL: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

const DEFAULT_MODELS: Record<OpenAICompatibleProvider, string> = {
  openrouter: 'anthropic/claude-3.5-sonnet',
  ollama: 'llama3.2',
};

export class OpenAICompatibleModel implements LanguageModel {
  private client: OpenAI;
  private provider: OpenAICompatibleProvider;
  private model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(options: OpenAICompatibleOptions) {
    this.provider = options.provider;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: options.provider === 'openrouter' ? { 'X-Title': 'commitwright' } : undefined,
    });

    const modelInput = options.model || DEFAULT_MODELS[options.provider];
    this.model = options.provider === 'openrouter' ? OPENROUTER_MODELS[modelInput] ?? modelInput : modelInput;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0;
  }

  get id(): string {
    return `${this.provider}/${this.model}`;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    };

    if (options) {
      params.response_format = {
        type: 'json_schema',
        json_schema: { name: options.name, schema: options.schema },
      };
    }

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelInvocationError(`${this.provider} request failed: ${message}`, error);
    }

    logger.debug('Completion received', {
      request: options?.name,
      finishReason: response.choices[0]?.finish_reason,
    });

    return response.choices[0]?.message?.content ?? '';
  }
}
