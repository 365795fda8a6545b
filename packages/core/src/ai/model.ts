/**
 * Language model collaborator
 *
 * Every provider implements the same request/response contract. When a
 * JSON schema is supplied the provider constrains its output to it.
 */

import { ConfigError } from '@commitwright/shared';
import type { LlmSettings } from '../config/index.js';
import { getOllamaUrl } from '../config/service-urls.js';
import { AnthropicModel } from './anthropic.js';
import { OpenAICompatibleModel, OPENROUTER_BASE_URL } from './openai-compatible.js';

export type JsonSchema = Record<string, unknown>;

export interface CompletionOptions {
  /** Request name, also used as tool / schema name */
  name: string;
  schema: JsonSchema;
}

export interface LanguageModel {
  /** Model identifier, for logs */
  readonly id: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Build the model configured for this run
 */
export function createLanguageModel(settings: LlmSettings): LanguageModel {
  switch (settings.provider) {
    case 'anthropic':
      if (!settings.apiKey) {
        throw new ConfigError('API key required for Anthropic provider. Set ANTHROPIC_API_KEY.');
      }
      return new AnthropicModel({
        apiKey: settings.apiKey,
        model: settings.model,
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
      });

    case 'openrouter':
      if (!settings.apiKey) {
        throw new ConfigError('API key required for OpenRouter provider. Set OPENROUTER_API_KEY.');
      }
      return new OpenAICompatibleModel({
        provider: 'openrouter',
        apiKey: settings.apiKey,
        baseURL: settings.baseUrl ?? OPENROUTER_BASE_URL,
        model: settings.model,
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
      });

    case 'ollama':
      return new OpenAICompatibleModel({
        provider: 'ollama',
        // Ollama ignores the key but the client requires one
        apiKey: 'ollama',
        baseURL: `${getOllamaUrl(settings.baseUrl)}/v1`,
        model: settings.model,
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
      });
  }
}
