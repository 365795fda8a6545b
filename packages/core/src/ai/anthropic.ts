/**
 * Anthropic Model
 * Structured output through a forced tool call whose input schema is the requested shape
 */

import Anthropic from '@anthropic-ai/sdk';
import { ModelInvocationError, createLogger } from '@commitwright/shared';
import type { CompletionOptions, LanguageModel } from './model.js';

const logger = createLogger('model:anthropic');

export interface AnthropicModelOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

export class AnthropicModel implements LanguageModel {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(options: AnthropicModelOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
    this.model = options.model || DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0;
  }

  get id(): string {
    return `anthropic/${this.model}`;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: [{ role: 'user', content: prompt }],
    };

    if (options) {
      params.tools = [
        {
          name: options.name,
          description: `Return the ${options.name} result`,
          input_schema: { ...options.schema, type: 'object' },
        },
      ];
      params.tool_choice = { type: 'tool', name: options.name };
    }

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(params);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelInvocationError(`Anthropic request failed: ${message}`, error);
    }

    logger.debug('Completion received', {
      request: options?.name,
      stopReason: response.stop_reason,
      outputTokens: response.usage.output_tokens,
    });

    for (const block of response.content) {
      if (options && block.type === 'tool_use') {
        return JSON.stringify(block.input);
      }
    }

    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}
