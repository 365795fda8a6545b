/**
 * In-process language model for tests
 *
 * Responses are queued per request kind (the completion name). The last
 * queued response for a kind repeats once the queue runs down.
 */

import type { CompletionOptions, LanguageModel, RequestKind } from '@commitwright/core';

export type ScriptedResponse = string | Record<string, unknown> | Error;

export interface RecordedCall {
  kind: string;
  prompt: string;
}

export class ScriptedModel implements LanguageModel {
  readonly id = 'scripted';
  readonly calls: RecordedCall[] = [];
  private queues = new Map<string, ScriptedResponse[]>();

  respond(kind: RequestKind, ...responses: ScriptedResponse[]): this {
    this.queues.set(kind, responses);
    return this;
  }

  callsOf(kind: RequestKind): RecordedCall[] {
    return this.calls.filter(call => call.kind === kind);
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const kind = options?.name ?? 'text';
    this.calls.push({ kind, prompt });

    const queue = this.queues.get(kind);
    if (!queue || queue.length === 0) {
      throw new Error(`No scripted response for ${kind}`);
    }

    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) {
      throw new Error(`No scripted response for ${kind}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'string' ? next : JSON.stringify(next);
  }
}

/**
 * A model that answers every request sensibly and accepts the first message
 */
export function createAgreeableModel(commit: Record<string, unknown> = {}): ScriptedModel {
  return new ScriptedModel()
    .respond('file-purpose', { purpose: 'Adds the greeting helper' })
    .respond('summary', { summary: 'Add a greeting helper', changeType: 'feat', breakingChange: false })
    .respond('commit', { type: 'feat', scope: 'src', description: 'add greeting helper', ...commit })
    .respond('quality', { isValid: true, issues: [] })
    .respond('improve', { type: 'feat', scope: 'src', description: 'add greeting helper' });
}
