/**
 * Message Improver
 * Rewrites a rejected message under the strict formatting rules
 */

import {
  type ConventionalCommit,
  type DiffAnalysis,
  type Logger,
  type QualityVerdict,
  SchemaValidationError,
  createLogger,
} from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { improveRequest, requestStructured } from '../ai/requests.js';
import { deriveScopes, normalizeCommit } from './message-generator.js';

/**
 * @returns the rewritten commit, or undefined when the model's answer is unusable
 */
export async function improveMessage(
  model: LanguageModel,
  message: string,
  verdict: QualityVerdict,
  analysis: DiffAnalysis,
  logger: Logger = createLogger('message-improver')
): Promise<ConventionalCommit | undefined> {
  try {
    const response = await requestStructured(
      model,
      improveRequest(message, verdict, deriveScopes(analysis.files))
    );
    return normalizeCommit(response, analysis.breakingChange);
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }
    logger.warn('Unusable rewrite, keeping the previous message', { error: error.message });
    return undefined;
  }
}
