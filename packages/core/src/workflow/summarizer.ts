/**
 * Change Summarizer
 * Combines per-file purposes into one analysis of the staged change
 */

import {
  type DiffAnalysis,
  type FileChange,
  type Logger,
  SchemaValidationError,
  createLogger,
  plural,
} from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { requestStructured, summaryRequest } from '../ai/requests.js';

/** The first request plus one retry */
const SUMMARY_REQUESTS = 2;

export async function summarizeChanges(
  model: LanguageModel,
  files: FileChange[],
  logger: Logger = createLogger('summarizer')
): Promise<DiffAnalysis> {
  let lastPayload: unknown;

  for (let attempt = 1; attempt <= SUMMARY_REQUESTS; attempt++) {
    try {
      const response = await requestStructured(model, summaryRequest(files));
      return {
        summary: response.summary,
        changeType: response.changeType,
        files,
        breakingChange: response.breakingChange,
      };
    } catch (error) {
      if (!(error instanceof SchemaValidationError)) {
        throw error;
      }
      lastPayload = error.payload;
      logger.warn('Invalid summary response', { attempt, error: error.message });
    }
  }

  logger.warn('Summary still invalid after retry, defaulting to chore');
  return fallbackAnalysis(files, lastPayload);
}

/**
 * Classify as chore, keeping whatever summary and breaking flag survive in the payload
 */
export function fallbackAnalysis(files: FileChange[], payload: unknown): DiffAnalysis {
  let summary = `Changes across ${plural(files.length, 'file')}`;
  let breakingChange = false;

  if (typeof payload === 'object' && payload !== null) {
    if ('summary' in payload && typeof payload.summary === 'string' && payload.summary.trim()) {
      summary = payload.summary.trim();
    }
    if ('breakingChange' in payload && typeof payload.breakingChange === 'boolean') {
      breakingChange = payload.breakingChange;
    }
  }

  return { summary, changeType: 'chore', files, breakingChange };
}
