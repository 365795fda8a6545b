/**
 * File Analyzer
 * Asks the model for the purpose of each changed file
 */

import { type FileChange, type Logger, SchemaValidationError, createLogger } from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { filePurposeRequest, requestStructured } from '../ai/requests.js';
import type { DiffSection } from '../diff/parser.js';
import { truncateAndRedact } from '../diff/redact.js';

export interface FileAnalyzerOptions {
  /** Character budget for the diff slice, default 4000 */
  maxDiffChars?: number;
  logger?: Logger;
}

/**
 * Purpose used when the model is skipped or its answer is unusable
 */
export function templatePurpose(file: FileChange): string {
  switch (file.changeType) {
    case 'NEW':
      return `Add ${file.path}`;
    case 'DELETED':
      return `Remove ${file.path}`;
    case 'RENAMED':
      return `Rename ${file.oldPath ?? 'file'} to ${file.path}`;
    case 'MODE_CHANGED':
      return file.oldMode && file.newMode
        ? `Change file mode of ${file.path} from ${file.oldMode} to ${file.newMode}`
        : `Change file mode of ${file.path}`;
    case 'BINARY':
      return `Update binary file ${file.path}`;
    case 'SUBMODULE':
      return `Update submodule ${file.path}`;
    case 'CONFLICT':
      return `Resolve merge conflict in ${file.path}`;
    case 'MODIFIED':
      return `Changes in ${file.path}`;
  }
}

/**
 * Purpose of one file. Malformed model output falls back to the template;
 * transport failures propagate.
 */
export async function analyzeFile(
  model: LanguageModel,
  section: DiffSection,
  options: FileAnalyzerOptions = {}
): Promise<string> {
  const { change } = section;
  const logger = options.logger ?? createLogger('file-analyzer');

  if (change.changeType === 'BINARY') {
    return templatePurpose(change);
  }

  const diffSlice = truncateAndRedact(section.raw, options.maxDiffChars ?? 4000);

  try {
    const response = await requestStructured(model, filePurposeRequest(change, diffSlice));
    return response.purpose;
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      logger.warn('Unusable purpose response, using template', { path: change.path, error: error.message });
      return templatePurpose(change);
    }
    throw error;
  }
}

/**
 * Analyze every section in diff order
 */
export async function analyzeFiles(
  model: LanguageModel,
  sections: DiffSection[],
  options: FileAnalyzerOptions = {}
): Promise<FileChange[]> {
  const analyzed: FileChange[] = [];
  for (const section of sections) {
    const purpose = await analyzeFile(model, section, options);
    analyzed.push({ ...section.change, purpose });
  }
  return analyzed;
}
