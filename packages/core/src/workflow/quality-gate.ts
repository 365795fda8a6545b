/**
 * Quality Gate
 * Lenient model judgment of a rendered message, plus the accept/improve decision
 */

import {
  COMMIT_TYPES,
  type AcceptReason,
  type Logger,
  type QualityVerdict,
  SchemaValidationError,
  createLogger,
} from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { qualityRequest, requestStructured } from '../ai/requests.js';

export const MAX_HEADER_LENGTH = 50;

const HEADER_PATTERN = new RegExp(`^(${COMMIT_TYPES.join('|')})(\\([^()\\s]+\\))?!?: \\S`);

export const MALFORMED_QUALITY_RESPONSE = 'quality response was malformed';

export type QualityDecision =
  | { action: 'accept'; reason: AcceptReason }
  | { action: 'improve' };

/**
 * Deterministic format findings for the improver; never decides acceptance
 */
export function lintCommitMessage(message: string): string[] {
  const header = message.split(/\r?\n/)[0];
  const issues: string[] = [];

  if (!HEADER_PATTERN.test(header)) {
    issues.push('header must read `type(scope): description` with a known type');
  }
  if (header.length > MAX_HEADER_LENGTH) {
    issues.push(`header is ${header.length} characters; keep it within ${MAX_HEADER_LENGTH}`);
  }
  if (header.endsWith('.')) {
    issues.push('description must not end with a period');
  }

  const separator = header.indexOf(': ');
  if (separator >= 0 && /^[A-Z]/.test(header.slice(separator + 2))) {
    issues.push('description must start with a lowercase letter');
  }

  return issues;
}

/**
 * Ask the model whether a message is acceptable. A malformed answer counts as a rejection.
 */
export async function checkQuality(
  model: LanguageModel,
  message: string,
  logger: Logger = createLogger('quality-gate')
): Promise<QualityVerdict> {
  let verdict: QualityVerdict;
  try {
    verdict = await requestStructured(model, qualityRequest(message));
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }
    logger.warn('Malformed quality response', { error: error.message });
    verdict = { isValid: false, issues: [MALFORMED_QUALITY_RESPONSE] };
  }

  const issues = [...new Set([...verdict.issues, ...lintCommitMessage(message)])];
  return { isValid: verdict.isValid, issues };
}

/**
 * Accept a valid message, force-accept once the budget is spent, otherwise improve
 */
export function decideAfterQuality(verdict: QualityVerdict, remainingBudget: number): QualityDecision {
  if (verdict.isValid) {
    return { action: 'accept', reason: 'valid' };
  }
  if (remainingBudget <= 0) {
    return { action: 'accept', reason: 'max-attempts-reached' };
  }
  return { action: 'improve' };
}
