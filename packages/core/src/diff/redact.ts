/**
 * Secret redaction for diff text sent to a language model
 */

import { truncate } from '@commitwright/shared';

const SECRET_BLOCK_PATTERNS = [/-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g];

const SECRET_INLINE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /\bsk-ant-[A-Za-z0-9_-]{16,}/g, replacement: '[REDACTED_TOKEN]' },
  { pattern: /\b(?:sk|pk|rk)[_-][A-Za-z0-9]{16,}\b/g, replacement: '[REDACTED_TOKEN]' },
  { pattern: /\bgh[pousr]_[A-Za-z0-9]{20,}\b/gi, replacement: '[REDACTED_GITHUB_TOKEN]' },
  { pattern: /\bAKIA[0-9A-Z]{16}\b/g, replacement: '[REDACTED_AWS_KEY]' },
  {
    pattern: /(api[_-]?key|access[_-]?token|auth[_-]?token|secret|password)\s*[:=]\s*[^\s"']+/gi,
    replacement: '$1=[REDACTED]',
  },
];

export function redactSensitiveText(text: string): string {
  let output = text;
  for (const pattern of SECRET_BLOCK_PATTERNS) {
    output = output.replace(pattern, '[REDACTED_PRIVATE_KEY]');
  }
  for (const entry of SECRET_INLINE_PATTERNS) {
    output = output.replace(entry.pattern, entry.replacement);
  }
  return output;
}

/**
 * Clip a diff slice to a character budget, then redact it
 */
export function truncateAndRedact(text: string, maxChars: number): string {
  if (!text) {
    return '';
  }
  return redactSensitiveText(truncate(text, maxChars));
}
