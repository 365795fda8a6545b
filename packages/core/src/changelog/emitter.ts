/**
 * Changelog Emitter
 * Formats an accepted message and its analysis as a Markdown section and appends it
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { type DiffAnalysis, ensureDir, isErrnoException } from '@commitwright/shared';

export const DEFAULT_CHANGELOG_FILE = 'CHANGELOG_AGENT.md';

export function formatChangelogSection(message: string, analysis: DiffAnalysis): string {
  const [header, ...rest] = message.split('\n');
  const details = rest.join('\n').trim();

  const lines = [`## ${header}`, ''];
  if (details) {
    lines.push(details, '');
  }

  lines.push('### Summary', analysis.summary, '');
  lines.push('### Changed Files');
  for (const file of analysis.files) {
    lines.push(`- **${file.path}**: ${file.purpose}`);
  }
  lines.push('', `### Type: \`${analysis.changeType}\``);

  if (analysis.breakingChange) {
    lines.push('', '### BREAKING CHANGES', 'This commit contains breaking changes.');
  }

  return lines.join('\n') + '\n';
}

async function readTail(filePath: string): Promise<string> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return content.slice(-2);
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

/**
 * Separator that leaves exactly one blank line before the new section
 */
function separatorFor(tail: string): string {
  if (tail === '' || tail === '\n\n') return '';
  if (tail.endsWith('\n')) return '\n';
  return '\n\n';
}

/**
 * Append a section; existing bytes are never rewritten
 */
export async function appendChangelogSection(filePath: string, section: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const separator = separatorFor(await readTail(filePath));
  await fs.appendFile(filePath, separator + section, 'utf-8');
}
