/**
 * Message Generator
 * Turns an analysis into a conventional commit and renders it
 */

import type { ConventionalCommit, DiffAnalysis, FileChange } from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { type CommitResponse, commitRequest, requestStructured } from '../ai/requests.js';

/**
 * First directory of each changed path, deduplicated and sorted
 */
export function deriveScopes(files: FileChange[]): string[] {
  const scopes = new Set<string>();
  for (const file of files) {
    const parts = file.path.split('/').filter(Boolean);
    if (parts.length > 1) {
      scopes.add(parts[0]);
    }
  }
  return [...scopes].sort();
}

/**
 * Single line, no trailing period, lowercase first letter
 */
export function normalizeDescription(description: string): string {
  const line = description.trim().split(/\r?\n/)[0].trim().replace(/\.+$/, '').trimEnd();
  return line.charAt(0).toLowerCase() + line.slice(1);
}

function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build a commit from a model response. The breaking flag always comes from the analysis.
 */
export function normalizeCommit(response: CommitResponse, breaking: boolean): ConventionalCommit {
  const commit: ConventionalCommit = {
    type: response.type,
    description: normalizeDescription(response.description),
    breaking,
  };

  const scope = optionalText(response.scope);
  const body = optionalText(response.body);
  const footer = optionalText(response.footer);
  if (scope) commit.scope = scope;
  if (body) commit.body = body;
  if (footer) commit.footer = footer;

  return commit;
}

export function renderCommitHeader(commit: ConventionalCommit): string {
  const scope = commit.scope ? `(${commit.scope})` : '';
  const bang = commit.breaking ? '!' : '';
  return `${commit.type}${scope}${bang}: ${commit.description}`;
}

/**
 * Header, then body and footer each after a blank line
 */
export function renderCommitMessage(commit: ConventionalCommit): string {
  const parts = [renderCommitHeader(commit)];
  if (commit.body) parts.push(commit.body);
  if (commit.footer) parts.push(commit.footer);
  return parts.join('\n\n');
}

/**
 * @throws SchemaValidationError when the model does not return a commit
 */
export async function generateCommit(model: LanguageModel, analysis: DiffAnalysis): Promise<ConventionalCommit> {
  const response = await requestStructured(model, commitRequest(analysis, deriveScopes(analysis.files)));
  return normalizeCommit(response, analysis.breakingChange);
}
