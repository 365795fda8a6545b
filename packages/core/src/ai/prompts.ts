/**
 * Prompt builders for each model request
 */

import { COMMIT_TYPES, type DiffAnalysis, type FileChange, type QualityVerdict } from '@commitwright/shared';

const MESSAGE_RULES = [
  '- description in imperative mood ("add", not "added" or "adds")',
  '- description starts with a lowercase letter',
  '- the whole header line `type(scope): description` stays under 50 characters',
  '- no period at the end of the description',
  '- when breaking is true the header is written `type(scope)!: description`',
  `- type is one of: ${COMMIT_TYPES.join(', ')}`,
  '- scope is optional; prefer one of the candidate scopes when it fits',
  '- body and footer are optional; omit them unless they add information',
].join('\n');

export function buildFilePurposePrompt(file: FileChange, diffSlice: string): string {
  const renamed = file.oldPath ? `\nRenamed from: ${file.oldPath}` : '';
  return `You are an expert software engineer. Describe the purpose of this single file change.

File: ${file.path}${renamed}
Change type: ${file.changeType}
Lines: +${file.addedLines} -${file.removedLines}

Diff:
${diffSlice || '(no textual diff)'}

In one or two technical sentences explain what changed in this file and why.
Respond with a JSON object: {"purpose": string}`;
}

export function buildSummaryPrompt(files: FileChange[]): string {
  const overview = files
    .map(file => `- ${file.path}: ${file.changeType} (+${file.addedLines}/-${file.removedLines} lines)`)
    .join('\n');
  const purposes = files.map(file => `- ${file.path}: ${file.purpose}`).join('\n');

  return `You are an expert software engineer. Summarize these staged changes.

Changes overview:
${overview}

File purposes:
${purposes}

1. Write a brief technical summary (2-3 sentences).
2. Pick the primary change type, exactly one of: ${COMMIT_TYPES.join(', ')}.
3. Decide whether any change is breaking (public API, schema or behavior consumers rely on).

Respond with a JSON object: {"summary": string, "changeType": string, "breakingChange": boolean}`;
}

export function buildCommitPrompt(analysis: DiffAnalysis, scopes: string[]): string {
  const files = analysis.files.map(file => `- ${file.path} (${file.changeType}): ${file.purpose}`).join('\n');

  return `Write a conventional commit message for these changes.

Summary: ${analysis.summary}
Change type: ${analysis.changeType}
Breaking change: ${analysis.breakingChange ? 'yes' : 'no'}
Candidate scopes: ${scopes.length > 0 ? scopes.join(', ') : '(none)'}

Files:
${files}

Rules:
${MESSAGE_RULES}

Respond with a JSON object: {"type": string, "scope": string | null, "description": string, "breaking": boolean, "body": string | null, "footer": string | null}`;
}

export function buildQualityPrompt(message: string): string {
  return `Check whether this commit message is a usable conventional commit.

Message:
${message}

Accept it when the header reads \`type(scope): description\` (scope optional, \`!\` allowed),
the type is one of ${COMMIT_TYPES.join(', ')}, and the description says what changed.
Do not be strict about wording or style.

Respond with a JSON object: {"isValid": boolean, "issues": string[]}`;
}

export function buildImprovePrompt(message: string, verdict: QualityVerdict, scopes: string[]): string {
  const issues = verdict.issues.length > 0
    ? verdict.issues.map(issue => `- ${issue}`).join('\n')
    : '- the message was rejected without specific issues';

  return `Rewrite this rejected commit message.

Message:
${message}

Problems found:
${issues}

Candidate scopes: ${scopes.length > 0 ? scopes.join(', ') : '(none)'}

Rules (all strict):
${MESSAGE_RULES}

Respond with a JSON object: {"type": string, "scope": string | null, "description": string, "breaking": boolean, "body": string | null, "footer": string | null}`;
}
