/**
 * @commitwright/core
 * Staged diff to conventional commit message and changelog
 */

export * from './git/index.js';
export * from './config/index.js';
export * from './diff/parser.js';
export * from './diff/redact.js';
export * from './ai/model.js';
export * from './ai/anthropic.js';
export * from './ai/openai-compatible.js';
export * from './ai/json.js';
export * from './ai/requests.js';
export * from './workflow/file-analyzer.js';
export * from './workflow/summarizer.js';
export * from './workflow/message-generator.js';
export * from './workflow/quality-gate.js';
export * from './workflow/message-improver.js';
export * from './workflow/commit-workflow.js';
export * from './changelog/emitter.js';
export * from './changelog/file-lock.js';
