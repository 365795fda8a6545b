/**
 * Tagged model requests
 *
 * Each request kind carries its prompt and the zod shape its response must
 * satisfy. The JSON schema handed to the provider is derived from the shape.
 */

import { z } from 'zod';
import {
  COMMIT_TYPES,
  type DiffAnalysis,
  type FileChange,
  type QualityVerdict,
  SchemaValidationError,
} from '@commitwright/shared';
import type { JsonSchema, LanguageModel } from './model.js';
import { parseJsonObject } from './json.js';
import {
  buildCommitPrompt,
  buildFilePurposePrompt,
  buildImprovePrompt,
  buildQualityPrompt,
  buildSummaryPrompt,
} from './prompts.js';

// ========== Shapes ==========

export const CommitTypeSchema = z.enum(COMMIT_TYPES);

export const FilePurposeSchema = z.object({
  purpose: z.string().trim().min(1),
});

export const SummarySchema = z.object({
  summary: z.string().trim().min(1),
  changeType: CommitTypeSchema,
  breakingChange: z.boolean(),
});

export const CommitSchema = z.object({
  type: CommitTypeSchema,
  scope: z.string().nullish(),
  description: z
    .string()
    .trim()
    .min(1)
    .refine(text => text.split(/\r?\n/)[0].replace(/\.+$/, '').trim().length > 0, {
      message: 'description needs words before any trailing period',
    }),
  breaking: z.boolean().default(false),
  body: z.string().nullish(),
  footer: z.string().nullish(),
});

export const QualitySchema = z.object({
  isValid: z.boolean(),
  issues: z.array(z.string()).default([]),
});

export type FilePurposeResponse = z.infer<typeof FilePurposeSchema>;
export type SummaryResponse = z.infer<typeof SummarySchema>;
export type CommitResponse = z.infer<typeof CommitSchema>;
export type QualityResponse = z.infer<typeof QualitySchema>;

// ========== Requests ==========

export type RequestKind = 'file-purpose' | 'summary' | 'commit' | 'quality' | 'improve';

export interface ModelRequest<T> {
  kind: RequestKind;
  prompt: string;
  shape: z.ZodType<T>;
}

export function filePurposeRequest(file: FileChange, diffSlice: string): ModelRequest<FilePurposeResponse> {
  return { kind: 'file-purpose', prompt: buildFilePurposePrompt(file, diffSlice), shape: FilePurposeSchema };
}

export function summaryRequest(files: FileChange[]): ModelRequest<SummaryResponse> {
  return { kind: 'summary', prompt: buildSummaryPrompt(files), shape: SummarySchema };
}

export function commitRequest(analysis: DiffAnalysis, scopes: string[]): ModelRequest<CommitResponse> {
  return { kind: 'commit', prompt: buildCommitPrompt(analysis, scopes), shape: CommitSchema };
}

export function qualityRequest(message: string): ModelRequest<QualityResponse> {
  return { kind: 'quality', prompt: buildQualityPrompt(message), shape: QualitySchema };
}

export function improveRequest(
  message: string,
  verdict: QualityVerdict,
  scopes: string[]
): ModelRequest<CommitResponse> {
  return { kind: 'improve', prompt: buildImprovePrompt(message, verdict, scopes), shape: CommitSchema };
}

/**
 * JSON schema for a shape, without the draft marker providers reject
 */
export function toJsonSchema(shape: z.ZodType): JsonSchema {
  const { $schema: _draft, ...schema } = z.toJSONSchema(shape);
  return schema;
}

/**
 * Send a request and validate the response against its shape
 *
 * @throws SchemaValidationError when the response is not JSON or does not match
 * @throws ModelInvocationError when the transport fails
 */
export async function requestStructured<T>(model: LanguageModel, request: ModelRequest<T>): Promise<T> {
  const raw = await model.complete(request.prompt, {
    name: request.kind,
    schema: toJsonSchema(request.shape),
  });

  const parsed = parseJsonObject(raw);
  if (!parsed.ok) {
    throw new SchemaValidationError(`${request.kind} response is not valid JSON: ${parsed.error}`, raw);
  }

  const result = request.shape.safeParse(parsed.value);
  if (!result.success) {
    throw new SchemaValidationError(
      `${request.kind} response does not match the expected shape`,
      parsed.value,
      result.error.issues
    );
  }

  return result.data;
}
