/**
 * Configuration management for commitwright
 *
 * Loads `.commitwright/config.json`, validates each section against the
 * defaults, then applies environment overrides.
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import { ConfigError, getConfigDir, isErrnoException } from '@commitwright/shared';
import { DEFAULT_CHANGELOG_FILE } from '../changelog/emitter.js';

export * from './service-urls.js';

// Configuration Types

export type LlmProvider = 'ollama' | 'anthropic' | 'openrouter';

export interface LlmSettings {
  provider: LlmProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  baseUrl?: string;
  apiKey?: string;
}

export interface WorkflowSettings {
  /** Improvement attempts before a message is force-accepted, 0-5 */
  maxAttempts: number;
  /** Character budget for the per-file diff slice sent to the model */
  maxDiffChars: number;
}

export interface ChangelogSettings {
  enabled: boolean;
  /** Relative to the repository root unless absolute */
  path: string;
}

export interface CommitwrightConfig {
  version: string;
  llm: LlmSettings;
  workflow: WorkflowSettings;
  changelog: ChangelogSettings;
}

export const MAX_ATTEMPTS_LIMIT = 5;

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  ollama: 'llama3.2',
  anthropic: 'claude-3-5-sonnet-20241022',
  openrouter: 'anthropic/claude-3.5-sonnet',
};

// Default Configuration

export function getDefaultConfig(): CommitwrightConfig {
  return {
    version: '1',
    llm: {
      provider: 'ollama',
      model: DEFAULT_MODELS.ollama,
      temperature: 0,
      maxTokens: 1024,
    },
    workflow: {
      maxAttempts: MAX_ATTEMPTS_LIMIT,
      maxDiffChars: 4000,
    },
    changelog: {
      enabled: true,
      path: DEFAULT_CHANGELOG_FILE,
    },
  };
}

// Validation

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isLlmProvider(value: unknown): value is LlmProvider {
  return value === 'ollama' || value === 'anthropic' || value === 'openrouter';
}

/**
 * Limit an attempt budget to 0-5; anything that is not a finite number gets the full budget
 */
export function clampAttempts(value: number): number {
  if (!Number.isFinite(value)) {
    return MAX_ATTEMPTS_LIMIT;
  }
  return Math.min(MAX_ATTEMPTS_LIMIT, Math.max(0, Math.floor(value)));
}

export function validateConfig(config: unknown): CommitwrightConfig {
  if (!isRecord(config)) {
    throw new ConfigError('Configuration must be an object');
  }

  const defaults = getDefaultConfig();

  return {
    version: typeof config.version === 'string' ? config.version : defaults.version,
    llm: validateLlmSettings(config.llm, defaults.llm),
    workflow: validateWorkflowSettings(config.workflow, defaults.workflow),
    changelog: validateChangelogSettings(config.changelog, defaults.changelog),
  };
}

function validateLlmSettings(value: unknown, defaults: LlmSettings): LlmSettings {
  if (!isRecord(value)) return defaults;

  const provider = isLlmProvider(value.provider) ? value.provider : defaults.provider;
  const result: LlmSettings = {
    provider,
    model: typeof value.model === 'string' && value.model ? value.model : DEFAULT_MODELS[provider],
    temperature: typeof value.temperature === 'number' ? value.temperature : defaults.temperature,
    maxTokens: typeof value.maxTokens === 'number' && value.maxTokens > 0 ? value.maxTokens : defaults.maxTokens,
  };

  if (typeof value.baseUrl === 'string') result.baseUrl = value.baseUrl;
  if (typeof value.apiKey === 'string') result.apiKey = value.apiKey;

  return result;
}

function validateWorkflowSettings(value: unknown, defaults: WorkflowSettings): WorkflowSettings {
  if (!isRecord(value)) return defaults;

  return {
    maxAttempts: typeof value.maxAttempts === 'number' ? clampAttempts(value.maxAttempts) : defaults.maxAttempts,
    maxDiffChars:
      typeof value.maxDiffChars === 'number' && value.maxDiffChars > 0 ? value.maxDiffChars : defaults.maxDiffChars,
  };
}

function validateChangelogSettings(value: unknown, defaults: ChangelogSettings): ChangelogSettings {
  if (!isRecord(value)) return defaults;

  return {
    enabled: typeof value.enabled === 'boolean' ? value.enabled : defaults.enabled,
    path: typeof value.path === 'string' && value.path ? value.path : defaults.path,
  };
}

// Environment

/**
 * Apply environment overrides on top of a validated config
 */
export function applyEnvOverrides(config: CommitwrightConfig, env: NodeJS.ProcessEnv = process.env): CommitwrightConfig {
  const llm: LlmSettings = { ...config.llm };

  const provider = env.COMMITWRIGHT_PROVIDER;
  if (provider !== undefined) {
    if (!isLlmProvider(provider)) {
      throw new ConfigError(`Unknown provider in COMMITWRIGHT_PROVIDER: ${provider}`);
    }
    if (provider !== llm.provider) {
      llm.provider = provider;
      llm.model = DEFAULT_MODELS[provider];
    }
  }

  if (llm.provider === 'ollama' && env.OLLAMA_MODEL) {
    llm.model = env.OLLAMA_MODEL;
  }
  if (env.COMMITWRIGHT_MODEL) {
    llm.model = env.COMMITWRIGHT_MODEL;
  }

  if (!llm.apiKey) {
    const key = llm.provider === 'anthropic'
      ? env.ANTHROPIC_API_KEY
      : llm.provider === 'openrouter'
        ? env.OPENROUTER_API_KEY
        : undefined;
    if (key) llm.apiKey = key;
  }

  const changelog: ChangelogSettings = { ...config.changelog };
  if (env.COMMITWRIGHT_CHANGELOG) {
    changelog.path = env.COMMITWRIGHT_CHANGELOG;
  }

  return { ...config, llm, changelog };
}

// Loading

export function getConfigPath(repoRoot: string): string {
  return path.join(getConfigDir(repoRoot), 'config.json');
}

/**
 * Load configuration for a repository; a missing file means defaults
 */
export async function loadConfig(
  repoRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<CommitwrightConfig> {
  const configPath = getConfigPath(repoRoot);
  let config = getDefaultConfig();

  try {
    const data = await fs.readFile(configPath, 'utf-8');
    config = validateConfig(JSON.parse(data));
  } catch (error: unknown) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to load config ${configPath}: ${message}`, error);
    }
  }

  return applyEnvOverrides(config, env);
}

/**
 * Resolve the changelog path against the repository root
 */
export function resolveChangelogPath(repoRoot: string, config: CommitwrightConfig): string {
  return path.resolve(repoRoot, config.changelog.path);
}
