/**
 * Service URL Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getOllamaUrl } from '../../packages/core/src/config/service-urls.js';

describe('Service URL Configuration', () => {
  // Save original env vars
  const originalEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    // Save and clear relevant env vars
    const envVars = ['COMMITWRIGHT_OLLAMA_URL', 'OLLAMA_HOST', 'OLLAMA_URL'];
    for (const key of envVars) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    // Restore original env vars
    for (const [key, value] of Object.entries(originalEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('getOllamaUrl', () => {
    it('should return default URL when no env var or config', () => {
      expect(getOllamaUrl()).toBe('http://localhost:11434');
    });

    it('should return config URL when provided', () => {
      expect(getOllamaUrl('http://custom:8080')).toBe('http://custom:8080');
    });

    it('should prefer COMMITWRIGHT_OLLAMA_URL over config', () => {
      process.env.COMMITWRIGHT_OLLAMA_URL = 'http://env-prefixed:11434';
      expect(getOllamaUrl('http://config:11434')).toBe('http://env-prefixed:11434');
    });

    it('should prefer COMMITWRIGHT_OLLAMA_URL over OLLAMA_HOST', () => {
      process.env.COMMITWRIGHT_OLLAMA_URL = 'http://env-prefixed:11434';
      process.env.OLLAMA_HOST = 'http://ollama-host:11434';
      expect(getOllamaUrl()).toBe('http://env-prefixed:11434');
    });

    it('should prefer OLLAMA_URL over OLLAMA_HOST', () => {
      process.env.OLLAMA_URL = 'http://ollama-url:11434';
      process.env.OLLAMA_HOST = 'http://ollama-host:11434';
      expect(getOllamaUrl()).toBe('http://ollama-url:11434');
    });

    it('should use OLLAMA_HOST as last env fallback', () => {
      process.env.OLLAMA_HOST = 'http://ollama-host:11434';
      expect(getOllamaUrl()).toBe('http://ollama-host:11434');
    });

    it('should add a scheme to a bare host and port', () => {
      process.env.OLLAMA_HOST = '0.0.0.0:11434';
      expect(getOllamaUrl()).toBe('http://0.0.0.0:11434');
    });

    it('should strip trailing slash from URLs', () => {
      process.env.COMMITWRIGHT_OLLAMA_URL = 'http://localhost:11434/';
      expect(getOllamaUrl()).toBe('http://localhost:11434');
    });

    it('should strip trailing slash from config URL', () => {
      expect(getOllamaUrl('http://localhost:11434/')).toBe('http://localhost:11434');
    });
  });
});
