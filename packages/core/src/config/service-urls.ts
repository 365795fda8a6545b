/**
 * Service URL Configuration
 *
 * Priority: Environment Variables > Config File > Defaults
 */

const DEFAULT_URLS = {
  ollama: 'http://localhost:11434',
} as const;

/**
 * Get the Ollama server URL
 *
 * Priority: COMMITWRIGHT_OLLAMA_URL / OLLAMA_URL / OLLAMA_HOST env var > config llm.baseUrl > default
 *
 * @param configUrl - URL from config file (optional)
 */
export function getOllamaUrl(configUrl?: string): string {
  const envUrl = process.env.COMMITWRIGHT_OLLAMA_URL || process.env.OLLAMA_URL || process.env.OLLAMA_HOST;
  if (envUrl) {
    return normalizeUrl(envUrl);
  }

  if (configUrl) {
    return normalizeUrl(configUrl);
  }

  return DEFAULT_URLS.ollama;
}

/**
 * Add a scheme to bare host:port values and drop trailing slashes
 */
function normalizeUrl(url: string): string {
  const withScheme = /^https?:\/\//.test(url) ? url : `http://${url}`;
  return withScheme.replace(/\/+$/, '');
}
