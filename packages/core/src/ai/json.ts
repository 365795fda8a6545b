/**
 * Lenient JSON extraction from model output
 */

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Parse a model response as JSON, falling back to the outermost `{...}` span
 * (models sometimes wrap the object in prose or code fences)
 */
export function parseJsonObject(raw: string): JsonParseResult {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: false, error: 'Model returned empty response' };
  }

  const direct = tryJsonParse(trimmed);
  if (direct.ok) {
    return direct;
  }

  const firstBrace = trimmed.indexOf('{');
  const lastBrace = trimmed.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return tryJsonParse(trimmed.slice(firstBrace, lastBrace + 1));
  }

  return { ok: false, error: 'Model response is not valid JSON' };
}

function tryJsonParse(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}
