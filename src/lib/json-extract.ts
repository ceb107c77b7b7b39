import logger from './logger.js';

/**
 * Pulls the JSON object out of a model response: everything from the first
 * `{` to the last `}`. Markdown fences and surrounding prose are discarded by
 * that slice; nested prose braces outside the object will break it.
 *
 * Returns null when there is no brace pair, the slice does not parse, or the
 * parsed value is not a plain object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  if (!text || typeof text !== 'string') return null;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    logger.warn({ rawSnippet: text.substring(0, 200) }, 'No JSON object found in model response');
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    logger.warn(
      { rawSnippet: text.substring(0, 200), err: err instanceof Error ? err.message : String(err) },
      'Failed to parse JSON from model response',
    );
    return null;
  }

  return isRecord(parsed) ? parsed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
