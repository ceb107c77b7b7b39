import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * Reads a JSON request body, rejecting bodies over `maxBytes` whether or not
 * Content-Length is present. Malformed JSON is a 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  let raw: string;
  try {
    raw = await c.req.text();
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }
  if (new TextEncoder().encode(raw).byteLength > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }
}
