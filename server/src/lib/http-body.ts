import type { Context } from 'hono';

export const MAX_JSON_BODY_BYTES = 64 * 1024;

export type JsonBodyResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): JsonBodyResult {
  return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
}

function declaredLengthExceeds(c: Context, maxBytes: number): boolean {
  const parsed = Number.parseInt(c.req.header('content-length') ?? '', 10);
  return Number.isFinite(parsed) && parsed > maxBytes;
}

/**
 * Reads a JSON body, counting bytes as they stream in so a missing or wrong
 * Content-Length cannot get past `maxBytes`. An empty body parses as `{}`.
 */
export async function readJsonBody(c: Context, maxBytes = MAX_JSON_BODY_BYTES): Promise<JsonBodyResult> {
  if (declaredLengthExceeds(c, maxBytes)) return tooLarge(c, maxBytes);

  const stream = c.req.raw.body;
  const chunks: Uint8Array[] = [];
  let total = 0;
  if (stream) {
    const reader = stream.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > maxBytes) {
          await reader.cancel().catch(() => undefined);
          return tooLarge(c, maxBytes);
        }
        chunks.push(value);
      }
    } catch {
      return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
    }
  }

  const text = Buffer.concat(chunks).toString('utf8');
  if (!text.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }
}
