import logger from './logger.js';

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Multi-step JSON repair for LLM replies that may include markdown fences,
 * surrounding prose, or trailing commas. Returns `undefined` when nothing
 * parses; callers validate the shape.
 */
export function repairJSON(text: string): unknown {
  if (!text.trim()) return undefined;

  // Markdown fences
  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  // Object or array embedded in surrounding text
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';
  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(closeChar);
    if (lastClose > start) {
      cleaned = cleaned.slice(start, lastClose + 1);
      const embedded = tryParse(cleaned);
      if (embedded !== undefined) return embedded;
    }
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const withoutCommas = tryParse(noTrailing);
  if (withoutCommas !== undefined) return withoutCommas;

  // Unescaped newlines inside string values
  const escapedNewlines = noTrailing.replace(/(?<=:\s*"[^"]*)\n/g, '\\n');
  const repaired = tryParse(escapedNewlines);
  if (repaired !== undefined) return repaired;

  logger.warn({ raw_snippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
