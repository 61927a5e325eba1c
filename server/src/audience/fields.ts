import type { RawRecord } from './types.js';

/** First non-blank string (or finite number, stringified) among `keys`; '' when none. */
export function readText(record: RawRecord, ...keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return '';
}

/** First numeric value among `keys`, accepting numeric strings like "1,204"; 0 when none. */
export function readNumber(record: RawRecord, ...keys: string[]): number {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim()) {
      const parsed = Number.parseFloat(value.replace(/,/g, ''));
      if (Number.isFinite(parsed)) return parsed;
    }
  }
  return 0;
}

export function readList(record: RawRecord, ...keys: string[]): unknown[] {
  for (const key of keys) {
    const value = record[key];
    if (Array.isArray(value) && value.length > 0) return value;
  }
  return [];
}

export function readStringList(record: RawRecord, ...keys: string[]): string[] {
  return readList(record, ...keys)
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Cut to at most `max` characters, ending in "..." when shortened. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3))}...`;
}

/** Lower-cased, trimmed, non-blank search terms for matching. */
export function normalizeTerms(terms: readonly string[]): string[] {
  return terms.map((term) => term.trim().toLowerCase()).filter(Boolean);
}

export function countMatches(haystack: string, terms: readonly string[]): number {
  if (!haystack) return 0;
  const lowered = haystack.toLowerCase();
  return terms.filter((term) => lowered.includes(term)).length;
}

/** Number of terms matching at least one item, substring in either direction. */
export function countListMatches(items: readonly string[], terms: readonly string[]): number {
  const lowered = items.map((item) => item.toLowerCase().replace(/^#/, '').trim()).filter(Boolean);
  if (lowered.length === 0) return 0;
  return terms.filter((term) => lowered.some((item) => item.includes(term) || term.includes(item))).length;
}

/** JSON with object keys sorted, so equal records serialize identically. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
