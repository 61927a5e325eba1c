import { createHash } from 'node:crypto';
import { readText, stableStringify } from './fields.js';
import type { RawRecord } from './types.js';

interface KeyFields {
  urls: string[];
  ids: string[];
  content: (record: RawRecord) => unknown;
}

const KEY_FIELDS: Record<string, KeyFields> = {
  instagram: {
    urls: ['url'],
    ids: ['id', 'shortCode'],
    content: (record) => [readText(record, 'ownerId'), readText(record, 'caption'), readText(record, 'timestamp')],
  },
  linkedin: {
    urls: ['profileUrl', 'url', 'linkedinUrl'],
    ids: ['publicIdentifier', 'id'],
    content: (record) => [
      readText(record, 'fullName') || `${readText(record, 'firstName')} ${readText(record, 'lastName')}`.trim(),
      readText(record, 'headline'),
      readText(record, 'summary'),
    ],
  },
  facebook: {
    urls: ['profileUrl', 'pageUrl', 'facebookUrl', 'url'],
    ids: ['id', 'pageId'],
    content: (record) => [
      readText(record, 'pageName', 'name'),
      readText(record, 'title'),
      readText(record, 'address'),
      record.categories ?? null,
    ],
  },
};

const GENERIC_FIELDS: KeyFields = {
  urls: ['url', 'profileUrl'],
  ids: ['id', 'username'],
  content: (record) => record,
};

/** Fields the ingestion step stamps onto records; never part of the identity. */
const PROVENANCE_FIELDS = new Set(['client_id', 'platform', 'fetched_at', 'unique_key']);

export function normalizeUrl(raw: string): string {
  try {
    const url = new URL(raw.trim());
    const pathname = url.pathname.replace(/\/+$/, '');
    return `${url.protocol}//${url.host.toLowerCase()}${pathname}`;
  } catch {
    return raw.trim().replace(/\/+$/, '');
  }
}

function hasContent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.some(hasContent);
  if (typeof value === 'object') return Object.values(value).some(hasContent);
  return true;
}

function withoutProvenance(record: RawRecord): RawRecord {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !PROVENANCE_FIELDS.has(key)));
}

/**
 * Stable identity for a raw record: canonical URL, then platform id, then a
 * hash of the content fields. Records with none of those get a synthetic key
 * built from the ordinal and `now`, which is unique but not reproducible.
 */
export function computeDedupKey(
  platform: string,
  record: RawRecord,
  ordinal: number,
  now: () => number = Date.now,
): string {
  const fields = KEY_FIELDS[platform] ?? GENERIC_FIELDS;
  const source = withoutProvenance(record);

  const url = readText(source, ...fields.urls);
  if (url) return `url:${normalizeUrl(url)}`;

  const id = readText(source, ...fields.ids);
  if (id) return `id:${id}`;

  const content = fields.content(source);
  if (hasContent(content)) {
    const digest = createHash('sha256').update(stableStringify(content)).digest('hex');
    return `hash:${digest.slice(0, 32)}`;
  }

  return `synthetic:${platform}:${ordinal}:${now()}`;
}
