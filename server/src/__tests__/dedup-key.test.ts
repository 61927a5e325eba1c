import { describe, it, expect } from 'vitest';
import { computeDedupKey, normalizeUrl } from '../audience/dedup-key.js';

describe('normalizeUrl', () => {
  it('drops query, fragment and trailing slashes and lower-cases the host', () => {
    expect(normalizeUrl('https://WWW.Instagram.com/p/AbC123/?igsh=xyz#top')).toBe('https://www.instagram.com/p/AbC123');
  });

  it('leaves unparsable values trimmed', () => {
    expect(normalizeUrl('  not a url/ ')).toBe('not a url');
  });
});

describe('computeDedupKey', () => {
  it('prefers the canonical url', () => {
    const a = computeDedupKey('instagram', { url: 'https://www.instagram.com/p/AAA/', caption: 'one' }, 0);
    const b = computeDedupKey('instagram', { url: 'https://www.instagram.com/p/AAA?utm=1', caption: 'two' }, 5);
    expect(a).toBe('url:https://www.instagram.com/p/AAA');
    expect(b).toBe(a);
  });

  it('falls back to the platform id', () => {
    expect(computeDedupKey('instagram', { shortCode: 'XYZ', caption: 'hi' }, 0)).toBe('id:XYZ');
    expect(computeDedupKey('linkedin', { publicIdentifier: 'jane-doe' }, 0)).toBe('id:jane-doe');
  });

  it('hashes content fields when there is no url or id', () => {
    const record = { fullName: 'Jane Doe', headline: 'Skincare Marketing Lead' };
    const key = computeDedupKey('linkedin', record, 0);
    expect(key).toMatch(/^hash:[0-9a-f]{32}$/);
    expect(computeDedupKey('linkedin', { headline: 'Skincare Marketing Lead', fullName: 'Jane Doe' }, 9)).toBe(key);
    expect(computeDedupKey('linkedin', { fullName: 'Jane Doe', headline: 'Buyer' }, 0)).not.toBe(key);
  });

  it('ignores fields stamped on by ingestion', () => {
    const record = { pageName: 'Glow Spa', categories: ['Spa'] };
    const stamped = { ...record, client_id: 'c1', fetched_at: '2026-01-01T00:00:00Z', platform: 'facebook' };
    expect(computeDedupKey('facebook', stamped, 0)).toBe(computeDedupKey('facebook', record, 0));
  });

  it('uses a synthetic key for records without identity', () => {
    expect(computeDedupKey('instagram', { likesCount: 0 }, 3, () => 1700000000000)).toBe('synthetic:instagram:3:1700000000000');
  });
});
