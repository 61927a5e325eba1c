import { describe, it, expect, beforeEach } from 'vitest';
import { storeRecords } from '../audience/ingestion.js';
import { findTopCandidate, isCandidateError, rankAudience } from '../audience/retrieval.js';
import { computeAudienceStats } from '../audience/stats.js';
import { CLIENT_ID, instagramPosts, makeRepositories } from './fixtures.js';

describe('rankAudience', () => {
  let repos: ReturnType<typeof makeRepositories>;

  beforeEach(() => {
    repos = makeRepositories();
  });

  it('returns stored profiles best first', async () => {
    await storeRecords(CLIENT_ID, 'instagram', instagramPosts, repos);

    const ranked = await rankAudience(repos.audience, CLIENT_ID, 'instagram', ['makeup', 'skincare']);

    expect(ranked.stored).toBe(3);
    expect(ranked.valid).toBe(3);
    expect(ranked.profiles.map((profile) => [profile.username, profile.relevance_score])).toEqual([
      ['glowdaily', 7],
      ['palettepro', 4],
      ['trailwalker', 0],
    ]);
  });

  it('never ranks a record that fails the validity filter', async () => {
    await storeRecords(CLIENT_ID, 'linkedin', [
      { fullName: 'LinkedIn User', headline: 'Skincare Skincare Skincare', publicIdentifier: 'hidden' },
      { fullName: 'Jane Doe', headline: 'Skincare Marketing Lead', publicIdentifier: 'jane-doe' },
    ], repos);

    const ranked = await rankAudience(repos.audience, CLIENT_ID, 'linkedin', ['skincare']);

    expect(ranked.valid).toBe(1);
    expect(ranked.profiles.map((profile) => profile.username)).toEqual(['Jane Doe']);
  });

  it('gives the same answer on repeated calls', async () => {
    await storeRecords(CLIENT_ID, 'instagram', instagramPosts, repos);
    const first = await findTopCandidate(repos.audience, CLIENT_ID, 'instagram', ['travel']);
    const second = await findTopCandidate(repos.audience, CLIENT_ID, 'instagram', ['travel']);
    expect(second).toEqual(first);
  });
});

describe('findTopCandidate', () => {
  it('reports missing data as an error object', async () => {
    const repos = makeRepositories();
    const result = await findTopCandidate(repos.audience, CLIENT_ID, 'facebook', ['spa']);
    expect(result).toEqual({ kind: 'NoValidCandidate', error: 'No facebook data found', platform: 'facebook' });
    expect(isCandidateError(result)).toBe(true);
  });

  it('reports stored data with no valid profile', async () => {
    const repos = makeRepositories();
    await storeRecords(CLIENT_ID, 'facebook', [{ title: 'Only a title', url: 'https://www.facebook.com/empty' }], repos);

    const result = await findTopCandidate(repos.audience, CLIENT_ID, 'facebook', ['spa']);

    expect(result).toEqual({ kind: 'NoValidCandidate', error: 'No valid facebook profiles found', platform: 'facebook' });
  });
});

describe('computeAudienceStats', () => {
  it('summarizes instagram engagement', () => {
    expect(computeAudienceStats('instagram', instagramPosts)).toEqual({
      platform: 'instagram',
      avg_likes: 54.33,
      avg_comments: 3,
      unique_hashtags: 5,
    });
  });

  it('summarizes linkedin industries and connections', () => {
    expect(computeAudienceStats('linkedin', [
      { industry: 'Cosmetics', connections: 100 },
      { industry: 'Cosmetics', connectionsCount: 301 },
      { industry: '' },
    ])).toEqual({ platform: 'linkedin', industries: ['Cosmetics'], avg_connections: 133.67 });
  });

  it('summarizes facebook categories and audience', () => {
    expect(computeAudienceStats('facebook', [
      { categories: ['Spa', 'Salon'], likes: 100, followers: 150 },
      { categories: ['Spa'], likes: 300, followers: 250 },
    ])).toEqual({ platform: 'facebook', categories: ['Spa', 'Salon'], avg_likes: 200, avg_followers: 200 });
  });

  it('counts records for other platforms', () => {
    expect(computeAudienceStats('tiktok', [{}, {}])).toEqual({ platform: 'tiktok', records: 2 });
  });
});
