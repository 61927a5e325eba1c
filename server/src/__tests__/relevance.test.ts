import { describe, it, expect } from 'vitest';
import { scoreCandidates, scoreRecord } from '../audience/relevance.js';
import { countListMatches, readNumber, truncate } from '../audience/fields.js';
import { instagramPosts } from './fixtures.js';

describe('scoreCandidates', () => {
  it('scores instagram hashtags and engagement and orders best first', () => {
    const first = { hashtags: ['beauty', 'makeup'], likes: 15, comments: 3 };
    const second = { hashtags: ['travel'], likes: 0, comments: 0 };

    const scored = scoreCandidates('instagram', [second, first], ['beauty']);

    expect(scored).toEqual([
      { record: first, relevance_score: 5 },
      { record: second, relevance_score: 0 },
    ]);
  });

  it('keeps input order for equal scores', () => {
    const a = { caption: 'alpha', hashtags: ['x'] };
    const b = { caption: 'beta', hashtags: ['y'] };
    const c = { caption: 'gamma', hashtags: ['z'] };

    const scored = scoreCandidates('instagram', [a, b, c], ['makeup']);

    expect(scored.map((entry) => entry.record)).toEqual([a, b, c]);
    expect(scored.every((entry) => entry.relevance_score === 0)).toBe(true);
  });

  it('returns every candidate with score 0 when no usable terms are given', () => {
    const scored = scoreCandidates('instagram', instagramPosts, ['  ', '']);
    expect(scored.map((entry) => entry.relevance_score)).toEqual([0, 0, 0]);
    expect(scored.map((entry) => entry.record)).toEqual(instagramPosts);
  });

  it('ranks the sample instagram posts', () => {
    const scored = scoreCandidates('instagram', instagramPosts, ['Makeup', 'skincare']);
    expect(scored.map((entry) => [entry.record.ownerUsername, entry.relevance_score])).toEqual([
      ['glowdaily', 7],
      ['palettepro', 4],
      ['trailwalker', 0],
    ]);
  });
});

describe('scoreRecord', () => {
  it('weights linkedin headline, summary, industry and recent experience', () => {
    const record = {
      fullName: 'Jane Doe',
      headline: 'Skincare Marketing Lead',
      summary: 'Ten years in skincare brands',
      industry: 'Cosmetics',
      experience: [{ title: 'Marketing Lead', companyName: 'Skincare Co' }],
      connectionsCount: 650,
    };
    // headline 4 + summary 3 + industry 0 + experience 2 + connections 1
    expect(scoreRecord('linkedin', record, ['skincare'])).toBe(10);
  });

  it('only looks at the three most recent linkedin roles', () => {
    const record = {
      experience: ['Retail', 'Retail', 'Retail', 'Skincare consultant'],
    };
    expect(scoreRecord('linkedin', record, ['skincare'])).toBe(0);
  });

  it('adds facebook audience size and the overall rating', () => {
    const record = {
      categories: ['Beauty, cosmetic & personal care'],
      info: ['Makeup lessons for beginners'],
      title: 'Makeup Corner',
      about: 'Makeup tutorials',
      likes: 1250,
      followers: 1399,
      ratingOverall: 4.6,
    };
    // categories 0 (no 'makeup' substring either way) + info 3 + title 2 + about 3
    // + floor(1250/100)=12 + floor(1399/100)=13 + round(4.6)=5
    expect(scoreRecord('facebook', record, ['makeup'])).toBe(38);
  });

  it('counts a numeric-string overall rating', () => {
    expect(scoreRecord('facebook', { categories: ['Spa'], ratingOverall: '4.6' }, ['nails'])).toBe(5);
  });

  it('ignores a textual facebook rating', () => {
    expect(scoreRecord('facebook', { rating: '90% recommend (120 Reviews)' }, ['makeup'])).toBe(0);
  });

  it('falls back to generic field matching for other platforms', () => {
    const record = { username: 'makeupfan', bio: 'Skincare notes', caption: '' };
    expect(scoreRecord('tiktok', record, ['makeup', 'skincare', 'travel'])).toBe(4);
  });
});

describe('field helpers', () => {
  it('counts each term once against a list, either direction, ignoring #', () => {
    expect(countListMatches(['#MakeupArtist', 'glow'], ['makeup', 'glowing', 'travel'])).toBe(2);
  });

  it('reads comma-formatted numeric strings', () => {
    expect(readNumber({ likes: '1,204' }, 'likes')).toBe(1204);
    expect(readNumber({ likes: 'many' }, 'likes')).toBe(0);
  });

  it('truncates with a trailing ellipsis inside the limit', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });
});
