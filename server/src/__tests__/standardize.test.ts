import { describe, it, expect } from 'vitest';
import { instagramBio, instagramUsername, standardizeProfile, standardizeProfiles } from '../audience/standardize.js';

describe('instagramUsername', () => {
  it('reads the handle from a profile url', () => {
    expect(instagramUsername({ url: 'https://www.instagram.com/glowdaily/' })).toBe('glowdaily');
  });

  it('skips post paths and falls back to the owner', () => {
    expect(instagramUsername({ url: 'https://www.instagram.com/p/AAA111/', ownerUsername: 'glowdaily' })).toBe('glowdaily');
    expect(instagramUsername({ url: 'https://www.instagram.com/reel/AAA111/', ownerId: '77' })).toBe('user_77');
    expect(instagramUsername({})).toBe('instagram_user');
  });
});

describe('instagramBio', () => {
  it('keeps up to two lines that are not hashtag-heavy', () => {
    const caption = '#ad #glow\nFresh skin all week\nTry the serum #one #two #three\nThird line\nFourth line';
    expect(instagramBio(caption)).toBe('Fresh skin all week Third line');
  });

  it('describes a creator when no caption line qualifies', () => {
    expect(instagramBio('')).toBe('Instagram content creator');
    expect(instagramBio('#makeup #glow')).toBe('Creative Instagram content creator');
  });
});

describe('standardizeProfile', () => {
  it('maps an instagram post to a canonical profile', () => {
    const profile = standardizeProfile('instagram', {
      record: {
        url: 'https://www.instagram.com/p/AAA111/',
        caption: 'Morning routine',
        hashtags: ['skincare', 'glow'],
        likesCount: 120,
        commentsCount: 8,
        ownerUsername: 'glowdaily',
        ownerId: '9001',
        type: 'Image',
      },
      relevance_score: 7,
    });

    expect(profile).toEqual({
      platform: 'instagram',
      username: 'glowdaily',
      bio: 'Morning routine',
      profile_url: 'https://www.instagram.com/glowdaily/',
      has_valid_content: true,
      relevance_score: 7,
      details: {
        hashtags: ['skincare', 'glow'],
        recent_post: { caption: 'Morning routine', likes: 120, comments: 8, url: 'https://www.instagram.com/p/AAA111/' },
        post_engagement: { likes: 120, comments: 8, engagement_score: 1.6 },
        content_type: 'Image',
        post_date: null,
        owner_id: '9001',
      },
    });
  });

  it('maps a linkedin record', () => {
    const profile = standardizeProfile('linkedin', {
      record: {
        firstName: 'Jane',
        lastName: 'Doe',
        summary: 'Skincare brand builder',
        experience: [{ title: 'Lead', companyName: 'Glow Co' }, 'Intern at Salon', { title: 'A' }, { title: 'B' }],
        skills: ['Branding', { name: 'Retail' }],
        location: { linkedinText: 'Austin, Texas' },
        companyName: 'Glow Co',
        profileUrl: 'https://www.linkedin.com/in/jane-doe',
        connections: '1,200',
      },
      relevance_score: 3,
    });

    expect(profile?.platform).toBe('linkedin');
    if (profile?.platform !== 'linkedin') return;
    expect(profile.username).toBe('Jane Doe');
    expect(profile.bio).toBe('Skincare brand builder');
    expect(profile.profile_url).toBe('https://www.linkedin.com/in/jane-doe');
    expect(profile.details.headline).toBeNull();
    expect(profile.details.experience).toHaveLength(3);
    expect(profile.details.skills).toEqual(['Branding', 'Retail']);
    expect(profile.details.connections).toBe(1200);
    expect(profile.details.location).toBe('Austin, Texas');
  });

  it('keeps a linkedin record whose skills are objects without a name', () => {
    const profile = standardizeProfile('linkedin', {
      record: { fullName: 'Mia Park', headline: 'Skincare lead', skills: [{ title: 'SEO' }, { endorsements: 4 }] },
      relevance_score: 4,
    });

    expect(profile?.platform).toBe('linkedin');
    if (profile?.platform !== 'linkedin') return;
    expect(profile.username).toBe('Mia Park');
    expect(profile.details.skills).toEqual(['SEO']);
  });

  it('builds the facebook bio from categories and about text', () => {
    const profile = standardizeProfile('facebook', {
      record: {
        pageName: 'Glow Spa',
        categories: ['Spa', 'Beauty salon'],
        about: 'Facials and brow shaping in the heart of downtown',
        likes: 900,
        ratingOverall: 4.8,
        rating: '96% recommend',
        pageUrl: 'https://www.facebook.com/glowspa',
      },
      relevance_score: 12,
    });

    expect(profile?.platform).toBe('facebook');
    if (profile?.platform !== 'facebook') return;
    expect(profile.username).toBe('Glow Spa');
    expect(profile.bio).toBe('Spa, Beauty salon | Facials and brow shaping in the heart of downtown');
    expect(profile.details.rating).toEqual({ text: '96% recommend', overall: 4.8, count: null });
    expect(profile.profile_url).toBe('https://www.facebook.com/glowspa');
  });

  it('uses the generic shape for other platforms', () => {
    const profile = standardizeProfile('tiktok', {
      record: { username: 'creator', bio: 'Short videos', hashtags: ['fyp'] },
      relevance_score: 2,
    });
    expect(profile).toEqual({
      platform: 'generic',
      username: 'creator',
      bio: 'Short videos',
      profile_url: '',
      has_valid_content: true,
      relevance_score: 2,
      details: { source_platform: 'tiktok', hashtags: ['fyp'], location: null },
    });
  });

  it('returns null for a record with mis-shaped known fields', () => {
    expect(standardizeProfile('instagram', { record: { caption: 'ok', hashtags: 'not-a-list' }, relevance_score: 1 })).toBeNull();
  });

  it('drops failed records from a batch', () => {
    const profiles = standardizeProfiles('linkedin', [
      { record: { fullName: 'Ana Ruiz', headline: 'Makeup artist' }, relevance_score: 4 },
      { record: { fullName: 'Bo Chen', skills: 'many' }, relevance_score: 2 },
    ]);
    expect(profiles.map((profile) => profile.username)).toEqual(['Ana Ruiz']);
  });
});
