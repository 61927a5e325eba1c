import { ZodError } from 'zod';
import type { PipelineErrorKind } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { isRecord, readList, readNumber, readStringList, readText, truncate } from './fields.js';
import {
  facebookRecordSchema,
  genericRecordSchema,
  instagramRecordSchema,
  linkedinRecordSchema,
} from './schemas.js';
import type { CanonicalProfile, RawRecord, ScoredCandidate } from './types.js';
import { hasValidContent, linkedinDisplayName } from './validity.js';

const INSTAGRAM_RESERVED_PATHS = new Set(['p', 'reel', 'reels', 'tv', 'explore', 'stories']);
const INSTAGRAM_BIO_MAX = 100;
const CAPTION_EXCERPT_MAX = 150;
const LINKEDIN_BIO_MAX = 200;
const FACEBOOK_ABOUT_MAX = 120;
const GENERIC_BIO_MAX = 200;

export function instagramUsername(record: RawRecord): string {
  const url = readText(record, 'url');
  const match = /instagram\.com\/([^/?#]+)/i.exec(url);
  if (match?.[1] && !INSTAGRAM_RESERVED_PATHS.has(match[1].toLowerCase())) {
    return match[1];
  }
  const ownerUsername = readText(record, 'ownerUsername');
  if (ownerUsername) return ownerUsername;
  const ownerId = readText(record, 'ownerId');
  return ownerId ? `user_${ownerId}` : 'instagram_user';
}

/** Up to two caption lines that are not hashtag-dominant, joined and cut to 100 chars. */
export function instagramBio(caption: string): string {
  if (!caption.trim()) return 'Instagram content creator';

  const lines = caption
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#') && (line.match(/#/g) ?? []).length <= 2)
    .slice(0, 2);
  if (lines.length === 0) return 'Creative Instagram content creator';
  return truncate(lines.join(' '), INSTAGRAM_BIO_MAX);
}

function engagementScore(likes: number, comments: number): number {
  return Math.round(((likes + 5 * comments) / 100) * 100) / 100;
}

function standardizeInstagram(record: RawRecord, score: number): CanonicalProfile {
  instagramRecordSchema.parse(record);
  const username = instagramUsername(record);
  const caption = readText(record, 'caption');
  const likes = readNumber(record, 'likesCount', 'likes');
  const comments = readNumber(record, 'commentsCount', 'comments');
  const url = readText(record, 'url');

  return {
    platform: 'instagram',
    username,
    bio: instagramBio(caption),
    profile_url: `https://www.instagram.com/${username}/`,
    has_valid_content: hasValidContent('instagram', record),
    relevance_score: score,
    details: {
      hashtags: readStringList(record, 'hashtags').slice(0, 10),
      recent_post: {
        caption: truncate(caption, CAPTION_EXCERPT_MAX),
        likes,
        comments,
        url: url || null,
      },
      post_engagement: {
        likes,
        comments,
        engagement_score: engagementScore(likes, comments),
      },
      content_type: readText(record, 'type') || null,
      post_date: readText(record, 'timestamp') || null,
      owner_id: readText(record, 'ownerId') || null,
    },
  };
}

function skillName(skill: unknown): string {
  if (typeof skill === 'string') return skill.trim();
  return isRecord(skill) ? readText(skill, 'name', 'title') : '';
}

function linkedinEntries(record: RawRecord, keys: string[], max: number): Array<Record<string, unknown> | string> {
  return readList(record, ...keys)
    .filter((entry): entry is Record<string, unknown> | string => typeof entry === 'string' || isRecord(entry))
    .slice(0, max);
}

function linkedinLocation(record: RawRecord): string | null {
  const location = record.location;
  if (typeof location === 'string') return location.trim() || null;
  if (isRecord(location)) {
    return readText(location, 'linkedinText', 'default', 'city', 'country') || null;
  }
  return null;
}

function standardizeLinkedIn(record: RawRecord, score: number): CanonicalProfile {
  linkedinRecordSchema.parse(record);
  const headline = readText(record, 'headline');
  const bioSource = headline || readText(record, 'summary', 'about');

  return {
    platform: 'linkedin',
    username: linkedinDisplayName(record) || 'LinkedIn User',
    bio: truncate(bioSource, LINKEDIN_BIO_MAX),
    profile_url: readText(record, 'profileUrl', 'url', 'linkedinUrl'),
    has_valid_content: hasValidContent('linkedin', record),
    relevance_score: score,
    details: {
      headline: headline || null,
      experience: linkedinEntries(record, ['experience', 'experiences'], 3),
      skills: readList(record, 'skills').map(skillName).filter(Boolean).slice(0, 5),
      education: linkedinEntries(record, ['education'], 2),
      connections: readNumber(record, 'connectionsCount', 'connections'),
      industry: readText(record, 'industry') || null,
      company: readText(record, 'companyName', 'company') || null,
      location: linkedinLocation(record),
    },
  };
}

function facebookUsername(record: RawRecord): string {
  const name = readText(record, 'pageName', 'name');
  if (name) return name;
  const url = readText(record, 'profileUrl', 'pageUrl', 'facebookUrl', 'url');
  const match = /facebook\.com\/([^/?#]+)/i.exec(url);
  return match?.[1] ?? 'Facebook User';
}

function standardizeFacebook(record: RawRecord, score: number): CanonicalProfile {
  facebookRecordSchema.parse(record);
  const categories = readStringList(record, 'categories');
  const info = readStringList(record, 'info');
  const about = readText(record, 'about', 'intro');
  const aboutPart = truncate(about || info.join(' '), FACEBOOK_ABOUT_MAX);
  const bio = [categories.join(', '), aboutPart].filter(Boolean).join(' | ');
  const ratingText = typeof record.rating === 'string' ? record.rating.trim() : '';
  const ratingOverall = readNumber(record, 'ratingOverall');
  const ratingCount = readNumber(record, 'ratingCount');

  return {
    platform: 'facebook',
    username: facebookUsername(record),
    bio: bio || 'Facebook page',
    profile_url: readText(record, 'profileUrl', 'pageUrl', 'facebookUrl', 'url'),
    has_valid_content: hasValidContent('facebook', record),
    relevance_score: score,
    details: {
      categories,
      info,
      about: about || null,
      likes: readNumber(record, 'likes'),
      followers: readNumber(record, 'followers'),
      rating: {
        text: ratingText || null,
        overall: ratingOverall || null,
        count: ratingCount || null,
      },
      contact: {
        phone: readText(record, 'phone') || null,
        email: readText(record, 'email') || null,
        website: readText(record, 'website') || null,
      },
      page: {
        title: readText(record, 'title') || null,
        address: readText(record, 'address') || null,
        created_at: readText(record, 'creation_date') || null,
      },
    },
  };
}

function standardizeGeneric(platform: string, record: RawRecord, score: number): CanonicalProfile {
  genericRecordSchema.parse(record);
  return {
    platform: 'generic',
    username: readText(record, 'username', 'name', 'ownerUsername') || 'Unknown User',
    bio: truncate(readText(record, 'bio', 'description', 'caption'), GENERIC_BIO_MAX),
    profile_url: readText(record, 'url', 'profileUrl'),
    has_valid_content: true,
    relevance_score: score,
    details: {
      source_platform: platform,
      hashtags: readStringList(record, 'hashtags'),
      location: readText(record, 'location') || null,
    },
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps one scored raw record to the canonical profile shape. A record whose
 * known fields have the wrong structure is logged and yields null.
 */
export function standardizeProfile(platform: string, candidate: ScoredCandidate): CanonicalProfile | null {
  const { record, relevance_score: score } = candidate;
  try {
    switch (platform) {
      case 'instagram':
        return standardizeInstagram(record, score);
      case 'linkedin':
        return standardizeLinkedIn(record, score);
      case 'facebook':
        return standardizeFacebook(record, score);
      default:
        return standardizeGeneric(platform, record, score);
    }
  } catch (error) {
    const kind: PipelineErrorKind = 'StandardizationFailure';
    logger.warn({ kind, platform, error: describeFailure(error) }, 'Profile standardization failed');
    return null;
  }
}

export function standardizeProfiles(platform: string, candidates: readonly ScoredCandidate[]): CanonicalProfile[] {
  return candidates
    .map((candidate) => standardizeProfile(platform, candidate))
    .filter((profile): profile is CanonicalProfile => profile !== null);
}
