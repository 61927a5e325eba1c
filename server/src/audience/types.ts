export const SUPPORTED_PLATFORMS = ['instagram', 'linkedin', 'facebook'] as const;

export type Platform = (typeof SUPPORTED_PLATFORMS)[number];

export type ClientStatus = 'registered' | 'data_fetched' | 'messages_generated' | 'failed';

/** Scraped record as the profile source returned it. Shape varies per platform. */
export type RawRecord = Record<string, unknown>;

export interface MessageProvenance {
  target_username: string | null;
  platform: string;
  rationale: string;
  fields_used: string[];
}

export type ClientRecord = {
  id: string;
  name: string;
  role: string | null;
  email: string | null;
  platform: Platform;
  search_terms: string[];
  preferred_profession: string | null;
  preferred_location: string | null;
  status: ClientStatus;
  created_at: string;
  data_fetched_at: string | null;
  profiles_count: number;
  messages_generated_at: string | null;
  generated_message: string | null;
  generation_provenance: MessageProvenance | null;
  last_error: string | null;
};

export type AudienceRecord = {
  id: string;
  client_id: string;
  platform: string;
  fetched_at: string;
  unique_key: string;
  /** Ordinal within the fetch that stored it. */
  position: number;
  payload: RawRecord;
};

export interface ScoredCandidate {
  record: RawRecord;
  relevance_score: number;
}

// ─── Canonical profile ───────────────────────────────────────────────

export interface InstagramDetails {
  hashtags: string[];
  recent_post: {
    caption: string;
    likes: number;
    comments: number;
    url: string | null;
  };
  post_engagement: {
    likes: number;
    comments: number;
    engagement_score: number;
  };
  content_type: string | null;
  post_date: string | null;
  owner_id: string | null;
}

export interface LinkedInDetails {
  headline: string | null;
  experience: Array<Record<string, unknown> | string>;
  skills: string[];
  education: Array<Record<string, unknown> | string>;
  connections: number;
  industry: string | null;
  company: string | null;
  location: string | null;
}

export interface FacebookDetails {
  categories: string[];
  info: string[];
  about: string | null;
  likes: number;
  followers: number;
  rating: {
    text: string | null;
    overall: number | null;
    count: number | null;
  };
  contact: {
    phone: string | null;
    email: string | null;
    website: string | null;
  };
  page: {
    title: string | null;
    address: string | null;
    created_at: string | null;
  };
}

export interface GenericDetails {
  source_platform: string;
  hashtags: string[];
  location: string | null;
}

interface CanonicalProfileBase {
  username: string;
  bio: string;
  profile_url: string;
  has_valid_content: boolean;
  relevance_score: number;
}

export type CanonicalProfile =
  | (CanonicalProfileBase & { platform: 'instagram'; details: InstagramDetails })
  | (CanonicalProfileBase & { platform: 'linkedin'; details: LinkedInDetails })
  | (CanonicalProfileBase & { platform: 'facebook'; details: FacebookDetails })
  | (CanonicalProfileBase & { platform: 'generic'; details: GenericDetails });

export function isSupportedPlatform(value: string): value is Platform {
  return SUPPORTED_PLATFORMS.some((platform) => platform === value);
}

export function normalizePlatform(value: string): string {
  return value.trim().toLowerCase();
}
