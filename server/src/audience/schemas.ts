import { z } from 'zod';
import { SUPPORTED_PLATFORMS, type AudienceRecord, type ClientRecord } from './types.js';

// ─── Stored rows ─────────────────────────────────────────────────────

const provenanceSchema = z.object({
  target_username: z.string().nullable(),
  platform: z.string(),
  rationale: z.string(),
  fields_used: z.array(z.string()),
});

export const clientRecordSchema: z.ZodType<ClientRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  role: z.string().nullable(),
  email: z.string().nullable(),
  platform: z.enum(SUPPORTED_PLATFORMS),
  search_terms: z.array(z.string()),
  preferred_profession: z.string().nullable(),
  preferred_location: z.string().nullable(),
  status: z.enum(['registered', 'data_fetched', 'messages_generated', 'failed']),
  created_at: z.string(),
  data_fetched_at: z.string().nullable(),
  profiles_count: z.number().int(),
  messages_generated_at: z.string().nullable(),
  generated_message: z.string().nullable(),
  generation_provenance: provenanceSchema.nullable(),
  last_error: z.string().nullable(),
});

export const audienceRecordSchema: z.ZodType<AudienceRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  client_id: z.string(),
  platform: z.string(),
  fetched_at: z.string(),
  unique_key: z.string(),
  position: z.number().int(),
  payload: z.record(z.unknown()),
});

// ─── Raw platform records ────────────────────────────────────────────
// Lenient: unknown keys pass through, known keys must have the expected
// shape. A mismatch means the record cannot be standardized.

const looseNumber = z.union([z.number(), z.string()]).nullish();
const looseText = z.string().nullish();

export const instagramRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  shortCode: looseText,
  url: looseText,
  caption: looseText,
  hashtags: z.array(z.string()).nullish(),
  likesCount: looseNumber,
  commentsCount: looseNumber,
  likes: looseNumber,
  comments: looseNumber,
  ownerId: z.union([z.string(), z.number()]).nullish(),
  ownerUsername: looseText,
  type: looseText,
  timestamp: looseText,
}).passthrough();

const entrySchema = z.union([z.string(), z.record(z.unknown())]);

export const linkedinRecordSchema = z.object({
  fullName: looseText,
  firstName: looseText,
  lastName: looseText,
  name: looseText,
  headline: looseText,
  summary: looseText,
  about: looseText,
  industry: looseText,
  companyName: looseText,
  company: looseText,
  location: z.union([z.string(), z.record(z.unknown())]).nullish(),
  profileUrl: looseText,
  url: looseText,
  linkedinUrl: looseText,
  publicIdentifier: looseText,
  experience: z.array(entrySchema).nullish(),
  experiences: z.array(entrySchema).nullish(),
  skills: z.array(z.union([z.string(), z.record(z.unknown())])).nullish(),
  education: z.array(entrySchema).nullish(),
  connectionsCount: looseNumber,
  connections: looseNumber,
}).passthrough();

export const facebookRecordSchema = z.object({
  pageName: looseText,
  name: looseText,
  title: looseText,
  categories: z.array(z.string()).nullish(),
  info: z.array(z.string()).nullish(),
  about: looseText,
  intro: looseText,
  likes: looseNumber,
  followers: looseNumber,
  rating: z.union([z.string(), z.number()]).nullish(),
  ratingOverall: looseNumber,
  ratingCount: looseNumber,
  phone: looseText,
  email: looseText,
  website: looseText,
  address: looseText,
  creation_date: looseText,
  profileUrl: looseText,
  pageUrl: looseText,
  facebookUrl: looseText,
  url: looseText,
}).passthrough();

export const genericRecordSchema = z.object({
  username: looseText,
  name: looseText,
  ownerUsername: looseText,
  bio: looseText,
  description: looseText,
  caption: looseText,
  hashtags: z.array(z.string()).nullish(),
  location: looseText,
  url: looseText,
  profileUrl: looseText,
}).passthrough();

// ─── Request bodies ──────────────────────────────────────────────────

const optionalText = (max: number) =>
  z
    .string()
    .max(max)
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : null));

export const registerClientSchema = z.object({
  name: z.string().trim().min(1).max(200),
  role: optionalText(200),
  email: z.string().trim().email().max(320).optional().transform((value) => value ?? null),
  platform: z.string().trim().min(1).max(40).transform((value) => value.toLowerCase()),
  search_terms: z.array(z.string().max(200)).min(1).max(25),
  preferred_profession: optionalText(200),
  preferred_location: optionalText(200),
});

export const generateMessagesSchema = z.object({
  platform: z.string().trim().min(1).max(40).optional(),
});
