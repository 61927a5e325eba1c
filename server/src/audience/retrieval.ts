import type { PipelineErrorKind } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { scoreCandidates } from './relevance.js';
import type { AudienceRepository } from './repositories.js';
import { standardizeProfiles } from './standardize.js';
import type { CanonicalProfile } from './types.js';
import { filterValid } from './validity.js';

export interface CandidateError {
  kind: Extract<PipelineErrorKind, 'NoValidCandidate'>;
  error: string;
  platform: string;
}

export type CandidateOutput = CanonicalProfile | CandidateError;

export function isCandidateError(output: CandidateOutput): output is CandidateError {
  return 'error' in output;
}

export interface RankedAudience {
  stored: number;
  valid: number;
  profiles: CanonicalProfile[];
}

/**
 * Stored records for a client ranked best first: validity filter, relevance
 * scoring, then standardization. Records that fail standardization drop out.
 */
export async function rankAudience(
  audience: AudienceRepository,
  clientId: string,
  platform: string,
  searchTerms: readonly string[],
): Promise<RankedAudience> {
  const stored = await audience.list(clientId, platform);
  const valid = filterValid(platform, stored.map((row) => row.payload));
  const scored = scoreCandidates(platform, valid, searchTerms);
  const profiles = standardizeProfiles(platform, scored).filter((profile) => profile.has_valid_content);
  logger.debug({
    client_id: clientId,
    platform,
    stored: stored.length,
    valid: valid.length,
    standardized: profiles.length,
  }, 'Ranked audience');
  return { stored: stored.length, valid: valid.length, profiles };
}

/** Top-ranked profile, or an explicit error object when there is none. */
export async function findTopCandidate(
  audience: AudienceRepository,
  clientId: string,
  platform: string,
  searchTerms: readonly string[],
): Promise<CandidateOutput> {
  const ranked = await rankAudience(audience, clientId, platform, searchTerms);
  if (ranked.stored === 0) {
    return { kind: 'NoValidCandidate', error: `No ${platform} data found`, platform };
  }
  const [top] = ranked.profiles;
  if (!top) {
    return { kind: 'NoValidCandidate', error: `No valid ${platform} profiles found`, platform };
  }
  return top;
}
