/**
 * Stage 2: Candidate Retrieval
 *
 * Picks the single best-ranked stored profile for the requirements. Absence
 * of a usable profile is returned as data, not thrown, so Stage 3 can say so.
 */

import { findTopCandidate } from '../audience/retrieval.js';
import type { AudienceRepository } from '../audience/repositories.js';
import type { CandidateOutput, GenerationRequirements } from './types.js';

export async function retrieveCandidate(
  requirements: GenerationRequirements,
  audience: AudienceRepository,
): Promise<CandidateOutput> {
  return findTopCandidate(
    audience,
    requirements.client_id,
    requirements.platform,
    requirements.search_terms,
  );
}
