/**
 * Stage 1: Requirement Extraction
 *
 * Turns a client record into the targeting requirements the rest of the chain
 * works from. Deterministic; a platform mismatch is a hard failure, never
 * silently corrected.
 */

import { PipelineError } from '../lib/errors.js';
import { isSupportedPlatform, normalizePlatform, type ClientRecord } from '../audience/types.js';
import type { GenerationRequirements } from './types.js';

/** Trimmed, whitespace-collapsed terms; blanks and case-insensitive repeats dropped. */
export function cleanSearchTerms(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];
  for (const term of terms) {
    const value = term.replace(/\s+/g, ' ').trim();
    const key = value.toLowerCase();
    if (!value || seen.has(key)) continue;
    seen.add(key);
    cleaned.push(value);
  }
  return cleaned;
}

function cleanOptional(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function extractRequirements(client: ClientRecord, requestedPlatform?: string): GenerationRequirements {
  const registered = normalizePlatform(client.platform);
  if (!isSupportedPlatform(registered)) {
    throw new PipelineError('UnsupportedPlatform', `Unsupported platform: ${client.platform}`);
  }

  if (requestedPlatform !== undefined) {
    const requested = normalizePlatform(requestedPlatform);
    if (!isSupportedPlatform(requested)) {
      throw new PipelineError('UnsupportedPlatform', `Unsupported platform: ${requestedPlatform}`);
    }
    if (requested !== registered) {
      throw new PipelineError(
        'ChainValidationFailure',
        `Requested platform ${requested} does not match the client's registered platform ${registered}`,
      );
    }
  }

  return {
    client_id: client.id,
    client_name: client.name,
    client_role: cleanOptional(client.role),
    platform: registered,
    search_terms: cleanSearchTerms(client.search_terms),
    preferred_profession: cleanOptional(client.preferred_profession),
    preferred_location: cleanOptional(client.preferred_location),
  };
}
