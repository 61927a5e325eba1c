import axios, { isAxiosError } from 'axios';
import { PipelineError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { getStatusCode, isTransientError, withRetry } from '../lib/retry.js';
import { isRecord } from './fields.js';
import type { Platform, RawRecord } from './types.js';

export interface ProfileSourceRequest {
  platform: Platform;
  searchTerms: string[];
  profession?: string | null;
  location?: string | null;
  limit: number;
}

/**
 * Yields raw, platform-shaped records for a search. An empty array is a
 * valid answer; failures reject with a `SourceUnavailable` PipelineError.
 */
export interface ProfileSource {
  readonly name: string;
  fetch(request: ProfileSourceRequest, signal?: AbortSignal): Promise<RawRecord[]>;
}

/** Upper bound on records taken per platform per fetch. */
export const PLATFORM_RESULT_CAPS: Record<Platform, number> = {
  instagram: 20,
  linkedin: 15,
  facebook: 15,
};

const MAX_HASHTAGS = 10;
const MAX_SEARCH_QUERIES = 5;

export interface ApifyProfileSourceConfig {
  apiToken?: string;
  baseUrl: string;
  timeoutMs: number;
  actors: Record<Platform, string>;
  seedTerms: Record<Platform, string[]>;
}

export function cleanHashtag(term: string): string | null {
  const cleaned = term.replace(/\s+/g, '').replace(/[^A-Za-z0-9_]/g, '').toLowerCase();
  return cleaned.length > 2 ? cleaned : null;
}

function unique(values: Array<string | null>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (!value || seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}

function searchQueries(request: ProfileSourceRequest, seedTerms: string[]): string[] {
  const profession = request.profession?.trim() ?? '';
  const location = request.location?.trim() ?? '';
  const fromTerms = request.searchTerms.map((term) => [term.trim(), profession, location].filter(Boolean).join(' '));
  const fromSeeds = seedTerms.map((seed) => [seed, location].filter(Boolean).join(' '));
  return unique([...fromTerms, ...fromSeeds].map((query) => query || null)).slice(0, MAX_SEARCH_QUERIES);
}

/** Actor input for one platform search. */
export function buildActorInput(
  request: ProfileSourceRequest,
  seedTerms: string[],
): Record<string, unknown> {
  switch (request.platform) {
    case 'instagram': {
      const hashtags = unique([
        ...request.searchTerms.map(cleanHashtag),
        request.profession ? cleanHashtag(request.profession) : null,
        request.location ? cleanHashtag(request.location) : null,
        ...seedTerms.map(cleanHashtag),
      ]).slice(0, MAX_HASHTAGS);
      return { hashtags, resultsLimit: request.limit, addParentData: false };
    }
    case 'linkedin':
      return {
        startUrls: searchQueries(request, seedTerms).map((query) => ({
          url: `https://www.linkedin.com/search/results/people/?keywords=${encodeURIComponent(query)}`,
        })),
        maxItems: request.limit,
      };
    case 'facebook':
      return {
        startUrls: searchQueries(request, seedTerms).map((query) => ({
          url: `https://www.facebook.com/search/pages/?q=${encodeURIComponent(query)}`,
        })),
        resultsLimit: request.limit,
      };
  }
}

function describeHttpFailure(error: unknown): string {
  const status = getStatusCode(error);
  if (status === 401 || status === 403) return 'Apify rejected the API token';
  if (status === 404) return 'Apify actor not found';
  if (status === 429) return 'Apify rate limit reached';
  if (status != null && status >= 500) return `Apify service error (${status})`;
  if (isAxiosError(error) && error.code === 'ECONNABORTED') return 'Apify actor run timed out';
  return error instanceof Error ? error.message : String(error);
}

/**
 * Apify actors through the synchronous run-sync-get-dataset-items endpoint;
 * one actor per platform.
 */
export class ApifyProfileSource implements ProfileSource {
  readonly name = 'apify';
  private readonly config: ApifyProfileSourceConfig;

  constructor(config: ApifyProfileSourceConfig) {
    this.config = config;
  }

  async fetch(request: ProfileSourceRequest, signal?: AbortSignal): Promise<RawRecord[]> {
    const { apiToken, baseUrl, timeoutMs, actors, seedTerms } = this.config;
    if (!apiToken) {
      throw new PipelineError('SourceUnavailable', 'APIFY_API_TOKEN is not configured');
    }

    const actor = actors[request.platform];
    const endpoint = `${baseUrl}/acts/${actor}/run-sync-get-dataset-items`;
    const input = buildActorInput(request, seedTerms[request.platform]);
    logger.info({ platform: request.platform, actor, limit: request.limit }, 'Running profile source actor');

    let items: unknown;
    try {
      const response = await withRetry(
        () => axios.post<unknown>(endpoint, input, {
          params: { token: apiToken },
          headers: { 'Content-Type': 'application/json' },
          timeout: timeoutMs,
          signal,
        }),
        {
          maxAttempts: 2,
          baseDelay: 2_000,
          signal,
          shouldRetry: (error) => isTransientError(error) && !(isAxiosError(error) && error.code === 'ECONNABORTED'),
          onRetry: (attempt, error) => {
            logger.warn({ platform: request.platform, attempt, error: error.message }, 'Profile source retry');
          },
        },
      );
      items = response.data;
    } catch (error) {
      throw new PipelineError(
        'SourceUnavailable',
        `${request.platform} profile source failed: ${describeHttpFailure(error)}`,
        { cause: error },
      );
    }

    if (!Array.isArray(items)) {
      throw new PipelineError('SourceUnavailable', `${request.platform} profile source returned a non-list payload`);
    }
    const first: unknown = items[0];
    if (isRecord(first) && typeof first.error === 'string') {
      const description = typeof first.errorDescription === 'string' ? first.errorDescription : first.error;
      throw new PipelineError('SourceUnavailable', `${request.platform} profile source error: ${description}`);
    }

    return items.filter(isRecord);
  }
}
