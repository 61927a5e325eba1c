/**
 * Outreach generation chain: requirements → candidate → message.
 *
 * Stages run strictly in order and each sees only the previous stage's
 * output. Stage 3 attempts are bounded by `maxIterations`; running out raises
 * ChainBudgetExceeded with the last failure reason.
 */

import { PipelineError, errorMessage } from '../lib/errors.js';
import type { GenerationEngine } from '../lib/llm-provider.js';
import logger, { type Logger } from '../lib/logger.js';
import { isCandidateError } from '../audience/retrieval.js';
import type { AudienceRepository } from '../audience/repositories.js';
import type { ClientRecord } from '../audience/types.js';
import { retrieveCandidate } from './candidate-retrieval.js';
import { synthesizeMessage } from './message-writer.js';
import { extractRequirements } from './requirements.js';
import type { ChainOutput } from './types.js';

/** Hard ceiling on Stage 3 attempts per chain run. */
export const MAX_CHAIN_ITERATIONS = 3;

export interface GenerationChainOptions {
  audience: AudienceRepository;
  engine: GenerationEngine;
  engineTimeoutMs: number;
  maxIterations?: number;
  requestedPlatform?: string;
  taskId?: string;
  log?: Logger;
}

export async function runGenerationChain(
  client: ClientRecord,
  options: GenerationChainOptions,
): Promise<ChainOutput> {
  const log = options.log ?? logger.child({ client_id: client.id });
  const budget = Math.min(Math.max(1, options.maxIterations ?? MAX_CHAIN_ITERATIONS), MAX_CHAIN_ITERATIONS);

  const requirements = extractRequirements(client, options.requestedPlatform);
  log.info({ platform: requirements.platform, search_terms: requirements.search_terms.length }, 'Requirements extracted');

  const candidate = await retrieveCandidate(requirements, options.audience);
  if (isCandidateError(candidate)) {
    log.warn({ kind: candidate.kind, platform: candidate.platform, reason: candidate.error }, 'No usable candidate');
  } else {
    log.info({ username: candidate.username, relevance_score: candidate.relevance_score }, 'Candidate selected');
  }
  const candidateScore = isCandidateError(candidate) ? null : candidate.relevance_score;

  let lastReason = 'no attempts made';
  for (let iteration = 1; iteration <= budget; iteration++) {
    try {
      const message = await synthesizeMessage(requirements, candidate, {
        engine: options.engine,
        timeoutMs: options.engineTimeoutMs,
        taskId: options.taskId,
      });
      log.info({ outcome: message.outcome, iteration }, 'Message synthesized');
      return { ...message, iterations: iteration, candidate_score: candidateScore };
    } catch (error) {
      lastReason = errorMessage(error);
      log.warn({ iteration, budget, error: lastReason }, 'Message synthesis attempt failed');
    }
  }

  throw new PipelineError(
    'ChainBudgetExceeded',
    `Message synthesis failed after ${budget} attempt${budget === 1 ? '' : 's'}: ${lastReason}`,
  );
}
