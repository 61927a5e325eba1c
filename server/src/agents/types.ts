/**
 * Stage inputs and outputs for the outreach generation chain.
 *
 * requirements → candidate retrieval → message synthesis. Each stage only
 * sees the previous stage's output.
 */

import type { CandidateOutput } from '../audience/retrieval.js';
import type { MessageProvenance, Platform } from '../audience/types.js';

// ─── Stage 1: Requirements ──────────────────────────────────────────

export interface GenerationRequirements {
  client_id: string;
  client_name: string;
  client_role: string | null;
  platform: Platform;
  search_terms: string[];
  preferred_profession: string | null;
  preferred_location: string | null;
}

// ─── Stage 2: Candidate ─────────────────────────────────────────────

export type { CandidateOutput };

// ─── Stage 3: Message ───────────────────────────────────────────────

export type MessageOutcome = 'generated' | 'insufficient_data';

export interface SynthesizedMessage {
  outcome: MessageOutcome;
  platform: string;
  message: string;
  provenance: MessageProvenance;
}

export interface ChainOutput extends SynthesizedMessage {
  /** Stage 3 attempts spent, including the successful one. */
  iterations: number;
  candidate_score: number | null;
}
