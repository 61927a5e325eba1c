/**
 * Stage 3: Message Synthesis
 *
 * Renders the platform prompt for the chosen profile and asks the generation
 * engine for the message. A Stage 2 error short-circuits into an
 * insufficient-data acknowledgment without calling the engine.
 */

import { z } from 'zod';
import { repairJSON } from '../lib/json-repair.js';
import type { GenerationEngine } from '../lib/llm-provider.js';
import { withTimeout } from '../lib/timeout.js';
import { isCandidateError, type CandidateError } from '../audience/retrieval.js';
import type { CanonicalProfile } from '../audience/types.js';
import { SYSTEM_PROMPT, buildMessagePrompt, profileFacts } from './message-prompts.js';
import type { CandidateOutput, GenerationRequirements, SynthesizedMessage } from './types.js';

const PLACEHOLDER_PATTERN = /\[[^\]]*\b(name|username|recipient|first name)\b[^\]]*\]|\{\{?\s*\w+\s*\}?\}|<\s*(name|username)\s*>/i;

const replySchema = z.object({
  message: z.string(),
  reasoning: z.string().optional(),
});

export class UnusableReplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnusableReplyError';
  }
}

export interface MessageWriterOptions {
  engine: GenerationEngine;
  timeoutMs: number;
  taskId?: string;
}

export function insufficientDataMessage(candidate: CandidateError): SynthesizedMessage {
  const reason = candidate.error.replace(/\.$/, '');
  return {
    outcome: 'insufficient_data',
    platform: candidate.platform,
    message: `Insufficient ${candidate.platform} data to personalize a message: ${reason}.`,
    provenance: {
      target_username: null,
      platform: candidate.platform,
      rationale: reason,
      fields_used: [],
    },
  };
}

/** Message and reasoning from an engine reply; plain prose counts as the message. */
export function parseReply(text: string): { message: string; reasoning: string | null } {
  const parsed = replySchema.safeParse(repairJSON(text));
  if (parsed.success) {
    return { message: parsed.data.message.trim(), reasoning: parsed.data.reasoning?.trim() || null };
  }
  const trimmed = text.trim();
  // A JSON-looking reply without a message field is not prose.
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return { message: '', reasoning: null };
  }
  return { message: trimmed, reasoning: null };
}

function defaultRationale(profile: CanonicalProfile, fields: string[]): string {
  return fields.length > 0
    ? `Personalized from ${profile.username}'s ${fields.join(', ')}`
    : `Personalized for ${profile.username}`;
}

async function writeForProfile(
  requirements: GenerationRequirements,
  profile: CanonicalProfile,
  options: MessageWriterOptions,
): Promise<SynthesizedMessage> {
  const facts = profileFacts(profile);
  const prompt = buildMessagePrompt(requirements, profile, facts);

  const abort = new AbortController();
  const reply = await withTimeout(
    options.engine.complete(prompt, { system: SYSTEM_PROMPT, signal: abort.signal, taskId: options.taskId }),
    options.timeoutMs,
    `Generation engine timed out after ${options.timeoutMs}ms`,
    () => abort.abort(),
  );

  const { message, reasoning } = parseReply(reply);
  if (!message) {
    throw new UnusableReplyError('Generation engine returned an empty message');
  }
  if (PLACEHOLDER_PATTERN.test(message)) {
    throw new UnusableReplyError('Generation engine returned a templated message with placeholders');
  }

  return {
    outcome: 'generated',
    platform: profile.platform,
    message,
    provenance: {
      target_username: profile.username,
      platform: profile.platform,
      rationale: reasoning ?? defaultRationale(profile, facts.fields_used),
      fields_used: facts.fields_used,
    },
  };
}

/** One synthesis attempt. Throws on engine failure or an unusable reply. */
export async function synthesizeMessage(
  requirements: GenerationRequirements,
  candidate: CandidateOutput,
  options: MessageWriterOptions,
): Promise<SynthesizedMessage> {
  if (isCandidateError(candidate)) {
    return insufficientDataMessage(candidate);
  }
  return writeForProfile(requirements, candidate, options);
}
