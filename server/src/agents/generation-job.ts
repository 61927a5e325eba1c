import { isPipelineError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ClientRepository } from '../audience/repositories.js';
import type { ClientRecord } from '../audience/types.js';
import { runGenerationChain, type GenerationChainOptions } from './pipeline.js';
import type { ChainOutput } from './types.js';

export interface GenerationJobDeps extends Omit<GenerationChainOptions, 'log' | 'taskId' | 'requestedPlatform'> {
  clients: ClientRepository;
  now?: () => Date;
}

/**
 * Runs the chain for a client and records the outcome on the client row.
 * A generated message moves the client to `messages_generated`; an
 * exhausted budget marks it `failed` and rethrows so the task fails too.
 */
export async function runGenerationJob(
  client: ClientRecord,
  deps: GenerationJobDeps,
  ctx: { taskId: string; log: Logger; requestedPlatform?: string },
): Promise<ChainOutput> {
  let output: ChainOutput;
  try {
    output = await runGenerationChain(client, {
      ...deps,
      requestedPlatform: ctx.requestedPlatform,
      taskId: ctx.taskId,
      log: ctx.log,
    });
  } catch (error) {
    if (isPipelineError(error, 'ChainBudgetExceeded')) {
      await deps.clients.update(client.id, { status: 'failed', last_error: error.message });
    }
    throw error;
  }

  const timestamp = (deps.now?.() ?? new Date()).toISOString();
  if (output.outcome === 'generated') {
    await deps.clients.update(client.id, {
      status: 'messages_generated',
      messages_generated_at: timestamp,
      generated_message: output.message,
      generation_provenance: output.provenance,
      last_error: null,
    });
  } else {
    await deps.clients.update(client.id, { last_error: output.message });
  }
  return output;
}
