import { z } from 'zod';
import { getAnthropicClient, extractResponseText } from './anthropic.js';
import logger from './logger.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface GenerationContext {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  taskId?: string;
}

/**
 * Black-box text completion. Adapters own transport and authentication;
 * callers own prompts, timeouts and retry budgets.
 */
export interface GenerationEngine {
  readonly name: string;
  readonly model: string;
  complete(prompt: string, context?: GenerationContext): Promise<string>;
}

export class EngineHttpError extends Error {
  readonly status: number;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error ${status}: ${body.slice(0, 300)}`);
    this.name = 'EngineHttpError';
    this.status = status;
  }
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
    if (!timeoutController.signal.aborted) {
      timeoutController.abort();
    }
  };

  return { signal: combinedController.signal, cleanup };
}

interface EngineDefaults {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// ─── Anthropic engine ────────────────────────────────────────────────

export class AnthropicEngine implements GenerationEngine {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly defaults: EngineDefaults;

  constructor(config: EngineDefaults & { apiKey?: string }) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.defaults = config;
  }

  async complete(prompt: string, context: GenerationContext = {}): Promise<string> {
    const anthropic = getAnthropicClient(this.apiKey);
    const response = await anthropic.messages.create(
      {
        model: this.model,
        max_tokens: context.maxTokens ?? this.defaults.maxTokens,
        temperature: context.temperature ?? this.defaults.temperature,
        ...(context.system ? { system: context.system } : {}),
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: context.signal, timeout: this.defaults.timeoutMs },
    );

    logger.debug({
      task_id: context.taskId,
      provider: this.name,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    }, 'Generation engine usage');

    return extractResponseText(response);
  }
}

// ─── OpenAI-compatible engine ────────────────────────────────────────

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

interface OpenAICompatibleConfig extends EngineDefaults {
  apiKey: string;
  baseUrl: string;
}

export class OpenAICompatibleEngine implements GenerationEngine {
  readonly name = 'openai';
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaults: EngineDefaults;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.defaults = config;
  }

  async complete(prompt: string, context: GenerationContext = {}): Promise<string> {
    const messages = [
      ...(context.system ? [{ role: 'system', content: context.system }] : []),
      { role: 'user', content: prompt },
    ];
    const { signal: combinedSignal, cleanup: cleanupCombinedSignal } = createCombinedAbortSignal(
      context.signal,
      this.defaults.timeoutMs,
    );
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: context.maxTokens ?? this.defaults.maxTokens,
          temperature: context.temperature ?? this.defaults.temperature,
        }),
        signal: combinedSignal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new EngineHttpError(this.name, response.status, errText);
      }

      const parsed = chatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`${this.name} API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      }

      logger.debug({
        task_id: context.taskId,
        provider: this.name,
        input_tokens: parsed.data.usage?.prompt_tokens ?? 0,
        output_tokens: parsed.data.usage?.completion_tokens ?? 0,
      }, 'Generation engine usage');

      return parsed.data.choices[0]?.message.content ?? '';
    } finally {
      cleanupCombinedSignal();
    }
  }
}
