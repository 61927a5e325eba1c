import type { AppConfig } from './config.js';
import { AnthropicEngine, OpenAICompatibleEngine, type GenerationEngine } from './llm-provider.js';

// ─── Provider factory ────────────────────────────────────────────────

export function createGenerationEngine(config: AppConfig['llm']): GenerationEngine {
  const defaults = {
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
  };

  if (config.provider === 'anthropic') {
    // Lazily initializes the client on first use.
    return new AnthropicEngine({ ...defaults, apiKey: config.anthropicApiKey, model: config.anthropicModel });
  }

  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY environment variable is required when LLM_PROVIDER=openai');
  }
  return new OpenAICompatibleEngine({
    ...defaults,
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    model: config.openaiModel,
  });
}

/** Whether the configured provider has credentials; reported by /health. */
export function hasEngineCredentials(config: AppConfig['llm']): boolean {
  return config.provider === 'anthropic'
    ? Boolean(config.anthropicApiKey)
    : Boolean(config.openaiApiKey);
}
