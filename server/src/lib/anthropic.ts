import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;
let clientKey: string | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(apiKey: string | undefined): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  if (!anthropicClient || clientKey !== apiKey) {
    // SDK-level retries stay off; the generation chain owns the retry budget.
    anthropicClient = new Anthropic({ apiKey, maxRetries: 0 });
    clientKey = apiKey;
  }
  return anthropicClient;
}

/**
 * Concatenated text of every text block in an Anthropic API response.
 * Returns an empty string if there is none.
 */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
