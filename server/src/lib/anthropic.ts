import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;

/**
 * Lazily create the Anthropic client so the heuristic extractor, the CLI and
 * the tests never need credentials.
 */
export function getAnthropicClient(): Anthropic {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when ENTITY_EXTRACTOR=llm');
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey });
  }
  return anthropicClient;
}

export const ENTITY_MODEL = process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest';

/** Concatenated text blocks of a Messages API response. */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
