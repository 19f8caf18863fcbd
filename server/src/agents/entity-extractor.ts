import { z } from 'zod';
import { ENTITY_MODEL, extractResponseText, getAnthropicClient } from '../lib/anthropic.js';
import logger from '../lib/logger.js';
import { extractProperTerms, isAcronym } from '../scoring/proper-terms.js';
import type { EntityExtractor } from '../scoring/types.js';

const entityPayloadSchema = z.object({
  entities: z.array(z.string()),
});

const SYSTEM_PROMPT = `You tag named entities in résumé text for a grammar checker's allow-list.
Return every proper noun, organisation, product, technology, framework, certification,
programming language, place and person name exactly as written in the text.
Do not return ordinary English words. Do not explain.`;

/**
 * Pull the JSON object out of a model reply that may wrap it in markdown
 * fences or surrounding prose.
 */
export function parseEntityPayload(text: string): string[] {
  const cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new Error('Entity extractor reply contained no JSON object');
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned.slice(start, end + 1));
  } catch (err) {
    throw new Error(`Entity extractor reply was not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = entityPayloadSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Entity extractor reply had an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data.entities.map((e) => e.trim()).filter((e) => e.length > 0);
}

export interface LlmEntityExtractorOptions {
  model?: string;
  maxTokens?: number;
}

/**
 * Entity extractor backed by the Anthropic Messages API. Acronyms are added
 * from the local rule since models tend to skip plain ALL-CAPS tokens.
 */
export function createLlmEntityExtractor(options: LlmEntityExtractorOptions = {}): EntityExtractor {
  const model = options.model ?? ENTITY_MODEL;
  const maxTokens = options.maxTokens ?? 2048;

  return {
    async extract(text) {
      const response = await getAnthropicClient().messages.create({
        model,
        max_tokens: maxTokens,
        system: SYSTEM_PROMPT,
        messages: [
          {
            role: 'user',
            content: `RESUME TEXT:
${text}

Return ONLY valid JSON:
{ "entities": ["..."] }`,
          },
        ],
      });

      const entities = new Set(parseEntityPayload(extractResponseText(response)));
      for (const term of extractProperTerms(text)) {
        if (isAcronym(term)) entities.add(term);
      }
      logger.debug({ model, entities: entities.size }, 'LLM entity extraction complete');
      return entities;
    },
  };
}
