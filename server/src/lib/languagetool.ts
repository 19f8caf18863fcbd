import { z } from 'zod';
import type { GrammarChecker, IssueMatch } from '../scoring/types.js';

const languageToolMatchSchema = z.object({
  message: z.string().optional(),
  offset: z.number().int(),
  length: z.number().int().nonnegative().optional(),
  replacements: z.array(z.object({ value: z.string() })).optional(),
  context: z.object({ text: z.string() }).optional(),
  rule: z.object({
    id: z.string(),
    issueType: z.string().optional(),
  }).optional(),
});

const languageToolResponseSchema = z.object({
  matches: z.array(languageToolMatchSchema),
});

type LanguageToolMatch = z.infer<typeof languageToolMatchSchema>;

export interface LanguageToolOptions {
  /** Server root, e.g. http://localhost:8081 (no trailing /v2). */
  baseUrl: string;
  language?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function toIssueMatch(m: LanguageToolMatch): IssueMatch {
  return {
    offset: m.offset,
    length: m.length,
    ruleId: m.rule?.id,
    message: m.message,
    replacements: m.replacements?.map((r) => r.value),
    issueType: m.rule?.issueType,
    context: m.context?.text,
  };
}

/**
 * GrammarChecker over the LanguageTool HTTP API (/v2/check). One request per
 * call; transport errors, non-2xx answers and unexpected payloads all throw.
 */
export function createLanguageToolChecker(options: LanguageToolOptions): GrammarChecker {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/v2/check`;
  const language = options.language ?? 'auto';
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async check(text) {
      const response = await fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({ text, language }).toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`LanguageTool API error (${response.status}): ${error}`);
      }

      const parsed = languageToolResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(
          `LanguageTool returned an unexpected payload${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`,
        );
      }
      return parsed.data.matches.map(toIssueMatch);
    },
  };
}
