import { Hono } from 'hono';
import { z } from 'zod';
import { loadConfig } from '../lib/config.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { createRunLogger } from '../lib/logger.js';
import { CollaboratorError, EmptyDocumentError } from '../scoring/errors.js';
import { scoreLanguageQuality, type ScoringDependencies } from '../scoring/pipeline.js';

const scoreRequestSchema = z.object({
  text: z.string().max(200_000),
  allow_terms: z.array(z.string().min(1).max(200)).max(500).optional(),
});

export interface LanguageScoreRouteOptions {
  deps: ScoringDependencies;
  manualTerms?: string[];
  unwrapLinebreakHyphens?: boolean;
  maxBodyBytes?: number;
}

export function createLanguageScoreRoutes(options: LanguageScoreRouteOptions) {
  const routes = new Hono();
  const maxBodyBytes = options.maxBodyBytes ?? loadConfig().maxScoreBodyBytes;

  // POST /api/language-score: score one document and return the report
  routes.post('/', async (c) => {
    const body = await parseJsonBodyWithLimit(c, maxBodyBytes);
    if (!body.ok) return body.response;

    const parsed = scoreRequestSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const runId = c.get('runId');
    const log = createRunLogger(runId, { route: 'language-score' });

    try {
      const result = await scoreLanguageQuality(parsed.data.text, options.deps, {
        logger: log,
        manualTerms: [...(options.manualTerms ?? []), ...(parsed.data.allow_terms ?? [])],
        unwrapLinebreakHyphens: options.unwrapLinebreakHyphens,
      });

      return c.json({
        run_id: runId,
        report: {
          word_count: result.report.wordCount,
          error_count: result.report.errorCount,
          errors_per_100_words: result.report.errorsPer100Words,
          quality_score: result.report.qualityScore,
        },
        issues: result.issues.map(({ snippet, match }) => ({
          snippet,
          offset: match.offset,
          length: match.length ?? null,
          rule_id: match.ruleId ?? null,
          message: match.message ?? null,
          replacements: match.replacements ?? [],
          issue_type: match.issueType ?? null,
        })),
        rendered: result.rendered,
      });
    } catch (err) {
      if (err instanceof EmptyDocumentError) {
        return c.json({ error: err.message }, 400);
      }
      if (err instanceof CollaboratorError) {
        return c.json({ error: 'Language scoring failed', stage: err.stage, run_id: runId }, 502);
      }
      throw err;
    }
  });

  return routes;
}
