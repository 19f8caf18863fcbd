import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { runIdMiddleware } from './middleware/run-id.js';
import { createLanguageScoreRoutes } from './routes/language-score.js';
import { loadConfig, type LanguageScoreConfig } from './lib/config.js';
import { createScoringDependencies } from './scoring/dependencies.js';
import type { ScoringDependencies } from './scoring/pipeline.js';
import logger from './lib/logger.js';

export function createApp(
  config: LanguageScoreConfig = loadConfig(),
  deps: ScoringDependencies = createScoringDependencies(config),
) {
  const app = new Hono();

  app.use('*', runIdMiddleware);

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      languagetool_url: config.languageTool.baseUrl,
      entity_extractor: config.entityExtractor,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/language-score', createLanguageScoreRoutes({
    deps,
    manualTerms: config.manualTerms,
    unwrapLinebreakHyphens: config.unwrapLinebreakHyphens,
    maxBodyBytes: config.maxScoreBodyBytes,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const runId = c.get('runId');
    logger.error({ err, runId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', run_id: runId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (!server) return;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(config: LanguageScoreConfig = loadConfig()) {
  if (server) return server;

  const app = createApp(config);
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Language scorer listening at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
