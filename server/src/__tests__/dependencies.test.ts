import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { createScoringDependencies } from '../scoring/dependencies.js';

describe('createScoringDependencies', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses the heuristic extractor by default', async () => {
    const deps = createScoringDependencies(loadConfig({}));
    await expect(deps.entityExtractor.extract('deployed on AWS')).resolves.toEqual(new Set(['AWS']));
  });

  it('reads installed packages under the configured root', async () => {
    const deps = createScoringDependencies(loadConfig({ PACKAGE_ROOT: join(tmpdir(), 'no-such-package-root') }));
    await expect(deps.registry.listNames()).resolves.toEqual(new Set());
  });

  it('needs an API key before the LLM extractor can run', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    const deps = createScoringDependencies(loadConfig({ ENTITY_EXTRACTOR: 'llm' }));
    await expect(deps.entityExtractor.extract('text')).rejects.toThrow(
      'ANTHROPIC_API_KEY environment variable is required when ENTITY_EXTRACTOR=llm',
    );
  });
});
