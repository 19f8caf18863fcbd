import { createLlmEntityExtractor } from '../agents/entity-extractor.js';
import type { LanguageScoreConfig } from '../lib/config.js';
import { createLanguageToolChecker } from '../lib/languagetool.js';
import { createPackageRegistry } from '../lib/package-registry.js';
import type { ScoringDependencies } from './pipeline.js';
import { createHeuristicEntityExtractor } from './proper-terms.js';

/** Wire the configured collaborator adapters. */
export function createScoringDependencies(config: LanguageScoreConfig): ScoringDependencies {
  return {
    entityExtractor: config.entityExtractor === 'llm'
      ? createLlmEntityExtractor()
      : createHeuristicEntityExtractor(),
    registry: createPackageRegistry(config.packageRoot),
    checker: createLanguageToolChecker(config.languageTool),
  };
}
