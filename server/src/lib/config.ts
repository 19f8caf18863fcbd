export function envBool(key: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseTermList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map((t) => t.trim()).filter((t) => t.length > 0);
}

export type EntityExtractorKind = 'heuristic' | 'llm';

export interface LanguageScoreConfig {
  languageTool: {
    baseUrl: string;
    language: string;
    timeoutMs: number;
  };
  unwrapLinebreakHyphens: boolean;
  manualTerms: string[];
  entityExtractor: EntityExtractorKind;
  packageRoot: string;
  port: number;
  maxScoreBodyBytes: number;
}

/**
 * Read the scorer configuration from the environment. Called once per process
 * entry point; library callers pass explicit options instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LanguageScoreConfig {
  const extractor = env.ENTITY_EXTRACTOR?.toLowerCase();
  return {
    languageTool: {
      baseUrl: (env.LANGUAGETOOL_URL ?? 'http://localhost:8081').replace(/\/+$/, ''),
      language: env.LANGUAGETOOL_LANGUAGE ?? 'auto',
      timeoutMs: parsePositiveInt(env.LANGUAGETOOL_TIMEOUT_MS, 30_000),
    },
    unwrapLinebreakHyphens: envBool('UNWRAP_LINEBREAK_HYPHENS', true, env),
    manualTerms: parseTermList(env.ALLOW_TERMS),
    entityExtractor: extractor === 'llm' ? 'llm' : 'heuristic',
    packageRoot: env.PACKAGE_ROOT ?? process.cwd(),
    port: parsePositiveInt(env.PORT, 3001),
    maxScoreBodyBytes: parsePositiveInt(env.MAX_SCORE_BODY_BYTES, 512_000),
  };
}
