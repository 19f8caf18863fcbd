import { randomUUID } from 'node:crypto';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { buildAllowList } from './allow-list.js';
import { CollaboratorError, EmptyDocumentError, type CollaboratorStage } from './errors.js';
import { filterAndScore, type FilterOptions } from './issue-filter.js';
import { normalizeText, stripNoise, type NormalizeOptions } from './normalize.js';
import { renderReport, type RenderOptions } from './report.js';
import type {
  EntityExtractor,
  FlaggedIssue,
  GrammarChecker,
  IssueMatch,
  RegistryEnumerator,
  ScoredReport,
} from './types.js';

export interface ScoringDependencies {
  entityExtractor: EntityExtractor;
  registry: RegistryEnumerator;
  checker: GrammarChecker;
}

export interface ScoringOptions extends NormalizeOptions, FilterOptions, RenderOptions {
  manualTerms?: Iterable<string>;
  runId?: string;
  logger?: Logger;
}

export interface LanguageScoreResult {
  cleanedText: string;
  issues: FlaggedIssue[];
  report: ScoredReport;
  rendered: string;
}

async function runStage<T>(log: Logger, stage: CollaboratorStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    log.error({ stage, error: err instanceof Error ? err.message : String(err) }, 'Collaborator failed');
    throw new CollaboratorError(stage, err);
  }
}

/**
 * Score one document: clean it, build the allow-list, run the checker once,
 * filter and score its matches, and render the report. Stages run strictly
 * in sequence and nothing outlives the call.
 */
export async function scoreLanguageQuality(
  rawText: string,
  deps: ScoringDependencies,
  options: ScoringOptions = {},
): Promise<LanguageScoreResult> {
  if (!rawText || !rawText.trim()) {
    throw new EmptyDocumentError();
  }
  const log = options.logger ?? createRunLogger(options.runId ?? randomUUID());

  const normalizedText = normalizeText(rawText, options);
  const cleanedText = stripNoise(normalizedText);
  log.debug(
    { raw_chars: rawText.length, normalized_chars: normalizedText.length, cleaned_chars: cleanedText.length },
    'Document cleaned',
  );

  // Entities come from the normalized text so heading lines dropped as noise
  // still contribute their acronyms.
  const allowList = await buildAllowList(
    normalizedText,
    { extract: (text) => runStage(log, 'entity_extractor', () => deps.entityExtractor.extract(text)) },
    { listNames: () => runStage(log, 'registry', () => deps.registry.listNames()) },
    options.manualTerms ?? [],
  );
  log.debug({ allow_list_size: allowList.size }, 'Allow-list built');

  let matches: IssueMatch[] = [];
  if (cleanedText) {
    matches = await runStage(log, 'checker', () => deps.checker.check(cleanedText));
  } else {
    log.warn('No prose left after noise stripping; checker skipped');
  }

  const { issues, report } = filterAndScore(cleanedText, matches, allowList, options);

  for (const { match } of issues) {
    const end = match.offset + Math.max(1, match.length ?? 0);
    if (match.offset < 0 || end > cleanedText.length) {
      log.warn(
        { offset: match.offset, length: match.length, text_length: cleanedText.length, rule_id: match.ruleId },
        'Issue span exceeds document; clamping',
      );
    }
  }

  log.info(
    {
      raw_matches: matches.length,
      word_count: report.wordCount,
      error_count: report.errorCount,
      quality_score: report.qualityScore,
    },
    'Language quality scored',
  );

  return {
    cleanedText,
    issues,
    report,
    rendered: renderReport(cleanedText, issues, report, options),
  };
}
