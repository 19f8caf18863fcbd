export { normalizeText, stripNoise, cleanDocument, LIGATURE_MAP } from './normalize.js';
export type { NormalizeOptions } from './normalize.js';
export { AllowList, buildAllowList } from './allow-list.js';
export {
  filterAndScore,
  scoreErrors,
  countWords,
  matchSnippet,
  COSMETIC_RULES,
  ERROR_WEIGHT,
  FALLBACK_SNIPPET_LENGTH,
} from './issue-filter.js';
export type { FilterOptions, FilterResult } from './issue-filter.js';
export { offsetToLineCol, sourceLineAt, clampOffset } from './position.js';
export type { SourceLine } from './position.js';
export { renderIssue, renderSummary, renderReport, wrapText, reportWidthFor } from './report.js';
export type { RenderOptions } from './report.js';
export { createHeuristicEntityExtractor, extractProperTerms, isAcronym } from './proper-terms.js';
export { scoreLanguageQuality } from './pipeline.js';
export type { ScoringDependencies, ScoringOptions, LanguageScoreResult } from './pipeline.js';
export { EmptyDocumentError, CollaboratorError } from './errors.js';
export type { CollaboratorStage } from './errors.js';
export type {
  IssueMatch,
  FlaggedIssue,
  ScoredReport,
  LineCol,
  EntityExtractor,
  RegistryEnumerator,
  GrammarChecker,
} from './types.js';
