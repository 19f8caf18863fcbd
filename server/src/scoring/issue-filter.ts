import type { AllowList } from './allow-list.js';
import { clampOffset } from './position.js';
import type { FlaggedIssue, IssueMatch, ScoredReport } from './types.js';

/** Quality points lost per error per 100 words. */
export const ERROR_WEIGHT = 5.0;

/** Characters taken from the offset when a match has neither length nor context. */
export const FALLBACK_SNIPPET_LENGTH = 40;

/** Checker rules that flag formatting rather than language quality. */
export const COSMETIC_RULES: ReadonlySet<string> = new Set([
  'WHITESPACE_RULE',
  'COMMA_PARENTHESIS_WHITESPACE',
  'PUNCTUATION_PARAGRAPH_END',
  'UPPERCASE_SENTENCE_START',
  'HYPHENATION',
]);

const WORD_RE = /[\p{L}\p{N}_]+/gu;

export interface FilterOptions {
  cosmeticRules?: ReadonlySet<string>;
}

export interface FilterResult {
  issues: FlaggedIssue[];
  report: ScoredReport;
}

export function countWords(text: string): number {
  return text.match(WORD_RE)?.length ?? 0;
}

/**
 * The text a match points at. A missing span falls back to the checker's
 * context, then to a fixed window from the offset; both are approximate.
 */
export function matchSnippet(text: string, match: IssueMatch): string {
  const start = clampOffset(text, match.offset);
  const length = match.length ?? 0;
  if (length > 0) {
    return text.slice(start, start + length).trim();
  }
  const context = match.context?.trim();
  if (context) return context;
  return text.slice(start, start + FALLBACK_SNIPPET_LENGTH).trim();
}

export function scoreErrors(wordCount: number, errorCount: number): ScoredReport {
  const errorsPer100Words = wordCount > 0 ? (errorCount / wordCount) * 100 : 0;
  return {
    wordCount,
    errorCount,
    errorsPer100Words,
    qualityScore: Math.max(0, 100 - ERROR_WEIGHT * errorsPer100Words),
  };
}

export function filterAndScore(
  cleanedText: string,
  rawMatches: readonly IssueMatch[],
  allowList: AllowList,
  options: FilterOptions = {},
): FilterResult {
  const cosmetic = options.cosmeticRules ?? COSMETIC_RULES;
  const issues: FlaggedIssue[] = [];

  for (const match of rawMatches) {
    if (match.ruleId !== undefined && cosmetic.has(match.ruleId)) continue;

    const snippet = matchSnippet(cleanedText, match);
    if (allowList.has(snippet)) continue;

    issues.push({ snippet, match });
  }

  // Array#sort is stable, so equal offsets keep checker order.
  issues.sort((a, b) => a.match.offset - b.match.offset);

  return {
    issues,
    report: scoreErrors(countWords(cleanedText), issues.length),
  };
}
