/**
 * Shared types for the language-quality scoring pipeline.
 */

/** One problem reported by a grammar/style checker. */
export interface IssueMatch {
  /** 0-based character offset into the cleaned text. */
  offset: number;
  /** Span length. Absent or 0 means the checker did not report one. */
  length?: number;
  ruleId?: string;
  message?: string;
  replacements?: string[];
  issueType?: string;
  /** Checker-provided context string, used as a snippet fallback. */
  context?: string;
}

/** A match that survived filtering, with the text it flags. */
export interface FlaggedIssue {
  snippet: string;
  match: IssueMatch;
}

export interface ScoredReport {
  wordCount: number;
  errorCount: number;
  errorsPer100Words: number;
  qualityScore: number;
}

export interface LineCol {
  line: number;
  col: number;
}

// ─── Collaborators ───────────────────────────────────────────────────

export interface EntityExtractor {
  extract(text: string): Promise<Set<string>>;
}

export interface RegistryEnumerator {
  listNames(): Promise<Set<string>>;
}

export interface GrammarChecker {
  check(text: string): Promise<IssueMatch[]>;
}
