import { clampOffset, offsetToLineCol, sourceLineAt } from './position.js';
import type { FlaggedIssue, ScoredReport } from './types.js';

const INDENT = '    ';
const MAX_SUGGESTIONS = 5;
const SUMMARY_LABEL_WIDTH = 26;

export const DEFAULT_REPORT_WIDTH = 100;

export interface RenderOptions {
  /** Column at which message lines wrap. */
  width?: number;
}

/** Terminal-derived wrap width, kept between 60 and 120 columns. */
export function reportWidthFor(columns: number | undefined): number {
  return Math.max(60, Math.min(columns ?? DEFAULT_REPORT_WIDTH, 120));
}

/**
 * Greedy word wrap. The first line keeps its own leading whitespace,
 * continuation lines start with `indent`. Words longer than a line are split.
 */
export function wrapText(text: string, width: number, indent = INDENT): string {
  const leading = /^\s*/.exec(text)?.[0] ?? '';
  const words = text.trim().split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = leading;
  let hasWord = false;

  for (const word of words) {
    const sep = hasWord ? ' ' : '';
    if (current.length + sep.length + word.length <= width) {
      current += sep + word;
      hasWord = true;
      continue;
    }
    if (hasWord) {
      lines.push(current);
      current = indent;
    }
    let rest = word;
    while (current.length + rest.length > width) {
      const room = Math.max(1, width - current.length);
      lines.push(current + rest.slice(0, room));
      rest = rest.slice(room);
      current = indent;
    }
    current += rest;
    hasWord = rest.length > 0;
  }

  if (hasWord) lines.push(current);
  return lines.join('\n');
}

/**
 * Render one issue as a caret-underlined diagnostic block. Offsets past the
 * end of the document and spans past the end of the line are clamped.
 */
export function renderIssue(
  text: string,
  issue: FlaggedIssue,
  index: number,
  options: RenderOptions = {},
): string {
  const { match } = issue;
  const width = options.width ?? DEFAULT_REPORT_WIDTH;
  const offset = clampOffset(text, match.offset);
  const { line, col } = offsetToLineCol(text, offset);
  const source = sourceLineAt(text, offset);

  const column0 = offset - source.start;
  const visible = Math.max(1, source.text.length - column0);
  const carets = Math.min(Math.max(1, match.length ?? 0), visible);

  const suggestions = (match.replacements ?? []).slice(0, MAX_SUGGESTIONS).join(', ') || '<none>';

  const lines = [
    `[${index}] Line ${line}, Col ${col}: ${match.ruleId ?? '<rule>'}`,
    INDENT + source.text,
    INDENT + ' '.repeat(column0) + '^'.repeat(carets),
    wrapText(`${INDENT}Message: ${match.message ?? ''}`, width),
    `${INDENT}Suggestions: ${suggestions}`,
  ];
  if (match.issueType) {
    lines.push(`${INDENT}Type: ${match.issueType}`);
  }
  return lines.join('\n');
}

function summaryLine(label: string, value: string): string {
  return `${label}:`.padEnd(SUMMARY_LABEL_WIDTH) + value;
}

/** Summary block. Downstream tooling parses these lines by label prefix. */
export function renderSummary(report: ScoredReport): string {
  return [
    summaryLine('Word Count', String(report.wordCount)),
    summaryLine('Grammar/Spelling Errors', String(report.errorCount)),
    summaryLine('Errors per 100 words', report.errorsPer100Words.toFixed(1)),
    summaryLine('Language Quality Score', `${report.qualityScore.toFixed(1)}/100`),
  ].join('\n');
}

export function renderReport(
  text: string,
  issues: readonly FlaggedIssue[],
  report: ScoredReport,
  options: RenderOptions = {},
): string {
  const summary = renderSummary(report);
  if (issues.length === 0) return summary;

  const blocks = issues.map((issue, i) => renderIssue(text, issue, i + 1, options));
  return [summary, 'Errors found:', ...blocks].join('\n\n');
}
