import pino from 'pino';
import { describe, it, expect, vi } from 'vitest';
import {
  CollaboratorError,
  EmptyDocumentError,
  scoreLanguageQuality,
  type IssueMatch,
  type ScoringDependencies,
} from '../scoring/index.js';

const RAW = [
  'JANE DOE',
  'EMAIL: jane@example.com',
  'Experienced engineer with Kubernets and AWS.',
  'We shiped fast-',
  'moving features.',
].join('\n');

const CLEANED = 'Experienced engineer with Kubernets and AWS.\nWe shiped fast-moving features.';

const MATCHES: IssueMatch[] = [
  { offset: 48, length: 6, ruleId: 'MORFOLOGIK_RULE_EN_US', message: 'Possible spelling mistake found.', replacements: ['shipped'] },
  { offset: 40, length: 3, ruleId: 'MORFOLOGIK_RULE_EN_US' },
  { offset: 26, length: 9, ruleId: 'MORFOLOGIK_RULE_EN_US', replacements: ['Kubernetes'] },
  { offset: 44, length: 1, ruleId: 'WHITESPACE_RULE' },
];

interface LogEntry {
  level: number;
  msg: string;
  stage?: string;
  offset?: number;
}

function captureLogger() {
  const entries: LogEntry[] = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

function makeDeps(matches: IssueMatch[] = MATCHES) {
  const extract = vi.fn(async () => new Set(['AWS']));
  const listNames = vi.fn(async () => new Set<string>());
  const check = vi.fn(async () => matches);
  const deps: ScoringDependencies = {
    entityExtractor: { extract },
    registry: { listNames },
    checker: { check },
  };
  return { deps, extract, listNames, check };
}

describe('scoreLanguageQuality', () => {
  it('cleans, filters, scores and renders a resume', async () => {
    const { deps, extract, check } = makeDeps();

    const result = await scoreLanguageQuality(RAW, deps);

    expect(result.cleanedText).toBe(CLEANED);
    expect(check).toHaveBeenCalledTimes(1);
    expect(check).toHaveBeenCalledWith(CLEANED);
    expect(extract).toHaveBeenCalledWith(
      'JANE DOE\nEMAIL: jane@example.com\nExperienced engineer with Kubernets and AWS.\nWe shiped fast-moving features.',
    );

    expect(result.issues.map((i) => i.snippet)).toEqual(['Kubernets', 'shiped']);
    expect(result.report.wordCount).toBe(11);
    expect(result.report.errorCount).toBe(2);

    const lines = result.rendered.split('\n');
    expect(lines[2]).toBe('Errors per 100 words:     18.2');
    expect(lines[3]).toBe('Language Quality Score:   9.1/100');
    expect(result.rendered).toContain('[1] Line 1, Col 27: MORFOLOGIK_RULE_EN_US');
    expect(result.rendered).toContain('[2] Line 2, Col 4: MORFOLOGIK_RULE_EN_US');
  });

  it('rejects empty and whitespace-only documents', async () => {
    const { deps, check } = makeDeps();
    await expect(scoreLanguageQuality('', deps)).rejects.toBeInstanceOf(EmptyDocumentError);
    await expect(scoreLanguageQuality(' \n\t ', deps)).rejects.toBeInstanceOf(EmptyDocumentError);
    expect(check).not.toHaveBeenCalled();
  });

  it('wraps a checker failure with its stage', async () => {
    const { deps } = makeDeps();
    deps.checker = {
      check: async () => {
        throw new Error('connection refused');
      },
    };

    const err = await scoreLanguageQuality(RAW, deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err).toMatchObject({ stage: 'checker', message: 'checker failed: connection refused' });
  });

  it('aborts before the checker when the registry fails', async () => {
    const { deps, check } = makeDeps();
    deps.registry = {
      listNames: async () => {
        throw new Error('EACCES');
      },
    };

    await expect(scoreLanguageQuality(RAW, deps)).rejects.toMatchObject({ stage: 'registry' });
    expect(check).not.toHaveBeenCalled();
  });

  it('scores a document with no prose as 100 without calling the checker', async () => {
    const { deps, check } = makeDeps();

    const result = await scoreLanguageQuality('JOHN SMITH\n555-123-4567', deps);

    expect(result.cleanedText).toBe('');
    expect(check).not.toHaveBeenCalled();
    expect(result.issues).toEqual([]);
    expect(result.report).toEqual({ wordCount: 0, errorCount: 0, errorsPer100Words: 0, qualityScore: 100 });
    expect(result.rendered).not.toContain('Errors found:');
  });

  it('suppresses manual allow-list terms', async () => {
    const { deps } = makeDeps();
    const result = await scoreLanguageQuality(RAW, deps, { manualTerms: ['kubernets'] });
    expect(result.issues.map((i) => i.snippet)).toEqual(['shiped']);
    expect(result.report.errorCount).toBe(1);
  });

  it('leaves line-end hyphens alone when unwrapping is off', async () => {
    const { deps } = makeDeps([]);
    const result = await scoreLanguageQuality(RAW, deps, { unwrapLinebreakHyphens: false });
    expect(result.cleanedText).toBe(
      'Experienced engineer with Kubernets and AWS.\nWe shiped fast-\nmoving features.',
    );
  });

  it('clamps an issue offset past the end of the document when rendering', async () => {
    const { deps } = makeDeps([{ offset: 500, length: 3, ruleId: 'X' }]);
    const result = await scoreLanguageQuality(RAW, deps);
    expect(result.rendered).toContain('[1] Line 2, Col 32: X');
  });

  it('logs one warning per issue span that runs past the document', async () => {
    const { deps } = makeDeps([
      { offset: 500, length: 3, ruleId: 'X' },
      { offset: 3, length: 6, ruleId: 'Y' },
    ]);
    const { logger, entries } = captureLogger();

    await scoreLanguageQuality(RAW, deps, { logger });

    const warnings = entries.filter((e) => e.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ msg: 'Issue span exceeds document; clamping', offset: 500 });
  });

  it('logs a collaborator failure at error level with its stage', async () => {
    const { deps } = makeDeps();
    deps.checker = {
      check: async () => {
        throw new Error('connection refused');
      },
    };
    const { logger, entries } = captureLogger();

    await expect(scoreLanguageQuality(RAW, deps, { logger })).rejects.toBeInstanceOf(CollaboratorError);

    const errors = entries.filter((e) => e.level === 50);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ msg: 'Collaborator failed', stage: 'checker' });
  });
});
