#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { createScoringDependencies } from './scoring/dependencies.js';
import { scoreLanguageQuality, type ScoringDependencies } from './scoring/pipeline.js';
import { reportWidthFor } from './scoring/report.js';

const USAGE = 'Usage: score-language path/to/resume.txt';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readText: (file: string) => Promise<string>;
  columns?: number;
  deps?: ScoringDependencies;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readText: (file) => readFile(file, 'utf8'),
  columns: process.stdout.columns,
};

/** Returns the process exit code. */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  if (args.length !== 1) {
    io.stderr(USAGE);
    return 1;
  }
  const [file] = args;

  let raw: string;
  try {
    raw = await io.readText(file);
  } catch (err) {
    io.stderr(`Error reading '${file}': ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const config = loadConfig();
  try {
    const result = await scoreLanguageQuality(raw, io.deps ?? createScoringDependencies(config), {
      manualTerms: config.manualTerms,
      unwrapLinebreakHyphens: config.unwrapLinebreakHyphens,
      width: reportWidthFor(io.columns),
    });
    io.stdout(result.rendered);
    return 0;
  } catch (err) {
    logger.error({ file, error: err instanceof Error ? err.message : String(err) }, 'Language scoring failed');
    io.stderr(`Language scoring failed for '${file}': ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  return Boolean(entry) && path.resolve(entry ?? '') === path.resolve(fileURLToPath(import.meta.url));
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Unexpected CLI failure');
      process.exitCode = 1;
    });
}
