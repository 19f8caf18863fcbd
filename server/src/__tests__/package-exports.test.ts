import { readFile } from 'node:fs/promises';
import { describe, it, expect } from 'vitest';

async function readManifest(): Promise<unknown> {
  return JSON.parse(await readFile(new URL('../../package.json', import.meta.url), 'utf8'));
}

describe('package manifest', () => {
  it('points runtime entry points at the compiled build', async () => {
    expect(await readManifest()).toMatchObject({
      main: './dist/scoring/index.js',
      types: './dist/scoring/index.d.ts',
      exports: {
        '.': {
          types: './dist/scoring/index.d.ts',
          default: './dist/scoring/index.js',
        },
      },
      bin: { 'score-language': 'dist/cli.js' },
    });
  });
});
