import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createPackageRegistry } from '../lib/package-registry.js';

describe('createPackageRegistry', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'registry-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('lists top-level and scoped package names in lower case', async () => {
    const modules = join(root, 'node_modules');
    await mkdir(join(modules, 'zod'), { recursive: true });
    await mkdir(join(modules, 'Pino'), { recursive: true });
    await mkdir(join(modules, '@hono', 'node-server'), { recursive: true });
    await mkdir(join(modules, '.bin'), { recursive: true });
    await writeFile(join(modules, '.package-lock.json'), '{}');

    const names = await createPackageRegistry(root).listNames();

    expect(names).toEqual(new Set(['zod', 'pino', '@hono/node-server', 'node-server']));
  });

  it('returns an empty set when nothing is installed', async () => {
    await expect(createPackageRegistry(root).listNames()).resolves.toEqual(new Set());
  });

  it('rethrows errors other than a missing directory', async () => {
    await writeFile(join(root, 'node_modules'), 'not a directory');
    await expect(createPackageRegistry(root).listNames()).rejects.toMatchObject({ code: 'ENOTDIR' });
  });
});
