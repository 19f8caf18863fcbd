import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { RegistryEnumerator } from '../scoring/types.js';

function isMissingDirectory(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function listDirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => (e.isDirectory() || e.isSymbolicLink()) && !e.name.startsWith('.'))
    .map((e) => e.name);
}

/**
 * Names of the packages installed under `<rootDir>/node_modules`. Scoped
 * packages contribute both "@scope/name" and "name". No node_modules
 * directory means nothing is installed.
 */
export function createPackageRegistry(rootDir: string): RegistryEnumerator {
  return {
    async listNames() {
      const modulesDir = join(rootDir, 'node_modules');
      const names = new Set<string>();

      let topLevel: string[];
      try {
        topLevel = await listDirectories(modulesDir);
      } catch (err) {
        if (isMissingDirectory(err)) return names;
        throw err;
      }

      for (const name of topLevel) {
        if (!name.startsWith('@')) {
          names.add(name.toLowerCase());
          continue;
        }
        for (const scoped of await listDirectories(join(modulesDir, name))) {
          names.add(`${name}/${scoped}`.toLowerCase());
          names.add(scoped.toLowerCase());
        }
      }
      return names;
    },
  };
}
