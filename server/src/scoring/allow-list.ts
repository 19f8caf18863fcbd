import type { EntityExtractor, RegistryEnumerator } from './types.js';

/**
 * Case-insensitive set of terms that must not count as language errors:
 * product names, proper nouns, acronyms, installed library names.
 */
export class AllowList {
  private readonly terms = new Set<string>();

  constructor(terms: Iterable<string> = []) {
    this.addAll(terms);
  }

  add(term: string): void {
    if (!term) return;
    this.terms.add(term.toLowerCase());
  }

  addAll(terms: Iterable<string>): void {
    for (const term of terms) this.add(term);
  }

  has(term: string): boolean {
    return this.terms.has(term.toLowerCase());
  }

  get size(): number {
    return this.terms.size;
  }
}

/**
 * Union extracted entities, installed package names and manual terms.
 * Collaborators run one after the other; a failure in either propagates.
 */
export async function buildAllowList(
  text: string,
  entityExtractor: EntityExtractor,
  registryEnumerator: RegistryEnumerator,
  manualTerms: Iterable<string> = [],
): Promise<AllowList> {
  const allowList = new AllowList();
  allowList.addAll(await entityExtractor.extract(text));
  allowList.addAll(await registryEnumerator.listNames());
  allowList.addAll(manualTerms);
  return allowList;
}
