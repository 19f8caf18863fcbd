import type { EntityExtractor } from './types.js';

/**
 * Local, model-free stand-in for a named-entity tagger. Picks out
 * ALL-CAPS acronyms (and their "s" plurals), capitalized words that do not
 * open a sentence, and runs of two or more such words on one line.
 */

// Tokens may carry inner . + # & ' _ - (Node.js, C++, R&D, T-Mobile).
const TOKEN_RE = /[\p{L}\p{N}](?:[\p{L}\p{N}.+#&'_-]*[\p{L}\p{N}+#])?/gu;
const LETTERS_ONLY_RE = /^\p{L}+$/u;
const CAPITALIZED_RE = /^\p{Lu}/u;
const SENTENCE_BREAKS = new Set(['.', '!', '?', ';', '|', '*', '-', '•', '▪', '●', '·', '–', '—']);

interface Token {
  text: string;
  index: number;
}

function isUpper(s: string): boolean {
  return s.length > 0 && s === s.toUpperCase() && s !== s.toLowerCase();
}

/** "AWS", and "APIs" read as the plural of an acronym. */
export function isAcronym(token: string): boolean {
  if (!LETTERS_ONLY_RE.test(token)) return false;
  if (isUpper(token)) return true;
  return token.endsWith('s') && isUpper(token.slice(0, -1));
}

function tokenize(text: string): Token[] {
  return Array.from(text.matchAll(TOKEN_RE), (m) => ({ text: m[0], index: m.index ?? 0 }));
}

function opensSentence(text: string, index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === ' ' || ch === '\t') continue;
    if (ch === '\n' || ch === '\r') return true;
    return SENTENCE_BREAKS.has(ch);
  }
  return true;
}

function onlySpacesBetween(text: string, from: number, to: number): boolean {
  return /^[ \t]+$/.test(text.slice(from, to));
}

export function extractProperTerms(text: string): Set<string> {
  const terms = new Set<string>();
  const tokens = tokenize(text);
  let phrase: Token[] = [];

  const flushPhrase = () => {
    if (phrase.length >= 2) {
      terms.add(phrase.map((t) => t.text).join(' '));
    }
    phrase = [];
  };

  for (const token of tokens) {
    if (isAcronym(token.text)) {
      terms.add(token.text);
    }

    if (!CAPITALIZED_RE.test(token.text) || opensSentence(text, token.index)) {
      flushPhrase();
      continue;
    }
    terms.add(token.text);

    const prev = phrase[phrase.length - 1];
    if (prev && !onlySpacesBetween(text, prev.index + prev.text.length, token.index)) {
      flushPhrase();
    }
    phrase.push(token);
  }
  flushPhrase();

  return terms;
}

export function createHeuristicEntityExtractor(): EntityExtractor {
  return {
    extract: async (text) => extractProperTerms(text),
  };
}
