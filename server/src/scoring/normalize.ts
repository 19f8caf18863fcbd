/**
 * Character-level cleanup for text pulled out of PDF résumés.
 *
 * normalizeText() repairs encoding artifacts (compatibility forms, ligature
 * glyphs, invisible characters, words hyphenated across a line break).
 * stripNoise() then removes contact details and non-prose lines so the
 * checker only sees sentences.
 */

/** Ligature glyphs and the private-use fallbacks some PDF fonts emit. */
export const LIGATURE_MAP: Readonly<Record<string, string>> = {
  '\ufb00': 'ff',
  '\ufb01': 'fi',
  '\ufb02': 'fl',
  '\ufb03': 'ffi',
  '\ufb04': 'ffl',
  '\uf001': 'fi',
  '\uf002': 'fl',
};

const INVISIBLE_CHARS_RE = /[\u00ad\u200b\ufeff]/g;

const WORD_CHAR = '[\\p{L}\\p{N}_]';

// The trailing word char is a lookahead so "a-\nb-\nc" joins in one pass.
const LINEBREAK_HYPHEN_RE = new RegExp(`(${WORD_CHAR})-\\s*\\n(?=${WORD_CHAR})`, 'gu');

const EMAIL_RE = /\S+@\S+/g;
const URL_RE = /https?:\/\/\S+/g;
const PHONE_CANDIDATE_RE = /\+?\d[\d\-() \t]{5,}\d/g;
const MIN_PHONE_DIGITS = 7;
const LOWERCASE_ASCII_RE = /[a-z]/;

export interface NormalizeOptions {
  /** Join words split by a line-end hyphen. Default true. */
  unwrapLinebreakHyphens?: boolean;
  /** Replaces the default ligature table. Keys are single characters. */
  ligatures?: Readonly<Record<string, string>>;
}

function replaceLigatures(text: string, table: Readonly<Record<string, string>>): string {
  const glyphs = new Map(Object.entries(table));
  if (glyphs.size === 0) return text;
  let out = '';
  for (const ch of text) {
    out += glyphs.get(ch) ?? ch;
  }
  return out;
}

export function normalizeText(raw: string, options: NormalizeOptions = {}): string {
  if (!raw) return '';

  let text = raw.normalize('NFKC');
  const substituted = replaceLigatures(text, options.ligatures ?? LIGATURE_MAP)
    .replace(INVISIBLE_CHARS_RE, '');
  // Substitution can leave a base letter beside a combining mark; recompose.
  text = substituted === text ? text : substituted.normalize('NFKC');

  if (options.unwrapLinebreakHyphens ?? true) {
    text = text.replace(LINEBREAK_HYPHEN_RE, '$1-');
  }
  return text;
}

function countDigits(s: string): number {
  let n = 0;
  for (const ch of s) {
    if (ch >= '0' && ch <= '9') n += 1;
  }
  return n;
}

/**
 * Remove emails, URLs and phone numbers, then drop every line that has no
 * lowercase ASCII letter (headings, rules, all-caps banners, bare symbols).
 */
export function stripNoise(normalized: string): string {
  if (!normalized) return '';

  const text = normalized
    .replace(EMAIL_RE, ' ')
    .replace(URL_RE, ' ')
    .replace(PHONE_CANDIDATE_RE, (run) => (countDigits(run) >= MIN_PHONE_DIGITS ? ' ' : run));

  return text
    .split(/\r\n|\r|\n/)
    .filter((line) => LOWERCASE_ASCII_RE.test(line))
    .join('\n');
}

export function cleanDocument(raw: string, options: NormalizeOptions = {}): string {
  return stripNoise(normalizeText(raw, options));
}
