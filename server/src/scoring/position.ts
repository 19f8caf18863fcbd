import type { LineCol } from './types.js';

export function clampOffset(text: string, offset: number): number {
  if (!Number.isFinite(offset) || offset < 0) return 0;
  return Math.min(Math.trunc(offset), text.length);
}

function lastNewlineBefore(text: string, offset: number): number {
  return offset > 0 ? text.lastIndexOf('\n', offset - 1) : -1;
}

/** 1-based line and column of a character offset. */
export function offsetToLineCol(text: string, offset: number): LineCol {
  const at = clampOffset(text, offset);
  let line = 1;
  for (let i = text.indexOf('\n'); i !== -1 && i < at; i = text.indexOf('\n', i + 1)) {
    line += 1;
  }
  return { line, col: at - (lastNewlineBefore(text, at) + 1) + 1 };
}

export interface SourceLine {
  text: string;
  /** Offset of the line's first character in the document. */
  start: number;
}

/** The full line containing `offset`, without its line terminator. */
export function sourceLineAt(text: string, offset: number): SourceLine {
  const at = clampOffset(text, offset);
  const start = lastNewlineBefore(text, at) + 1;
  const newline = text.indexOf('\n', at);
  const end = newline === -1 ? text.length : newline;
  return { text: text.slice(start, end).replace(/\r$/, ''), start };
}
