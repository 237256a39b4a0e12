/**
 * Parser Utilities
 * Helper functions for common parsing operations
 */

import type { PositionMapper } from './parser-interfaces.js';
import { createTokenizer } from './scanner/tokenizer.js';
import { type Token, TokenKind } from './scanner/token-types.js';

export type LookaheadTokens = [Token | undefined, Token | undefined, Token | undefined];

/**
 * Reads the three lookahead tokens at `start` with a fresh tokenizer
 */
export function peekTokens(start: number, source: string): LookaheadTokens {
  const tokenizer = createTokenizer(start, source);
  const a = tokenizer.next();
  const b = tokenizer.next();
  const c = tokenizer.next();
  return [a.value, b.value, c.value];
}

/**
 * Checks if the lookahead starts a blank line: a newline, or only spaces and
 * tabs before the next newline or the end of input
 */
export function isBlankLine(a: Token | undefined, b: Token | undefined): boolean {
  if (!a) return false;
  if (a.kind === TokenKind.Newline) return true;
  return a.kind === TokenKind.Whitespace && (!b || b.kind === TokenKind.Newline);
}

/**
 * Offset just past a blank line (after its newline, or at the end of input),
 * or `undefined` when the lookahead is not a blank line
 */
export function blankLineEnd(a: Token | undefined, b: Token | undefined): number | undefined {
  if (!a || !isBlankLine(a, b)) return undefined;
  if (a.kind === TokenKind.Whitespace && b) return b.end;
  return a.end;
}

/**
 * Offsets where each line starts; the first line always starts at 0
 */
export function computeLineStarts(source: string): number[] {
  const lineStarts = [0];
  for (let i = source.indexOf('\n'); i >= 0; i = source.indexOf('\n', i + 1)) {
    lineStarts.push(i + 1);
  }
  return lineStarts;
}

export function createPositionMapper(source: string): PositionMapper {
  const lineStarts = computeLineStarts(source);

  function offsetToPosition(offset: number): { line: number; column: number } {
    if (offset < 0 || offset > source.length)
      throw new RangeError(`Offset ${offset} is outside the source (length ${source.length})`);

    // Binary search for the last line start <= offset
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - lineStarts[low] + 1 };
  }

  function positionToOffset(line: number, column: number): number {
    if (line < 1 || line > lineStarts.length)
      throw new RangeError(`Line ${line} is outside the source (${lineStarts.length} lines)`);
    const lineStart = lineStarts[line - 1];
    const lineEnd = line < lineStarts.length ? lineStarts[line] : source.length;
    const offset = lineStart + column - 1;
    if (column < 1 || offset > lineEnd)
      throw new RangeError(`Column ${column} is outside line ${line}`);
    return offset;
  }

  return {
    offsetToPosition,
    positionToOffset,
    getLineStarts: () => lineStarts,
    getLineCount: () => lineStarts.length
  };
}
