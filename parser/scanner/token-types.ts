/**
 * Token types for the line-start tokenizer.
 *
 * Tokens never own text: each carries a half-open `[start, end)` slice into
 * the source it was scanned from.
 */

/**
 * Half-open offset interval into the source text
 */
export interface Slice {
  start: number;
  end: number;
}

export enum TokenKind {
  RightCaret,     // >
  Hash,           // #, ##, ... (any run length)
  Dash,           // -
  Asterisk,       // *
  Plus,           // +
  NumDot,         // 1. 12.
  NumParen,       // 1) 12)
  Plaintext,      // anything not otherwise classified
  Whitespace,     // run of spaces and tabs
  Newline,        // exactly one \n
}

export interface RightCaretToken extends Slice { kind: TokenKind.RightCaret }
export interface HashToken extends Slice { kind: TokenKind.Hash }
export interface DashToken extends Slice { kind: TokenKind.Dash }
export interface AsteriskToken extends Slice { kind: TokenKind.Asterisk }
export interface PlusToken extends Slice { kind: TokenKind.Plus }
export interface NumDotToken extends Slice { kind: TokenKind.NumDot }
export interface NumParenToken extends Slice { kind: TokenKind.NumParen }
export interface PlaintextToken extends Slice { kind: TokenKind.Plaintext }
export interface WhitespaceToken extends Slice { kind: TokenKind.Whitespace }
export interface NewlineToken extends Slice { kind: TokenKind.Newline }

export type Token =
  | RightCaretToken
  | HashToken
  | DashToken
  | AsteriskToken
  | PlusToken
  | NumDotToken
  | NumParenToken
  | PlaintextToken
  | WhitespaceToken
  | NewlineToken;

export function createToken<K extends TokenKind>(kind: K, start: number, end: number): Extract<Token, { kind: K }>;
export function createToken(kind: TokenKind, start: number, end: number): Token {
  return { kind, start, end };
}

export function tokenLength(token: Slice): number {
  return token.end - token.start;
}

/**
 * Materializes the token's text. The only place a token copies source.
 */
export function tokenText(token: Slice, source: string): string {
  return source.slice(token.start, token.end);
}

export function tokenKindName(kind: TokenKind): string {
  return TokenKind[kind];
}

/**
 * Compact `Kind(start,end)` rendering used by debug output and tests
 */
export function formatToken(token: Token): string {
  return tokenKindName(token.kind) + '(' + token.start + ',' + token.end + ')';
}
