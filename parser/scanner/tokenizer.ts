import {
  CharacterCodes,
  isDigit,
  isLineFeed,
  isSpaceOrTab
} from './character-codes.js';
import {
  createToken,
  type Token,
  TokenKind
} from './token-types.js';

export interface Tokenizer extends IterableIterator<Token> {
  /** Produces the next token, or `done` once the cursor reaches the end of the source. */
  next(): IteratorResult<Token, undefined>;

  /** Where the next token will start (offset into the source). */
  readonly offsetNext: number;

  /** Fill a caller-owned diagnostics state object. */
  fillDebugState(state: TokenizerDebugState): void;

  [Symbol.iterator](): Tokenizer;
}

/**
 * Automaton states. `Unset` is re-entered after every emitted token.
 */
export const enum TokenizerState {
  Unset,
  Whitespace,
  Plaintext,
  Number,
  Hash,
  Done,
}

export interface TokenizerDebugState {
  /** Offset where the next token will start. */
  offsetNext: number;

  /** Length of the source being scanned. */
  sourceLength: number;

  /** Human-readable automaton state name (e.g. 'Unset', 'Done'). */
  state: string;

  /** Last emitted token, if any. */
  lastToken: Token | undefined;

  /** Number of tokens emitted so far. */
  tokenCount: number;
}

const stateNames: Record<TokenizerState, string> = {
  [TokenizerState.Unset]: 'Unset',
  [TokenizerState.Whitespace]: 'Whitespace',
  [TokenizerState.Plaintext]: 'Plaintext',
  [TokenizerState.Number]: 'Number',
  [TokenizerState.Hash]: 'Hash',
  [TokenizerState.Done]: 'Done',
};

/**
 * Pull-based tokenizer over `source` starting at `start`.
 *
 * Each `next()` runs the automaton from `Unset` until it reaches `Done`,
 * reading one character per step with a single character of lookahead.
 * Tokens are contiguous: each token starts where the previous one ended.
 */
export function createTokenizer(start: number, source: string): Tokenizer {
  if (!Number.isInteger(start) || start < 0 || start > source.length)
    throw new RangeError(`Invalid tokenizer start: ${start} (source length ${source.length})`);

  const end = source.length;
  let offsetNext = start;
  let state: TokenizerState = TokenizerState.Unset;
  let lastToken: Token | undefined = undefined;
  let tokenCount = 0;

  function scanToken(): Token | undefined {
    const tokenStart = offsetNext;
    let pos = tokenStart;
    let kind: TokenKind | undefined = undefined;
    state = TokenizerState.Unset;

    while (state !== TokenizerState.Done) {
      const ch = pos < end ? source.charCodeAt(pos) : -1;

      switch (state) {
        case TokenizerState.Unset:
          if (ch < 0) {
            state = TokenizerState.Done;
          } else if (ch === CharacterCodes.minus) {
            kind = TokenKind.Dash;
            pos++;
            state = TokenizerState.Done;
          } else if (ch === CharacterCodes.asterisk) {
            kind = TokenKind.Asterisk;
            pos++;
            state = TokenizerState.Done;
          } else if (ch === CharacterCodes.plus) {
            kind = TokenKind.Plus;
            pos++;
            state = TokenizerState.Done;
          } else if (isDigit(ch)) {
            pos++;
            state = TokenizerState.Number;
          } else if (ch === CharacterCodes.hash) {
            pos++;
            state = TokenizerState.Hash;
          } else if (isSpaceOrTab(ch)) {
            pos++;
            state = TokenizerState.Whitespace;
          } else if (isLineFeed(ch)) {
            kind = TokenKind.Newline;
            pos++;
            state = TokenizerState.Done;
          } else if (ch === CharacterCodes.greaterThan) {
            kind = TokenKind.RightCaret;
            pos++;
            state = TokenizerState.Done;
          } else {
            pos++;
            state = TokenizerState.Plaintext;
          }
          break;

        case TokenizerState.Number:
          if (isDigit(ch)) {
            pos++;
          } else if (ch === CharacterCodes.dot) {
            kind = TokenKind.NumDot;
            pos++;
            state = TokenizerState.Done;
          } else if (ch === CharacterCodes.closeParen) {
            kind = TokenKind.NumParen;
            pos++;
            state = TokenizerState.Done;
          } else {
            // Not a list marker: the digits so far become the head of a
            // plaintext run. The current character is re-read as plaintext.
            state = TokenizerState.Plaintext;
          }
          break;

        case TokenizerState.Hash:
          if (ch === CharacterCodes.hash) {
            pos++;
          } else {
            kind = TokenKind.Hash;
            state = TokenizerState.Done;
          }
          break;

        case TokenizerState.Whitespace:
          if (isSpaceOrTab(ch)) {
            pos++;
          } else {
            kind = TokenKind.Whitespace;
            state = TokenizerState.Done;
          }
          break;

        case TokenizerState.Plaintext:
          if (ch < 0 || isSpaceOrTab(ch) || isLineFeed(ch)) {
            kind = TokenKind.Plaintext;
            state = TokenizerState.Done;
          } else {
            pos++;
          }
          break;
      }
    }

    offsetNext = pos;
    if (kind === undefined) return undefined;

    const token = createToken(kind, tokenStart, pos);
    lastToken = token;
    tokenCount++;
    return token;
  }

  function next(): IteratorResult<Token, undefined> {
    const token = scanToken();
    if (!token) return { done: true, value: undefined };
    return { done: false, value: token };
  }

  function fillDebugState(debugState: TokenizerDebugState): void {
    debugState.offsetNext = offsetNext;
    debugState.sourceLength = end;
    debugState.state = stateNames[state];
    debugState.lastToken = lastToken;
    debugState.tokenCount = tokenCount;
  }

  const tokenizer: Tokenizer = {
    next,
    fillDebugState,

    get offsetNext() { return offsetNext; },

    [Symbol.iterator]() { return tokenizer; }
  };

  return tokenizer;
}

/**
 * Scans `source` from `start` to the end and collects every token
 */
export function tokenize(source: string, start = 0): Token[] {
  return [...createTokenizer(start, source)];
}
