import { appendChild, createInlineNodeFromToken } from '../ast-factory.js';
import type { BlockNode } from '../ast-types.js';
import type { BlockContext } from '../parser-interfaces.js';
import { createTokenizer } from '../scanner/tokenizer.js';
import { TokenKind } from '../scanner/token-types.js';

/**
 * Consumes the rest of the current line as inline leaves of `node`.
 *
 * Every token up to and including the terminating newline becomes a child.
 * Returns the offset just past the line, or `undefined` when `start` is at
 * the end of input or directly at a newline.
 */
export function consumeLeaf(context: BlockContext, node: BlockNode, start: number): number | undefined {
  const { arena, source } = context;
  let offset: number | undefined = undefined;

  for (const token of createTokenizer(start, source)) {
    if (token.kind === TokenKind.Newline && offset === undefined)
      return undefined;

    appendChild(arena, node.id, createInlineNodeFromToken(arena, token).id);
    offset = token.end;

    if (token.kind === TokenKind.Newline) break;
  }

  return offset;
}
