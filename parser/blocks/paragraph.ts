import { finishNode, startParagraphNode } from '../ast-factory.js';
import type { BlockRule, LeafConsumer } from '../parser-interfaces.js';
import { isBlankLine, peekTokens } from '../parser-utils.js';
import { CharacterCodes } from '../scanner/character-codes.js';
import { consumeLeaf } from './leaf.js';

export interface ParagraphRuleOptions {
  /** Rules whose start ends a running paragraph */
  interruptions?: readonly BlockRule[];

  /** Consumer for each line of text (default: `consumeLeaf`) */
  leaf?: LeafConsumer;
}

/**
 * Fallback rule: any non-blank line opens a paragraph. It keeps consuming
 * whole lines until a blank line, the end of input, or a line that one of
 * `interruptions` would open.
 */
export function createParagraphRule({ interruptions = [], leaf = consumeLeaf }: ParagraphRuleOptions = {}): BlockRule {
  return {
    name: 'paragraph',

    open(context, _parent, a, b) {
      if (!a || isBlankLine(a, b)) return undefined;
      return {
        node: startParagraphNode(context.arena, a.start),
        offset: a.start
      };
    },

    consume(context, node, start) {
      const { source, options } = context;
      let offset = start;

      while (true) {
        const lineEnd = leaf(context, node, offset);
        if (lineEnd === undefined) break;
        offset = lineEnd;

        // Last line had no terminating newline: end of input
        if (source.charCodeAt(offset - 1) !== CharacterCodes.lineFeed) break;

        const [a, b, c] = peekTokens(offset, source);
        if (!a || isBlankLine(a, b)) break;
        if (interruptions.some(rule => rule.interrupts(a, b, c, options))) break;
      }

      finishNode(node, offset);
      return offset === start ? undefined : offset;
    },

    interrupts() {
      return false;
    }
  };
}
