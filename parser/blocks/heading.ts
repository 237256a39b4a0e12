import { finishNode, startHeadingNode } from '../ast-factory.js';
import { type HeadingLevel, isHeadingLevel } from '../ast-types.js';
import {
  type BlockRule,
  DiagnosticCategory,
  DiagnosticSeverity,
  type LeafConsumer,
  ParseErrorCode,
  type ResolvedParseOptions
} from '../parser-interfaces.js';
import { type HashToken, type Token, TokenKind, tokenLength } from '../scanner/token-types.js';
import { consumeLeaf } from './leaf.js';

export interface HeadingRuleOptions {
  /** Consumer for the heading text (default: `consumeLeaf`) */
  leaf?: LeafConsumer;
}

/**
 * The `#` run and separator of an ATX heading start, or `undefined` when the
 * lookahead is not shaped `Hash, Whitespace, ...`
 */
function matchHeadingStart(a: Token | undefined, b: Token | undefined):
  { hash: HashToken, separatorEnd: number } | undefined {
  if (a?.kind !== TokenKind.Hash || b?.kind !== TokenKind.Whitespace) return undefined;
  return { hash: a, separatorEnd: b.end };
}

function headingLevel(hash: HashToken, options: ResolvedParseOptions): HeadingLevel | undefined {
  const level = tokenLength(hash);
  return isHeadingLevel(level) && level <= options.maxHeadingLevel ? level : undefined;
}

/**
 * ATX heading rule: `#` to `######` followed by whitespace. Headings never
 * continue onto the next line, so `consume` always closes the node.
 */
export function createHeadingRule({ leaf = consumeLeaf }: HeadingRuleOptions = {}): BlockRule {
  return {
    name: 'heading',

    open(context, _parent, a, b) {
      const start = matchHeadingStart(a, b);
      if (!start) return undefined;

      const level = headingLevel(start.hash, context.options);
      if (level === undefined) {
        if (context.options.enableDiagnostics) {
          context.diagnostics.push({
            severity: DiagnosticSeverity.Info,
            category: DiagnosticCategory.Structure,
            code: ParseErrorCode.HEADING_LEVEL_EXCEEDED,
            message: `Heading marker of ${tokenLength(start.hash)} '#' exceeds the maximum level ${context.options.maxHeadingLevel}`,
            pos: start.hash.start,
            end: start.hash.end
          });
        }
        return undefined;
      }

      return {
        node: startHeadingNode(context.arena, level, start.hash.start),
        offset: start.separatorEnd
      };
    },

    consume(context, node, start) {
      const end = leaf(context, node, start);
      if (end === undefined) {
        finishNode(node, start);
        return undefined;
      }
      finishNode(node, end);
      return end;
    },

    interrupts(a, b, _c, options) {
      const start = matchHeadingStart(a, b);
      return !!start && headingLevel(start.hash, options) !== undefined;
    }
  };
}

export const headingRule: BlockRule = createHeadingRule();
