/**
 * Core Parser Implementation
 *
 * Line-level driver: at every line start it peeks three tokens, skips blank
 * lines, and offers the lookahead to each block rule in priority order. The
 * first rule that opens gets its node attached to the document and consumes
 * from the link offset.
 */

import { appendChild, createArena, createDocumentNode, finishNode } from './ast-factory.js';
import { NodeKind } from './ast-types.js';
import { headingRule } from './blocks/heading.js';
import { createParagraphRule } from './blocks/paragraph.js';
import type {
  BlockContext,
  BlockRule,
  Parser,
  ParseOptions,
  ParseResult,
  ParserOptions,
  ResolvedParseOptions
} from './parser-interfaces.js';
import { blankLineEnd, computeLineStarts, peekTokens } from './parser-utils.js';
import { formatToken, type Token } from './scanner/token-types.js';

const defaultParseOptions: ResolvedParseOptions = {
  maxHeadingLevel: 6,
  enableDiagnostics: true
};

/**
 * Default block rules: headings first, paragraphs as the fallback
 */
export function createDefaultBlockRules(): BlockRule[] {
  return [
    headingRule,
    createParagraphRule({ interruptions: [headingRule] })
  ];
}

export function resolveParseOptions(...layers: (ParseOptions | undefined)[]): ResolvedParseOptions {
  const resolved: ResolvedParseOptions = { ...defaultParseOptions };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.maxHeadingLevel !== undefined) resolved.maxHeadingLevel = layer.maxHeadingLevel;
    if (layer.enableDiagnostics !== undefined) resolved.enableDiagnostics = layer.enableDiagnostics;
  }

  const { maxHeadingLevel } = resolved;
  if (!Number.isInteger(maxHeadingLevel) || maxHeadingLevel < 1 || maxHeadingLevel > 6)
    throw new RangeError(`maxHeadingLevel must be an integer from 1 to 6, got ${maxHeadingLevel}`);

  return resolved;
}

export function createParser(options?: ParserOptions): Parser {
  const blockRules = options?.blockRules ?? createDefaultBlockRules();
  const debug = options?.debug ?? (typeof process !== 'undefined' && !!process.env.PARSE_DEBUG);

  // Validate the defaults eagerly so a bad configuration fails at creation
  resolveParseOptions(options?.defaultParseOptions);

  function trace(message: string, details: Record<string, unknown>): void {
    if (debug) console.log('[PARSE] ' + message, details);
  }

  function describe(token: Token | undefined): string {
    return token ? formatToken(token) : 'EOF';
  }

  function parseDocument(text: string, parseOptions?: ParseOptions): ParseResult {
    const startTime = performance.now();
    const context: BlockContext = {
      arena: createArena(),
      source: text,
      options: resolveParseOptions(options?.defaultParseOptions, parseOptions),
      diagnostics: []
    };
    const document = createDocumentNode(context.arena);

    let offset = 0;
    while (offset < text.length) {
      const [a, b, c] = peekTokens(offset, text);

      const blankEnd = blankLineEnd(a, b);
      if (blankEnd !== undefined) {
        trace('blank line', { pos: offset, end: blankEnd });
        offset = blankEnd;
        continue;
      }

      offset = openBlock(offset, a, b, c);
    }

    finishNode(document, text.length);

    return {
      arena: context.arena,
      document,
      diagnostics: context.diagnostics,
      lineStarts: computeLineStarts(text),
      parseTime: performance.now() - startTime,
      sourceText: text
    };

    function openBlock(
      lineStart: number,
      a: Token | undefined,
      b: Token | undefined,
      c: Token | undefined
    ): number {
      for (const rule of blockRules) {
        const link = rule.open(context, document, a, b, c);
        if (!link) continue;

        appendChild(context.arena, document.id, link.node.id);
        const consumed = rule.consume(context, link.node, link.offset);
        const next = consumed ?? link.offset;

        trace('block', {
          rule: rule.name,
          kind: NodeKind[link.node.kind],
          lookahead: [describe(a), describe(b), describe(c)],
          pos: link.node.pos,
          end: link.node.end
        });

        if (next <= lineStart)
          throw new Error(`Block rule '${rule.name}' made no progress at offset ${lineStart}`);
        return next;
      }

      throw new Error(`No block rule opened at offset ${lineStart} (${describe(a)})`);
    }
  }

  return { parseDocument };
}

/**
 * Parses `text` with the default block rules
 */
export function parseDocument(text: string, options?: ParseOptions): ParseResult {
  return createParser().parseDocument(text, options);
}
