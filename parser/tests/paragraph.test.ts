import { describe, expect, test } from 'vitest';
import { NodeKind } from '../ast-types.js';
import { headingRule } from '../blocks/heading.js';
import { createParagraphRule } from '../blocks/paragraph.js';
import { peekTokens } from '../parser-utils.js';
import { createTestContext } from './test-utils.js';

describe('Paragraph block rule', () => {
  const paragraphRule = createParagraphRule({ interruptions: [headingRule] });

  function openParagraph(source: string, start = 0) {
    const { context, document } = createTestContext(source);
    const link = paragraphRule.open(context, document, ...peekTokens(start, source));
    return { context, link };
  }

  test('opens at the first token without consuming it', () => {
    const { link } = openParagraph('Hello');
    expect(link?.offset).toBe(0);
    expect(link?.node).toMatchObject({ kind: NodeKind.Paragraph, pos: 0, end: undefined });
  });

  test('does not open on a blank line', () => {
    expect(openParagraph('\ntext').link).toBeUndefined();
    expect(openParagraph('   \ntext').link).toBeUndefined();
    expect(openParagraph('').link).toBeUndefined();
  });

  test('consumes lines until a blank line', () => {
    const { context, link } = openParagraph('one\ntwo\n\nthree');
    if (!link) throw new Error('expected a paragraph');

    expect(paragraphRule.consume(context, link.node, link.offset)).toBe(8);
    expect(link.node.end).toBe(8);
    expect(link.node.children).toHaveLength(4);
  });

  test('stops before an interrupting heading', () => {
    const { context, link } = openParagraph('one\n## two');
    if (!link) throw new Error('expected a paragraph');

    expect(paragraphRule.consume(context, link.node, link.offset)).toBe(4);
  });

  test('without interruptions a heading line continues the paragraph', () => {
    const rule = createParagraphRule();
    const { context, document } = createTestContext('one\n## two');
    const link = rule.open(context, document, ...peekTokens(0, context.source));
    if (!link) throw new Error('expected a paragraph');

    expect(rule.consume(context, link.node, link.offset)).toBe(10);
  });

  test('runs to the end of input', () => {
    const { context, link } = openParagraph('just text');
    if (!link) throw new Error('expected a paragraph');

    expect(paragraphRule.consume(context, link.node, link.offset)).toBe(9);
  });

  test('nothing to consume closes the paragraph empty', () => {
    const rule = createParagraphRule({ leaf: () => undefined });
    const { context, document } = createTestContext('text');
    const link = rule.open(context, document, ...peekTokens(0, context.source));
    if (!link) throw new Error('expected a paragraph');

    expect(rule.consume(context, link.node, link.offset)).toBeUndefined();
    expect(link.node.end).toBe(0);
  });

  test('never interrupts', () => {
    const { context } = createTestContext('text');
    expect(paragraphRule.interrupts(...peekTokens(0, 'text'), context.options)).toBe(false);
  });
});
