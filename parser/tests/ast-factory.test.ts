/**
 * Tests for the node arena and factory functions
 */

import { beforeEach, describe, expect, test } from 'vitest';
import {
  appendChild,
  createArena,
  createDocumentNode,
  createInlineNode,
  createInlineNodeFromToken,
  finishNode,
  getChildren,
  getNode,
  getParent,
  inlineKindOfToken,
  nodeText,
  startHeadingNode,
  startParagraphNode,
  validateChildPositions,
  validateNodePosition
} from '../ast-factory.js';
import { isBlockNode, isHeadingLevel, isInlineNode, type NodeArena, NodeKind } from '../ast-types.js';
import { createToken, TokenKind } from '../scanner/token-types.js';

describe('AST factory', () => {
  let arena: NodeArena;

  beforeEach(() => {
    arena = createArena();
  });

  describe('node creation', () => {
    test('ids are arena indices', () => {
      const document = createDocumentNode(arena);
      const heading = startHeadingNode(arena, 2, 0);
      const paragraph = startParagraphNode(arena, 5);

      expect([document.id, heading.id, paragraph.id]).toEqual([0, 1, 2]);
      expect(getNode(arena, 1)).toBe(heading);
    });

    test('containers start open and unattached', () => {
      const heading = startHeadingNode(arena, 3, 4);
      expect(heading).toEqual({
        kind: NodeKind.Heading,
        level: 3,
        id: 0,
        pos: 4,
        end: undefined,
        parent: undefined,
        children: []
      });
    });

    test('inline leaves are created closed', () => {
      expect(createInlineNode(arena, NodeKind.Whitespace, 3, 5)).toEqual({
        kind: NodeKind.Whitespace,
        id: 0,
        pos: 3,
        end: 5,
        parent: undefined,
        children: []
      });
    });

    test('inline leaf cannot end before it starts', () => {
      expect(() => createInlineNode(arena, NodeKind.Plaintext, 5, 3)).toThrow(RangeError);
    });

    test('unknown ids are rejected', () => {
      expect(() => getNode(arena, 0)).toThrow('Unknown node id: 0');
    });
  });

  describe('token to node', () => {
    test('marker and text tokens become plaintext', () => {
      const kinds = [
        TokenKind.RightCaret,
        TokenKind.Hash,
        TokenKind.Dash,
        TokenKind.Asterisk,
        TokenKind.Plus,
        TokenKind.NumParen,
        TokenKind.NumDot,
        TokenKind.Plaintext
      ];
      for (const kind of kinds) {
        expect(inlineKindOfToken(createToken(kind, 0, 1))).toBe(NodeKind.Plaintext);
      }
    });

    test('whitespace and newline become whitespace', () => {
      expect(inlineKindOfToken(createToken(TokenKind.Whitespace, 0, 2))).toBe(NodeKind.Whitespace);
      expect(inlineKindOfToken(createToken(TokenKind.Newline, 0, 1))).toBe(NodeKind.Whitespace);
    });

    test('the node covers the token slice', () => {
      const node = createInlineNodeFromToken(arena, createToken(TokenKind.NumDot, 7, 10));
      expect(node).toMatchObject({ kind: NodeKind.Plaintext, pos: 7, end: 10 });
      expect(nodeText(node, 'Steps:\n12. go')).toBe('12.');
    });
  });

  describe('finishNode', () => {
    test('sets the end once', () => {
      const paragraph = startParagraphNode(arena, 2);
      expect(finishNode(paragraph, 6)).toBe(paragraph);
      expect(paragraph.end).toBe(6);
      expect(() => finishNode(paragraph, 8)).toThrow('Node 0 (Paragraph) is already closed at 6');
      expect(paragraph.end).toBe(6);
    });

    test('rejects an end before the start', () => {
      const heading = startHeadingNode(arena, 1, 4);
      expect(() => finishNode(heading, 3)).toThrow(RangeError);
      expect(heading.end).toBeUndefined();
    });

    test('an empty block may close at its start', () => {
      const heading = startHeadingNode(arena, 1, 4);
      finishNode(heading, 4);
      expect(nodeText(heading, '    #')).toBe('');
    });
  });

  describe('ownership', () => {
    test('appendChild links both directions', () => {
      const document = createDocumentNode(arena);
      const heading = startHeadingNode(arena, 1, 0);
      appendChild(arena, document.id, heading.id);

      expect(document.children).toEqual([heading.id]);
      expect(heading.parent).toBe(document.id);
      expect(getParent(arena, heading)).toBe(document);
      expect(getParent(arena, document)).toBeUndefined();
      expect(getChildren(arena, document)).toEqual([heading]);
    });

    test('a child belongs to one parent', () => {
      const document = createDocumentNode(arena);
      const paragraph = startParagraphNode(arena, 0);
      const text = createInlineNode(arena, NodeKind.Plaintext, 0, 3);

      appendChild(arena, paragraph.id, text.id);
      expect(() => appendChild(arena, document.id, text.id)).toThrow('Node 2 is already attached to node 1');
      expect(document.children).toEqual([]);
    });

    test('a node cannot contain itself', () => {
      const paragraph = startParagraphNode(arena, 0);
      expect(() => appendChild(arena, paragraph.id, paragraph.id)).toThrow('Node 0 cannot be its own child');
    });
  });

  describe('validation', () => {
    test('node position', () => {
      const heading = startHeadingNode(arena, 1, 0);
      expect(validateNodePosition(heading, 10)).toBe(false);
      finishNode(heading, 5);
      expect(validateNodePosition(heading, 10)).toBe(true);
      expect(validateNodePosition(heading, 4)).toBe(false);
    });

    test('child positions must be ordered and inside the parent', () => {
      const paragraph = startParagraphNode(arena, 0);
      appendChild(arena, paragraph.id, createInlineNode(arena, NodeKind.Plaintext, 0, 3).id);
      appendChild(arena, paragraph.id, createInlineNode(arena, NodeKind.Whitespace, 3, 4).id);
      expect(validateChildPositions(arena, paragraph)).toBe(false);

      finishNode(paragraph, 4);
      expect(validateChildPositions(arena, paragraph)).toBe(true);

      appendChild(arena, paragraph.id, createInlineNode(arena, NodeKind.Plaintext, 1, 2).id);
      expect(validateChildPositions(arena, paragraph)).toBe(false);
    });
  });

  describe('type guards', () => {
    test('heading levels', () => {
      expect([0, 1, 6, 7, 2.5].map(isHeadingLevel)).toEqual([false, true, true, false, false]);
    });

    test('block and inline nodes', () => {
      const heading = startHeadingNode(arena, 1, 0);
      const text = createInlineNode(arena, NodeKind.Plaintext, 0, 1);
      const document = createDocumentNode(arena);

      expect([isBlockNode(heading), isBlockNode(text), isBlockNode(document)]).toEqual([true, false, false]);
      expect([isInlineNode(heading), isInlineNode(text), isInlineNode(document)]).toEqual([false, true, false]);
    });
  });
});
