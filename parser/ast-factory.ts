/**
 * AST Factory Utilities
 *
 * Helper functions for creating, attaching and closing nodes in a `NodeArena`.
 */

import {
  type DocumentNode,
  type HeadingLevel,
  type HeadingNode,
  type InlineNode,
  type InlineNodeKind,
  type Node,
  type NodeArena,
  type NodeId,
  NodeKind,
  type ParagraphNode
} from './ast-types.js';
import { type Token, TokenKind } from './scanner/token-types.js';

export function createArena(): NodeArena {
  return { nodes: [] };
}

/**
 * Looks a node up by id
 */
export function getNode(arena: NodeArena, id: NodeId): Node {
  const node = arena.nodes[id];
  if (!node)
    throw new RangeError(`Unknown node id: ${id}`);
  return node;
}

export function createDocumentNode(arena: NodeArena): DocumentNode {
  const node: DocumentNode = {
    kind: NodeKind.Document,
    id: arena.nodes.length,
    pos: 0,
    end: undefined,
    parent: undefined,
    children: []
  };
  arena.nodes.push(node);
  return node;
}

/**
 * Starts an open heading at `pos` (end will be set when it closes)
 */
export function startHeadingNode(arena: NodeArena, level: HeadingLevel, pos: number): HeadingNode {
  const node: HeadingNode = {
    kind: NodeKind.Heading,
    level,
    id: arena.nodes.length,
    pos,
    end: undefined,
    parent: undefined,
    children: []
  };
  arena.nodes.push(node);
  return node;
}

export function startParagraphNode(arena: NodeArena, pos: number): ParagraphNode {
  const node: ParagraphNode = {
    kind: NodeKind.Paragraph,
    id: arena.nodes.length,
    pos,
    end: undefined,
    parent: undefined,
    children: []
  };
  arena.nodes.push(node);
  return node;
}

/**
 * Creates a closed inline leaf over `[pos, end)`
 */
export function createInlineNode(arena: NodeArena, kind: InlineNodeKind, pos: number, end: number): InlineNode {
  if (end < pos)
    throw new RangeError(`Inline node end ${end} precedes its start ${pos}`);

  const node: InlineNode = {
    kind,
    id: arena.nodes.length,
    pos,
    end,
    parent: undefined,
    children: []
  };
  arena.nodes.push(node);
  return node;
}

/**
 * Maps a token to the kind of inline leaf it becomes
 */
export function inlineKindOfToken(token: Token): InlineNodeKind {
  switch (token.kind) {
    case TokenKind.RightCaret:
    case TokenKind.Hash:
    case TokenKind.Dash:
    case TokenKind.Asterisk:
    case TokenKind.Plus:
    case TokenKind.NumParen:
    case TokenKind.NumDot:
    case TokenKind.Plaintext:
      return NodeKind.Plaintext;
    case TokenKind.Whitespace:
    case TokenKind.Newline:
      return NodeKind.Whitespace;
  }
}

export function createInlineNodeFromToken(arena: NodeArena, token: Token): InlineNode {
  return createInlineNode(arena, inlineKindOfToken(token), token.start, token.end);
}

/**
 * Finishes a node by setting its end position. A node closes once.
 */
export function finishNode<T extends Node>(node: T, end: number): T {
  if (node.end !== undefined)
    throw new Error(`Node ${node.id} (${NodeKind[node.kind]}) is already closed at ${node.end}`);
  if (end < node.pos)
    throw new RangeError(`Node ${node.id} end ${end} precedes its start ${node.pos}`);
  node.end = end;
  return node;
}

/**
 * Attaches `childId` under `parentId`. A child is owned by exactly one parent.
 */
export function appendChild(arena: NodeArena, parentId: NodeId, childId: NodeId): void {
  const parent = getNode(arena, parentId);
  const child = getNode(arena, childId);

  if (parentId === childId)
    throw new Error(`Node ${childId} cannot be its own child`);
  if (child.parent !== undefined)
    throw new Error(`Node ${childId} is already attached to node ${child.parent}`);

  child.parent = parentId;
  parent.children.push(childId);
}

export function getChildren(arena: NodeArena, node: Node): Node[] {
  return node.children.map(id => getNode(arena, id));
}

export function getParent(arena: NodeArena, node: Node): Node | undefined {
  return node.parent === undefined ? undefined : getNode(arena, node.parent);
}

/**
 * Source text covered by the node; an open node covers nothing yet
 */
export function nodeText(node: Node, source: string): string {
  return source.slice(node.pos, node.end ?? node.pos);
}

/**
 * Validates that a closed node's position is within bounds
 */
export function validateNodePosition(node: Node, sourceLength: number): boolean {
  return node.end !== undefined &&
    node.pos >= 0 &&
    node.end >= node.pos &&
    node.end <= sourceLength;
}

/**
 * Validates that child positions are within parent bounds and in order
 */
export function validateChildPositions(arena: NodeArena, parent: Node): boolean {
  if (parent.end === undefined) return false;
  const parentEnd = parent.end;
  let previousEnd = parent.pos;
  return getChildren(arena, parent).every(child => {
    const ok = child.end !== undefined &&
      child.pos >= previousEnd &&
      child.end <= parentEnd;
    if (child.end !== undefined) previousEnd = child.end;
    return ok;
  });
}
