/**
 * AST node types.
 *
 * Nodes live in a `NodeArena` and refer to each other by index, so parent
 * back-references are plain lookups. A node's `end` stays `undefined` while
 * its block is open and is set exactly once when the block closes.
 */

/** Stable index of a node within its arena */
export type NodeId = number;

export enum NodeKind {
  // Root node
  Document,

  // Block-level nodes
  Heading,
  Paragraph,

  // Inline leaves
  Plaintext,
  Whitespace,
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Fields shared by every node
 */
export interface NodeBase {
  id: NodeId;
  pos: number;                    // Start offset
  end: number | undefined;        // End offset (exclusive), unset while open
  parent: NodeId | undefined;     // Owning parent, unset until attached
  children: NodeId[];
}

export interface DocumentNode extends NodeBase {
  kind: NodeKind.Document;
}

/**
 * ATX heading; `pos` is the first `#`
 */
export interface HeadingNode extends NodeBase {
  kind: NodeKind.Heading;
  level: HeadingLevel;
}

export interface ParagraphNode extends NodeBase {
  kind: NodeKind.Paragraph;
}

export interface PlaintextNode extends NodeBase {
  kind: NodeKind.Plaintext;
}

export interface WhitespaceNode extends NodeBase {
  kind: NodeKind.Whitespace;
}

export type BlockNode = HeadingNode | ParagraphNode;
export type InlineNode = PlaintextNode | WhitespaceNode;
export type ContainerNode = DocumentNode | BlockNode;
export type Node = ContainerNode | InlineNode;

export type InlineNodeKind = InlineNode['kind'];

export interface NodeArena {
  nodes: Node[];
}

export function isHeadingLevel(level: number): level is HeadingLevel {
  return Number.isInteger(level) && level >= 1 && level <= 6;
}

export function isBlockNode(node: Node): node is BlockNode {
  return node.kind === NodeKind.Heading || node.kind === NodeKind.Paragraph;
}

export function isInlineNode(node: Node): node is InlineNode {
  return node.kind === NodeKind.Plaintext || node.kind === NodeKind.Whitespace;
}
