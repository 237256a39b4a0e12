/**
 * Parser Interfaces and Types
 *
 * The block-rule protocol shared by every block kind, plus parser
 * configuration, diagnostics and results.
 */

import type { BlockNode, ContainerNode, DocumentNode, NodeArena } from './ast-types.js';
import type { Token } from './scanner/token-types.js';

/**
 * Parse configuration options
 */
export interface ParseOptions {
  /** Maximum heading level, 1 to 6 (default: 6) */
  maxHeadingLevel?: number;

  /** Record diagnostics for notable input shapes (default: true) */
  enableDiagnostics?: boolean;
}

export type ResolvedParseOptions = Required<ParseOptions>;

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured reporting
 */
export enum DiagnosticCategory {
  Syntax = 'syntax',
  Structure = 'structure'
}

/**
 * Parse diagnostic codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  HEADING_LEVEL_EXCEEDED = 'heading-level-exceeded'
}

export interface ParseDiagnostic {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;

  /** Machine-readable code */
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Start position in source */
  pos: number;

  /** End position in source */
  end: number;
}

/**
 * Everything a block rule may touch while opening or consuming
 */
export interface BlockContext {
  arena: NodeArena;
  source: string;
  options: ResolvedParseOptions;
  diagnostics: ParseDiagnostic[];
}

/**
 * A newly created block node, not yet attached, paired with the offset
 * consumed while opening it
 */
export interface Link {
  node: BlockNode;
  offset: number;
}

/**
 * Scans inline content of `node` from `start`. Returns the offset after the
 * content, or `undefined` when nothing could be consumed.
 */
export type LeafConsumer = (context: BlockContext, node: BlockNode, start: number) => number | undefined;

/**
 * Block recognition protocol. The driver offers each rule the same three
 * lookahead tokens at a line start and takes the first rule that opens.
 */
export interface BlockRule {
  readonly name: string;

  /**
   * Decides whether a block opens at the lookahead. `undefined` is a normal
   * negative result: the driver tries the next rule.
   */
  open(
    context: BlockContext,
    parent: ContainerNode,
    a: Token | undefined,
    b: Token | undefined,
    c: Token | undefined
  ): Link | undefined;

  /**
   * Extends an opened block from `start`. Returns the new offset, or
   * `undefined` when the block closed without advancing past `start`.
   */
  consume(context: BlockContext, node: BlockNode, start: number): number | undefined;

  /**
   * Whether this rule would open at the lookahead and so cuts a running
   * paragraph short. Pure: no nodes, no diagnostics.
   */
  interrupts(a: Token | undefined, b: Token | undefined, c: Token | undefined, options: ResolvedParseOptions): boolean;
}

/**
 * Result of a parse operation
 */
export interface ParseResult {
  /** Arena holding every node of the document */
  arena: NodeArena;

  /** Root document node */
  document: DocumentNode;

  /** Parse diagnostics */
  diagnostics: ParseDiagnostic[];

  /** Precomputed line start offsets */
  lineStarts: number[];

  /** Parse time in milliseconds */
  parseTime: number;

  /** Source text that was parsed */
  sourceText: string;
}

/**
 * Main parser interface
 */
export interface Parser {
  /**
   * Parse a complete document from text
   */
  parseDocument(text: string, options?: ParseOptions): ParseResult;
}

/**
 * Parser creation options
 */
export interface ParserOptions {
  /** Default parse options for all operations */
  defaultParseOptions?: ParseOptions;

  /** Block rules in priority order (default: heading, then paragraph) */
  blockRules?: readonly BlockRule[];

  /** Trace block decisions to the console (default: `PARSE_DEBUG` env var) */
  debug?: boolean;
}

/**
 * Position mapping utilities for editor integration
 */
export interface PositionMapper {
  /** Convert offset to 1-based line/column position */
  offsetToPosition(offset: number): { line: number; column: number };

  /** Convert 1-based line/column position to offset */
  positionToOffset(line: number, column: number): number;

  /** Get precomputed line starts array */
  getLineStarts(): number[];

  /** Get total number of lines */
  getLineCount(): number;
}
