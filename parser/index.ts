export { createTokenizer, tokenize, type Tokenizer, type TokenizerDebugState } from './scanner/tokenizer.js';
export * from './scanner/token-types.js';

export * from './ast-types.js';
export * from './ast-factory.js';
export * from './parser-interfaces.js';
export * from './parser-utils.js';

export { consumeLeaf } from './blocks/leaf.js';
export { createHeadingRule, headingRule, type HeadingRuleOptions } from './blocks/heading.js';
export { createParagraphRule, type ParagraphRuleOptions } from './blocks/paragraph.js';
export { createDefaultBlockRules, createParser, parseDocument, resolveParseOptions } from './core-parser.js';
