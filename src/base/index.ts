/**
 * Base parser infrastructure
 *
 * Exports the syntax tree abstraction, parser interface, registry and errors
 */

export * from './SyntaxTree.js';
export * from './LanguageParser.js';
export * from './ParserRegistry.js';
export * from './errors.js';
