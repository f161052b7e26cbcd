/**
 * constref
 *
 * Finds references to autoloaded Ruby constants and resolves each one to the
 * project file expected to define it, using tree-sitter WASM bindings.
 *
 * ## Recommended API (use these):
 * - ReferenceExtractor - referencesFromString / referencesFromFile
 * - scanAutoloadRoots, NamespaceIndexBuilder - build the namespace index
 * - loadProjectConfig - read constref.json
 *
 * ## Extension points:
 * - ConstantNameInspector - recognize more kinds of references
 * - LanguageParser, ParserRegistry - add file types
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

// Base infrastructure (syntax tree, parser interface, registry, errors)
export * from './base/index.js';

// Parsers
export * from './ruby/index.js';
export * from './erb/index.js';

// Configuration
export * from './config/index.js';

// Namespace index and resolution
export * from './constant-resolution/index.js';

// Reference extraction
export * from './reference-extraction/index.js';

// =============================================================================
// INTERNAL API - Low-level, exported for tests and tooling
// =============================================================================

/**
 * @internal WASM loader utilities
 */
export { WasmLoader } from './wasm/index.js';
export type { SupportedLanguage } from './wasm/index.js';
