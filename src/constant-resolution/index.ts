/**
 * Constant Resolution module exports
 *
 * Naming convention, namespace index, directory scan and lexical lookup.
 */

export type {
  NamespacePath,
  AutoloadRoot,
  NamespaceEntry,
  ConstantContext,
  NamespaceFrame,
  ConstantReference,
} from './types.js';
export { NAMESPACE_SEPARATOR, qualifiedName, parseQualifiedName, sameConstant } from './types.js';

export { Inflector } from './Inflector.js';
export type { InflectorOptions } from './Inflector.js';
export { NamespaceIndex, NamespaceIndexBuilder } from './NamespaceIndex.js';
export type { NamespaceIndexBuilderOptions } from './NamespaceIndex.js';
export { scanAutoloadRoots, listRubyFiles } from './DirectoryScanner.js';
export type { ScanOptions } from './DirectoryScanner.js';
export { ConstantResolver, lexicalNesting } from './ConstantResolver.js';
export type { ConstantResolverOptions } from './ConstantResolver.js';
