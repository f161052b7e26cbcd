/**
 * Reference Extraction module exports
 */

export type {
  ScopeFrame,
  NamespaceOpening,
  NamespaceOpener,
  WalkStep,
  InspectionContext,
  ReferenceSource,
  UnresolvedReference,
  ConstantNameInspector,
  ResolvedConstant,
  Reference,
} from './types.js';

export { ScopeWalker } from './ScopeWalker.js';
export { constantPath, rubyNamespaceOpener } from './ruby-nodes.js';
export type { ConstantPath } from './ruby-nodes.js';
export { ConstNodeInspector } from './ConstNodeInspector.js';
export { AssociationInspector } from './AssociationInspector.js';
export { AstReferenceExtractor } from './AstReferenceExtractor.js';
export type { AstReferenceExtractorOptions } from './AstReferenceExtractor.js';
export { ReferenceExtractor, createDefaultRegistry, SNIPPET_PATH } from './ReferenceExtractor.js';
export type { ReferenceExtractorOptions, CreateExtractorOptions } from './ReferenceExtractor.js';
