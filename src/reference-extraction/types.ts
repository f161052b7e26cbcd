/**
 * Reference Extraction Types
 */

import type { SourceSpan, SyntaxNode } from '../base/index.js';
import type {
  ConstantContext,
  ConstantReference,
  NamespaceFrame,
} from '../constant-resolution/index.js';

/**
 * One enclosing class/module, as seen from a reference site
 */
export interface ScopeFrame extends NamespaceFrame {
  /** The class/module node that opened the frame */
  readonly node: SyntaxNode;
}

/**
 * What a namespace-opening construct introduces
 */
export interface NamespaceOpening {
  segments: string[];
  rootAnchored: boolean;
  /**
   * Child fields evaluated in the enclosing scope rather than the new one
   * (the declared name, the superclass expression)
   */
  outerFields: readonly string[];
}

/**
 * Grammar-specific knowledge the walker delegates to
 */
export interface NamespaceOpener {
  opensNamespace(node: SyntaxNode): NamespaceOpening | null;
}

export interface WalkStep {
  node: SyntaxNode;
  parent: SyntaxNode | null;
  /** Enclosing frames, innermost first */
  scope: readonly ScopeFrame[];
}

export interface InspectionContext {
  parent: SyntaxNode | null;
  scope: readonly ScopeFrame[];
  relativePath: string;
}

export type ReferenceSource = 'constant' | 'association';

export interface UnresolvedReference extends ConstantReference {
  readonly scope: readonly ScopeFrame[];
  readonly relativePath: string;
  readonly span: SourceSpan;
  /** Inspector kind that produced the reference */
  readonly source: ReferenceSource;
}

/**
 * Recognizes constant references in single nodes. Implementations must not
 * mutate nodes or do I/O.
 */
export interface ConstantNameInspector {
  inspect(node: SyntaxNode, context: InspectionContext): UnresolvedReference | null;
}

export type ResolvedConstant = ConstantContext & { location: string };

/**
 * A reference to a constant defined by a project file
 */
export interface Reference {
  /** Referencing file relative to the project root, or '<snippet>' */
  relativePath: string;
  span: SourceSpan;
  constant: ResolvedConstant;
}
