/**
 * AST reference extractor
 *
 * Two separate stages over one tree: collect unresolved references with
 * the walker and inspectors, then resolve them against the namespace index.
 * Source order is preserved and only references to constants defined by a
 * project file survive resolution.
 */

import type { SyntaxNode } from '../base/index.js';
import type { ConstantResolver } from '../constant-resolution/index.js';
import { ScopeWalker } from './ScopeWalker.js';
import { rubyNamespaceOpener } from './ruby-nodes.js';
import type {
  ConstantNameInspector,
  NamespaceOpener,
  Reference,
  UnresolvedReference,
} from './types.js';

export interface AstReferenceExtractorOptions {
  /** Run in order on every node; results are concatenated */
  inspectors: readonly ConstantNameInspector[];
  resolver: ConstantResolver;
  opener?: NamespaceOpener;
}

export class AstReferenceExtractor {
  private readonly inspectors: readonly ConstantNameInspector[];
  private readonly resolver: ConstantResolver;
  private readonly walker: ScopeWalker;

  constructor(options: AstReferenceExtractorOptions) {
    this.inspectors = options.inspectors;
    this.resolver = options.resolver;
    this.walker = new ScopeWalker(options.opener ?? rubyNamespaceOpener);
  }

  extract(root: SyntaxNode, relativePath: string): Reference[] {
    return this.resolve(this.collect(root, relativePath));
  }

  collect(root: SyntaxNode, relativePath: string): UnresolvedReference[] {
    const references: UnresolvedReference[] = [];

    this.walker.walk(root, ({ node, parent, scope }) => {
      for (const inspector of this.inspectors) {
        const reference = inspector.inspect(node, { parent, scope, relativePath });
        if (reference) {
          references.push(reference);
        }
      }
    });

    return references;
  }

  resolve(unresolved: readonly UnresolvedReference[]): Reference[] {
    const references: Reference[] = [];

    for (const reference of unresolved) {
      const constant = this.resolver.resolve(reference);
      // Namespace-only nodes have no file to depend on
      if (!constant || constant.location === null) continue;

      references.push({
        relativePath: reference.relativePath,
        span: reference.span,
        constant: { name: constant.name, path: constant.path, location: constant.location },
      });
    }

    return references;
  }
}
