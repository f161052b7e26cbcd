/**
 * Constant node inspector
 *
 * Reports constant reads: `Foo`, `Foo::Bar`, `::Foo`, and constants used as
 * receivers (`Foo::Bar.baz` reports `Foo::Bar`). Only the outermost node of
 * a chain is reported. Declarations are not references: class/module names
 * and assignment targets are skipped, as are method calls spelled like
 * constants (`Integer(x)`).
 */

import type { SyntaxNode } from '../base/index.js';
import { constantPath, isNamespaceNode } from './ruby-nodes.js';
import type { ConstantNameInspector, InspectionContext, UnresolvedReference } from './types.js';

const ASSIGNMENT_NODE_TYPES = new Set(['assignment', 'operator_assignment']);

export class ConstNodeInspector implements ConstantNameInspector {
  inspect(node: SyntaxNode, context: InspectionContext): UnresolvedReference | null {
    const written = constantPath(node);
    if (!written) {
      return null;
    }

    const { parent } = context;
    if (parent && this.isNotAReference(node, parent)) {
      return null;
    }

    return Object.freeze({
      anchor: written.anchor,
      segments: Object.freeze(written.segments),
      scope: context.scope,
      relativePath: context.relativePath,
      span: node.span,
      source: 'constant' as const,
    });
  }

  private isNotAReference(node: SyntaxNode, parent: SyntaxNode): boolean {
    if (parent.type === 'scope_resolution') {
      // Part of a longer chain, reported (or dropped as dynamic) with it
      return node.field === 'name' || (node.field === 'scope' && constantPath(parent) !== null);
    }
    if (isNamespaceNode(parent) && node.field === 'name') {
      return true;
    }
    if (ASSIGNMENT_NODE_TYPES.has(parent.type) && node.field === 'left') {
      return true;
    }
    if (parent.type === 'left_assignment_list') {
      return true;
    }
    return parent.type === 'call' && node.field === 'method';
  }
}
