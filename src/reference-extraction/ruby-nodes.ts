/**
 * Ruby syntax helpers shared by the walker capability and the inspectors
 */

import { childByField, type SyntaxNode } from '../base/index.js';
import type { NamespaceOpener, NamespaceOpening } from './types.js';

export interface ConstantPath {
  anchor: 'root' | 'lexical';
  segments: string[];
}

/**
 * Static constant path of a `constant` or `scope_resolution` node.
 *
 * `Foo` -> lexical [Foo], `Foo::Bar` -> lexical [Foo, Bar],
 * `::Foo` -> root [Foo]. Chains rooted in anything but a constant
 * (`self::Foo`, `foo::Bar`) are dynamic and give null.
 */
export function constantPath(node: SyntaxNode): ConstantPath | null {
  if (node.type === 'constant') {
    return node.text === null ? null : { anchor: 'lexical', segments: [node.text] };
  }

  if (node.type !== 'scope_resolution') {
    return null;
  }

  const name = childByField(node, 'name');
  if (!name || name.type !== 'constant' || name.text === null) {
    return null;
  }

  const scope = childByField(node, 'scope');
  if (!scope) {
    return { anchor: 'root', segments: [name.text] };
  }

  const inner = constantPath(scope);
  return inner && { anchor: inner.anchor, segments: [...inner.segments, name.text] };
}

const NAMESPACE_NODE_TYPES = new Set(['class', 'module']);

export function isNamespaceNode(node: SyntaxNode): boolean {
  return NAMESPACE_NODE_TYPES.has(node.type);
}

/**
 * `class`/`module` open a namespace for their body. The declared name and
 * the superclass are evaluated outside it.
 */
export const rubyNamespaceOpener: NamespaceOpener = {
  opensNamespace(node: SyntaxNode): NamespaceOpening | null {
    if (!isNamespaceNode(node)) {
      return null;
    }

    const name = childByField(node, 'name');
    const declared = name && constantPath(name);
    if (!declared) {
      return null;
    }

    return {
      segments: declared.segments,
      rootAnchored: declared.anchor === 'root',
      outerFields: ['name', 'superclass'],
    };
  },
};
