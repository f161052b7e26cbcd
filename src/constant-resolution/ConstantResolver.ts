/**
 * Constant Resolver
 *
 * Decides which fully qualified constant a reference binds to, following
 * Ruby's lexical lookup: enclosing namespaces innermost first, then the top
 * level. Only the first segment is looked up lexically; the remaining ones
 * navigate inside whatever the first bound to. Ancestors (superclasses,
 * included modules) are not searched.
 */

import type { NamespaceIndex } from './NamespaceIndex.js';
import {
  qualifiedName,
  type ConstantContext,
  type ConstantReference,
  type NamespaceFrame,
  type NamespacePath,
} from './types.js';

export interface ConstantResolverOptions {
  /**
   * Attribute `Order::STATUSES`, which no file defines on its own, to the
   * file defining the closest known prefix (`Order`). Off by default.
   */
  attributeNestedConstants?: boolean;
}

/**
 * Namespace paths the frames open, innermost first, ending with the top level
 */
export function lexicalNesting(scope: readonly NamespaceFrame[]): NamespacePath[] {
  const nesting: NamespacePath[] = [];

  for (let i = 0; i < scope.length; i++) {
    const outerToInner: string[][] = [];
    for (let j = i; j < scope.length; j++) {
      const frame = scope[j];
      outerToInner.unshift([...frame.segments]);
      if (frame.rootAnchored) break;
    }
    nesting.push(outerToInner.flat());
  }

  nesting.push([]);
  return nesting;
}

export class ConstantResolver {
  private readonly index: NamespaceIndex;
  private readonly attributeNestedConstants: boolean;

  constructor(index: NamespaceIndex, options: ConstantResolverOptions = {}) {
    this.index = index;
    this.attributeNestedConstants = options.attributeNestedConstants ?? false;
  }

  /**
   * @returns The bound constant, with `location: null` for namespace-only
   * nodes; null when nothing in the index matches
   */
  resolve(reference: ConstantReference): ConstantContext | null {
    const [first] = reference.segments;
    if (first === undefined) {
      return null;
    }

    const base = reference.anchor === 'root'
      ? []
      : this.findLexicalBase(first, reference.scope);
    if (base === null) {
      return null;
    }

    const candidate = [...base, ...reference.segments];
    const entry = this.index.entry(candidate);
    if (entry) {
      return { name: entry.qualifiedName, path: entry.path, location: entry.file };
    }

    if (this.attributeNestedConstants) {
      return this.resolveToEnclosingFile(candidate, base.length + 1);
    }
    return null;
  }

  private findLexicalBase(first: string, scope: readonly NamespaceFrame[]): NamespacePath | null {
    for (const namespace of lexicalNesting(scope)) {
      if (this.index.has([...namespace, first])) {
        return namespace;
      }
    }
    return null;
  }

  private resolveToEnclosingFile(candidate: NamespacePath, minLength: number): ConstantContext | null {
    for (let length = candidate.length - 1; length >= minLength; length--) {
      const file = this.index.definingFile(candidate.slice(0, length));
      if (file) {
        return { name: qualifiedName(candidate), path: candidate, location: file };
      }
    }
    return null;
  }
}
