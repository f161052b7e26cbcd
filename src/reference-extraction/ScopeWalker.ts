/**
 * Scope-tracking tree walker
 *
 * Pre-order, depth-first, every node exactly once. Alongside each node it
 * reports the namespace frames a constant lookup at that node would see.
 * Conditionals, methods and blocks are traversed but open no frame; what
 * does open one is decided by the NamespaceOpener.
 */

import type { SyntaxNode } from '../base/index.js';
import type { NamespaceOpener, ScopeFrame, WalkStep } from './types.js';

export class ScopeWalker {
  constructor(private readonly opener: NamespaceOpener) {}

  walk(root: SyntaxNode, visit: (step: WalkStep) => void): void {
    // Explicit stack: source trees can be deep enough to matter
    const stack: WalkStep[] = [{ node: root, parent: null, scope: [] }];

    while (stack.length > 0) {
      const step = stack.pop();
      if (!step) break;
      visit(step);

      const { node, scope } = step;
      const opening = this.opener.opensNamespace(node);
      const innerScope: readonly ScopeFrame[] = opening
        ? [{ node, segments: opening.segments, rootAnchored: opening.rootAnchored }, ...scope]
        : scope;

      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        const outside = opening !== null && child.field !== null && opening.outerFields.includes(child.field);
        stack.push({ node: child, parent: node, scope: outside ? scope : innerScope });
      }
    }
  }

  /**
   * All steps in visiting order
   */
  steps(root: SyntaxNode): WalkStep[] {
    const steps: WalkStep[] = [];
    this.walk(root, step => steps.push(step));
    return steps;
  }
}
