/**
 * Association inspector
 *
 * ActiveRecord associations name their target class implicitly:
 * `has_many :line_items` refers to `LineItem`, `belongs_to :order` to
 * `Order`. An explicit `class_name: "Billing::Order"` wins. Polymorphic
 * associations and interpolated class names are dynamic and skipped.
 */

import pluralize from 'pluralize';
import { childByField, type SyntaxNode } from '../base/index.js';
import { Inflector, parseQualifiedName } from '../constant-resolution/index.js';
import type { ConstantNameInspector, InspectionContext, UnresolvedReference } from './types.js';

const SINGULAR_ASSOCIATIONS = new Set(['belongs_to', 'has_one']);
const PLURAL_ASSOCIATIONS = new Set(['has_many', 'has_and_belongs_to_many']);

interface AssociationOptions {
  className: string | null;
  polymorphic: boolean;
}

export class AssociationInspector implements ConstantNameInspector {
  private readonly inflector: Inflector;

  constructor(inflector: Inflector = new Inflector()) {
    this.inflector = inflector;
  }

  inspect(node: SyntaxNode, context: InspectionContext): UnresolvedReference | null {
    const macro = this.associationMacro(node);
    if (!macro) {
      return null;
    }

    const args = childByField(node, 'arguments');
    const [first] = args?.children ?? [];
    if (!args || !first || first.type !== 'simple_symbol' || first.text === null) {
      return null;
    }

    const options = this.readOptions(args);
    if (!options || options.polymorphic) {
      return null;
    }

    const associationName = first.text.replace(/^:/, '');
    let anchor: 'root' | 'lexical' = 'lexical';
    let segments: string[];

    if (options.className !== null) {
      anchor = options.className.startsWith('::') ? 'root' : 'lexical';
      segments = parseQualifiedName(options.className);
    } else {
      const singular = PLURAL_ASSOCIATIONS.has(macro) ? pluralize.singular(associationName) : associationName;
      segments = [this.inflector.camelize(singular)];
    }

    if (segments.length === 0 || !segments.every(Inflector.isConstantName)) {
      return null;
    }

    return Object.freeze({
      anchor,
      segments: Object.freeze(segments),
      scope: context.scope,
      relativePath: context.relativePath,
      span: node.span,
      source: 'association' as const,
    });
  }

  /**
   * Macro name of an implicit-receiver association call, or null
   */
  private associationMacro(node: SyntaxNode): string | null {
    if (node.type !== 'call' || childByField(node, 'receiver')) {
      return null;
    }
    const method = childByField(node, 'method');
    if (!method || method.type !== 'identifier' || method.text === null) {
      return null;
    }
    const name = method.text;
    return SINGULAR_ASSOCIATIONS.has(name) || PLURAL_ASSOCIATIONS.has(name) ? name : null;
  }

  /**
   * Options relevant to the target class; null when the class name is dynamic
   */
  private readOptions(args: SyntaxNode): AssociationOptions | null {
    const options: AssociationOptions = { className: null, polymorphic: false };

    for (const pair of args.children.filter(child => child.type === 'pair')) {
      const key = childByField(pair, 'key');
      const value = childByField(pair, 'value');
      if (!key || !value || key.text === null) continue;

      const keyName = key.text.replace(/^:/, '').replace(/:$/, '');
      if (keyName === 'polymorphic') {
        options.polymorphic = value.type === 'true';
      } else if (keyName === 'class_name') {
        const className = stringLiteral(value);
        if (className === null) {
          return null;
        }
        options.className = className;
      }
    }

    return options;
  }
}

/**
 * Content of a plain string literal, null when it interpolates
 */
function stringLiteral(node: SyntaxNode): string | null {
  if (node.type !== 'string') {
    return null;
  }
  if (node.children.some(child => child.type !== 'string_content')) {
    return null;
  }
  return node.children.map(child => child.text ?? '').join('');
}
