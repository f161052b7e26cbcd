/**
 * Constant Resolution Types
 */

/**
 * Ordered namespace segments, outermost first (['Billing', 'Invoice'])
 */
export type NamespacePath = readonly string[];

/**
 * A directory whose files are autoloaded, optionally under a namespace
 */
export interface AutoloadRoot {
  /** Directory relative to the project root (e.g. 'app/models') */
  path: string;
  /** Namespace the root's constants live under (e.g. 'Acme::Core') */
  namespace?: string;
}

export interface NamespaceEntry {
  path: NamespacePath;
  qualifiedName: string;
  /** Defining file relative to the project root, null for namespace-only nodes */
  file: string | null;
  /** True when some directory maps to this namespace */
  isDirectory: boolean;
  /** Autoload root the entry was first found in */
  rootDir: string;
}

/**
 * Resolved identity of a constant
 */
export interface ConstantContext {
  /** Fully qualified name, e.g. 'Billing::Invoice' */
  name: string;
  path: NamespacePath;
  /** Defining file relative to the project root */
  location: string | null;
}

/**
 * The part of a lexical scope frame resolution needs
 */
export interface NamespaceFrame {
  readonly segments: readonly string[];
  /** Opened with a leading `::` (`class ::Foo`), so outer frames do not apply */
  readonly rootAnchored: boolean;
}

/**
 * A constant as written at some site, ready for resolution
 */
export interface ConstantReference {
  anchor: 'root' | 'lexical';
  segments: readonly string[];
  /** Enclosing frames, innermost first; top level is implicit */
  scope: readonly NamespaceFrame[];
}

export const NAMESPACE_SEPARATOR = '::';

export function qualifiedName(path: NamespacePath): string {
  return path.join(NAMESPACE_SEPARATOR);
}

export function parseQualifiedName(name: string): string[] {
  return name
    .split(NAMESPACE_SEPARATOR)
    .filter(segment => segment.length > 0);
}

export function sameConstant(a: ConstantContext, b: ConstantContext): boolean {
  return a.name === b.name;
}
