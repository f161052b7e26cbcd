/**
 * Syntax tree abstraction
 *
 * A uniform node shape that hides which concrete parser produced the tree.
 * Everything past the parser layer (walker, inspectors, resolver) works
 * on these nodes only.
 */

export type Language = 'ruby' | 'erb';

export interface SourcePosition {
  /** 1-based line */
  line: number;
  /** 0-based column */
  column: number;
}

export interface SourceSpan {
  startIndex: number;
  endIndex: number;
  start: SourcePosition;
  end: SourcePosition;
}

export interface SyntaxNode {
  readonly type: string;
  /** Grammar field this node fills in its parent (e.g. 'name', 'superclass') */
  readonly field: string | null;
  /** Source text, only set on named leaves */
  readonly text: string | null;
  readonly children: readonly SyntaxNode[];
  readonly span: SourceSpan;
}

/**
 * Structural subset of a web-tree-sitter Node that conversion relies on
 */
export interface TreeSitterNodeLike {
  readonly id: number;
  readonly type: string;
  readonly text: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: { row: number; column: number };
  readonly endPosition: { row: number; column: number };
  readonly namedChildren: ReadonlyArray<TreeSitterNodeLike | null>;
  childForFieldName(fieldName: string): TreeSitterNodeLike | null;
}

/**
 * Convert a tree-sitter node into a SyntaxNode, keeping named children only.
 *
 * `fields` lists the grammar field names worth recording; a child reached
 * through any other field gets `field: null`.
 */
export function convertTree(root: TreeSitterNodeLike, fields: readonly string[]): SyntaxNode {
  return convertNode(root, null, fields);
}

function convertNode(
  node: TreeSitterNodeLike,
  field: string | null,
  fields: readonly string[]
): SyntaxNode {
  const fieldById = new Map<number, string>();
  for (const name of fields) {
    const child = node.childForFieldName(name);
    if (child && !fieldById.has(child.id)) {
      fieldById.set(child.id, name);
    }
  }

  const namedChildren = node.namedChildren.filter(
    (child): child is TreeSitterNodeLike => child !== null
  );

  const children = namedChildren.map(child =>
    convertNode(child, fieldById.get(child.id) ?? null, fields)
  );

  return Object.freeze({
    type: node.type,
    field,
    text: children.length === 0 ? node.text : null,
    children: Object.freeze(children),
    span: {
      startIndex: node.startIndex,
      endIndex: node.endIndex,
      start: { line: node.startPosition.row + 1, column: node.startPosition.column },
      end: { line: node.endPosition.row + 1, column: node.endPosition.column },
    },
  });
}

/**
 * First child attached under the given field
 */
export function childByField(node: SyntaxNode, field: string): SyntaxNode | null {
  return node.children.find(child => child.field === field) ?? null;
}
