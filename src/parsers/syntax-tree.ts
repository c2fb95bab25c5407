import type Parser from 'tree-sitter';

export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Language-neutral syntax node handed from the parser front end to the extractor.
 *
 * Only named nodes are kept. The anonymous operator token of an operator node
 * survives in `operator`, and a node reached through a grammar field carries
 * the field name (`target`, `left`, `right`, `key`, `value`, ...).
 * `text` is populated for leaves only.
 */
export interface SyntaxNode {
  kind: string;
  text: string;
  field: string | null;
  operator: string | null;
  location: SourceLocation;
  children: SyntaxNode[];
}

export interface SyntaxTree {
  file: string;
  root: SyntaxNode;
}

const FIELD_NAMES = ['target', 'left', 'right', 'operand', 'key', 'value'] as const;

const DROPPED_KINDS = new Set(['comment']);

export function child(node: SyntaxNode, field: string): SyntaxNode | null {
  return node.children.find(c => c.field === field) ?? null;
}

export function childOfKind(node: SyntaxNode, kind: string): SyntaxNode | null {
  return node.children.find(c => c.kind === kind) ?? null;
}

/**
 * Convert a tree-sitter node into the generic representation.
 */
export function fromTreeSitter(node: Parser.SyntaxNode, field: string | null = null): SyntaxNode {
  const named: Parser.SyntaxNode[] = [];
  for (let i = 0; i < node.namedChildCount; i++) {
    const c = node.namedChild(i);
    if (c && !DROPPED_KINDS.has(c.type)) {
      named.push(c);
    }
  }
  const fieldOf = fieldLookup(node);
  const operatorNode = node.childForFieldName('operator');

  return {
    kind: node.type,
    text: named.length === 0 ? node.text : '',
    field,
    operator: operatorNode ? operatorNode.text : null,
    location: {
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
    },
    children: named.map(c => fromTreeSitter(c, fieldOf(c))),
  };
}

/**
 * True when tree-sitter recovered from a syntax error anywhere under `node`:
 * an ERROR node or a zero-width (missing) token.
 */
export function containsSyntaxError(node: Parser.SyntaxNode): boolean {
  if (node.type === 'ERROR') {
    return true;
  }
  if (node.childCount === 0) {
    return node.startIndex === node.endIndex && node.parent !== null;
  }
  for (let i = 0; i < node.childCount; i++) {
    const c = node.child(i);
    if (c && containsSyntaxError(c)) {
      return true;
    }
  }
  return false;
}

function fieldLookup(node: Parser.SyntaxNode): (c: Parser.SyntaxNode) => string | null {
  const entries: Array<[string, Parser.SyntaxNode]> = [];
  for (const name of FIELD_NAMES) {
    const fieldNode = node.childForFieldName(name);
    if (fieldNode) {
      entries.push([name, fieldNode]);
    }
  }

  return c => {
    const match = entries.find(
      ([, f]) => f.startIndex === c.startIndex && f.endIndex === c.endIndex && f.type === c.type
    );
    return match ? match[0] : null;
  };
}
