import { SyntaxNode, child, childOfKind } from '../syntax-tree';
import { DirectiveKind } from './types';

/**
 * Target of an `alias`/`import`/`use` directive.
 * Only `alias` takes the renamed (`as:`) and multi-target (`A.{B, C}`) shapes.
 */
export type DirectiveTarget =
  | { form: 'single'; ref: SyntaxNode | null }
  | { form: 'renamed'; ref: SyntaxNode; as: SyntaxNode }
  | { form: 'multi'; base: SyntaxNode; children: SyntaxNode[] };

export interface ModuleDefinitionForm {
  kind: 'module-definition';
  node: SyntaxNode;
  name: SyntaxNode | null;
  body: SyntaxNode[];
}

export interface FunctionDefinitionForm {
  kind: 'function-definition';
  node: SyntaxNode;
  /** null when the name is computed (`def unquote(name)(...)`) */
  name: string | null;
  arity: number;
  body: SyntaxNode[];
}

export interface DirectiveForm {
  kind: 'directive';
  node: SyntaxNode;
  directive: DirectiveKind;
  target: DirectiveTarget;
}

export interface RemoteCallForm {
  kind: 'remote-call';
  node: SyntaxNode;
  target: SyntaxNode;
  name: string;
  arity: number;
  nested: SyntaxNode[];
}

export interface LocalCallForm {
  kind: 'local-call';
  node: SyntaxNode;
  name: string;
  arity: number;
  nested: SyntaxNode[];
}

export interface BlockForm {
  kind: 'block';
  statements: SyntaxNode[];
}

export interface OtherForm {
  kind: 'other';
  children: SyntaxNode[];
}

export type ElixirForm =
  | ModuleDefinitionForm
  | FunctionDefinitionForm
  | DirectiveForm
  | RemoteCallForm
  | LocalCallForm
  | BlockForm
  | OtherForm;

const FUNCTION_DEFINERS = new Set(['def', 'defp']);
const DIRECTIVES = new Set<string>(['alias', 'import', 'use']);
const BLOCK_KINDS = new Set(['source', 'block']);

function isDirective(name: string): name is DirectiveKind {
  return DIRECTIVES.has(name);
}

export function classifyForm(node: SyntaxNode): ElixirForm {
  if (BLOCK_KINDS.has(node.kind)) {
    return { kind: 'block', statements: node.children };
  }
  if (node.kind !== 'call') {
    return { kind: 'other', children: node.children };
  }

  const target = child(node, 'target');
  const args = callArguments(node);
  const doBlock = childOfKind(node, 'do_block');
  const arity = args.length + (doBlock ? 1 : 0);
  const nested = doBlock ? [...args, doBlock] : args;

  if (target && target.kind === 'identifier') {
    const name = target.text;

    if (name === 'defmodule') {
      return { kind: 'module-definition', node, name: args[0] ?? null, body: bodyOf(args, doBlock) };
    }
    if (FUNCTION_DEFINERS.has(name)) {
      return { kind: 'function-definition', node, ...functionHead(args[0]), body: bodyOf(args, doBlock) };
    }
    if (isDirective(name)) {
      return { kind: 'directive', node, directive: name, target: directiveTarget(name, args) };
    }
    return { kind: 'local-call', node, name, arity, nested };
  }

  if (target && target.kind === 'dot') {
    const left = child(target, 'left');
    const right = child(target, 'right');
    if (left && right && right.kind === 'identifier') {
      return {
        kind: 'remote-call',
        node,
        target: left,
        name: right.text,
        arity,
        nested: [left, ...nested],
      };
    }
  }

  return { kind: 'other', children: node.children };
}

export function callArguments(call: SyntaxNode): SyntaxNode[] {
  return childOfKind(call, 'arguments')?.children ?? [];
}

/**
 * Look up `key:` in a trailing keyword list argument.
 */
export function keywordOption(args: SyntaxNode[], key: string): SyntaxNode | null {
  const last = args[args.length - 1];
  if (!last || last.kind !== 'keywords') {
    return null;
  }
  for (const pair of last.children) {
    const keyNode = child(pair, 'key');
    if (keyNode && keywordText(keyNode) === key) {
      return child(pair, 'value');
    }
  }
  return null;
}

export function keywordText(keyNode: SyntaxNode): string {
  return keyNode.text.replace(/:\s*$/, '').trim();
}

function bodyOf(args: SyntaxNode[], doBlock: SyntaxNode | null): SyntaxNode[] {
  if (doBlock) {
    return doBlock.children;
  }
  const inline = keywordOption(args, 'do');
  return inline ? [inline] : [];
}

function functionHead(head: SyntaxNode | null | undefined): { name: string | null; arity: number } {
  if (!head) {
    return { name: null, arity: 0 };
  }
  // def name(args) when guard
  if (head.kind === 'binary_operator' && head.operator === 'when') {
    return functionHead(child(head, 'left'));
  }
  if (head.kind === 'identifier') {
    return { name: head.text, arity: 0 };
  }
  // def left <~> right, def -value
  if (head.kind === 'binary_operator' && head.operator) {
    return { name: head.operator, arity: 2 };
  }
  if (head.kind === 'unary_operator' && head.operator) {
    return { name: head.operator, arity: 1 };
  }
  if (head.kind === 'call') {
    const target = child(head, 'target');
    if (target && target.kind === 'identifier') {
      return { name: target.text, arity: callArguments(head).length };
    }
  }
  return { name: null, arity: 0 };
}

function directiveTarget(directive: DirectiveKind, args: SyntaxNode[]): DirectiveTarget {
  const ref = args[0] ?? null;
  if (directive !== 'alias' || !ref) {
    return { form: 'single', ref };
  }

  const right = child(ref, 'right');
  const base = child(ref, 'left');
  if (ref.kind === 'dot' && base && right && right.kind === 'tuple') {
    return { form: 'multi', base, children: right.children };
  }

  const as = keywordOption(args.slice(1), 'as');
  if (as) {
    return { form: 'renamed', ref, as };
  }
  return { form: 'single', ref };
}
