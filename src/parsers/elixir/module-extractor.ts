import { SyntaxNode, SyntaxTree } from '../syntax-tree';
import {
  AliasTable,
  applyAliasDirective,
  resolveDirectiveTarget,
  resolveModuleRef,
} from './alias-resolver';
import {
  DirectiveForm,
  FunctionDefinitionForm,
  ModuleDefinitionForm,
  classifyForm,
} from './forms';
import { ModuleName, UNKNOWN_MODULE } from './module-name';
import {
  AliasScoping,
  CallSite,
  ExtractOptions,
  FunctionSignature,
  MFA,
  ModuleRecord,
  ReferenceDirective,
  compareSignatures,
} from './types';

/**
 * Accumulator for one module body. Never shared between two modules.
 */
interface ModuleScope {
  module: ModuleName;
  functions: Map<string, FunctionSignature>;
  calls: CallSite[];
  refs: ReferenceDirective[];
}

/**
 * Walks Elixir syntax trees and produces one {@link ModuleRecord} per `defmodule`.
 *
 * Module bodies are read at two levels. At module level only directives,
 * function definitions and block wrappers count. Inside a function body every
 * other node is transparent, so calls nested in pipes, operators, anonymous
 * functions and literals are found, in pre-order.
 */
export class ModuleExtractor {
  private readonly aliasScoping: AliasScoping;

  constructor(options: ExtractOptions = {}) {
    this.aliasScoping = options.aliasScoping ?? 'shared';
  }

  /**
   * Every module definition in the tree, nested ones included, in pre-order.
   */
  extractModules(tree: SyntaxTree): ModuleRecord[] {
    const records: ModuleRecord[] = [];

    const visit = (node: SyntaxNode, enclosing: ModuleName): void => {
      const form = classifyForm(node);
      let next = enclosing;
      if (form.kind === 'module-definition') {
        const record = this.extract(form, tree.file, enclosing);
        records.push(record);
        next = record.name;
      }
      for (const c of node.children) {
        visit(c, next);
      }
    };

    visit(tree.root, UNKNOWN_MODULE);
    return records;
  }

  /**
   * Build the record of a single module definition. The module name is
   * resolved against an empty alias table; `enclosing` only feeds `__MODULE__`.
   */
  extract(definition: ModuleDefinitionForm, file: string, enclosing: ModuleName): ModuleRecord {
    const scope: ModuleScope = {
      module: resolveModuleRef(definition.name, enclosing, new AliasTable()),
      functions: new Map(),
      calls: [],
      refs: [],
    };

    this.walkModuleBody(definition.body, scope, new AliasTable());

    return {
      name: scope.module,
      file,
      functions: Array.from(scope.functions.values()).sort(compareSignatures),
      calls: scope.calls,
      refs: scope.refs,
    };
  }

  private walkModuleBody(nodes: SyntaxNode[], scope: ModuleScope, aliases: AliasTable): void {
    for (const node of nodes) {
      const form = classifyForm(node);

      switch (form.kind) {
        case 'block':
          this.walkModuleBody(form.statements, scope, aliases);
          break;
        case 'directive':
          this.applyDirective(form, scope, aliases);
          break;
        case 'function-definition':
          this.defineFunction(form, scope, aliases);
          break;
        case 'module-definition':
        case 'remote-call':
        case 'local-call':
        case 'other':
          // attributes, macros and nested modules contribute nothing here
          break;
      }
    }
  }

  private defineFunction(
    definition: FunctionDefinitionForm,
    scope: ModuleScope,
    aliases: AliasTable
  ): void {
    if (definition.name === null) {
      return;
    }

    const signature = { name: definition.name, arity: definition.arity };
    scope.functions.set(`${signature.name}/${signature.arity}`, signature);

    const from: MFA = { module: scope.module, ...signature };
    const bodyAliases = this.aliasScoping === 'lexical' ? aliases.fork() : aliases;
    this.walkExpressions(definition.body, scope, bodyAliases, from);
  }

  private walkExpressions(
    nodes: SyntaxNode[],
    scope: ModuleScope,
    aliases: AliasTable,
    from: MFA
  ): void {
    for (const node of nodes) {
      this.walkExpression(node, scope, aliases, from);
    }
  }

  private walkExpression(node: SyntaxNode, scope: ModuleScope, aliases: AliasTable, from: MFA): void {
    const form = classifyForm(node);

    switch (form.kind) {
      case 'module-definition':
        return;

      case 'function-definition':
        // quoted templates; their bodies still run in the enclosing function
        this.walkExpressions(form.body, scope, aliases, from);
        return;

      case 'directive':
        this.applyDirective(form, scope, aliases);
        return;

      case 'remote-call':
        scope.calls.push({
          kind: 'remote',
          from,
          to: {
            module: resolveModuleRef(form.target, scope.module, aliases),
            name: form.name,
            arity: form.arity,
          },
        });
        this.walkExpressions(form.nested, scope, aliases, from);
        return;

      case 'local-call':
        scope.calls.push({
          kind: 'local',
          from,
          to: { module: scope.module, name: form.name, arity: form.arity },
        });
        this.walkExpressions(form.nested, scope, aliases, from);
        return;

      case 'block':
        this.walkExpressions(form.statements, scope, aliases, from);
        return;

      case 'other':
        this.walkExpressions(form.children, scope, aliases, from);
        return;
    }
  }

  private applyDirective(directive: DirectiveForm, scope: ModuleScope, aliases: AliasTable): void {
    scope.refs.push({
      kind: directive.directive,
      target: resolveDirectiveTarget(directive.target, scope.module, aliases),
    });
    if (directive.directive === 'alias') {
      applyAliasDirective(aliases, directive.target, scope.module);
    }
  }
}

export function extractModules(tree: SyntaxTree, options: ExtractOptions = {}): ModuleRecord[] {
  return new ModuleExtractor(options).extractModules(tree);
}
