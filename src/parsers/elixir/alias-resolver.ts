import { SyntaxNode, child } from '../syntax-tree';
import { DirectiveTarget, callArguments } from './forms';
import {
  ModuleName,
  QualifiedName,
  UNKNOWN_MODULE,
  appendSegments,
  isKnown,
  lastSegment,
  qualifiedName,
} from './module-name';

/**
 * Short alias → fully qualified module, owned by exactly one module traversal.
 */
export class AliasTable {
  private readonly entries: Map<string, QualifiedName>;

  constructor(entries: Iterable<[string, QualifiedName]> = []) {
    this.entries = new Map(entries);
  }

  get(alias: string): QualifiedName | undefined {
    return this.entries.get(alias);
  }

  set(alias: string, target: QualifiedName): void {
    this.entries.set(alias, target);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Copy used for a lexically scoped function body.
   */
  fork(): AliasTable {
    return new AliasTable(this.entries);
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [alias, target] of this.entries) {
      record[alias] = target.segments.join('.');
    }
    return record;
  }
}

/**
 * Resolve a module reference to a fully qualified name.
 *
 * Literal aliases expand their first segment through `table`; `__MODULE__`
 * stands for `currentModule`; `unquote(x)` reduces to `x`. Anything computed
 * at run time resolves to `UNKNOWN_MODULE`.
 */
export function resolveModuleRef(
  ref: SyntaxNode | null,
  currentModule: ModuleName,
  table: AliasTable
): ModuleName {
  if (!ref) {
    return UNKNOWN_MODULE;
  }

  switch (ref.kind) {
    case 'alias':
      return expandAlias(ref.text.split('.'), table);

    case 'atom':
      return ref.text.length > 1 ? qualifiedName([ref.text]) : UNKNOWN_MODULE;

    case 'identifier':
      return ref.text === '__MODULE__' ? currentModule : UNKNOWN_MODULE;

    case 'dot': {
      // __MODULE__.Sub, unquote(base).Sub
      const left = child(ref, 'left');
      const right = child(ref, 'right');
      if (!left || !right || right.kind !== 'alias') {
        return UNKNOWN_MODULE;
      }
      return appendSegments(resolveModuleRef(left, currentModule, table), right.text.split('.'));
    }

    case 'call': {
      const target = child(ref, 'target');
      const args = callArguments(ref);
      if (target && target.kind === 'identifier' && target.text === 'unquote' && args.length === 1) {
        return resolveModuleRef(args[0], currentModule, table);
      }
      return UNKNOWN_MODULE;
    }

    default:
      return UNKNOWN_MODULE;
  }
}

/**
 * Module named by a directive's reference. A multi-target alias names no
 * single module, so its reference is unknown; its children still reach the
 * table through `applyAliasDirective`.
 */
export function resolveDirectiveTarget(
  target: DirectiveTarget,
  currentModule: ModuleName,
  table: AliasTable
): ModuleName {
  switch (target.form) {
    case 'single':
    case 'renamed':
      return resolveModuleRef(target.ref, currentModule, table);

    case 'multi':
      return UNKNOWN_MODULE;
  }
}

/**
 * Apply an `alias` directive to the table. Unresolvable targets leave it untouched.
 */
export function applyAliasDirective(
  table: AliasTable,
  target: DirectiveTarget,
  currentModule: ModuleName
): void {
  switch (target.form) {
    case 'single': {
      const resolved = resolveModuleRef(target.ref, currentModule, table);
      if (isKnown(resolved)) {
        table.set(lastSegment(resolved), resolved);
      }
      return;
    }

    case 'renamed': {
      const resolved = resolveModuleRef(target.ref, currentModule, table);
      if (!isKnown(resolved)) {
        return;
      }
      const renamed = target.as.kind === 'alias' && !target.as.text.includes('.');
      table.set(renamed ? target.as.text : lastSegment(resolved), resolved);
      return;
    }

    case 'multi': {
      const base = resolveModuleRef(target.base, currentModule, table);
      if (!isKnown(base)) {
        return;
      }
      for (const c of target.children) {
        if (c.kind !== 'alias') continue;
        const segments = c.text.split('.');
        table.set(segments[segments.length - 1], qualifiedName([...base.segments, ...segments]));
      }
      return;
    }
  }
}

function expandAlias(segments: string[], table: AliasTable): ModuleName {
  const [head, ...rest] = segments;
  const expansion = table.get(head);
  return expansion ? qualifiedName([...expansion.segments, ...rest]) : qualifiedName(segments);
}
