import { ModuleName, formatModuleName } from './module-name';

export interface FunctionSignature {
  name: string;
  arity: number;
}

export interface MFA {
  module: ModuleName;
  name: string;
  arity: number;
}

export type CallKind = 'local' | 'remote';

export interface CallSite {
  kind: CallKind;
  from: MFA;
  to: MFA;
}

export type DirectiveKind = 'alias' | 'import' | 'use';

export interface ReferenceDirective {
  kind: DirectiveKind;
  target: ModuleName;
}

/**
 * Everything extracted from one `defmodule` body. Records are never merged,
 * even when two files define the same module name.
 */
export interface ModuleRecord {
  name: ModuleName;
  file: string;
  /** unique by name and arity, sorted */
  functions: FunctionSignature[];
  /** encounter order */
  calls: CallSite[];
  /** encounter order */
  refs: ReferenceDirective[];
}

export const ELIXIR_EXTENSIONS = ['.ex', '.exs'];

/**
 * Alias tables are either threaded through every function body of a module
 * (`shared`, mutations leak to later siblings) or forked per body (`lexical`).
 */
export type AliasScoping = 'shared' | 'lexical';

export interface ExtractOptions {
  aliasScoping?: AliasScoping;
}

export function formatMfa(mfa: MFA): string {
  return `${formatModuleName(mfa.module)}.${mfa.name}/${mfa.arity}`;
}

export function compareSignatures(a: FunctionSignature, b: FunctionSignature): number {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return a.arity - b.arity;
}
