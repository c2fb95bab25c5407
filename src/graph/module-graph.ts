import winston from 'winston';
import {
  CallKind,
  CallSite,
  DirectiveKind,
  FunctionSignature,
  MFA,
  ModuleName,
  ModuleRecord,
  formatModuleName,
  isKnown,
  moduleKey,
  moduleNamesEqual,
} from '../parsers/elixir/';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('module-graph');

export interface ModuleNode {
  name: ModuleName;
  file: string;
  functions: FunctionSignature[];
}

export type ModuleEdgeKind = 'call' | DirectiveKind;

export interface ModuleEdge {
  from: ModuleName;
  to: ModuleName;
  kind: ModuleEdgeKind;
}

export interface CallNode {
  mfa: MFA;
}

export interface CallEdge {
  kind: CallKind;
  from: MFA;
  to: MFA;
}

export interface ModuleCallEdge {
  from: ModuleName;
  to: ModuleName;
}

export interface AnalysisResult {
  modules: ModuleNode[];
  module_edges: ModuleEdge[];
  call_nodes: CallNode[];
  call_edges: CallEdge[];
  module_call_edges: ModuleCallEdge[];
}

/**
 * Pure fold from module records (file order, then record order) to the five
 * graph artifacts.
 */
export class ModuleGraphBuilder {
  private logger: winston.Logger;

  constructor() {
    this.logger = logger;
  }

  buildGraphs(records: ModuleRecord[]): AnalysisResult {
    this.logger.debug('Building module graphs', { recordCount: records.length });

    const result: AnalysisResult = {
      modules: this.createModuleNodes(records),
      module_edges: this.createModuleEdges(records),
      call_nodes: this.createCallNodes(records),
      call_edges: this.createCallEdges(records),
      module_call_edges: this.createModuleCallEdges(records),
    };

    this.logger.info('Module graphs built', {
      modules: result.modules.length,
      moduleEdges: result.module_edges.length,
      callNodes: result.call_nodes.length,
      callEdges: result.call_edges.length,
    });

    return result;
  }

  createModuleNodes(records: ModuleRecord[]): ModuleNode[] {
    return records.map(record => ({
      name: record.name,
      file: record.file,
      functions: record.functions,
    }));
  }

  /**
   * Calls and directives collapsed to module level. Unknown targets and
   * self-references are dropped; duplicates keep their first position.
   */
  createModuleEdges(records: ModuleRecord[]): ModuleEdge[] {
    const edges: ModuleEdge[] = [];

    for (const record of records) {
      const targets: Array<[ModuleName, ModuleEdgeKind]> = [
        ...record.calls.map((call): [ModuleName, ModuleEdgeKind] => [call.to.module, 'call']),
        ...record.refs.map((ref): [ModuleName, ModuleEdgeKind] => [ref.target, ref.kind]),
      ];

      for (const [to, kind] of targets) {
        if (!isKnown(to) || moduleNamesEqual(to, record.name)) continue;
        edges.push({ from: record.name, to, kind });
      }
    }

    return uniqueBy(edges, e => `${moduleKey(e.from)}\t${moduleKey(e.to)}\t${e.kind}`);
  }

  createCallNodes(records: ModuleRecord[]): CallNode[] {
    const nodes = new Map<string, CallNode>();

    for (const record of records) {
      for (const fn of record.functions) {
        const mfa: MFA = { module: record.name, name: fn.name, arity: fn.arity };
        nodes.set(mfaKey(mfa), { mfa });
      }
    }

    return Array.from(nodes.values()).sort((a, b) => compareMfa(a.mfa, b.mfa));
  }

  /**
   * Every call site in input order. Repeated calls stay repeated.
   */
  createCallEdges(records: ModuleRecord[]): CallEdge[] {
    return records.flatMap(record =>
      record.calls.map((call: CallSite) => ({ kind: call.kind, from: call.from, to: call.to }))
    );
  }

  /**
   * Module-to-module call relation. Unlike module edges, unknown targets are kept.
   */
  createModuleCallEdges(records: ModuleRecord[]): ModuleCallEdge[] {
    const edges: ModuleCallEdge[] = [];

    for (const record of records) {
      const perRecord = record.calls
        .map(call => call.to.module)
        .filter(to => !moduleNamesEqual(to, record.name))
        .map(to => ({ from: record.name, to }));
      edges.push(...uniqueBy(perRecord, moduleCallKey));
    }

    return uniqueBy(edges, moduleCallKey);
  }
}

export function mfaKey(mfa: MFA): string {
  return `${moduleKey(mfa.module)}\t${mfa.name}\t${mfa.arity}`;
}

export function moduleCallKey(edge: ModuleCallEdge): string {
  return `${moduleKey(edge.from)}\t${moduleKey(edge.to)}`;
}

export function compareMfa(a: MFA, b: MFA): number {
  const moduleA = formatModuleName(a.module);
  const moduleB = formatModuleName(b.module);
  if (moduleA !== moduleB) {
    return moduleA < moduleB ? -1 : 1;
  }
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  return a.arity - b.arity;
}

function uniqueBy<T>(items: T[], keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
}
