import { MFA, ModuleName, formatModuleName } from '../parsers/elixir/';
import { AnalysisResult } from '../graph/module-graph';

export interface DotOptions {
  /** module names (text form) removed from the output with every edge touching them */
  prune?: Iterable<string>;
}

export const CALL_GRAPH_SEPARATOR = '// Function-level call graph';

export function quoteId(id: string): string {
  return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function mfaLabel(mfa: MFA): string {
  return `${formatModuleName(mfa.module)}.${mfa.name}/${mfa.arity}`;
}

function digraph(name: string, nodeLines: string[], edgeLines: string[]): string {
  return [`digraph ${name} {`, '  rankdir=LR;', ...unique(nodeLines), ...edgeLines, '}'].join('\n');
}

function moduleNodeLine(name: ModuleName): string {
  const label = formatModuleName(name);
  return `  ${quoteId(label)} [label=${quoteId(label)}];`;
}

function pruneSet(options: DotOptions): Set<string> {
  return new Set(options.prune ?? []);
}

/**
 * Module dependency graph with one labelled edge per (from, to, kind).
 */
export function renderModuleGraph(
  result: Pick<AnalysisResult, 'modules' | 'module_edges'>,
  options: DotOptions = {}
): string {
  const pruned = pruneSet(options);
  const kept = (name: ModuleName): boolean => !pruned.has(formatModuleName(name));

  const nodes = result.modules.filter(m => kept(m.name)).map(m => moduleNodeLine(m.name));
  const edges = result.module_edges
    .filter(e => kept(e.from) && kept(e.to))
    .map(
      e =>
        `  ${quoteId(formatModuleName(e.from))} -> ${quoteId(formatModuleName(e.to))} [label=${quoteId(e.kind)}];`
    );

  return digraph('modules', nodes, edges);
}

/**
 * Function call graph. Local calls are solid, remote calls dashed.
 */
export function renderCallGraph(
  result: Pick<AnalysisResult, 'call_nodes' | 'call_edges'>,
  options: DotOptions = {}
): string {
  const pruned = pruneSet(options);
  const kept = (mfa: MFA): boolean => !pruned.has(formatModuleName(mfa.module));

  const nodes = result.call_nodes
    .filter(n => kept(n.mfa))
    .map(n => {
      const label = mfaLabel(n.mfa);
      return `  ${quoteId(label)} [label=${quoteId(label)}];`;
    });
  const edges = result.call_edges
    .filter(e => kept(e.from) && kept(e.to))
    .map(e => {
      const style = e.kind === 'local' ? 'solid' : 'dashed';
      return `  ${quoteId(mfaLabel(e.from))} -> ${quoteId(mfaLabel(e.to))} [style=${style}];`;
    });

  return digraph('calls', nodes, edges);
}

/**
 * Module-level view of the call graph.
 */
export function renderModuleCallGraph(
  result: Pick<AnalysisResult, 'modules' | 'module_call_edges'>,
  options: DotOptions = {}
): string {
  const pruned = pruneSet(options);
  const kept = (name: ModuleName): boolean => !pruned.has(formatModuleName(name));

  const nodes = result.modules.filter(m => kept(m.name)).map(m => moduleNodeLine(m.name));
  const edges = result.module_call_edges
    .filter(e => kept(e.from) && kept(e.to))
    .map(e => `  ${quoteId(formatModuleName(e.from))} -> ${quoteId(formatModuleName(e.to))};`);

  return digraph('module_calls', nodes, edges);
}

/**
 * Module-level call graph followed by the function-level one, in one file.
 */
export function renderCombined(result: AnalysisResult, options: DotOptions = {}): string {
  return [
    renderModuleCallGraph(result, options),
    '',
    CALL_GRAPH_SEPARATOR,
    renderCallGraph(result, options),
  ].join('\n');
}

function unique(lines: string[]): string[] {
  return Array.from(new Set(lines));
}
