import { ModuleName, isKnown, moduleKey } from '../parsers/elixir/';
import { createComponentLogger } from '../utils/logger';
import { AnalysisResult, mfaKey } from './module-graph';

const logger = createComponentLogger('internal-filter');

/**
 * Restrict the artifacts to modules defined in the analyzed sources.
 *
 * Pass one drops every edge with an endpoint outside the known modules. Pass
 * two drops call nodes that no surviving call edge touches. Module nodes are
 * never removed.
 */
export function filterInternal(result: AnalysisResult): AnalysisResult {
  const known = new Set(result.modules.map(m => m.name).filter(isKnown).map(moduleKey));
  const isInternal = (name: ModuleName): boolean => isKnown(name) && known.has(moduleKey(name));

  const moduleEdges = result.module_edges.filter(e => isInternal(e.from) && isInternal(e.to));
  const moduleCallEdges = result.module_call_edges.filter(
    e => isInternal(e.from) && isInternal(e.to)
  );
  const callEdges = result.call_edges.filter(
    e => isInternal(e.from.module) && isInternal(e.to.module)
  );

  const endpoints = new Set<string>();
  for (const edge of callEdges) {
    endpoints.add(mfaKey(edge.from));
    endpoints.add(mfaKey(edge.to));
  }
  const callNodes = result.call_nodes.filter(n => endpoints.has(mfaKey(n.mfa)));

  logger.debug('Applied internal-only filter', {
    knownModules: known.size,
    droppedCallEdges: result.call_edges.length - callEdges.length,
    droppedCallNodes: result.call_nodes.length - callNodes.length,
  });

  return {
    modules: result.modules,
    module_edges: moduleEdges,
    call_nodes: callNodes,
    call_edges: callEdges,
    module_call_edges: moduleCallEdges,
  };
}
