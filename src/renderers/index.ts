import { AnalysisResult } from '../graph/module-graph';
import {
  DotOptions,
  renderCallGraph,
  renderCombined,
  renderModuleCallGraph,
  renderModuleGraph,
} from './dot';
import { GRAPH_SECTIONS, GraphSection, renderJson } from './json';

export * from './json';
export * from './dot';

export const OUTPUT_FORMATS = ['json', 'dot'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const GRAPH_SELECTIONS = ['modules', 'calls', 'module_calls', 'both'] as const;
export type GraphSelection = (typeof GRAPH_SELECTIONS)[number];

export interface RenderedOutput {
  fileName: string;
  content: string;
}

const JSON_SECTIONS: Record<GraphSelection, GraphSection[]> = {
  modules: ['modules', 'module_edges'],
  calls: ['call_nodes', 'call_edges'],
  module_calls: ['modules', 'module_call_edges'],
  both: GRAPH_SECTIONS,
};

const BASE_NAMES: Record<GraphSelection, string> = {
  modules: 'modules',
  calls: 'calls',
  module_calls: 'module_calls',
  both: 'graphs',
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function isGraphSelection(value: string): value is GraphSelection {
  return GRAPH_SELECTIONS.some(graph => graph === value);
}

/**
 * Render one graph selection in one format. The prune list only applies to DOT.
 */
export function renderOutput(
  result: AnalysisResult,
  format: OutputFormat,
  graph: GraphSelection,
  options: DotOptions = {}
): RenderedOutput {
  const fileName = `${BASE_NAMES[graph]}.${format}`;

  if (format === 'json') {
    return { fileName, content: renderJson(result, JSON_SECTIONS[graph]) };
  }

  switch (graph) {
    case 'modules':
      return { fileName, content: renderModuleGraph(result, options) };
    case 'calls':
      return { fileName, content: renderCallGraph(result, options) };
    case 'module_calls':
      return { fileName, content: renderModuleCallGraph(result, options) };
    case 'both':
      return { fileName, content: renderCombined(result, options) };
  }
}
