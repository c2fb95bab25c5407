/**
 * modscope - module and call graphs for Elixir projects
 *
 * Main entry point for library usage.
 */

import { GraphBuilder } from './graph/builder';
import { AnalysisResult } from './graph/module-graph';
import { AliasScoping } from './parsers/elixir/';

export { BaseParser, ParserFactory, ElixirParser } from './parsers';
export * from './parsers/elixir/';
export * from './graph';
export * from './renderers';
export * from './utils';

export interface AnalyzeOptions {
  includeTests?: boolean;
  internalOnly?: boolean;
  aliasScoping?: AliasScoping;
  maxConcurrency?: number;
}

/**
 * Scan, parse and extract every Elixir source under `rootPath` and build the
 * graph artifacts. Unreadable or unparsable files are skipped.
 */
export async function analyze(
  rootPath: string,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const result = await new GraphBuilder().analyzeRepository(rootPath, {
    includeTestFiles: options.includeTests ?? false,
    internalOnly: options.internalOnly ?? false,
    aliasScoping: options.aliasScoping,
    maxConcurrency: options.maxConcurrency,
  });
  return result.graphs;
}
