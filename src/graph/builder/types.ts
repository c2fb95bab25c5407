import { AliasScoping, ModuleRecord } from '../../parsers/elixir/';
import { AnalysisResult } from '../module-graph';

/**
 * Type definitions for GraphBuilder
 * Core interfaces shared across builder modules
 */

export interface BuildOptions {
  /** include `*_test.exs` files */
  includeTestFiles?: boolean;
  /** drop everything that leaves the analyzed modules */
  internalOnly?: boolean;
  aliasScoping?: AliasScoping;
  maxConcurrency?: number;
  maxFileSize?: number;
  /** ignore file relative to the root, or absolute; defaults to `.modscopeignore` */
  ignoreFilePath?: string;
  /** skip ignore files and default ignore patterns altogether */
  useIgnoreFiles?: boolean;
}

export interface DiscoveredFile {
  path: string;
  relativePath: string;
}

export type BuildErrorKind = 'unreadable-source' | 'parse-failure';

export interface BuildError {
  filePath: string;
  kind: BuildErrorKind;
  message: string;
}

export interface ParsedFile {
  filePath: string;
  records: ModuleRecord[];
}

export interface BuildResult {
  graphs: AnalysisResult;
  filesDiscovered: number;
  filesParsed: number;
  modulesExtracted: number;
  errors: BuildError[];
  durationMs: number;
}
