import type Parser from 'tree-sitter';
import path from 'path';
import winston from 'winston';
import { createComponentLogger } from '../utils/logger';
import { SyntaxTree, containsSyntaxError, fromTreeSitter } from './syntax-tree';
import { ExtractOptions, ModuleRecord } from './elixir/types';

export type ParseFailureReason =
  | 'too-large'
  | 'binary'
  | 'syntax-error'
  | 'parser-error';

export interface ParseFailure {
  ok: false;
  file: string;
  reason: ParseFailureReason;
  message: string;
}

export interface ParseSuccess {
  ok: true;
  tree: SyntaxTree;
}

export type ParseOutcome = ParseSuccess | ParseFailure;

export type FileParseResult =
  | { ok: true; file: string; records: ModuleRecord[] }
  | ParseFailure;

export interface ParseOptions extends ExtractOptions {
  maxFileSize?: number;
}

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

/**
 * Abstract base class for language front ends
 */
export abstract class BaseParser {
  protected parser: Parser;
  protected language: string;
  protected logger: winston.Logger;

  constructor(parser: Parser, language: string) {
    this.parser = parser;
    this.language = language;
    this.logger = createComponentLogger(`parser-${language}`);
  }

  /**
   * Parse a file and extract its module records
   */
  abstract parseFile(filePath: string, content: string, options?: ParseOptions): FileParseResult;

  abstract getSupportedExtensions(): string[];

  /**
   * Parse source text into a generic syntax tree. Any recovered syntax error
   * fails the whole file.
   */
  parse(content: string, file: string, options: ParseOptions = {}): ParseOutcome {
    const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

    if (content.length > maxFileSize) {
      return this.failure(file, 'too-large', `Content exceeds ${maxFileSize} characters`);
    }
    if (this.isBinaryContent(content)) {
      return this.failure(file, 'binary', 'Content appears to be binary');
    }

    // Normalize line endings to prevent parser issues
    const normalizedContent = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    let tree: Parser.Tree;
    try {
      tree = this.parser.parse(normalizedContent);
    } catch (error) {
      return this.failure(
        file,
        'parser-error',
        error instanceof Error ? error.message : String(error)
      );
    }

    if (containsSyntaxError(tree.rootNode)) {
      return this.failure(file, 'syntax-error', 'Source contains syntax errors');
    }

    return { ok: true, tree: { file, root: fromTreeSitter(tree.rootNode) } };
  }

  protected failure(file: string, reason: ParseFailureReason, message: string): ParseFailure {
    this.logger.debug('Parse rejected', { file, reason, message });
    return { ok: false, file, reason, message };
  }

  /**
   * Simple heuristic to detect binary content
   */
  private isBinaryContent(content: string): boolean {
    if (content.indexOf('\0') !== -1) {
      return true;
    }
    if (content.length === 0) {
      return false;
    }

    let nonPrintable = 0;
    for (let i = 0; i < content.length; i++) {
      const code = content.charCodeAt(i);
      if (code < 32 && code !== 9 && code !== 10 && code !== 13) {
        nonPrintable++;
      }
    }
    return nonPrintable / content.length > 0.1;
  }
}

/**
 * Parser factory for creating language-specific parsers
 */
export class ParserFactory {
  private static parsers: Map<string, () => BaseParser> = new Map();
  private static extensions: Map<string, string> = new Map();

  static registerParser(language: string, extensions: string[], factory: () => BaseParser): void {
    this.parsers.set(language, factory);
    for (const extension of extensions) {
      this.extensions.set(extension, language);
    }
  }

  static createParser(language: string): BaseParser | null {
    const factory = this.parsers.get(language);
    return factory ? factory() : null;
  }

  static getParserForFile(filePath: string): BaseParser | null {
    const language = this.extensions.get(path.extname(filePath));
    return language ? this.createParser(language) : null;
  }

  static getSupportedExtensions(): string[] {
    return Array.from(this.extensions.keys()).sort();
  }

  static getSupportedLanguages(): string[] {
    return Array.from(this.parsers.keys());
  }
}
