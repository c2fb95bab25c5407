import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import winston from 'winston';
import { FileParseResult, ParserFactory } from '../../parsers';
import { config } from '../../utils/config';
import { createComponentLogger } from '../../utils/logger';
import { BuildError, BuildOptions, DiscoveredFile, ParsedFile } from './types';

const UTF8_DECODER = new TextDecoder('utf-8', { fatal: true });

export interface ParseFilesResult {
  parsed: ParsedFile[];
  errors: BuildError[];
}

/**
 * File Parsing Orchestrator
 * Reads and parses discovered files under a concurrency limit. A file that
 * cannot be read or parsed is skipped and reported; it never fails the run.
 */
export class FileParsingOrchestrator {
  private logger: winston.Logger;

  constructor(logger?: winston.Logger) {
    this.logger = logger || createComponentLogger('file-parsing-orchestrator');
  }

  /**
   * Results keep the order of `files`, whatever order the reads finish in.
   */
  async parseFiles(files: DiscoveredFile[], options: BuildOptions = {}): Promise<ParseFilesResult> {
    const limit = pLimit(options.maxConcurrency ?? config.analysis.maxConcurrency);

    const outcomes = await Promise.all(
      files.map(file => limit(() => this.parseFile(file, options)))
    );

    const parsed: ParsedFile[] = [];
    const errors: BuildError[] = [];
    for (const outcome of outcomes) {
      if ('records' in outcome) {
        parsed.push(outcome);
      } else {
        errors.push(outcome);
      }
    }

    const byExtension: Record<string, number> = {};
    for (const file of parsed) {
      const ext = path.extname(file.filePath);
      byExtension[ext] = (byExtension[ext] ?? 0) + 1;
    }
    const parseStats = {
      totalFiles: files.length,
      successfulParses: parsed.length,
      failedParses: errors.length,
      totalModules: parsed.reduce((sum, f) => sum + f.records.length, 0),
      byExtension,
    };

    this.logger.info('File parsing completed', parseStats);

    return { parsed, errors };
  }

  private async parseFile(
    file: DiscoveredFile,
    options: BuildOptions
  ): Promise<ParsedFile | BuildError> {
    const content = await this.readSource(file);
    if (typeof content !== 'string') {
      return content;
    }

    const parser = ParserFactory.getParserForFile(file.path);
    if (!parser) {
      return {
        filePath: file.path,
        kind: 'parse-failure',
        message: `No parser registered for ${path.extname(file.path) || file.path}`,
      };
    }

    const result: FileParseResult = parser.parseFile(file.path, content, {
      aliasScoping: options.aliasScoping,
      maxFileSize: options.maxFileSize ?? config.analysis.maxFileSize,
    });

    if (!result.ok) {
      this.logger.warn('Skipping file that failed to parse', {
        path: file.path,
        reason: result.reason,
      });
      return { filePath: file.path, kind: 'parse-failure', message: result.message };
    }

    return { filePath: file.path, records: result.records };
  }

  /**
   * Sources must be valid UTF-8; invalid bytes are reported, never decoded to U+FFFD.
   */
  private async readSource(file: DiscoveredFile): Promise<string | BuildError> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(file.path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Skipping unreadable file', { path: file.path, error: message });
      return { filePath: file.path, kind: 'unreadable-source', message };
    }

    try {
      return UTF8_DECODER.decode(buffer);
    } catch {
      this.logger.warn('Skipping file that is not valid UTF-8', { path: file.path });
      return { filePath: file.path, kind: 'parse-failure', message: 'Content is not valid UTF-8' };
    }
  }
}
