import * as fs from 'fs/promises';
import * as path from 'path';
import { createComponentLogger } from './logger';

const logger = createComponentLogger('ignore-rules');

export const IGNORE_FILE_NAME = '.modscopeignore';

/**
 * Patterns skipped when a project carries no ignore file of its own.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Mix build output and fetched dependencies
  '_build/',
  'deps/',
  'cover/',
  'doc/',

  // Front-end assets bundled into Phoenix projects
  'node_modules/',
  'assets/node_modules/',
  'priv/static/',

  // Editor and OS files
  '*.swp',
  '*~',
  '.DS_Store',
];

/**
 * gitignore-style matcher for `.modscopeignore` plus the project's `.gitignore`.
 *
 * Supported pattern shapes: `dir/`, `/anchored`, `**` prefixes and suffixes,
 * `*` and `?` wildcards, exact names, and `/regex:source/` escapes.
 * Negations (`!pattern`) are dropped.
 */
export class IgnoreRules {
  private globPatterns: string[] = [];
  private regexPatterns: RegExp[] = [];

  constructor(patterns: string[] = []) {
    this.addPatterns(patterns);
  }

  static async fromDirectory(dirPath: string): Promise<IgnoreRules> {
    const own = await readPatternFile(path.join(dirPath, IGNORE_FILE_NAME));
    const gitignore = (await readPatternFile(path.join(dirPath, '.gitignore'))) ?? [];

    const rules = new IgnoreRules([...(own ?? []), ...gitignore]);
    if (own === null) {
      rules.addPatterns(DEFAULT_IGNORE_PATTERNS);
    }
    return rules;
  }

  static parseContent(content: string): string[] {
    return content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'))
      .filter(line => !line.startsWith('!'));
  }

  addPatterns(patterns: string[]): void {
    for (const pattern of patterns) {
      if (pattern.startsWith('/regex:') && pattern.endsWith('/') && pattern.length > 8) {
        const source = pattern.slice(7, -1);
        try {
          this.regexPatterns.push(new RegExp(source));
        } catch (error) {
          logger.warn('Invalid regex pattern', {
            pattern,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      } else if (!this.globPatterns.includes(pattern)) {
        this.globPatterns.push(pattern);
      }
    }
  }

  getPatterns(): { glob: string[]; regex: string[] } {
    return {
      glob: [...this.globPatterns],
      regex: this.regexPatterns.map(r => r.source),
    };
  }

  /**
   * @param relativePath path relative to the scanned root, either separator
   */
  shouldIgnore(relativePath: string): boolean {
    const normalizedPath = relativePath.replace(/\\/g, '/');
    const fileName = path.posix.basename(normalizedPath);

    return (
      this.globPatterns.some(pattern => matchesGlob(normalizedPath, fileName, pattern)) ||
      this.regexPatterns.some(regex => regex.test(normalizedPath))
    );
  }
}

async function readPatternFile(filePath: string): Promise<string[] | null> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return IgnoreRules.parseContent(content);
  } catch {
    // Missing file is the common case
    return null;
  }
}

function matchesGlob(normalizedPath: string, fileName: string, pattern: string): boolean {
  if (pattern.endsWith('/')) {
    const dirPattern = pattern.replace(/^\//, '').slice(0, -1);
    if (pattern.startsWith('/')) {
      return normalizedPath === dirPattern || normalizedPath.startsWith(dirPattern + '/');
    }
    return (
      normalizedPath === dirPattern ||
      normalizedPath.startsWith(dirPattern + '/') ||
      normalizedPath.includes('/' + dirPattern + '/') ||
      normalizedPath.endsWith('/' + dirPattern)
    );
  }

  if (pattern.startsWith('/')) {
    return matchesWildcards(normalizedPath, pattern.slice(1));
  }

  if (pattern.includes('**')) {
    return matchesDoubleAsterisk(normalizedPath, fileName, pattern);
  }

  if (pattern.includes('*') || pattern.includes('?')) {
    return matchesWildcards(fileName, pattern) || matchesWildcards(normalizedPath, pattern);
  }

  return (
    normalizedPath === pattern || fileName === pattern || normalizedPath.endsWith('/' + pattern)
  );
}

function matchesDoubleAsterisk(normalizedPath: string, fileName: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    const suffix = pattern.slice(3);
    return (
      normalizedPath === suffix ||
      normalizedPath.endsWith('/' + suffix) ||
      matchesWildcards(fileName, suffix)
    );
  }

  if (pattern.endsWith('/**')) {
    const prefix = pattern.slice(0, -3);
    return normalizedPath.startsWith(prefix + '/') || normalizedPath === prefix;
  }

  const separator = pattern.indexOf('/**/');
  if (separator !== -1) {
    const prefix = pattern.slice(0, separator);
    const suffix = pattern.slice(separator + 4);
    return (
      normalizedPath.startsWith(prefix + '/') &&
      (normalizedPath.endsWith('/' + suffix) ||
        matchesWildcards(path.posix.basename(normalizedPath), suffix))
    );
  }

  return false;
}

function matchesWildcards(text: string, pattern: string): boolean {
  const regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]');

  return new RegExp('^' + regexPattern + '$').test(text);
}
