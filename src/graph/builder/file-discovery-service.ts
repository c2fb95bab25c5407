import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { ELIXIR_EXTENSIONS } from '../../parsers/elixir/';
import { IgnoreRules } from '../../utils/ignore-rules';
import { createComponentLogger } from '../../utils/logger';
import { BuildOptions, DiscoveredFile } from './types';

const logger = createComponentLogger('file-discovery-service');

const SKIP_DIRECTORIES = new Set(['_build', 'deps', 'node_modules', 'cover']);

/**
 * File Discovery Service
 * Finds Elixir sources under a root path
 */
export class FileDiscoveryService {
  /**
   * A regular file is returned alone when it is a recognized source; a
   * directory is walked recursively. A missing path yields nothing.
   */
  async discoverFiles(rootPath: string, options: BuildOptions = {}): Promise<DiscoveredFile[]> {
    const rootStats = await statOrNull(rootPath);

    if (!rootStats) {
      logger.warn('Scan root does not exist', { path: rootPath });
      return [];
    }

    if (rootStats.isFile()) {
      const fileName = path.basename(rootPath);
      return this.shouldIncludeFile(rootPath, options) ? [{ path: rootPath, relativePath: fileName }] : [];
    }

    if (!rootStats.isDirectory()) {
      return [];
    }

    const ignoreRules = await this.loadIgnoreRules(rootPath, options);
    const files: DiscoveredFile[] = [];

    const traverse = async (currentPath: string): Promise<void> => {
      const linkStats = await statOrNull(currentPath, fs.lstat);
      const stats = linkStats?.isSymbolicLink() ? await statOrNull(currentPath) : linkStats;
      if (!stats) {
        logger.debug('Skipping unreadable or broken path', { path: currentPath });
        return;
      }

      const relativePath = path.relative(rootPath, currentPath);
      if (relativePath && ignoreRules.shouldIgnore(relativePath)) {
        return;
      }

      if (stats.isDirectory()) {
        if (relativePath && this.shouldSkipDirectory(path.basename(currentPath))) {
          return;
        }
        if (linkStats?.isSymbolicLink()) {
          logger.debug('Not following directory symlink', { path: currentPath });
          return;
        }
        let entries: string[];
        try {
          entries = await fs.readdir(currentPath);
        } catch (error) {
          logger.warn('Cannot read directory', {
            path: currentPath,
            error: error instanceof Error ? error.message : String(error),
          });
          return;
        }
        await Promise.all(entries.map(entry => traverse(path.join(currentPath, entry))));
      } else if (stats.isFile() && this.shouldIncludeFile(currentPath, options)) {
        files.push({ path: currentPath, relativePath });
      }
    };

    await traverse(rootPath);

    // Traversal order depends on the file system; output order must not
    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    logger.info('File discovery completed', {
      root: rootPath,
      totalFiles: files.length,
    });

    return files;
  }

  shouldSkipDirectory(dirName: string): boolean {
    return SKIP_DIRECTORIES.has(dirName) || dirName.startsWith('.');
  }

  shouldIncludeFile(filePath: string, options: BuildOptions): boolean {
    if (!ELIXIR_EXTENSIONS.includes(path.extname(filePath))) {
      return false;
    }
    return options.includeTestFiles === true || !this.isTestFile(filePath);
  }

  isTestFile(filePath: string): boolean {
    return filePath.endsWith('_test.exs');
  }

  private async loadIgnoreRules(rootPath: string, options: BuildOptions): Promise<IgnoreRules> {
    if (options.useIgnoreFiles === false) {
      return new IgnoreRules();
    }
    if (options.ignoreFilePath) {
      const customPath = path.isAbsolute(options.ignoreFilePath)
        ? options.ignoreFilePath
        : path.join(rootPath, options.ignoreFilePath);
      const content = await fs.readFile(customPath, 'utf-8');
      return new IgnoreRules(IgnoreRules.parseContent(content));
    }
    return IgnoreRules.fromDirectory(rootPath);
  }
}

async function statOrNull(
  target: string,
  statFn: (target: string) => Promise<Stats> = fs.stat
): Promise<Stats | null> {
  try {
    return await statFn(target);
  } catch {
    return null;
  }
}
