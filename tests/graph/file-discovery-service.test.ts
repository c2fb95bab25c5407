import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileDiscoveryService } from '../../src/graph/builder/file-discovery-service';

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

describe('FileDiscoveryService', () => {
  let service: FileDiscoveryService;
  let tempDir: string;

  beforeEach(async () => {
    service = new FileDiscoveryService();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modscope-discovery-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should find Elixir sources sorted by path', async () => {
    await writeFiles(tempDir, {
      'lib/zeta.ex': 'defmodule Zeta do end',
      'lib/alpha/beta.ex': 'defmodule Alpha.Beta do end',
      'mix.exs': 'defmodule Project.MixProject do end',
      'README.md': '# readme',
      'lib/notes.txt': 'notes',
    });

    const files = await service.discoverFiles(tempDir);

    expect(files.map(f => f.relativePath)).toEqual([
      path.join('lib', 'alpha', 'beta.ex'),
      path.join('lib', 'zeta.ex'),
      'mix.exs',
    ]);
    expect(files[0].path).toBe(path.join(tempDir, 'lib', 'alpha', 'beta.ex'));
  });

  it('should exclude test scripts unless asked to include them', async () => {
    await writeFiles(tempDir, {
      'lib/app.ex': '',
      'test/app_test.exs': '',
      'test/test_helper.exs': '',
    });

    const without = await service.discoverFiles(tempDir);
    const withTests = await service.discoverFiles(tempDir, { includeTestFiles: true });

    expect(without.map(f => f.relativePath)).toEqual([
      path.join('lib', 'app.ex'),
      path.join('test', 'test_helper.exs'),
    ]);
    expect(withTests.map(f => f.relativePath)).toEqual([
      path.join('lib', 'app.ex'),
      path.join('test', 'app_test.exs'),
      path.join('test', 'test_helper.exs'),
    ]);
  });

  it('should skip build, dependency and hidden directories', async () => {
    await writeFiles(tempDir, {
      'lib/app.ex': '',
      '_build/dev/lib/app/generated.ex': '',
      'deps/plug/lib/plug.ex': '',
      '.elixir_ls/cache.ex': '',
      'apps/web/node_modules/pkg/x.ex': '',
    });

    const files = await service.discoverFiles(tempDir, { useIgnoreFiles: false });

    expect(files.map(f => f.relativePath)).toEqual([path.join('lib', 'app.ex')]);
  });

  it('should apply the project ignore file', async () => {
    await writeFiles(tempDir, {
      '.modscopeignore': 'lib/generated/\n',
      'lib/app.ex': '',
      'lib/generated/schema.ex': '',
    });

    const files = await service.discoverFiles(tempDir);

    expect(files.map(f => f.relativePath)).toEqual([path.join('lib', 'app.ex')]);
  });

  it('should read a custom ignore file relative to the root', async () => {
    await writeFiles(tempDir, {
      'config/scan.ignore': '*_legacy.ex\n',
      'lib/app.ex': '',
      'lib/app_legacy.ex': '',
    });

    const files = await service.discoverFiles(tempDir, { ignoreFilePath: 'config/scan.ignore' });

    expect(files.map(f => f.relativePath)).toEqual([path.join('lib', 'app.ex')]);
  });

  it('should return a single source file given as the root', async () => {
    await writeFiles(tempDir, { 'lib/app.ex': '' });
    const filePath = path.join(tempDir, 'lib', 'app.ex');

    expect(await service.discoverFiles(filePath)).toEqual([{ path: filePath, relativePath: 'app.ex' }]);
  });

  it('should return nothing for a missing root', async () => {
    expect(await service.discoverFiles(path.join(tempDir, 'missing'))).toEqual([]);
  });

  describe('shouldIncludeFile', () => {
    it('should accept .ex and .exs files only', () => {
      expect(service.shouldIncludeFile('lib/app.ex', {})).toBe(true);
      expect(service.shouldIncludeFile('config/config.exs', {})).toBe(true);
      expect(service.shouldIncludeFile('lib/app.eex', {})).toBe(false);
      expect(service.shouldIncludeFile('test/app_test.exs', {})).toBe(false);
      expect(service.shouldIncludeFile('test/app_test.exs', { includeTestFiles: true })).toBe(true);
    });
  });
});
