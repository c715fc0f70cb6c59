import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  ConfigError,
  ConsoleLogger,
  DirectoryNotFoundError,
  InvalidArgumentError,
  ProcessError,
  UsageError,
} from '@gitsift/shared';
import type { GitRunner } from './git';
import { RepositoryAnalyzer } from './repository';
import type { SourceFetcher } from './source';
import { flattenTree } from './tree';

const logger = new ConsoleLogger({ level: 'error' });
const noGit: GitRunner = async (args) => {
  throw new ProcessError(`Git command failed: git ${args.join(' ')}`, { exitCode: 128 });
};

describe('RepositoryAnalyzer', () => {
  let root: string;
  let repo: RepositoryAnalyzer;

  async function write(relativePath: string, content: string | Buffer, base = root): Promise<void> {
    const full = path.join(base, relativePath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content);
  }

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-analyzer-test-')));
    await write('README.md', '# Demo\n');
    await write('src/main.py', 'print("hi")\n');
    await write('src/utils/helper.py', 'def helper():\n    return 1\n');
    await write('docs/index.md', '# Docs\n');
    await write('.git/config', '[core]\n');
    await write('large_file.bin', '');
    await fs.truncate(path.join(root, 'large_file.bin'), 11 * 1024 * 1024);

    repo = await RepositoryAnalyzer.open(root, {}, { logger, gitRunner: noGit });
  });

  afterEach(async () => {
    await repo.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('getFileTree', () => {
    it('lists walked files and leaves out VCS metadata and oversized files', async () => {
      expect(await repo.getFileTree('flattened')).toEqual([
        'README.md',
        'docs/index.md',
        'src/main.py',
        'src/utils/helper.py',
      ]);
    });

    it('renders markdown and structured styles', async () => {
      expect(await repo.getFileTree('markdown')).toEqual([
        '- README.md',
        '  - index.md',
        '  - main.py',
        '    - helper.py',
      ]);

      const structured = await repo.getFileTree('structured');
      expect(structured).toEqual({
        'README.md': null,
        docs: { 'index.md': null },
        src: { 'main.py': null, utils: { 'helper.py': null } },
      });
    });

    it('round-trips structured output to the flattened list', async () => {
      const structured = await repo.getFileTree('dict');
      const flattened = await repo.getFileTree('flattened');

      if (Array.isArray(structured)) throw new Error('expected a nested tree');
      expect(flattenTree(structured)).toEqual(flattened);
    });

    it('rejects unsupported styles', async () => {
      await expect(repo.getFileTree('yaml')).rejects.toThrow(InvalidArgumentError);
    });

    it('never lists a file above the size limit', async () => {
      const small = await RepositoryAnalyzer.open(root, { maxFileSize: 10 }, { logger });
      try {
        expect(await small.getFileTree()).toEqual(['README.md', 'docs/index.md']);
      } finally {
        await small.close();
      }
    });
  });

  describe('getReadmeContent', () => {
    it('returns README.md first', async () => {
      await write('README.rst', 'Demo\n====\n');

      expect(await repo.getReadmeContent()).toBe('# Demo\n');
    });

    it('falls through to the next candidate when one is not UTF-8', async () => {
      await write('README.md', Buffer.from([0x23, 0xff, 0xfe]));
      await write('README.rst', 'Demo\n');

      expect(await repo.getReadmeContent()).toBe('Demo\n');
    });

    it('returns null without a README', async () => {
      await fs.rm(path.join(root, 'README.md'));

      expect(await repo.getReadmeContent()).toBeNull();
    });
  });

  describe('getFileContent', () => {
    it('reads text files', async () => {
      expect(await repo.getFileContent('src/main.py')).toBe('print("hi")\n');
    });

    it('returns null instead of throwing', async () => {
      const outside = path.join(path.dirname(root), `${path.basename(root)}-outside.txt`);
      await fs.writeFile(outside, 'secret');
      await fs.symlink(outside, path.join(root, 'escape.txt'));
      await write('logo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      try {
        expect(await repo.getFileContent(`../${path.basename(outside)}`)).toBeNull();
        expect(await repo.getFileContent(outside)).toBeNull();
        expect(await repo.getFileContent('escape.txt')).toBeNull();
        expect(await repo.getFileContent('logo.png')).toBeNull();
        expect(await repo.getFileContent('large_file.bin')).toBeNull();
        expect(await repo.getFileContent('missing.txt')).toBeNull();
        expect(await repo.getFileContent('src')).toBeNull();
      } finally {
        await fs.rm(outside, { force: true });
      }
    });
  });

  describe('getAllContents', () => {
    it('returns every text file', async () => {
      await write('logo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      expect(await repo.getAllContents()).toEqual({
        'README.md': '# Demo\n',
        'docs/index.md': '# Docs\n',
        'src/main.py': 'print("hi")\n',
        'src/utils/helper.py': 'def helper():\n    return 1\n',
      });
    });

    it('applies a lower size limit and extra excludes', async () => {
      expect(Object.keys(await repo.getAllContents(10))).toEqual(['README.md', 'docs/index.md']);
      expect(Object.keys(await repo.getAllContents(10, ['docs/**']))).toEqual(['README.md']);
    });

    it('leaves out symlinks that point outside the root', async () => {
      const outside = await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-outside-'));
      await fs.writeFile(path.join(outside, 'secret.txt'), 'SECRET');
      await fs.symlink(path.join(outside, 'secret.txt'), path.join(root, 'link.txt'));

      try {
        const contents = await repo.getAllContents();
        expect(Object.keys(contents)).toEqual(['README.md', 'docs/index.md', 'src/main.py', 'src/utils/helper.py']);
        expect(await repo.getFileContent('link.txt')).toBeNull();
      } finally {
        await fs.rm(outside, { recursive: true, force: true });
      }
    });

    it('keeps a file named __proto__ as an ordinary key', async () => {
      await write('__proto__/x.py', 'x = 1\n');

      const contents = await repo.getAllContents();

      expect(Object.hasOwn(contents, '__proto__/x.py')).toBe(true);
      expect(contents['__proto__/x.py']).toBe('x = 1\n');
      expect(Object.keys(await repo.getDirectoryContents('__proto__'))).toEqual(['x.py']);
    });

    it('rejects a non-positive size limit', async () => {
      await expect(repo.getAllContents(0)).rejects.toThrow(InvalidArgumentError);
    });
  });

  describe('directory operations', () => {
    it('scopes the tree to a subdirectory with root-relative paths', async () => {
      expect(await repo.getDirectoryTree('src')).toEqual(['src/main.py', 'src/utils/helper.py']);
      expect(await repo.getDirectoryTree('src/', 'markdown')).toEqual(['  - main.py', '    - helper.py']);
    });

    it('keys directory contents relative to the directory', async () => {
      expect(await repo.getDirectoryContents('src')).toEqual({
        'main.py': 'print("hi")\n',
        'utils/helper.py': 'def helper():\n    return 1\n',
      });
      expect(Object.keys(await repo.getDirectoryContents('.'))).toEqual([
        'README.md',
        'docs/index.md',
        'src/main.py',
        'src/utils/helper.py',
      ]);
    });

    it('fails for missing directories, files and paths outside the root', async () => {
      await expect(repo.getDirectoryTree('nonexistent')).rejects.toThrow(DirectoryNotFoundError);
      await expect(repo.getDirectoryTree('README.md')).rejects.toThrow(DirectoryNotFoundError);
      await expect(repo.getDirectoryContents('nonexistent')).rejects.toThrow('Directory not found: nonexistent');
      await expect(repo.getDirectoryTree('..')).rejects.toThrow(InvalidArgumentError);
      await expect(repo.getDirectoryTree('src', 'tree')).rejects.toThrow(InvalidArgumentError);
    });

    it('rejects a directory symlink that leads outside the root', async () => {
      const outside = await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-outside-'));
      await fs.writeFile(path.join(outside, 'secret.txt'), 'SECRET');
      await fs.symlink(outside, path.join(root, 'linkdir'));

      try {
        await expect(repo.getDirectoryContents('linkdir')).rejects.toThrow(InvalidArgumentError);
        await expect(repo.getDirectoryTree('linkdir')).rejects.toThrow(
          'Directory links outside the repository: linkdir',
        );
      } finally {
        await fs.rm(outside, { recursive: true, force: true });
      }
    });

    it('accepts a directory symlink that stays inside the root', async () => {
      await fs.symlink(path.join(root, 'docs'), path.join(root, 'docs-link'));

      expect(await repo.getDirectoryContents('docs-link')).toEqual({ 'index.md': '# Docs\n' });
    });
  });

  describe('statistics', () => {
    it('computes language shares that sum to 100', async () => {
      const stats = await repo.getLanguageStats();

      expect(stats).toEqual({
        Python: { files: 2, bytes: 39, percentage: 73.58 },
        Markdown: { files: 2, bytes: 14, percentage: 26.42 },
      });
      expect(await repo.getLanguageStats()).toEqual(stats);
    });

    it('summarizes the repository', async () => {
      expect(await repo.getRepositoryStatistics()).toEqual({
        totalFiles: 4,
        totalSize: 53,
        binaryCount: 0,
        textCount: 4,
        averageFileSize: 13.25,
        binaryRatio: 0,
        fileTypeHistogram: { '.md': 2, '.py': 2 },
        largestFiles: [
          { path: 'src/utils/helper.py', size: 27 },
          { path: 'src/main.py', size: 12 },
          { path: 'README.md', size: 7 },
          { path: 'docs/index.md', size: 7 },
        ],
      });
    });
  });

  describe('getDependencies', () => {
    it('reports root manifests and discovered ones', async () => {
      await write('requirements.txt', 'requests>=2.28\n');
      await write('web/package.json', JSON.stringify({ devDependencies: { 'left-pad': '^1.0.0' } }));

      const report = await repo.getDependencies();

      expect(Object.keys(report)).toEqual(['requirements.txt', 'pyproject.toml', 'package.json', 'web/package.json']);
      expect(report['requirements.txt'].dependencies.map((d) => d.name)).toEqual(['requests']);
      expect(report['pyproject.toml'].status).toBe('missing');
      expect(report['package.json'].status).toBe('missing');
      expect(report['web/package.json'].dependencies).toMatchObject([
        { name: 'left-pad', versionConstraint: '1.0.0', dev: true },
      ]);
    });
  });

  it('reports only the name outside a git work tree', async () => {
    expect(await repo.getRepositoryInfo()).toEqual({ name: path.basename(root), isGitRepository: false });
  });

  it('runs independent operations concurrently', async () => {
    const [tree, stats, deps] = await Promise.all([
      repo.getFileTree(),
      repo.getRepositoryStatistics(),
      repo.getDependencies(),
    ]);

    expect(tree).toHaveLength(4);
    expect(stats.totalFiles).toBe(4);
    expect(Object.keys(deps)).toHaveLength(3);
  });

  it('keeps a local root on close and refuses further calls', async () => {
    await repo.close();
    await repo.close();

    expect((await fs.stat(root)).isDirectory()).toBe(true);
    await expect(repo.getFileTree()).rejects.toThrow(UsageError);
  });
});

describe('RepositoryAnalyzer lifecycle', () => {
  it('removes a temporary clone on close', async () => {
    const clone = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-clone-test-')));
    await fs.writeFile(path.join(clone, 'a.txt'), 'a');
    const fetcher: SourceFetcher = { resolve: async () => ({ root: clone, remote: true, temporary: true }) };

    const repo = await RepositoryAnalyzer.open('https://example.com/acme/demo.git', {}, { fetcher, logger });
    expect(repo.isTemporary).toBe(true);
    expect(await repo.getFileTree()).toEqual(['a.txt']);

    await repo.close();
    await repo.close();

    await expect(fs.stat(clone)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('validates the configuration before resolving the source', async () => {
    let resolved = false;
    const fetcher: SourceFetcher = {
      resolve: async () => {
        resolved = true;
        return { root: os.tmpdir(), remote: false, temporary: false };
      },
    };

    await expect(RepositoryAnalyzer.open('.', { maxFileSize: -1 }, { fetcher, logger })).rejects.toThrow(ConfigError);
    expect(resolved).toBe(false);
  });
});
