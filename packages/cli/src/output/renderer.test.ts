import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { makeRecord } from '@gitsift/repo';
import { OutputRenderer, describeDependency } from './renderer';

describe('describeDependency', () => {
  it('prints name and constraint for a plain registry dependency', () => {
    expect(describeDependency(makeRecord('requests', { versionConstraint: '>=2.0' }))).toBe('requests >=2.0');
  });

  it('tags group, kind and optional flags', () => {
    const dep = makeRecord('mylib', {
      kind: 'vcs',
      group: 'extras',
      optional: true,
      source: 'https://example.com/mylib.git',
    });
    expect(describeDependency(dep)).toBe('mylib [extras] <vcs> optional');
  });
});

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  const output = () => logSpy.mock.calls.map((c) => String(c[0])).join('\n');

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', async () => {
    await new OutputRenderer({ json: true }).render({ kind: 'tree', data: ['a.py', 'b/c.py'] });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toBe('[\n  "a.py",\n  "b/c.py"\n]');
  });

  it('renders a missing text result with its message', async () => {
    await new OutputRenderer({ json: false }).render({
      kind: 'text',
      data: null,
      emptyMessage: 'No README found.',
    });

    expect(output()).toContain('No README found.');
  });

  it('renders a dependency report per manifest', async () => {
    await new OutputRenderer({ json: false }).render({
      kind: 'deps',
      data: {
        'requirements.txt': {
          manifest: 'requirements.txt',
          parser: 'requirements.txt',
          status: 'parsed',
          dependencies: [makeRecord('flask', { versionConstraint: '==2.0.1' })],
        },
        'pyproject.toml': {
          manifest: 'pyproject.toml',
          parser: 'pyproject.toml',
          status: 'failed',
          dependencies: [],
          error: 'pyproject.toml: Invalid TOML: unexpected end',
        },
        'package.json': {
          manifest: 'package.json',
          parser: 'package.json',
          status: 'missing',
          dependencies: [],
        },
      },
    });

    const text = output();
    expect(text).toContain('  - flask ==2.0.1');
    expect(text).toContain('pyproject.toml: Invalid TOML: unexpected end');
    expect(text).toContain('Not found.');
  });

  it('renders a language table', async () => {
    await new OutputRenderer({ json: false }).render({
      kind: 'languages',
      data: {
        Python: { files: 2, bytes: 80, percentage: 80 },
        Markdown: { files: 1, bytes: 20, percentage: 20 },
      },
    });

    const text = output();
    expect(text).toContain('Python');
    expect(text).toContain('80.00%');
    expect(text).toContain('20.00%');
  });

  it('renders repository statistics', async () => {
    await new OutputRenderer({ json: false }).render({
      kind: 'stats',
      data: {
        totalFiles: 4,
        totalSize: 53,
        binaryCount: 1,
        textCount: 3,
        averageFileSize: 13.25,
        binaryRatio: 0.25,
        fileTypeHistogram: { '.md': 1, '.py': 2 },
        largestFiles: [{ path: 'src/main.py', size: 20 }],
      },
    });

    const text = output();
    expect(text).toContain('  Files: 4 (3 text, 1 binary)');
    expect(text).toContain('  Average size: 13.25 bytes');
    expect(text).toContain('  Binary ratio: 25.00%');
    expect(text).toContain('  .py: 2');
    expect(text).toContain('src/main.py');
  });

  it('renders repository info for a work tree', async () => {
    await new OutputRenderer({ json: false }).render({
      kind: 'info',
      data: {
        name: 'demo',
        isGitRepository: true,
        isBare: false,
        branch: 'main',
        headCommit: 'abc123',
        remotes: [{ name: 'origin', url: 'https://example.com/acme/demo.git' }],
      },
    });

    const lines = logSpy.mock.calls.map((c) => String(c[0]));
    expect(lines).toContain('  origin  https://example.com/acme/demo.git');
    expect(output()).toContain('abc123');
  });

  it('writes the result to a file in output mode', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-renderer-test-'));
    try {
      const file = path.join(dir, 'contents.json');
      await new OutputRenderer({ json: true, output: file }).render({
        kind: 'contents',
        data: { 'README.md': '# Demo\n' },
      });

      expect(await fs.readFile(file, 'utf8')).toBe('{\n  "README.md": "# Demo\\n"\n}\n');
      expect(logSpy).not.toHaveBeenCalled();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
