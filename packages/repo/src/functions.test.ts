import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConsoleLogger, RepositoryNotFoundError } from '@gitsift/shared';
import {
  getDirectoryContents,
  getDirectoryTree,
  getFileContent,
  getFileTree,
  getReadmeContent,
  getAllContents,
  withRepository,
} from './functions';
import type { SourceFetcher } from './source';

describe('function API', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-functions-test-')));
    await fs.mkdir(path.join(root, 'lib'));
    await fs.writeFile(path.join(root, 'README.md'), '# Tools\n');
    await fs.writeFile(path.join(root, 'lib', 'util.ts'), 'export const one = 1;\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('runs single operations against a local path', async () => {
    expect(await getFileTree(root)).toEqual(['README.md', 'lib/util.ts']);
    expect(await getFileTree(root, 'markdown')).toEqual(['- README.md', '  - util.ts']);
    expect(await getReadmeContent(root)).toBe('# Tools\n');
    expect(await getFileContent(root, 'lib/util.ts')).toBe('export const one = 1;\n');
    expect(await getAllContents(root, { excludePatterns: ['*.md'] })).toEqual({
      'lib/util.ts': 'export const one = 1;\n',
    });
    expect(await getDirectoryTree(root, 'lib')).toEqual(['lib/util.ts']);
    expect(await getDirectoryContents(root, 'lib')).toEqual({ 'util.ts': 'export const one = 1;\n' });
  });

  it('honours the configuration', async () => {
    expect(await getFileTree(root, 'flattened', { includePatterns: ['*.ts'] })).toEqual(['lib/util.ts']);
  });

  it('closes the repository even when the callback throws', async () => {
    const clone = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gitsift-functions-clone-')));
    const fetcher: SourceFetcher = { resolve: async () => ({ root: clone, remote: true, temporary: true }) };
    const logger = new ConsoleLogger({ level: 'error' });

    await expect(
      withRepository(
        'https://example.com/acme/tools.git',
        {},
        async () => {
          throw new Error('boom');
        },
        { fetcher, logger },
      ),
    ).rejects.toThrow('boom');

    await expect(fs.stat(clone)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('surfaces resolution failures', async () => {
    await expect(getFileTree(path.join(root, 'missing'))).rejects.toThrow(RepositoryNotFoundError);
  });
});
