import fs from 'node:fs/promises';
import path from 'node:path';
import { isPathInside, logger as defaultLogger, normalizePath, toError, type Logger } from '@gitsift/shared';
import { PathFilter } from '../filter';
import type { WalkedFile, WalkerFs, WalkSettings } from './types';

export const nodeWalkerFs: WalkerFs = {
  readdir: (dir) => fs.readdir(dir, { withFileTypes: true }),
  stat: (filePath) => fs.stat(filePath),
  realpath: (filePath) => fs.realpath(filePath),
};

export interface DirectoryWalkerOptions {
  logger?: Logger;
  fs?: WalkerFs;
}

/** Plain code-unit ordering, identical on every platform and locale. */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Recursively lists the files under a repository root that pass the
 * configured size limit and include/exclude patterns.
 */
export class DirectoryWalker {
  private readonly filter: PathFilter;
  private readonly fs: WalkerFs;
  private readonly logger: Logger;

  constructor(
    private readonly settings: WalkSettings,
    options: DirectoryWalkerOptions = {},
  ) {
    this.filter = new PathFilter(settings);
    this.fs = options.fs ?? nodeWalkerFs;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'walker' });
  }

  /**
   * Walks `repoRoot`, or only `subdir` beneath it. Returned paths are always
   * relative to `repoRoot` and sorted.
   */
  async walk(repoRoot: string, subdir = ''): Promise<WalkedFile[]> {
    const files: WalkedFile[] = [];
    const startRel = normalizePath(subdir).replace(/^\.\/?/, '').replace(/\/+$/, '');
    const realRoot = await this.fs.realpath(repoRoot).catch(() => path.resolve(repoRoot));

    const walkDir = async (dir: string, relativeDir: string): Promise<void> => {
      let entries;
      try {
        entries = await this.fs.readdir(dir);
      } catch (error) {
        // Access denied or deleted during the walk
        this.logger.debug(`Skipping unreadable directory ${dir}: ${toError(error).message}`);
        return;
      }

      for (const entry of entries) {
        const entryRelativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
        const absPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          if (this.filter.excludesSubtree(entryRelativePath)) continue;
          await walkDir(absPath, entryRelativePath);
          continue;
        }
        if (!entry.isFile() && !entry.isSymbolicLink()) continue;
        if (!this.filter.shouldInclude(entryRelativePath)) continue;

        let stats;
        try {
          stats = await this.fs.stat(absPath);
        } catch (error) {
          this.logger.debug(`Skipping ${entryRelativePath}: ${toError(error).message}`);
          continue;
        }
        // Symlinks to directories are not followed.
        if (!stats.isFile()) continue;
        if (entry.isSymbolicLink() && !(await this.staysInside(realRoot, absPath, entryRelativePath))) {
          continue;
        }
        if (stats.size > this.settings.maxFileSize) {
          this.logger.debug(`Skipping large file: ${entryRelativePath} (${stats.size} bytes)`);
          continue;
        }

        files.push({ path: entryRelativePath, absPath, sizeBytes: stats.size });
      }
    };

    await walkDir(startRel ? path.join(repoRoot, startRel) : repoRoot, startRel);

    return files.sort((a, b) => comparePaths(a.path, b.path));
  }

  async walkPaths(repoRoot: string, subdir = ''): Promise<string[]> {
    return (await this.walk(repoRoot, subdir)).map((f) => f.path);
  }

  /** False for a symlink whose target lies outside the repository. */
  private async staysInside(realRoot: string, absPath: string, relativePath: string): Promise<boolean> {
    let target: string;
    try {
      target = await this.fs.realpath(absPath);
    } catch (error) {
      this.logger.debug(`Skipping ${relativePath}: ${toError(error).message}`);
      return false;
    }
    if (isPathInside(realRoot, target)) return true;
    this.logger.debug(`Skipping ${relativePath}: link target is outside the repository`);
    return false;
  }
}
