import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  CloneError,
  InvalidRepositoryError,
  RepositoryNotFoundError,
  errnoCode,
  logger as defaultLogger,
  type Logger,
} from '@gitsift/shared';
import { GitService, type GitRunner } from '../git';
import { removeDirectory, trackTemporaryDirectory, untrackTemporaryDirectory } from './cleanup';

export interface ResolvedSource {
  /** Absolute, existing directory. */
  root: string;
  remote: boolean;
  /** The root was created for this resolution and must be removed on close. */
  temporary: boolean;
}

/**
 * Turns a local path or a remote URL into a local directory.
 */
export interface SourceFetcher {
  resolve(source: string): Promise<ResolvedSource>;
}

const SCP_LIKE = /^[\w.-]+@[\w.-]+:(?!\/\/)/;

/**
 * Remote sources are URLs with both a scheme and a host, or scp-style
 * `user@host:path` references. Everything else is a local path.
 */
export function isRemoteSource(source: string): boolean {
  if (SCP_LIKE.test(source)) return true;
  if (!URL.canParse(source)) return false;
  const url = new URL(source);
  return url.protocol !== 'file:' && url.host !== '';
}

export interface GitSourceFetcherOptions {
  /** Parent directory for temporary clones; defaults to the OS temp dir. */
  tempDir?: string;
  /** Persistent clone location: cloned once, then fetched and pulled. */
  targetDir?: string;
  runner?: GitRunner;
  logger?: Logger;
}

export class GitSourceFetcher implements SourceFetcher {
  private readonly logger: Logger;

  constructor(private readonly options: GitSourceFetcherOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'fetcher' });
  }

  async resolve(source: string): Promise<ResolvedSource> {
    if (!isRemoteSource(source)) {
      return { root: await this.resolveLocal(source), remote: false, temporary: false };
    }
    if (this.options.targetDir) {
      return { root: await this.cloneOrUpdate(source, this.options.targetDir), remote: true, temporary: false };
    }
    return { root: await this.cloneTemporary(source), remote: true, temporary: true };
  }

  private async resolveLocal(source: string): Promise<string> {
    const absolute = path.resolve(source);
    let stats;
    try {
      stats = await fs.stat(absolute);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new RepositoryNotFoundError(`Path does not exist: ${absolute}`, { cause: error });
      }
      throw new InvalidRepositoryError(`Cannot access path: ${absolute}`, { cause: error });
    }
    if (!stats.isDirectory()) {
      throw new InvalidRepositoryError(`Path is not a directory: ${absolute}`);
    }
    return fs.realpath(absolute);
  }

  private git(repoRoot: string): GitService {
    return new GitService({ repoRoot, runner: this.options.runner, logger: this.options.logger });
  }

  private async cloneTemporary(source: string): Promise<string> {
    const parent = this.options.tempDir ?? os.tmpdir();
    await fs.mkdir(parent, { recursive: true });
    const dir = await fs.realpath(await fs.mkdtemp(path.join(parent, 'gitsift-')));
    trackTemporaryDirectory(dir);

    this.logger.info(`Cloning ${source} into ${dir}`);
    try {
      await this.git(dir).clone(source);
    } catch (error) {
      await removeDirectory(dir, { logger: this.options.logger });
      untrackTemporaryDirectory(dir);
      throw new CloneError(source, { cause: error, details: { directory: dir } });
    }
    return dir;
  }

  private async cloneOrUpdate(source: string, targetDir: string): Promise<string> {
    const dir = path.resolve(targetDir);
    const git = this.git(dir);
    try {
      if (await isDirectory(path.join(dir, '.git'))) {
        this.logger.info(`Updating existing clone in ${dir}`);
        await git.pull();
      } else {
        await fs.mkdir(dir, { recursive: true });
        this.logger.info(`Cloning ${source} into ${dir}`);
        await git.clone(source);
      }
    } catch (error) {
      throw new CloneError(source, { cause: error, details: { directory: dir } });
    }
    return fs.realpath(dir);
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}
