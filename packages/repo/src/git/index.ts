import path from 'node:path';
import { logger as defaultLogger, toError, type Logger } from '@gitsift/shared';
import { runGit, type GitRunner } from './exec';

export { runGit };
export type { GitRunner, GitRunOptions } from './exec';

export const UNKNOWN_BRANCH = 'unknown';
export const NO_COMMITS = 'no commits yet';

export interface GitRemote {
  name: string;
  url: string;
}

export type RepositoryInfo =
  | { name: string; isGitRepository: false }
  | {
      name: string;
      isGitRepository: true;
      isBare: boolean;
      branch: string;
      headCommit: string;
      remotes: GitRemote[];
    };

export interface GitServiceOptions {
  repoRoot: string;
  runner?: GitRunner;
  logger?: Logger;
}

export class GitService {
  private readonly repoRoot: string;
  private readonly runner: GitRunner;
  private readonly logger: Logger;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.runner = options.runner ?? runGit;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'git' });
  }

  private exec(args: string[], cwd = this.repoRoot): Promise<string> {
    return this.runner(args, { cwd });
  }

  /** Resolves `fallback` when the query fails, logging the reason. */
  private async query(args: string[], fallback: string): Promise<string> {
    try {
      return await this.exec(args);
    } catch (error) {
      this.logger.debug(`git ${args.join(' ')} failed: ${toError(error).message}`);
      return fallback;
    }
  }

  /** Clones `source` into this service's root, which must not exist or be empty. */
  async clone(source: string): Promise<void> {
    await this.exec(['clone', '--', source, this.repoRoot], path.dirname(this.repoRoot));
  }

  /** Brings an existing clone up to date with its `origin`. */
  async pull(): Promise<void> {
    await this.exec(['fetch', 'origin']);
    await this.exec(['pull', '--ff-only']);
  }

  async isRepository(): Promise<boolean> {
    try {
      await this.exec(['rev-parse', '--git-dir']);
      return true;
    } catch {
      return false;
    }
  }

  async currentBranch(): Promise<string> {
    return (await this.query(['symbolic-ref', '--short', '-q', 'HEAD'], UNKNOWN_BRANCH)) || UNKNOWN_BRANCH;
  }

  async getHeadSha(): Promise<string> {
    return this.query(['rev-parse', '--verify', '-q', 'HEAD'], NO_COMMITS);
  }

  async listRemotes(): Promise<GitRemote[]> {
    const output = await this.query(['remote', '-v'], '');
    const remotes = new Map<string, string>();
    for (const line of output.split('\n')) {
      const match = /^(\S+)\s+(\S+)\s+\((fetch|push)\)$/.exec(line.trim());
      if (match && !remotes.has(match[1])) remotes.set(match[1], match[2]);
    }
    return [...remotes.entries()].map(([name, url]) => ({ name, url }));
  }

  /**
   * Read-only summary of the repository at the root. Outside a git work
   * tree only the directory name is reported.
   */
  async getRepositoryInfo(): Promise<RepositoryInfo> {
    const name = path.basename(path.resolve(this.repoRoot));
    if (!(await this.isRepository())) {
      return { name, isGitRepository: false };
    }

    const [bare, branch, headCommit, remotes] = await Promise.all([
      this.query(['rev-parse', '--is-bare-repository'], 'false'),
      this.currentBranch(),
      this.getHeadSha(),
      this.listRemotes(),
    ]);

    return { name, isGitRepository: true, isBare: bare === 'true', branch, headCommit, remotes };
  }
}
