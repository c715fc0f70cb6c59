import fs from 'node:fs/promises';
import path from 'node:path';
import {
  DirectoryNotFoundError,
  InvalidArgumentError,
  UsageError,
  createExtractionConfig,
  errnoCode,
  isPathInside,
  logger as defaultLogger,
  relative,
  toError,
  type ExtractionConfig,
  type ExtractionConfigInput,
  type Logger,
} from '@gitsift/shared';
import { FileClassifier } from './classify';
import { collectDependencies, type DependencyReport } from './deps';
import { PathFilter } from './filter';
import { GitService, type GitRunner, type RepositoryInfo } from './git';
import { DirectoryWalker, type WalkedFile, type WalkerFs, type WalkSettings } from './scanner';
import {
  GitSourceFetcher,
  removeDirectory,
  untrackTemporaryDirectory,
  type ResolvedSource,
  type SourceFetcher,
} from './source';
import {
  LanguageStatsAggregator,
  computeRepositoryStatistics,
  type LanguageBreakdown,
  type RepositoryStatistics,
} from './stats';
import { assertTreeStyle, formatTree, type TreeOutput } from './tree';

/** Checked in order; the first readable text file wins. */
export const README_NAMES = ['README.md', 'README.rst', 'README.txt', 'README'] as const;

export type FileContents = Record<string, string>;

export interface RepositoryAnalyzerOptions {
  /** Defaults to a {@link GitSourceFetcher} using the config's `tempDir`. */
  fetcher?: SourceFetcher;
  logger?: Logger;
  classifier?: FileClassifier;
  /** Used by the default fetcher and by {@link RepositoryAnalyzer.getRepositoryInfo}. */
  gitRunner?: GitRunner;
  walkerFs?: WalkerFs;
}

/**
 * Entry point for every extraction operation over one repository.
 *
 * A remote source is cloned by {@link RepositoryAnalyzer.open}; the clone is
 * removed by {@link RepositoryAnalyzer.close}, which callers must always
 * invoke (see `withRepository`).
 *
 * @example
 * ```typescript
 * const repo = await RepositoryAnalyzer.open('https://example.com/acme/demo.git');
 * try {
 *   const tree = await repo.getFileTree('markdown');
 * } finally {
 *   await repo.close();
 * }
 * ```
 */
export class RepositoryAnalyzer {
  private closed = false;
  private readonly logger: Logger;
  private readonly classifier: FileClassifier;

  private constructor(
    readonly source: string,
    readonly config: ExtractionConfig,
    private readonly resolved: ResolvedSource,
    private readonly options: RepositoryAnalyzerOptions,
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'analyzer' });
    this.classifier = options.classifier ?? new FileClassifier({ logger: options.logger });
  }

  static async open(
    source: string,
    config: ExtractionConfigInput | ExtractionConfig = {},
    options: RepositoryAnalyzerOptions = {},
  ): Promise<RepositoryAnalyzer> {
    const validated = createExtractionConfig(config);
    const fetcher =
      options.fetcher ??
      new GitSourceFetcher({ tempDir: validated.tempDir, runner: options.gitRunner, logger: options.logger });
    const resolved = await fetcher.resolve(source);
    return new RepositoryAnalyzer(source, validated, resolved, options);
  }

  /** Absolute path of the resolved repository root. */
  get root(): string {
    return this.resolved.root;
  }

  get isTemporary(): boolean {
    return this.resolved.temporary;
  }

  /** Releases the repository, deleting a temporary clone. Safe to call twice. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.resolved.temporary) {
      await removeDirectory(this.root, { logger: this.options.logger });
      untrackTemporaryDirectory(this.root);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new UsageError(`Repository ${this.source} has already been closed`);
    }
  }

  private walker(overrides: Partial<WalkSettings> = {}): DirectoryWalker {
    return new DirectoryWalker(
      { ...this.config, ...overrides },
      { logger: this.options.logger, fs: this.options.walkerFs },
    );
  }

  private walk(subdir = ''): Promise<WalkedFile[]> {
    this.ensureOpen();
    return this.walker().walk(this.root, subdir);
  }

  private walkPaths(subdir = ''): Promise<string[]> {
    this.ensureOpen();
    return this.walker().walkPaths(this.root, subdir);
  }

  /**
   * Decodes a file as strict UTF-8, or returns `null` when it is binary or
   * not valid UTF-8 text.
   */
  private async readText(file: WalkedFile): Promise<string | null> {
    if (await this.classifier.isBinary(file.absPath)) return null;
    try {
      const bytes = await fs.readFile(file.absPath);
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      this.logger.warn(`Failed to read file ${file.path}: ${toError(error).message}`);
      return null;
    }
  }

  private async readAll(files: readonly WalkedFile[], keyOf: (file: WalkedFile) => string): Promise<FileContents> {
    const entries: Array<[string, string]> = [];
    for (const file of files) {
      const text = await this.readText(file);
      if (text !== null) entries.push([keyOf(file), text]);
    }
    // fromEntries keeps a `__proto__` path as an ordinary key
    return Object.fromEntries(entries);
  }

  /**
   * Resolves a directory argument to its root-relative form.
   *
   * @throws InvalidArgumentError when it points outside the repository.
   * @throws DirectoryNotFoundError when it does not exist.
   */
  private async resolveDirectory(directory: string): Promise<string> {
    this.ensureOpen();
    const absolute = path.resolve(this.root, directory);
    if (!isPathInside(this.root, absolute)) {
      throw new InvalidArgumentError('directory', `Directory is outside the repository: ${directory}`);
    }
    let realPath: string;
    let isDirectory: boolean;
    try {
      realPath = await fs.realpath(absolute);
      isDirectory = (await fs.stat(realPath)).isDirectory();
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') throw new DirectoryNotFoundError(directory);
      throw error;
    }
    if (!isDirectory) throw new DirectoryNotFoundError(directory);
    if (!isPathInside(this.root, realPath)) {
      throw new InvalidArgumentError('directory', `Directory links outside the repository: ${directory}`);
    }
    return relative(this.root, absolute);
  }

  async getFileTree(style = 'flattened'): Promise<TreeOutput> {
    assertTreeStyle(style);
    return formatTree(await this.walkPaths(), style);
  }

  async getReadmeContent(): Promise<string | null> {
    for (const name of README_NAMES) {
      const content = await this.getFileContent(name);
      if (content !== null) return content;
    }
    return null;
  }

  async getDependencies(): Promise<DependencyReport> {
    const files = await this.walk();
    return collectDependencies(
      this.root,
      files.map((f) => f.path),
      { logger: this.options.logger, maxFileSize: this.config.maxFileSize },
    );
  }

  async getLanguageStats(): Promise<LanguageBreakdown> {
    return new LanguageStatsAggregator(this.classifier).aggregate(await this.walk());
  }

  /**
   * Reads one text file. Returns `null`, never throws, when the path is
   * outside the repository, missing, a directory, over the size limit,
   * binary or not valid UTF-8.
   */
  async getFileContent(relativePath: string): Promise<string | null> {
    this.ensureOpen();
    const absPath = path.resolve(this.root, relativePath);
    if (!isPathInside(this.root, absPath)) {
      this.logger.warn(`Refusing to read outside the repository: ${relativePath}`);
      return null;
    }

    let realPath: string;
    let size: number;
    try {
      realPath = await fs.realpath(absPath);
      const stats = await fs.stat(realPath);
      if (!stats.isFile()) return null;
      size = stats.size;
    } catch (error) {
      this.logger.debug(`Cannot read ${relativePath}: ${toError(error).message}`);
      return null;
    }
    if (!isPathInside(this.root, realPath)) {
      this.logger.warn(`Refusing to follow a link outside the repository: ${relativePath}`);
      return null;
    }
    if (size > this.config.maxFileSize) {
      this.logger.warn(`Skipping large file: ${relativePath} (${size} bytes)`);
      return null;
    }

    return this.readText({ path: relative(this.root, absPath), absPath: realPath, sizeBytes: size });
  }

  /**
   * Contents of every walked text file, keyed by root-relative path.
   * `maxSize` lowers the size limit and `excludePatterns` are applied in
   * addition to the configured filters.
   */
  async getAllContents(maxSize?: number, excludePatterns: readonly string[] = []): Promise<FileContents> {
    if (maxSize !== undefined && !(Number.isInteger(maxSize) && maxSize > 0)) {
      throw new InvalidArgumentError('maxSize', `maxSize must be a positive integer, got ${maxSize}`);
    }
    this.ensureOpen();
    const limit = Math.min(maxSize ?? this.config.maxFileSize, this.config.maxFileSize);
    const extra = excludePatterns.length > 0 ? new PathFilter({ excludePatterns, includePatterns: [] }) : null;

    const files = (await this.walker({ maxFileSize: limit }).walk(this.root)).filter(
      (f) => !extra || extra.shouldInclude(f.path),
    );
    return this.readAll(files, (f) => f.path);
  }

  async getDirectoryTree(directory: string, style = 'flattened'): Promise<TreeOutput> {
    assertTreeStyle(style);
    const subdir = await this.resolveDirectory(directory);
    return formatTree(await this.walkPaths(subdir), style);
  }

  /** Text file contents under `directory`, keyed relative to that directory. */
  async getDirectoryContents(directory: string): Promise<FileContents> {
    const subdir = await this.resolveDirectory(directory);
    const files = await this.walk(subdir);
    return this.readAll(files, (f) => (subdir ? f.path.slice(subdir.length + 1) : f.path));
  }

  async getRepositoryStatistics(): Promise<RepositoryStatistics> {
    return computeRepositoryStatistics(await this.walk(), this.classifier);
  }

  async getRepositoryInfo(): Promise<RepositoryInfo> {
    this.ensureOpen();
    return new GitService({
      repoRoot: this.root,
      runner: this.options.gitRunner,
      logger: this.options.logger,
    }).getRepositoryInfo();
  }
}
