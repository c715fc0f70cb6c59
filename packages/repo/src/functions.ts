import type { ExtractionConfig, ExtractionConfigInput } from '@gitsift/shared';
import { RepositoryAnalyzer, type FileContents, type RepositoryAnalyzerOptions } from './repository';
import type { DependencyReport } from './deps';
import type { RepositoryInfo } from './git';
import type { LanguageBreakdown, RepositoryStatistics } from './stats';
import type { TreeOutput } from './tree';

type Config = ExtractionConfigInput | ExtractionConfig;

/**
 * Opens `source`, runs `fn` and always closes the repository afterwards,
 * removing any temporary clone even when `fn` throws.
 */
export async function withRepository<T>(
  source: string,
  config: Config,
  fn: (repo: RepositoryAnalyzer) => Promise<T>,
  options: RepositoryAnalyzerOptions = {},
): Promise<T> {
  const repo = await RepositoryAnalyzer.open(source, config, options);
  try {
    return await fn(repo);
  } finally {
    await repo.close();
  }
}

export function getRepositoryInfo(source: string, config: Config = {}): Promise<RepositoryInfo> {
  return withRepository(source, config, (repo) => repo.getRepositoryInfo());
}

export function getFileTree(source: string, style = 'flattened', config: Config = {}): Promise<TreeOutput> {
  return withRepository(source, config, (repo) => repo.getFileTree(style));
}

export function getReadmeContent(source: string, config: Config = {}): Promise<string | null> {
  return withRepository(source, config, (repo) => repo.getReadmeContent());
}

export function getDependencies(source: string, config: Config = {}): Promise<DependencyReport> {
  return withRepository(source, config, (repo) => repo.getDependencies());
}

export function getLanguageStats(source: string, config: Config = {}): Promise<LanguageBreakdown> {
  return withRepository(source, config, (repo) => repo.getLanguageStats());
}

export function getFileContent(source: string, filePath: string, config: Config = {}): Promise<string | null> {
  return withRepository(source, config, (repo) => repo.getFileContent(filePath));
}

export function getAllContents(
  source: string,
  options: { maxSize?: number; excludePatterns?: string[] } = {},
  config: Config = {},
): Promise<FileContents> {
  return withRepository(source, config, (repo) => repo.getAllContents(options.maxSize, options.excludePatterns));
}

export function getDirectoryTree(
  source: string,
  directory: string,
  style = 'flattened',
  config: Config = {},
): Promise<TreeOutput> {
  return withRepository(source, config, (repo) => repo.getDirectoryTree(directory, style));
}

export function getDirectoryContents(source: string, directory: string, config: Config = {}): Promise<FileContents> {
  return withRepository(source, config, (repo) => repo.getDirectoryContents(directory));
}

export function getRepositoryStatistics(source: string, config: Config = {}): Promise<RepositoryStatistics> {
  return withRepository(source, config, (repo) => repo.getRepositoryStatistics());
}
