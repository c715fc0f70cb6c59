import pc from 'picocolors';
import { writeResult } from '@gitsift/shared';
import type {
  DependencyRecord,
  DependencyReport,
  FileContents,
  LanguageBreakdown,
  RepositoryInfo,
  RepositoryStatistics,
  TreeOutput,
} from '@gitsift/repo';
import { printTable } from './table';

export type CommandResult =
  | { kind: 'info'; data: RepositoryInfo }
  | { kind: 'tree'; data: TreeOutput }
  /** `emptyMessage` is shown in human mode when `data` is null. */
  | { kind: 'text'; data: string | null; emptyMessage: string }
  | { kind: 'deps'; data: DependencyReport }
  | { kind: 'languages'; data: LanguageBreakdown }
  | { kind: 'stats'; data: RepositoryStatistics }
  | { kind: 'contents'; data: FileContents };

export interface RendererOptions {
  json: boolean;
  /** When set, the result is written to this file instead of stdout. */
  output?: string;
}

/**
 * One-line summary of a dependency, e.g. `pytest >=7 [dev]` or
 * `mylib <vcs> optional`.
 */
export function describeDependency(dep: DependencyRecord): string {
  const parts = [dep.versionConstraint ? `${dep.name} ${dep.versionConstraint}` : dep.name];
  if (dep.group !== 'main') parts.push(`[${dep.group}]`);
  if (dep.kind !== 'registry') parts.push(`<${dep.kind}>`);
  if (dep.optional) parts.push('optional');
  return parts.join(' ');
}

export class OutputRenderer {
  constructor(private readonly options: RendererOptions) {}

  async render(result: CommandResult): Promise<void> {
    if (this.options.output) {
      await writeResult(this.options.output, result.data);
      if (!this.options.json) {
        console.log(pc.green(`✅ Saved ${result.kind} output to ${this.options.output}`));
      }
      return;
    }

    if (this.options.json) {
      console.log(JSON.stringify(result.data, null, 2));
    } else {
      this.renderHuman(result);
    }
  }

  private renderHuman(result: CommandResult): void {
    switch (result.kind) {
      case 'info':
        return this.renderInfo(result.data);
      case 'tree':
        if (Array.isArray(result.data)) {
          result.data.forEach((line) => console.log(line));
        } else {
          console.log(JSON.stringify(result.data, null, 2));
        }
        return;
      case 'text':
        console.log(result.data ?? pc.yellow(result.emptyMessage));
        return;
      case 'deps':
        return this.renderDependencies(result.data);
      case 'languages':
        return this.renderLanguages(result.data);
      case 'stats':
        return this.renderStatistics(result.data);
      case 'contents':
        return this.renderContents(result.data);
    }
  }

  private renderInfo(info: RepositoryInfo): void {
    console.log(`${pc.bold('Name:')} ${info.name}`);
    if (!info.isGitRepository) {
      console.log(pc.gray('Not a git repository.'));
      return;
    }
    console.log(`${pc.bold('Branch:')} ${info.branch}`);
    console.log(`${pc.bold('HEAD:')} ${info.headCommit}`);
    console.log(`${pc.bold('Bare:')} ${info.isBare ? 'yes' : 'no'}`);
    if (info.remotes.length === 0) {
      console.log(`${pc.bold('Remotes:')} ${pc.gray('none')}`);
      return;
    }
    console.log(pc.bold('Remotes:'));
    info.remotes.forEach((remote) => console.log(`  ${remote.name}  ${remote.url}`));
  }

  private renderDependencies(report: DependencyReport): void {
    for (const [manifest, result] of Object.entries(report)) {
      console.log(`\n${pc.bold(manifest)} ${pc.gray(`(${result.parser})`)}`);
      if (result.status === 'missing') {
        console.log(pc.gray('  Not found.'));
      } else if (result.status === 'failed') {
        console.log(pc.red(`  ❌ ${result.error ?? 'Could not be parsed.'}`));
      } else if (result.dependencies.length === 0) {
        console.log(pc.gray('  No dependencies declared.'));
      } else {
        result.dependencies.forEach((dep) => console.log(`  - ${describeDependency(dep)}`));
      }
    }
  }

  private renderLanguages(breakdown: LanguageBreakdown): void {
    const rows = Object.entries(breakdown).map(([language, stats]) => ({
      Language: language,
      Files: stats.files,
      Bytes: stats.bytes,
      Share: `${stats.percentage.toFixed(2)}%`,
    }));
    if (rows.length === 0) {
      console.log(pc.gray('No text files found.'));
      return;
    }
    printTable(rows);
  }

  private renderStatistics(stats: RepositoryStatistics): void {
    console.log(pc.bold('Repository statistics:'));
    console.log(`  Files: ${stats.totalFiles} (${stats.textCount} text, ${stats.binaryCount} binary)`);
    console.log(`  Total size: ${stats.totalSize} bytes`);
    console.log(`  Average size: ${stats.averageFileSize.toFixed(2)} bytes`);
    console.log(`  Binary ratio: ${(stats.binaryRatio * 100).toFixed(2)}%`);

    const extensions = Object.entries(stats.fileTypeHistogram);
    if (extensions.length > 0) {
      console.log(pc.bold('\nFile types:'));
      extensions.forEach(([ext, count]) => console.log(`  ${ext}: ${count}`));
    }

    if (stats.largestFiles.length > 0) {
      console.log(pc.bold('\nLargest files:'));
      printTable(stats.largestFiles.map((file) => ({ Path: file.path, Bytes: file.size })));
    }
  }

  private renderContents(contents: FileContents): void {
    const entries = Object.entries(contents);
    if (entries.length === 0) {
      console.log(pc.gray('No files.'));
      return;
    }
    for (const [file, content] of entries) {
      console.log(pc.bold(`==> ${file} <==`));
      console.log(content);
    }
  }
}
