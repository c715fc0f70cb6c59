import type { Command } from 'commander';
import { ConsoleLogger } from '@gitsift/shared';
import { withRepository, type RepositoryAnalyzer, type RepositoryAnalyzerOptions } from '@gitsift/repo';
import { resolveExtractionConfig } from '../config';
import { OutputRenderer, type CommandResult } from '../output';
import { readGlobalOptions } from '../types';

/** Hooks that tests use to keep the commands away from real git. */
export type CommandDependencies = Pick<RepositoryAnalyzerOptions, 'fetcher' | 'gitRunner'>;

/**
 * Opens `source` with the invocation's config, runs `operation` and renders
 * its result. The repository is closed before anything is printed.
 */
export async function runRepositoryCommand(
  command: Command,
  source: string,
  operation: (repo: RepositoryAnalyzer) => Promise<CommandResult>,
  deps: CommandDependencies = {},
): Promise<void> {
  const options = readGlobalOptions(command.optsWithGlobals());
  const config = resolveExtractionConfig(options);
  const logger = new ConsoleLogger({ level: options.verbose ? 'debug' : 'warn' });

  const result = await withRepository(source, config, operation, { ...deps, logger });

  await new OutputRenderer({ json: options.json, output: options.output }).render(result);
}
