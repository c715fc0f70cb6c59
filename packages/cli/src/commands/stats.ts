import type { Command } from 'commander';
import { runRepositoryCommand, type CommandDependencies } from './shared';

export function registerStatsCommands(program: Command, deps: CommandDependencies = {}) {
  program
    .command('languages <source>')
    .description('Break down text files by language')
    .action(async (source: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'languages', data: await repo.getLanguageStats() }),
        deps,
      );
    });

  program
    .command('stats <source>')
    .description('Summarize file counts, sizes and types')
    .action(async (source: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'stats', data: await repo.getRepositoryStatistics() }),
        deps,
      );
    });
}
