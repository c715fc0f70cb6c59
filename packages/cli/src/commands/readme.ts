import type { Command } from 'commander';
import { runRepositoryCommand, type CommandDependencies } from './shared';

export function registerReadmeCommand(program: Command, deps: CommandDependencies = {}) {
  program
    .command('readme <source>')
    .description('Print the README at the repository root')
    .action(async (source: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({
          kind: 'text',
          data: await repo.getReadmeContent(),
          emptyMessage: 'No README found.',
        }),
        deps,
      );
    });
}
