import type { Command } from 'commander';
import { runRepositoryCommand, type CommandDependencies } from './shared';

export function registerInfoCommand(program: Command, deps: CommandDependencies = {}) {
  program
    .command('info <source>')
    .description('Show the repository name, branch, HEAD commit and remotes')
    .action(async (source: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'info', data: await repo.getRepositoryInfo() }),
        deps,
      );
    });
}
