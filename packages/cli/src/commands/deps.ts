import type { Command } from 'commander';
import { runRepositoryCommand, type CommandDependencies } from './shared';

export function registerDepsCommand(program: Command, deps: CommandDependencies = {}) {
  program
    .command('deps <source>')
    .description('Parse requirements.txt, pyproject.toml and package.json manifests')
    .action(async (source: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'deps', data: await repo.getDependencies() }),
        deps,
      );
    });
}
