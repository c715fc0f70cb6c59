import type { Command, OptionValues } from 'commander';
import { collect, parsePositiveInteger } from '../types';
import { runRepositoryCommand, type CommandDependencies } from './shared';

export function registerContentCommands(program: Command, deps: CommandDependencies = {}) {
  program
    .command('content <source> <path>')
    .description('Print one text file of the repository')
    .action(async (source: string, filePath: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({
          kind: 'text',
          data: await repo.getFileContent(filePath),
          emptyMessage: `Not available as text: ${filePath}`,
        }),
        deps,
      );
    });

  program
    .command('contents <source>')
    .description('Print every text file of the repository')
    .option('--max-size <bytes>', 'Skip files larger than this', parsePositiveInteger)
    .option('--skip <pattern>', 'Additional glob to leave out (repeatable)', collect, [])
    .action(async (source: string, options: OptionValues, command: Command) => {
      const maxSize = typeof options.maxSize === 'number' ? options.maxSize : undefined;
      const skip: string[] = Array.isArray(options.skip) ? options.skip : [];
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'contents', data: await repo.getAllContents(maxSize, skip) }),
        deps,
      );
    });

  program
    .command('dir-contents <source> <directory>')
    .description('Print every text file below one directory, keyed relative to it')
    .action(async (source: string, directory: string, _options: unknown, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'contents', data: await repo.getDirectoryContents(directory) }),
        deps,
      );
    });
}
