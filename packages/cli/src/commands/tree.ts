import type { Command, OptionValues } from 'commander';
import { TREE_STYLES } from '@gitsift/repo';
import { runRepositoryCommand, type CommandDependencies } from './shared';

const STYLE_DESCRIPTION = `Tree style (${TREE_STYLES.join(', ')})`;

function styleOf(options: OptionValues): string {
  return typeof options.style === 'string' ? options.style : 'flattened';
}

export function registerTreeCommands(program: Command, deps: CommandDependencies = {}) {
  program
    .command('tree <source>')
    .description('List the files of the repository')
    .option('--style <style>', STYLE_DESCRIPTION, 'flattened')
    .action(async (source: string, options: OptionValues, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({ kind: 'tree', data: await repo.getFileTree(styleOf(options)) }),
        deps,
      );
    });

  program
    .command('dir-tree <source> <directory>')
    .description('List the files below one directory of the repository')
    .option('--style <style>', STYLE_DESCRIPTION, 'flattened')
    .action(async (source: string, directory: string, options: OptionValues, command: Command) => {
      await runRepositoryCommand(
        command,
        source,
        async (repo) => ({
          kind: 'tree',
          data: await repo.getDirectoryTree(directory, styleOf(options)),
        }),
        deps,
      );
    });
}
