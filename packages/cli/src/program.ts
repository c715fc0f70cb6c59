import { Command } from 'commander';
import { version } from '../package.json';
import { registerContentCommands } from './commands/content';
import { registerDepsCommand } from './commands/deps';
import { registerInfoCommand } from './commands/info';
import { registerReadmeCommand } from './commands/readme';
import type { CommandDependencies } from './commands/shared';
import { registerStatsCommands } from './commands/stats';
import { registerTreeCommands } from './commands/tree';
import { collect, parsePositiveInteger } from './types';

export function createProgram(deps: CommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('gitsift')
    .description('Extract trees, READMEs, dependencies and statistics from git repositories')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to a JSON or YAML extraction config')
    .option('--verbose', 'Enable verbose logging')
    .option('--output <file>', 'Write the result to a file as JSON instead of printing it')
    .option('--max-file-size <bytes>', 'Skip files larger than this', parsePositiveInteger)
    .option('--exclude <pattern>', 'Glob to exclude (repeatable; replaces the defaults)', collect, [])
    .option('--include <pattern>', 'Glob a file must match to be kept (repeatable)', collect, [])
    .option('--temp-dir <dir>', 'Directory for temporary clones of remote sources')
    .exitOverride();

  registerInfoCommand(program, deps);
  registerTreeCommands(program, deps);
  registerReadmeCommand(program, deps);
  registerDepsCommand(program, deps);
  registerStatsCommands(program, deps);
  registerContentCommands(program, deps);

  return program;
}
