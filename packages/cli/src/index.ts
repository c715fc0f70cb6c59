import { CommanderError } from 'commander';
import { AppError, ConfigError, UsageError } from '@gitsift/shared';
import { createProgram } from './program';
import type { CommandDependencies } from './commands/shared';

export const name = '@gitsift/cli';

export { createProgram };
export type { CommandDependencies };

/**
 * Runs the CLI and resolves with the process exit code:
 * 0 on success, 2 for usage and configuration errors, 1 otherwise.
 */
export async function main(argv: string[], deps: CommandDependencies = {}): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or its own message
      return e.exitCode === 0 ? 0 : 2;
    }

    const opts = program.opts();

    if (opts.json) {
      if (e instanceof AppError) {
        console.log(
          JSON.stringify({
            error: {
              code: e.code,
              message: e.message,
              details: e.details,
            },
          }),
        );
      } else {
        console.log(
          JSON.stringify({
            error: {
              code: 'UnknownError',
              message: e instanceof Error ? e.message : String(e),
            },
          }),
        );
      }
    } else {
      console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
  }
}
