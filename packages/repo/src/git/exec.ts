import { spawn } from 'child_process';
import { ProcessError } from '@gitsift/shared';

export interface GitRunOptions {
  cwd: string;
}

/**
 * Runs `git` with the given arguments and resolves with trimmed stdout.
 * Replaced by a fake in tests so that git is never invoked.
 */
export type GitRunner = (args: string[], options: GitRunOptions) => Promise<string>;

export const runGit: GitRunner = (args, { cwd }) =>
  new Promise((resolve, reject) => {
    const child = spawn('git', args, { cwd, env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(stdout.trim());
      } else {
        reject(
          new ProcessError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
            exitCode: code ?? undefined,
          }),
        );
      }
    });

    child.on('error', (err) => {
      reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
    });
  });
