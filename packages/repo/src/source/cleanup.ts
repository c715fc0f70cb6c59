import { rmSync } from 'node:fs';
import fs from 'node:fs/promises';
import { errnoCode, logger as defaultLogger, toError, type Logger } from '@gitsift/shared';

/** Errors from handles the OS has not released yet; worth one more try. */
const TRANSIENT_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EPERM', 'ENOTEMPTY']);

export const RETRY_DELAY_MS = 200;

export type RemoveFn = (target: string) => Promise<void>;

export interface RemoveDirectoryOptions {
  logger?: Logger;
  remove?: RemoveFn;
  retryDelayMs?: number;
}

const removeRecursive: RemoveFn = (target) => fs.rm(target, { recursive: true, force: true });

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Deletes a directory tree. Safe to call repeatedly; transient lock errors
 * are retried once after a pause. Never throws: failures are logged and
 * reported as `false`.
 */
export async function removeDirectory(
  target: string,
  options: RemoveDirectoryOptions = {},
): Promise<boolean> {
  const log = (options.logger ?? defaultLogger).child({ component: 'cleanup' });
  const remove = options.remove ?? removeRecursive;

  try {
    if (!(await exists(target))) return true;
    try {
      await remove(target);
    } catch (error) {
      const code = errnoCode(error);
      if (!code || !TRANSIENT_CODES.has(code)) throw error;
      log.debug(`Retrying removal of ${target} after ${code}`);
      await sleep(options.retryDelayMs ?? RETRY_DELAY_MS);
      await remove(target);
    }
    return true;
  } catch (error) {
    log.error(toError(error), `Failed to remove temporary directory ${target}`);
    return false;
  }
}

const pending = new Set<string>();
let exitHookInstalled = false;

function removePendingSync(): void {
  for (const dir of pending) {
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (error) {
      defaultLogger.error(toError(error), `Failed to remove temporary directory ${dir} at exit`);
    }
  }
  pending.clear();
}

/**
 * Registers a temporary directory for removal at process exit, in case its
 * owner is never closed.
 */
export function trackTemporaryDirectory(dir: string): void {
  pending.add(dir);
  if (!exitHookInstalled) {
    process.once('exit', removePendingSync);
    exitHookInstalled = true;
  }
}

export function untrackTemporaryDirectory(dir: string): void {
  pending.delete(dir);
}

export function trackedTemporaryDirectories(): string[] {
  return [...pending];
}
