import type { OptionValues } from 'commander';
import { UsageError } from '@gitsift/shared';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  config?: string;
  output?: string;
  maxFileSize?: number;
  exclude: string[];
  include: string[];
  tempDir?: string;
}

/**
 * Narrows commander's loosely typed option bag to {@link GlobalOptions}.
 */
export function readGlobalOptions(values: OptionValues): GlobalOptions {
  return {
    json: values.json === true,
    verbose: values.verbose === true,
    config: optionalString(values.config),
    output: optionalString(values.output),
    maxFileSize: typeof values.maxFileSize === 'number' ? values.maxFileSize : undefined,
    exclude: stringList(values.exclude),
    include: stringList(values.include),
    tempDir: optionalString(values.tempDir),
  };
}

/** Option parser for byte counts such as `--max-file-size 1048576`. */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new UsageError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Option parser for repeatable flags: every occurrence is appended. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
