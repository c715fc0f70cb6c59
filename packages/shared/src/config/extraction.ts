import { z } from 'zod';
import { ConfigError } from '../errors';

/** 10 MiB */
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const PatternListSchema = z.array(z.string().trim().min(1, 'glob patterns must not be empty'));

export const ExtractionConfigSchema = z
  .object({
    maxFileSize: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
    // Empty means "use the built-in exclude set"; a non-empty list replaces it.
    excludePatterns: PatternListSchema.default([]),
    includePatterns: PatternListSchema.default([]),
    tempDir: z.string().min(1).optional(),
  })
  .strict();

export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;

/**
 * Immutable extraction settings shared by every repository operation.
 */
export interface ExtractionConfig {
  readonly maxFileSize: number;
  readonly excludePatterns: readonly string[];
  readonly includePatterns: readonly string[];
  readonly tempDir?: string;
}

/**
 * Validates raw settings and returns a frozen {@link ExtractionConfig}.
 *
 * @throws ConfigError when a field is missing, mistyped or unknown.
 */
export function createExtractionConfig(input: unknown = {}): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid extraction config: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { details: { issues } },
    );
  }

  const { maxFileSize, excludePatterns, includePatterns, tempDir } = result.data;
  return Object.freeze({
    maxFileSize,
    excludePatterns: Object.freeze([...excludePatterns]),
    includePatterns: Object.freeze([...includePatterns]),
    ...(tempDir !== undefined ? { tempDir } : {}),
  });
}
