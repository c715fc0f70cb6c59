import {
  createExtractionConfig,
  loadConfigFile,
  mergeConfig,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from '@gitsift/shared';
import type { GlobalOptions } from './types';

/**
 * Builds the extraction config for one invocation: the `--config` file (if
 * any) with command-line flags layered on top.
 */
export function resolveExtractionConfig(options: GlobalOptions): ExtractionConfig {
  const base = options.config ? loadConfigFile(options.config) : {};

  const flags: Partial<ExtractionConfigInput> = {
    maxFileSize: options.maxFileSize,
    excludePatterns: options.exclude.length > 0 ? options.exclude : undefined,
    includePatterns: options.include.length > 0 ? options.include : undefined,
    tempDir: options.tempDir,
  };

  return createExtractionConfig(mergeConfig(base, flags));
}
