import type { Dirent } from 'node:fs';
import type { ExtractionConfig } from '@gitsift/shared';

/**
 * One file produced by a walk. Attributes are read during that walk and
 * never cached across walks.
 */
export interface WalkedFile {
  /** Path relative to the repository root, `/`-separated. */
  path: string;
  absPath: string;
  sizeBytes: number;
}

export type WalkSettings = Pick<
  ExtractionConfig,
  'maxFileSize' | 'excludePatterns' | 'includePatterns'
>;

/**
 * The filesystem calls the walker needs; swapped out in tests to simulate
 * permission errors and files deleted mid-walk.
 */
export interface WalkerFs {
  readdir(dir: string): Promise<Dirent[]>;
  stat(filePath: string): Promise<{ size: number; isFile(): boolean }>;
  realpath(filePath: string): Promise<string>;
}
