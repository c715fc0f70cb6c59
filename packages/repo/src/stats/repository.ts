import path from 'node:path';
import { FileClassifier } from '../classify/classifier';
import type { WalkedFile } from '../scanner/types';
import { comparePaths } from '../scanner/walker';

export const LARGEST_FILES_LIMIT = 10;

export interface FileSize {
  path: string;
  size: number;
}

export interface RepositoryStatistics {
  totalFiles: number;
  totalSize: number;
  binaryCount: number;
  textCount: number;
  averageFileSize: number;
  /** Fraction of files that are binary, 0..1. */
  binaryRatio: number;
  /** File count per lower-cased extension; files without one are not counted. */
  fileTypeHistogram: Record<string, number>;
  largestFiles: FileSize[];
}

export async function computeRepositoryStatistics(
  files: readonly WalkedFile[],
  classifier: FileClassifier = new FileClassifier(),
): Promise<RepositoryStatistics> {
  let totalSize = 0;
  let binaryCount = 0;
  const histogram = new Map<string, number>();

  for (const file of files) {
    totalSize += file.sizeBytes;
    const ext = path.posix.extname(file.path).toLowerCase();
    if (ext) histogram.set(ext, (histogram.get(ext) ?? 0) + 1);
    if (await classifier.isBinary(file.absPath)) binaryCount += 1;
  }

  const totalFiles = files.length;
  const largestFiles = files
    .map((f) => ({ path: f.path, size: f.sizeBytes }))
    .sort((a, b) => b.size - a.size || comparePaths(a.path, b.path))
    .slice(0, LARGEST_FILES_LIMIT);

  return {
    totalFiles,
    totalSize,
    binaryCount,
    textCount: totalFiles - binaryCount,
    averageFileSize: totalFiles > 0 ? totalSize / totalFiles : 0,
    binaryRatio: totalFiles > 0 ? binaryCount / totalFiles : 0,
    fileTypeHistogram: Object.fromEntries([...histogram.entries()].sort(([a], [b]) => comparePaths(a, b))),
    largestFiles,
  };
}
