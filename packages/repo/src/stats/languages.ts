import { FileClassifier } from '../classify/classifier';
import { languageFor } from '../classify/fileTypes';
import type { WalkedFile } from '../scanner/types';

export interface LanguageStats {
  files: number;
  bytes: number;
  /** Share of all text bytes, 0..100, two decimals. */
  percentage: number;
}

export type LanguageBreakdown = Record<string, LanguageStats>;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Groups text files by language label. Binary files are skipped entirely.
 * Entries are ordered by byte count, largest first, ties by label.
 */
export class LanguageStatsAggregator {
  constructor(private readonly classifier: FileClassifier = new FileClassifier()) {}

  async aggregate(files: readonly WalkedFile[]): Promise<LanguageBreakdown> {
    const buckets = new Map<string, { files: number; bytes: number }>();
    let totalBytes = 0;

    for (const file of files) {
      const { mimeType, isBinary } = await this.classifier.classify(file.absPath);
      if (isBinary) continue;

      const language = languageFor(file.path, mimeType);
      const bucket = buckets.get(language) ?? { files: 0, bytes: 0 };
      bucket.files += 1;
      bucket.bytes += file.sizeBytes;
      buckets.set(language, bucket);
      totalBytes += file.sizeBytes;
    }

    const ordered = [...buckets.entries()].sort(
      ([aName, a], [bName, b]) => b.bytes - a.bytes || (aName < bName ? -1 : aName > bName ? 1 : 0),
    );

    const result: LanguageBreakdown = {};
    for (const [language, { files: count, bytes }] of ordered) {
      result[language] = {
        files: count,
        bytes,
        percentage: totalBytes > 0 ? round2((bytes / totalBytes) * 100) : 0,
      };
    }
    return result;
  }
}
