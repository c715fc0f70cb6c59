import { Minimatch, type MinimatchOptions } from 'minimatch';
import { normalizePath, type ExtractionConfig } from '@gitsift/shared';
import { DEFAULT_EXCLUDE_PATTERNS } from './defaults';

export type FilterSettings = Pick<ExtractionConfig, 'excludePatterns' | 'includePatterns'>;

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  // Slash-free patterns such as `*.log` match the basename at any depth.
  matchBase: true,
  nocomment: true,
  nonegate: true,
};

const SUBTREE_SUFFIX = '/**';

/**
 * Include/exclude decision for repository-relative paths.
 *
 * Exclude patterns are checked first and always win. An empty exclude list
 * selects {@link DEFAULT_EXCLUDE_PATTERNS}; a non-empty one replaces it.
 */
export class PathFilter {
  private readonly excludes: Minimatch[];
  private readonly includes: Minimatch[];
  private readonly subtreeExcludes: Minimatch[];

  constructor(settings: FilterSettings) {
    const excludePatterns =
      settings.excludePatterns.length > 0 ? settings.excludePatterns : DEFAULT_EXCLUDE_PATTERNS;

    this.excludes = excludePatterns.map((p) => new Minimatch(p, MATCH_OPTIONS));
    this.includes = settings.includePatterns.map((p) => new Minimatch(p, MATCH_OPTIONS));
    // `<prefix>/**` rejects every path below a directory matching `<prefix>`.
    this.subtreeExcludes = excludePatterns
      .filter((p) => p.endsWith(SUBTREE_SUFFIX) && p.length > SUBTREE_SUFFIX.length)
      .map((p) => new Minimatch(p.slice(0, -SUBTREE_SUFFIX.length), { ...MATCH_OPTIONS, matchBase: false }));
  }

  shouldInclude(relativePath: string): boolean {
    const target = normalizePath(relativePath);
    if (this.excludes.some((m) => m.match(target))) {
      return false;
    }
    if (this.includes.length > 0) {
      return this.includes.some((m) => m.match(target));
    }
    return true;
  }

  /**
   * True when every file beneath `relativeDir` would be rejected, so the
   * walker can skip the subtree without changing its result.
   */
  excludesSubtree(relativeDir: string): boolean {
    const target = normalizePath(relativeDir);
    return target !== '' && this.subtreeExcludes.some((m) => m.match(target));
  }
}

export function shouldInclude(relativePath: string, settings: FilterSettings): boolean {
  return new PathFilter(settings).shouldInclude(relativePath);
}
