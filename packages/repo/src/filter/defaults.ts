import excludePatterns from '../data/exclude-patterns.json';

/**
 * Built-in exclude set applied when the caller supplies no exclude patterns:
 * VCS metadata, caches, virtualenvs, build output, logs, OS files and large media.
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = Object.freeze([...excludePatterns]);
