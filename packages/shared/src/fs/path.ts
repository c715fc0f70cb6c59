import path from 'node:path';

/**
 * Normalizes a path to use forward slashes.
 * Relative paths reported by gitsift are always `/`-separated, whatever the host OS.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Checks whether `candidate` is `root` itself or lies beneath it.
 * Both paths are resolved first, so `..` segments cannot escape.
 */
export function isPathInside(root: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(candidate));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
