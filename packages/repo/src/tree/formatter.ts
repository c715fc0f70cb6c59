import { InvalidArgumentError } from '@gitsift/shared';

/**
 * Tree presentation styles. `dict` is an alias label for `structured`.
 */
export const TREE_STYLES = ['flattened', 'markdown', 'structured', 'dict'] as const;

export type TreeStyle = (typeof TREE_STYLES)[number];

/** Nested map of path segments; `null` marks a file leaf. */
export interface TreeNode {
  [name: string]: TreeNode | null;
}

export type TreeOutput = string[] | TreeNode;

export function isTreeStyle(value: string): value is TreeStyle {
  return TREE_STYLES.some((style) => style === value);
}

/** @throws InvalidArgumentError for anything but a known style label. */
export function assertTreeStyle(style: string): asserts style is TreeStyle {
  if (!isTreeStyle(style)) {
    throw new InvalidArgumentError(
      'style',
      `Unsupported tree style: ${style} (expected one of ${TREE_STYLES.join(', ')})`,
    );
  }
}

/** One path per line, in input order. */
export function formatFlattened(paths: readonly string[]): string[] {
  return [...paths];
}

/**
 * One line per file, indented two spaces per directory level:
 * `src/utils/helper.py` becomes `"    - helper.py"`.
 */
export function formatMarkdown(paths: readonly string[]): string[] {
  return paths.map((p) => {
    const segments = p.split('/');
    return `${'  '.repeat(segments.length - 1)}- ${segments[segments.length - 1]}`;
  });
}

// Defines an own property, so a segment named `__proto__` is stored like any other.
function setChild(node: TreeNode, name: string, child: TreeNode | null): void {
  Object.defineProperty(node, name, { value: child, writable: true, enumerable: true, configurable: true });
}

export function formatStructured(paths: readonly string[]): TreeNode {
  const root: TreeNode = {};
  for (const p of paths) {
    const segments = p.split('/').filter((s) => s.length > 0);
    let node = root;
    segments.forEach((segment, index) => {
      if (index === segments.length - 1) {
        if (!Object.hasOwn(node, segment)) setChild(node, segment, null);
        return;
      }
      let child = Object.hasOwn(node, segment) ? node[segment] : null;
      if (!child) {
        child = {};
        setChild(node, segment, child);
      }
      node = child;
    });
  }
  return root;
}

/**
 * Renders a sorted path list in the requested style.
 * Throws {@link InvalidArgumentError} for an unknown style name.
 */
export function formatTree(paths: readonly string[], style: string): TreeOutput {
  assertTreeStyle(style);
  switch (style) {
    case 'flattened':
      return formatFlattened(paths);
    case 'markdown':
      return formatMarkdown(paths);
    case 'structured':
    case 'dict':
      return formatStructured(paths);
  }
}

/** Inverse of {@link formatStructured}: every leaf path, sorted. */
export function flattenTree(tree: TreeNode, prefix = ''): string[] {
  const paths: string[] = [];
  for (const [name, child] of Object.entries(tree)) {
    const full = prefix ? `${prefix}/${name}` : name;
    if (child === null) {
      paths.push(full);
    } else {
      paths.push(...flattenTree(child, full));
    }
  }
  return paths.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
