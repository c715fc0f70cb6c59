import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@gitsift/shared';
import { flattenTree, formatTree, formatMarkdown, formatStructured, isTreeStyle } from './formatter';

const PATHS = ['README.md', 'docs/index.md', 'src/main.py', 'src/utils/helper.py'];

describe('formatTree', () => {
  it('returns the flattened list unchanged', () => {
    expect(formatTree(PATHS, 'flattened')).toEqual(PATHS);
  });

  it('indents markdown lines by depth', () => {
    expect(formatTree(PATHS, 'markdown')).toEqual([
      '- README.md',
      '  - index.md',
      '  - main.py',
      '    - helper.py',
    ]);
  });

  it('nests structured output with null leaves', () => {
    expect(formatTree(PATHS, 'structured')).toEqual({
      'README.md': null,
      docs: { 'index.md': null },
      src: { 'main.py': null, utils: { 'helper.py': null } },
    });
  });

  it('treats dict as an alias of structured', () => {
    expect(formatTree(PATHS, 'dict')).toEqual(formatTree(PATHS, 'structured'));
  });

  it('rejects unknown styles', () => {
    expect(() => formatTree(PATHS, 'xml')).toThrow(InvalidArgumentError);
    expect(() => formatTree(PATHS, 'xml')).toThrow(
      'Unsupported tree style: xml (expected one of flattened, markdown, structured, dict)',
    );
  });

  it('handles an empty list', () => {
    expect(formatTree([], 'flattened')).toEqual([]);
    expect(formatMarkdown([])).toEqual([]);
    expect(formatStructured([])).toEqual({});
  });
});

describe('flattenTree', () => {
  it('yields the same set as the flattened style', () => {
    expect(flattenTree(formatStructured(PATHS))).toEqual(PATHS);
  });

  it('round-trips segments named __proto__', () => {
    const tree = formatStructured(['__proto__/x.py', 'a.py']);

    expect(JSON.stringify(tree)).toBe('{"__proto__":{"x.py":null},"a.py":null}');
    expect(flattenTree(tree)).toEqual(['__proto__/x.py', 'a.py']);
  });

  it('sorts by code unit', () => {
    expect(flattenTree({ b: null, A: { z: null }, a: null })).toEqual(['A/z', 'a', 'b']);
  });
});

describe('isTreeStyle', () => {
  it('recognizes the four labels', () => {
    expect(['flattened', 'markdown', 'structured', 'dict'].every(isTreeStyle)).toBe(true);
    expect(isTreeStyle('tree')).toBe(false);
  });
});
