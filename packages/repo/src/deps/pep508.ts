/**
 * Strict parser for dependency specifiers of the form
 * `name[extra,...] (op version, ...) ; marker` or `name[extra] @ url ; marker`.
 */

export interface Requirement {
  name: string;
  extras: string[];
  /** Comma-joined specifiers as written, e.g. `>=2.0,<3`. */
  specifier: string;
  url?: string;
  marker?: string;
}

const NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?/;
const OPERATOR = /^(?:===|~=|==|!=|<=|>=|<|>)/;
const VERSION = /^[A-Za-z0-9_.*+!-]+/;
const URL = /^\S+/;

/**
 * Returns `null` when `input` is not a well-formed specifier.
 */
export function parseRequirement(input: string): Requirement | null {
  const text = input.trim();
  let pos = 0;

  const skipWhitespace = () => {
    while (pos < text.length && /\s/.test(text[pos])) pos++;
  };
  const take = (pattern: RegExp): string | undefined => {
    const match = pattern.exec(text.slice(pos));
    if (!match) return undefined;
    pos += match[0].length;
    return match[0];
  };

  const name = take(NAME);
  if (!name) return null;
  skipWhitespace();

  const extras: string[] = [];
  if (text[pos] === '[') {
    pos++;
    skipWhitespace();
    while (text[pos] !== ']') {
      const extra = take(NAME);
      if (!extra) return null;
      extras.push(extra);
      skipWhitespace();
      if (text[pos] === ',') {
        pos++;
        skipWhitespace();
      } else if (text[pos] !== ']') {
        return null;
      }
    }
    pos++;
    skipWhitespace();
  }

  let url: string | undefined;
  const specifiers: string[] = [];

  if (text[pos] === '@') {
    pos++;
    skipWhitespace();
    url = take(URL);
    if (!url) return null;
  } else {
    const parenthesized = text[pos] === '(';
    if (parenthesized) {
      pos++;
      skipWhitespace();
    }
    for (;;) {
      const operator = take(OPERATOR);
      if (!operator) {
        // A trailing comma must be followed by another clause.
        if (specifiers.length > 0) return null;
        break;
      }
      skipWhitespace();
      const version = take(VERSION);
      if (!version) return null;
      specifiers.push(operator + version);
      skipWhitespace();
      if (text[pos] !== ',') break;
      pos++;
      skipWhitespace();
    }
    if (parenthesized) {
      if (text[pos] !== ')') return null;
      pos++;
    }
  }

  skipWhitespace();
  let marker: string | undefined;
  if (pos < text.length) {
    if (text[pos] !== ';') return null;
    marker = text.slice(pos + 1).trim();
    if (!marker) return null;
  }

  return {
    name,
    extras: [...new Set(extras)].sort(),
    specifier: specifiers.join(','),
    url,
    marker,
  };
}
