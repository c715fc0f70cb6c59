import path from 'node:path';
import fileTypes from '../data/file-types.json';

const EXTENSION_MIME_TYPES: Readonly<Record<string, string>> = fileTypes.extensionMimeTypes;
const MIME_LANGUAGES: Readonly<Record<string, string>> = fileTypes.mimeLanguages;
const EXTENSION_LANGUAGES: Readonly<Record<string, string>> = fileTypes.extensionLanguages;

export const OTHER_LANGUAGE = 'Other';

/**
 * Structured-text MIME types that count as text even though they are not `text/*`.
 */
export const TEXT_MIME_ALLOWLIST: ReadonlySet<string> = new Set([
  'application/json',
  'application/xml',
  'application/x-yaml',
]);

/**
 * Extensions that are always binary, checked before any other lookup.
 */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.ico',
  '.pdf',
  '.zip',
  '.gz',
  '.tar',
  '.rar',
  '.exe',
  '.dll',
  '.so',
  '.pyc',
]);

export function isTextMimeType(mimeType: string): boolean {
  return mimeType.startsWith('text/') || TEXT_MIME_ALLOWLIST.has(mimeType);
}

/** Looks a file up by exact basename first, then by lower-cased extension. */
function lookup(table: Readonly<Record<string, string>>, filePath: string): string | undefined {
  const base = path.basename(filePath);
  if (Object.hasOwn(table, base)) return table[base];
  const ext = path.extname(base).toLowerCase();
  return ext && Object.hasOwn(table, ext) ? table[ext] : undefined;
}

export function extensionMimeType(filePath: string): string | undefined {
  return lookup(EXTENSION_MIME_TYPES, filePath);
}

/**
 * Maps a MIME type to a language label, falling back to the file's
 * extension and finally to {@link OTHER_LANGUAGE}.
 */
export function languageFor(filePath: string, mimeType: string): string {
  if (Object.hasOwn(MIME_LANGUAGES, mimeType)) return MIME_LANGUAGES[mimeType];
  return lookup(EXTENSION_LANGUAGES, filePath) ?? OTHER_LANGUAGE;
}
