import path from 'node:path';
import { Minimatch } from 'minimatch';
import { parseRequirement } from './pep508';
import { makeRecord, type DependencyKind, type DependencyParser, type DependencyRecord } from './types';
import { normalizeVersion } from './version';

const MANIFEST_PATTERNS = ['requirements*.txt', '**/requirements/*.txt'].map(
  (p) => new Minimatch(p, { dot: true, matchBase: true }),
);

/** Substrings of a manifest path that mark its requirements as development-only. */
const DEV_PATH_MARKERS = ['dev', 'test', 'doc'];

const VCS_PREFIX = /^(git|hg|svn|bzr)\+/;
const DIRECT_URL = /^https?:\/\/\S*\.(?:tar\.gz|tar\.bz2|tgz|zip|whl)$/i;
const EDITABLE_PREFIX = /^(?:-e|--editable)(?:\s+|=)/;
const LOCAL_PATH = /^(?:\.{1,2}(?:\/|$)|\/|file:)/;
const PER_REQUIREMENT_OPTION = /\s+--hash[=\s]\S+/g;
const INLINE_COMMENT = /\s+#.*$/;

/**
 * Joins `\`-continued lines and drops comments, keeping one logical
 * requirement per entry.
 */
export function logicalLines(content: string): string[] {
  const lines: string[] = [];
  let pending = '';
  for (const physical of content.split(/\r?\n/)) {
    if (physical.endsWith('\\')) {
      pending += physical.slice(0, -1);
      continue;
    }
    const line = (pending + physical).replace(INLINE_COMMENT, '').trim();
    pending = '';
    if (line && !line.startsWith('#')) lines.push(line);
  }
  const tail = pending.replace(INLINE_COMMENT, '').trim();
  if (tail && !tail.startsWith('#')) lines.push(tail);
  return lines;
}

export function isDevManifest(manifest: string): boolean {
  const lower = manifest.toLowerCase();
  return DEV_PATH_MARKERS.some((marker) => lower.includes(marker));
}

export function kindOfUrl(url: string): DependencyKind {
  if (VCS_PREFIX.test(url)) return 'vcs';
  if (url.startsWith('file:')) return 'path';
  return 'url';
}

/**
 * Splits `git+https://host/owner/repo.git@v1.0#egg=repo` into its URL,
 * pinned ref and egg name.
 */
export function parseVcsUrl(spec: string): { source: string; ref?: string; egg?: string } {
  let url = spec.replace(VCS_PREFIX, '');
  let egg: string | undefined;

  const hash = url.indexOf('#');
  if (hash !== -1) {
    const fragment = url.slice(hash + 1);
    url = url.slice(0, hash);
    egg = /(?:^|&)egg=([^&[]+)/.exec(fragment)?.[1];
  }

  const scheme = url.indexOf('://');
  const pathStart = scheme === -1 ? url.indexOf(':') : url.indexOf('/', scheme + 3);
  const at = url.lastIndexOf('@');
  let ref: string | undefined;
  if (pathStart !== -1 && at > pathStart) {
    ref = url.slice(at + 1);
    url = url.slice(0, at);
  }

  return { source: url, ref, egg };
}

/** Kind, source and pinned ref for the URL of a `name @ url` reference. */
export function directReference(url: string): Pick<DependencyRecord, 'kind' | 'source' | 'ref'> {
  const kind = kindOfUrl(url);
  if (kind !== 'vcs') return { kind, source: url };
  const { source, ref } = parseVcsUrl(url);
  return { kind, source, ref };
}

function repositoryName(url: string): string {
  const last = url.replace(/\/+$/, '').split(/[/:]/).pop() ?? url;
  return last.replace(/\.git$/, '');
}

/** `requests-2.31.0.tar.gz` yields name `requests`, version `2.31.0`. */
function archiveNameAndVersion(url: string): { name: string; version: string } {
  const pathname = url.replace(/[?#].*$/, '');
  const file = pathname.split('/').pop() ?? pathname;
  const stem = file.replace(/\.(?:tar\.gz|tar\.bz2|tgz|zip|whl)$/i, '');

  const archive = /\/([^/]+)\/archive\/(?:refs\/tags\/)?[^/]+$/.exec(pathname);
  if (archive) {
    return { name: archive[1], version: normalizeVersion(stem) };
  }
  if (/\.whl$/i.test(file)) {
    const [name, version = ''] = stem.split('-');
    return { name, version };
  }
  const versioned = /^(.+?)-(\d[^-]*)$/.exec(stem);
  return versioned ? { name: versioned[1], version: versioned[2] } : { name: stem, version: '' };
}

function parseLine(line: string, base: Pick<DependencyRecord, 'dev' | 'group'>): DependencyRecord | null {
  const target = line.replace(EDITABLE_PREFIX, '').replace(PER_REQUIREMENT_OPTION, '').trim();
  // Other pip options (-r, -c, --index-url, ...) declare no dependency.
  if (!EDITABLE_PREFIX.test(line) && line.startsWith('-')) return null;

  const requirement = parseRequirement(target);
  if (requirement) {
    return makeRecord(requirement.name, {
      ...base,
      versionConstraint: requirement.specifier,
      extras: requirement.extras,
      markers: requirement.marker,
      ...(requirement.url ? directReference(requirement.url) : {}),
    });
  }

  if (VCS_PREFIX.test(target)) {
    const { source, ref, egg } = parseVcsUrl(target);
    return makeRecord(egg ?? repositoryName(source), { ...base, kind: 'vcs', source, ref, raw: line });
  }

  if (DIRECT_URL.test(target)) {
    const { name, version } = archiveNameAndVersion(target);
    return makeRecord(name, { ...base, kind: 'url', versionConstraint: version, source: target, raw: line });
  }

  if (LOCAL_PATH.test(target)) {
    const localPath = target.replace(/^file:(?:\/\/)?/, '');
    return makeRecord(path.posix.basename(localPath) || localPath, {
      ...base,
      kind: 'path',
      source: localPath,
      raw: line,
    });
  }

  return makeRecord(line, { ...base, kind: 'unknown', raw: line });
}

export const requirementsTxtParser: DependencyParser = {
  id: 'requirements.txt',
  defaultManifest: 'requirements.txt',

  canParse(relativePath) {
    return MANIFEST_PATTERNS.some((m) => m.match(relativePath));
  },

  parse(content, manifest) {
    const dev = isDevManifest(manifest);
    const base = { dev, group: dev ? 'dev' : 'main' };
    const records: DependencyRecord[] = [];
    for (const line of logicalLines(content)) {
      const record = parseLine(line, base);
      if (record) records.push(record);
    }
    return records;
  },
};
