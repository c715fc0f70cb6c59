import { ManifestParseError, toError } from '@gitsift/shared';
import { makeRecord, type DependencyParser, type DependencyRecord } from './types';
import { normalizeVersion } from './version';

type Json = Record<string, unknown>;

const SECTIONS: ReadonlyArray<{ key: string; group: string; dev: boolean; optional: boolean }> = [
  { key: 'dependencies', group: 'main', dev: false, optional: false },
  { key: 'devDependencies', group: 'dev', dev: true, optional: false },
  { key: 'peerDependencies', group: 'peer', dev: false, optional: false },
  { key: 'optionalDependencies', group: 'optional', dev: false, optional: true },
];

const VCS_KEYS = ['git', 'github', 'gitlab', 'bitbucket'] as const;

const VCS_SPEC = /^(?:git\+|git:\/\/|github:|gitlab:|bitbucket:)/;
const GITHUB_SHORTHAND = /^[A-Za-z0-9][\w.-]*\/[\w.-]+(?:#.+)?$/;
const PATH_SPEC = /^(?:file:|link:|workspace:|\.{1,2}\/|\/|~\/)/;
const URL_SPEC = /^https?:\/\//;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitRef(spec: string): { source: string; ref?: string } {
  const hash = spec.indexOf('#');
  return hash === -1 ? { source: spec } : { source: spec.slice(0, hash), ref: spec.slice(hash + 1) };
}

function fromString(name: string, spec: string, base: Partial<DependencyRecord>): DependencyRecord {
  const trimmed = spec.trim();
  if (VCS_SPEC.test(trimmed) || GITHUB_SHORTHAND.test(trimmed)) {
    return makeRecord(name, { ...base, kind: 'vcs', ...splitRef(trimmed) });
  }
  if (PATH_SPEC.test(trimmed)) {
    return makeRecord(name, { ...base, kind: 'path', source: trimmed });
  }
  if (URL_SPEC.test(trimmed)) {
    return makeRecord(name, { ...base, kind: 'url', source: trimmed });
  }
  return makeRecord(name, { ...base, versionConstraint: normalizeVersion(trimmed) });
}

function fromObject(name: string, spec: Json, base: Partial<DependencyRecord>): DependencyRecord {
  const declared = spec.version;
  const version = typeof declared === 'string' ? declared : '';
  const vcsKey = VCS_KEYS.find((key) => key in spec);
  if (vcsKey) {
    const url = spec.url ?? spec[vcsKey];
    return makeRecord(name, {
      ...base,
      kind: 'vcs',
      versionConstraint: version,
      source: typeof url === 'string' ? url : undefined,
    });
  }
  return makeRecord(name, { ...base, versionConstraint: normalizeVersion(version) });
}

/**
 * Reads the four dependency sections of a `package.json` independently;
 * a malformed section is skipped without affecting the others.
 */
export function parsePackageJson(content: string, manifest: string): DependencyRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ManifestParseError(manifest, `Invalid JSON: ${toError(error).message}`, { cause: error });
  }
  if (!isObject(data)) {
    throw new ManifestParseError(manifest, 'package.json must contain a JSON object');
  }

  const peerMeta = isObject(data.peerDependenciesMeta) ? data.peerDependenciesMeta : {};
  const records: DependencyRecord[] = [];

  for (const section of SECTIONS) {
    const entries = data[section.key];
    if (!isObject(entries)) continue;

    for (const [name, spec] of Object.entries(entries)) {
      const meta = section.key === 'peerDependencies' ? peerMeta[name] : undefined;
      const base = {
        group: section.group,
        dev: section.dev,
        optional: section.optional || (isObject(meta) && meta.optional === true),
      };
      if (typeof spec === 'string') {
        records.push(fromString(name, spec, base));
      } else if (isObject(spec)) {
        records.push(fromObject(name, spec, base));
      } else {
        records.push(makeRecord(name, { ...base, kind: 'unknown', raw: JSON.stringify(spec) }));
      }
    }
  }

  return records;
}

export const packageJsonParser: DependencyParser = {
  id: 'package.json',
  defaultManifest: 'package.json',
  canParse: (relativePath) => relativePath.split('/').pop() === 'package.json',
  parse: parsePackageJson,
};
