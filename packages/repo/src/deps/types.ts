/**
 * How a dependency is sourced.
 */
export type DependencyKind = 'registry' | 'vcs' | 'url' | 'path' | 'unknown';

/**
 * One declared dependency, normalized across manifest formats.
 */
export interface DependencyRecord {
  name: string;
  /** Version constraint as declared; empty when none was given. */
  versionConstraint: string;
  /** Requested extras, sorted. */
  extras: string[];
  kind: DependencyKind;
  optional: boolean;
  dev: boolean;
  /** Declaring section: `main`, `dev`, `peer`, `optional` or a named group. */
  group: string;
  /** Environment marker, e.g. `python_version < "3.8"`. */
  markers?: string;
  /** Repository URL, archive URL or local path for non-registry kinds. */
  source?: string;
  /** Branch, tag or commit pinned by a VCS reference. */
  ref?: string;
  /** The offending text of an entry that could not be understood. */
  raw?: string;
}

export type ParserId = 'requirements.txt' | 'pyproject.toml' | 'package.json';

export type ManifestStatus = 'parsed' | 'missing' | 'failed';

export interface ManifestParseResult {
  /** Manifest path relative to the repository root. */
  manifest: string;
  parser: ParserId;
  status: ManifestStatus;
  dependencies: DependencyRecord[];
  error?: string;
}

/** Aggregate keyed by manifest path. */
export type DependencyReport = Record<string, ManifestParseResult>;

/**
 * A manifest parser descriptor. `parse` receives decoded text and throws
 * `ManifestParseError` only when the file as a whole is unusable.
 */
export interface DependencyParser {
  id: ParserId;
  /** Manifest looked for at the repository root even when not walked. */
  defaultManifest: string;
  canParse(relativePath: string): boolean;
  parse(content: string, manifest: string): DependencyRecord[];
}

export function makeRecord(
  name: string,
  fields: Partial<Omit<DependencyRecord, 'name'>> = {},
): DependencyRecord {
  return {
    name,
    versionConstraint: '',
    extras: [],
    kind: 'registry',
    optional: false,
    dev: false,
    group: 'main',
    ...fields,
  };
}
