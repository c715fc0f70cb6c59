import { parse as parseToml } from 'smol-toml';
import { ManifestParseError, toError } from '@gitsift/shared';
import { parseRequirement } from './pep508';
import { directReference } from './requirements';
import { makeRecord, type DependencyParser, type DependencyRecord } from './types';

type Table = Record<string, unknown>;

/** Base attributes shared by every record declared in one section. */
type SectionDefaults = Pick<DependencyRecord, 'dev' | 'group' | 'optional'>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function table(parent: unknown, key: string): Table | undefined {
  if (!isTable(parent)) return undefined;
  const child = parent[key];
  return isTable(child) ? child : undefined;
}

function stringField(spec: Table, key: string): string | undefined {
  const value = spec[key];
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * One Poetry dependency: a version string, a table such as
 * `{ version = "^1.0", extras = ["x"] }` / `{ git = "...", rev = "v1" }` /
 * `{ path = "../lib" }`, or a list of such tables for multiple constraints.
 */
function poetryRecord(name: string, spec: unknown, defaults: SectionDefaults): DependencyRecord {
  if (typeof spec === 'string') {
    return makeRecord(name, { ...defaults, versionConstraint: spec });
  }

  if (Array.isArray(spec)) {
    const tables = spec.filter(isTable);
    if (tables.length === 0) {
      return makeRecord(name, { ...defaults, kind: 'unknown', raw: JSON.stringify(spec) });
    }
    const versions = tables.map((t) => stringField(t, 'version')).filter((v): v is string => !!v);
    return { ...poetryRecord(name, tables[0], defaults), versionConstraint: versions.join(' || ') };
  }

  if (!isTable(spec)) {
    return makeRecord(name, { ...defaults, kind: 'unknown', raw: String(spec) });
  }

  const record = makeRecord(name, {
    ...defaults,
    versionConstraint: stringField(spec, 'version') ?? '',
    extras: [...new Set(stringList(spec.extras))].sort(),
    markers: stringField(spec, 'markers'),
  });
  const optional = spec.optional;
  if (typeof optional === 'boolean') record.optional = optional;

  const git = stringField(spec, 'git');
  const localPath = stringField(spec, 'path');
  const url = stringField(spec, 'url');
  if (git) {
    record.kind = 'vcs';
    record.source = git;
    record.ref = stringField(spec, 'rev') ?? stringField(spec, 'tag') ?? stringField(spec, 'branch');
  } else if (localPath) {
    record.kind = 'path';
    record.source = localPath;
  } else if (url) {
    record.kind = 'url';
    record.source = url;
  }
  return record;
}

function poetrySection(section: Table | undefined, defaults: SectionDefaults): DependencyRecord[] {
  if (!section) return [];
  return Object.entries(section)
    .filter(([name]) => name.toLowerCase() !== 'python')
    .map(([name, spec]) => poetryRecord(name, spec, defaults));
}

function pep621Section(entries: unknown, defaults: SectionDefaults): DependencyRecord[] {
  return stringList(entries).map((entry) => {
    const requirement = parseRequirement(entry);
    if (!requirement) {
      return makeRecord(entry, { ...defaults, kind: 'unknown', raw: entry });
    }
    return makeRecord(requirement.name, {
      ...defaults,
      versionConstraint: requirement.specifier,
      extras: requirement.extras,
      markers: requirement.marker,
      ...(requirement.url ? directReference(requirement.url) : {}),
    });
  });
}

/**
 * Collects Poetry (`tool.poetry.*`) and PEP 621 (`project.*`) declarations.
 * A package declared twice in the same group keeps its first position and
 * takes the later declaration.
 */
export function parsePyproject(content: string, manifest: string): DependencyRecord[] {
  let data: Table;
  try {
    data = parseToml(content);
  } catch (error) {
    throw new ManifestParseError(manifest, `Invalid TOML: ${toError(error).message}`, { cause: error });
  }

  const main: SectionDefaults = { dev: false, optional: false, group: 'main' };
  const dev: SectionDefaults = { dev: true, optional: false, group: 'dev' };
  const records: DependencyRecord[] = [];

  const poetry = table(table(data, 'tool'), 'poetry');
  records.push(...poetrySection(table(poetry, 'dependencies'), main));
  for (const [groupName, group] of Object.entries(table(poetry, 'group') ?? {})) {
    const defaults =
      groupName === 'dev' ? dev : { dev: false, optional: true, group: groupName };
    records.push(...poetrySection(table(group, 'dependencies'), defaults));
  }
  records.push(...poetrySection(table(poetry, 'dev-dependencies'), dev));

  const project = table(data, 'project');
  if (project) {
    records.push(...pep621Section(project.dependencies, main));
    for (const [groupName, entries] of Object.entries(table(project, 'optional-dependencies') ?? {})) {
      records.push(...pep621Section(entries, { dev: groupName === 'dev', optional: true, group: groupName }));
    }
  }

  const merged = new Map<string, DependencyRecord>();
  for (const record of records) {
    merged.set(`${record.group}\u0000${record.name.toLowerCase()}`, record);
  }
  return [...merged.values()];
}

export const pyprojectParser: DependencyParser = {
  id: 'pyproject.toml',
  defaultManifest: 'pyproject.toml',
  canParse: (relativePath) => relativePath.split('/').pop() === 'pyproject.toml',
  parse: parsePyproject,
};
