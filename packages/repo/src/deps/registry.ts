import fs from 'node:fs/promises';
import path from 'node:path';
import {
  ManifestParseError,
  errnoCode,
  logger as defaultLogger,
  toError,
  type Logger,
} from '@gitsift/shared';
import { packageJsonParser } from './packageJson';
import { pyprojectParser } from './pyproject';
import { requirementsTxtParser } from './requirements';
import type { DependencyParser, DependencyReport, ManifestParseResult } from './types';
import { comparePaths } from '../scanner/walker';

/**
 * Registered parsers, in the order they are tried for each manifest.
 */
export const DEPENDENCY_PARSERS: readonly DependencyParser[] = [
  requirementsTxtParser,
  pyprojectParser,
  packageJsonParser,
];

export function parserFor(relativePath: string): DependencyParser | undefined {
  return DEPENDENCY_PARSERS.find((parser) => parser.canParse(relativePath));
}

export function decodeManifest(bytes: Uint8Array, manifest: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ManifestParseError(manifest, 'File is not valid UTF-8 text', { cause: error });
  }
}

export interface DependencyOptions {
  logger?: Logger;
  /** Manifests larger than this many bytes are reported as `failed` without being read. */
  maxFileSize?: number;
}

/**
 * Parses one manifest. Never throws: an absent file is `missing`, an
 * unreadable or malformed one is `failed` with its error message.
 */
export async function parseManifest(
  repoRoot: string,
  manifest: string,
  parser: DependencyParser,
  options: DependencyOptions = {},
): Promise<ManifestParseResult> {
  const log = (options.logger ?? defaultLogger).child({ component: 'deps' });
  const base = { manifest, parser: parser.id, dependencies: [] };

  const filePath = path.join(repoRoot, manifest);
  let bytes: Buffer;
  try {
    const { size } = await fs.stat(filePath);
    if (options.maxFileSize !== undefined && size > options.maxFileSize) {
      const { message } = new ManifestParseError(
        manifest,
        `File is too large (${size} bytes, limit ${options.maxFileSize})`,
      );
      log.warn(message);
      return { ...base, status: 'failed', error: message };
    }
    bytes = await fs.readFile(filePath);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { ...base, status: 'missing' };
    }
    const message = toError(error).message;
    log.warn(`Cannot read ${manifest}: ${message}`);
    return { ...base, status: 'failed', error: message };
  }

  try {
    const dependencies = parser.parse(decodeManifest(bytes, manifest), manifest);
    log.debug(`Parsed ${dependencies.length} dependencies from ${manifest}`);
    return { ...base, status: 'parsed', dependencies };
  } catch (error) {
    const message = toError(error).message;
    log.warn(`Failed to parse ${manifest}: ${message}`);
    return { ...base, status: 'failed', error: message };
  }
}

/**
 * Parses the root manifests plus every further manifest among `candidates`
 * (repository-relative paths, typically the walked file list). The root
 * `requirements.txt`, `pyproject.toml` and `package.json` keys are always
 * present; other keys follow in path order.
 */
export async function collectDependencies(
  repoRoot: string,
  candidates: readonly string[],
  options: DependencyOptions = {},
): Promise<DependencyReport> {
  const manifests: Array<[string, DependencyParser]> = DEPENDENCY_PARSERS.map((parser) => [
    parser.defaultManifest,
    parser,
  ]);
  const known = new Set(manifests.map(([manifest]) => manifest));

  const discovered = [...candidates].filter((c) => !known.has(c)).sort(comparePaths);
  for (const candidate of discovered) {
    const parser = parserFor(candidate);
    if (parser) manifests.push([candidate, parser]);
  }

  const results = await Promise.all(
    manifests.map(([manifest, parser]) => parseManifest(repoRoot, manifest, parser, options)),
  );

  const report: DependencyReport = {};
  for (const result of results) {
    report[result.manifest] = result;
  }
  return report;
}
