import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError } from '../errors';
import type { ExtractionConfigInput } from './extraction';

const SUPPORTED_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

/**
 * Reads extraction settings from a JSON or YAML file.
 * The content is returned unvalidated; pass it through `createExtractionConfig`.
 */
export function loadConfigFile(filePath: string): Record<string, unknown> {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new ConfigError(`Unsupported config file type "${ext}": ${filePath}`, {
      details: { supported: [...SUPPORTED_EXTENSIONS] },
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    // YAML is a superset of JSON, so one loader covers both.
    parsed = yaml.load(content);
  } catch (error: unknown) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigError(`Error parsing config file: ${filePath}\n${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Layers `overrides` over `base`. Undefined values are ignored; arrays replace.
 */
export function mergeConfig(
  base: Record<string, unknown>,
  overrides: Partial<ExtractionConfigInput>,
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    output[key] = Array.isArray(value) ? [...value] : value;
  }
  return output;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
