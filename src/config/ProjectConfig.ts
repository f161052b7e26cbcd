/**
 * Project configuration
 *
 * Read from `constref.json` at the project root:
 *
 * ```json
 * {
 *   "autoloadPaths": ["app/models", { "path": "lib", "namespace": "Acme" }],
 *   "collapse": ["app/models/concerns"],
 *   "ignore": ["lib/tasks"],
 *   "inflections": { "oauth": "OAuth" },
 *   "acronyms": ["HTML"]
 * }
 * ```
 *
 * Every field is optional; a missing file means the Rails defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError } from '../base/errors.js';
import type { AutoloadRoot } from '../constant-resolution/types.js';

export const CONFIG_FILE_NAME = 'constref.json';

export const DEFAULT_AUTOLOAD_PATHS: readonly string[] = [
  'app/models',
  'app/models/concerns',
  'app/controllers',
  'app/controllers/concerns',
  'app/helpers',
  'app/jobs',
  'app/mailers',
  'app/services',
  'lib',
];

export interface ProjectConfig {
  autoloadPaths: AutoloadRoot[];
  collapse: string[];
  ignore: string[];
  inflections: Record<string, string>;
  acronyms: string[];
}

export function defaultProjectConfig(): ProjectConfig {
  return {
    autoloadPaths: DEFAULT_AUTOLOAD_PATHS.map(dir => ({ path: dir })),
    collapse: [],
    ignore: [],
    inflections: {},
    acronyms: [],
  };
}

/**
 * Load configuration from the project root (or an explicit path)
 */
export async function loadProjectConfig(projectRoot: string, configPath?: string): Promise<ProjectConfig> {
  const filePath = path.resolve(projectRoot, configPath ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    // Only the default location may be absent
    if (configPath === undefined && isNotFound(error)) {
      return defaultProjectConfig();
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid JSON (${reason})`, filePath);
  }

  return parseProjectConfig(raw, filePath);
}

export function parseProjectConfig(raw: unknown, configPath?: string): ProjectConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('expected a JSON object', configPath);
  }

  const defaults = defaultProjectConfig();
  return {
    autoloadPaths: raw.autoloadPaths === undefined
      ? defaults.autoloadPaths
      : parseAutoloadPaths(raw.autoloadPaths, configPath),
    collapse: parseStringList(raw.collapse, 'collapse', configPath),
    ignore: parseStringList(raw.ignore, 'ignore', configPath),
    inflections: parseStringMap(raw.inflections, 'inflections', configPath),
    acronyms: parseStringList(raw.acronyms, 'acronyms', configPath),
  };
}

function parseAutoloadPaths(value: unknown, configPath?: string): AutoloadRoot[] {
  if (!Array.isArray(value)) {
    throw new ConfigError('"autoloadPaths" must be an array', configPath);
  }

  return value.map((item: unknown, i): AutoloadRoot => {
    if (typeof item === 'string') {
      return { path: item };
    }
    if (isRecord(item) && typeof item.path === 'string') {
      if (item.namespace === undefined) {
        return { path: item.path };
      }
      if (typeof item.namespace === 'string') {
        return { path: item.path, namespace: item.namespace };
      }
    }
    throw new ConfigError(
      `"autoloadPaths[${i}]" must be a path or { "path": string, "namespace"?: string }`,
      configPath
    );
  });
}

function parseStringList(value: unknown, field: string, configPath?: string): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  throw new ConfigError(`"${field}" must be an array of strings`, configPath);
}

function parseStringMap(value: unknown, field: string, configPath?: string): Record<string, string> {
  if (value === undefined) return {};
  if (isRecord(value)) {
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        throw new ConfigError(`"${field}.${key}" must be a string`, configPath);
      }
      result[key] = entry;
    }
    return result;
  }
  throw new ConfigError(`"${field}" must be an object of strings`, configPath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
