/**
 * Directory Scanner
 *
 * Lists the Ruby files under each autoload root and builds a NamespaceIndex.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ProjectConfig } from '../config/index.js';
import { Inflector } from './Inflector.js';
import { NamespaceIndex, NamespaceIndexBuilder } from './NamespaceIndex.js';

export interface ScanOptions {
  debug?: boolean;
}

export async function scanAutoloadRoots(
  projectRoot: string,
  config: ProjectConfig,
  options: ScanOptions = {}
): Promise<NamespaceIndex> {
  const inflector = new Inflector({
    acronyms: config.acronyms,
    overrides: config.inflections,
  });
  const builder = new NamespaceIndexBuilder({
    inflector,
    collapse: config.collapse,
    ignore: config.ignore,
  });

  for (const root of config.autoloadPaths) {
    const absoluteDir = path.resolve(projectRoot, root.path);
    if (!(await isDirectory(absoluteDir))) {
      if (options.debug) {
        console.warn(`Skipping missing autoload path: ${root.path}`);
      }
      continue;
    }

    const files = await listRubyFiles(projectRoot, absoluteDir);
    if (options.debug) {
      console.debug(`Scanned ${root.path}: ${files.length} Ruby files`);
    }
    builder.addRoot(root, files);
  }

  return builder.build();
}

/**
 * Ruby files below a directory, relative to the project root, POSIX separators
 */
export async function listRubyFiles(projectRoot: string, absoluteDir: string): Promise<string[]> {
  const files: string[] = [];
  const pending = [absoluteDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    const dirents = await fs.readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      if (dirent.name.startsWith('.')) continue;

      const fullPath = path.join(dir, dirent.name);
      if (dirent.isDirectory()) {
        pending.push(fullPath);
      } else if (dirent.isFile() && dirent.name.endsWith('.rb')) {
        files.push(path.relative(projectRoot, fullPath).split(path.sep).join('/'));
      }
    }
  }

  return files.sort();
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
