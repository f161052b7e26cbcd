/**
 * Namespace Index
 *
 * Maps fully qualified namespace paths to the files autoloading expects to
 * define them. Built once by NamespaceIndexBuilder, read-only afterwards,
 * so one index can serve any number of concurrent resolutions.
 */

import * as path from 'path';
import { NamespaceCollisionError } from '../base/errors.js';
import { Inflector } from './Inflector.js';
import {
  parseQualifiedName,
  qualifiedName,
  type AutoloadRoot,
  type NamespaceEntry,
  type NamespacePath,
} from './types.js';

export class NamespaceIndex {
  private readonly byName: ReadonlyMap<string, NamespaceEntry>;

  constructor(entries: Iterable<NamespaceEntry>) {
    const byName = new Map<string, NamespaceEntry>();
    for (const entry of entries) {
      if (byName.has(entry.qualifiedName)) {
        throw new Error(`Duplicate namespace entry: ${entry.qualifiedName}`);
      }
      byName.set(entry.qualifiedName, Object.freeze({ ...entry, path: Object.freeze([...entry.path]) }));
    }
    this.byName = byName;
  }

  /**
   * Whether the path is known at all, as a file or a namespace
   */
  has(namespacePath: NamespacePath): boolean {
    return this.byName.has(qualifiedName(namespacePath));
  }

  entry(namespacePath: NamespacePath): NamespaceEntry | null {
    return this.byName.get(qualifiedName(namespacePath)) ?? null;
  }

  definingFile(namespacePath: NamespacePath): string | null {
    return this.entry(namespacePath)?.file ?? null;
  }

  entries(): NamespaceEntry[] {
    return Array.from(this.byName.values());
  }

  get size(): number {
    return this.byName.size;
  }
}

export interface NamespaceIndexBuilderOptions {
  inflector?: Inflector;
  /** Directories (relative to the project root) that add no namespace segment */
  collapse?: readonly string[];
  /** Files or directories (relative to the project root) to leave out */
  ignore?: readonly string[];
}

interface MutableEntry {
  path: string[];
  file: string | null;
  isDirectory: boolean;
  rootDir: string;
}

function normalizeDir(dir: string): string {
  return path.posix.normalize(dir.split(path.sep).join('/')).replace(/\/+$/, '');
}

function isInside(filePath: string, dir: string): boolean {
  return dir === '.' || filePath.startsWith(`${dir}/`);
}

/**
 * Turns autoload roots and the Ruby files under them into a NamespaceIndex.
 *
 * File paths are relative to the project root, POSIX separators.
 */
export class NamespaceIndexBuilder {
  private readonly inflector: Inflector;
  private readonly collapse: Set<string>;
  private readonly ignore: string[];
  private roots: Array<{ root: AutoloadRoot; dir: string; files: string[] }> = [];

  constructor(options: NamespaceIndexBuilderOptions = {}) {
    this.inflector = options.inflector ?? new Inflector();
    this.collapse = new Set((options.collapse ?? []).map(normalizeDir));
    this.ignore = (options.ignore ?? []).map(normalizeDir);
  }

  addRoot(root: AutoloadRoot, files: readonly string[]): this {
    this.roots.push({
      root,
      dir: normalizeDir(root.path),
      files: files.map(file => file.split(path.sep).join('/')).sort(),
    });
    return this;
  }

  /**
   * @throws NamespaceCollisionError when two files map to the same constant
   */
  build(): NamespaceIndex {
    const entries = new Map<string, MutableEntry>();

    for (const { root, dir, files } of this.roots) {
      const base = parseQualifiedName(root.namespace ?? '');
      for (let i = 1; i <= base.length; i++) {
        this.addNamespace(entries, base.slice(0, i), dir);
      }

      for (const file of files) {
        if (!isInside(file, dir) || !file.endsWith('.rb')) continue;
        if (this.isIgnored(file) || this.belongsToNestedRoot(file, dir)) continue;
        this.addFile(entries, base, dir, file);
      }
    }

    return new NamespaceIndex(
      Array.from(entries.values()).map(entry => ({
        ...entry,
        qualifiedName: qualifiedName(entry.path),
      }))
    );
  }

  private addFile(entries: Map<string, MutableEntry>, base: NamespacePath, rootDir: string, file: string): void {
    const relative = rootDir === '.' ? file : file.slice(rootDir.length + 1);
    const parts = relative.split('/');
    const basename = path.posix.basename(parts.pop() ?? '', '.rb');

    const namespace = [...base];
    let dirPath = rootDir;
    for (const dirName of parts) {
      dirPath = dirPath === '.' ? dirName : `${dirPath}/${dirName}`;
      if (this.collapse.has(dirPath)) continue;

      const segment = this.inflector.camelize(dirName);
      if (!Inflector.isConstantName(segment)) return;
      namespace.push(segment);
      this.addNamespace(entries, namespace, rootDir);
    }

    const constantName = this.inflector.camelize(basename);
    if (!Inflector.isConstantName(constantName)) return;

    const constantPath = [...namespace, constantName];
    const key = qualifiedName(constantPath);
    const existing = entries.get(key);
    if (existing?.file) {
      throw new NamespaceCollisionError(key, [existing.file, file]);
    }
    if (existing) {
      existing.file = file;
    } else {
      entries.set(key, { path: constantPath, file, isDirectory: false, rootDir });
    }
  }

  private addNamespace(entries: Map<string, MutableEntry>, namespace: NamespacePath, rootDir: string): void {
    const key = qualifiedName(namespace);
    const existing = entries.get(key);
    if (existing) {
      existing.isDirectory = true;
    } else {
      entries.set(key, { path: [...namespace], file: null, isDirectory: true, rootDir });
    }
  }

  private isIgnored(file: string): boolean {
    return this.ignore.some(ignored => file === ignored || isInside(file, ignored));
  }

  /**
   * Files under a root nested in this one belong to that root only
   */
  private belongsToNestedRoot(file: string, rootDir: string): boolean {
    return this.roots.some(other =>
      other.dir !== rootDir && isInside(other.dir, rootDir) && isInside(file, other.dir)
    );
  }
}
