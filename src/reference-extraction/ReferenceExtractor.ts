/**
 * ReferenceExtractor - public entry point
 *
 * Extracts references to autoloaded project constants from Ruby snippets and
 * files.
 *
 * @example
 * const extractor = await ReferenceExtractor.create('/path/to/app');
 * const fromSnippet = await extractor.referencesFromString('Order.find(1)');
 * const fromFile = await extractor.referencesFromFile('app/models/user.rb');
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ParserRegistry,
  UnsupportedFileTypeError,
  type Language,
  type SyntaxNode,
} from '../base/index.js';
import { loadProjectConfig } from '../config/index.js';
import {
  ConstantResolver,
  Inflector,
  scanAutoloadRoots,
  type NamespaceIndex,
} from '../constant-resolution/index.js';
import { ErbLanguageParser } from '../erb/index.js';
import { RubyLanguageParser } from '../ruby/index.js';
import { AssociationInspector } from './AssociationInspector.js';
import { AstReferenceExtractor } from './AstReferenceExtractor.js';
import { ConstNodeInspector } from './ConstNodeInspector.js';
import type { ConstantNameInspector, Reference } from './types.js';

/**
 * File label of references found in snippets
 */
export const SNIPPET_PATH = '<snippet>';

export interface ReferenceExtractorOptions {
  projectRoot: string;
  index: NamespaceIndex;
  /** Defaults to [new ConstNodeInspector()] */
  inspectors?: readonly ConstantNameInspector[];
  /** Defaults to createDefaultRegistry() */
  registry?: ParserRegistry;
  attributeNestedConstants?: boolean;
  debug?: boolean;
}

export interface CreateExtractorOptions {
  /** Config file, relative to the project root; defaults to constref.json */
  configPath?: string;
  /** Also report ActiveRecord association targets */
  associations?: boolean;
  attributeNestedConstants?: boolean;
  debug?: boolean;
}

/**
 * Ruby and ERB parsers sharing one grammar instance
 */
export function createDefaultRegistry(): ParserRegistry {
  const ruby = new RubyLanguageParser();
  const registry = new ParserRegistry();
  registry.register(ruby);
  registry.register(new ErbLanguageParser(ruby));
  return registry;
}

export class ReferenceExtractor {
  readonly projectRoot: string;
  readonly index: NamespaceIndex;
  private readonly registry: ParserRegistry;
  private readonly astExtractor: AstReferenceExtractor;
  private readonly debug: boolean;

  constructor(options: ReferenceExtractorOptions) {
    this.projectRoot = path.resolve(options.projectRoot);
    this.index = options.index;
    this.registry = options.registry ?? createDefaultRegistry();
    this.debug = options.debug ?? false;
    this.astExtractor = new AstReferenceExtractor({
      inspectors: options.inspectors ?? [new ConstNodeInspector()],
      resolver: new ConstantResolver(options.index, {
        attributeNestedConstants: options.attributeNestedConstants,
      }),
    });
  }

  /**
   * Load the project config, scan its autoload paths and build an extractor
   */
  static async create(projectRoot: string, options: CreateExtractorOptions = {}): Promise<ReferenceExtractor> {
    const config = await loadProjectConfig(projectRoot, options.configPath);
    const index = await scanAutoloadRoots(projectRoot, config, { debug: options.debug });

    const inspectors: ConstantNameInspector[] = [new ConstNodeInspector()];
    if (options.associations) {
      inspectors.push(new AssociationInspector(new Inflector({
        acronyms: config.acronyms,
        overrides: config.inflections,
      })));
    }

    return new ReferenceExtractor({
      projectRoot,
      index,
      inspectors,
      attributeNestedConstants: options.attributeNestedConstants,
      debug: options.debug,
    });
  }

  /**
   * Extract references from a code string, labelled '<snippet>'
   */
  async referencesFromString(snippet: string, language: Language = 'ruby'): Promise<Reference[]> {
    const parser = await this.registry.initializeParser(language);
    const root = await parser.parse(snippet);
    if (!root) {
      if (this.debug) {
        console.warn(`Could not parse ${language} snippet`);
      }
      return [];
    }
    return this.extract(root, SNIPPET_PATH);
  }

  /**
   * Extract references from a file (absolute, or relative to the project root).
   *
   * A missing or unparseable file gives no references.
   *
   * @throws UnsupportedFileTypeError when no parser handles the file
   */
  async referencesFromFile(filePath: string): Promise<Reference[]> {
    const absolutePath = path.resolve(this.projectRoot, filePath);
    if (!(await isFile(absolutePath))) {
      return [];
    }

    const language = this.registry.getParserForFile(absolutePath)?.language;
    if (language === undefined) {
      throw new UnsupportedFileTypeError(absolutePath);
    }

    const parser = await this.registry.initializeParser(language);
    const content = await fs.readFile(absolutePath, 'utf8');
    const root = await parser.parse(content);

    const relativePath = path.relative(this.projectRoot, absolutePath).split(path.sep).join('/');
    if (!root) {
      if (this.debug) {
        console.warn(`Could not parse ${relativePath}, skipping`);
      }
      return [];
    }

    return this.extract(root, relativePath);
  }

  /**
   * Extract references from several files, concatenated in input order
   */
  async referencesFromFiles(filePaths: readonly string[]): Promise<Reference[]> {
    const references: Reference[] = [];
    for (const filePath of filePaths) {
      references.push(...(await this.referencesFromFile(filePath)));
    }
    return references;
  }

  private extract(root: SyntaxNode, relativePath: string): Reference[] {
    const references = this.astExtractor.extract(root, relativePath);
    if (this.debug) {
      console.debug(`${relativePath}: ${references.length} references`);
    }
    return references;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
