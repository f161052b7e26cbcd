/**
 * WASM loader for tree-sitter parsers in Node.js
 */

import { createRequire } from 'module';
import type { LoadedParser, SupportedLanguage } from './types.js';

/**
 * Grammar files, resolved from node_modules
 */
const GRAMMAR_WASM: Record<SupportedLanguage, string> = {
  ruby: 'tree-sitter-ruby/tree-sitter-ruby.wasm',
};

export class WasmLoader {
  private static parserInstances = new Map<SupportedLanguage, Promise<LoadedParser>>();
  // Parser.init() swaps the WASM runtime, so it must run only once
  private static runtime: Promise<typeof import('web-tree-sitter')> | null = null;

  /**
   * Load tree-sitter and a language grammar
   */
  static loadParser(language: SupportedLanguage): Promise<LoadedParser> {
    const cached = this.parserInstances.get(language);
    if (cached) {
      return cached;
    }

    const loading = this.loadNodeParser(language);
    this.parserInstances.set(language, loading);
    // A failed load must not poison the cache
    void loading.catch(() => this.parserInstances.delete(language));
    return loading;
  }

  /**
   * Load a parser for Node.js environment
   * Uses WASM files from node_modules
   */
  private static async loadNodeParser(language: SupportedLanguage): Promise<LoadedParser> {
    const require = createRequire(import.meta.url);

    const WebTreeSitter = await this.loadRuntime();

    const parser = new WebTreeSitter.Parser();
    const wasmPath = require.resolve(GRAMMAR_WASM[language]);

    const languageInstance = await WebTreeSitter.Language.load(wasmPath);
    parser.setLanguage(languageInstance);

    return { parser, language: languageInstance };
  }

  private static loadRuntime(): Promise<typeof import('web-tree-sitter')> {
    if (!this.runtime) {
      this.runtime = import('web-tree-sitter').then(async WebTreeSitter => {
        await WebTreeSitter.Parser.init();
        return WebTreeSitter;
      });
    }
    return this.runtime;
  }

  /**
   * Clear the parser cache
   * Useful for tests or reloading
   */
  static clearCache(): void {
    this.parserInstances.clear();
  }

  /**
   * Check if a parser is already cached
   */
  static isCached(language: SupportedLanguage): boolean {
    return this.parserInstances.has(language);
  }
}
