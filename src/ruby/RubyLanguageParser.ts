/**
 * Ruby Language Parser
 *
 * Parses Ruby source with the tree-sitter Ruby grammar and converts the
 * result into the parser-independent SyntaxNode shape.
 */

import { BaseLanguageParser, convertTree, type Language, type SyntaxNode } from '../base/index.js';
import { WasmLoader, type LoadedParser } from '../wasm/index.js';

/**
 * Grammar fields the inspectors and the walker look at
 */
export const RUBY_FIELDS = [
  'name', 'scope', 'superclass', 'body',
  'receiver', 'method', 'arguments',
  'left', 'right', 'key', 'value',
] as const;

export class RubyLanguageParser extends BaseLanguageParser {
  readonly language: Language = 'ruby';
  readonly extensions = ['.rb', '.rake', '.builder', '.gemspec', '.ru'];
  readonly fileNames = ['Gemfile', 'Rakefile', 'Guardfile', 'Capfile', 'Thorfile'];

  private loaded: LoadedParser | null = null;

  async initialize(): Promise<void> {
    if (this.loaded) return;
    this.loaded = await WasmLoader.loadParser('ruby');
  }

  async parse(content: string): Promise<SyntaxNode | null> {
    if (!this.loaded) {
      await this.initialize();
    }
    return this.parseLoaded(content);
  }

  private parseLoaded(content: string): SyntaxNode | null {
    if (!this.loaded) {
      throw new Error('Ruby grammar is not loaded');
    }

    const tree = this.loaded.parser.parse(content);
    if (!tree) {
      return null;
    }

    try {
      if (tree.rootNode.hasError) {
        return null;
      }
      return convertTree(tree.rootNode, RUBY_FIELDS);
    } finally {
      tree.delete();
    }
  }
}
