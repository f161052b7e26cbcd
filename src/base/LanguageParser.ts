/**
 * Language Parser Interface
 *
 * Common interface for the per-file-type parsers. A parser turns source
 * text into a SyntaxNode tree, or reports that it could not.
 */

import * as path from 'path';
import type { Language, SyntaxNode } from './SyntaxTree.js';

export interface LanguageParser {
  /**
   * The language this parser handles
   */
  readonly language: Language;

  /**
   * File extensions this parser can handle (e.g., ['.rb', '.rake'])
   */
  readonly extensions: string[];

  /**
   * Initialize the parser (load grammar, setup tree-sitter, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Parse source text.
   *
   * @returns The root node, or null when the source has syntax errors
   */
  parse(content: string): Promise<SyntaxNode | null>;

  /**
   * Check if this parser can handle a given file
   */
  canHandle(filePath: string): boolean;

  /**
   * Cleanup resources (optional)
   */
  dispose?(): Promise<void>;
}

/**
 * Abstract base class providing common functionality
 */
export abstract class BaseLanguageParser implements LanguageParser {
  abstract readonly language: Language;
  abstract readonly extensions: string[];

  /**
   * Extensionless file names this parser also claims (e.g. 'Gemfile')
   */
  readonly fileNames: string[] = [];

  abstract initialize(): Promise<void>;
  abstract parse(content: string): Promise<SyntaxNode | null>;

  /**
   * Default implementation checks file extension, then the bare file name
   */
  canHandle(filePath: string): boolean {
    const ext = path.extname(filePath);
    if (ext !== '' && this.extensions.includes(ext)) {
      return true;
    }
    return this.fileNames.includes(path.basename(filePath));
  }

  /**
   * Default dispose does nothing
   */
  async dispose(): Promise<void> {
    // Override if needed
  }
}
