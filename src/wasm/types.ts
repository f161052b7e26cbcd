/**
 * Types for WASM loader module
 */

import type { Language, Parser } from 'web-tree-sitter';

export interface LoadedParser {
  parser: Parser;
  language: Language;
}

export type SupportedLanguage = 'ruby';
// Note: ERB templates have no grammar of their own here;
// ErbLanguageParser masks the template and reuses the Ruby grammar
