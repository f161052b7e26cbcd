/**
 * ERB parser module exports
 */

export { ErbLanguageParser } from './ErbLanguageParser.js';
export { maskErbTemplate } from './erb-source.js';
