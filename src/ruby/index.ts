/**
 * Ruby parser module exports
 */

export { RubyLanguageParser, RUBY_FIELDS } from './RubyLanguageParser.js';
