/**
 * ERB Language Parser
 *
 * Extracts the embedded Ruby of a template (see maskErbTemplate) and
 * parses it with the Ruby grammar. Spans point into the template.
 */

import { BaseLanguageParser, type Language, type SyntaxNode } from '../base/index.js';
import { RubyLanguageParser } from '../ruby/index.js';
import { maskErbTemplate } from './erb-source.js';

export class ErbLanguageParser extends BaseLanguageParser {
  readonly language: Language = 'erb';
  readonly extensions = ['.erb'];

  private ruby: RubyLanguageParser;

  constructor(ruby: RubyLanguageParser = new RubyLanguageParser()) {
    super();
    this.ruby = ruby;
  }

  async initialize(): Promise<void> {
    await this.ruby.initialize();
  }

  async parse(content: string): Promise<SyntaxNode | null> {
    return this.ruby.parse(maskErbTemplate(content));
  }
}
