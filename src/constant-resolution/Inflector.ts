/**
 * Inflector
 *
 * File name <-> constant name convention used by autoloading.
 *
 * camelize:
 * - each '_'-separated part is capitalized: 'order_item' -> 'OrderItem'
 * - digits stay put: 'v2_api' -> 'V2Api'
 * - registered acronyms win over capitalization: 'html_parser' -> 'HTMLParser'
 * - explicit overrides win over everything: inflect({ oauth: 'OAuth' })
 * - runs of '_' collapse and edge underscores drop: 'a__b' -> 'AB', '_a' -> 'A'
 * - capitalize lowercases the rest of a part: 'xmlHttp' -> 'Xmlhttp'
 *
 * underscore is the inverse for names produced from plain lower-snake
 * basenames. Collapsed underscore runs cannot be recovered: 'AB' -> 'ab'.
 */

const CONSTANT_NAME = /^[A-Z][A-Za-z0-9_]*$/;

export interface InflectorOptions {
  /** Acronyms as they should be written in constants ('HTML', 'OAuth') */
  acronyms?: readonly string[];
  /** Basename -> constant name overrides */
  overrides?: Readonly<Record<string, string>>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export class Inflector {
  private acronyms = new Map<string, string>();
  private overrides = new Map<string, string>();
  private reverseOverrides = new Map<string, string>();
  private acronymPattern: RegExp | null = null;

  constructor(options: InflectorOptions = {}) {
    for (const acronym of options.acronyms ?? []) {
      this.acronym(acronym);
    }
    if (options.overrides) {
      this.inflect(options.overrides);
    }
  }

  acronym(word: string): void {
    this.acronyms.set(word.toLowerCase(), word);
    const alternatives = Array.from(this.acronyms.values())
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join('|');
    this.acronymPattern = new RegExp(`(?:(?<=([A-Za-z\\d]))|\\b)(${alternatives})(?=\\b|[^a-z])`, 'g');
  }

  inflect(overrides: Readonly<Record<string, string>>): void {
    for (const [basename, constantName] of Object.entries(overrides)) {
      this.overrides.set(basename, constantName);
      this.reverseOverrides.set(constantName, basename);
    }
  }

  camelize(basename: string): string {
    const override = this.overrides.get(basename);
    if (override !== undefined) {
      return override;
    }

    return basename
      .split('_')
      .filter(part => part.length > 0)
      .map(part => this.acronyms.get(part.toLowerCase()) ?? capitalize(part))
      .join('');
  }

  underscore(constantName: string): string {
    const override = this.reverseOverrides.get(constantName);
    if (override !== undefined) {
      return override;
    }

    let word = constantName;
    if (this.acronymPattern) {
      word = word.replace(this.acronymPattern, (_match, before: string | undefined, acronym: string) =>
        `${before ? '_' : ''}${acronym.toLowerCase()}`
      );
    }
    return word
      .replace(/([A-Z\d]+)([A-Z][a-z])/g, '$1_$2')
      .replace(/([a-z\d])([A-Z])/g, '$1_$2')
      .replace(/-/g, '_')
      .toLowerCase();
  }

  /**
   * Whether a string can name a Ruby constant
   */
  static isConstantName(name: string): boolean {
    return CONSTANT_NAME.test(name);
  }
}
