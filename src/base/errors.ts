/**
 * Errors surfaced to callers.
 *
 * Bad input files (missing, unparseable) never throw; these cover a
 * misconfigured tool or an input type nothing can read.
 */

export class UnsupportedFileTypeError extends Error {
  constructor(readonly filePath: string) {
    super(`Unsupported file type: ${filePath}`);
    this.name = 'UnsupportedFileTypeError';
  }
}

/**
 * Two files claim the same constant
 */
export class NamespaceCollisionError extends Error {
  constructor(
    readonly qualifiedName: string,
    readonly files: readonly string[]
  ) {
    super(`${qualifiedName} is defined by more than one file: ${files.join(', ')}`);
    this.name = 'NamespaceCollisionError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath?: string
  ) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}
