/**
 * Error types
 */

/**
 * The run cannot produce a meaningful report with the given settings
 * or tenant data (bad credentials format, no target SKU in the tenant).
 */
export class ConfigurationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * An exported source file could not be read as expected.
 */
export class SourceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${message}: ${filePath}`);
    this.name = 'SourceError';
    this.filePath = filePath;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
